/**
 * @fileoverview Plugin loader barrel exports
 *
 * @module @filekit/engine/plugins
 */

export {
    PluginLoader,
    type LoadedPlugins,
    type PluginLoaderConfig,
    type PluginLoaderLogger,
} from "./PluginLoader.js";
export {
    createPlannerFromYaml,
    isYamlRenameRule,
    parseRenameRules,
    type ParsedRules,
    type YamlRenameRule,
} from "./renameRules.js";
