/**
 * @fileoverview Plugin Loader
 *
 * Collects planners and actions from rule directories. `.yml`/`.yaml`
 * files hold rename rules; `.js`/`.mjs` files are imported and every
 * export (or element of a default-exported array) that looks like a
 * plugin is kept. Anything else in the directory is ignored.
 *
 * @module @filekit/engine/plugins/PluginLoader
 */

import { readFile, readdir, stat } from "fs/promises";
import { join, extname } from "path";
import { pathToFileURL } from "url";
import type { PlannerPlugin, PluginLogger } from "../contracts/PlannerPlugin.js";
import type { ActionPlugin } from "../contracts/ActionPlugin.js";
import { isPlannerPlugin } from "../contracts/PlannerPlugin.js";
import { isActionPlugin } from "../contracts/ActionPlugin.js";
import { createPlannerFromYaml, parseRenameRules } from "./renameRules.js";

export interface LoadedPlugins {
    planners: PlannerPlugin[];
    actions: ActionPlugin[];
}

export type PluginLoaderLogger = PluginLogger;

export interface PluginLoaderConfig {
    logger?: PluginLoaderLogger;
}

const consoleLogger: PluginLoaderLogger = {
    debug: (msg, data) => console.debug(`[plugins] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[plugins] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[plugins] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[plugins] ${msg}`, data ?? ""),
};

const empty = (): LoadedPlugins => ({ planners: [], actions: [] });

function append(into: LoadedPlugins, from: LoadedPlugins): LoadedPlugins {
    into.planners.push(...from.planners);
    into.actions.push(...from.actions);
    return into;
}

async function isMissing(path: string): Promise<boolean> {
    try {
        await stat(path);
        return false;
    }
    catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            return true;
        }
        throw error;
    }
}

/**
 * @example
 * ```typescript
 * const loader = new PluginLoader({ logger });
 * const { planners, actions } = await loader.loadFromDirectories(["./rules"]);
 *
 * engine.registerDomain({
 *     id      : "rules",
 *     name    : "User rules",
 *     provider,
 *     planners,
 *     actions : [new RenameAction(), ...actions],
 * });
 * ```
 */
export class PluginLoader {
    private readonly logger: PluginLoaderLogger;

    private readonly loaders: Record<string, (filePath: string) => Promise<LoadedPlugins>> = {
        ".yml" : async (filePath) => this.loadYamlFile(filePath),
        ".yaml": async (filePath) => this.loadYamlFile(filePath),
        ".js"  : (filePath) => this.loadCodeFile(filePath),
        ".mjs" : (filePath) => this.loadCodeFile(filePath),
    };

    constructor(config: PluginLoaderConfig = {}) {
        this.logger = config.logger ?? consoleLogger;
    }

    /**
     * Directories are read in the order given, files within each in name
     * order, so equal-confidence rules tie the same way on every run.
     */
    async loadFromDirectories(dirPaths: readonly string[]): Promise<LoadedPlugins> {
        const result = empty();
        for (const dirPath of dirPaths) {
            append(result, await this.loadFromDirectory(dirPath));
        }
        return result;
    }

    /**
     * A file that fails to load is logged and skipped. A missing
     * directory, or a path that is not one, yields nothing.
     */
    async loadFromDirectory(dirPath: string): Promise<LoadedPlugins> {
        const result = empty();

        if (await isMissing(dirPath)) {
            this.logger.warn("Plugin directory does not exist", { dirPath });
            return result;
        }
        if (!(await stat(dirPath)).isDirectory()) {
            this.logger.warn("Plugin path is not a directory", { dirPath });
            return result;
        }

        const files = (await readdir(dirPath)).sort();
        for (const file of files) {
            const load = this.loaders[extname(file).toLowerCase()];
            if (load === undefined) {
                continue;
            }

            const filePath = join(dirPath, file);
            try {
                append(result, await load(filePath));
            }
            catch (error) {
                this.logger.error("Failed to load plugin file", {
                    filePath,
                    error: error instanceof Error ? error.message : String(error),
                });
            }
        }

        this.logger.info("Plugins loaded from directory", {
            dirPath,
            planners: result.planners.length,
            actions : result.actions.length,
        });

        return result;
    }

    /**
     * Rules from one YAML file. An invalid regex in any rule fails the
     * whole file.
     */
    async loadYamlFile(filePath: string): Promise<LoadedPlugins> {
        const { rules, invalid } = parseRenameRules(await readFile(filePath, "utf-8"));
        if (invalid > 0) {
            this.logger.warn("Ignoring invalid rule definition", { filePath, count: invalid });
        }

        const planners = rules.map(createPlannerFromYaml);
        planners.forEach(planner => this.logger.debug("Loaded YAML rule", { id: planner.id }));

        return { planners, actions: [] };
    }

    async loadCodeFile(filePath: string): Promise<LoadedPlugins> {
        const exports: Record<string, unknown> = await import(pathToFileURL(filePath).href);
        const result = empty();

        const candidates = Object.entries(exports).flatMap(([key, value]): Array<[string, unknown]> =>
            key === "default" && Array.isArray(value)
                ? value.map((item, index): [string, unknown] => [`default[${index}]`, item])
                : [[key, value]]
        );

        for (const [key, value] of candidates) {
            if (isPlannerPlugin(value)) {
                result.planners.push(value);
                this.logger.debug("Loaded code planner", { id: value.id, export: key });
            }
            else if (isActionPlugin(value)) {
                result.actions.push(value);
                this.logger.debug("Loaded code action", { id: value.id, export: key });
            }
        }

        return result;
    }
}
