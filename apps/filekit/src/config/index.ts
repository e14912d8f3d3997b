/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadConfig,
    loadConfigWithFallback,
    parseConfig,
    getDefaultConfig,
    isCollisionStrategy,
    type FilekitConfig,
    type AiConfig,
    type ArchivesConfig,
    type AlbumArtConfig,
    type BlocklistConfig,
    type CollisionStrategy,
} from "./loadConfig.js";
