/**
 * @fileoverview Command barrel exports
 *
 * @module cli/commands
 */

export {
    runRenamePass,
    runSimpleRename,
    runStrip,
    runAiRename,
    runRules,
    askStripSettings,
    type RenamePass,
} from "./rename.js";
export { runExtract } from "./extract.js";
export { runBlocklist } from "./blocklist.js";
export { runAlbumArt } from "./albumArt.js";
