/**
 * @fileoverview Blocklist barrel exports
 *
 * @module domain/blocklist
 */

export {
    parseBlocklist,
    renderBlocklist,
    detectFormat,
    dedupeDomains,
    convertBlocklist,
    defaultOutputPath,
    isBlocklistFormat,
    kBLOCKLIST_FORMATS,
    type BlocklistFormat,
    type RenderOptions,
    type ConvertOptions,
    type ConversionResult,
} from "./blocklist.js";
