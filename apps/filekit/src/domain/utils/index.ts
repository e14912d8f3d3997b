/**
 * @fileoverview Domain utilities barrel exports
 *
 * @module domain/utils
 */

export {
    splitExt,
    replacePluses,
    fixMisplacedSpaces,
    tidyBeforeExtension,
    stripPrefix,
    stripSuffix,
    normalizeAffixInput,
    cleanMvsepFilename,
    sanitizeWindowsChars,
    preprocessMvsepFilename,
    sanitizeSuggestion,
    postProcessSuggestion,
    type AffixMode,
    type PreprocessedName,
} from "./filename.js";
