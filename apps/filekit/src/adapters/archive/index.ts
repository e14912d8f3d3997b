/**
 * @fileoverview Archive adapter barrel exports
 *
 * @module adapters/archive
 */

export { ArchiveError, isArchiveError, type ArchiveErrorCode } from "./ArchiveError.js";
export {
    normalizeEntryPath,
    resolveEntryPath,
    type ArchiveEntry,
    type ArchiveFormat,
    type ArchiveReader,
    type EntryCallback,
} from "./ArchiveReader.js";
export { ZipArchiveReader } from "./ZipArchiveReader.js";
export { RarArchiveReader } from "./RarArchiveReader.js";
export { openArchive, isSupportedArchive, kARCHIVE_EXTENSIONS } from "./openArchive.js";
export {
    ArchiveExtractor,
    moveTree,
    verifyPlacement,
    type ArchiveExtractorOptions,
    type ExtractionProgress,
    type ExtractionResult,
    type PlacedFile,
} from "./ArchiveExtractor.js";
