/**
 * @fileoverview Entity barrel exports
 *
 * @module domain/entities
 */

export {
    createFileEntry,
    isFileEntry,
    type FileEntry,
    type FileEntryInput,
    type FileEntryMetadata,
} from "./FileEntry.js";
