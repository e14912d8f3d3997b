/**
 * @fileoverview Provider barrel exports
 *
 * @module domain/providers
 */

export {
    DirectoryEntryProvider,
    type DirectoryProviderConfig,
} from "./DirectoryEntryProvider.js";
