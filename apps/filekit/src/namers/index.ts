/**
 * @fileoverview Namers barrel exports
 *
 * @module namers
 */

export {
    OpenAINamer,
    buildSystemPrompt,
    buildUserPrompt,
    parseNameSuggestion,
    type OpenAINamerConfig,
    type NameSuggester,
    type NameRequest,
    type NameSuggestion,
    type SuggestionStatus,
} from "./openai-namer.js";
