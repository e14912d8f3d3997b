/**
 * OpenAI-based file namer
 *
 * Asks a GPT model for a clean "Artist - Title (Stem)" name for an
 * audio file. Uses JSON mode so the reply can be validated.
 */

import OpenAI from "openai";

export type SuggestionStatus = "rename" | "no_change" | "unknown";

/**
 * What the namer is asked about
 */
export interface NameRequest {
    /** Artist/title information after pre-processing */
    core: string;

    /** Detected stem, or null */
    stem: string | null;

    /** True for names still in the separation service's raw layout */
    isRaw: boolean;

    /** Original file name, for logging only */
    fileName: string;
}

/**
 * A validated suggestion
 */
export interface NameSuggestion {
    status: SuggestionStatus;

    /** Suggested name without extension; only set for "rename" */
    name?: string;

    /** Confidence score between 0.0 and 1.0 */
    confidence: number;

    /** Why the suggestion was downgraded, when it was */
    explanation?: string;
}

/**
 * Anything that can suggest a name. The AI rename planner depends on
 * this rather than on the OpenAI client.
 */
export interface NameSuggester {
    suggest(request: NameRequest): Promise<NameSuggestion>;
}

/**
 * Configuration options for the OpenAI namer
 */
export interface OpenAINamerConfig {
    /** OpenAI API key (defaults to OPENAI_API_KEY env var) */
    apiKey?: string;

    /** Model to use (default: gpt-4o-mini) */
    model?: string;

    /** Temperature for responses (default: 0.1 for consistency) */
    temperature?: number;

    /** Maximum tokens for response */
    maxTokens?: number;

    /** Languages the titles are likely in (default: "English or Finnish") */
    languageHint?: string;
}

const kNOT_DETECTED = "Not explicitly detected";

/**
 * A rename must end in a parenthesised stem after an artist and a title.
 */
const kSUGGESTION_FORMAT = /^.+ - .+ \([^)]+\)$/;

/**
 * Build the system prompt
 */
export function buildSystemPrompt(languageHint: string): string {
    return `You clean up the file names of audio tracks, many of them stems produced by a source-separation service.

Output format: "Artist - Title (Stem)".
- If no distinct artist can be found, use "Unknown Artist" as the artist.
- Use the detected stem when there is one. Otherwise use "(Full Mix)".
- Convert hyphens between words to spaces and capitalise appropriately.
- Language hint: the artist or title is likely in ${languageHint}. Restore diacritics only where the language clearly calls for them (in Finnish, "sa" may be "sä" and "korso" may be "körsö"). Be conservative.
- A featuring artist is written "feat. Someone" or "ft. Someone", with the period.

Respond with a JSON object containing:
- status: "rename" when you have a name, "no_change" when the input is already in the right form, "unknown" when the input is too generic or garbled
- name: the formatted name, without a file extension (only for "rename")
- confidence: a number between 0 and 1`;
}

/**
 * Build the user prompt for one file
 */
export function buildUserPrompt(request: NameRequest): string {
    const stem = request.stem ?? kNOT_DETECTED;

    if (request.isRaw) {
        return `Core information: "${request.core}" (pre-processed from a raw service name; words may be hyphenated)
Detected stem type: "${stem}"

Examples:
Core "sa-teet-saman-muille-feat-mimosa", stem "Vocals" -> Unknown Artist - Sä Teet Saman Muille feat. Mimosa (Vocals)
Core "kostonliekki-liekeissa", stem "Other" -> Kostonliekki - Liekeissä (Other)`;
    }

    return `This file name appears to be an already organised song name: "${request.core}"
Stem parsed from the name: "${stem}"

If it only needs the fixes above (capitalisation, diacritics, the "feat." period or adding "(Full Mix)"), answer "no_change".`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function clampConfidence(value: unknown): number {
    if (typeof value !== "number" || !Number.isFinite(value)) {
        return 0.5;
    }
    return Math.min(1, Math.max(0, value));
}

/**
 * Validate a raw JSON reply from the model.
 *
 * Unknown statuses and renames that are not in "Artist - Title (Stem)"
 * form come back as "unknown".
 */
export function parseNameSuggestion(content: string): NameSuggestion {
    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
        return { status: "unknown", confidence: 0, explanation: "Reply is not a JSON object" };
    }

    const confidence = clampConfidence(parsed.confidence);

    if (parsed.status === "no_change") {
        return { status: "no_change", confidence };
    }

    if (parsed.status !== "rename") {
        return { status: "unknown", confidence };
    }

    const name = typeof parsed.name === "string" ? parsed.name.trim() : "";
    if (!kSUGGESTION_FORMAT.test(name)) {
        return {
            status     : "unknown",
            confidence,
            explanation: `Reply not in 'Artist - Title (Stem)' format: '${name}'`,
        };
    }

    return { status: "rename", name, confidence };
}

/**
 * OpenAI-based namer implementation
 *
 * @example
 * ```typescript
 * const namer = new OpenAINamer({ model: "gpt-4o-mini" });
 * const suggestion = await namer.suggest({
 *     core: "sa-teet-sen", stem: "Vocals", isRaw: true, fileName: "...mp3",
 * });
 * ```
 */
export class OpenAINamer implements NameSuggester {
    readonly id: string;
    readonly name: string = "OpenAI Namer";

    private client: OpenAI;
    private config: Required<Omit<OpenAINamerConfig, "apiKey">>;
    private systemPrompt: string;

    constructor(config: OpenAINamerConfig = {}, id: string = "openai-namer") {
        this.id = id;

        this.client = new OpenAI({
            apiKey: config.apiKey ?? process.env.OPENAI_API_KEY,
        });

        this.config = {
            model       : config.model ?? "gpt-4o-mini",
            temperature : config.temperature ?? 0.1,
            maxTokens   : config.maxTokens ?? 200,
            languageHint: config.languageHint ?? "English or Finnish",
        };

        this.systemPrompt = buildSystemPrompt(this.config.languageHint);
    }

    /**
     * Suggest a name for one file. Never throws; failures come back as "unknown".
     */
    async suggest(request: NameRequest): Promise<NameSuggestion> {
        if (!request.core) {
            return { status: "unknown", confidence: 0, explanation: "Empty core information" };
        }

        try {
            const response = await this.client.chat.completions.create({
                model          : this.config.model,
                temperature    : this.config.temperature,
                max_tokens     : this.config.maxTokens,
                response_format: { type: "json_object" },
                messages       : [
                    { role: "system", content: this.systemPrompt },
                    { role: "user", content: buildUserPrompt(request) },
                ],
            });

            const content = response.choices[0]?.message?.content;

            if (!content) {
                throw new Error("No response from OpenAI");
            }

            return parseNameSuggestion(content);
        }
        catch (error) {
            return {
                status     : "unknown",
                confidence : 0,
                explanation: `Naming failed for '${request.fileName}': ${error instanceof Error ? error.message : String(error)}`,
            };
        }
    }
}
