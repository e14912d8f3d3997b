/**
 * @fileoverview File Name Utilities
 *
 * Pure string transforms used by the rename planners. None of these
 * touch the file system; they take a bare file name and return the
 * cleaned name, or null when there is nothing sensible to rename to.
 *
 * @module domain/utils/filename
 */

/**
 * Result of pre-processing an audio-separation file name for the AI renamer.
 */
export interface PreprocessedName {
    /** Artist/title information with service noise removed */
    readonly core: string;

    /** Detected stem ("Vocals", "Drums", ...), or null */
    readonly stem: string | null;

    /** Original extension including the dot, or "" */
    readonly extension: string;

    /** True when the name still carries the service's raw prefix or marker */
    readonly isRaw: boolean;
}

export type AffixMode = "prefix" | "suffix";

/**
 * Maximum length of an AI-suggested name before the extension.
 */
const kMAX_SUGGESTION_LENGTH = 200;

/**
 * Raw service prefix: 14-digit timestamp and a hex id.
 */
const kRAW_PREFIX = /^\d{14}-[0-9a-fA-F]{10,16}-/;

const kMVSEP_MARKER = "[mvsep.com]";

/**
 * Fixed patterns for `cleanMvsepFilename`, tried in order.
 * Group 1 is the title; group 2, when present, is the stem.
 */
const kMVSEP_PATTERNS: readonly RegExp[] = [
    /^\d{14}-[a-f0-9]{10}-(.*?)\._(?:.*?_)?(?:mdx\w+|melroformer)_mt_\d+_([a-zA-Z0-9]{1,7})\.mp3$/,
    /^\d{14}-[a-f0-9]{10}-(.*?)_(?:.*?_)?(?:mdx\w+_mt_\d+_)?([a-zA-Z0-9]{1,7})_\[mvsep\.com\]\.mp3$/,
    /^\d{14}-[a-f0-9]{10}-(.*?)_(?:.*?_)?(?:mdx\w+_mt_\d+_)?\[mvsep\.com\]\.mp3$/,
    /^\d{14}-[a-f0-9]{10}-(.*?)\[mvsep\.com\]\.mp3$/,
    /^(.*?)\._(?:.*?_)?(?:mdx\w+|melroformer)_mt_\d+_([a-zA-Z0-9]{1,7})\.mp3$/,
    /^(.*?)_([a-zA-Z0-9]{1,7})\.mp3$/,
];

/**
 * Stem keywords in a raw name. Order matters: the first stem with a
 * match wins, and within it the last occurrence is removed.
 */
const kSTEM_KEYWORDS: ReadonlyArray<readonly [string, RegExp]> = [
    ["Vocals", /_(vocals|vocal)(?:_|$)/gi],
    ["Other", /_(other)(?:_|$)/gi],
    ["Drums", /_(drums|drum)(?:_|$)/gi],
    ["Bass", /_(bass)(?:_|$)/gi],
    ["Instrumental", /_(instrumental|instr|inst)(?:_|$)/gi],
    ["Karaoke", /_(karaoke|karoke)(?:_|$)/gi],
    ["Piano", /_(piano)(?:_|$)/gi],
    ["Guitar", /_(guitar)(?:_|$)/gi],
];

/**
 * Separation-model names the service leaves in raw file names.
 */
const kMODEL_ARTEFACTS: readonly RegExp[] = [
    /_melroformer_mt_\d+/gi,
    /_htdemucs_ft/gi,
    /_mdx23c/gi,
    /_uvr-mdx-net-inst_hq_\d+/gi,
    /_demucs(_\d+)?/gi,
    /_reverb_full/gi,
    /_noise_rem/gi,
    /_(-?)remaster(ed)?/gi,
    /_hq\d*/gi,
];

/**
 * `(Stem)` suffix of an already organised name.
 */
const kORGANISED_STEM = /^(.*?)\s*\((Vocals|Instrumental|Drums|Bass|Other|Full Mix|Karaoke|Piano|Guitar)\)$/i;

/**
 * Split a file name into stem and extension.
 *
 * The extension starts at the last dot, provided some non-dot
 * character comes before it.
 *
 * @example
 * ```typescript
 * splitExt("a.b.txt");  // ["a.b", ".txt"]
 * splitExt(".bashrc");  // [".bashrc", ""]
 * splitExt("README");   // ["README", ""]
 * splitExt("a.b.");     // ["a.b", "."]
 * ```
 *
 * A trailing dot is kept as an empty extension so the stem can be
 * rewritten without losing it.
 */
export function splitExt(name: string): [string, string] {
    const dot = name.lastIndexOf(".");
    if (dot <= 0) {
        return [name, ""];
    }

    const head = name.slice(0, dot);
    if (!/[^.]/.test(head)) {
        return [name, ""];
    }

    return [head, name.slice(dot)];
}

/**
 * Replace each run of "+" in the stem with a single space.
 *
 * @returns The new name, or null when the stem would be empty ("+++.txt")
 */
export function replacePluses(name: string): string | null {
    const [stem, extension] = splitExt(name);
    const replaced = stem.replace(/\++/g, " ").trim();

    if (!replaced) {
        return null;
    }

    return replaced + extension;
}

/**
 * Trim the name, collapse whitespace runs, and remove spaces before the extension.
 *
 * @example
 * ```typescript
 * fixMisplacedSpaces("  my   song .mp3 "); // "my song.mp3"
 * ```
 */
export function fixMisplacedSpaces(name: string): string {
    const collapsed = name.trim().replace(/\s+/g, " ");
    const [stem, extension] = splitExt(collapsed);
    return stem.trimEnd() + extension;
}

/**
 * Remove whitespace between the stem and the extension.
 */
export function tidyBeforeExtension(name: string): string {
    const [stem, extension] = splitExt(name);
    return stem.endsWith(" ") ? stem.trimEnd() + extension : name;
}

/**
 * Remove a prefix from the start of the name.
 *
 * @returns The new name, or null when the prefix does not match or nothing is left
 */
export function stripPrefix(name: string, prefix: string, caseSensitive: boolean): string | null {
    const matches = caseSensitive
        ? name.startsWith(prefix)
        : name.toLowerCase().startsWith(prefix.toLowerCase());

    if (!matches) {
        return null;
    }

    let target = name.slice(prefix.length);
    if (target.startsWith(" ")) {
        target = target.trimStart();
    }

    return target ? tidyBeforeExtension(target) : null;
}

/**
 * Remove a suffix from the end of the stem, keeping the extension.
 *
 * @returns The new name, or null when the suffix does not match or nothing is left
 */
export function stripSuffix(name: string, suffix: string, caseSensitive: boolean): string | null {
    const [stem, extension] = splitExt(name);
    const matches = caseSensitive
        ? stem.endsWith(suffix)
        : stem.toLowerCase().endsWith(suffix.toLowerCase());

    if (!matches || suffix.length === 0) {
        return null;
    }

    const target = stem.slice(0, stem.length - suffix.length) + extension;
    return target ? tidyBeforeExtension(target) : null;
}

/**
 * Normalise the string a user typed for `strip`.
 *
 * A prefix keeps its leading spaces. A suffix is trimmed, unless it is
 * exactly one space, which is a legitimate thing to remove.
 */
export function normalizeAffixInput(mode: AffixMode, raw: string): string {
    if (mode === "prefix") {
        return raw.trimEnd();
    }
    return raw === " " ? " " : raw.trim();
}

/**
 * Upper-case the first character and lower-case the rest.
 */
function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Clean a file name produced by the mvsep.com separation service.
 *
 * Names that match none of the known layouts are returned unchanged.
 *
 * @example
 * ```typescript
 * cleanMvsepFilename("20240101123456-abcdef0123-dont-stop-me-now_vocals_[mvsep.com].mp3");
 * // "Dont Stop Me Now (vocals).mp3"
 * cleanMvsepFilename("i-don-t-know_drums.mp3");
 * // "I Don't Know (drums).mp3"
 * ```
 */
export function cleanMvsepFilename(name: string): string {
    for (const pattern of kMVSEP_PATTERNS) {
        const match = pattern.exec(name);
        if (!match) {
            continue;
        }

        const stem = match[2] ?? null;
        let title = (match[1] ?? "").replace(/[._ ]+$/, "");

        title = title.replace(/(?<=[\p{L}\p{N}_])-([tT])(?![\p{L}\p{N}_])/gu, "'$1");
        title = title.replace(/-/g, " ");
        title = title.split(/\s+/).filter(Boolean).map(capitalize).join(" ");

        return stem ? `${title} (${stem}).mp3` : `${title}.mp3`;
    }

    return name;
}

/**
 * Replace characters Windows does not allow in file names with "_".
 */
export function sanitizeWindowsChars(name: string): string {
    return name.replace(/[<>:"/\\|?*]/g, "_");
}

/**
 * Strip service noise from an audio file name before asking the AI renamer.
 *
 * Raw names lose the timestamp prefix, the `[mvsep.com]` marker, the stem
 * keyword and model artefacts, and come back hyphen-separated. Organised
 * names only have a trailing `(Stem)` parsed off.
 */
export function preprocessMvsepFilename(name: string): PreprocessedName {
    const [baseName, extension] = splitExt(name);
    const isRaw = kRAW_PREFIX.test(baseName) || name.toLowerCase().includes(kMVSEP_MARKER);

    let core: string;
    let stem: string | null = null;

    if (isRaw) {
        let processed = baseName;

        if (processed.toLowerCase().endsWith(kMVSEP_MARKER)) {
            processed = processed.slice(0, -kMVSEP_MARKER.length).replace(/_+$/, "");
        }

        for (const [label, pattern] of kSTEM_KEYWORDS) {
            const matches = [...processed.matchAll(pattern)];
            const last = matches[matches.length - 1];
            if (last?.index === undefined) {
                continue;
            }

            let start = last.index;
            const end = start + last[0].length;
            if (start > 0 && processed[start - 1] === "_") {
                start -= 1;
            }

            processed = processed.slice(0, start) + processed.slice(end);
            stem = label;
            break;
        }

        processed = processed.replace(kRAW_PREFIX, "");

        for (const pattern of kMODEL_ARTEFACTS) {
            processed = processed.replace(pattern, "_");
        }

        processed = processed.replace(/_+/g, "_").replace(/^_+|_+$/g, "");
        core = processed.replace(/_/g, "-").replace(/-+/g, "-").replace(/^-+|-+$/g, "");
    }
    else {
        core = baseName;
        const organised = kORGANISED_STEM.exec(core);
        if (organised) {
            core = (organised[1] ?? "").trim();
            stem = capitalize(organised[2] ?? "");
        }
    }

    if (core.endsWith(".")) {
        core = core.slice(0, -1);
    }

    return { core, stem, extension, isRaw };
}

/**
 * Make a model suggestion safe to use as a file name.
 *
 * Removes reserved characters, collapses whitespace, and cuts names longer
 * than 200 characters back to the last space.
 */
export function sanitizeSuggestion(name: string): string {
    let cleaned = name.replace(/[\\/*?:"<>|]/g, "").replace(/\s+/g, " ").trim();

    if (cleaned.length > kMAX_SUGGESTION_LENGTH) {
        const head = cleaned.slice(0, kMAX_SUGGESTION_LENGTH);
        const lastSpace = head.lastIndexOf(" ");
        cleaned = lastSpace !== -1 ? head.slice(0, lastSpace) : head;
    }

    return cleaned;
}

/**
 * Final clean-up of an "Artist - Title (Stem)" suggestion.
 *
 * @example
 * ```typescript
 * postProcessSuggestion("Unknown Artist - Night Drive feat Someone (Vocals)");
 * // "Night Drive feat. Someone (Vocals)"
 * ```
 */
export function postProcessSuggestion(name: string): string {
    let cleaned = sanitizeSuggestion(name);

    if (cleaned.toLowerCase().startsWith("unknown artist - ")) {
        cleaned = cleaned.slice("unknown artist - ".length).trim();
    }

    cleaned = cleaned
        .replace(/(?<![\p{L}\p{N}_])feat(?![.\p{L}\p{N}_])/giu, "feat.")
        .replace(/(?<![\p{L}\p{N}_])ft(?![.\p{L}\p{N}_])/giu, "ft.")
        .replace(/feat\.\./g, "feat.")
        .replace(/ft\.\./g, "ft.");

    return cleaned;
}
