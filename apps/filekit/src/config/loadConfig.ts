/**
 * @fileoverview Configuration Loader
 *
 * Loads filekit settings from a YAML file. Every section is optional;
 * missing keys take their defaults, but a key with the wrong type is
 * an error.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";

export type CollisionStrategy = "skip" | "overwrite" | "rename";

export interface AiConfig {
    /** Chat model (default: gpt-4o-mini) */
    model: string;

    /** Sampling temperature (default: 0.1) */
    temperature: number;

    /** Maximum tokens for the response */
    maxTokens: number;

    /** Minimum confidence for a suggestion to be applied (default: 0.6) */
    minConfidence: number;

    /** Languages the titles are likely in, used for diacritic restoration */
    languageHint: string;
}

export interface ArchivesConfig {
    passwords: string[];
    collision: CollisionStrategy;
    retryCount: number;
    retryDelayMs: number;
    diskSpaceBuffer: number;
    progressThresholdMb: number;
    logFile: string;
}

export interface AlbumArtConfig {
    maxDimension: number;
    jpegQuality: number;
}

export interface BlocklistConfig {
    /** Address written in front of each domain in HOSTS output */
    address: string;
}

/**
 * Full application configuration.
 */
export interface FilekitConfig {
    audioExtensions: string[];
    genericNames: string[];
    ai: AiConfig;
    archives: ArchivesConfig;
    albumArt: AlbumArtConfig;
    blocklist: BlocklistConfig;
}

/**
 * Get the built-in configuration.
 */
export function getDefaultConfig(): FilekitConfig {
    return {
        audioExtensions: [".mp3", ".wav", ".flac", ".m4a"],
        genericNames   : ["input", "audio", "track", "untitled", "temp", "unknown"],
        ai             : {
            model        : "gpt-4o-mini",
            temperature  : 0.1,
            maxTokens    : 200,
            minConfidence: 0.6,
            languageHint : "English or Finnish",
        },
        archives: {
            passwords          : [],
            collision          : "skip",
            retryCount         : 3,
            retryDelayMs       : 2000,
            diskSpaceBuffer    : 1.1,
            progressThresholdMb: 10,
            logFile            : "archive_extraction.log",
        },
        albumArt: {
            maxDimension: 2500,
            jpegQuality : 95,
        },
        blocklist: {
            address: "127.0.0.1",
        },
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a section of the parsed file. A missing section is an empty one.
 */
function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = raw[key];
    if (value === undefined || value === null) {
        return {};
    }
    if (!isRecord(value)) {
        throw new Error(`Invalid config: '${key}' must be a mapping`);
    }
    return value;
}

function readString(raw: Record<string, unknown>, key: string, path: string, fallback: string): string {
    const value = raw[key];
    if (value === undefined) {
        return fallback;
    }
    if (typeof value !== "string" || value.length === 0) {
        throw new Error(`Invalid config: '${path}' must be a non-empty string`);
    }
    return value;
}

function readNumber(
    raw: Record<string, unknown>,
    key: string,
    path: string,
    fallback: number,
    range: { min?: number; max?: number; integer?: boolean } = {}
): number {
    const value = raw[key];
    if (value === undefined) {
        return fallback;
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new Error(`Invalid config: '${path}' must be a number`);
    }
    if (range.integer && !Number.isInteger(value)) {
        throw new Error(`Invalid config: '${path}' must be an integer`);
    }
    if (range.min !== undefined && value < range.min) {
        throw new Error(`Invalid config: '${path}' must be at least ${range.min}`);
    }
    if (range.max !== undefined && value > range.max) {
        throw new Error(`Invalid config: '${path}' must be at most ${range.max}`);
    }
    return value;
}

function readStringList(raw: Record<string, unknown>, key: string, path: string, fallback: string[]): string[] {
    const value = raw[key];
    if (value === undefined || value === null) {
        return fallback;
    }
    if (!Array.isArray(value)) {
        throw new Error(`Invalid config: '${path}' must be a list`);
    }

    // YAML reads unquoted numeric passwords as numbers
    return value.map((item, index) => {
        if (typeof item === "string") {
            return item;
        }
        if (typeof item === "number") {
            return String(item);
        }
        throw new Error(`Invalid config: '${path}[${index}]' must be a string`);
    });
}

export function isCollisionStrategy(value: unknown): value is CollisionStrategy {
    return value === "skip" || value === "overwrite" || value === "rename";
}

/**
 * Validate a parsed YAML document and fill in defaults.
 *
 * @throws Error naming the first invalid key
 */
export function parseConfig(parsed: unknown): FilekitConfig {
    const defaults = getDefaultConfig();

    if (parsed === null || parsed === undefined) {
        return defaults;
    }
    if (!isRecord(parsed)) {
        throw new Error("Invalid config: expected a mapping at the top level");
    }

    const ai = section(parsed, "ai");
    const archives = section(parsed, "archives");
    const albumArt = section(parsed, "albumArt");
    const blocklist = section(parsed, "blocklist");

    const collision = archives.collision ?? defaults.archives.collision;
    if (!isCollisionStrategy(collision)) {
        throw new Error("Invalid config: 'archives.collision' must be skip, overwrite or rename");
    }

    return {
        audioExtensions: readStringList(parsed, "audioExtensions", "audioExtensions", defaults.audioExtensions)
            .map(ext => (ext.startsWith(".") ? ext : `.${ext}`).toLowerCase()),
        genericNames: readStringList(parsed, "genericNames", "genericNames", defaults.genericNames)
            .map(name => name.toLowerCase()),
        ai: {
            model        : readString(ai, "model", "ai.model", defaults.ai.model),
            temperature  : readNumber(ai, "temperature", "ai.temperature", defaults.ai.temperature, { min: 0, max: 2 }),
            maxTokens    : readNumber(ai, "maxTokens", "ai.maxTokens", defaults.ai.maxTokens, { min: 1, integer: true }),
            minConfidence: readNumber(ai, "minConfidence", "ai.minConfidence", defaults.ai.minConfidence, { min: 0, max: 1 }),
            languageHint : readString(ai, "languageHint", "ai.languageHint", defaults.ai.languageHint),
        },
        archives: {
            passwords          : readStringList(archives, "passwords", "archives.passwords", defaults.archives.passwords),
            collision,
            retryCount         : readNumber(archives, "retryCount", "archives.retryCount", defaults.archives.retryCount, { min: 1, integer: true }),
            retryDelayMs       : readNumber(archives, "retryDelayMs", "archives.retryDelayMs", defaults.archives.retryDelayMs, { min: 0 }),
            diskSpaceBuffer    : readNumber(archives, "diskSpaceBuffer", "archives.diskSpaceBuffer", defaults.archives.diskSpaceBuffer, { min: 1 }),
            progressThresholdMb: readNumber(archives, "progressThresholdMb", "archives.progressThresholdMb", defaults.archives.progressThresholdMb, { min: 0 }),
            logFile            : readString(archives, "logFile", "archives.logFile", defaults.archives.logFile),
        },
        albumArt: {
            maxDimension: readNumber(albumArt, "maxDimension", "albumArt.maxDimension", defaults.albumArt.maxDimension, { min: 1, integer: true }),
            jpegQuality : readNumber(albumArt, "jpegQuality", "albumArt.jpegQuality", defaults.albumArt.jpegQuality, { min: 1, max: 100, integer: true }),
        },
        blocklist: {
            address: readString(blocklist, "address", "blocklist.address", defaults.blocklist.address),
        },
    };
}

/**
 * Load configuration from a YAML file.
 *
 * @throws Error if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig("./config/filekit.yml");
 * console.log(config.ai.model); // "gpt-4o-mini"
 * ```
 */
export function loadConfig(filePath: string): FilekitConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Config file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    return parseConfig(parseYaml(content));
}

/**
 * Load configuration with fallback to the defaults.
 */
export function loadConfigWithFallback(filePath: string): FilekitConfig {
    try {
        return loadConfig(filePath);
    }
    catch (error) {
        console.warn(`Failed to load config from ${filePath}:`, error instanceof Error ? error.message : String(error));
        return getDefaultConfig();
    }
}
