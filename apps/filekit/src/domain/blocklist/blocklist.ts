/**
 * @fileoverview Blocklist conversion
 *
 * Converts domain blocklists between three plain-text formats:
 * - `domains`: one domain per line, `#` comments
 * - `adguard`: `||example.com^` rules
 * - `hosts`: `127.0.0.1 example.com` entries
 *
 * @module domain/blocklist/blocklist
 */

import { basename, dirname, join } from "path";
import { splitExt } from "../utils/filename.js";

export type BlocklistFormat = "domains" | "adguard" | "hosts";

export const kBLOCKLIST_FORMATS: readonly BlocklistFormat[] = ["domains", "adguard", "hosts"];

const kDEFAULT_ADDRESS = "127.0.0.1";

const kADGUARD_RULE = /^\|\|.+\^$/;
const kHOSTS_ENTRY = /^(?:\d{1,3}(?:\.\d{1,3}){3}|[0-9a-f]*:[0-9a-f:]+)\s+\S+/i;

export interface RenderOptions {
    /** Address in front of each HOSTS entry (default: 127.0.0.1) */
    address?: string;
}

export interface ConvertOptions extends RenderOptions {
    /** Input format; detected when omitted */
    from?: BlocklistFormat;

    to: BlocklistFormat;

    /** Drop repeated domains, keeping the first (default: false) */
    dedupe?: boolean;
}

export interface ConversionResult {
    readonly from: BlocklistFormat;
    readonly to: BlocklistFormat;
    readonly domains: readonly string[];
    readonly output: string;
}

export function isBlocklistFormat(value: unknown): value is BlocklistFormat {
    return value === "domains" || value === "adguard" || value === "hosts";
}

function lines(text: string): string[] {
    return text.split(/\r?\n/);
}

function beforeComment(line: string): string {
    const hash = line.indexOf("#");
    return (hash === -1 ? line : line.slice(0, hash)).trim();
}

/**
 * Read the domains out of a blocklist.
 *
 * @example
 * ```typescript
 * parseBlocklist("||ads.example^\n! comment\n", "adguard"); // ["ads.example"]
 * parseBlocklist("0.0.0.0 ads.example # tracker", "hosts");  // ["ads.example"]
 * ```
 */
export function parseBlocklist(text: string, format: BlocklistFormat): string[] {
    const domains: string[] = [];

    for (const raw of lines(text)) {
        if (format === "domains") {
            const domain = beforeComment(raw);
            if (domain) {
                domains.push(domain);
            }
        }
        else if (format === "adguard") {
            const line = raw.trim();
            if (line.startsWith("||") && line.endsWith("^")) {
                const domain = line.replace(/^\|+/, "").replace(/\^+$/, "");
                if (domain) {
                    domains.push(domain);
                }
            }
        }
        else {
            const line = raw.trim();
            if (!line || line.startsWith("#") || line.split(/\s+/).length < 2) {
                continue;
            }

            const tokens = beforeComment(line).split(/\s+/).filter(Boolean);
            const domain = tokens[tokens.length - 1];
            if (domain) {
                domains.push(domain);
            }
        }
    }

    return domains;
}

/**
 * Write domains in a format. Lines end with "\n", including the last.
 */
export function renderBlocklist(domains: readonly string[], format: BlocklistFormat, options: RenderOptions = {}): string {
    if (domains.length === 0) {
        return "";
    }

    const address = options.address ?? kDEFAULT_ADDRESS;
    const rendered = domains.map(domain => {
        switch (format) {
            case "adguard":
                return `||${domain}^`;
            case "hosts":
                return `${address} ${domain}`;
            default:
                return domain;
        }
    });

    return `${rendered.join("\n")}\n`;
}

/**
 * Guess the format from the lines that are not comments.
 *
 * AdGuard wins when most lines are `||...^` rules, HOSTS when most are
 * `address domain` pairs; anything else is a plain domain list.
 */
export function detectFormat(text: string): BlocklistFormat {
    const candidates = lines(text)
        .map(line => line.trim())
        .filter(line => line && !line.startsWith("#") && !line.startsWith("!"));

    if (candidates.length === 0) {
        return "domains";
    }

    const adguard = candidates.filter(line => kADGUARD_RULE.test(line)).length;
    const hosts = candidates.filter(line => kHOSTS_ENTRY.test(beforeComment(line))).length;
    const half = candidates.length / 2;

    if (adguard > half) {
        return "adguard";
    }
    if (hosts > half) {
        return "hosts";
    }
    return "domains";
}

/**
 * Remove repeated domains, keeping the first occurrence.
 */
export function dedupeDomains(domains: readonly string[]): string[] {
    return [...new Set(domains)];
}

/**
 * Parse, optionally de-duplicate, and render.
 */
export function convertBlocklist(text: string, options: ConvertOptions): ConversionResult {
    const from = options.from ?? detectFormat(text);
    const parsed = parseBlocklist(text, from);
    const domains = options.dedupe ? dedupeDomains(parsed) : parsed;

    return {
        from,
        to    : options.to,
        domains,
        output: renderBlocklist(domains, options.to, { address: options.address }),
    };
}

/**
 * Output file next to the input: `<base>_adguard.txt`, `<base>_hosts.txt`
 * or `<base>_domains.txt`.
 */
export function defaultOutputPath(inputPath: string, format: BlocklistFormat): string {
    const [base] = splitExt(basename(inputPath));
    return join(dirname(inputPath), `${base}_${format}.txt`);
}
