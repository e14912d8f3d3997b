/**
 * @fileoverview Unit tests for file name utilities
 *
 * Tests cover:
 * - splitExt extension rules
 * - Plus, spacing and affix transforms
 * - mvsep pattern cleaning
 * - Pre-processing for the AI renamer
 * - Suggestion sanitising and post-processing
 *
 * @module domain/__tests__/filename
 */

import { describe, it, expect } from "vitest";
import {
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
} from "../domain/utils/filename.js";

describe("filename utilities", () => {
    describe("splitExt", () => {
        // Scenario: Ordinary and multi-dot names
        it("should split at the last dot", () => {
            expect(splitExt("song.mp3")).toEqual(["song", ".mp3"]);
            expect(splitExt("a.b.txt")).toEqual(["a.b", ".txt"]);
        });

        // Scenario: Dot files and names without a dot
        it("should not treat a leading dot as an extension", () => {
            expect(splitExt(".bashrc")).toEqual([".bashrc", ""]);
            expect(splitExt("...x")).toEqual(["...x", ""]);
            expect(splitExt("README")).toEqual(["README", ""]);
        });

        // Scenario: Hidden file with an extension
        it("should split a dot file that has a second dot", () => {
            expect(splitExt(".config.yml")).toEqual([".config", ".yml"]);
        });

        // Scenario: Trailing dot
        it("should keep a trailing dot as the extension", () => {
            expect(splitExt("a.b.")).toEqual(["a.b", "."]);
        });
    });

    describe("replacePluses", () => {
        // Scenario: Runs of pluses become single spaces
        it("should replace each run of + with one space", () => {
            expect(replacePluses("my+++song+name.mp3")).toBe("my song name.mp3");
        });

        // Scenario: Leading and trailing pluses
        it("should trim the stem after replacing", () => {
            expect(replacePluses("+intro+.wav")).toBe("intro.wav");
        });

        // Scenario: Extension is left alone
        it("should not touch pluses in the extension", () => {
            expect(replacePluses("a+b.c++")).toBe("a b.c++");
        });

        // Scenario: Nothing left
        it("should return null when the stem becomes empty", () => {
            expect(replacePluses("+++.txt")).toBeNull();
        });
    });

    describe("fixMisplacedSpaces", () => {
        // Scenario: Leading, repeated and pre-extension spaces
        it("should trim, collapse and remove spaces before the extension", () => {
            expect(fixMisplacedSpaces("  my   song .mp3 ")).toBe("my song.mp3");
        });

        // Scenario: Tabs count as whitespace
        it("should collapse tabs to a single space", () => {
            expect(fixMisplacedSpaces("a\t\tb.txt")).toBe("a b.txt");
        });

        // Scenario: Already clean
        it("should leave a clean name unchanged", () => {
            expect(fixMisplacedSpaces("clean name.txt")).toBe("clean name.txt");
        });
    });

    describe("tidyBeforeExtension", () => {
        // Scenario: Trailing stem spaces
        it("should remove spaces between stem and extension", () => {
            expect(tidyBeforeExtension("name  .txt")).toBe("name.txt");
            expect(tidyBeforeExtension("name.txt")).toBe("name.txt");
        });
    });

    describe("stripPrefix", () => {
        // Scenario: Case-sensitive match
        it("should remove a matching prefix and leading spaces", () => {
            expect(stripPrefix("demo - track.mp3", "demo -", true)).toBe("track.mp3");
        });

        // Scenario: Case mismatch
        it("should respect case sensitivity", () => {
            expect(stripPrefix("DEMO track.mp3", "demo", true)).toBeNull();
            expect(stripPrefix("DEMO track.mp3", "demo", false)).toBe("track.mp3");
        });

        // Scenario: Not a prefix
        it("should return null when the prefix does not match", () => {
            expect(stripPrefix("track.mp3", "demo", false)).toBeNull();
        });

        // Scenario: Space left before the extension
        it("should tidy a space left before the extension", () => {
            expect(stripPrefix("tmp_song .mp3", "tmp_", true)).toBe("song.mp3");
        });

        // Scenario: Whole name removed
        it("should return null when nothing is left", () => {
            expect(stripPrefix("abc", "abc", true)).toBeNull();
        });
    });

    describe("stripSuffix", () => {
        // Scenario: Windows copy marker
        it("should remove a suffix from the stem and keep the extension", () => {
            expect(stripSuffix("report - Copy.docx", "- Copy", true)).toBe("report.docx");
        });

        // Scenario: Case-insensitive
        it("should match case-insensitively when asked", () => {
            expect(stripSuffix("report - COPY.docx", "- copy", false)).toBe("report.docx");
            expect(stripSuffix("report - COPY.docx", "- copy", true)).toBeNull();
        });

        // Scenario: Single-space suffix
        it("should remove a single trailing space", () => {
            expect(stripSuffix("name .txt", " ", true)).toBe("name.txt");
        });

        // Scenario: Suffix is in the extension only
        it("should not match against the extension", () => {
            expect(stripSuffix("song.mp3", "mp3", true)).toBeNull();
        });
    });

    describe("normalizeAffixInput", () => {
        // Scenario: Prefix keeps leading spaces
        it("should trim only the right side of a prefix", () => {
            expect(normalizeAffixInput("prefix", "  demo - ")).toBe("  demo -");
        });

        // Scenario: Suffix trimming with the single-space exception
        it("should fully trim a suffix except a single space", () => {
            expect(normalizeAffixInput("suffix", "  - Copy ")).toBe("- Copy");
            expect(normalizeAffixInput("suffix", " ")).toBe(" ");
            expect(normalizeAffixInput("suffix", "   ")).toBe("");
        });
    });

    describe("cleanMvsepFilename", () => {
        // Scenario: Prefixed name with stem and marker
        it("should clean a prefixed name with stem and site marker", () => {
            expect(cleanMvsepFilename("20240101123456-abcdef0123-dont-stop-me-now_vocals_[mvsep.com].mp3"))
                .toBe("Dont Stop Me Now (vocals).mp3");
        });

        // Scenario: Prefixed name with model tag
        it("should clean a prefixed melroformer name", () => {
            expect(cleanMvsepFilename("20240101123456-abcdef0123-night-drive._melroformer_mt_4_vocals.mp3"))
                .toBe("Night Drive (vocals).mp3");
        });

        // Scenario: Prefixed name without stem
        it("should clean a prefixed name without a stem", () => {
            expect(cleanMvsepFilename("20240101123456-abcdef0123-night-drive[mvsep.com].mp3"))
                .toBe("Night Drive.mp3");
        });

        // Scenario: Contractions
        it("should turn contraction hyphens into apostrophes", () => {
            expect(cleanMvsepFilename("i-don-t-know_drums.mp3")).toBe("I Don't Know (drums).mp3");
        });

        // Scenario: Hyphen before a t that starts a longer non-ASCII word
        it("should keep a hyphen before a word that begins with t and has accented letters", () => {
            expect(cleanMvsepFilename("kuka-tämä_vocals.mp3")).toBe("Kuka Tämä (vocals).mp3");
        });

        // Scenario: Capitalisation lowers the rest of each word
        it("should capitalise each word and lower the rest", () => {
            expect(cleanMvsepFilename("LOUD-song_bass.mp3")).toBe("Loud Song (bass).mp3");
        });

        // Scenario: Unknown layout
        it("should return names that match no pattern unchanged", () => {
            expect(cleanMvsepFilename("Artist - Title.mp3")).toBe("Artist - Title.mp3");
            expect(cleanMvsepFilename("song_vocals.flac")).toBe("song_vocals.flac");
        });
    });

    describe("sanitizeWindowsChars", () => {
        // Scenario: Every reserved character
        it("should replace reserved characters with underscores", () => {
            expect(sanitizeWindowsChars("a<b>c:d\"e/f\\g|h?i*j")).toBe("a_b_c_d_e_f_g_h_i_j");
        });
    });

    describe("preprocessMvsepFilename", () => {
        // Scenario: Raw name with prefix, stem, artefact and marker
        it("should extract the core and stem from a raw name", () => {
            const result = preprocessMvsepFilename(
                "20240101123456-abcdef0123-sa-teet-sen_htdemucs_ft_vocals_[mvsep.com].mp3"
            );

            expect(result).toEqual({
                core     : "sa-teet-sen",
                stem     : "Vocals",
                extension: ".mp3",
                isRaw    : true,
            });
        });

        // Scenario: Raw name detected by marker only
        it("should treat the site marker as raw without a prefix", () => {
            const result = preprocessMvsepFilename("artist_song_instrumental_[mvsep.com].wav");

            expect(result).toEqual({
                core     : "artist-song",
                stem     : "Instrumental",
                extension: ".wav",
                isRaw    : true,
            });
        });

        // Scenario: Organised name with stem
        it("should parse a trailing (Stem) from an organised name", () => {
            const result = preprocessMvsepFilename("Artist - Song (vocals).mp3");

            expect(result).toEqual({
                core     : "Artist - Song",
                stem     : "Vocals",
                extension: ".mp3",
                isRaw    : false,
            });
        });

        // Scenario: Full Mix capitalisation
        it("should capitalise only the first letter of a parsed stem", () => {
            expect(preprocessMvsepFilename("Song (FULL MIX).flac").stem).toBe("Full mix");
        });

        // Scenario: Organised name without stem
        it("should keep an organised name without a stem as the core", () => {
            expect(preprocessMvsepFilename("Artist - Song.mp3")).toEqual({
                core     : "Artist - Song",
                stem     : null,
                extension: ".mp3",
                isRaw    : false,
            });
        });

        // Scenario: Trailing dot on the core
        it("should drop one trailing dot from the core", () => {
            expect(preprocessMvsepFilename("Song title..mp3").core).toBe("Song title");
        });
    });

    describe("sanitizeSuggestion", () => {
        // Scenario: Reserved characters and whitespace
        it("should remove reserved characters and collapse whitespace", () => {
            expect(sanitizeSuggestion("  AC/DC  -  Back: In?  Black ")).toBe("ACDC - Back In Black");
        });

        // Scenario: Overlong suggestion
        it("should cut long names at the last space within 200 characters", () => {
            const word = "abcdefghi";
            const long = Array.from({ length: 30 }, () => word).join(" ");

            const result = sanitizeSuggestion(long);

            expect(result).toBe(Array.from({ length: 20 }, () => word).join(" "));
            expect(result.length).toBe(199);
        });

        // Scenario: Long name without spaces
        it("should hard-cut a long name without spaces", () => {
            expect(sanitizeSuggestion("x".repeat(250))).toBe("x".repeat(200));
        });
    });

    describe("postProcessSuggestion", () => {
        // Scenario: Unknown artist and feat formatting
        it("should drop the Unknown Artist prefix and add periods to feat", () => {
            expect(postProcessSuggestion("Unknown Artist - Night Drive feat Someone (Vocals)"))
                .toBe("Night Drive feat. Someone (Vocals)");
        });

        // Scenario: ft and existing periods
        it("should format ft and leave existing periods alone", () => {
            expect(postProcessSuggestion("Band - Song ft Guest (Other)")).toBe("Band - Song ft. Guest (Other)");
            expect(postProcessSuggestion("Band - Song feat. Guest (Other)")).toBe("Band - Song feat. Guest (Other)");
        });

        // Scenario: Words that merely contain feat
        it("should not touch words that contain feat", () => {
            expect(postProcessSuggestion("Band - Defeated (Vocals)")).toBe("Band - Defeated (Vocals)");
        });

        // Scenario: feat followed by an accented letter
        it("should not touch a word that starts with feat and continues in non-ASCII letters", () => {
            expect(postProcessSuggestion("Artisti - Laulu featä (Vocals)")).toBe("Artisti - Laulu featä (Vocals)");
        });

        // Scenario: Prefix in another case
        it("should drop the prefix case-insensitively", () => {
            expect(postProcessSuggestion("UNKNOWN ARTIST - Song (Vocals)")).toBe("Song (Vocals)");
        });
    });
});
