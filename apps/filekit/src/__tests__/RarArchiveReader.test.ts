/**
 * @fileoverview Unit tests for RarArchiveReader
 *
 * node-unrar-js is replaced by an in-process extractor that reads a JSON
 * description of the archive and raises the same `ERAR_*` reasons.
 *
 * Tests cover:
 * - Listing with path normalisation
 * - Extraction to disk and entry callbacks
 * - Encrypted data and encrypted headers, right and wrong passwords
 * - Mapping of unrar failures to ArchiveError codes
 * - A password-protected RAR through ArchiveExtractor
 *
 * @module adapters/archive/__tests__/RarArchiveReader
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ArchiveExtractor, RarArchiveReader } from "../adapters/archive/index.js";

interface FakeRarFile {
    name: string;
    content?: string;
    directory?: boolean;
}

interface FakeRar {
    files: FakeRarFile[];
    password?: string;
    encryptedHeaders?: boolean;
    corrupt?: boolean;
}

interface FakeHeader {
    name: string;
    unpSize: number;
    flags: { directory: boolean; encrypted: boolean };
}

vi.mock("node-unrar-js", async () => {
    const { mkdirSync, readFileSync: readText, writeFileSync: writeText } = await import("fs");
    const { dirname, join: joinPath } = await import("path");

    class UnrarError extends Error {
        readonly reason: string;

        constructor(reason: string, message: string) {
            super(message);
            this.reason = reason;
        }
    }

    function open(text: string, password: string | undefined, targetPath?: string) {
        const archive: FakeRar = JSON.parse(text);
        const locked = archive.password !== undefined;

        const checkPassword = (): void => {
            if (!locked) {
                return;
            }
            if (password === undefined) {
                throw new UnrarError("ERAR_MISSING_PASSWORD", "Password is needed");
            }
            if (password !== archive.password) {
                throw new UnrarError("ERAR_BAD_PASSWORD", "Password is wrong");
            }
        };

        if (archive.corrupt) {
            throw new UnrarError("ERAR_BAD_ARCHIVE", "Bad archive");
        }
        if (archive.encryptedHeaders) {
            checkPassword();
        }

        const header = (file: FakeRarFile): FakeHeader => ({
            name   : file.name,
            unpSize: Buffer.byteLength(file.content ?? ""),
            flags  : { directory: file.directory === true, encrypted: locked },
        });

        function* headers() {
            for (const file of archive.files) {
                yield header(file);
            }
        }

        function* extracted(filter?: (fileHeader: FakeHeader) => boolean) {
            for (const file of archive.files) {
                const fileHeader = header(file);
                if (filter && !filter(fileHeader)) {
                    continue;
                }
                if (file.directory) {
                    if (targetPath !== undefined) {
                        mkdirSync(joinPath(targetPath, file.name), { recursive: true });
                    }
                    yield { fileHeader };
                    continue;
                }

                checkPassword();
                const content = file.content ?? "";
                if (targetPath === undefined) {
                    yield { fileHeader, extraction: new TextEncoder().encode(content) };
                }
                else {
                    const target = joinPath(targetPath, file.name);
                    mkdirSync(dirname(target), { recursive: true });
                    writeText(target, content);
                    yield { fileHeader };
                }
            }
        }

        return {
            getFileList: () => ({ arcHeader: {}, fileHeaders: headers() }),
            extract    : (options: { files?: (fileHeader: FakeHeader) => boolean } = {}) =>
                ({ arcHeader: {}, files: extracted(options.files) }),
        };
    }

    return {
        createExtractorFromFile: async (options: { filepath: string; password?: string; targetPath?: string }) =>
            open(readText(options.filepath, "utf-8"), options.password, options.targetPath),
        createExtractorFromData: async (options: { data: ArrayBuffer; password?: string }) =>
            open(Buffer.from(options.data).toString("utf-8"), options.password),
    };
});

function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("RarArchiveReader", () => {
    let directory: string;

    beforeEach(() => {
        vi.clearAllMocks();
        directory = mkdtempSync(join(tmpdir(), "rar-reader-"));
    });

    afterEach(() => {
        rmSync(directory, { recursive: true, force: true });
    });

    function createTestRar(name: string, archive: FakeRar): string {
        const path = join(directory, name);
        writeFileSync(path, JSON.stringify(archive));
        return path;
    }

    describe("list", () => {
        // Scenario: Plain archive with a directory and a backslash path
        it("should list entries with normalised paths and sizes", async () => {
            const path = createTestRar("album.rar", {
                files: [
                    { name: "album", directory: true },
                    { name: "album/01.mp3", content: "one" },
                    { name: "album\\02.mp3", content: "second" },
                ],
            });

            const entries = await new RarArchiveReader(path).list();

            expect(entries).toEqual([
                { path: "album", size: 0, isDirectory: true, encrypted: false },
                { path: "album/01.mp3", size: 3, isDirectory: false, encrypted: false },
                { path: "album/02.mp3", size: 6, isDirectory: false, encrypted: false },
            ]);
        });

        // Scenario: Encrypted headers without a password
        it("should report a missing password when the headers are encrypted", async () => {
            const path = createTestRar("locked.rar", {
                files           : [{ name: "a.txt", content: "hello" }],
                password        : "test-secret",
                encryptedHeaders: true,
            });

            await expect(new RarArchiveReader(path).list()).rejects.toMatchObject({
                name   : "ArchiveError",
                code   : "PASSWORD_REQUIRED",
                message: `Password required: Cannot list ${path}`,
            });
        });

        // Scenario: Encrypted headers with the right password
        it("should list encrypted headers with the right password", async () => {
            const path = createTestRar("locked.rar", {
                files           : [{ name: "a.txt", content: "hello" }],
                password        : "test-secret",
                encryptedHeaders: true,
            });

            const entries = await new RarArchiveReader(path).list("test-secret");

            expect(entries).toEqual([{ path: "a.txt", size: 5, isDirectory: false, encrypted: true }]);
        });

        // Scenario: Encrypted headers with a wrong password
        it("should report a wrong password for encrypted headers", async () => {
            const path = createTestRar("locked.rar", {
                files           : [{ name: "a.txt", content: "hello" }],
                password        : "test-secret",
                encryptedHeaders: true,
            });

            await expect(new RarArchiveReader(path).list("wrong-secret")).rejects.toMatchObject({
                code   : "BAD_PASSWORD",
                message: `Wrong password: Cannot list ${path}`,
            });
        });

        // Scenario: Any other unrar failure
        it("should map other unrar failures to CORRUPT", async () => {
            const path = createTestRar("broken.rar", { files: [], corrupt: true });

            await expect(new RarArchiveReader(path).list()).rejects.toMatchObject({
                code   : "CORRUPT",
                message: `Cannot list ${path}: Bad archive`,
            });
        });
    });

    describe("test", () => {
        // Scenario: Unencrypted archive
        it("should pass an unencrypted archive without a password", async () => {
            const path = createTestRar("plain.rar", { files: [{ name: "a.txt", content: "hello" }] });

            await expect(new RarArchiveReader(path).test()).resolves.toBe(true);
        });

        // Scenario: Archive with no files
        it("should pass an archive that holds only directories", async () => {
            const path = createTestRar("empty.rar", { files: [{ name: "empty", directory: true }] });

            await expect(new RarArchiveReader(path).test()).resolves.toBe(true);
        });

        // Scenario: Encrypted data, right and wrong passwords
        it("should tell the right password from a wrong or missing one", async () => {
            const path = createTestRar("locked.rar", {
                files   : [{ name: "a.txt", content: "hello" }],
                password: "test-secret",
            });
            const reader = new RarArchiveReader(path);

            await expect(reader.test()).resolves.toBe(false);
            await expect(reader.test("wrong-secret")).resolves.toBe(false);
            await expect(reader.test("test-secret")).resolves.toBe(true);
        });

        // Scenario: Broken archive
        it("should rethrow failures that are not about the password", async () => {
            const path = createTestRar("broken.rar", { files: [], corrupt: true });

            await expect(new RarArchiveReader(path).test()).rejects.toMatchObject({ code: "CORRUPT" });
        });
    });

    describe("extractAll", () => {
        // Scenario: Plain extraction
        it("should write every file below the destination and report each one", async () => {
            const path = createTestRar("album.rar", {
                files: [
                    { name: "disc", directory: true },
                    { name: "disc/01.mp3", content: "one" },
                    { name: "notes.txt", content: "liner notes" },
                ],
            });
            const destination = join(directory, "out");
            const onEntry = vi.fn();

            await new RarArchiveReader(path).extractAll(destination, undefined, onEntry);

            expect(readFileSync(join(destination, "disc", "01.mp3"), "utf-8")).toBe("one");
            expect(readFileSync(join(destination, "notes.txt"), "utf-8")).toBe("liner notes");
            expect(onEntry.mock.calls).toEqual([["disc/01.mp3", 3], ["notes.txt", 11]]);
        });

        // Scenario: Encrypted data with the right password
        it("should extract encrypted data with the right password", async () => {
            const path = createTestRar("locked.rar", {
                files   : [{ name: "a.txt", content: "hello" }],
                password: "test-secret",
            });
            const destination = join(directory, "out");

            await new RarArchiveReader(path).extractAll(destination, "test-secret");

            expect(readFileSync(join(destination, "a.txt"), "utf-8")).toBe("hello");
        });

        // Scenario: Encrypted data with a wrong password
        it("should fail with BAD_PASSWORD when the password is wrong", async () => {
            const path = createTestRar("locked.rar", {
                files   : [{ name: "a.txt", content: "hello" }],
                password: "test-secret",
            });

            await expect(new RarArchiveReader(path).extractAll(join(directory, "out"), "wrong-secret"))
                .rejects.toMatchObject({
                    code   : "BAD_PASSWORD",
                    message: `Wrong password: Cannot extract ${path}`,
                });
            expect(existsSync(join(directory, "out", "a.txt"))).toBe(false);
        });

        // Scenario: Entry outside the destination
        it("should refuse an archive with an entry that escapes the destination", async () => {
            const path = createTestRar("evil.rar", {
                files: [
                    { name: "ok.txt", content: "fine" },
                    { name: "../evil.txt", content: "nope" },
                ],
            });
            const destination = join(directory, "out");

            await expect(new RarArchiveReader(path).extractAll(destination)).rejects.toMatchObject({
                code   : "UNSUPPORTED",
                message: "Entry escapes the destination: ../evil.txt",
            });
            expect(existsSync(join(destination, "ok.txt"))).toBe(false);
            expect(existsSync(join(directory, "evil.txt"))).toBe(false);
        });
    });

    describe("through ArchiveExtractor", () => {
        // Scenario: Second configured password opens the archive
        it("should extract a password-protected RAR and delete it", async () => {
            const path = createTestRar("album.rar", {
                files   : [
                    { name: "01.mp3", content: "one" },
                    { name: "02.mp3", content: "two" },
                ],
                password: "test-secret",
            });
            const logger = createMockLogger();
            const extractor = new ArchiveExtractor({
                passwords: ["wrong-secret", "test-secret"],
                logger,
                freeBytes: () => Number.MAX_SAFE_INTEGER,
                sleep    : async () => {},
            });

            const result = await extractor.processArchive(path);

            expect(result).toMatchObject({
                success        : true,
                attempts       : 1,
                placed         : 2,
                skipped        : 0,
                deletedOriginal: true,
            });
            expect(logger.info).toHaveBeenCalledWith("Password 2 of 2 works.");
            expect(readFileSync(join(directory, "album", "02.mp3"), "utf-8")).toBe("two");
            expect(existsSync(path)).toBe(false);
        });
    });
});
