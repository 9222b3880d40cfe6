import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { runBackup } from "../../src/core/backup";
import { assertArchiveFile, extractedRootFor, runRestore } from "../../src/core/restore";
import { TarCompressor } from "../../src/core/tools";
import { DecryptionError, NotFoundError } from "../../src/utils/errors";
import { createTestContext, listDir, makeTempDir, removeDir, writeFiles } from "../helpers/context";
import { FakeEncryptor } from "../helpers/fake-encryptor";

describe("restore", () => {
  let tempDir: string;
  let restoreDir: string;
  const tools = { compressor: new TarCompressor(), encryptor: new FakeEncryptor() };

  beforeEach(async () => {
    tempDir = await makeTempDir("restore");
    restoreDir = path.join(tempDir, "restore");
    await fs.mkdir(restoreDir);
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  async function backUp(files: Record<string, string>, name: string): Promise<string> {
    await writeFiles(path.join(tempDir, "src"), files);
    const context = createTestContext(tempDir, { now: () => new Date(2024, 4, 1, 8, 0, 0) });
    const target = { name, sourceDirectory: path.join(tempDir, "src", name), line: 1 };
    const summary = await runBackup([target], "test-secret", { context, tools });
    return summary.archives[0]?.archivePath ?? "";
  }

  describe("assertArchiveFile", () => {
    test("resolves a relative path against the working directory", async () => {
      await writeFiles(tempDir, { "a.tar.gz.age": "x" });
      expect(await assertArchiveFile("a.tar.gz.age", tempDir)).toBe(path.join(tempDir, "a.tar.gz.age"));
    });

    test("rejects a missing file", async () => {
      await expect(assertArchiveFile("nope.tar.gz.age", tempDir)).rejects.toThrow(NotFoundError);
      await expect(assertArchiveFile("nope.tar.gz.age", tempDir)).rejects.toThrow(
        "nope.tar.gz.age not found.",
      );
    });

    test("rejects a directory", async () => {
      await expect(assertArchiveFile("restore", tempDir)).rejects.toThrow("restore not found.");
    });
  });

  describe("extractedRootFor", () => {
    test("uses the name recorded in the archive file name", () => {
      expect(extractedRootFor("/x/docs-2024-05-01-080000.tar.gz.age", "/work")).toBe("/work/docs");
    });

    test("falls back to the working directory for other names", () => {
      expect(extractedRootFor("/x/renamed.tar.gz.age", "/work")).toBe("/work");
      expect(extractedRootFor("/x/..-2024-05-01-080000.tar.gz.age", "/work")).toBe("/work");
    });
  });

  describe("runRestore", () => {
    test("recreates the tree under its base name in the working directory", async () => {
      const archivePath = await backUp({ "docs/file.txt": "hello" }, "docs");
      const context = createTestContext(restoreDir);

      const result = await runRestore(archivePath, "test-secret", { context, tools });

      expect(await fs.readFile(path.join(restoreDir, "docs", "file.txt"), "utf8")).toBe("hello");
      expect(result).toEqual({
        archivePath,
        extractedRoot: path.join(restoreDir, "docs"),
      });
      expect(context.output.lines).toEqual([`Restored from ${archivePath}`]);
    });

    test("accepts a path relative to the working directory", async () => {
      const archivePath = await backUp({ "notes/n.txt": "n" }, "notes");
      await fs.rename(archivePath, path.join(restoreDir, path.basename(archivePath)));
      const context = createTestContext(restoreDir);

      await runRestore(path.basename(archivePath), "test-secret", { context, tools });

      expect(await fs.readFile(path.join(restoreDir, "notes", "n.txt"), "utf8")).toBe("n");
    });

    test("overwrites existing files", async () => {
      const archivePath = await backUp({ "docs/file.txt": "from archive" }, "docs");
      await writeFiles(restoreDir, { "docs/file.txt": "local edit" });

      await runRestore(archivePath, "test-secret", { context: createTestContext(restoreDir), tools });

      expect(await fs.readFile(path.join(restoreDir, "docs", "file.txt"), "utf8")).toBe(
        "from archive",
      );
    });

    test("fails on a wrong passphrase without extracting anything", async () => {
      const archivePath = await backUp({ "docs/file.txt": "hello" }, "docs");
      const context = createTestContext(restoreDir);

      const failure = await runRestore(archivePath, "wrong", { context, tools }).catch(
        (error: unknown) => error,
      );

      expect(failure).toBeInstanceOf(DecryptionError);
      expect(failure).toHaveProperty("reason", "wrong_passphrase");
      expect(await listDir(restoreDir)).toEqual([]);
      expect(context.output.lines).toEqual([]);
    });

    test("fails on a file that is not an encrypted archive", async () => {
      await writeFiles(tempDir, { "junk.tar.gz.age": "this is not an archive\n" });
      const context = createTestContext(restoreDir);

      await expect(
        runRestore(path.join(tempDir, "junk.tar.gz.age"), "test-secret", { context, tools }),
      ).rejects.toThrow("decryption failed: archive is corrupt or not an age file");
    });

    test("fails on a missing archive", async () => {
      const context = createTestContext(restoreDir);

      await expect(runRestore("absent.tar.gz.age", "test-secret", { context, tools })).rejects.toThrow(
        NotFoundError,
      );
    });
  });
});
