import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { fileSink, runPipeline } from "../../src/core/pipeline";
import {
  AgeEncryptor,
  BATCHPASS_PLUGIN,
  buildDecryptArgs,
  buildEncryptArgs,
  buildPackArgs,
  buildUnpackArgs,
  classifyDecryptFailure,
  findExecutable,
  TarCompressor,
  toDecryptionError,
} from "../../src/core/tools";
import { DecryptionError, ExternalToolError } from "../../src/utils/errors";
import { makeTempDir, removeDir, writeFiles } from "../helpers/context";
import { memorySink, memorySource, writeScript } from "../helpers/streams";

const SYSTEM_PATH = process.env.PATH ?? "/usr/bin:/bin";

describe("external tools", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir("tools");
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  describe("tar arguments", () => {
    test("packs the directory relative to its parent", () => {
      expect(buildPackArgs("/home/alex", "Documents")).toEqual([
        "-czf",
        "-",
        "-C",
        "/home/alex",
        "Documents",
      ]);
    });

    test("unpacks into the destination", () => {
      expect(buildUnpackArgs("/restore")).toEqual(["-xzf", "-", "-C", "/restore"]);
    });
  });

  describe("age arguments", () => {
    test("batchpass mode reads the passphrase from the environment", () => {
      expect(buildEncryptArgs("batchpass")).toEqual(["-e", "-j", "batchpass"]);
      expect(buildDecryptArgs("batchpass")).toEqual(["-d", "-j", "batchpass"]);
    });

    test("terminal mode takes the input as a file", () => {
      expect(buildEncryptArgs("terminal", "/tmp/in")).toEqual(["-e", "-p", "/tmp/in"]);
      expect(buildDecryptArgs("terminal", "/tmp/in")).toEqual(["-d", "/tmp/in"]);
    });

    test("never puts a passphrase on the command line", () => {
      for (const args of [buildEncryptArgs("batchpass"), buildDecryptArgs("terminal", "f")]) {
        expect(args.some((arg) => arg.includes("test-secret"))).toBe(false);
      }
    });
  });

  describe("decrypt failure classification", () => {
    test("recognizes a wrong passphrase", () => {
      expect(classifyDecryptFailure("age: error: incorrect passphrase")).toBe("wrong_passphrase");
      expect(classifyDecryptFailure("age: error: no identity matched any of the recipients")).toBe(
        "wrong_passphrase",
      );
    });

    test("treats anything else as corruption", () => {
      expect(classifyDecryptFailure("age: error: failed to read header: unexpected intro")).toBe(
        "corrupt",
      );
      expect(classifyDecryptFailure("")).toBe("corrupt");
    });

    test("carries the first stderr line as detail", () => {
      const failure = new ExternalToolError("age", "age exited with code 1", {
        exitCode: 1,
        stderr: "age: error: incorrect passphrase\nage: report unexpected errors\n",
      });

      const error = toDecryptionError(failure);

      expect(error.reason).toBe("wrong_passphrase");
      expect(error.message).toBe(
        "decryption failed: incorrect passphrase (age: error: incorrect passphrase)",
      );
    });
  });

  describe("findExecutable", () => {
    test("finds an executable on PATH", async () => {
      const plugin = await writeScript(tempDir, BATCHPASS_PLUGIN, "exit 0");
      expect(await findExecutable(BATCHPASS_PLUGIN, { PATH: `/nonexistent:${tempDir}` })).toBe(plugin);
    });

    test("skips files without execute permission", async () => {
      await writeFiles(tempDir, { [BATCHPASS_PLUGIN]: "not a program" });
      await fs.chmod(path.join(tempDir, BATCHPASS_PLUGIN), 0o644);
      expect(await findExecutable(BATCHPASS_PLUGIN, { PATH: tempDir })).toBeNull();
    });

    test("returns null without PATH", async () => {
      expect(await findExecutable(BATCHPASS_PLUGIN, {})).toBeNull();
    });
  });

  describe("AgeEncryptor.detect", () => {
    test("uses batchpass mode when the plugin is installed", async () => {
      await writeScript(tempDir, BATCHPASS_PLUGIN, "exit 0");
      const encryptor = await AgeEncryptor.detect({ PATH: tempDir });

      expect(encryptor.mode).toBe("batchpass");
      expect(encryptor.promptsForPassphrase).toBe(false);
    });

    test("falls back to terminal mode", async () => {
      const encryptor = await AgeEncryptor.detect({ PATH: tempDir });

      expect(encryptor.mode).toBe("terminal");
      expect(encryptor.promptsForPassphrase).toBe(true);
    });
  });

  describe("AgeEncryptor", () => {
    test("batchpass mode passes the passphrase through the environment", async () => {
      const age = await writeScript(tempDir, "age", `printf '%s:' "$AGE_PASSPHRASE"\ncat`);
      const encryptor = new AgeEncryptor("batchpass", { command: age, env: { PATH: SYSTEM_PATH } });
      const sink = memorySink();

      await runPipeline(memorySource("payload"), [encryptor.encrypt("test-secret")], sink);

      expect(sink.text()).toBe("test-secret:payload");
    });

    test("terminal mode reads a spooled file and keeps the passphrase out of the environment", async () => {
      const age = await writeScript(
        tempDir,
        "age",
        `for last; do :; done\nprintf '[%s]' "$AGE_PASSPHRASE"\ncat "$last"`,
      );
      const encryptor = new AgeEncryptor("terminal", { command: age, env: { PATH: SYSTEM_PATH } });
      const sink = memorySink();

      await runPipeline(memorySource("payload"), [encryptor.encrypt("test-secret")], sink);

      expect(sink.text()).toBe("[]payload");
    });

    test("decrypt failures become DecryptionError", async () => {
      const age = await writeScript(tempDir, "age", "echo 'age: error: incorrect passphrase' >&2\nexit 1");
      const encryptor = new AgeEncryptor("batchpass", { command: age, env: { PATH: SYSTEM_PATH } });

      const failure = await runPipeline(
        memorySource("ciphertext"),
        [encryptor.decrypt("wrong")],
        memorySink(),
      ).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(DecryptionError);
      expect(failure).toHaveProperty("reason", "wrong_passphrase");
    });

    test("reports a missing age binary as a tool error, not a decryption error", async () => {
      const encryptor = new AgeEncryptor("batchpass", { command: path.join(tempDir, "no-age") });

      const failure = await runPipeline(
        memorySource("ciphertext"),
        [encryptor.decrypt("test-secret")],
        memorySink(),
      ).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(ExternalToolError);
      expect(failure).toHaveProperty("message", `${path.join(tempDir, "no-age")} is not installed or not on PATH`);
    });
  });

  describe("TarCompressor", () => {
    test("packs and unpacks a directory tree under its base name", async () => {
      await writeFiles(tempDir, { "src/docs/a.txt": "alpha", "src/docs/sub/b.txt": "beta" });
      await fs.mkdir(path.join(tempDir, "dest"));
      const tar = new TarCompressor();
      const archive = path.join(tempDir, "docs.tar.gz");

      await runPipeline(tar.pack(path.join(tempDir, "src"), "docs"), [], fileSink(archive));
      await runPipeline(
        memorySource(await fs.readFile(archive)),
        [],
        tar.unpack(path.join(tempDir, "dest")),
      );

      expect(await fs.readFile(path.join(tempDir, "dest/docs/a.txt"), "utf8")).toBe("alpha");
      expect(await fs.readFile(path.join(tempDir, "dest/docs/sub/b.txt"), "utf8")).toBe("beta");
    });

    test("fails when the directory is missing", async () => {
      const tar = new TarCompressor();

      await expect(
        runPipeline(tar.pack(tempDir, "missing"), [], memorySink()),
      ).rejects.toThrow(/^tar exited with code \d/);
    });
  });
});
