// Unit tests for corpus transcript preparation

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  buildCorpusTranscript,
  CORPUS_TRN_FILE_NAME,
  loadCorpusTranscript,
  prepareTokenizedTranscript,
} from "./corpus-prep.js";
import { ValidationError } from "./errors.js";

describe("corpus preparation", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), "corpus-prep-test-"));
    await writeFile(join(dataDir, "b.wav"), "", "utf-8");
    await writeFile(join(dataDir, "a.wav"), "", "utf-8");
    await writeFile(join(dataDir, "a.txt"), "dʒa tʃː\n", "utf-8");
    await writeFile(join(dataDir, "b.txt"), "hello  world\n\n", "utf-8");
    await writeFile(join(dataDir, "notes.txt"), "not a recording", "utf-8");
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  describe("buildCorpusTranscript", () => {
    it("pairs each wav with its text, sorted by name", async () => {
      expect(await buildCorpusTranscript(dataDir)).toEqual(["dʒa tʃː (a)", "hello world (b)"]);
    });

    it("joins a multi-line transcript onto one line", async () => {
      await writeFile(join(dataDir, "b.txt"), "hello\nworld\n", "utf-8");
      expect(await buildCorpusTranscript(dataDir)).toEqual(["dʒa tʃː (a)", "hello world (b)"]);
    });

    it("orders names by code unit, upper case first", async () => {
      await writeFile(join(dataDir, "C.wav"), "", "utf-8");
      await writeFile(join(dataDir, "C.txt"), "upper\n", "utf-8");
      expect(await buildCorpusTranscript(dataDir)).toEqual(["upper (C)", "dʒa tʃː (a)", "hello world (b)"]);
    });

    it("rejects a wav without a transcript", async () => {
      await writeFile(join(dataDir, "c.wav"), "", "utf-8");
      await expect(buildCorpusTranscript(dataDir)).rejects.toThrow(
        `Missing transcript '${join(dataDir, "c.txt")}' for 'c.wav'`,
      );
    });

    it("rejects a missing directory", async () => {
      await expect(buildCorpusTranscript(join(dataDir, "absent"))).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("loadCorpusTranscript", () => {
    it("caches the built transcript in the data directory", async () => {
      await loadCorpusTranscript(dataDir);
      expect(await readFile(join(dataDir, CORPUS_TRN_FILE_NAME), "utf-8")).toBe(
        "dʒa tʃː (a)\nhello world (b)\n",
      );
    });

    it("reuses an existing transcript", async () => {
      await writeFile(join(dataDir, CORPUS_TRN_FILE_NAME), "x y (z)\n", "utf-8");
      expect(await loadCorpusTranscript(dataDir)).toEqual(["x y (z)"]);
    });
  });

  describe("prepareTokenizedTranscript", () => {
    it("writes phonetic tokens by default", async () => {
      const outPath = join(dataDir, "trn_lstm");
      const count = await prepareTokenizedTranscript(dataDir, outPath);

      expect(count).toBe(2);
      expect(await readFile(outPath, "utf-8")).toBe("dʒ a _ tʃː (a)\nh e l l o _ w o r l d (b)\n");
    });

    it("writes plain tokens in plain mode", async () => {
      const outPath = join(dataDir, "trn_plain");
      await prepareTokenizedTranscript(dataDir, outPath, { mode: "plain" });
      expect(await readFile(outPath, "utf-8")).toBe("d ʒ a _ t ʃ ː (a)\nh e l l o _ w o r l d (b)\n");
    });

    it("rejects a data path that is a file", async () => {
      await expect(
        prepareTokenizedTranscript(join(dataDir, "a.txt"), join(dataDir, "out")),
      ).rejects.toThrow(`'${join(dataDir, "a.txt")}' is not a directory`);
    });
  });
});
