import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { type Logger, silentLogger } from "@/lib/logger";

import { collectAudioFiles } from "./collect-files";

describe("collectAudioFiles", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "voice-guard-files-"));
    await writeFile(join(dir, "b.wav"), "");
    await writeFile(join(dir, "a.mp3"), "");
    await writeFile(join(dir, "notes.txt"), "");
    await mkdir(join(dir, "nested.wav"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("lists the audio files of a directory in name order", async () => {
    expect(await collectAudioFiles([dir])).toEqual([join(dir, "a.mp3"), join(dir, "b.wav")]);
  });

  it("keeps explicitly named files", async () => {
    const notes = join(dir, "notes.txt");

    expect(await collectAudioFiles([notes, dir])).toEqual([
      notes,
      join(dir, "a.mp3"),
      join(dir, "b.wav"),
    ]);
  });

  it("skips a path that does not exist and keeps the rest", async () => {
    const logger: Logger = { ...silentLogger, warn: vi.fn() };
    const typo = join(dir, "typo.wav");

    expect(await collectAudioFiles([typo, dir], logger)).toEqual([
      join(dir, "a.mp3"),
      join(dir, "b.wav"),
    ]);
    expect(logger.warn).toHaveBeenCalledWith("Skipping invalid file", {
      path: typo,
      error: expect.stringContaining("ENOENT"),
    });
  });

  it("returns nothing when no argument can be read", async () => {
    expect(await collectAudioFiles([join(dir, "missing")])).toEqual([]);
  });
});
