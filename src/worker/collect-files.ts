import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";

import { isAudioFile } from "@/adapters/voice-api";
import { type Logger, silentLogger, toError } from "@/lib/logger";

/**
 * Expands file and directory arguments into audio file paths.
 *
 * Directories contribute their audio files (not recursively), sorted by name;
 * files named explicitly are kept whatever their extension. An argument that
 * cannot be read is logged and skipped.
 */
export const collectAudioFiles = async (
  inputs: readonly string[],
  logger: Logger = silentLogger,
): Promise<string[]> => {
  const files: string[] = [];

  for (const input of inputs) {
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(input)).isDirectory();
    } catch (error) {
      logger.warn("Skipping invalid file", { path: input, error: toError(error).message });
      continue;
    }

    if (!isDirectory) {
      files.push(input);
      continue;
    }

    const entries = await readdir(input, { withFileTypes: true });
    files.push(
      ...entries
        .filter((entry) => entry.isFile() && isAudioFile(entry.name))
        .map((entry) => entry.name)
        .sort()
        .map((name) => join(input, name)),
    );
  }

  return files;
};
