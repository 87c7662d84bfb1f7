import { readdir, rm } from "node:fs/promises";
import { join, parse, resolve } from "node:path";
import { logger, logMessage } from "../logger/logger";
import { StorageError, errorMessage } from "../errors";
import type { Encoding, MediaToolkit, OpenedClip } from "./ffmpegToolkit";

export const DEFAULT_ENCODING: Encoding = { videoCodec: "libx264", audioCodec: "aac" };

const STEP = "stitchScenes";

/**
 * First run of digits in a file name, extension excluded, or -1 when there is none.
 */
export function sceneNumberOf(fileName: string): number {
  const match = parse(fileName).name.match(/(\d+)/);
  return match ? Number.parseInt(match[1], 10) : -1;
}

/**
 * Numeric order: `scene_2` before `scene_10`.
 */
export function sortClipsByNumber(fileNames: readonly string[]): string[] {
  return [...fileNames].sort((a, b) => sceneNumberOf(a) - sceneNumberOf(b));
}

/**
 * Lists the `.mp4` clips of `directory` in scene order.
 *
 * @param exclude - absolute or relative paths to leave out, such as the output file.
 */
export async function collectClips(
  directory: string,
  exclude: readonly string[] = []
): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    throw new StorageError(
      `The directory '${directory}' was not found: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  const skipped = new Set(exclude.map((path) => resolve(path)));
  const clips = entries.filter(
    (name) => name.endsWith(".mp4") && !skipped.has(resolve(directory, name))
  );
  if (clips.length === 0) {
    throw new StorageError(`No video clips (.mp4) were found in '${directory}'.`);
  }

  return sortClipsByNumber(clips).map((name) => join(directory, name));
}

/**
 * Joins rendered clips, in the order given, into one file.
 */
export class ClipStitcher {
  constructor(
    private toolkit: MediaToolkit,
    private encoding: Encoding = DEFAULT_ENCODING
  ) {}

  async stitch(
    clipPaths: readonly string[],
    outputPath: string,
    signal?: AbortSignal
  ): Promise<string> {
    if (clipPaths.length === 0) {
      throw new StorageError("There are no clips to stitch.");
    }
    logMessage({
      step: STEP,
      level: "info",
      message: `Stitching ${clipPaths.length} clips: ${clipPaths.join(", ")}`,
    });

    const opened: OpenedClip[] = [];
    try {
      for (const path of clipPaths) {
        opened.push(await this.toolkit.open(path));
      }

      logMessage({ step: STEP, level: "info", message: `Writing final movie to '${outputPath}'...` });
      try {
        await this.toolkit.concatenate(opened, outputPath, this.encoding, signal);
      } catch (error) {
        await rm(outputPath, { force: true });
        throw error;
      }
    } finally {
      const results = await Promise.allSettled(opened.map((clip) => clip.close()));
      results.forEach((result, i) => {
        if (result.status === "rejected") {
          logger.warn(`Could not release ${opened[i].path}: ${errorMessage(result.reason)}`);
        }
      });
    }

    logMessage({ step: STEP, level: "info", message: `Final video saved to ${outputPath}` });
    return outputPath;
  }

  /**
   * Stitches every clip in `directory`, sorted by scene number.
   */
  async stitchDirectory(
    directory: string,
    outputPath: string,
    signal?: AbortSignal
  ): Promise<string> {
    logMessage({
      step: STEP,
      level: "info",
      message: `Searching for video clips in: '${resolve(directory)}'`,
    });
    const clips = await collectClips(directory, [outputPath]);
    return this.stitch(clips, outputPath, signal);
  }
}
