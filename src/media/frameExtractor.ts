import { rm, stat } from "node:fs/promises";
import { logMessage } from "../logger/logger";
import { ExtractionError, errorMessage } from "../errors";
import type { MediaToolkit } from "./ffmpegToolkit";

const STEP = "extractFrame";

async function sizeOf(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return 0;
    throw error;
  }
}

/**
 * Grabs the still used to anchor the next scene.
 */
export class FrameExtractor {
  constructor(
    private toolkit: MediaToolkit,
    private offsetSeconds: number
  ) {}

  /**
   * Writes a frame taken `offsetSeconds` before the end of `videoPath`.
   *
   * Any earlier image at `outputImagePath` is removed first, so a stale frame
   * from the previous scene can never pass the size check.
   *
   * @returns The size of the written image in bytes.
   */
  async extractLastFrame(videoPath: string, outputImagePath: string): Promise<number> {
    logMessage({ step: STEP, level: "info", message: `Extracting last frame from ${videoPath}...` });

    try {
      await rm(outputImagePath, { force: true });
      const { durationSeconds } = await this.toolkit.probe(videoPath);
      const at = Math.max(0, durationSeconds - this.offsetSeconds);
      await this.toolkit.grabFrame(videoPath, at, outputImagePath);

      const size = await sizeOf(outputImagePath);
      if (size === 0) {
        throw new ExtractionError(
          `Failed to create a valid image file at ${outputImagePath}. The file is missing or empty.`
        );
      }

      logMessage({
        step: STEP,
        level: "info",
        message: `Successfully extracted last frame to ${outputImagePath} (Size: ${size} bytes)`,
      });
      return size;
    } catch (error) {
      logMessage({
        step: STEP,
        level: "error",
        message: `An error occurred during frame extraction: ${errorMessage(error)}`,
      });
      throw error;
    }
  }
}
