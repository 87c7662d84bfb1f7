import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { logMessage } from "./logger/logger";
import { GenerationIncompleteError } from "./errors";
import {
  awaitCompletion,
  type LongRunningOperation,
} from "./operations/awaitCompletion";
import { parseGcsUri, type ObjectStore } from "./storage/objectStore";
import type { PollingPolicy } from "./types";

/**
 * A media file that the analysis service has accepted.
 */
export interface UploadedMedia {
  name: string;
  uri: string;
  mimeType: string;
}

export interface MediaAnalysisRequest {
  model: string;
  prompt: string;
  media: UploadedMedia;
  timeoutMs: number;
}

/**
 * Remote side of the analyzer. Uploading is a long-running operation that is
 * polled until the service has finished processing the file.
 */
export interface MediaAnalysisBackend
  extends LongRunningOperation<string, UploadedMedia, UploadedMedia> {
  generateJson(request: MediaAnalysisRequest): Promise<string>;
  release(media: UploadedMedia): Promise<void>;
}

export interface SceneAnalyzerOptions {
  model: string;
  polling: PollingPolicy;
  requestTimeoutMs: number;
  signal?: AbortSignal;
  /** Parent directory for the temporary local copy. Defaults to the OS temp dir. */
  tempRoot?: string;
}

export const SCENE_BREAKDOWN_PROMPT = `
Analyze the provided storyboard video. Deconstruct it into a detailed, scene-by-scene breakdown.
For each scene, provide the following in a JSON object:
- scene_number: A sequential integer.
- timestamp_start: The start time of the scene in HH:MM:SS.
- timestamp_end: The end time of the scene in HH:MM:SS.
- setting_description: Description of the environment and location.
- character_actions: Description of character actions, expressions, and movements.
- dialogue: Transcription of any dialogue.
- camera_shot: Description of camera angle, shot type, and movement.
Ensure the output is a single, valid JSON array of scenes.
`;

const STEP = "analyzeScenes";

/**
 * Turns a storyboard video into a JSON scene breakdown stored next to it.
 */
export class SceneAnalyzer {
  constructor(
    private store: ObjectStore,
    private backend: MediaAnalysisBackend,
    private options: SceneAnalyzerOptions
  ) {}

  /**
   * Analyzes `videoReference` (a `gs://` URI or bucket key) and writes the raw
   * breakdown to `outputKey`.
   *
   * @returns The breakdown text exactly as the model returned it.
   */
  async analyze(videoReference: string, outputKey: string): Promise<string> {
    const sourceKey = parseGcsUri(videoReference, this.store.bucketName);
    const tempDir = await mkdtemp(join(this.options.tempRoot ?? tmpdir(), "scene-analysis-"));
    const localCopy = join(tempDir, "source.mp4");

    try {
      logMessage({
        step: STEP,
        level: "info",
        message: `Downloading ${videoReference} to temporary file: ${localCopy}...`,
      });
      await this.store.downloadToFile(sourceKey, localCopy);

      logMessage({
        step: STEP,
        level: "info",
        message: "Uploading video for processing. Waiting for processing to complete...",
      });
      const media = await awaitCompletion(this.backend, localCopy, this.options.polling, {
        signal: this.options.signal,
        onPending: (attempt) =>
          logMessage({
            step: STEP,
            level: "debug",
            message: `Still processing (check ${attempt})`,
          }),
      });
      if (!media) {
        throw new GenerationIncompleteError(
          "Video processing finished without returning the uploaded file."
        );
      }
      logMessage({ step: STEP, level: "info", message: "Video processed successfully!" });

      try {
        const breakdown = await this.backend.generateJson({
          model: this.options.model,
          prompt: SCENE_BREAKDOWN_PROMPT,
          media,
          timeoutMs: this.options.requestTimeoutMs,
        });
        await this.store.writeText(outputKey, breakdown, "application/json");
        return breakdown;
      } finally {
        await this.backend.release(media);
        logMessage({
          step: STEP,
          level: "info",
          message: `Cleaned up processed file ${media.name} from the analysis service.`,
        });
      }
    } finally {
      await rm(tempDir, { recursive: true, force: true });
      logMessage({
        step: STEP,
        level: "debug",
        message: `Deleted temporary local file: ${localCopy}`,
      });
    }
  }
}
