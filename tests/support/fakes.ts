import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";

import { loadPipelineConfig } from "../../src/config/env";
import { RemoteProcessingError, StorageError } from "../../src/errors";
import type { Encoding, MediaToolkit, OpenedClip } from "../../src/media/ffmpegToolkit";
import type { ClipInfo } from "../../src/media/composeGraph";
import type { OperationState } from "../../src/operations/awaitCompletion";
import type { MediaAnalysisBackend, MediaAnalysisRequest, UploadedMedia } from "../../src/sceneAnalyzer";
import type { VideoRenderBackend } from "../../src/sceneRenderer";
import type { ObjectStore } from "../../src/storage/objectStore";
import type { PipelineConfig, RenderRequest } from "../../src/types";

export function tempDir(label: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `${label}-`));
}

export function testConfig(overrides: Record<string, string> = {}): PipelineConfig {
  return loadPipelineConfig({
    GOOGLE_CLOUD_PROJECT: "test-project",
    GCS_BUCKET_NAME: "test-bucket",
    OPENAI_API_KEY: "test-secret",
    ANALYSIS_POLL_INTERVAL_MS: "0",
    RENDER_POLL_INTERVAL_MS: "0",
    ...overrides
  });
}

export class InMemoryObjectStore implements ObjectStore {
  readonly bucketName = "test-bucket";
  readonly objects = new Map<string, { data: string; contentType: string }>();
  readonly writes: string[] = [];

  async writeText(key: string, data: string, contentType = "text/plain"): Promise<void> {
    this.objects.set(key, { data, contentType });
    this.writes.push(key);
  }

  async readText(key: string): Promise<string> {
    const entry = this.objects.get(key);
    if (!entry) throw new StorageError(`missing ${key}`);
    return entry.data;
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.objects.keys()].filter((key) => key.startsWith(prefix));
  }

  async downloadToFile(key: string, destination: string): Promise<void> {
    await writeFile(destination, await this.readText(key));
  }

  keysUnder(prefix: string): string[] {
    return [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
  }
}

/**
 * Upload that stays in PROCESSING for `pendingPolls` checks, then settles.
 */
export class FakeMediaBackend implements MediaAnalysisBackend {
  readonly uploadedContents: string[] = [];
  readonly requests: MediaAnalysisRequest[] = [];
  readonly released: string[] = [];
  polls = 0;

  constructor(
    private readonly outcome: { pendingPolls?: number; fail?: boolean; breakdown?: string; generateError?: Error } = {}
  ) {}

  async submit(localPath: string): Promise<UploadedMedia> {
    this.uploadedContents.push(await readFile(localPath, "utf-8"));
    return { name: "files/test-upload", uri: "https://files.test/test-upload", mimeType: "video/mp4" };
  }

  async poll(handle: UploadedMedia): Promise<OperationState<UploadedMedia, UploadedMedia>> {
    this.polls += 1;
    if (this.polls <= (this.outcome.pendingPolls ?? 0)) return { status: "pending", handle };
    if (this.outcome.fail) {
      return { status: "failed", error: new RemoteProcessingError("Video processing failed: test failure") };
    }
    return { status: "done", result: handle };
  }

  async generateJson(request: MediaAnalysisRequest): Promise<string> {
    this.requests.push(request);
    if (this.outcome.generateError) throw this.outcome.generateError;
    return this.outcome.breakdown ?? "[]";
  }

  async release(media: UploadedMedia): Promise<void> {
    this.released.push(media.name);
  }
}

export interface RecordedRender {
  model: string;
  prompt: string;
  conditioningImagePath?: string;
  /** Contents of the conditioning image at submit time. */
  conditioningImage?: string;
}

/**
 * Render backend whose "video" is a text payload naming the prompt.
 */
export class FakeRenderBackend implements VideoRenderBackend<number, string> {
  readonly submitted: RecordedRender[] = [];
  private polls = new Map<number, number>();

  constructor(
    private readonly options: { pendingPolls?: number; emptyAt?: number; failAt?: number } = {}
  ) {}

  async submit(request: RenderRequest): Promise<number> {
    const conditioningImage = request.conditioningImagePath
      ? await readFile(request.conditioningImagePath, "utf-8")
      : undefined;
    this.submitted.push({
      model: request.model,
      prompt: request.prompt,
      conditioningImagePath: request.conditioningImagePath,
      conditioningImage
    });
    return this.submitted.length - 1;
  }

  async poll(handle: number): Promise<OperationState<number, string>> {
    const seen = (this.polls.get(handle) ?? 0) + 1;
    this.polls.set(handle, seen);
    if (seen <= (this.options.pendingPolls ?? 0)) return { status: "pending", handle };
    if (handle === this.options.failAt) {
      return { status: "failed", error: new RemoteProcessingError(`render ${handle} failed`) };
    }
    if (handle === this.options.emptyAt) return { status: "done" };
    return { status: "done", result: `video for: ${this.submitted[handle].prompt}` };
  }

  async save(video: string, outputPath: string): Promise<void> {
    await writeFile(outputPath, video);
  }
}

/**
 * ffmpeg stand-in. Frames are text files naming the clip they came from.
 */
export class FakeMediaToolkit implements MediaToolkit {
  readonly grabs: { videoPath: string; atSeconds: number; outputPath: string }[] = [];
  readonly opened: string[] = [];
  readonly closed: string[] = [];
  readonly concatenated: string[][] = [];
  durationSeconds = 8;
  writeEmptyFrames = false;
  skipFrameWrite = false;
  failConcatenate = false;
  failOpenAt?: string;
  info: Partial<ClipInfo> = {};

  async probe(path: string): Promise<ClipInfo> {
    return {
      durationSeconds: this.durationSeconds,
      width: 1920,
      height: 1080,
      hasAudio: true,
      ...this.info
    };
  }

  async open(path: string): Promise<OpenedClip> {
    if (path === this.failOpenAt) throw new StorageError(`Cannot probe ${path}`);
    const info = await this.probe(path);
    this.opened.push(path);
    return {
      ...info,
      path,
      close: async () => {
        this.closed.push(path);
      }
    };
  }

  async grabFrame(videoPath: string, atSeconds: number, outputPath: string): Promise<void> {
    this.grabs.push({ videoPath, atSeconds, outputPath });
    if (this.skipFrameWrite) return;
    await writeFile(outputPath, this.writeEmptyFrames ? "" : `frame of ${basename(videoPath)}`);
  }

  async concatenate(clips: readonly OpenedClip[], outputPath: string, _encoding: Encoding): Promise<void> {
    this.concatenated.push(clips.map((clip) => basename(clip.path)));
    await writeFile(outputPath, "partial output");
    if (this.failConcatenate) throw new Error("encoder crashed");
  }
}
