import { logMessage } from "./logger/logger";
import { GenerationIncompleteError } from "./errors";
import {
  awaitCompletion,
  type LongRunningOperation,
} from "./operations/awaitCompletion";
import type {
  PollingPolicy,
  RenderOptions,
  RenderRequest,
  RenderedScene,
} from "./types";

/**
 * Video-generation service. `TVideo` is whatever the service hands back for a
 * finished clip; `save` turns it into a local file.
 */
export interface VideoRenderBackend<THandle, TVideo>
  extends LongRunningOperation<RenderRequest, THandle, TVideo> {
  save(video: TVideo, outputPath: string): Promise<void>;
}

export interface SceneRendererOptions {
  textModel: string;
  imageModel: string;
  render: RenderOptions;
  polling: PollingPolicy;
  signal?: AbortSignal;
}

const STEP = "renderScenes";

/**
 * Renders one scene per call, either from text alone or anchored on a still
 * image.
 */
export class SceneRenderer<THandle, TVideo> {
  constructor(
    private backend: VideoRenderBackend<THandle, TVideo>,
    private options: SceneRendererOptions
  ) {}

  renderFromText(index: number, prompt: string, outputPath: string): Promise<RenderedScene> {
    return this.render(index, outputPath, {
      model: this.options.textModel,
      prompt,
      options: this.options.render,
    });
  }

  renderFromImage(
    index: number,
    prompt: string,
    imagePath: string,
    outputPath: string
  ): Promise<RenderedScene> {
    return this.render(index, outputPath, {
      model: this.options.imageModel,
      prompt,
      conditioningImagePath: imagePath,
      options: this.options.render,
    });
  }

  private async render(
    index: number,
    outputPath: string,
    request: RenderRequest
  ): Promise<RenderedScene> {
    const source = request.conditioningImagePath
      ? `image '${request.conditioningImagePath}' and prompt`
      : "prompt";
    logMessage({
      step: STEP,
      level: "info",
      message: `Generating scene ${index + 1} from ${source}: '${request.prompt.slice(0, 50)}...'`,
    });

    const video = await awaitCompletion(this.backend, request, this.options.polling, {
      signal: this.options.signal,
      onPending: () =>
        logMessage({
          step: STEP,
          level: "info",
          message: "Waiting for video generation to complete...",
        }),
    });

    if (video === undefined) {
      throw new GenerationIncompleteError(
        `Video generation for scene ${index + 1} completed without a response.`
      );
    }

    await this.backend.save(video, outputPath);
    logMessage({ step: STEP, level: "info", message: `Video saved to ${outputPath}` });

    return {
      index,
      path: outputPath,
      durationSeconds: request.options.durationSeconds,
    };
  }
}
