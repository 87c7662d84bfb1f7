import { readFile, writeFile } from "node:fs/promises";
import {
  GoogleGenAI,
  type GenerateVideosOperation,
  type GenerateVideosParameters,
  type Video,
} from "@google/genai";
import { GenerationIncompleteError, RemoteProcessingError } from "../errors";
import type { OperationState } from "../operations/awaitCompletion";
import type { VideoRenderBackend } from "../sceneRenderer";
import type { RenderRequest } from "../types";

/**
 * Veo on Vertex AI.
 */
export class VeoRenderBackend
  implements VideoRenderBackend<GenerateVideosOperation, Video>
{
  private client: GoogleGenAI;

  constructor(projectId: string, location: string, client?: GoogleGenAI) {
    this.client =
      client ?? new GoogleGenAI({ vertexai: true, project: projectId, location });
  }

  async submit(request: RenderRequest): Promise<GenerateVideosOperation> {
    const { options } = request;
    const params: GenerateVideosParameters = {
      model: request.model,
      prompt: request.prompt,
      config: {
        aspectRatio: options.aspectRatio,
        numberOfVideos: options.numberOfVideos,
        durationSeconds: options.durationSeconds,
        resolution: options.resolution,
        personGeneration: options.personGeneration,
        enhancePrompt: options.enhancePrompt,
        generateAudio: options.generateAudio,
      },
    };

    if (request.conditioningImagePath) {
      const image = await readFile(request.conditioningImagePath);
      params.image = { imageBytes: image.toString("base64"), mimeType: "image/png" };
    }

    return this.client.models.generateVideos(params);
  }

  async poll(
    operation: GenerateVideosOperation
  ): Promise<OperationState<GenerateVideosOperation, Video>> {
    const latest = await this.client.operations.getVideosOperation({ operation });

    if (!latest.done) {
      return { status: "pending", handle: latest };
    }
    if (latest.error) {
      return {
        status: "failed",
        error: new RemoteProcessingError(
          `Video generation failed: ${JSON.stringify(latest.error)}`
        ),
      };
    }

    const filtered = latest.response?.raiMediaFilteredReasons ?? [];
    if (filtered.length > 0) {
      return {
        status: "failed",
        error: new RemoteProcessingError(`Content filtered: ${filtered.join(", ")}`),
      };
    }

    return { status: "done", result: latest.response?.generatedVideos?.[0]?.video };
  }

  /**
   * Vertex returns the clip inline; a clip that only carries a URI cannot be
   * fetched through a Vertex client.
   */
  async save(video: Video, outputPath: string): Promise<void> {
    if (!video.videoBytes) {
      throw new GenerationIncompleteError(
        `Generated video has no inline bytes${video.uri ? ` (uri: ${video.uri})` : ""}.`
      );
    }
    await writeFile(outputPath, Buffer.from(video.videoBytes, "base64"));
  }
}
