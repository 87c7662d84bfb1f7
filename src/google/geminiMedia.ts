import {
  GoogleGenAI,
  FileState,
  createPartFromUri,
  createUserContent,
  type File as GeminiFile,
} from "@google/genai";
import {
  ConfigurationError,
  GenerationIncompleteError,
  RemoteProcessingError,
} from "../errors";
import type { OperationState } from "../operations/awaitCompletion";
import type {
  MediaAnalysisBackend,
  MediaAnalysisRequest,
  UploadedMedia,
} from "../sceneAnalyzer";

/**
 * Gemini Files API + generateContent backend for the scene analyzer.
 */
export class GeminiMediaBackend implements MediaAnalysisBackend {
  private client: GoogleGenAI;

  constructor(apiKey: string | undefined, client?: GoogleGenAI) {
    if (!client && !apiKey) {
      throw new ConfigurationError("GEMINI_API_KEY is required for video analysis.");
    }
    this.client = client ?? new GoogleGenAI({ apiKey });
  }

  async submit(localPath: string): Promise<UploadedMedia> {
    const file = await this.client.files.upload({
      file: localPath,
      config: { mimeType: "video/mp4" },
    });
    return toUploadedMedia(file);
  }

  async poll(handle: UploadedMedia): Promise<OperationState<UploadedMedia, UploadedMedia>> {
    const file = await this.client.files.get({ name: handle.name });

    if (file.state === FileState.PROCESSING) {
      return { status: "pending", handle };
    }
    if (file.state === FileState.FAILED) {
      return {
        status: "failed",
        error: new RemoteProcessingError(
          `Video processing failed: ${file.error?.message ?? "no reason given"}`
        ),
      };
    }
    return { status: "done", result: toUploadedMedia(file) };
  }

  async generateJson({
    model,
    prompt,
    media,
    timeoutMs,
  }: MediaAnalysisRequest): Promise<string> {
    const response = await this.client.models.generateContent({
      model,
      contents: createUserContent([
        prompt,
        createPartFromUri(media.uri, media.mimeType),
      ]),
      config: {
        responseMimeType: "application/json",
        httpOptions: { timeout: timeoutMs },
      },
    });

    const text = response.text;
    if (!text) {
      throw new GenerationIncompleteError(
        `${model} returned no text for ${media.name}.`
      );
    }
    return text;
  }

  async release(media: UploadedMedia): Promise<void> {
    await this.client.files.delete({ name: media.name });
  }
}

function toUploadedMedia(file: GeminiFile): UploadedMedia {
  if (!file.name || !file.uri) {
    throw new RemoteProcessingError("Uploaded file is missing its name or URI.");
  }
  return {
    name: file.name,
    uri: file.uri,
    mimeType: file.mimeType ?? "video/mp4",
  };
}
