import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import type { GenerateVideosOperation, Video } from "@google/genai";
import { DEFAULT_WORKSPACE, loadPipelineConfig } from "./config/env";
import { logger } from "./logger/logger";
import { errorMessage } from "./errors";
import { GcsObjectStore } from "./storage/objectStore";
import { SceneAnalyzer } from "./sceneAnalyzer";
import { CharacterSheetGenerator } from "./characterSheetGenerator";
import { PromptSynthesizer } from "./promptSynthesizer";
import { SceneRenderer } from "./sceneRenderer";
import { GeminiMediaBackend } from "./google/geminiMedia";
import { VeoRenderBackend } from "./google/veoBackend";
import { createChatModel } from "./llm/chatModel";
import { FfmpegToolkit } from "./media/ffmpegToolkit";
import { FrameExtractor } from "./media/frameExtractor";
import { ClipStitcher } from "./media/clipStitcher";
import {
  runPromptGeneration,
  runStitch,
  runVideoGeneration,
  type PromptPipeline,
  type RenderPipeline,
} from "./steps/stepHandlers";
import type { PipelineConfig } from "./types";

/**
 * Wires the prompt-generation pipeline against Gemini, OpenAI and GCS.
 */
export function createPromptPipeline(
  config: PipelineConfig,
  signal: AbortSignal
): PromptPipeline {
  const store = new GcsObjectStore(config.projectId, config.bucketName);

  return {
    config,
    analyzer: new SceneAnalyzer(store, new GeminiMediaBackend(config.geminiApiKey), {
      model: config.models.analysis,
      polling: config.polling.analysis,
      requestTimeoutMs: config.requestTimeoutMs,
      signal,
    }),
    characters: new CharacterSheetGenerator(
      createChatModel({
        model: config.models.character,
        apiKey: config.openAiApiKey,
        timeoutMs: config.requestTimeoutMs,
        json: true,
      }),
      store
    ),
    synthesizer: new PromptSynthesizer(
      createChatModel({
        model: config.models.synthesis,
        apiKey: config.openAiApiKey,
        timeoutMs: config.requestTimeoutMs,
      }),
      store,
      {
        artStyle: config.artStyle,
        shotDurationSeconds: config.render.durationSeconds,
        promptPrefix: config.storage.promptPrefix,
      }
    ),
  };
}

/**
 * Wires the render pipeline against Veo on Vertex AI, GCS and ffmpeg.
 */
export function createRenderPipeline(
  config: PipelineConfig,
  signal: AbortSignal
): RenderPipeline<GenerateVideosOperation, Video> {
  const toolkit = new FfmpegToolkit();

  return {
    config,
    store: new GcsObjectStore(config.projectId, config.bucketName),
    renderer: new SceneRenderer(new VeoRenderBackend(config.projectId, config.location), {
      textModel: config.models.renderText,
      imageModel: config.models.renderImage,
      render: config.render,
      polling: config.polling.render,
      signal,
    }),
    frames: new FrameExtractor(toolkit, config.frameOffsetSeconds),
    stitcher: new ClipStitcher(toolkit),
    signal,
  };
}

/**
 * Main entry point for the storyboard scene pipeline.
 */
async function main() {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted. Cancelling the running step...");
    controller.abort();
  });

  try {
    await yargs(hideBin(process.argv))
      .scriptName("storyboard-pipeline")
      .command(
        "prompts <video>",
        "Analyze a storyboard video and store one rendering prompt per scene",
        (y) =>
          y.positional("video", {
            type: "string",
            demandOption: true,
            description: "gs:// URI or object key of the storyboard video",
          }),
        async (argv) => {
          const config = loadPipelineConfig();
          await runPromptGeneration(createPromptPipeline(config, controller.signal), argv.video);
        }
      )
      .command(
        "render",
        "Render every stored prompt as a chained scene and stitch the final movie",
        (y) => y,
        async () => {
          const config = loadPipelineConfig();
          const finalPath = await runVideoGeneration(
            createRenderPipeline(config, controller.signal)
          );
          if (finalPath) logger.info(`--- Final Movie --- ${finalPath}`);
        }
      )
      .command(
        "stitch [dir] [output]",
        "Stitch the numbered .mp4 clips of a local directory",
        (y) =>
          y
            .positional("dir", {
              type: "string",
              default: process.env.LOCAL_WORKSPACE ?? DEFAULT_WORKSPACE,
              description: "Directory holding the clips",
            })
            .positional("output", {
              type: "string",
              default: "final_animated_short.mp4",
              description: "Combined movie file",
            }),
        async (argv) => {
          const output = await runStitch(
            new ClipStitcher(new FfmpegToolkit()),
            argv.dir,
            argv.output,
            controller.signal
          );
          logger.info(`Your final movie has been saved as: ${output}`);
        }
      )
      .demandCommand(1)
      .strict()
      .fail(false)
      .help()
      .parseAsync();
  } catch (error) {
    logger.error({ err: error }, `Pipeline failed: ${errorMessage(error)}`);
    process.exit(1);
  }
}

void main();
