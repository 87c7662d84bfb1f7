import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { logMessage } from "../logger/logger";
import { errorMessage } from "../errors";
import type { SceneAnalyzer } from "../sceneAnalyzer";
import type { CharacterSheetGenerator } from "../characterSheetGenerator";
import type { PromptSynthesizer } from "../promptSynthesizer";
import type { SceneRenderer } from "../sceneRenderer";
import type { FrameExtractor } from "../media/frameExtractor";
import type { ClipStitcher } from "../media/clipStitcher";
import { fetchOrderedPrompts, type ObjectStore } from "../storage/objectStore";
import type { PipelineConfig, RenderedScene } from "../types";

export type StepName =
  | "analyzeScenes"
  | "generateCharacters"
  | "synthesizePrompts"
  | "fetchPrompts"
  | "renderScenes"
  | "stitchScenes";

export interface PromptPipeline {
  config: PipelineConfig;
  analyzer: SceneAnalyzer;
  characters: CharacterSheetGenerator;
  synthesizer: PromptSynthesizer;
}

export interface RenderPipeline<THandle, TVideo> {
  config: PipelineConfig;
  store: ObjectStore;
  renderer: SceneRenderer<THandle, TVideo>;
  frames: FrameExtractor;
  stitcher: ClipStitcher;
  signal?: AbortSignal;
}

export const CONDITIONING_FRAME_NAME = "last_frame.png";

/**
 * Object keys of the documents passed between the prompt steps.
 */
export function intermediateKeys(config: PipelineConfig) {
  return {
    scenes: `${config.storage.intermediatePrefix}chunk_analysis.json`,
    characters: `${config.storage.intermediatePrefix}character_descriptions.json`,
  };
}

export function sceneFileName(index: number): string {
  return `scene_${index + 1}.mp4`;
}

/**
 * Runs one step, logging its start and outcome. Failures are logged with the
 * step name and rethrown so no later step runs.
 */
async function handleStep<T>(step: StepName, action: () => Promise<T>): Promise<T> {
  logMessage({ step, level: "info", message: "Starting step." });
  try {
    const result = await action();
    logMessage({ step, level: "info", message: "Step completed." });
    return result;
  } catch (error) {
    logMessage({
      step,
      level: "error",
      message: `Error during ${step}: ${errorMessage(error)}`,
    });
    throw error;
  }
}

/**
 * Storyboard video in, numbered prompt files out.
 *
 * @returns The uploaded prompt keys in render order.
 */
export async function runPromptGeneration(
  pipeline: PromptPipeline,
  sourceVideo: string
): Promise<string[]> {
  const keys = intermediateKeys(pipeline.config);

  await handleStep("analyzeScenes", () =>
    pipeline.analyzer.analyze(sourceVideo, keys.scenes)
  );
  await handleStep("generateCharacters", () =>
    pipeline.characters.generate(pipeline.config.characterBrief, keys.characters)
  );
  const promptKeys = await handleStep("synthesizePrompts", () =>
    pipeline.synthesizer.synthesize(keys.scenes, keys.characters)
  );

  logMessage({
    step: "synthesizePrompts",
    level: "info",
    message: `Pipeline completed. Prompts saved under gs://${pipeline.config.bucketName}/${pipeline.config.storage.promptPrefix}`,
  });
  return promptKeys;
}

/**
 * Stored prompts in, one stitched movie out.
 *
 * Scenes render strictly one after another: every scene after the first is
 * conditioned on the last frame of the scene rendered just before it.
 *
 * @returns The final movie path, or `null` when there were no prompts.
 */
export async function runVideoGeneration<THandle, TVideo>(
  pipeline: RenderPipeline<THandle, TVideo>
): Promise<string | null> {
  const { config, store, renderer, frames, stitcher, signal } = pipeline;
  await mkdir(config.workspaceDir, { recursive: true });

  const prompts = await handleStep("fetchPrompts", () =>
    fetchOrderedPrompts(store, config.storage.promptPrefix)
  );
  if (prompts.length === 0) {
    logMessage({
      step: "fetchPrompts",
      level: "warning",
      message: "No prompts found in the configured location. Exiting.",
    });
    return null;
  }

  const framePath = join(config.workspaceDir, CONDITIONING_FRAME_NAME);
  const scenes = await handleStep("renderScenes", async () => {
    const rendered: RenderedScene[] = [];
    let previous: RenderedScene | undefined;

    for (const [index, prompt] of prompts.entries()) {
      const outputPath = join(config.workspaceDir, sceneFileName(index));
      logMessage({
        step: "renderScenes",
        level: "info",
        message: `--- Processing Scene ${index + 1} (${prompt.key}) ---`,
      });

      let scene: RenderedScene;
      if (!previous) {
        scene = await renderer.renderFromText(index, prompt.text, outputPath);
      } else {
        await frames.extractLastFrame(previous.path, framePath);
        scene = await renderer.renderFromImage(index, prompt.text, framePath, outputPath);
      }
      rendered.push(scene);
      previous = scene;
    }
    return rendered;
  });

  const finalPath = join(config.workspaceDir, config.finalMovieName);
  return handleStep("stitchScenes", () =>
    stitcher.stitch(
      scenes.map((scene) => scene.path),
      finalPath,
      signal
    )
  );
}

/**
 * Stitches the clips of a local directory, ordered by the scene number in
 * each file name.
 */
export function runStitch(
  stitcher: ClipStitcher,
  directory: string,
  outputPath: string,
  signal?: AbortSignal
): Promise<string> {
  return handleStep("stitchScenes", () =>
    stitcher.stitchDirectory(directory, outputPath, signal)
  );
}
