import { ChatPromptTemplate } from "@langchain/core/prompts";
import { RunnableSequence } from "@langchain/core/runnables";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { logMessage } from "./logger/logger";
import { ParseError, PipelineError } from "./errors";
import type { ObjectStore } from "./storage/objectStore";
import { extractJsonRunnable, isRecord, parseJson } from "./utils/json";
import type { CharacterSheet, PromptCandidate, SceneDescriptor } from "./types";

export interface PromptSynthesizerOptions {
  artStyle: string;
  shotDurationSeconds: number;
  promptPrefix: string;
}

const STEP = "synthesizePrompts";

/**
 * Classifies one element of the synthesized array.
 */
export function classifyPromptItem(item: unknown): PromptCandidate {
  if (isRecord(item) && "veo_prompt" in item) {
    const text = item.veo_prompt;
    if (typeof text === "string" && text.length > 0) {
      return { kind: "structured", text };
    }
    return { kind: "unrecognized", reason: "veo_prompt is empty or not a string" };
  }
  if (typeof item === "string") {
    return item.length > 0
      ? { kind: "raw", text: item }
      : { kind: "unrecognized", reason: "empty string" };
  }
  return {
    kind: "unrecognized",
    reason: isRecord(item) ? "object without veo_prompt" : `unexpected ${typeof item}`,
  };
}

/**
 * `001_chunk_prompt.txt` for the first element, and so on.
 */
export function promptFileName(position: number): string {
  return `${String(position).padStart(3, "0")}_chunk_prompt.txt`;
}

function isSceneList(value: unknown): value is SceneDescriptor[] {
  return Array.isArray(value) && value.every(isRecord);
}

function isCharacterSheet(value: unknown): value is CharacterSheet {
  return isRecord(value) && Object.values(value).every(isRecord);
}

/**
 * Combines the scene breakdown and the character sheet into one rendering
 * prompt per scene and stores each as its own numbered object.
 */
export class PromptSynthesizer {
  private chain: RunnableSequence<
    {
      characters: string;
      scenes: string;
      artStyle: string;
      duration: number;
    },
    string
  >;

  constructor(
    llm: BaseChatModel,
    private store: ObjectStore,
    private options: PromptSynthesizerOptions
  ) {
    this.chain = RunnableSequence.from([
      ChatPromptTemplate.fromTemplate(`
You are an expert AI prompt engineer. Your task is to translate a series of action descriptions into detailed video prompts for a video generation model, ensuring character consistency.
Use the provided video chunk analysis and the character descriptions.

**Character Descriptions to Embed:**
{characters}

**Original Video Chunk Analysis:**
{scenes}

**Instructions:**
For each chunk in the analysis, create a JSON object with a single key: "veo_prompt".

CRITICAL: The \`veo_prompt\` string you generate MUST begin with a 'Character Consistency' section that includes the detailed physical descriptions of every character above. This forces the video model to maintain their look across all clips.

The rest of the prompt must include:
- **Art Style:** "{artStyle}"
- **Action:** A detailed description of the characters performing the chunk's character_actions, adapted to fit their unique personalities.
- **Camera Work:** Retain the camera work (pan, close-up, static, etc.) from the original camera_shot.
- **Duration:** The prompt must specify it is for an "{duration}-second shot".

The final output must be a single, valid JSON array of these new objects, in the same order as the chunks.
`),
      llm,
      extractJsonRunnable,
    ]);
  }

  /**
   * Parses a synthesized response body into prompt candidates.
   *
   * @throws ParseError when the body is not a JSON array.
   */
  static parseCandidates(body: string): PromptCandidate[] {
    const parsed = parseJson(body, "Synthesized prompt list");
    if (!Array.isArray(parsed)) {
      throw new ParseError(
        `Synthesized prompt list must be a JSON array, got ${isRecord(parsed) ? "object" : typeof parsed}.`
      );
    }
    return parsed.map(classifyPromptItem);
  }

  /**
   * Reads both documents, asks for the prompts and uploads one file per
   * accepted prompt.
   *
   * @returns The uploaded keys in render order.
   */
  async synthesize(scenesKey: string, charactersKey: string): Promise<string[]> {
    const scenes = await this.store.readText(scenesKey);
    const characters = await this.store.readText(charactersKey);

    const sceneList = parseJson(scenes, `Scene breakdown ${scenesKey}`);
    if (!isSceneList(sceneList)) {
      throw new ParseError(`Scene breakdown ${scenesKey} is not a JSON array of scenes.`);
    }
    const sheet = parseJson(characters, `Character sheet ${charactersKey}`);
    if (!isCharacterSheet(sheet)) {
      throw new ParseError(`Character sheet ${charactersKey} is not a JSON object of characters.`);
    }
    logMessage({
      step: STEP,
      level: "info",
      message: `Synthesizing prompts for ${sceneList.length} scenes and ${Object.keys(sheet).length} characters...`,
    });

    const body = await this.chain.invoke({
      characters,
      scenes,
      artStyle: this.options.artStyle,
      duration: this.options.shotDurationSeconds,
    });

    logMessage({
      step: STEP,
      level: "info",
      message: "Generation complete. Parsing response and uploading individual prompt files...",
    });
    const candidates = PromptSynthesizer.parseCandidates(body);

    const accepted: { key: string; text: string }[] = [];
    candidates.forEach((candidate, index) => {
      if (candidate.kind === "unrecognized") {
        logMessage({
          step: STEP,
          level: "warning",
          message: `Skipping item ${index + 1} as no valid prompt text could be extracted (${candidate.reason}).`,
        });
        return;
      }
      accepted.push({
        key: `${this.options.promptPrefix}${promptFileName(index + 1)}`,
        text: candidate.text,
      });
    });

    if (accepted.length === 0) {
      throw new PipelineError(
        `None of the ${candidates.length} synthesized items contained prompt text.`
      );
    }

    for (const { key, text } of accepted) {
      await this.store.writeText(key, text);
    }

    logMessage({
      step: STEP,
      level: "info",
      message: `Uploaded ${accepted.length} prompt files.`,
    });
    return accepted.map(({ key }) => key);
  }
}
