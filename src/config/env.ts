import { configDotenv } from "dotenv";
import { readFileSync } from "node:fs";
import { ConfigurationError, errorMessage } from "../errors";
import type { PipelineConfig, PollingPolicy } from "../types";

configDotenv();

export const DEFAULT_WORKSPACE = "video_generation_workspace";

export const DEFAULT_ART_STYLE =
  "Vibrant 3D cartoon style with soft global illumination and expressive, squash-and-stretch animation";

/**
 * Brief sent to the character model when no CHARACTER_BRIEF_FILE is given.
 */
export const DEFAULT_CHARACTER_BRIEF = `Create detailed character descriptions for the two leads of a new animated short.
The output must be a JSON object with two keys: "captain_mira" and "bolt".
For each character, detail their:
- physical_appearance: Look, clothing, art style consistency.
- personality_traits: Core personality traits.
- mannerisms_and_gestures: Typical movements and expressions.
- voice_style: Tone and speaking patterns.
- Captain Mira is a wiry lighthouse keeper in her sixties with cropped silver hair, a weathered navy peacoat, brass-rimmed spectacles and rubber boots.
- Bolt is a knee-high maintenance robot with a dented copper shell, one oversized round lens for an eye and a telescoping wrench arm.`;

type EnvSource = Record<string, string | undefined>;

function readNumber(env: EnvSource, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${key} must be a non-negative number, got "${raw}".`);
  }
  return value;
}

function readBoolean(env: EnvSource, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new ConfigurationError(`${key} must be a boolean flag, got "${raw}".`);
}

function readPrefix(env: EnvSource, key: string, fallback: string): string {
  const raw = env[key]?.trim() || fallback;
  return raw.endsWith("/") ? raw : `${raw}/`;
}

function readPolling(
  env: EnvSource,
  prefix: string,
  intervalMs: number
): PollingPolicy {
  const interval = readNumber(env, `${prefix}_POLL_INTERVAL_MS`, intervalMs);
  const maxInterval = readNumber(env, `${prefix}_POLL_MAX_INTERVAL_MS`, interval * 6);
  return {
    intervalMs: interval,
    backoffFactor: Math.max(1, readNumber(env, `${prefix}_POLL_BACKOFF`, 1)),
    // never shorter than the first wait
    maxIntervalMs: Math.max(interval, maxInterval),
    timeoutMs: readNumber(env, `${prefix}_POLL_TIMEOUT_MS`, 0),
  };
}

function readCharacterBrief(env: EnvSource): string {
  const file = env.CHARACTER_BRIEF_FILE?.trim();
  if (!file) return DEFAULT_CHARACTER_BRIEF;
  try {
    return readFileSync(file, "utf-8");
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read CHARACTER_BRIEF_FILE "${file}": ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

/**
 * Builds the configuration record handed to every component.
 */
export function loadPipelineConfig(env: EnvSource = process.env): PipelineConfig {
  const projectId = (env.GOOGLE_CLOUD_PROJECT ?? "").trim();
  if (!projectId) {
    throw new ConfigurationError("GOOGLE_CLOUD_PROJECT cannot be empty.");
  }
  const bucketName = (env.GCS_BUCKET_NAME ?? "").trim();
  if (!bucketName) {
    throw new ConfigurationError("GCS_BUCKET_NAME cannot be empty.");
  }

  return {
    projectId,
    location: env.GOOGLE_CLOUD_LOCATION?.trim() || "us-central1",
    bucketName,
    geminiApiKey: env.GEMINI_API_KEY?.trim() || undefined,
    openAiApiKey: env.OPENAI_API_KEY?.trim() || undefined,
    models: {
      analysis: env.ANALYSIS_MODEL ?? "gemini-2.5-pro",
      character: env.CHARACTER_MODEL ?? "gpt-4o-mini",
      synthesis: env.SYNTHESIS_MODEL ?? "gpt-4o-mini",
      renderText: env.RENDER_TEXT_MODEL ?? "veo-3.0-fast-generate-001",
      renderImage: env.RENDER_IMAGE_MODEL ?? "veo-3.0-generate-preview",
    },
    storage: {
      intermediatePrefix: readPrefix(env, "INTERMEDIATE_PREFIX", "intermediate_assets/"),
      promptPrefix: readPrefix(env, "PROMPT_PREFIX", "final_prompts/"),
    },
    workspaceDir: env.LOCAL_WORKSPACE ?? DEFAULT_WORKSPACE,
    finalMovieName: env.FINAL_MOVIE_NAME ?? "final_movie.mp4",
    polling: {
      analysis: readPolling(env, "ANALYSIS", 10_000),
      render: readPolling(env, "RENDER", 20_000),
    },
    requestTimeoutMs: readNumber(env, "REQUEST_TIMEOUT_MS", 600_000),
    render: {
      aspectRatio: env.RENDER_ASPECT_RATIO ?? "16:9",
      numberOfVideos: 1,
      durationSeconds: readNumber(env, "RENDER_DURATION_SECONDS", 8),
      resolution: env.RENDER_RESOLUTION ?? "1080p",
      personGeneration: env.RENDER_PERSON_GENERATION ?? "allow_adult",
      enhancePrompt: readBoolean(env, "RENDER_ENHANCE_PROMPT", true),
      generateAudio: readBoolean(env, "RENDER_GENERATE_AUDIO", true),
    },
    frameOffsetSeconds: readNumber(env, "FRAME_OFFSET_SECONDS", 0.1),
    artStyle: env.ART_STYLE ?? DEFAULT_ART_STYLE,
    characterBrief: readCharacterBrief(env),
  };
}
