/**
 * One entry of the scene breakdown returned by the analysis model.
 */
export interface SceneDescriptor {
  scene_number: number;
  timestamp_start: string;
  timestamp_end: string;
  setting_description: string;
  character_actions: string;
  dialogue: string;
  camera_shot: string;
}

export interface CharacterDescription {
  physical_appearance: string;
  personality_traits: string;
  mannerisms_and_gestures: string;
  voice_style: string;
}

/**
 * Recurring characters keyed by name. Produced once per run and embedded in
 * every scene prompt.
 */
export type CharacterSheet = Record<string, CharacterDescription>;

/**
 * A synthesized prompt element after classification.
 */
export type PromptCandidate =
  | { kind: "structured"; text: string }
  | { kind: "raw"; text: string }
  | { kind: "unrecognized"; reason: string };

export interface StoredPrompt {
  key: string;
  text: string;
}

export interface RenderedScene {
  index: number;
  path: string;
  durationSeconds: number;
}

export interface RenderOptions {
  aspectRatio: string;
  numberOfVideos: number;
  durationSeconds: number;
  resolution: string;
  personGeneration: string;
  enhancePrompt: boolean;
  generateAudio: boolean;
}

export interface RenderRequest {
  model: string;
  prompt: string;
  /** Previous scene's last frame. Absent for the first scene. */
  conditioningImagePath?: string;
  options: RenderOptions;
}

export interface PollingPolicy {
  intervalMs: number;
  /** Multiplier applied to the interval after each pending poll. 1 keeps it fixed. */
  backoffFactor: number;
  maxIntervalMs: number;
  /** 0 waits forever. */
  timeoutMs: number;
}

export interface ModelSettings {
  analysis: string;
  character: string;
  synthesis: string;
  renderText: string;
  renderImage: string;
}

export interface StorageLayout {
  intermediatePrefix: string;
  promptPrefix: string;
}

export interface PipelineConfig {
  projectId: string;
  location: string;
  bucketName: string;
  geminiApiKey?: string;
  openAiApiKey?: string;
  models: ModelSettings;
  storage: StorageLayout;
  workspaceDir: string;
  finalMovieName: string;
  polling: {
    analysis: PollingPolicy;
    render: PollingPolicy;
  };
  requestTimeoutMs: number;
  render: RenderOptions;
  frameOffsetSeconds: number;
  artStyle: string;
  characterBrief: string;
}
