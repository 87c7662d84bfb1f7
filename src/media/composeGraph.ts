/**
 * Stream facts the stitcher needs about a clip.
 */
export interface ClipInfo {
  durationSeconds: number;
  width: number;
  height: number;
  hasAudio: boolean;
}

export interface SilentSource {
  durationSeconds: number;
}

export interface ComposeGraph {
  width: number;
  height: number;
  filters: string[];
  /** Extra lavfi inputs, appended after the clips in this order. */
  silentSources: SilentSource[];
  videoOutput: string;
  audioOutput: string;
}

export const AUDIO_SAMPLE_RATE = 44100;

function even(value: number): number {
  return Math.ceil(value / 2) * 2;
}

/**
 * Builds a concat filter graph that letterboxes every clip onto the largest
 * canvas in the set, so clips with different sizes or aspect ratios can be
 * joined. Input `i` is clip `i`; clips without an audio stream read from a
 * silent source instead.
 */
export function buildComposeGraph(clips: readonly ClipInfo[]): ComposeGraph {
  const width = even(Math.max(...clips.map((clip) => clip.width)));
  const height = even(Math.max(...clips.map((clip) => clip.height)));

  const filters: string[] = [];
  const silentSources: SilentSource[] = [];
  const pairs: string[] = [];

  clips.forEach((clip, i) => {
    filters.push(
      `[${i}:v]scale=${width}:${height}:force_original_aspect_ratio=decrease,` +
        `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2,setsar=1[v${i}]`
    );

    let audioInput = `${i}:a`;
    if (!clip.hasAudio) {
      audioInput = `${clips.length + silentSources.length}:a`;
      silentSources.push({ durationSeconds: clip.durationSeconds });
    }
    filters.push(
      `[${audioInput}]aformat=sample_rates=${AUDIO_SAMPLE_RATE}:channel_layouts=stereo[a${i}]`
    );
    pairs.push(`[v${i}][a${i}]`);
  });

  filters.push(`${pairs.join("")}concat=n=${clips.length}:v=1:a=1[outv][outa]`);

  return {
    width,
    height,
    filters,
    silentSources,
    videoOutput: "outv",
    audioOutput: "outa",
  };
}
