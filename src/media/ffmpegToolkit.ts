import ffmpeg from "fluent-ffmpeg";
import { AUDIO_SAMPLE_RATE, buildComposeGraph, type ClipInfo } from "./composeGraph";
import { logger } from "../logger/logger";
import { StorageError } from "../errors";

/**
 * A probed clip taken into a stitch. `close` releases whatever the toolkit
 * holds for it; ffmpeg reads clips by path and holds nothing.
 */
export interface OpenedClip extends ClipInfo {
  path: string;
  close(): Promise<void>;
}

export interface Encoding {
  videoCodec: string;
  audioCodec: string;
}

/**
 * The local media operations the pipeline delegates to an encoder.
 */
export interface MediaToolkit {
  probe(path: string): Promise<ClipInfo>;
  open(path: string): Promise<OpenedClip>;
  grabFrame(videoPath: string, atSeconds: number, outputPath: string): Promise<void>;
  concatenate(
    clips: readonly OpenedClip[],
    outputPath: string,
    encoding: Encoding,
    signal?: AbortSignal
  ): Promise<void>;
}

/**
 * fluent-ffmpeg implementation. Binaries come from PATH, or from FFMPEG_PATH
 * and FFPROBE_PATH when set.
 */
export class FfmpegToolkit implements MediaToolkit {
  probe(path: string): Promise<ClipInfo> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(path, (err, data) => {
        if (err) {
          reject(new StorageError(`Cannot probe ${path}: ${err.message}`, { cause: err }));
          return;
        }
        const video = data.streams.find((stream) => stream.codec_type === "video");
        if (!video) {
          reject(new StorageError(`${path} has no video stream.`));
          return;
        }
        resolve({
          durationSeconds: Number(data.format.duration ?? video.duration ?? 0),
          width: video.width ?? 0,
          height: video.height ?? 0,
          hasAudio: data.streams.some((stream) => stream.codec_type === "audio"),
        });
      });
    });
  }

  async open(path: string): Promise<OpenedClip> {
    const info = await this.probe(path);
    return {
      ...info,
      path,
      close: () => Promise.resolve(),
    };
  }

  grabFrame(videoPath: string, atSeconds: number, outputPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      ffmpeg(videoPath)
        .seekInput(atSeconds)
        .frames(1)
        .output(outputPath)
        .on("end", () => resolve())
        .on("error", (err: Error) => reject(err))
        .run();
    });
  }

  concatenate(
    clips: readonly OpenedClip[],
    outputPath: string,
    encoding: Encoding,
    signal?: AbortSignal
  ): Promise<void> {
    const graph = buildComposeGraph(clips);
    const command = ffmpeg();

    for (const clip of clips) {
      command.input(clip.path);
    }
    for (const silence of graph.silentSources) {
      command
        .input(`anullsrc=channel_layout=stereo:sample_rate=${AUDIO_SAMPLE_RATE}`)
        .inputFormat("lavfi")
        .inputOptions(["-t", silence.durationSeconds.toFixed(3)]);
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => command.kill("SIGKILL");
      signal?.addEventListener("abort", onAbort, { once: true });

      command
        .complexFilter(graph.filters, [graph.videoOutput, graph.audioOutput])
        .videoCodec(encoding.videoCodec)
        .audioCodec(encoding.audioCodec)
        .outputOptions(["-pix_fmt", "yuv420p", "-movflags", "+faststart"])
        .output(outputPath)
        .on("start", (commandLine: string) => logger.debug(`ffmpeg: ${commandLine}`))
        .on("end", () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        })
        .on("error", (err: Error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(err);
        })
        .run();
    });
  }
}
