import type { FfprobeData, FfprobeStream } from "fluent-ffmpeg";
import { ffmpeg } from "@/config/ffmpeg";
import { env } from "@/config/env";
import { logger } from "@/utils/logger";
import type { MediaProbe, SourceInfo } from "./media.types";

/**
 * "24000/1001" => 23.98, "25/1" => 25, "0/0" => null
 */
export function parseFrameRate(value: string | undefined): number | null {
  if (!value) return null;

  const [num, den = 1] = value.split("/").map(Number);
  if (!num || !den || !Number.isFinite(num / den)) {
    return null;
  }

  return parseFloat((num / den).toFixed(2));
}

export class MediaProbeService implements MediaProbe {
  constructor(private readonly defaultFrameRate: number = env.DEFAULT_FRAME_RATE) {}

  /**
   * Reads frame rate and audio presence. Never fails: a video ffprobe cannot read
   * gets the default frame rate, and ffmpeg reports the real problem on extraction.
   */
  async probe(videoPath: string): Promise<SourceInfo> {
    const startTime = Date.now();

    let metadata: FfprobeData;
    try {
      metadata = await this.runFfprobe(videoPath);
    } catch (error) {
      logger.warn(
        { videoPath, error, durationMs: Date.now() - startTime, fallback: this.defaultFrameRate },
        "ffprobe failed, using default frame rate",
      );
      return { frameRate: this.defaultFrameRate, frameRateDetected: false, hasAudio: false };
    }

    const videoStream = metadata.streams.find((s) => s.codec_type === "video");
    const hasAudio = metadata.streams.some((s) => s.codec_type === "audio");
    const detected = this.extractFps(videoStream);

    if (detected === null) {
      logger.warn(
        { videoPath, fallback: this.defaultFrameRate },
        "No frame rate found in video metadata, using default",
      );
    }

    logger.debug(
      { videoPath, durationMs: Date.now() - startTime, fps: detected, hasAudio },
      "ffprobe completed",
    );

    return {
      frameRate: detected ?? this.defaultFrameRate,
      frameRateDetected: detected !== null,
      hasAudio,
    };
  }

  private runFfprobe(videoPath: string): Promise<FfprobeData> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(videoPath, (err: unknown, data: FfprobeData) => {
        if (err) {
          return reject(err);
        }
        resolve(data);
      });
    });
  }

  private extractFps(stream: FfprobeStream | undefined): number | null {
    if (!stream) return null;

    // r_frame_rate first (more accurate), then avg_frame_rate
    return parseFrameRate(stream.r_frame_rate) ?? parseFrameRate(stream.avg_frame_rate);
  }
}

export const mediaProbeService = new MediaProbeService();
