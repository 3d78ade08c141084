/**
 * Frame reassembly
 * Encodes the upscaled frames back into a video and copies the source audio untouched
 */
import { join } from "path";
import { ffmpeg } from "@/config/ffmpeg";
import {
  FRAME_FILENAME_PATTERN,
  OUTPUT_PIXEL_FORMAT,
  OUTPUT_VIDEO_CODEC,
  UPSCALED_FRAME_FORMAT,
} from "@/config/constants";
import { ExternalToolError, errorMessage } from "@/utils/errors";
import { logger } from "@/utils/logger";
import type { FrameReassembler, ReassemblyOptions, ReassemblyResult } from "./reassembly.types";

export class ReassemblyService implements FrameReassembler {
  async reassemble(options: ReassemblyOptions): Promise<ReassemblyResult> {
    const startTime = Date.now();
    const { framesDir, sourceVideo, outputPath, frameRate } = options;

    logger.info({ framesDir, outputPath, frameRate }, "Rebuilding video");

    try {
      await this.runFfmpegEncode(options);
    } catch (error) {
      logger.error({ error, outputPath }, "Video reassembly failed");
      throw new ExternalToolError("ffmpeg", `video reassembly failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const encodingTimeMs = Date.now() - startTime;
    logger.info({ outputPath, sourceVideo, timeMs: encodingTimeMs }, "Video rebuilt");

    return { outputPath, encodingTimeMs };
  }

  /**
   * Output options: stream maps, codecs and the constant output frame rate.
   * fluent-ffmpeg adds `-y` to file outputs itself; refusing to overwrite is
   * decided before the run.
   */
  buildOutputOptions({ frameRate, hasAudio }: ReassemblyOptions): string[] {
    const args: string[] = ["-map", "0:v:0"];

    if (hasAudio) {
      args.push("-map", "1:a:0", "-c:a", "copy");
    }

    args.push(
      "-c:v",
      OUTPUT_VIDEO_CODEC,
      "-r",
      `${frameRate}`,
      "-pix_fmt",
      OUTPUT_PIXEL_FORMAT,
    );

    return args;
  }

  private runFfmpegEncode(options: ReassemblyOptions): Promise<void> {
    const framesPattern = join(options.framesDir, `${FRAME_FILENAME_PATTERN}.${UPSCALED_FRAME_FORMAT}`);

    return new Promise<void>((resolve, reject) => {
      ffmpeg()
        .input(framesPattern)
        .inputOptions(["-r", `${options.frameRate}`])
        .input(options.sourceVideo)
        .outputOptions(this.buildOutputOptions(options))
        .output(options.outputPath)
        .on("end", () => resolve())
        .on("error", (err: Error) => reject(err))
        .run();
    });
  }
}

export const reassemblyService = new ReassemblyService();
