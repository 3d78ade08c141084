/**
 * Frame Extraction Service
 * Decodes a video into one lossless PNG per frame, numbered from 1
 */

import { join } from 'path';
import { ffmpeg } from '@/config/ffmpeg';
import { EXTRACTED_FRAME_FORMAT, FRAME_FILENAME_PATTERN } from '@/config/constants';
import { countFiles } from '@/utils/file-utils';
import { logger } from '@/utils/logger';
import { ExternalToolError, errorMessage } from '@/utils/errors';
import type {
  FrameExtractionOptions,
  FrameExtractionResult,
  FrameExtractor,
} from './frame-extraction.types';

export class FrameExtractionService implements FrameExtractor {
  private format: string;

  constructor(format: string = EXTRACTED_FRAME_FORMAT) {
    this.format = format;
  }

  outputPattern(outputDir: string): string {
    return join(outputDir, `${FRAME_FILENAME_PATTERN}.${this.format}`);
  }

  /**
   * Extract every frame of a video into outputDir
   */
  async extractFrames(options: FrameExtractionOptions): Promise<FrameExtractionResult> {
    const startTime = Date.now();
    const { videoPath, outputDir, frameRate } = options;

    logger.info({ videoPath, outputDir, frameRate }, 'Starting frame extraction');

    try {
      await this.runFfmpegExtraction(videoPath, this.outputPattern(outputDir));
    } catch (error) {
      logger.error({ error, videoPath }, 'Frame extraction failed');
      throw new ExternalToolError('ffmpeg', `frame extraction failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const totalFrames = await countFiles(outputDir, this.format);
    const extractionTimeMs = Date.now() - startTime;

    if (totalFrames === 0) {
      throw new ExternalToolError('ffmpeg', `no frames were extracted from ${videoPath}`);
    }

    logger.info({ videoPath, totalFrames, timeMs: extractionTimeMs }, 'Frame extraction completed');

    return {
      directory: outputDir,
      totalFrames,
      frameRate,
      extractionTimeMs,
    };
  }

  /**
   * Run FFmpeg at best quality, one output image per decoded frame
   */
  private runFfmpegExtraction(videoPath: string, outputPattern: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      ffmpeg(videoPath)
        .outputOptions([
          '-qscale:v',
          '1',
          '-qmin',
          '1',
          '-qmax',
          '1',
          '-vsync',
          '0', // Passthrough: no duplicated or dropped frames
        ])
        .output(outputPattern)
        .on('end', () => {
          logger.debug({ outputPattern }, 'FFmpeg frame extraction completed');
          resolve();
        })
        .on('error', (err: Error) => {
          reject(err);
        })
        .run();
    });
  }
}

export const frameExtractionService = new FrameExtractionService();
