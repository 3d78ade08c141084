/**
 * Workspace
 * Temporary frame directories and the engine log for one run
 */
import { resolve } from 'path';
import { env } from '@/config/env';
import { prepareEmptyDir, removePath, truncateFile } from '@/utils/file-utils';
import { logger } from '@/utils/logger';

export interface WorkspacePaths {
  framesDir: string; // Extracted frames
  upscaledDir: string; // Engine output
  logFile: string;
}

export class WorkspaceService {
  readonly paths: WorkspacePaths;

  constructor(baseDir: string = env.WORK_DIR, paths: Partial<WorkspacePaths> = {}) {
    this.paths = {
      framesDir: resolve(baseDir, paths.framesDir ?? env.TMP_FRAMES_DIR),
      upscaledDir: resolve(baseDir, paths.upscaledDir ?? env.OUT_FRAMES_DIR),
      logFile: resolve(baseDir, paths.logFile ?? env.UPSCALE_LOG_FILE),
    };
  }

  /**
   * Empty frame directories and a truncated log. Leftovers from an earlier
   * run would be counted as progress.
   */
  async prepare(): Promise<WorkspacePaths> {
    await prepareEmptyDir(this.paths.framesDir);
    await prepareEmptyDir(this.paths.upscaledDir);
    await truncateFile(this.paths.logFile);

    logger.debug({ ...this.paths }, 'Workspace prepared');
    return this.paths;
  }

  /**
   * Removes both frame directories. Keeps the log. Never throws.
   */
  async cleanup(): Promise<void> {
    for (const directory of [this.paths.framesDir, this.paths.upscaledDir]) {
      try {
        await removePath(directory);
        logger.debug({ directory }, 'Removed temp directory');
      } catch (error) {
        logger.warn({ directory, error }, 'Failed to remove temp directory');
      }
    }
  }
}
