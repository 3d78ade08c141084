/**
 * Progress monitor
 * Polls the engine's output directory while the engine runs. The engine and the
 * monitor share only the file system and the exit signal.
 */
import { setTimeout as sleep } from "timers/promises";
import { env } from "@/config/env";
import { UPSCALED_FRAME_FORMAT } from "@/config/constants";
import { countFiles } from "@/utils/file-utils";
import { logger } from "@/utils/logger";
import { computeProgress, finalizeProgress } from "./progress.calculator";
import { ProgressLineRenderer } from "./progress.renderer";
import type { MonitoredProcess, MonitorTarget, ProgressOutput, ProgressSnapshot } from "./progress.types";

export interface ProgressMonitorOptions {
  intervalMs?: number;
  output?: ProgressOutput;
  countFrames?: (directory: string) => Promise<number>;
  now?: () => number;
  sleep?: (ms: number) => Promise<unknown>;
}

export class ProgressMonitorService {
  private readonly intervalMs: number;
  private readonly output: ProgressOutput;
  private readonly countFrames: (directory: string) => Promise<number>;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(options: ProgressMonitorOptions = {}) {
    this.intervalMs = options.intervalMs ?? env.PROGRESS_INTERVAL_MS;
    this.output = options.output ?? new ProgressLineRenderer(process.stdout);
    this.countFrames = options.countFrames ?? ((directory) => countFiles(directory, UPSCALED_FRAME_FORMAT));
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Returns once the process is gone, with the snapshot taken after exit.
   * The exit status is left to the caller.
   */
  async watch(target: MonitoredProcess, { outputDir, totalFrames }: MonitorTarget): Promise<ProgressSnapshot> {
    let ticks = 0;

    while (target.isAlive()) {
      const completed = await this.countFrames(outputDir);
      this.output.update(computeProgress(totalFrames, completed, this.elapsedSeconds(target)));
      ticks++;

      await this.sleep(this.intervalMs);
    }

    const completed = await this.countFrames(outputDir);
    const final = finalizeProgress(totalFrames, completed, this.elapsedSeconds(target));
    this.output.finish(final);

    if (completed < totalFrames) {
      logger.warn(
        { expected: totalFrames, actual: completed, outputDir },
        "Upscaler exited before producing every frame",
      );
    } else {
      logger.debug({ totalFrames, ticks, elapsedSeconds: final.elapsedSeconds }, "Upscaling finished");
    }

    return final;
  }

  private elapsedSeconds(target: MonitoredProcess): number {
    return Math.max(this.now() - target.startedAt, 0) / 1000;
  }
}
