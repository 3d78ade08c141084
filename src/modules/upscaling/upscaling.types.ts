import type { UpscaleEngine } from '@/config/models';

/**
 * Optional engine knobs passed through as-is
 */
export interface EngineTuning {
  gpuId: string | null; // -g, e.g. "0", "0,1", "-1" for CPU
  threads: string | null; // -j load:proc:save, e.g. "1:2:2"
  tta: boolean; // -x
}

export interface UpscaleJob {
  engine: UpscaleEngine;
  model: string;
  scale: number;
  denoise: number | null;
  inputDir: string;
  outputDir: string;
  logFile: string; // Receives the engine's stdout and stderr
  tuning: EngineTuning;
}

export interface UpscaleExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error; // Set when the process could not be spawned at all
}

/**
 * Handle on the engine running in the background
 */
export interface UpscaleProcess {
  readonly pid: number | undefined;
  readonly command: string;
  readonly args: readonly string[];
  readonly startedAt: number; // epoch ms
  readonly exited: Promise<UpscaleExit>;
  isAlive(): boolean;
  stop(): void; // SIGTERM; no-op once exited
}

export interface UpscaleLauncher {
  launch(job: UpscaleJob): UpscaleProcess;
}
