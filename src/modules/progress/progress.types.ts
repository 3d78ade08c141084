export interface ProgressSnapshot {
  totalFrames: number;
  completedFrames: number;
  remainingFrames: number;
  elapsedSeconds: number;
  percent: number; // floor(completed * 100 / total), at most 100
  framesPerSecond: number | null; // null until a frame exists and time has passed
  etaSeconds: number | null; // null when no rate is known
}

export interface ProgressOutput {
  update(snapshot: ProgressSnapshot): void;
  finish(snapshot: ProgressSnapshot): void;
}

/**
 * The parts of a running process the monitor reads
 */
export interface MonitoredProcess {
  readonly startedAt: number;
  isAlive(): boolean;
}

export interface MonitorTarget {
  outputDir: string;
  totalFrames: number;
}

/**
 * Anything with a write method: process.stdout, or a buffer in tests
 */
export interface TextSink {
  write(chunk: string): unknown;
}
