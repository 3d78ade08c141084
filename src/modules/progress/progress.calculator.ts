import { PROGRESS_ETA_PLACEHOLDER } from '@/config/constants';
import type { ProgressSnapshot } from './progress.types';

/**
 * Throughput and ETA from the number of finished frames and elapsed time.
 * Rate stays unknown while nothing is finished or no time has elapsed.
 */
export function computeProgress(
  totalFrames: number,
  completedFrames: number,
  elapsedSeconds: number,
): ProgressSnapshot {
  const remainingFrames = Math.max(totalFrames - completedFrames, 0);
  const percent = totalFrames > 0 ? Math.min(Math.floor((completedFrames * 100) / totalFrames), 100) : 0;

  const framesPerSecond = completedFrames > 0 && elapsedSeconds > 0 ? completedFrames / elapsedSeconds : null;
  const etaSeconds = framesPerSecond !== null ? remainingFrames / framesPerSecond : null;

  return {
    totalFrames,
    completedFrames,
    remainingFrames,
    elapsedSeconds,
    percent,
    framesPerSecond,
    etaSeconds,
  };
}

/**
 * Snapshot reported once the engine has exited. Uses the real final count:
 * a full count gets a zero ETA, a short one keeps the placeholder.
 */
export function finalizeProgress(
  totalFrames: number,
  completedFrames: number,
  elapsedSeconds: number,
): ProgressSnapshot {
  const snapshot = computeProgress(totalFrames, completedFrames, elapsedSeconds);

  return {
    ...snapshot,
    etaSeconds: completedFrames >= totalFrames ? 0 : null,
  };
}

/**
 * 150 => "2m 30s"; null => "--m --s"
 */
export function formatEta(etaSeconds: number | null): string {
  if (etaSeconds === null || !Number.isFinite(etaSeconds)) {
    return PROGRESS_ETA_PLACEHOLDER;
  }

  let minutes = Math.floor(etaSeconds / 60);
  let seconds = Math.round(etaSeconds - minutes * 60);

  if (seconds === 60) {
    minutes += 1;
    seconds = 0;
  }

  return `${minutes}m ${seconds}s`;
}

export function formatProgressLine(snapshot: ProgressSnapshot): string {
  const { percent, completedFrames, totalFrames, etaSeconds } = snapshot;
  return `Upscaling: ${percent}% (${completedFrames}/${totalFrames}) | ETA: ${formatEta(etaSeconds)}`;
}
