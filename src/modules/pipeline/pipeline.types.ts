import type { UpscaleEngine } from '@/config/models';
import type { MediaProbe } from '@/modules/media/media.types';
import type { FrameExtractor } from '@/modules/frame-extraction';
import type { EngineTuning, UpscaleLauncher } from '@/modules/upscaling/upscaling.types';
import type { MonitoredProcess, MonitorTarget, ProgressSnapshot } from '@/modules/progress/progress.types';
import type { FrameReassembler } from '@/modules/reassembly/reassembly.types';
import type { WorkspacePaths } from '@/modules/workspace/workspace.service';

/**
 * Everything one run needs, validated once and frozen
 */
export interface RunConfig {
  readonly inputVideo: string;
  readonly engine: UpscaleEngine;
  readonly model: string;
  readonly scale: number;
  readonly denoise: number | null;
  readonly outputName: string;
  readonly overwrite: boolean;
  readonly tuning: Readonly<EngineTuning>;
}

export interface Workspace {
  prepare(): Promise<WorkspacePaths>;
  cleanup(): Promise<void>;
}

export interface ProgressWatcher {
  watch(target: MonitoredProcess, plan: MonitorTarget): Promise<ProgressSnapshot>;
}

export interface PipelineDependencies {
  workspace: Workspace;
  probe: MediaProbe;
  extractor: FrameExtractor;
  launcher: UpscaleLauncher;
  monitor: ProgressWatcher;
  reassembler: FrameReassembler;
}

export interface PipelineResult {
  outputPath: string;
  totalFrames: number;
  upscaledFrames: number;
  frameRate: number;
  elapsedMs: number;
}
