/**
 * Upscale pipeline
 * extract -> upscale (monitored) -> reassemble, aborting on the first failure.
 * Temporary directories are removed on every exit path, including a failed
 * workspace setup.
 */
import { resolve } from 'path';
import { mediaProbeService } from '@/modules/media/media.probe.service';
import { frameExtractionService } from '@/modules/frame-extraction';
import { upscaleLauncherService } from '@/modules/upscaling/upscaling.launcher.service';
import { requiresDenoise } from '@/modules/upscaling/upscaling.args';
import { ProgressMonitorService } from '@/modules/progress/progress.monitor.service';
import { reassemblyService } from '@/modules/reassembly/reassembly.service';
import { WorkspaceService, type WorkspacePaths } from '@/modules/workspace/workspace.service';
import { ExternalToolError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import type { ProgressSnapshot } from '@/modules/progress/progress.types';
import type { PipelineDependencies, PipelineResult, RunConfig } from './pipeline.types';

const TOTAL_STEPS = 4;

function step(index: number): string {
  return `[${index}/${TOTAL_STEPS}]`;
}

export class UpscalePipeline {
  constructor(private readonly deps: PipelineDependencies) {}

  async run(config: RunConfig): Promise<PipelineResult> {
    const startTime = Date.now();
    const { workspace } = this.deps;

    try {
      const paths = await workspace.prepare();
      return await this.execute(config, paths, startTime);
    } finally {
      logger.info(`${step(4)} Cleaning up...`);
      await workspace.cleanup();
    }
  }

  private async execute(
    config: RunConfig,
    paths: WorkspacePaths,
    startTime: number,
  ): Promise<PipelineResult> {
    const { probe, extractor, launcher, monitor, reassembler } = this.deps;

    const source = await probe.probe(config.inputVideo);

    logger.info(`${step(1)} Extracting frames from video...`);
    const extraction = await extractor.extractFrames({
      videoPath: config.inputVideo,
      outputDir: paths.framesDir,
      frameRate: source.frameRate,
    });

    logger.info(`${step(2)} Upscaling ${extraction.totalFrames} frames with ${config.engine}...`);
    if (config.denoise !== null && !requiresDenoise(config.engine)) {
      logger.warn({ engine: config.engine, denoise: config.denoise }, 'Engine takes no denoise level, ignoring -n');
    }

    const upscaler = launcher.launch({
      engine: config.engine,
      model: config.model,
      scale: config.scale,
      denoise: requiresDenoise(config.engine) ? config.denoise : null,
      inputDir: paths.framesDir,
      outputDir: paths.upscaledDir,
      logFile: paths.logFile,
      tuning: config.tuning,
    });

    let progress: ProgressSnapshot;
    try {
      progress = await monitor.watch(upscaler, {
        outputDir: paths.upscaledDir,
        totalFrames: extraction.totalFrames,
      });
    } catch (error) {
      // The engine must be gone before its directories are removed
      logger.error({ error, pid: upscaler.pid }, 'Progress monitoring failed, stopping upscaler');
      upscaler.stop();
      await upscaler.exited;
      throw error;
    }

    const exit = await upscaler.exited;
    if (exit.error) {
      throw new ExternalToolError(config.engine, `could not be started: ${exit.error.message}`, {
        cause: exit.error,
      });
    }
    if (exit.code !== 0) {
      const reason = exit.code === null ? `was killed by ${exit.signal}` : `exited with code ${exit.code}`;
      throw new ExternalToolError(config.engine, `${reason}, see ${paths.logFile}`);
    }

    logger.info(`${step(3)} Rebuilding video...`);
    const outputPath = resolve(config.outputName);
    await reassembler.reassemble({
      framesDir: paths.upscaledDir,
      sourceVideo: config.inputVideo,
      outputPath,
      frameRate: extraction.frameRate,
      hasAudio: source.hasAudio,
    });

    return {
      outputPath,
      totalFrames: extraction.totalFrames,
      upscaledFrames: progress.completedFrames,
      frameRate: extraction.frameRate,
      elapsedMs: Date.now() - startTime,
    };
  }
}

export function createUpscalePipeline(overrides: Partial<PipelineDependencies> = {}): UpscalePipeline {
  return new UpscalePipeline({
    workspace: overrides.workspace ?? new WorkspaceService(),
    probe: overrides.probe ?? mediaProbeService,
    extractor: overrides.extractor ?? frameExtractionService,
    launcher: overrides.launcher ?? upscaleLauncherService,
    monitor: overrides.monitor ?? new ProgressMonitorService(),
    reassembler: overrides.reassembler ?? reassemblyService,
  });
}
