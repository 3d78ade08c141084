import { join } from 'path';
import { UPSCALED_FRAME_FORMAT } from '@/config/constants';
import { DENOISE_ENGINES } from '@/config/models';
import { ValidationError } from '@/utils/errors';
import type { UpscaleJob } from './upscaling.types';

export function requiresDenoise(engine: UpscaleJob['engine']): boolean {
  return DENOISE_ENGINES.includes(engine);
}

/**
 * Builds the engine command line. Both ncnn tools share the same flags;
 * only realcugan takes `-n`.
 */
export function buildEngineArgs(job: UpscaleJob, modelsDir: string): string[] {
  const args: string[] = [
    '-i',
    job.inputDir,
    '-o',
    job.outputDir,
    '-m',
    join(modelsDir, job.model),
    '-s',
    `${job.scale}`,
  ];

  if (requiresDenoise(job.engine)) {
    if (job.denoise === null) {
      throw new ValidationError(`${job.engine} requires -n <denoise>`);
    }
    args.push('-n', `${job.denoise}`);
  }

  if (job.tuning.gpuId !== null) args.push('-g', job.tuning.gpuId);
  if (job.tuning.threads !== null) args.push('-j', job.tuning.threads);
  if (job.tuning.tta) args.push('-x');

  args.push('-f', UPSCALED_FRAME_FORMAT);

  return args;
}
