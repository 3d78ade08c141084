import { modelsService } from '@/modules/models/models.service';
import { requiresDenoise } from '@/modules/upscaling/upscaling.args';
import type { RunConfig } from '@/modules/pipeline/pipeline.types';
import { ConflictError, NotFoundError, UsageError, ValidationError } from '@/utils/errors';
import { fileExists, isVideoFile } from '@/utils/file-utils';
import { logger } from '@/utils/logger';
import { validateSchema } from '@/utils/validation';
import { REQUIRED_FLAGS, runOptionsSchema, type RawRunOptions } from './cli.schemas';

export interface RunConfigChecks {
  exists?: (path: string) => boolean;
}

function missingFlags(raw: RawRunOptions): string[] {
  return REQUIRED_FLAGS.filter(({ key }) => !raw[key]).map(({ flag }) => flag);
}

/**
 * Turns parsed flags into a frozen RunConfig. Every check that can fail without
 * running an external tool happens here, in the order the user would fix them:
 * missing flags, malformed values, missing input, model table, engine needs.
 */
export function resolveRunConfig(raw: RawRunOptions, checks: RunConfigChecks = {}): RunConfig {
  const exists = checks.exists ?? fileExists;

  const missing = missingFlags(raw);
  if (missing.length > 0) {
    throw new UsageError(`Missing required arguments: ${missing.join(', ')}`, missing);
  }

  const options = validateSchema(runOptionsSchema, raw);

  if (!exists(options.input)) {
    throw new NotFoundError(`Video not found: ${options.input}`);
  }
  if (!isVideoFile(options.input)) {
    logger.warn({ input: options.input }, 'Input does not have a known video extension');
  }

  const denoise = options.denoise ?? null;
  modelsService.validateSelection({ model: options.model, scale: options.scale, denoise });

  if (requiresDenoise(options.engine) && denoise === null) {
    throw new ValidationError(`${options.engine} requires -n <denoise>`);
  }

  if (!options.overwrite && exists(options.output)) {
    throw new ConflictError(`Output file already exists: ${options.output} (use -y to overwrite)`);
  }

  return Object.freeze({
    inputVideo: options.input,
    engine: options.engine,
    model: options.model,
    scale: options.scale,
    denoise,
    outputName: options.output,
    overwrite: options.overwrite,
    tuning: Object.freeze({
      gpuId: options.gpu ?? null,
      threads: options.threads ?? null,
      tta: options.tta,
    }),
  });
}
