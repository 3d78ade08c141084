import { z } from 'zod';
import {
  ENGINES,
  MAX_DENOISE_LEVEL,
  MAX_SCALE,
  MIN_DENOISE_LEVEL,
  MIN_SCALE,
} from '@/config/constants';
import { integerStringSchema } from '@/utils/validation';

/**
 * Options as they come out of the argument parser
 */
export interface RawRunOptions {
  input?: string;
  engine?: string;
  model?: string;
  scale?: string;
  output?: string;
  denoise?: string;
  gpu?: string;
  threads?: string;
  tta: boolean;
  overwrite: boolean;
}

/**
 * Option key -> flag shown to the user
 */
export const REQUIRED_FLAGS = [
  { key: 'input', flag: '-i' },
  { key: 'engine', flag: '-e' },
  { key: 'model', flag: '-m' },
  { key: 'scale', flag: '-s' },
  { key: 'output', flag: '-o' },
] as const satisfies ReadonlyArray<{ key: keyof RawRunOptions; flag: string }>;

export const runOptionsSchema = z.object({
  input: z.string().min(1),
  engine: z.enum(ENGINES, {
    errorMap: () => ({ message: `must be one of: ${ENGINES.join(', ')}` }),
  }),
  model: z.string().trim().min(1),
  scale: integerStringSchema.pipe(z.number().int().min(MIN_SCALE).max(MAX_SCALE)),
  output: z.string().min(1),
  denoise: integerStringSchema
    .pipe(z.number().int().min(MIN_DENOISE_LEVEL).max(MAX_DENOISE_LEVEL))
    .optional(),
  gpu: z
    .string()
    .regex(/^(auto|-?\d+(,\d+)*)$/, 'must be a GPU id, a comma separated list of ids, -1 or auto')
    .optional(),
  threads: z
    .string()
    .regex(/^\d+:\d+(,\d+)*:\d+$/, 'must look like load:proc:save, e.g. 1:2:2')
    .optional(),
  tta: z.boolean(),
  overwrite: z.boolean(),
});

export type RunOptions = z.infer<typeof runOptionsSchema>;
