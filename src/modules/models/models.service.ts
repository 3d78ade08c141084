import {
  DEFAULT_MODEL_SCALES,
  MODEL_CAPABILITIES,
  type ModelCapability,
  type UpscaleEngine,
} from '@/config/models';
import { ValidationError } from '@/utils/errors';

export interface ModelSelection {
  model: string;
  scale: number;
  denoise: number | null;
}

/**
 * [2] => "2", [2, 4] => "2 or 4", [2, 3, 4] => "2, 3, or 4"
 */
export function formatChoices(values: readonly number[]): string {
  if (values.length <= 1) return values.join('');
  if (values.length === 2) return `${values[0]} or ${values[1]}`;

  const head = values.slice(0, -1).join(', ');
  return `${head}, or ${values[values.length - 1]}`;
}

export class ModelsService {
  findCapability(model: string): ModelCapability | null {
    return MODEL_CAPABILITIES.find((capability) => capability.name === model) ?? null;
  }

  supportedScales(model: string): readonly number[] {
    return this.findCapability(model)?.scales ?? DEFAULT_MODEL_SCALES;
  }

  /**
   * Rejects scale (and denoise) values the model has no weights for.
   * Unknown model names are held to the default: scale 4 only.
   */
  validateSelection({ model, scale, denoise }: ModelSelection): void {
    const scales = this.supportedScales(model);

    if (!scales.includes(scale)) {
      throw new ValidationError(`Scale for ${model} must be ${formatChoices(scales)}`);
    }

    const denoiseLevels = this.findCapability(model)?.denoiseLevels;
    if (denoiseLevels && denoise !== null && !denoiseLevels.includes(denoise)) {
      throw new ValidationError(`Denoise level for ${model} must be ${formatChoices(denoiseLevels)}`);
    }
  }

  listByEngine(engine: UpscaleEngine): ModelCapability[] {
    return MODEL_CAPABILITIES.filter((capability) => capability.engine === engine);
  }
}

export const modelsService = new ModelsService();
