import { ENGINES } from '@/config/constants';
import type { ModelCapability } from '@/config/models';
import { modelsService } from '@/modules/models/models.service';
import { requiresDenoise } from '@/modules/upscaling/upscaling.args';

export const PROGRAM_NAME = 'upscale-video';

function describeModel(capability: ModelCapability, nameWidth: number): string {
  const note = capability.note ? ` ${capability.note}` : '';
  return `  ${capability.name.padEnd(nameWidth)} => scale: ${capability.scales.join(', ')}${note}`;
}

/**
 * Model listing grouped by engine, names aligned per group
 */
export function renderModelInfo(): string {
  const lines = ['Available Models and Capabilities:', ''];

  for (const engine of ENGINES) {
    const models = modelsService.listByEngine(engine);
    const nameWidth = Math.max(...models.map((model) => model.name.length));
    lines.push(`[${engine}-ncnn]${requiresDenoise(engine) ? ' (supports denoise)' : ''}`);
    lines.push(...models.map((model) => describeModel(model, nameWidth)));
    lines.push('');
  }

  return `${lines.join('\n')}\n`;
}

export function renderUsage(programName: string = PROGRAM_NAME): string {
  return `Usage: ${programName} -i <input_video> -e <engine> -m <model> -s <scale> -o <output_name> [-n <denoise>] [--help]

Required:
  -i <input_video>   Input video file
  -e <engine>        Engine: ${ENGINES.join(' or ')}
  -m <model>         Model name (relative to models/)
  -s <scale>         Scale factor (1/2/3/4 depending on model)
  -o <output_name>   Output file name (e.g., upscaled.mp4)

Optional (realcugan only):
  -n <denoise>       Denoise level (-1 to 3)

Optional (both engines):
  -g <gpu-id>        GPU device(s), e.g. 0 or 0,1 (-1 for CPU)
  -j <load:proc:save> Thread counts for loading, processing and saving
  -x                 Enable TTA mode

Other:
  -y                 Overwrite the output file if it exists
  --help             Show this help and model capabilities

`;
}

export function renderHelp(programName: string = PROGRAM_NAME): string {
  return `${renderUsage(programName)}${renderModelInfo()}`;
}
