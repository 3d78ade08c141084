/**
 * Upscaling model capabilities
 * Which scale factors (and, for some models, denoise levels) each model ships weights for.
 * Names are directories under MODELS_DIR, passed to the engine as `-m`.
 */

import type { ENGINES } from './constants';

export type UpscaleEngine = (typeof ENGINES)[number];

export interface ModelCapability {
  name: string;
  engine: UpscaleEngine;
  scales: readonly number[];
  denoiseLevels: readonly number[] | null; // null = any level the engine accepts
  note: string | null; // Extra text shown in the help listing
}

/**
 * Applies to every model name not listed below
 */
export const DEFAULT_MODEL_SCALES: readonly number[] = [4];

export const MODEL_CAPABILITIES: readonly ModelCapability[] = [
  // realsr-ncnn
  { name: 'models-ESRGAN-Nomos8kSC', engine: 'realsr', scales: [4], denoiseLevels: null, note: null },
  { name: 'models-Real-ESRGAN', engine: 'realsr', scales: [4], denoiseLevels: null, note: null },
  { name: 'models-Real-ESRGAN-anime', engine: 'realsr', scales: [4], denoiseLevels: null, note: null },
  { name: 'models-Real-ESRGAN-animevideov3', engine: 'realsr', scales: [2, 3, 4], denoiseLevels: null, note: null },
  { name: 'models-Real-ESRGANv2-anime', engine: 'realsr', scales: [2, 4], denoiseLevels: null, note: null },
  { name: 'models-Real-ESRGANv3-anime', engine: 'realsr', scales: [2, 3, 4], denoiseLevels: null, note: null },
  { name: 'models-Real-ESRGAN-plus', engine: 'realsr', scales: [4], denoiseLevels: null, note: null },
  { name: 'models-Real-ESRGAN-plus-anime', engine: 'realsr', scales: [4], denoiseLevels: null, note: null },
  { name: 'models-RealeSR-general-v3', engine: 'realsr', scales: [4], denoiseLevels: null, note: null },
  { name: 'models-RealeSR-general-v3-wdn', engine: 'realsr', scales: [4], denoiseLevels: null, note: null },
  { name: 'models-Real-ESRGAN-SourceBook', engine: 'realsr', scales: [2], denoiseLevels: null, note: null },

  // realcugan-ncnn
  { name: 'models-nose', engine: 'realcugan', scales: [2], denoiseLevels: [-1], note: '(no-denoise only)' },
  { name: 'models-pro', engine: 'realcugan', scales: [2, 3], denoiseLevels: null, note: 'with denoise levels 0–3' },
  { name: 'models-se', engine: 'realcugan', scales: [2, 3, 4], denoiseLevels: null, note: 'with denoise levels 0–3' },
];

/**
 * Engines that take a `-n <denoise>` argument and refuse to start without one
 */
export const DENOISE_ENGINES: readonly UpscaleEngine[] = ['realcugan'];
