export const SUPPORTED_VIDEO_FORMATS = [
  '.mkv',
  '.mp4',
  '.mov',
  '.wmv',
  '.avi',
  '.flv',
  '.webm',
  '.m4v',
  '.mpg',
  '.mpeg',
] as const;

export const ENGINES = ['realsr', 'realcugan'] as const;

export const EXTRACTED_FRAME_FORMAT = 'png';
export const UPSCALED_FRAME_FORMAT = 'jpg';

// Eight-digit zero-padded index, numbered from 1 by ffmpeg
export const FRAME_FILENAME_PATTERN = 'frame%08d';

export const MIN_SCALE = 1;
export const MAX_SCALE = 4;

export const MIN_DENOISE_LEVEL = -1;
export const MAX_DENOISE_LEVEL = 3;

export const OUTPUT_VIDEO_CODEC = 'libx264';
export const OUTPUT_PIXEL_FORMAT = 'yuv420p';

export const PROGRESS_ETA_PLACEHOLDER = '--m --s';

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;
