/**
 * Frame Extraction Module
 * Source video -> numbered PNG frames for the upscaling engine
 */

export * from './frame-extraction.types';
export * from './frame-extraction.service';
