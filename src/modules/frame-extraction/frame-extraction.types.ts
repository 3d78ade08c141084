/**
 * Frame Extraction Types
 */

/**
 * Frame extraction options
 */
export interface FrameExtractionOptions {
  videoPath: string; // Path to video file
  outputDir: string; // Directory that receives the frames (must exist)
  frameRate: number; // Detected or default frame rate, reported back with the result
}

/**
 * Frame extraction result
 */
export interface FrameExtractionResult {
  directory: string;
  totalFrames: number; // Number of frame files written, fixed from here on
  frameRate: number;
  extractionTimeMs: number;
}

export interface FrameExtractor {
  extractFrames(options: FrameExtractionOptions): Promise<FrameExtractionResult>;
}
