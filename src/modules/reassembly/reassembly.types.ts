export interface ReassemblyOptions {
  framesDir: string; // Upscaled frames, frame%08d.jpg
  sourceVideo: string; // Audio is copied from here
  outputPath: string;
  frameRate: number;
  hasAudio: boolean;
}

export interface ReassemblyResult {
  outputPath: string;
  encodingTimeMs: number;
}

export interface FrameReassembler {
  reassemble(options: ReassemblyOptions): Promise<ReassemblyResult>;
}
