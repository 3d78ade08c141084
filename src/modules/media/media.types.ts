/**
 * What the pipeline needs to know about the source video
 */
export interface SourceInfo {
  frameRate: number;
  frameRateDetected: boolean; // false when the default frame rate was used
  hasAudio: boolean;
}

export interface MediaProbe {
  probe(videoPath: string): Promise<SourceInfo>;
}
