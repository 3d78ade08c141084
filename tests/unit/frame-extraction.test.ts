import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { dirname, join } from 'path';
import { FrameExtractionService } from '@/modules/frame-extraction';
import { ExternalToolError } from '@/utils/errors';
import { ffmpegStub } from '../helpers/fake-ffmpeg';
import { createTempDir, removeTempDir, writeFrames } from '../helpers/test-utils';

vi.mock('fluent-ffmpeg', async () => (await import('../helpers/fake-ffmpeg')).fluentFfmpegModule);

describe('FrameExtractionService', () => {
  let workDir: string;
  let framesDir: string;
  const service = new FrameExtractionService();

  beforeEach(async () => {
    ffmpegStub.reset();
    workDir = await createTempDir();
    framesDir = join(workDir, 'tmp_frames');
  });

  afterEach(async () => {
    await removeTempDir(workDir);
  });

  it('should extract lossless numbered frames and count them', async () => {
    ffmpegStub.onRun = async (command) => {
      if (command.output) await writeFrames(dirname(command.output), 12, 'png');
    };

    const result = await service.extractFrames({ videoPath: 'clip.mp4', outputDir: framesDir, frameRate: 25 });

    expect(result.totalFrames).toBe(12);
    expect(result.directory).toBe(framesDir);
    expect(result.frameRate).toBe(25);

    expect(ffmpegStub.commands).toHaveLength(1);
    expect(ffmpegStub.commands[0]).toEqual({
      inputs: ['clip.mp4'],
      inputOptions: [[]],
      outputOptions: ['-qscale:v', '1', '-qmin', '1', '-qmax', '1', '-vsync', '0'],
      output: join(framesDir, 'frame%08d.png'),
    });
  });

  it('should wrap an ffmpeg failure', async () => {
    ffmpegStub.onRun = () => {
      throw new Error('Invalid data found when processing input');
    };

    const attempt = service.extractFrames({ videoPath: 'broken.mp4', outputDir: framesDir, frameRate: 25 });

    await expect(attempt).rejects.toBeInstanceOf(ExternalToolError);
    await expect(attempt).rejects.toThrow('ffmpeg: frame extraction failed: Invalid data found when processing input');
  });

  it('should fail when ffmpeg succeeds without writing a frame', async () => {
    await expect(
      service.extractFrames({ videoPath: 'empty.mp4', outputDir: framesDir, frameRate: 25 }),
    ).rejects.toThrow('ffmpeg: no frames were extracted from empty.mp4');
  });
});
