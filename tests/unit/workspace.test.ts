import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { WorkspaceService } from '@/modules/workspace/workspace.service';
import { createTempDir, removeTempDir, writeFrames } from '../helpers/test-utils';

describe('WorkspaceService', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(baseDir);
  });

  it('should resolve the default layout under the base directory', () => {
    const workspace = new WorkspaceService(baseDir);

    expect(workspace.paths).toEqual({
      framesDir: join(baseDir, 'tmp_frames'),
      upscaledDir: join(baseDir, 'out_frames'),
      logFile: join(baseDir, 'upscaling.log'),
    });
  });

  it('should accept custom names', () => {
    const workspace = new WorkspaceService(baseDir, { framesDir: 'in', upscaledDir: 'out', logFile: 'engine.log' });

    expect(workspace.paths.framesDir).toBe(join(baseDir, 'in'));
    expect(workspace.paths.upscaledDir).toBe(join(baseDir, 'out'));
    expect(workspace.paths.logFile).toBe(join(baseDir, 'engine.log'));
  });

  it('should clear leftovers from an earlier run', async () => {
    const workspace = new WorkspaceService(baseDir);
    await writeFrames(workspace.paths.framesDir, 3, 'png');
    await writeFrames(workspace.paths.upscaledDir, 2, 'jpg');
    await writeFile(workspace.paths.logFile, 'previous run');

    await workspace.prepare();

    expect(await readdir(workspace.paths.framesDir)).toEqual([]);
    expect(await readdir(workspace.paths.upscaledDir)).toEqual([]);
    expect(await readFile(workspace.paths.logFile, 'utf8')).toBe('');
  });

  it('should remove the frame directories and keep the log', async () => {
    const workspace = new WorkspaceService(baseDir);
    await workspace.prepare();
    await writeFrames(workspace.paths.upscaledDir, 2, 'jpg');

    await workspace.cleanup();

    expect((await readdir(baseDir)).sort()).toEqual(['upscaling.log']);
  });

  it('should not fail when cleaning up twice', async () => {
    const workspace = new WorkspaceService(baseDir);
    await workspace.prepare();
    await workspace.cleanup();

    await expect(workspace.cleanup()).resolves.toBeUndefined();
  });
});
