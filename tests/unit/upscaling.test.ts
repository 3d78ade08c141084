import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import { join } from 'path';
import { buildEngineArgs, requiresDenoise } from '@/modules/upscaling/upscaling.args';
import { UpscaleLauncherService } from '@/modules/upscaling/upscaling.launcher.service';
import type { UpscaleJob } from '@/modules/upscaling/upscaling.types';
import { createTempDir, removeTempDir } from '../helpers/test-utils';

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));

vi.mock('child_process', async (importOriginal) => ({
  ...(await importOriginal<typeof import('child_process')>()),
  spawn: spawnMock,
}));

class FakeChild extends EventEmitter {
  readonly pid = 4242;
  readonly kill = vi.fn((_signal?: NodeJS.Signals) => true);
}

function job(overrides: Partial<UpscaleJob> = {}): UpscaleJob {
  return {
    engine: 'realsr',
    model: 'models-Real-ESRGAN',
    scale: 4,
    denoise: null,
    inputDir: 'tmp_frames',
    outputDir: 'out_frames',
    logFile: 'upscaling.log',
    tuning: { gpuId: null, threads: null, tta: false },
    ...overrides,
  };
}

describe('upscaling', () => {
  describe('buildEngineArgs', () => {
    it('should build the realsr command line', () => {
      expect(buildEngineArgs(job(), 'models')).toEqual([
        '-i', 'tmp_frames',
        '-o', 'out_frames',
        '-m', join('models', 'models-Real-ESRGAN'),
        '-s', '4',
        '-f', 'jpg',
      ]);
    });

    it('should ignore denoise for realsr', () => {
      expect(buildEngineArgs(job({ denoise: 2 }), 'models')).not.toContain('-n');
    });

    it('should pass the denoise level to realcugan', () => {
      const args = buildEngineArgs(job({ engine: 'realcugan', model: 'models-se', scale: 2, denoise: -1 }), 'models');

      expect(args).toEqual([
        '-i', 'tmp_frames',
        '-o', 'out_frames',
        '-m', join('models', 'models-se'),
        '-s', '2',
        '-n', '-1',
        '-f', 'jpg',
      ]);
    });

    it('should refuse realcugan without a denoise level', () => {
      expect(() => buildEngineArgs(job({ engine: 'realcugan', model: 'models-se' }), 'models')).toThrow(
        'realcugan requires -n <denoise>',
      );
    });

    it('should append tuning flags before the output format', () => {
      const args = buildEngineArgs(job({ tuning: { gpuId: '0,1', threads: '1:2:2', tta: true } }), 'models');

      expect(args.slice(8)).toEqual(['-g', '0,1', '-j', '1:2:2', '-x', '-f', 'jpg']);
    });

    it('should know which engines need denoise', () => {
      expect(requiresDenoise('realcugan')).toBe(true);
      expect(requiresDenoise('realsr')).toBe(false);
    });
  });

  describe('UpscaleLauncherService', () => {
    let workDir: string;
    let child: FakeChild;
    const launcher = new UpscaleLauncherService({
      binaries: { realsr: '/opt/realsr-ncnn', realcugan: '/opt/realcugan-ncnn' },
      modelsDir: '/opt/models',
    });

    beforeEach(async () => {
      workDir = await createTempDir();
      child = new FakeChild();
      spawnMock.mockReset();
      spawnMock.mockReturnValue(child);
    });

    afterEach(async () => {
      await removeTempDir(workDir);
    });

    it('should start the engine binary with its output sent to the log', () => {
      const logFile = join(workDir, 'upscaling.log');

      const handle = launcher.launch(job({ engine: 'realcugan', model: 'models-pro', scale: 3, denoise: 0, logFile }));

      expect(handle.pid).toBe(4242);
      expect(handle.command).toBe('/opt/realcugan-ncnn');
      expect(handle.isAlive()).toBe(true);
      expect(spawnMock).toHaveBeenCalledTimes(1);

      const [command, args, options] = spawnMock.mock.calls[0] ?? [];
      expect(command).toBe('/opt/realcugan-ncnn');
      expect(args).toEqual(handle.args);
      expect(args).toContain(join('/opt/models', 'models-pro'));
      expect(options).toEqual({ stdio: ['ignore', expect.any(Number), expect.any(Number)] });
    });

    it('should resolve with the exit code and stop reporting alive', async () => {
      const handle = launcher.launch(job({ logFile: join(workDir, 'upscaling.log') }));

      child.emit('exit', 0, null);

      await expect(handle.exited).resolves.toEqual({ code: 0, signal: null });
      expect(handle.isAlive()).toBe(false);
    });

    it('should resolve with the error when the binary cannot be started', async () => {
      const handle = launcher.launch(job({ logFile: join(workDir, 'upscaling.log') }));
      const error = new Error('spawn /opt/realsr-ncnn ENOENT');

      child.emit('error', error);

      await expect(handle.exited).resolves.toEqual({ code: null, signal: null, error });
      expect(handle.isAlive()).toBe(false);
    });

    it('should terminate a running engine on stop and ignore later calls', () => {
      const handle = launcher.launch(job({ logFile: join(workDir, 'upscaling.log') }));

      handle.stop();
      expect(child.kill).toHaveBeenCalledWith('SIGTERM');

      child.emit('exit', null, 'SIGTERM');
      handle.stop();
      expect(child.kill).toHaveBeenCalledTimes(1);
    });

    it('should not spawn anything for an invalid job', () => {
      expect(() =>
        launcher.launch(job({ engine: 'realcugan', model: 'models-se', logFile: join(workDir, 'upscaling.log') })),
      ).toThrow('realcugan requires -n <denoise>');
      expect(spawnMock).not.toHaveBeenCalled();
    });
  });
});
