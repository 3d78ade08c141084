import { vi } from 'vitest';

/**
 * In-process stand-in for fluent-ffmpeg. Records every command built through it
 * and lets a test decide what "running" one does.
 *
 *   vi.mock('fluent-ffmpeg', async () => (await import('../helpers/fake-ffmpeg')).fluentFfmpegModule);
 */

export interface RecordedCommand {
  inputs: string[];
  inputOptions: string[][]; // One list per input, in input order
  outputOptions: string[];
  output: string | null;
}

type RunBehavior = (command: RecordedCommand) => void | Promise<void>;
type ProbeBehavior = (path: string) => unknown;
type Listener = (...args: unknown[]) => void;

class FfmpegStub {
  commands: RecordedCommand[] = [];
  onRun: RunBehavior = () => undefined;
  onProbe: ProbeBehavior = () => ({ streams: [], format: {} });

  reset(): void {
    this.commands = [];
    this.onRun = () => undefined;
    this.onProbe = () => ({ streams: [], format: {} });
  }
}

export const ffmpegStub = new FfmpegStub();

class FakeFfmpegCommand {
  readonly record: RecordedCommand = { inputs: [], inputOptions: [], outputOptions: [], output: null };
  private readonly listeners = new Map<string, Listener>();

  constructor(input?: string) {
    if (input) this.input(input);
  }

  input(path: string): this {
    this.record.inputs.push(path);
    this.record.inputOptions.push([]);
    return this;
  }

  inputOptions(options: string[]): this {
    const current = this.record.inputOptions[this.record.inputOptions.length - 1];
    current?.push(...options);
    return this;
  }

  outputOptions(options: string[]): this {
    this.record.outputOptions.push(...options);
    return this;
  }

  output(path: string): this {
    this.record.output = path;
    return this;
  }

  on(event: string, listener: Listener): this {
    this.listeners.set(event, listener);
    return this;
  }

  run(): void {
    const behavior = ffmpegStub.onRun;
    void Promise.resolve()
      .then(() => behavior(this.record))
      .then(
        () => this.listeners.get('end')?.(),
        (error: unknown) => this.listeners.get('error')?.(error, null, null),
      );
  }
}

function fakeFfmpeg(input?: string): FakeFfmpegCommand {
  const command = new FakeFfmpegCommand(input);
  ffmpegStub.commands.push(command.record);
  return command;
}

fakeFfmpeg.setFfmpegPath = vi.fn();
fakeFfmpeg.setFfprobePath = vi.fn();
fakeFfmpeg.ffprobe = (path: string, callback: (err: unknown, data?: unknown) => void): void => {
  void Promise.resolve()
    .then(() => ffmpegStub.onProbe(path))
    .then(
      (data) => callback(null, data),
      (error: unknown) => callback(error),
    );
};

export const fluentFfmpegModule = { default: fakeFfmpeg };
