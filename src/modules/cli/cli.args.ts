import yargs from 'yargs';
import { UsageError } from '@/utils/errors';
import type { RawRunOptions } from './cli.schemas';

export type CliCommand =
  | { kind: 'help'; unknownOption: string | null }
  | { kind: 'run'; options: RawRunOptions };

/**
 * Parses argv (without the node and script entries). Unknown flags and stray
 * positionals turn the command into a help request, as `-h` does.
 */
export function parseCliArguments(argv: readonly string[]): CliCommand {
  const parsed = yargs([...argv])
    .parserConfiguration({
      'unknown-options-as-args': true,
      'camel-case-expansion': false,
      'dot-notation': false,
      'short-option-groups': false,
      'duplicate-arguments-array': false,
    })
    .option('input', { alias: 'i', type: 'string' })
    .option('engine', { alias: 'e', type: 'string' })
    .option('model', { alias: 'm', type: 'string' })
    .option('scale', { alias: 's', type: 'string' })
    .option('output', { alias: 'o', type: 'string' })
    .option('denoise', { alias: 'n', type: 'string' })
    .option('gpu', { alias: 'g', type: 'string' })
    .option('threads', { alias: 'j', type: 'string' })
    .option('tta', { alias: 'x', type: 'boolean', default: false })
    .option('overwrite', { alias: 'y', type: 'boolean', default: false })
    .option('help', { alias: 'h', type: 'boolean', default: false })
    .help(false)
    .version(false)
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new UsageError(message);
    })
    .parseSync();

  const [unknown] = parsed._;
  if (unknown !== undefined) {
    return { kind: 'help', unknownOption: `${unknown}` };
  }

  if (parsed.help) {
    return { kind: 'help', unknownOption: null };
  }

  return {
    kind: 'run',
    options: {
      input: parsed.input,
      engine: parsed.engine,
      model: parsed.model,
      scale: parsed.scale,
      output: parsed.output,
      denoise: parsed.denoise,
      gpu: parsed.gpu,
      threads: parsed.threads,
      tta: parsed.tta,
      overwrite: parsed.overwrite,
    },
  };
}
