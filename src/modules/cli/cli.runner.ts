import { EXIT_CODES } from '@/config/constants';
import { createUpscalePipeline } from '@/modules/pipeline/pipeline.service';
import type { PipelineResult, RunConfig } from '@/modules/pipeline/pipeline.types';
import type { TextSink } from '@/modules/progress/progress.types';
import { AppError, UsageError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { parseCliArguments } from './cli.args';
import { renderHelp, renderUsage } from './cli.help';
import { resolveRunConfig, type RunConfigChecks } from './cli.service';

export interface CliContext {
  stdout: TextSink;
  stderr: TextSink;
  pipeline?: { run(config: RunConfig): Promise<PipelineResult> };
  checks?: RunConfigChecks;
}

/**
 * Runs one CLI invocation and resolves with the process exit code.
 */
export async function runCli(argv: readonly string[], context: CliContext): Promise<number> {
  const { stdout, stderr } = context;

  try {
    const command = parseCliArguments(argv);

    if (command.kind === 'help') {
      if (command.unknownOption !== null) {
        stdout.write(`Unknown option: ${command.unknownOption}\n`);
      }
      stdout.write(renderHelp());
      return EXIT_CODES.SUCCESS;
    }

    const config = resolveRunConfig(command.options, context.checks);
    const pipeline = context.pipeline ?? createUpscalePipeline();
    const result = await pipeline.run(config);

    logger.info(
      { outputPath: result.outputPath, frames: result.totalFrames, elapsedMs: result.elapsedMs },
      'Upscaling complete',
    );
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof UsageError) {
      stderr.write(`${error.message}\n\n${renderUsage()}`);
      return error.exitCode;
    }

    if (error instanceof AppError) {
      stderr.write(`${error.message}\n`);
      return error.exitCode;
    }

    logger.error({ error }, 'Unexpected failure');
    return EXIT_CODES.FAILURE;
  }
}
