import { hideBin } from 'yargs/helpers';
import { runCli } from './modules/cli/cli.runner';
import { logger } from './utils/logger';

async function main() {
  try {
    process.exitCode = await runCli(hideBin(process.argv), {
      stdout: process.stdout,
      stderr: process.stderr,
    });
  } catch (error) {
    logger.error({ error }, 'Fatal error');
    process.exit(1);
  }
}

void main();
