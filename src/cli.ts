#!/usr/bin/env node
import { CliCommand, parseScanArgs, USAGE } from './cli/args';
import { ConfigError } from './fetch/errors';
import { runScan } from './scan';
import { createLogger, errorMessage } from './logger';

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let command: CliCommand;
  try {
    command = parseScanArgs(argv);
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const message of error.errors) {
        console.error(`Error: ${message}`);
      }
      console.error('Run with --help for usage.');
      return 2;
    }
    throw error;
  }

  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  const logger = createLogger({ verbose: command.config.verbose });
  try {
    const outcome = await runScan(command.config, { logger });
    return outcome.exitCode;
  } catch (error) {
    logger.error(`Scan failed: ${errorMessage(error)}`);
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    return 1;
  }
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error(error);
      process.exitCode = 1;
    });
}
