#!/usr/bin/env node
// Load .env before anything reads process.env
import './env-paths';
import { Logger } from './logger';
import { TokenCliOptions, createTokenProgram, runTokenCommand } from './commands/token-command';

const logger = new Logger('TokenCli');

async function main(): Promise<void> {
  const program = createTokenProgram();
  program.parse(process.argv);
  const options = program.opts<TokenCliOptions>();

  if (options.debug) {
    Logger.setDebug(true);
  }

  process.once('SIGINT', () => {
    logger.warn('Operation cancelled by user');
    process.exit(1);
  });

  process.exitCode = await runTokenCommand(options);
}

main().catch((error) => {
  logger.error('Unexpected error', error);
  process.exit(1);
});
