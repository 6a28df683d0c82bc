#!/usr/bin/env node
// Load .env before anything reads process.env
import './env-paths';
import { Logger } from './logger';
import { BackupCliOptions, createBackupProgram, runBackup } from './commands/backup-command';

const logger = new Logger('BackupCli');

async function main(): Promise<void> {
  const program = createBackupProgram();
  program.parse(process.argv);
  const options = program.opts<BackupCliOptions>();

  if (options.debug) {
    Logger.setDebug(true);
  }

  // First Ctrl+C stops after the current request; a second one kills the process
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Cancelling backup...');
    controller.abort(new Error('Backup cancelled by user'));
  });

  process.exitCode = await runBackup(options, { signal: controller.signal });
}

main().catch((error) => {
  logger.error('Unexpected error', error);
  process.exit(1);
});
