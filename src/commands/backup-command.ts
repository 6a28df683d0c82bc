import * as path from 'path';
import { Command } from 'commander';
import { Logger } from '../logger';
import { ConfigError } from '../github/errors';
import { FetchLike, Sleep } from '../github/http-client';
import { DEFAULT_BATCH_SIZE, DEFAULT_MAX_WORKERS, GitHubEnvConfig, config, createBackupConfig } from '../config';
import { TeamsBackup, describeFatalError } from '../backup/teams-backup';
import { ConsoleFormatter } from '../formatters/console-formatter';
import {
  backupBaseFilename,
  createOutputDirectory,
  exportToCsv,
  exportToExcel,
  exportToJson,
  exportToMultipleCsvs,
  exportToStructuredJson,
  formatFileSize,
  listCreatedFiles,
} from '../export';
import { parsePositiveInt } from './options';

const logger = new Logger('BackupCommand');

export interface BackupCliOptions {
  org: string;
  token?: string;
  output?: string;
  outputDir?: string;
  csv?: boolean;
  multiCsv?: boolean;
  excel?: boolean;
  structuredJson?: boolean;
  batchSize?: number;
  maxWorkers?: number;
  limitUsers?: number;
  debug?: boolean;
}

export interface BackupCommandDeps {
  formatter?: ConsoleFormatter;
  fetch?: FetchLike;
  sleep?: Sleep;
  now?: () => Date;
  /** Root for the output directory when --output-dir is absent */
  cwd?: string;
  signal?: AbortSignal;
  env?: GitHubEnvConfig;
}

export function createBackupProgram(): Command {
  return new Command('gh-teams-backup')
    .description('GitHub Teams Backup - capture team memberships and team repository access')
    .requiredOption('--org <org>', 'Organization name to back up')
    .option('--token <token>', 'GitHub token with admin:org permissions (default: GITHUB_TOKEN)')
    .option('--output <file>', 'Base name for output files (default: <org>_teams_backup_<timestamp>)')
    .option('--output-dir <dir>', 'Directory in which github_backup_<org> is created (default: current directory)')
    .option('--csv', 'Export a single flat CSV file')
    .option('--multi-csv', 'Export multiple focused CSV files')
    .option('--excel', 'Export a formatted Excel workbook (default when no format is given)')
    .option('--structured-json', 'Export team-centric JSON')
    .option('--batch-size <n>', `Users per batch (default: ${DEFAULT_BATCH_SIZE})`, parsePositiveInt)
    .option('--max-workers <n>', `Concurrent team fetches (default: ${DEFAULT_MAX_WORKERS})`, parsePositiveInt)
    .option('--limit-users <n>', 'Only process the first n members (for testing)', parsePositiveInt)
    .option('--debug', 'Enable debug logging')
    .addHelpText(
      'after',
      `
Examples:
  $ gh-teams-backup --org myorg --excel
  $ gh-teams-backup --org myorg --limit-users 10 --excel
  $ gh-teams-backup --org myorg --multi-csv --excel --structured-json --output-dir ./backups`
    );
}

/**
 * Run a backup and write every requested export. Resolves the exit code.
 */
export async function runBackup(options: BackupCliOptions, deps: BackupCommandDeps = {}): Promise<number> {
  const out = deps.formatter || new ConsoleFormatter();
  const now = deps.now || (() => new Date());

  try {
    const backupConfig = createBackupConfig(
      {
        token: options.token,
        orgName: options.org,
        batchSize: options.batchSize,
        maxWorkers: options.maxWorkers,
        limitUsers: options.limitUsers,
      },
      deps.env || config.github
    );

    const outputDir = await createOutputDirectory(
      backupConfig.orgName,
      backupConfig.limitUsers,
      options.outputDir || deps.cwd || process.cwd()
    );

    const backup = await TeamsBackup.create(backupConfig, {
      fetch: deps.fetch,
      sleep: deps.sleep,
      now,
      signal: deps.signal,
    }).run();

    const baseName = options.output
      ? path.parse(options.output).name
      : backupBaseFilename(backupConfig.orgName, backupConfig.limitUsers, now());

    out.heading('📤 Exporting backup data...');
    const jsonDir = path.join(outputDir, 'json');
    const csvDir = path.join(outputDir, 'csv');
    const excelDir = path.join(outputDir, 'excel');

    await exportToJson(backup, path.join(jsonDir, `${baseName}.json`));
    if (options.structuredJson) {
      await exportToStructuredJson(backup, path.join(jsonDir, `${baseName}_structured.json`));
    }
    if (options.csv) {
      await exportToCsv(backup, path.join(csvDir, `${baseName}.csv`));
    }
    if (options.multiCsv) {
      await exportToMultipleCsvs(backup, path.join(csvDir, baseName));
    }

    const anyFormat = options.csv || options.multiCsv || options.excel || options.structuredJson;
    if (!anyFormat) {
      out.info('No export format specified, using --excel by default...');
    }
    if (options.excel || !anyFormat) {
      await exportToExcel(backup, path.join(excelDir, `${baseName}.xlsx`));
    }

    out.heading('📋 Backup Summary');
    out.print(`Organization: ${backupConfig.orgName}`);
    out.print(`Total Users: ${backup.users.length}`);
    out.print(`Output Directory: ${outputDir}`);
    out.print('');
    out.print('📁 Created Files:');

    let currentDir = '';
    for (const file of await listCreatedFiles(outputDir)) {
      if (file.subdirectory !== currentDir) {
        currentDir = file.subdirectory;
        out.print(`  📂 ${currentDir.toUpperCase()} Files:`);
      }
      out.print(`     📄 ${file.name} (${formatFileSize(file.size)})`);
    }

    out.print('');
    out.success(`All done! Teams backup for '${backupConfig.orgName}' completed.`);
    return 0;
  } catch (error) {
    if (deps.signal?.aborted) {
      out.error('Backup cancelled by user');
    } else if (error instanceof ConfigError) {
      out.error(error.message);
    } else {
      logger.debug('Backup failed', error);
      out.error(describeFatalError(error, options.org));
    }
    return 1;
  }
}
