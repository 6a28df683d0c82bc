import * as fs from 'fs';
import * as path from 'path';
import { Logger } from '../logger';

const logger = new Logger('BackupOutput');

export const OUTPUT_SUBDIRECTORIES = ['json', 'csv', 'excel'] as const;
export type OutputSubdirectory = (typeof OUTPUT_SUBDIRECTORIES)[number];

export interface CreatedFile {
  subdirectory: OutputSubdirectory;
  name: string;
  size: number;
}

/**
 * `github_backup_<org>[_test]` under `root`, with json/, csv/ and excel/.
 * A directory left by an earlier run is removed first.
 */
export async function createOutputDirectory(orgName: string, limitUsers: number | undefined, root: string): Promise<string> {
  const outputDir = path.resolve(root, `github_backup_${orgName}${limitUsers ? '_test' : ''}`);

  await fs.promises.rm(outputDir, { recursive: true, force: true });
  for (const subdirectory of OUTPUT_SUBDIRECTORIES) {
    await fs.promises.mkdir(path.join(outputDir, subdirectory), { recursive: true });
  }

  logger.info(`Created output directory: ${outputDir}`);
  return outputDir;
}

/**
 * `<org>_teams_backup_<YYYYMMDD_HHMMSS>[_test]`, local time
 */
export function backupBaseFilename(orgName: string, limitUsers: number | undefined, now: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${orgName}_teams_backup_${date}_${time}${limitUsers ? '_test' : ''}`;
}

/**
 * Write to `<file>.tmp`, then rename over the target.
 */
export async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  const tmpPath = filePath + '.tmp';
  await fs.promises.writeFile(tmpPath, data);
  await fs.promises.rename(tmpPath, filePath);
}

/**
 * Files in each output subdirectory, sorted by name
 */
export async function listCreatedFiles(outputDir: string): Promise<CreatedFile[]> {
  const files: CreatedFile[] = [];
  for (const subdirectory of OUTPUT_SUBDIRECTORIES) {
    const dir = path.join(outputDir, subdirectory);
    if (!fs.existsSync(dir)) {
      continue;
    }
    const names = (await fs.promises.readdir(dir)).sort();
    for (const name of names) {
      const stat = await fs.promises.stat(path.join(dir, name));
      if (stat.isFile()) {
        files.push({ subdirectory, name, size: stat.size });
      }
    }
  }
  return files;
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024 * 1024) {
    return `${bytes.toLocaleString('en-US')} bytes`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
