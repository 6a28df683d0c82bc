import fs from 'fs';
import { Logger } from './logger';
import { ConfigError } from './github/errors';
import { GITHUB_API_BASE_URL } from './github/http-client';

// Logger for preflight checks and config validation
const logger = new Logger('Config');

export const DEFAULT_BATCH_SIZE = 20;
export const DEFAULT_MAX_WORKERS = 5;

// Preflight check results
export interface PreflightResult {
  success: boolean;
  errors: string[];
  warnings: string[];
}

export interface GitHubEnvConfig {
  token: string;
  appId: string;
  privateKeyPath: string;
  privateKey: string;
  apiBaseUrl: string;
}

export const config = {
  github: {
    token: process.env.GITHUB_TOKEN || '',
    appId: process.env.APP_ID || '',
    privateKeyPath: process.env.PRIVATE_KEY_PATH || '',
    privateKey: process.env.PRIVATE_KEY || '',
    apiBaseUrl: process.env.GITHUB_API_URL || GITHUB_API_BASE_URL,
  } satisfies GitHubEnvConfig,
  timeoutMs: parseInt(process.env.TIMEOUT || '30', 10) * 1000,
};

export interface BackupConfig {
  token: string;
  orgName: string;
  batchSize: number;
  maxWorkers: number;
  limitUsers?: number;
  apiBaseUrl: string;
  timeoutMs: number;
}

export interface BackupConfigInput {
  token?: string;
  orgName?: string;
  batchSize?: number;
  maxWorkers?: number;
  limitUsers?: number;
  apiBaseUrl?: string;
  timeoutMs?: number;
}

/**
 * Validated backup settings. The token falls back to GITHUB_TOKEN.
 */
export function createBackupConfig(input: BackupConfigInput, defaults: GitHubEnvConfig = config.github): BackupConfig {
  const token = input.token || defaults.token;
  if (!token) {
    throw new ConfigError('GitHub token must be provided via --token or GITHUB_TOKEN environment variable');
  }
  if (!input.orgName) {
    throw new ConfigError('Organization name is required');
  }

  const batchSize = input.batchSize ?? DEFAULT_BATCH_SIZE;
  const maxWorkers = input.maxWorkers ?? DEFAULT_MAX_WORKERS;

  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new ConfigError('Batch size must be positive');
  }
  if (!Number.isInteger(maxWorkers) || maxWorkers <= 0) {
    throw new ConfigError('Max workers must be positive');
  }
  if (input.limitUsers !== undefined && (!Number.isInteger(input.limitUsers) || input.limitUsers <= 0)) {
    throw new ConfigError('Limit users must be positive');
  }

  return {
    token,
    orgName: input.orgName,
    batchSize,
    maxWorkers,
    limitUsers: input.limitUsers,
    apiBaseUrl: input.apiBaseUrl || defaults.apiBaseUrl,
    timeoutMs: input.timeoutMs ?? config.timeoutMs,
  };
}

export interface AppCredentialInput {
  appId?: string;
  privateKeyPath?: string;
  privateKey?: string;
}

export interface AppCredentials {
  appId: number;
  privateKeyPath?: string;
  privateKey?: string;
}

/**
 * App id and private key source for operations that sign a JWT.
 * Flags win over APP_ID / PRIVATE_KEY_PATH / PRIVATE_KEY.
 */
export function resolveAppCredentials(
  input: AppCredentialInput,
  defaults: GitHubEnvConfig = config.github
): AppCredentials {
  const rawAppId = input.appId || defaults.appId;
  if (!rawAppId) {
    throw new ConfigError('App ID is required for this operation. Set APP_ID environment variable or use --app-id');
  }

  const appId = Number(rawAppId);
  if (!Number.isInteger(appId) || appId <= 0) {
    throw new ConfigError(`Invalid App ID: ${rawAppId}. Must be a positive number.`);
  }

  // A flag for one key source overrides both env sources
  const fromFlags = Boolean(input.privateKeyPath || input.privateKey);
  const privateKeyPath = fromFlags ? input.privateKeyPath : defaults.privateKeyPath;
  const privateKey = fromFlags ? input.privateKey : defaults.privateKey;

  if (privateKeyPath && privateKey) {
    throw new ConfigError('Cannot specify both --private-key-path and --private-key');
  }
  if (!privateKeyPath && !privateKey) {
    throw new ConfigError(
      'Private key is required for this operation. Set PRIVATE_KEY or PRIVATE_KEY_PATH environment variable ' +
        'or use --private-key/--private-key-path'
    );
  }

  logger.debug('App credentials resolved', { appId, privateKeySource: privateKey ? 'content' : 'file' });
  return {
    appId,
    privateKeyPath: privateKeyPath || undefined,
    privateKey: privateKey || undefined,
  };
}

/**
 * Environment checks for both tools.
 * Returns detailed errors and warnings
 */
export function runPreflightChecks(env: NodeJS.ProcessEnv = process.env): PreflightResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  logger.info('Running preflight checks...');

  // ===== 1. GitHub App =====
  const appId = env.APP_ID || '';
  const privateKeyPath = env.PRIVATE_KEY_PATH || '';
  const privateKey = env.PRIVATE_KEY || '';

  if (!appId) {
    warnings.push('APP_ID: Not set (token generation needs --app-id)');
  } else if (!/^\d+$/.test(appId)) {
    errors.push(`APP_ID: Must be a valid number, got "${appId}"`);
  } else {
    logger.info(`APP_ID: ${appId}`);
  }

  if (privateKeyPath && privateKey) {
    errors.push('PRIVATE_KEY / PRIVATE_KEY_PATH: Both set, use only one');
  } else if (privateKeyPath) {
    if (!fs.existsSync(privateKeyPath)) {
      errors.push(`PRIVATE_KEY_PATH: File not found: ${privateKeyPath}`);
    } else {
      logger.info(`PRIVATE_KEY_PATH: ${privateKeyPath}`);
    }
  } else if (privateKey) {
    if (!privateKey.includes('BEGIN') || !privateKey.includes('PRIVATE KEY')) {
      errors.push('PRIVATE_KEY: Invalid format (should be PEM format with BEGIN/END markers)');
    } else {
      logger.info('PRIVATE_KEY: Format OK (PEM)');
    }
  } else {
    warnings.push('PRIVATE_KEY / PRIVATE_KEY_PATH: Not set (token generation needs a private key)');
  }

  // ===== 2. Token for the teams backup =====
  const token = env.GITHUB_TOKEN || '';
  if (!token) {
    warnings.push('GITHUB_TOKEN: Not set (teams backup needs --token)');
  } else if (!/^(ghp_|github_pat_|ghs_|gho_)/.test(token)) {
    warnings.push('GITHUB_TOKEN: Unusual format (expected "ghp_...", "github_pat_..." or "ghs_...")');
  } else {
    logger.info('GITHUB_TOKEN: Present');
  }

  // ===== 3. Timeout =====
  const timeout = env.TIMEOUT;
  if (timeout !== undefined && !(Number(timeout) > 0)) {
    errors.push(`TIMEOUT: Must be a positive number of seconds, got "${timeout}"`);
  }

  return {
    success: errors.length === 0,
    errors,
    warnings,
  };
}
