import { Command } from 'commander';
import { Logger } from '../logger';
import { GitHubEnvConfig, config, resolveAppCredentials, runPreflightChecks } from '../config';
import { GitHubAppAuth } from '../github-auth';
import { GitHubAppApiClient } from '../github/app-api-client';
import { FetchLike } from '../github/http-client';
import { toError } from '../github/errors';
import { ConsoleFormatter } from '../formatters/console-formatter';
import { parsePositiveInt } from './options';

const logger = new Logger('TokenCommand');

export interface TokenCliOptions {
  appId?: string;
  privateKeyPath?: string;
  privateKey?: string;
  org?: string;
  installationId?: number;
  listInstallations?: boolean;
  analyzeApp?: boolean;
  validateToken?: string;
  revokeToken?: string;
  force?: boolean;
  checkEnv?: boolean;
  debug?: boolean;
}

export interface TokenCommandDeps {
  formatter?: ConsoleFormatter;
  fetch?: FetchLike;
  env?: GitHubEnvConfig;
  processEnv?: NodeJS.ProcessEnv;
  now?: () => Date;
}

export function createTokenProgram(): Command {
  return new Command('gh-app-token')
    .description('Generate and manage GitHub App installation tokens')
    .option('--app-id <id>', 'GitHub App ID (default: APP_ID)')
    .option('--private-key-path <path>', 'Path to the private key file (default: PRIVATE_KEY_PATH)')
    .option('--private-key <pem>', 'Private key content (default: PRIVATE_KEY)')
    .option('--org <org>', 'Organization to get a token for')
    .option('--installation-id <id>', 'Installation to get a token for', parsePositiveInt)
    .option('--list-installations', 'List all installations')
    .option('--analyze-app', 'Show app details, installations and accessible repositories')
    .option('--validate-token <token>', 'Validate an existing installation token')
    .option('--revoke-token <token>', 'Revoke an existing installation token')
    .option('--force', 'Skip confirmation prompts')
    .option('--check-env', 'Check environment configuration and exit')
    .option('--debug', 'Enable debug logging')
    .addHelpText(
      'after',
      `
Examples:
  $ gh-app-token --app-id 12345 --private-key-path ./app.pem --org myorg
  $ gh-app-token --app-id 12345 --private-key "$(cat ./app.pem)" --list-installations
  $ APP_ID=12345 PRIVATE_KEY_PATH=./app.pem gh-app-token --org myorg

Environment Variables:
  APP_ID             GitHub App ID
  PRIVATE_KEY_PATH   Path to private key file
  PRIVATE_KEY        Private key content`
    );
}

/**
 * Dispatch one token operation. Resolves the exit code.
 *
 * Order: --check-env, --validate-token, --revoke-token, --analyze-app,
 * --list-installations, --installation-id, --org, else list installations.
 */
export async function runTokenCommand(options: TokenCliOptions, deps: TokenCommandDeps = {}): Promise<number> {
  const out = deps.formatter || new ConsoleFormatter();
  const env = deps.env || config.github;
  const apiClient = new GitHubAppApiClient({
    baseUrl: env.apiBaseUrl,
    timeoutMs: config.timeoutMs,
    fetch: deps.fetch,
  });

  try {
    if (options.checkEnv) {
      return checkEnvironment(out, deps.processEnv || process.env);
    }

    if (options.validateToken) {
      out.info('Validating token...');
      const result = await apiClient.validateToken(options.validateToken);
      out.print(out.formatTokenValidation(result));
      return result.valid ? 0 : 1;
    }

    if (options.revokeToken) {
      if (!(await out.confirm('Are you sure you want to revoke this token?', options.force))) {
        out.info('Token revocation cancelled');
        return 0;
      }
      out.info('Revoking token...');
      if (await apiClient.revokeToken(options.revokeToken)) {
        out.success('Token revoked successfully');
      } else {
        out.warning('Token was already revoked or not found');
      }
      return 0;
    }

    const credentials = resolveAppCredentials(
      { appId: options.appId, privateKeyPath: options.privateKeyPath, privateKey: options.privateKey },
      env
    );
    const auth = GitHubAppAuth.fromCredentials(credentials, { apiClient, now: deps.now });

    if (options.analyzeApp) {
      out.info('Analyzing GitHub App...');
      try {
        out.print(out.formatAppAnalysis(await auth.analyze()));
        return 0;
      } catch (error) {
        out.error(`Failed to analyze app: ${toError(error).message}`);
        out.print(out.formatInstallationsTable(await auth.listInstallations()));
        return 1;
      }
    }

    if (options.listInstallations) {
      out.print(out.formatInstallationsTable(await auth.listInstallations()));
      return 0;
    }

    if (options.installationId !== undefined) {
      const token = await auth.getInstallationToken(options.installationId);
      out.token(token.token);
      out.success(`Token generated for installation ID: ${options.installationId}`);
      return 0;
    }

    if (options.org) {
      const token = await auth.getOrgToken(options.org);
      out.token(token.token);
      out.success(`Token generated for organization '${options.org}'`);
      return 0;
    }

    out.print(out.formatInstallationsTable(await auth.listInstallations()));
    return 0;
  } catch (error) {
    logger.debug('Token command failed', error);
    out.error(toError(error).message);
    return 1;
  }
}

function checkEnvironment(out: ConsoleFormatter, processEnv: NodeJS.ProcessEnv): number {
  const result = runPreflightChecks(processEnv);
  for (const warning of result.warnings) {
    out.warning(warning);
  }
  for (const error of result.errors) {
    out.error(error);
  }
  if (result.success) {
    out.success('Environment configuration looks good');
    return 0;
  }
  out.error(`Found ${result.errors.length} configuration error(s)`);
  return 1;
}
