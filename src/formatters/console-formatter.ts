import chalk, { Chalk } from 'chalk';
import { createInterface } from 'node:readline/promises';
import { AppAnalysis } from '../github-auth';
import { TokenValidation } from '../github/app-api-client';
import { GitHubInstallation } from '../github/types';

export interface ConsoleFormatterOptions {
  /** Defaults to chalk's terminal detection */
  color?: boolean;
  write?: (text: string) => void;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/** Repositories listed per installation before the rest are summarised */
const REPOSITORY_LIST_LIMIT = 100;

/**
 * Terminal output for the CLIs: status lines, tables and report blocks.
 */
export class ConsoleFormatter {
  private c: Chalk;
  private write: (text: string) => void;
  private input: NodeJS.ReadableStream;
  private output: NodeJS.WritableStream;

  constructor(options: ConsoleFormatterOptions = {}) {
    this.c = options.color === undefined ? chalk : new chalk.Instance({ level: options.color ? 1 : 0 });
    this.write = options.write || ((text) => process.stdout.write(text));
    this.input = options.input || process.stdin;
    this.output = options.output || process.stdout;
  }

  print(text: string): void {
    this.write(`${text}\n`);
  }

  success(message: string): void {
    this.print(this.c.green(`✅ ${message}`));
  }

  error(message: string): void {
    this.print(this.c.red(`❌ ${message}`));
  }

  warning(message: string): void {
    this.print(this.c.yellow(`⚠️  ${message}`));
  }

  info(message: string): void {
    this.print(this.c.cyan(`ℹ️  ${message}`));
  }

  token(token: string): void {
    this.print(this.c.green.bold(token));
  }

  heading(title: string): void {
    this.print('');
    this.print(this.c.cyan.bold(title));
    this.print('='.repeat(50));
  }

  formatInstallationsTable(installations: readonly GitHubInstallation[]): string {
    if (installations.length === 0) {
      return this.c.yellow('No installations found');
    }

    const lines = [
      '',
      this.c.cyan.bold('=== Available GitHub App Installations ==='),
      '',
      `${this.c.blue('Installation ID'.padEnd(20))} | ${this.c.blue('Account'.padEnd(20))} | ${this.c.blue('Target Type'.padEnd(15))}`,
      '-'.repeat(60),
    ];

    for (const installation of installations) {
      const id = String(installation.id).padEnd(20);
      const account = (installation.account?.login || 'N/A').padEnd(20);
      const targetType = (installation.target_type || 'N/A').padEnd(15);
      lines.push(`${this.c.yellow(id)} | ${this.c.green(account)} | ${targetType}`);
    }

    lines.push(
      '',
      this.c.cyan(`ℹ️  Found ${installations.length} installation(s)`),
      this.c.blue('💡 Use --org <org-name> or --installation-id <id> to get a token')
    );
    return lines.join('\n');
  }

  formatTokenValidation(result: TokenValidation): string {
    if (!result.valid) {
      const lines = [this.c.red('❌ Token is invalid')];
      if ('reason' in result) {
        lines.push(`Reason: ${result.reason}`);
      } else {
        lines.push(`Error: ${result.error}`);
      }
      return lines.join('\n');
    }

    const { remaining, limit } = result.rate_limit;
    const lines = [
      this.c.green('✅ Token is valid'),
      `Type: ${result.type}`,
      `Accessible repositories: ${this.c.cyan(String(result.repositories_count))}`,
      `Rate limit: ${this.c.yellow(`${remaining ?? 'Unknown'}/${limit ?? 'Unknown'}`)}`,
    ];
    if (result.scopes.length > 0) {
      lines.push(`Scopes: ${this.c.magenta(result.scopes.join(', '))}`);
    }
    return lines.join('\n');
  }

  formatAppAnalysis({ app, installations, repositories }: AppAnalysis): string {
    const totalRepositories = Object.values(repositories).reduce((sum, repos) => sum + repos.total_count, 0);

    const lines = [
      this.c.cyan.bold('=== GitHub App Analysis ==='),
      '',
      this.c.green.bold('🤖 App Information'),
      `  ID: ${this.c.yellow(String(app.id))}`,
      `  Name: ${this.c.green(app.name)}`,
      `  Slug: ${this.c.cyan(app.slug || 'Unknown')}`,
      `  Description: ${app.description || 'No description'}`,
      `  Owner: ${this.c.magenta(app.owner?.login || 'Unknown')}`,
      `  Owner Type: ${app.owner?.type || 'Unknown'}`,
      `  URL: ${this.c.blue(app.html_url || 'Unknown')}`,
      `  Created: ${this.c.blue(app.created_at || 'Unknown')}`,
      '',
      this.c.blue.bold('📍 Installation Summary'),
      `  Total Installations: ${this.c.yellow(String(installations.length))}`,
      `  Total Repositories: ${this.c.yellow(String(totalRepositories))}`,
      '  Installed On:',
    ];

    for (const installation of installations) {
      const account = installation.account?.login || 'Unknown';
      const created = installation.created_at ? installation.created_at.slice(0, 10) : 'Unknown';
      lines.push(
        `    ${this.c.green('✅')} ${this.c.cyan(account)} (${installation.target_type || 'Unknown'}) - ${created}`
      );
    }
    lines.push('');

    if (app.permissions) {
      lines.push(this.c.magenta.bold('🔐 App Permissions'));
      for (const [permission, level] of Object.entries(app.permissions)) {
        lines.push(`  ${permissionIcon(level)} ${permission}: ${this.permissionColor(level)(level)}`);
      }
      lines.push('');
    }

    if (app.events) {
      lines.push(this.c.blue.bold('📡 Subscribed Events'));
      for (const event of app.events) {
        lines.push(`  📨 ${this.c.cyan(event)}`);
      }
      lines.push('');
    }

    if (Object.keys(repositories).length > 0) {
      lines.push(this.c.green.bold(`📚 Accessible Repositories (${totalRepositories} total)`));
      for (const installation of installations) {
        const repos = repositories[installation.id];
        if (!repos) {
          continue;
        }
        lines.push(`  ${this.c.cyan(`${installation.account?.login || 'Unknown'}:`)}`);
        for (const repo of repos.repositories.slice(0, REPOSITORY_LIST_LIMIT)) {
          lines.push(`    • ${repo.full_name}`);
        }
        if (repos.total_count > REPOSITORY_LIST_LIMIT) {
          lines.push(`    ... and ${repos.total_count - REPOSITORY_LIST_LIMIT} more repositories`);
        }
      }
    }

    return lines.join('\n');
  }

  /**
   * Ask a y/N question; `force` answers yes without prompting.
   */
  async confirm(message: string, force = false): Promise<boolean> {
    if (force) {
      this.info(`Force mode enabled - ${message}`);
      return true;
    }

    const rl = createInterface({ input: this.input, output: this.output });
    try {
      const answer = await rl.question(this.c.yellow(`⚠️  ${message} (y/N): `));
      return ['y', 'yes'].includes(answer.trim().toLowerCase());
    } finally {
      rl.close();
    }
  }

  private permissionColor(level: string): Chalk {
    if (level === 'write') return this.c.red;
    if (level === 'read') return this.c.green;
    return this.c.yellow;
  }
}

function permissionIcon(level: string): string {
  if (level === 'write') return '✏️';
  if (level === 'read') return '👁️';
  return '🔧';
}
