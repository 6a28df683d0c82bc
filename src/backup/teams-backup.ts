import { Logger } from '../logger';
import { BackupConfig } from '../config';
import { GitHubApiError } from '../github/errors';
import { GitHubHttpClient, FetchLike, Sleep } from '../github/http-client';
import { GitHubOrgClient } from '../github/org-client';
import { GitHubMember, GitHubTeam } from '../github/types';
import { BACKUP_TYPE, OrganizationBackup, UserAccess, summarize } from './models';
import { ReadonlyTeamCache, buildTeamCache, uniqueBySlug } from './team-cache';
import { enrichUser } from './user-enrichment';
import { TeamMembershipMismatch, resolveUserTeams } from './user-team-resolver';

export interface TeamsBackupOptions {
  /** Start-of-run timestamp source */
  now?: () => Date;
  signal?: AbortSignal;
}

export interface TeamsBackupClientOptions {
  fetch?: FetchLike;
  sleep?: Sleep;
  clock?: () => number;
}

/**
 * Split `items` into consecutive batches of `size`; the last may be smaller.
 */
export function partitionIntoBatches<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error(`Batch size must be positive, got ${size}`);
  }
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}

/**
 * Operator-facing explanation of a failure that aborted the run.
 */
export function describeFatalError(error: unknown, orgName: string): string {
  if (error instanceof GitHubApiError) {
    if (error.isNotFound()) {
      return `Organization '${orgName}' not found or not accessible`;
    }
    if (error.isUnauthorized()) {
      return 'Authentication failed - Invalid or expired GitHub token. Please regenerate your token';
    }
    if (error.isForbidden()) {
      return 'Access forbidden - Insufficient permissions (the token needs admin:org / read:org)';
    }
    if (error.isNetworkError()) {
      return `Network error: ${error.message}`;
    }
    return `HTTP Error ${error.status}: ${error.message}`;
  }
  return `Backup failed: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Team membership backup for one organization.
 *
 * Phases run strictly in sequence: members, teams, team cache (concurrent,
 * bounded by maxWorkers), then users batch by batch, one user at a time.
 */
export class TeamsBackup {
  private logger = new Logger('TeamsBackup');
  private mismatches: TeamMembershipMismatch[] = [];
  private now: () => Date;
  private signal?: AbortSignal;

  constructor(
    private config: BackupConfig,
    private client: GitHubOrgClient,
    options: TeamsBackupOptions = {}
  ) {
    this.now = options.now || (() => new Date());
    this.signal = options.signal;
  }

  static create(config: BackupConfig, options: TeamsBackupOptions & TeamsBackupClientOptions = {}): TeamsBackup {
    const http = new GitHubHttpClient({
      token: config.token,
      timeoutMs: config.timeoutMs,
      fetch: options.fetch,
      sleep: options.sleep,
      clock: options.clock,
    });
    return new TeamsBackup(config, new GitHubOrgClient(http, config.orgName, config.apiBaseUrl), options);
  }

  /**
   * Teams whose cache entry listed a user but whose membership record was missing
   */
  getMismatches(): readonly TeamMembershipMismatch[] {
    return this.mismatches;
  }

  async run(): Promise<OrganizationBackup> {
    const { orgName, batchSize, maxWorkers, limitUsers } = this.config;
    this.mismatches = [];

    this.logger.info(`Starting TEAMS-ONLY backup for organization: ${orgName}`);
    this.logger.info(`Batch size: ${batchSize}, Max workers: ${maxWorkers}`);
    if (limitUsers) {
      this.logger.info(`TEST MODE: Users limited to ${limitUsers}`);
    }

    const backup: OrganizationBackup = {
      org_name: orgName,
      backup_timestamp: this.now().toISOString(),
      backup_type: BACKUP_TYPE,
      users: [],
      summary: summarize([], 0),
    };

    const members = await this.fetchMembers();
    this.checkAborted();

    this.logger.info(`Fetching teams for ${orgName}...`);
    const teams = uniqueBySlug(await this.client.getOrganizationTeams());
    this.logger.info(`Found ${teams.length} teams`);
    this.checkAborted();

    const cache = await buildTeamCache(teams, this.client, maxWorkers);
    this.checkAborted();

    const batches = partitionIntoBatches(members, batchSize);
    this.logger.info(`Processing ${members.length} users in ${batches.length} batches of ${batchSize}...`);

    for (const [index, batch] of batches.entries()) {
      const results = await this.processBatch(batch, teams, cache, index + 1, batches.length);
      backup.users.push(...results);

      const processed = backup.users.length;
      const percent = ((processed / members.length) * 100).toFixed(1);
      this.logger.info(`Progress: ${processed}/${members.length} users processed (${percent}%)`);
    }

    backup.summary = summarize(backup.users, teams.length);

    if (this.mismatches.length > 0) {
      this.logger.warn(
        `${this.mismatches.length} team memberships listed by the team cache had no membership record and were left out`,
        this.mismatches.map((m) => `${m.username}@${m.teamSlug}`)
      );
    }

    this.logger.info('Teams backup completed successfully!');
    return backup;
  }

  /**
   * Enrich and resolve each user of one batch, in order
   */
  async processBatch(
    batch: readonly GitHubMember[],
    teams: readonly GitHubTeam[],
    cache: ReadonlyTeamCache,
    batchNumber: number,
    totalBatches: number
  ): Promise<UserAccess[]> {
    this.logger.info(`Processing batch ${batchNumber}/${totalBatches} (${batch.length} users)`);
    const results: UserAccess[] = [];

    for (const [index, member] of batch.entries()) {
      this.checkAborted();
      const username = member.login;
      this.logger.debug(`Processing user ${index + 1}/${batch.length}: ${username}`);

      const details = await enrichUser(this.client, username);
      const userTeams = await resolveUserTeams(this.client, username, teams, cache, {
        onMismatch: (mismatch) => this.mismatches.push(mismatch),
      });

      if (userTeams.length > 0) {
        this.logger.debug(`${username}: ${userTeams.length} teams`);
      }

      results.push({
        username,
        user_id: member.id,
        email: details.email,
        role: details.role,
        teams: userTeams,
      });
    }

    this.logger.info(`Batch ${batchNumber}/${totalBatches} completed`);
    return results;
  }

  private async fetchMembers(): Promise<GitHubMember[]> {
    const { orgName, limitUsers } = this.config;
    this.logger.info(`Fetching organization members for ${orgName}...`);

    const members = uniqueByLogin(await this.client.getOrganizationMembers(), this.logger);
    if (limitUsers) {
      const limited = members.slice(0, limitUsers);
      this.logger.info(`Limited to first ${limited.length} users for testing (original: ${members.length})`);
      return limited;
    }

    this.logger.info(`Found ${members.length} members`);
    return members;
  }

  private checkAborted(): void {
    this.signal?.throwIfAborted();
  }
}

function uniqueByLogin(members: readonly GitHubMember[], logger: Logger): GitHubMember[] {
  const seen = new Set<string>();
  return members.filter((member) => {
    if (seen.has(member.login)) {
      logger.warn('Duplicate member in member list, skipping', { login: member.login });
      return false;
    }
    seen.add(member.login);
    return true;
  });
}
