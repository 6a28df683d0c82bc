import throat from 'throat';
import { Logger } from '../logger';
import { GitHubOrgClient } from '../github/org-client';
import { GitHubTeam } from '../github/types';

const logger = new Logger('TeamCache');

const PROGRESS_EVERY = 20;

/**
 * Read side of the cache, handed to user resolution once the build has finished.
 */
export interface ReadonlyTeamCache {
  has(teamSlug: string): boolean;
  isMember(teamSlug: string, username: string): boolean;
  membersOf(teamSlug: string): ReadonlySet<string>;
  repositoriesOf(teamSlug: string): readonly string[];
  readonly size: number;
}

/**
 * team slug → member logins, team slug → repository full names.
 * Each key is written exactly once, by the task that owns that team.
 */
export class TeamCache implements ReadonlyTeamCache {
  private members = new Map<string, ReadonlySet<string>>();
  private repositories = new Map<string, readonly string[]>();

  set(teamSlug: string, members: ReadonlySet<string>, repositories: readonly string[]): void {
    if (this.members.has(teamSlug)) {
      throw new Error(`Team cache entry already written: ${teamSlug}`);
    }
    this.members.set(teamSlug, members);
    this.repositories.set(teamSlug, repositories);
  }

  has(teamSlug: string): boolean {
    return this.members.has(teamSlug);
  }

  isMember(teamSlug: string, username: string): boolean {
    return this.members.get(teamSlug)?.has(username) ?? false;
  }

  membersOf(teamSlug: string): ReadonlySet<string> {
    return this.members.get(teamSlug) ?? new Set<string>();
  }

  repositoriesOf(teamSlug: string): readonly string[] {
    return this.repositories.get(teamSlug) ?? [];
  }

  get size(): number {
    return this.members.size;
  }

  slugs(): string[] {
    return [...this.members.keys()];
  }

  totals(): { memberships: number; repositoryAssignments: number } {
    let memberships = 0;
    let repositoryAssignments = 0;
    for (const members of this.members.values()) memberships += members.size;
    for (const repos of this.repositories.values()) repositoryAssignments += repos.length;
    return { memberships, repositoryAssignments };
  }
}

interface TeamEntry {
  members: ReadonlySet<string>;
  repositories: readonly string[];
}

/**
 * Fetch members and repositories for one team.
 * Any failure leaves the team with an empty entry.
 */
export async function fetchTeamEntry(client: GitHubOrgClient, teamSlug: string, worker?: number): Promise<TeamEntry> {
  try {
    const members = await client.getTeamMembers(teamSlug, worker);
    const repos = await client.getTeamRepositories(teamSlug, worker);
    return {
      members: new Set(members.map((member) => member.login)),
      repositories: repos.map((repo) => repo.full_name),
    };
  } catch (error) {
    logger.warn(`Error fetching data for team ${teamSlug}`, error);
    return { members: new Set<string>(), repositories: [] };
  }
}

/**
 * Build the cache for every team over a pool of `maxWorkers` concurrent tasks.
 * Resolves once every team has an entry; completion order does not matter since
 * each task owns its own key.
 */
export async function buildTeamCache(
  teams: readonly GitHubTeam[],
  client: GitHubOrgClient,
  maxWorkers: number
): Promise<TeamCache> {
  const uniqueTeams = uniqueBySlug(teams);
  logger.info(`Building team cache for ${uniqueTeams.length} teams...`);

  const cache = new TeamCache();
  const limit = throat(maxWorkers);
  // Slot 0 belongs to the sequential phase; pool workers use 1..maxWorkers
  const freeWorkers = Array.from({ length: maxWorkers }, (_, i) => maxWorkers - i);
  let completed = 0;

  await Promise.all(
    uniqueTeams.map((team) =>
      limit(async () => {
        const worker = freeWorkers.pop() ?? 1;
        try {
          const entry = await fetchTeamEntry(client, team.slug, worker);
          cache.set(team.slug, entry.members, entry.repositories);
        } finally {
          freeWorkers.push(worker);
        }

        completed++;
        if (completed % PROGRESS_EVERY === 0) {
          logger.info(`Processed ${completed}/${uniqueTeams.length} teams`);
        }
      })
    )
  );

  const totals = cache.totals();
  logger.info(
    `Team cache built: ${totals.memberships} memberships, ${totals.repositoryAssignments} repo assignments`
  );
  return cache;
}

/**
 * First occurrence of each slug, in list order
 */
export function uniqueBySlug(teams: readonly GitHubTeam[]): GitHubTeam[] {
  const seen = new Set<string>();
  return teams.filter((team) => {
    if (seen.has(team.slug)) {
      logger.warn('Duplicate team in team list, skipping', { slug: team.slug });
      return false;
    }
    seen.add(team.slug);
    return true;
  });
}
