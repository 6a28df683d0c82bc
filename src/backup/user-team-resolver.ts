import { Logger } from '../logger';
import { GitHubOrgClient } from '../github/org-client';
import { GitHubTeam, GitHubTeamMembership } from '../github/types';
import { TeamAccess } from './models';
import { ReadonlyTeamCache } from './team-cache';

const logger = new Logger('UserTeamResolver');

/**
 * The cache lists the user in a team, but the per-user membership record could
 * not be read. The team is left out of the user's list.
 */
export interface TeamMembershipMismatch {
  username: string;
  teamSlug: string;
  reason: 'not-found' | 'lookup-failed';
}

export interface ResolveUserTeamsOptions {
  onMismatch?: (mismatch: TeamMembershipMismatch) => void;
}

/**
 * Teams `username` belongs to, in the order of `teams`, with the user's role in each.
 */
export async function resolveUserTeams(
  client: GitHubOrgClient,
  username: string,
  teams: readonly GitHubTeam[],
  cache: ReadonlyTeamCache,
  options: ResolveUserTeamsOptions = {}
): Promise<TeamAccess[]> {
  const userTeams: TeamAccess[] = [];

  for (const team of teams) {
    if (!cache.isMember(team.slug, username)) {
      continue;
    }

    let membership: GitHubTeamMembership | null;
    try {
      membership = await client.getTeamMembership(team.slug, username);
    } catch (error) {
      logger.warn('Failed to read team membership', { username, team: team.slug, error });
      options.onMismatch?.({ username, teamSlug: team.slug, reason: 'lookup-failed' });
      continue;
    }

    if (!membership) {
      options.onMismatch?.({ username, teamSlug: team.slug, reason: 'not-found' });
      continue;
    }

    userTeams.push({
      name: team.name,
      slug: team.slug,
      description: team.description ?? null,
      privacy: team.privacy || 'secret',
      role: membership.role || 'member',
      repositories: cache.repositoriesOf(team.slug),
    });
  }

  return userTeams;
}
