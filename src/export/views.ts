import { OrganizationBackup, TeamAccess, UserAccess } from '../backup/models';

/**
 * Team-centric projections of a backup. The CSV, Excel and structured JSON
 * exporters all read from these so the formats agree with each other.
 */

export interface TeamGroup {
  team: TeamAccess;
  members: Array<{ user: UserAccess; role: string }>;
}

export interface TeamOverviewRow {
  name: string;
  slug: string;
  privacy: string;
  description: string;
  memberCount: number;
  /** Sorted, deduplicated */
  repositories: string[];
}

export interface MembershipRow {
  teamName: string;
  teamSlug: string;
  username: string;
  userId: number;
  email: string | null;
  teamRole: string;
  orgRole: string;
}

export interface TeamRepositoryRow {
  teamName: string;
  teamSlug: string;
  /** "org/repo" */
  repository: string;
  owner: string;
  repositoryName: string;
}

export interface UserSummaryRow {
  username: string;
  userId: number;
  email: string | null;
  orgRole: string;
  teamNames: string[];
}

export function compareIgnoringCase(a: string, b: string): number {
  return compareText(a.toLowerCase(), b.toLowerCase());
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Teams that have at least one member in the backup, keyed by slug, with the
 * first-seen team record and members in user order. Sorted by lower-cased name.
 */
export function buildTeamGroups(backup: OrganizationBackup): TeamGroup[] {
  const groups = new Map<string, TeamGroup>();
  for (const user of backup.users) {
    for (const team of user.teams) {
      let group = groups.get(team.slug);
      if (!group) {
        group = { team, members: [] };
        groups.set(team.slug, group);
      }
      group.members.push({ user, role: team.role });
    }
  }
  return [...groups.values()].sort((a, b) => compareIgnoringCase(a.team.name, b.team.name));
}

export function buildTeamOverview(backup: OrganizationBackup): TeamOverviewRow[] {
  return buildTeamGroups(backup).map(({ team, members }) => ({
    name: team.name,
    slug: team.slug,
    privacy: team.privacy,
    description: team.description || '',
    memberCount: new Set(members.map((m) => m.user.username)).size,
    repositories: [...new Set(team.repositories)].sort(compareText),
  }));
}

/**
 * One row per (team, user), sorted by team name then username, both ignoring case
 */
export function buildMemberships(backup: OrganizationBackup): MembershipRow[] {
  const rows: MembershipRow[] = [];
  for (const user of backup.users) {
    for (const team of user.teams) {
      rows.push({
        teamName: team.name,
        teamSlug: team.slug,
        username: user.username,
        userId: user.user_id,
        email: user.email,
        teamRole: team.role,
        orgRole: user.role,
      });
    }
  }
  return rows.sort(
    (a, b) => compareIgnoringCase(a.teamName, b.teamName) || compareIgnoringCase(a.username, b.username)
  );
}

/**
 * Unique (team, repository) pairs sorted by team name, slug, then repository
 */
export function buildTeamRepositoryPairs(backup: OrganizationBackup): TeamRepositoryRow[] {
  const pairs = new Map<string, TeamRepositoryRow>();
  for (const user of backup.users) {
    for (const team of user.teams) {
      for (const repository of team.repositories) {
        const key = `${team.slug}\u0000${repository}`;
        if (!pairs.has(key)) {
          pairs.set(key, { teamName: team.name, teamSlug: team.slug, repository, ...splitRepository(repository) });
        }
      }
    }
  }
  return [...pairs.values()].sort(
    (a, b) =>
      compareText(a.teamName, b.teamName) ||
      compareText(a.teamSlug, b.teamSlug) ||
      compareText(a.repository, b.repository)
  );
}

export function buildUserSummaries(backup: OrganizationBackup): UserSummaryRow[] {
  return [...backup.users]
    .sort((a, b) => compareIgnoringCase(a.username, b.username))
    .map((user) => ({
      username: user.username,
      userId: user.user_id,
      email: user.email,
      orgRole: user.role,
      teamNames: user.teams.map((team) => team.name),
    }));
}

export function buildUsersWithoutTeams(backup: OrganizationBackup): UserSummaryRow[] {
  return buildUserSummaries(backup).filter((row) => row.teamNames.length === 0);
}

export function splitRepository(fullName: string): { owner: string; repositoryName: string } {
  const parts = fullName.split('/');
  return {
    owner: parts.length > 1 ? parts[0] : '',
    repositoryName: parts[parts.length - 1],
  };
}
