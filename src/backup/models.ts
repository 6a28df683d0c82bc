/**
 * Backup data model. Field names are snake_case because they are written
 * verbatim to the JSON export.
 */

export const BACKUP_TYPE = 'teams_only';

export type TeamRole = 'member' | 'maintainer' | (string & {});

/**
 * One user's membership in one team
 */
export interface TeamAccess {
  readonly name: string;
  readonly slug: string;
  readonly description: string | null;
  /** secret | closed (GitHub's "visible") */
  readonly privacy: string;
  readonly role: TeamRole;
  /** "org/repo" full names, in API order */
  readonly repositories: readonly string[];
}

export interface UserAccess {
  username: string;
  user_id: number;
  email: string | null;
  /** Organization role: admin | member | ... */
  role: string;
  teams: TeamAccess[];
}

export interface BackupSummary {
  total_users: number;
  total_teams: number;
  total_team_memberships: number;
  users_with_teams: number;
}

export interface OrganizationBackup {
  org_name: string;
  /** ISO-8601, set when the run starts */
  backup_timestamp: string;
  backup_type: typeof BACKUP_TYPE;
  users: UserAccess[];
  summary: BackupSummary;
}

export function summarize(users: readonly UserAccess[], totalTeams: number): BackupSummary {
  return {
    total_users: users.length,
    total_teams: totalTeams,
    total_team_memberships: users.reduce((sum, user) => sum + user.teams.length, 0),
    users_with_teams: users.filter((user) => user.teams.length > 0).length,
  };
}
