import { Logger } from '../logger';
import { BackupSummary, OrganizationBackup } from '../backup/models';
import { writeFileAtomic } from './output';
import { buildTeamGroups, compareIgnoringCase } from './views';

const logger = new Logger('JsonExporter');

export interface StructuredTeamMember {
  username: string;
  user_id: number;
  email: string | null;
  role_in_team: string;
  org_role: string;
}

export interface StructuredTeam {
  name: string;
  slug: string;
  description: string | null;
  privacy: string;
  repositories: readonly string[];
  members: StructuredTeamMember[];
}

export interface StructuredUserWithoutTeams {
  username: string;
  user_id: number;
  email: string | null;
  org_role: string;
}

export interface StructuredBackup {
  organization: string;
  backup_timestamp: string;
  backup_type: string;
  summary: BackupSummary;
  teams: StructuredTeam[];
  users_without_teams: StructuredUserWithoutTeams[];
}

export async function exportToJson(backup: OrganizationBackup, filePath: string): Promise<string> {
  await writeFileAtomic(filePath, JSON.stringify(backup, null, 2));
  logger.info(`JSON backup saved to: ${filePath}`);
  return filePath;
}

/**
 * Team-centric view: each team with its members, plus users in no team.
 */
export function toStructuredBackup(backup: OrganizationBackup): StructuredBackup {
  const teams = buildTeamGroups(backup).map(({ team, members }) => ({
    name: team.name,
    slug: team.slug,
    description: team.description,
    privacy: team.privacy,
    repositories: team.repositories,
    members: members.map(({ user, role }) => ({
      username: user.username,
      user_id: user.user_id,
      email: user.email,
      role_in_team: role,
      org_role: user.role,
    })),
  }));

  const usersWithoutTeams = backup.users
    .filter((user) => user.teams.length === 0)
    .sort((a, b) => compareIgnoringCase(a.username, b.username))
    .map((user) => ({
      username: user.username,
      user_id: user.user_id,
      email: user.email,
      org_role: user.role,
    }));

  return {
    organization: backup.org_name,
    backup_timestamp: backup.backup_timestamp,
    backup_type: backup.backup_type,
    summary: backup.summary,
    teams,
    users_without_teams: usersWithoutTeams,
  };
}

export async function exportToStructuredJson(backup: OrganizationBackup, filePath: string): Promise<string> {
  await writeFileAtomic(filePath, JSON.stringify(toStructuredBackup(backup), null, 2));
  logger.info(`Structured JSON saved to: ${filePath}`);
  return filePath;
}
