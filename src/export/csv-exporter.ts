import { Logger } from '../logger';
import { OrganizationBackup } from '../backup/models';
import { writeFileAtomic } from './output';
import {
  buildMemberships,
  buildTeamOverview,
  buildTeamRepositoryPairs,
  buildUserSummaries,
  buildUsersWithoutTeams,
} from './views';

const logger = new Logger('CsvExporter');

export type CsvValue = string | number | null | undefined;

const LINE_BREAK = '\r\n';
const LIST_SEPARATOR = '; ';

/**
 * RFC 4180 field: quoted only when it holds a comma, quote or line break
 */
export function formatCsvField(value: CsvValue): string {
  if (value === null || value === undefined) {
    return '';
  }
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsv(rows: readonly (readonly CsvValue[])[]): string {
  return rows.map((row) => row.map(formatCsvField).join(',') + LINE_BREAK).join('');
}

/**
 * Single flat file: one row per (user, team); users without teams get one
 * row with empty team columns.
 */
export async function exportToCsv(backup: OrganizationBackup, filePath: string): Promise<string> {
  const rows: CsvValue[][] = [
    ['Username', 'User ID', 'Email', 'Role', 'Team Name', 'Team Slug', 'Team Role', 'Team Privacy', 'Team Repositories'],
  ];

  for (const user of backup.users) {
    const base = [user.username, user.user_id, user.email, user.role];
    for (const team of user.teams) {
      rows.push([...base, team.name, team.slug, team.role, team.privacy, team.repositories.join(LIST_SEPARATOR)]);
    }
    if (user.teams.length === 0) {
      rows.push([...base, '', '', '', '', '']);
    }
  }

  await writeFileAtomic(filePath, formatCsv(rows));
  logger.info(`CSV backup saved to: ${filePath}`);
  return filePath;
}

/**
 * Five focused files named `<basePath>_<view>.csv`. Returns their paths.
 */
export async function exportToMultipleCsvs(backup: OrganizationBackup, basePath: string): Promise<string[]> {
  const overview = buildTeamOverview(backup);
  const memberships = buildMemberships(backup);
  const pairs = buildTeamRepositoryPairs(backup);
  const users = buildUserSummaries(backup);
  const withoutTeams = buildUsersWithoutTeams(backup);

  const files: Array<{ suffix: string; label: string; rows: CsvValue[][] }> = [
    {
      suffix: 'teams_overview',
      label: `Teams overview (${overview.length} teams)`,
      rows: [
        ['Team Name', 'Team Slug', 'Privacy', 'Description', 'Member Count', 'Repository Count', 'Repository List'],
        ...overview.map((team) => [
          team.name,
          team.slug,
          team.privacy,
          team.description,
          team.memberCount,
          team.repositories.length,
          team.repositories.join(LIST_SEPARATOR),
        ]),
      ],
    },
    {
      suffix: 'team_memberships',
      label: `Team memberships (${memberships.length} memberships)`,
      rows: [
        ['Team Name', 'Team Slug', 'Username', 'User Email', 'Team Role', 'Org Role'],
        ...memberships.map((m) => [m.teamName, m.teamSlug, m.username, m.email, m.teamRole, m.orgRole]),
      ],
    },
    {
      suffix: 'team_repositories',
      label: `Team repository access (${pairs.length} team-repo pairs)`,
      rows: [
        ['Team Name', 'Team Slug', 'Repository', 'Repository Org/Name'],
        ...pairs.map((pair) => [pair.teamName, pair.teamSlug, pair.repositoryName, pair.repository]),
      ],
    },
    {
      suffix: 'users_summary',
      label: `Users summary (${users.length} users)`,
      rows: [
        ['Username', 'User ID', 'Email', 'Org Role', 'Team Count', 'Team List'],
        ...users.map((user) => [
          user.username,
          user.userId,
          user.email,
          user.orgRole,
          user.teamNames.length,
          user.teamNames.join(LIST_SEPARATOR),
        ]),
      ],
    },
    {
      suffix: 'users_without_teams',
      label: `Users without teams (${withoutTeams.length} users)`,
      rows: [
        ['Username', 'User ID', 'Email', 'Org Role'],
        ...withoutTeams.map((user) => [user.username, user.userId, user.email, user.orgRole]),
      ],
    },
  ];

  const written: string[] = [];
  for (const file of files) {
    const filePath = `${basePath}_${file.suffix}.csv`;
    await writeFileAtomic(filePath, formatCsv(file.rows));
    logger.info(`${filePath} - ${file.label}`);
    written.push(filePath);
  }
  return written;
}
