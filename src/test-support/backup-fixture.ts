import { OrganizationBackup, TeamAccess, UserAccess, summarize } from '../backup/models';

const backend = (role: string): TeamAccess => ({
  name: 'backend',
  slug: 'backend',
  description: 'APIs, "core" services',
  privacy: 'closed',
  role,
  repositories: ['acme/api', 'acme/worker'],
});

const design = (role: string): TeamAccess => ({
  name: 'Design',
  slug: 'design',
  description: null,
  privacy: 'secret',
  role,
  repositories: [],
});

/**
 * Small backup: two teams (one without repositories), four users of whom two
 * are in no team.
 */
export function sampleBackup(): OrganizationBackup {
  const users: UserAccess[] = [
    { username: 'zoe', user_id: 4, email: null, role: 'member', teams: [] },
    { username: 'carol', user_id: 3, email: 'carol@example.com', role: 'admin', teams: [backend('maintainer'), design('member')] },
    { username: 'Alice', user_id: 1, email: 'alice@example.com', role: 'member', teams: [backend('member')] },
    { username: 'bob', user_id: 2, email: null, role: 'member', teams: [] },
  ];
  return {
    org_name: 'acme',
    backup_timestamp: '2024-01-02T03:04:05.000Z',
    backup_type: 'teams_only',
    users,
    summary: summarize(users, 3),
  };
}
