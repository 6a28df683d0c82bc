import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { exportToJson, exportToStructuredJson, toStructuredBackup } from './json-exporter';
import { sampleBackup } from '../test-support/backup-fixture';

describe('JSON export', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'json-export-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes the backup as indented JSON', async () => {
    const backup = sampleBackup();
    const file = path.join(tmpDir, 'backup.json');

    await exportToJson(backup, file);

    const text = fs.readFileSync(file, 'utf-8');
    expect(text.startsWith('{\n  "org_name": "acme",')).toBe(true);
    expect(JSON.parse(text)).toEqual(backup);
  });

  it('builds the team-centric structure', () => {
    const structured = toStructuredBackup(sampleBackup());

    expect(structured.organization).toBe('acme');
    expect(structured.summary).toEqual({
      total_users: 4,
      total_teams: 3,
      total_team_memberships: 3,
      users_with_teams: 2,
    });
    expect(structured.teams).toEqual([
      {
        name: 'backend',
        slug: 'backend',
        description: 'APIs, "core" services',
        privacy: 'closed',
        repositories: ['acme/api', 'acme/worker'],
        members: [
          { username: 'carol', user_id: 3, email: 'carol@example.com', role_in_team: 'maintainer', org_role: 'admin' },
          { username: 'Alice', user_id: 1, email: 'alice@example.com', role_in_team: 'member', org_role: 'member' },
        ],
      },
      {
        name: 'Design',
        slug: 'design',
        description: null,
        privacy: 'secret',
        repositories: [],
        members: [
          { username: 'carol', user_id: 3, email: 'carol@example.com', role_in_team: 'member', org_role: 'admin' },
        ],
      },
    ]);
    expect(structured.users_without_teams).toEqual([
      { username: 'bob', user_id: 2, email: null, org_role: 'member' },
      { username: 'zoe', user_id: 4, email: null, org_role: 'member' },
    ]);
  });

  it('writes the structured JSON file', async () => {
    const file = path.join(tmpDir, 'structured.json');

    await exportToStructuredJson(sampleBackup(), file);

    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual(toStructuredBackup(sampleBackup()));
  });
});
