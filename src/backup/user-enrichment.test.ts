import { describe, it, expect, beforeEach } from 'vitest';
import { enrichUser } from './user-enrichment';
import { GitHubHttpClient } from '../github/http-client';
import { GitHubOrgClient } from '../github/org-client';
import { FakeGitHub, noSleep } from '../test-support/fake-github';

describe('enrichUser', () => {
  let github: FakeGitHub;
  let client: GitHubOrgClient;

  beforeEach(() => {
    github = new FakeGitHub();
    client = new GitHubOrgClient(new GitHubHttpClient({ token: 'test-token', fetch: github.fetch, sleep: noSleep }), 'acme');
  });

  it('returns the org role and public email', async () => {
    github
      .json('/orgs/acme/memberships/alice', { role: 'admin', state: 'active' })
      .json('/users/alice', { login: 'alice', id: 1, email: 'alice@example.com' });

    expect(await enrichUser(client, 'alice')).toEqual({ role: 'admin', email: 'alice@example.com' });
  });

  it('defaults the role when the membership record is absent', async () => {
    github.json('/users/bob', { login: 'bob', id: 2, email: null });

    expect(await enrichUser(client, 'bob')).toEqual({ role: 'member', email: null });
  });

  it('keeps the role when the user record is absent', async () => {
    github.json('/orgs/acme/memberships/dave', { role: 'admin' });

    expect(await enrichUser(client, 'dave')).toEqual({ role: 'admin', email: null });
  });

  it('degrades to defaults when a lookup throws', async () => {
    github
      .fail('/orgs/acme/memberships/carol')
      .json('/users/carol', { login: 'carol', id: 3, email: 'carol@example.com' });

    expect(await enrichUser(client, 'carol')).toEqual({ role: 'member', email: null });
  });
});
