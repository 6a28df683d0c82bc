import { describe, it, expect, beforeEach } from 'vitest';
import { TeamCache, buildTeamCache } from './team-cache';
import { FetchLike, GitHubHttpClient } from '../github/http-client';
import { GitHubOrgClient } from '../github/org-client';
import { GitHubTeam } from '../github/types';
import { FakeGitHub, noSleep } from '../test-support/fake-github';

const team = (slug: string, name = slug): GitHubTeam => ({ name, slug, privacy: 'closed' });

function createClient(fetch: FetchLike): { http: GitHubHttpClient; client: GitHubOrgClient } {
  const http = new GitHubHttpClient({ token: 'test-token', fetch, sleep: noSleep });
  return { http, client: new GitHubOrgClient(http, 'acme') };
}

describe('TeamCache', () => {
  it('rejects a second write to the same team', () => {
    const cache = new TeamCache();
    cache.set('backend', new Set(['alice']), []);

    expect(() => cache.set('backend', new Set(), [])).toThrow('Team cache entry already written: backend');
  });

  it('answers membership for unknown teams as false', () => {
    const cache = new TeamCache();

    expect(cache.isMember('nope', 'alice')).toBe(false);
    expect(cache.repositoriesOf('nope')).toEqual([]);
    expect(cache.membersOf('nope').size).toBe(0);
  });

  it('totals memberships and repository assignments', () => {
    const cache = new TeamCache();
    cache.set('a', new Set(['alice', 'bob']), ['acme/one']);
    cache.set('b', new Set(['alice']), ['acme/one', 'acme/two']);

    expect(cache.totals()).toEqual({ memberships: 3, repositoryAssignments: 3 });
  });
});

describe('buildTeamCache', () => {
  let github: FakeGitHub;

  beforeEach(() => {
    github = new FakeGitHub();
  });

  it('stores members and repositories for every team, including empty ones', async () => {
    github
      .list('/orgs/acme/teams/backend/members', [
        { login: 'alice', id: 1 },
        { login: 'carol', id: 3 },
      ])
      .list('/orgs/acme/teams/backend/repos', [{ full_name: 'acme/api' }, { full_name: 'acme/worker' }])
      .list('/orgs/acme/teams/empty/members', [])
      .list('/orgs/acme/teams/empty/repos', []);
    const { client } = createClient(github.fetch);

    const cache = await buildTeamCache([team('backend'), team('empty')], client, 2);

    expect(cache.size).toBe(2);
    expect([...cache.membersOf('backend')]).toEqual(['alice', 'carol']);
    expect(cache.repositoriesOf('backend')).toEqual(['acme/api', 'acme/worker']);
    expect(cache.has('empty')).toBe(true);
    expect(cache.membersOf('empty').size).toBe(0);
    expect(cache.repositoriesOf('empty')).toEqual([]);
  });

  it('records an empty repository list when the repos endpoint answers 404', async () => {
    github
      .list('/orgs/acme/teams/backend/members', [{ login: 'alice', id: 1 }])
      .list('/orgs/acme/teams/frontend/members', [{ login: 'bob', id: 2 }])
      .list('/orgs/acme/teams/frontend/repos', [{ full_name: 'acme/web' }]);
    const { client } = createClient(github.fetch);

    const cache = await buildTeamCache([team('backend'), team('frontend')], client, 2);

    expect(cache.repositoriesOf('backend')).toEqual([]);
    expect(cache.isMember('backend', 'alice')).toBe(true);
    expect(cache.repositoriesOf('frontend')).toEqual(['acme/web']);
  });

  it('falls back to an empty entry when a team fails, without stopping the others', async () => {
    github
      .fail('/orgs/acme/teams/broken/members')
      .list('/orgs/acme/teams/backend/members', [{ login: 'alice', id: 1 }])
      .list('/orgs/acme/teams/backend/repos', [{ full_name: 'acme/api' }]);
    const { client } = createClient(github.fetch);

    const cache = await buildTeamCache([team('broken'), team('backend')], client, 2);

    expect(cache.has('broken')).toBe(true);
    expect(cache.membersOf('broken').size).toBe(0);
    expect(cache.repositoriesOf('broken')).toEqual([]);
    expect(github.callsTo('/orgs/acme/teams/broken/repos')).toEqual([]);
    expect(cache.isMember('backend', 'alice')).toBe(true);
  });

  it('never runs more than maxWorkers teams at once', async () => {
    const teams = ['a', 'b', 'c', 'd', 'e', 'f'].map((slug) => team(slug));
    let inFlight = 0;
    let peak = 0;
    const fetch: FetchLike = async (input, init) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      try {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return await github.fetch(input, init);
      } finally {
        inFlight--;
      }
    };
    const { http, client } = createClient(fetch);

    const cache = await buildTeamCache(teams, client, 2);

    expect(cache.size).toBe(6);
    expect(peak).toBe(2);
    expect(http.sessionCount).toBe(2);
  });

  it('builds identical contents whatever order the teams finish in', async () => {
    const slugs = ['a', 'b', 'c', 'd'];
    for (const [i, slug] of slugs.entries()) {
      github
        .list(`/orgs/acme/teams/${slug}/members`, [{ login: `user-${i}`, id: i }])
        .list(`/orgs/acme/teams/${slug}/repos`, [{ full_name: `acme/repo-${i}` }]);
    }
    const delayed = (delayFor: (slug: string) => number): FetchLike => async (input, init) => {
      const slug = new URL(input).pathname.split('/')[4];
      await new Promise((resolve) => setTimeout(resolve, delayFor(slug)));
      return github.fetch(input, init);
    };

    const first = await buildTeamCache(
      slugs.map((slug) => team(slug)),
      createClient(delayed((slug) => 2 * (slugs.length - slugs.indexOf(slug)))).client,
      4
    );
    const second = await buildTeamCache(
      slugs.map((slug) => team(slug)),
      createClient(delayed((slug) => 2 * slugs.indexOf(slug))).client,
      4
    );

    const contents = (cache: TeamCache) =>
      cache
        .slugs()
        .sort()
        .map((slug) => [slug, [...cache.membersOf(slug)], cache.repositoriesOf(slug)]);
    expect(contents(first)).toEqual(contents(second));
    expect(contents(first)).toEqual([
      ['a', ['user-0'], ['acme/repo-0']],
      ['b', ['user-1'], ['acme/repo-1']],
      ['c', ['user-2'], ['acme/repo-2']],
      ['d', ['user-3'], ['acme/repo-3']],
    ]);
  });

  it('skips duplicate team slugs', async () => {
    github.list('/orgs/acme/teams/backend/members', [{ login: 'alice', id: 1 }]);
    const { client } = createClient(github.fetch);

    const cache = await buildTeamCache([team('backend'), team('backend', 'Backend again')], client, 2);

    expect(cache.size).toBe(1);
    expect(github.callsTo('/orgs/acme/teams/backend/members')).toHaveLength(1);
  });
});
