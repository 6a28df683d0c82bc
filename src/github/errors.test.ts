import { describe, it, expect } from 'vitest';
import { GitHubApiError, describeGitHubErrorBody, toError } from './errors';

const ORG_URL = 'https://api.github.com/orgs/acme';

describe('GitHubApiError', () => {
  it.each([
    [404, 'isNotFound'],
    [401, 'isUnauthorized'],
    [403, 'isForbidden'],
    [0, 'isNetworkError'],
  ] as const)('classifies %i with %s', (status, predicate) => {
    const error = new GitHubApiError(status, ORG_URL, 'failed');

    expect(error[predicate]()).toBe(true);
    expect(new GitHubApiError(500, ORG_URL, 'failed')[predicate]()).toBe(false);
  });

  it('keeps the response body as details', () => {
    const error = new GitHubApiError(422, ORG_URL, 'failed', { message: 'Validation Failed' });

    expect(error).toMatchObject({
      name: 'GitHubApiError',
      status: 422,
      url: ORG_URL,
      details: { message: 'Validation Failed' },
    });
  });
});

describe('describeGitHubErrorBody', () => {
  it('joins the message with each error entry', () => {
    const body = {
      message: 'Validation Failed',
      errors: [{ message: 'name is taken' }, { resource: 'Team', field: 'slug', code: 'invalid' }],
    };

    expect(describeGitHubErrorBody(422, body)).toBe(
      'GitHub API error (422): Validation Failed - name is taken; Team.slug: invalid'
    );
  });

  it('falls back to the status for a body without a message', () => {
    expect(describeGitHubErrorBody(502, null)).toBe('GitHub API error (502)');
    expect(describeGitHubErrorBody(500, {})).toBe('GitHub API error (500): Unknown error');
  });
});

describe('toError', () => {
  it('wraps non-errors', () => {
    expect(toError('boom')).toEqual(new Error('boom'));
  });
});
