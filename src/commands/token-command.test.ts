import { generateKeyPairSync } from 'crypto';
import { describe, it, expect, beforeEach } from 'vitest';
import { runTokenCommand } from './token-command';
import { GitHubEnvConfig } from '../config';
import { ConsoleFormatter } from '../formatters/console-formatter';
import { FakeGitHub, jsonResponse } from '../test-support/fake-github';

const { privateKey } = generateKeyPairSync('rsa', {
  modulusLength: 2048,
  privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
  publicKeyEncoding: { type: 'spki', format: 'pem' },
});

const env: GitHubEnvConfig = {
  token: '',
  appId: '12345',
  privateKeyPath: '',
  privateKey,
  apiBaseUrl: 'https://api.github.com',
};

describe('runTokenCommand', () => {
  let github: FakeGitHub;
  let output: string[];

  const run = (options: Parameters<typeof runTokenCommand>[0], overrides: Partial<GitHubEnvConfig> = {}) =>
    runTokenCommand(options, {
      formatter: new ConsoleFormatter({ color: false, write: (text) => output.push(text) }),
      fetch: github.fetch,
      env: { ...env, ...overrides },
      now: () => new Date(1_700_000_000_000),
    });

  beforeEach(() => {
    output = [];
    github = new FakeGitHub().list('/app/installations', [
      { id: 7, account: { login: 'acme', id: 70, type: 'Organization' }, target_type: 'Organization' },
    ]);
  });

  it('prints a token for an organization', async () => {
    github.json('/app/installations/7/access_tokens', { token: 'test-installation-token' }, 201, 'POST');

    const code = await run({ org: 'ACME' });

    expect(code).toBe(0);
    expect(output).toEqual(['test-installation-token\n', "✅ Token generated for organization 'ACME'\n"]);
  });

  it('prints a token for an installation id without listing installations', async () => {
    github.json('/app/installations/7/access_tokens', { token: 'test-installation-token' }, 201, 'POST');

    const code = await run({ installationId: 7 });

    expect(code).toBe(0);
    expect(output[0]).toBe('test-installation-token\n');
    expect(github.callsTo('/app/installations')).toEqual([]);
  });

  it('lists installations when no operation is given', async () => {
    const code = await run({});

    expect(code).toBe(0);
    expect(output).toHaveLength(1);
    expect(output[0]).toContain(`${'7'.padEnd(20)} | ${'acme'.padEnd(20)} | ${'Organization'.padEnd(15)}`);
  });

  it('reports an organization without an installation', async () => {
    const code = await run({ org: 'initech' });

    expect(code).toBe(1);
    expect(output).toEqual(['❌ No installation found for organization: initech\n']);
  });

  it('reports missing app credentials', async () => {
    const code = await run({ org: 'acme' }, { appId: '' });

    expect(code).toBe(1);
    expect(output).toEqual([
      '❌ App ID is required for this operation. Set APP_ID environment variable or use --app-id\n',
    ]);
    expect(github.calls).toEqual([]);
  });

  it('validates a token without app credentials', async () => {
    github.on('/installation/repositories', () =>
      jsonResponse({ total_count: 4, repositories: [] }, 200, {
        'X-RateLimit-Remaining': '4999',
        'X-RateLimit-Limit': '5000',
      })
    );

    const code = await run({ validateToken: 'test-token' }, { appId: '', privateKey: '' });

    expect(code).toBe(0);
    expect(output).toEqual([
      'ℹ️  Validating token...\n',
      '✅ Token is valid\nType: GitHub App Installation Token\nAccessible repositories: 4\nRate limit: 4999/5000\n',
    ]);
  });

  it('fails validation of a rejected token', async () => {
    github.json('/installation/repositories', { message: 'Bad credentials' }, 401);

    const code = await run({ validateToken: 'test-token' });

    expect(code).toBe(1);
    expect(output[1]).toBe('❌ Token is invalid\nReason: Invalid or expired token\n');
  });

  it('revokes a token when forced', async () => {
    github.on('/installation/token', () => new Response(null, { status: 204 }), 'DELETE');

    const code = await run({ revokeToken: 'test-token', force: true });

    expect(code).toBe(0);
    expect(output).toEqual([
      'ℹ️  Force mode enabled - Are you sure you want to revoke this token?\n',
      'ℹ️  Revoking token...\n',
      '✅ Token revoked successfully\n',
    ]);
  });

  it('warns when the token to revoke is already gone', async () => {
    const code = await run({ revokeToken: 'test-token', force: true });

    expect(code).toBe(0);
    expect(output[output.length - 1]).toBe('⚠️  Token was already revoked or not found\n');
  });

  it('checks the environment', async () => {
    output = [];
    const code = await runTokenCommand(
      { checkEnv: true },
      {
        formatter: new ConsoleFormatter({ color: false, write: (text) => output.push(text) }),
        processEnv: { APP_ID: 'abc' },
      }
    );

    expect(code).toBe(1);
    expect(output).toEqual([
      '⚠️  PRIVATE_KEY / PRIVATE_KEY_PATH: Not set (token generation needs a private key)\n',
      '⚠️  GITHUB_TOKEN: Not set (teams backup needs --token)\n',
      '❌ APP_ID: Must be a valid number, got "abc"\n',
      '❌ Found 1 configuration error(s)\n',
    ]);
  });
});
