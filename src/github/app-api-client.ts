import { Logger } from '../logger';
import { GitHubApiError, describeGitHubErrorBody, toError } from './errors';
import { DEFAULT_USER_AGENT, FetchLike, GITHUB_API_BASE_URL } from './http-client';
import { GitHubApp, GitHubInstallation, InstallationAccessToken, InstallationRepositories } from './types';

const logger = new Logger('GitHubAppApiClient');

export interface GitHubAppApiClientOptions {
  baseUrl?: string;
  /** Per-request timeout (default: 30000) */
  timeoutMs?: number;
  userAgent?: string;
  fetch?: FetchLike;
}

export interface RateLimitInfo {
  remaining: string | null;
  limit: string | null;
  reset: string | null;
}

export type TokenValidation =
  | {
      valid: true;
      type: string;
      repositories_count: number;
      scopes: string[];
      rate_limit: RateLimitInfo;
    }
  | { valid: false; status_code: number; reason: string }
  | { valid: false; error: string };

/** Authorization for the /app endpoints (JWT) or installation endpoints (token) */
type Credential = { kind: 'jwt'; jwt: string } | { kind: 'token'; token: string };

const VALIDATION_REASONS: Record<number, string> = {
  401: 'Invalid or expired token',
  403: 'Insufficient permissions',
};

/**
 * REST calls made as a GitHub App or with one of its installation tokens.
 * No retries: each call is a single interactive request.
 */
export class GitHubAppApiClient {
  private baseUrl: string;
  private timeoutMs: number;
  private userAgent: string;
  private fetchImpl: FetchLike;

  constructor(options: GitHubAppApiClientOptions = {}) {
    this.baseUrl = (options.baseUrl || GITHUB_API_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs || 30000;
    this.userAgent = options.userAgent || DEFAULT_USER_AGENT;
    this.fetchImpl = options.fetch || ((input, init) => fetch(input, init));
  }

  async listInstallations(jwt: string): Promise<GitHubInstallation[]> {
    logger.debug('Fetching GitHub App installations');
    const installations: GitHubInstallation[] = [];
    for (let page = 1; ; page++) {
      const batch = await this.requestJson<GitHubInstallation[]>(
        'GET',
        `/app/installations?per_page=100&page=${page}`,
        { kind: 'jwt', jwt }
      );
      if (!Array.isArray(batch)) {
        throw new GitHubApiError(200, this.url('/app/installations'), 'Expected a JSON array of installations');
      }
      installations.push(...batch);
      if (batch.length < 100) {
        break;
      }
    }
    logger.info(`Found ${installations.length} installations`);
    return installations;
  }

  async createInstallationToken(jwt: string, installationId: number): Promise<InstallationAccessToken> {
    logger.debug(`Requesting access token for installation ID: ${installationId}`);
    const body = await this.requestJson<Partial<InstallationAccessToken>>(
      'POST',
      `/app/installations/${installationId}/access_tokens`,
      { kind: 'jwt', jwt }
    );
    if (!body || typeof body.token !== 'string' || !body.token) {
      throw new Error('Invalid response: token not found in response');
    }
    logger.info(`Obtained access token for installation: ${installationId}`);
    return { ...body, token: body.token };
  }

  async getApp(jwt: string): Promise<GitHubApp> {
    logger.debug('Fetching GitHub App information');
    return this.requestJson<GitHubApp>('GET', '/app', { kind: 'jwt', jwt });
  }

  /**
   * Repositories the installation can reach. Never rejects: a failure is
   * reported in `error` with an empty list.
   */
  async getInstallationRepositories(jwt: string, installationId: number): Promise<InstallationRepositories> {
    try {
      const { token } = await this.createInstallationToken(jwt, installationId);
      logger.debug(`Fetching repositories for installation: ${installationId}`);
      return await this.requestJson<InstallationRepositories>('GET', '/installation/repositories?per_page=100', {
        kind: 'token',
        token,
      });
    } catch (error) {
      const message = toError(error).message;
      logger.error(`Error fetching repositories for installation ${installationId}`, error);
      return { total_count: 0, repositories: [], error: message };
    }
  }

  /**
   * Check an installation token against /installation/repositories.
   */
  async validateToken(token: string): Promise<TokenValidation> {
    logger.debug('Validating GitHub App installation token');
    let response: Response;
    try {
      response = await this.send('GET', '/installation/repositories', { kind: 'token', token });
    } catch (error) {
      logger.error('Error validating token', error);
      return { valid: false, error: toError(error).message };
    }

    if (response.status !== 200) {
      return {
        valid: false,
        status_code: response.status,
        reason: VALIDATION_REASONS[response.status] || `HTTP ${response.status}`,
      };
    }

    let totalCount = 0;
    try {
      const body: unknown = JSON.parse(await response.text());
      if (body && typeof body === 'object' && 'total_count' in body && typeof body.total_count === 'number') {
        totalCount = body.total_count;
      }
    } catch (error) {
      return { valid: false, error: `Invalid JSON from GitHub: ${toError(error).message}` };
    }

    const scopesHeader = response.headers.get('x-oauth-scopes');
    return {
      valid: true,
      type: 'GitHub App Installation Token',
      repositories_count: totalCount,
      scopes: scopesHeader ? scopesHeader.split(', ') : [],
      rate_limit: {
        remaining: response.headers.get('x-ratelimit-remaining'),
        limit: response.headers.get('x-ratelimit-limit'),
        reset: response.headers.get('x-ratelimit-reset'),
      },
    };
  }

  /**
   * Revoke an installation token. Resolves false when GitHub no longer knows it.
   */
  async revokeToken(token: string): Promise<boolean> {
    logger.debug('Attempting to revoke installation token');
    const url = this.url('/installation/token');
    const response = await this.send('DELETE', '/installation/token', { kind: 'token', token });

    if (response.status === 404) {
      logger.warn('Token not found or already revoked');
      return false;
    }
    if (!response.ok) {
      const body = await readBody<unknown>(response);
      throw new GitHubApiError(response.status, url, describeGitHubErrorBody(response.status, body), body);
    }

    logger.info('Successfully revoked installation token');
    return true;
  }

  private url(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  private async send(method: string, path: string, credential: Credential): Promise<Response> {
    const url = this.url(path);
    try {
      return await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: credential.kind === 'jwt' ? `Bearer ${credential.jwt}` : `token ${credential.token}`,
          Accept: 'application/vnd.github.v3+json',
          'X-GitHub-Api-Version': '2022-11-28',
          'User-Agent': this.userAgent,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new GitHubApiError(0, url, `GitHub API request failed: ${toError(error).message}`);
    }
  }

  private async requestJson<T>(method: string, path: string, credential: Credential): Promise<T> {
    const response = await this.send(method, path, credential);
    const url = this.url(path);
    const body = await readBody<T>(response);

    if (!response.ok) {
      const error = new GitHubApiError(response.status, url, describeGitHubErrorBody(response.status, body), body);
      logger.error(`HTTP error on ${method} ${path}`, error);
      throw error;
    }
    if (body === null) {
      throw new GitHubApiError(response.status, url, `Empty response from ${url}`);
    }
    return body;
  }
}

/**
 * Parsed JSON body; null when empty or not JSON
 */
async function readBody<T>(response: Response): Promise<T | null> {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
