import throat from 'throat';
import { Logger } from '../logger';
import { GitHubApiError, describeGitHubErrorBody, toError } from './errors';
import {
  DEFAULT_RETRY_POLICY,
  INITIAL_RETRY_STATE,
  RetryEvent,
  RetryPolicy,
  RetryState,
  nextRetryState,
  rateLimitDelayMs,
} from './retry-policy';

const logger = new Logger('GitHubHttpClient');

export const GITHUB_API_BASE_URL = 'https://api.github.com';
export const DEFAULT_USER_AGENT = 'gh-org-tools/1.0';
export const DEFAULT_PER_PAGE = 100;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
export type Sleep = (ms: number) => Promise<void>;

export interface GitHubHttpClientOptions {
  /** Personal access token or installation token */
  token: string;
  userAgent?: string;
  /** Per-request timeout (default: 30000) */
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  /** Custom fetch implementation */
  fetch?: FetchLike;
  /** Wall clock in epoch milliseconds */
  clock?: () => number;
  sleep?: Sleep;
}

export interface RequestOptions {
  /** Treat 404 as "no data" instead of an error */
  silentNotFound?: boolean;
  /** Pool worker slot issuing the call; selects the session */
  worker?: number;
}

export interface PaginatedRequestOptions extends RequestOptions {
  perPage?: number;
}

type AttemptResult<T> = { type: 'success'; body: T | null } | Exclude<RetryEvent, { type: 'success' | 'waited' }>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Connection context owned by exactly one pool worker.
 * Created lazily the first time that worker issues a request.
 */
export class HttpSession {
  readonly headers: Readonly<Record<string, string>>;
  requestCount = 0;

  constructor(
    readonly worker: number,
    token: string,
    userAgent: string
  ) {
    this.headers = {
      Authorization: `token ${token}`,
      Accept: 'application/vnd.github.v3+json',
      'X-GitHub-Api-Version': '2022-11-28',
      'User-Agent': userAgent,
    };
  }
}

/**
 * GitHub REST client with per-worker sessions, rate-limit waits and bounded retries.
 */
export class GitHubHttpClient {
  private sessions = new Map<number, HttpSession>();
  private rateLimitLock = throat(1);
  private fetchImpl: FetchLike;
  private clock: () => number;
  private sleep: Sleep;
  private policy: RetryPolicy;
  private timeoutMs: number;
  private userAgent: string;

  constructor(private options: GitHubHttpClientOptions) {
    this.fetchImpl = options.fetch || ((input, init) => fetch(input, init));
    this.clock = options.clock || Date.now;
    this.sleep = options.sleep || sleep;
    this.policy = options.retryPolicy || DEFAULT_RETRY_POLICY;
    this.timeoutMs = options.timeoutMs || 30000;
    this.userAgent = options.userAgent || DEFAULT_USER_AGENT;
  }

  /**
   * Session for a worker slot, created on first use
   */
  getSession(worker: number = 0): HttpSession {
    let session = this.sessions.get(worker);
    if (!session) {
      session = new HttpSession(worker, this.options.token, this.userAgent);
      this.sessions.set(worker, session);
      logger.debug('Created HTTP session', { worker });
    }
    return session;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /**
   * GET a URL and return its JSON body.
   * Resolves null for a 404 when `silentNotFound` is set.
   */
  async request<T>(url: string, options: RequestOptions = {}): Promise<T | null> {
    const session = this.getSession(options.worker);
    let state: RetryState = INITIAL_RETRY_STATE;
    let body: T | null = null;

    for (;;) {
      switch (state.kind) {
        case 'succeeded':
          return body;

        case 'failed':
          logger.debug('Request failed after retries', { url, attempts: state.attempt });
          throw state.error;

        case 'backoff':
          logger.debug('Retrying request', { url, attempt: state.attempt + 1, delayMs: state.delayMs });
          await this.sleep(state.delayMs);
          state = nextRetryState(state, { type: 'waited' }, this.policy);
          break;

        case 'rate-limited':
          await this.waitForRateLimit(state.delayMs);
          state = nextRetryState(state, { type: 'waited' }, this.policy);
          break;

        case 'attempting': {
          const result = await this.attempt<T>(session, url, options.silentNotFound === true);
          if (result.type === 'success') {
            body = result.body;
          }
          state = nextRetryState(state, result, this.policy);
          break;
        }
      }
    }
  }

  /**
   * Fetch every page of a list endpoint, in API order.
   * Stops on an empty page or one shorter than `perPage`.
   */
  async paginatedRequest<T>(url: string, options: PaginatedRequestOptions = {}): Promise<T[]> {
    const perPage = options.perPage || DEFAULT_PER_PAGE;
    const items: T[] = [];
    let page = 1;

    for (;;) {
      const pageItems = await this.request<T[]>(withPageParams(url, perPage, page), options);
      if (!pageItems) {
        break;
      }
      if (!Array.isArray(pageItems)) {
        throw new GitHubApiError(200, url, `Expected a JSON array from ${url}`, pageItems);
      }
      if (pageItems.length === 0) {
        break;
      }

      items.push(...pageItems);
      if (pageItems.length < perPage) {
        break;
      }

      page++;
      if (page % 5 === 0) {
        logger.info(`Fetched page ${page - 1}, total items so far: ${items.length}`);
      }
    }

    return items;
  }

  private async attempt<T>(session: HttpSession, url: string, silentNotFound: boolean): Promise<AttemptResult<T>> {
    let response: Response;
    try {
      session.requestCount++;
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: session.headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = `GitHub API request failed: ${toError(error).message}`;
      return { type: 'error', error: new GitHubApiError(0, url, message) };
    }

    if (response.status === 403) {
      const remaining = response.headers.get('x-ratelimit-remaining');
      if (remaining !== null && Number(remaining) === 0) {
        const reset = Number(response.headers.get('x-ratelimit-reset') || 0);
        return { type: 'rate-limited', delayMs: rateLimitDelayMs(reset, this.clock(), this.policy) };
      }
    }

    if (response.status === 404 && silentNotFound) {
      return { type: 'success', body: null };
    }

    let body: T | null;
    try {
      body = await readJson(response);
    } catch (error) {
      const message = `Invalid JSON from GitHub (${response.status}): ${toError(error).message}`;
      return { type: 'error', error: new GitHubApiError(response.status, url, message) };
    }

    if (!response.ok) {
      const message = describeGitHubErrorBody(response.status, body);
      return { type: 'error', error: new GitHubApiError(response.status, url, message, body) };
    }

    return { type: 'success', body };
  }

  /**
   * Rate-limit waits are serialized so one worker at a time logs and sleeps.
   */
  private async waitForRateLimit(delayMs: number): Promise<void> {
    await this.rateLimitLock(async () => {
      const seconds = Math.round(delayMs / 1000);
      logger.warn(`Rate limit hit. Sleeping for ${Math.floor(seconds / 60)} minutes...`, { seconds });
      await this.sleep(delayMs);
    });
  }
}

export function withPageParams(url: string, perPage: number, page: number): string {
  const separator = url.includes('?') ? '&' : '?';
  return `${url}${separator}per_page=${perPage}&page=${page}`;
}

async function readJson<T>(response: Response): Promise<T | null> {
  const text = await response.text();
  if (!text) {
    return null;
  }
  return JSON.parse(text);
}
