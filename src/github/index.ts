/**
 * GitHub REST modules
 */

export { GitHubApiError, ConfigError, describeGitHubErrorBody, toError } from './errors';
export {
  GitHubHttpClient,
  HttpSession,
  GITHUB_API_BASE_URL,
  DEFAULT_PER_PAGE,
  DEFAULT_USER_AGENT,
  withPageParams,
  sleep,
} from './http-client';
export type { FetchLike, Sleep, GitHubHttpClientOptions, RequestOptions, PaginatedRequestOptions } from './http-client';
export {
  DEFAULT_RETRY_POLICY,
  INITIAL_RETRY_STATE,
  backoffDelayMs,
  rateLimitDelayMs,
  nextRetryState,
  isTerminal,
} from './retry-policy';
export type { RetryPolicy, RetryState, RetryEvent } from './retry-policy';
export { GitHubOrgClient } from './org-client';
export { GitHubAppApiClient } from './app-api-client';
export type { GitHubAppApiClientOptions, TokenValidation, RateLimitInfo } from './app-api-client';
export { generateAppJwt, readPrivateKey, JWT_BACKDATE_SECONDS, JWT_LIFETIME_SECONDS } from './app-jwt';
export type { AppJwtClaims, PrivateKeySource } from './app-jwt';
export type * from './types';
