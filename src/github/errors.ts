/**
 * Error raised for a failed GitHub REST call.
 * `status` is 0 when no HTTP response was received (DNS, reset, timeout).
 */
export class GitHubApiError extends Error {
  /** HTTP status code */
  status: number;
  /** Request URL */
  url: string;
  /** Parsed response body, when there was one */
  details?: unknown;

  constructor(status: number, url: string, message: string, details?: unknown) {
    super(message);
    this.name = 'GitHubApiError';
    this.status = status;
    this.url = url;
    this.details = details;
  }

  isNotFound(): boolean {
    return this.status === 404;
  }

  isUnauthorized(): boolean {
    return this.status === 401;
  }

  isForbidden(): boolean {
    return this.status === 403;
  }

  isNetworkError(): boolean {
    return this.status === 0;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build a readable message from a GitHub error body (`message` plus `errors[]`).
 */
export function describeGitHubErrorBody(status: number, body: unknown): string {
  if (!body || typeof body !== 'object') {
    return `GitHub API error (${status})`;
  }

  const message = 'message' in body ? body.message : undefined;
  const errors = 'errors' in body ? body.errors : undefined;

  let text = typeof message === 'string' && message ? message : 'Unknown error';
  if (Array.isArray(errors) && errors.length > 0) {
    const details = errors.map(describeErrorEntry).join('; ');
    text += ` - ${details}`;
  }
  return `GitHub API error (${status}): ${text}`;
}

function describeErrorEntry(entry: unknown): string {
  if (!entry || typeof entry !== 'object') return String(entry);
  const field = (key: string): string => {
    const value: unknown = key in entry ? Reflect.get(entry, key) : undefined;
    return typeof value === 'string' ? value : '';
  };
  return field('message') || `${field('resource')}.${field('field')}: ${field('code')}`;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
