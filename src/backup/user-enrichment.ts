import { Logger } from '../logger';
import { GitHubOrgClient } from '../github/org-client';

const logger = new Logger('UserEnrichment');

export const DEFAULT_ORG_ROLE = 'member';

export interface UserDetails {
  role: string;
  email: string | null;
}

/**
 * Organization role and public email for one user. Never rejects: a failed
 * lookup degrades to `{ role: 'member', email: null }`.
 */
export async function enrichUser(client: GitHubOrgClient, username: string): Promise<UserDetails> {
  try {
    const membership = await client.getUserOrgMembership(username);
    const user = await client.getUserDetails(username);

    return {
      role: membership?.role || DEFAULT_ORG_ROLE,
      email: user?.email || null,
    };
  } catch (error) {
    logger.debug('Failed to enrich user, using defaults', { username, error });
    return { role: DEFAULT_ORG_ROLE, email: null };
  }
}
