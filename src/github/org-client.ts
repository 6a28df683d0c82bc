import { GITHUB_API_BASE_URL, GitHubHttpClient } from './http-client';
import {
  GitHubMember,
  GitHubOrgMembership,
  GitHubRepository,
  GitHubTeam,
  GitHubTeamMembership,
  GitHubUser,
} from './types';

/**
 * Organization, team and membership endpoints used by the teams backup.
 * Team and per-user sub-resources treat 404 as "no data".
 */
export class GitHubOrgClient {
  private baseUrl: string;

  constructor(
    private http: GitHubHttpClient,
    readonly org: string,
    baseUrl: string = GITHUB_API_BASE_URL
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  getOrganizationMembers(): Promise<GitHubMember[]> {
    return this.http.paginatedRequest<GitHubMember>(this.orgUrl('/members'));
  }

  getOrganizationTeams(): Promise<GitHubTeam[]> {
    return this.http.paginatedRequest<GitHubTeam>(this.orgUrl('/teams'));
  }

  getTeamMembers(teamSlug: string, worker?: number): Promise<GitHubMember[]> {
    return this.http.paginatedRequest<GitHubMember>(this.orgUrl(`/teams/${seg(teamSlug)}/members`), {
      silentNotFound: true,
      worker,
    });
  }

  getTeamRepositories(teamSlug: string, worker?: number): Promise<GitHubRepository[]> {
    return this.http.paginatedRequest<GitHubRepository>(this.orgUrl(`/teams/${seg(teamSlug)}/repos`), {
      silentNotFound: true,
      worker,
    });
  }

  getUserOrgMembership(username: string): Promise<GitHubOrgMembership | null> {
    return this.http.request<GitHubOrgMembership>(this.orgUrl(`/memberships/${seg(username)}`), {
      silentNotFound: true,
    });
  }

  getUserDetails(username: string): Promise<GitHubUser | null> {
    return this.http.request<GitHubUser>(`${this.baseUrl}/users/${seg(username)}`, { silentNotFound: true });
  }

  getTeamMembership(teamSlug: string, username: string): Promise<GitHubTeamMembership | null> {
    return this.http.request<GitHubTeamMembership>(
      this.orgUrl(`/teams/${seg(teamSlug)}/memberships/${seg(username)}`),
      { silentNotFound: true }
    );
  }

  private orgUrl(path: string): string {
    return `${this.baseUrl}/orgs/${seg(this.org)}${path}`;
  }
}

function seg(value: string): string {
  return encodeURIComponent(value);
}
