/**
 * GitHub REST payloads, reduced to the fields these tools read.
 */

export interface GitHubAccount {
  login: string;
  id: number;
  type?: string;
}

export type GitHubMember = GitHubAccount;

export interface GitHubTeam {
  id?: number;
  name: string;
  slug: string;
  description?: string | null;
  privacy?: string;
}

export interface GitHubRepository {
  name?: string;
  full_name: string;
  private?: boolean;
}

export interface GitHubOrgMembership {
  role?: string;
  state?: string;
}

export interface GitHubTeamMembership {
  role?: string;
  state?: string;
}

export interface GitHubUser {
  login: string;
  id: number;
  email?: string | null;
  name?: string | null;
}

export interface GitHubInstallation {
  id: number;
  account: GitHubAccount | null;
  target_type?: string;
  repository_selection?: string;
  permissions?: Record<string, string>;
  events?: string[];
  created_at?: string;
  updated_at?: string;
}

export interface GitHubApp {
  id: number;
  slug?: string;
  name: string;
  description?: string | null;
  owner?: GitHubAccount | null;
  html_url?: string;
  created_at?: string;
  updated_at?: string;
  permissions?: Record<string, string>;
  events?: string[];
  installations_count?: number;
}

export interface InstallationAccessToken {
  token: string;
  expires_at?: string;
  permissions?: Record<string, string>;
  repository_selection?: string;
}

export interface InstallationRepositories {
  total_count: number;
  repositories: GitHubRepository[];
  error?: string;
}
