export * from './github';
export * from './export';
export { Logger } from './logger';
export {
  config,
  createBackupConfig,
  resolveAppCredentials,
  runPreflightChecks,
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_WORKERS,
} from './config';
export type { BackupConfig, BackupConfigInput, AppCredentials, AppCredentialInput, PreflightResult } from './config';
export { GitHubAppAuth } from './github-auth';
export type { GitHubAppConfig, GitHubAppAuthOptions, AppAnalysis } from './github-auth';
export { TeamsBackup, partitionIntoBatches, describeFatalError } from './backup/teams-backup';
export { TeamCache, buildTeamCache, fetchTeamEntry, uniqueBySlug } from './backup/team-cache';
export type { ReadonlyTeamCache } from './backup/team-cache';
export { enrichUser, DEFAULT_ORG_ROLE } from './backup/user-enrichment';
export { resolveUserTeams } from './backup/user-team-resolver';
export type { TeamMembershipMismatch } from './backup/user-team-resolver';
export { BACKUP_TYPE, summarize } from './backup/models';
export type { OrganizationBackup, UserAccess, TeamAccess, TeamRole, BackupSummary } from './backup/models';
export { ConsoleFormatter } from './formatters/console-formatter';
