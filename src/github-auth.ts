import { AppCredentials, config } from './config';
import { Logger } from './logger';
import {
  GitHubApp,
  GitHubAppApiClient,
  GitHubInstallation,
  InstallationAccessToken,
  InstallationRepositories,
  generateAppJwt,
  readPrivateKey,
} from './github';
import { FetchLike } from './github/http-client';

const logger = new Logger('GitHubAuth');

export interface GitHubAppConfig {
  appId: number;
  /** PEM text */
  privateKey: string;
}

export interface GitHubAppAuthOptions {
  apiClient?: GitHubAppApiClient;
  /** Clock used for JWT claims */
  now?: () => Date;
}

export interface AppAnalysis {
  app: GitHubApp;
  installations: GitHubInstallation[];
  /** Keyed by installation id */
  repositories: Record<number, InstallationRepositories>;
}

/**
 * GitHubAppAuth - Facade over JWT signing and the app REST endpoints.
 * Every call signs a fresh JWT; nothing is cached between calls.
 */
export class GitHubAppAuth {
  private apiClient: GitHubAppApiClient;
  private now: () => Date;

  constructor(
    private appConfig: GitHubAppConfig,
    options: GitHubAppAuthOptions = {}
  ) {
    this.apiClient = options.apiClient || new GitHubAppApiClient();
    this.now = options.now || (() => new Date());
  }

  /**
   * Build from resolved credentials, reading the key file when one is given.
   */
  static fromCredentials(
    credentials: AppCredentials,
    options: GitHubAppAuthOptions & { fetch?: FetchLike } = {}
  ): GitHubAppAuth {
    const privateKey = readPrivateKey({ path: credentials.privateKeyPath, content: credentials.privateKey });
    const apiClient =
      options.apiClient ||
      new GitHubAppApiClient({
        baseUrl: config.github.apiBaseUrl,
        timeoutMs: config.timeoutMs,
        fetch: options.fetch,
      });
    return new GitHubAppAuth({ appId: credentials.appId, privateKey }, { ...options, apiClient });
  }

  /**
   * Get JWT for GitHub App authentication
   */
  getAppJwt(): string {
    return generateAppJwt(this.appConfig.appId, this.appConfig.privateKey, this.now());
  }

  /**
   * List all installations for the GitHub App
   */
  async listInstallations(): Promise<GitHubInstallation[]> {
    return this.apiClient.listInstallations(this.getAppJwt());
  }

  /**
   * Installation whose account login matches `orgName`, ignoring case
   */
  async findInstallationForOrg(orgName: string): Promise<GitHubInstallation | undefined> {
    const wanted = orgName.toLowerCase();
    const installations = await this.listInstallations();
    return installations.find((installation) => installation.account?.login.toLowerCase() === wanted);
  }

  async getInstallationToken(installationId: number): Promise<InstallationAccessToken> {
    if (!Number.isInteger(installationId) || installationId <= 0) {
      throw new Error(`Invalid installation ID: ${installationId}`);
    }
    return this.apiClient.createInstallationToken(this.getAppJwt(), installationId);
  }

  async getOrgToken(orgName: string): Promise<InstallationAccessToken> {
    const installation = await this.findInstallationForOrg(orgName);
    if (!installation) {
      throw new Error(`No installation found for organization: ${orgName}`);
    }
    logger.info(`Using installation ${installation.id} for organization '${orgName}'`);
    return this.apiClient.createInstallationToken(this.getAppJwt(), installation.id);
  }

  /**
   * App details, its installations and the repositories each can reach.
   * A failed repository lookup is recorded on that installation only.
   */
  async analyze(): Promise<AppAnalysis> {
    const jwt = this.getAppJwt();
    const app = await this.apiClient.getApp(jwt);
    const installations = await this.apiClient.listInstallations(jwt);

    const repositories: Record<number, InstallationRepositories> = {};
    for (const installation of installations) {
      const result = await this.apiClient.getInstallationRepositories(jwt, installation.id);
      if (result.error) {
        logger.warn(`Could not fetch repos for installation ${installation.id}: ${result.error}`);
      }
      repositories[installation.id] = result;
    }

    return { app, installations, repositories };
  }
}
