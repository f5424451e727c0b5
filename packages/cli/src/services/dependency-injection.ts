import { Config, Git, GitHub, Lister, Logger, Sync } from '@repomirror/core';

/**
 * Dependency Injection Service for the repomirror CLI
 *
 * Builds the service graph from a loaded config: Octokit client, repository
 * lister, git updater, sync orchestrator and run loop.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  createConfigManager(configPath: string): Config.ConfigManager {
    return Config.createConfigManager(configPath);
  }

  createLogger(prefix: string, level?: Logger.LogLevel): Logger.Logger {
    return Logger.createLogger(prefix, level);
  }

  /**
   * Warns when the token does not belong to the configured account
   */
  async verifyAccount(config: Config.MirrorConfig, logger: Logger.Logger): Promise<GitHub.AccountCheckResult> {
    const octokit = GitHub.createGitHubClient({ token: config.token, apiUrl: config.apiUrl });
    return GitHub.verifyAccount(octokit, config.account, logger);
  }

  /**
   * Creates a RunLoop with all required dependencies
   */
  createRunLoop(config: Config.MirrorConfig, logLevel?: Logger.LogLevel): Sync.RunLoop {
    const octokit = GitHub.createGitHubClient({ token: config.token, apiUrl: config.apiUrl });

    const lister = new Lister.RepositoryLister({
      octokit,
      affiliation: config.affiliation,
      logger: Logger.createLogger('[RepositoryLister] ', logLevel),
    });

    const updater = new Git.RepoUpdater({
      execCommand: Git.createExecCommand(),
      token: config.token,
      logger: Logger.createLogger('[RepoUpdater] ', logLevel),
    });

    const orchestrator = new Sync.SyncOrchestrator({
      settings: config,
      lister,
      updater,
      logger: Logger.createLogger('[SyncOrchestrator] ', logLevel),
      workerLogger: Logger.createLogger('[WorkerPool] ', logLevel),
    });

    return new Sync.RunLoop({
      orchestrator,
      pollIntervalMs: config.pollIntervalMs,
      logger: Logger.createLogger('[RunLoop] ', logLevel),
    });
  }
}
