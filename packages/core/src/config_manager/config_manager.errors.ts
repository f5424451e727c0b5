/**
 * Error thrown when the config file is missing, unreadable or invalid.
 * Always fatal at startup.
 */
export class ConfigError extends Error {
  public readonly configPath: string;
  public readonly issues: string[];

  constructor(message: string, configPath: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.configPath = configPath;
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
