/**
 * ConfigManager - Mirror Configuration Loader
 *
 * Reads the YAML config file, validates it against the config schema and
 * produces the frozen MirrorConfig handed to every component. There is no
 * process-wide config: callers pass the value along explicitly.
 *
 * @module config_manager
 */

import Ajv from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { parseDuration } from '../utils/duration';
import { ConfigError } from './config_manager.errors';
import { mirrorConfigSchema } from './config_manager.schema';
import {
  DEFAULT_API_URL,
  DEFAULT_CONFIG_PATH,
  DEFAULT_QUEUE_SIZE,
  DEFAULT_RATE_LIMIT_PER_SECOND,
  DEFAULT_WORKER_COUNT,
} from './config_manager.types';
import type { MirrorConfig, MirrorConfigFile, RepositoryAffiliation } from './config_manager.types';

function isAffiliation(value: string): value is RepositoryAffiliation {
  return value === 'owner' || value === 'collaborator' || value === 'organization_member';
}

function formatIssue(error: ErrorObject): string {
  const location = error.instancePath ? `${error.instancePath.slice(1).replace(/\//g, '.')} ` : '';
  const extra: unknown = error.params['additionalProperty'];
  const suffix = typeof extra === 'string' ? ` (${extra})` : '';
  return `${location}${error.message ?? 'is invalid'}${suffix}`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * const configManager = new ConfigManager('/etc/repomirror/config.yaml');
 * const config = await configManager.loadConfig();
 * ```
 */
export class ConfigManager {
  private static validator: ValidateFunction<MirrorConfigFile> | null = null;

  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(configPath: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = path.resolve(configPath);
    this.env = env;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Reads and parses the config file.
   *
   * @throws ConfigError when the file cannot be read or is invalid
   */
  async loadConfig(): Promise<MirrorConfig> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      throw new ConfigError(`Cannot read config file ${this.configPath}`, this.configPath, [describeError(error)]);
    }

    return this.parseConfig(content);
  }

  /**
   * Parses YAML content as if it had been read from the config path.
   * Relative `repos_dir` values resolve against the config file's directory.
   */
  parseConfig(content: string): MirrorConfig {
    let raw: unknown;
    try {
      raw = yaml.load(content);
    } catch (error) {
      throw new ConfigError(`Invalid YAML in ${this.configPath}`, this.configPath, [describeError(error)]);
    }

    const validate = ConfigManager.getValidator();
    if (!validate(raw)) {
      const issues = (validate.errors ?? []).map(formatIssue);
      throw new ConfigError(`Invalid config file ${this.configPath}`, this.configPath, issues);
    }

    const issues: string[] = [];

    const token = raw.github_token ?? this.env['GITHUB_TOKEN'] ?? '';
    if (token === '') {
      issues.push('github_token is required (or set GITHUB_TOKEN)');
    }

    let pollIntervalMs = 0;
    try {
      pollIntervalMs = parseDuration(raw.poll_interval);
      if (pollIntervalMs <= 0) {
        issues.push('poll_interval must be greater than zero');
      }
    } catch (error) {
      issues.push(`poll_interval: ${describeError(error)}`);
    }

    if (issues.length > 0) {
      throw new ConfigError(`Invalid config file ${this.configPath}`, this.configPath, issues);
    }

    const affiliation = (raw.affiliation ?? 'owner').split(',').filter(isAffiliation);

    return Object.freeze({
      token,
      account: raw.github_user,
      reposDir: this.resolveReposDir(raw.repos_dir),
      pollIntervalMs,
      workerCount: raw.worker_count ?? DEFAULT_WORKER_COUNT,
      queueSize: raw.queue_size ?? DEFAULT_QUEUE_SIZE,
      rateLimitPerSecond: raw.rate_limit_per_second ?? DEFAULT_RATE_LIMIT_PER_SECOND,
      affiliation: Object.freeze(affiliation),
      apiUrl: (raw.api_url ?? DEFAULT_API_URL).replace(/\/+$/, ''),
      logLevel: raw.log_level,
    });
  }

  private resolveReposDir(reposDir: string): string {
    if (reposDir === '~' || reposDir.startsWith('~/')) {
      return path.join(os.homedir(), reposDir.slice(1));
    }
    return path.resolve(path.dirname(this.configPath), reposDir);
  }

  private static getValidator(): ValidateFunction<MirrorConfigFile> {
    if (!this.validator) {
      const ajv = new Ajv({ allErrors: true });
      addFormats(ajv);
      this.validator = ajv.compile<MirrorConfigFile>(mirrorConfigSchema);
    }
    return this.validator;
  }
}

/**
 * Create a ConfigManager for the given config file path
 */
export function createConfigManager(configPath?: string): ConfigManager {
  return new ConfigManager(configPath);
}
