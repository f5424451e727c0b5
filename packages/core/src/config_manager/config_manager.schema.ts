import { LOG_LEVELS } from '../logger/logger';

const AFFILIATION = '(owner|collaborator|organization_member)';

/**
 * JSON Schema for the YAML config file.
 */
export const mirrorConfigSchema = {
  type: 'object',
  properties: {
    github_token: { type: 'string' },
    github_user: { type: 'string', minLength: 1 },
    repos_dir: { type: 'string', minLength: 1 },
    poll_interval: { type: 'string', minLength: 1 },
    worker_count: { type: 'integer', minimum: 1 },
    queue_size: { type: 'integer', minimum: 1 },
    rate_limit_per_second: { type: 'number', exclusiveMinimum: 0 },
    affiliation: { type: 'string', pattern: `^${AFFILIATION}(,${AFFILIATION})*$` },
    api_url: { type: 'string', format: 'uri' },
    log_level: { type: 'string', enum: [...LOG_LEVELS] },
  },
  required: ['github_user', 'repos_dir', 'poll_interval'],
  additionalProperties: false,
} as const;
