/**
 * @module @bbo-plugin/runtime/config/runner-config
 * Runner configuration from environment variables
 */

import { z } from 'zod';
import { ConfigError } from '@bbo-plugin/contracts';
import { formatIssues } from '@bbo-plugin/protocol';
import type { LogFormat, LogThreshold } from '../logging.js';

export interface RunnerConfig {
  logLevel: LogThreshold;
  logFormat: LogFormat;
}

export const DEFAULT_RUNNER_CONFIG: RunnerConfig = {
  logLevel: 'warn',
  logFormat: 'text',
};

export const ENV_LOG_LEVEL = 'BBO_PLUGIN_LOG_LEVEL';
export const ENV_LOG_FORMAT = 'BBO_PLUGIN_LOG_FORMAT';

// Unset and blank values fall back to the default; matching is case-insensitive
const normalized = (value: unknown): unknown => {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed.toLowerCase();
};

const runnerEnvSchema = z.object({
  [ENV_LOG_LEVEL]: z.preprocess(
    normalized,
    z.enum(['debug', 'info', 'warn', 'error', 'silent']).default(DEFAULT_RUNNER_CONFIG.logLevel)
  ),
  [ENV_LOG_FORMAT]: z.preprocess(
    normalized,
    z.enum(['text', 'json']).default(DEFAULT_RUNNER_CONFIG.logFormat)
  ),
});

/**
 * Read runner configuration.
 *
 * @throws ConfigError when a variable holds an unsupported value
 */
export function loadRunnerConfig(env: Record<string, string | undefined> = process.env): RunnerConfig {
  const result = runnerEnvSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError('Invalid solver plugin configuration', {
      issues: formatIssues(result.error),
    });
  }

  return {
    logLevel: result.data[ENV_LOG_LEVEL],
    logFormat: result.data[ENV_LOG_FORMAT],
  };
}
