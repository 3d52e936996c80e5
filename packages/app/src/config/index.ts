/**
 * Configuration loading and management
 */

import { ConfigError } from '@yieldwatch/contracts';
import { configSchema, envMapping, type Config } from './schema.js';

type RawValue = string | number | boolean;
interface RawConfig {
  [key: string]: RawValue | RawConfig;
}

/**
 * Values given on the command line; they win over the environment.
 */
export interface ConfigOverrides {
  reportPath?: string;
  ledgerPath?: string;
  minDividendYieldPct?: number;
  dryRun?: boolean;
  verbose?: boolean;
}

function overrideEntries(overrides: ConfigOverrides): Array<[string, RawValue | undefined]> {
  return [
    ['scan.reportPath', overrides.reportPath],
    ['monitor.ledgerPath', overrides.ledgerPath],
    ['scan.minDividendYieldPct', overrides.minDividendYieldPct],
    ['app.dryRun', overrides.dryRun],
    ['app.verbose', overrides.verbose],
  ];
}

/**
 * Load configuration from environment, overrides and defaults.
 *
 * Empty environment variables count as unset.
 *
 * @throws {ConfigError} Listing every invalid path
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): Config {
  const raw: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') {
      setNestedProperty(raw, configPath, value.trim());
    }
  }

  for (const [configPath, value] of overrideEntries(overrides)) {
    if (value !== undefined) {
      setNestedProperty(raw, configPath, value);
    }
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }

  const config = result.data;
  if (config.scan.macd.fast >= config.scan.macd.slow) {
    const issue = `scan.macd: fast span (${config.scan.macd.fast}) must be below slow span (${config.scan.macd.slow})`;
    throw new ConfigError(`Configuration validation failed:\n${issue}`, { issues: [issue] });
  }

  return config;
}

/**
 * The notification base URL, required by the monitor.
 *
 * @throws {ConfigError} When NOTIFY_URL is not set
 */
export function requireNotifyUrl(config: Config): string {
  if (config.notify.baseUrl === undefined) {
    throw new ConfigError('NOTIFY_URL must be set to run the monitor', { issues: ['notify.baseUrl: Required'] });
  }
  return config.notify.baseUrl;
}

/**
 * Set nested property in object
 */
function setNestedProperty(target: RawConfig, path: string, value: RawValue): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (lastKey === undefined) {
    return;
  }

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (typeof next === 'object') {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }
  current[lastKey] = value;
}

/**
 * Get configuration summary for logging. The notification URL is left out
 * because it may carry credentials.
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    dryRun: config.app.dryRun,
    reportPath: config.scan.reportPath,
    ledgerPath: config.monitor.ledgerPath,
    minDividendYieldPct: config.scan.minDividendYieldPct,
    cooldownMinutes: config.monitor.cooldownMinutes,
    notify: config.notify.baseUrl === undefined ? 'unset' : 'configured',
    logging: {
      level: config.logging.level,
      format: config.logging.format,
    },
  };
}

// Re-export types
export type { Config } from './schema.js';
export { configSchema } from './schema.js';
