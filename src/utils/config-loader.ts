import { readFileSync } from 'fs';
import logger from './logger.js';
import type { ClientConfig, DeepPartial } from '../types/config.js';

/**
 * Default configuration values
 */
export const defaultConfig: ClientConfig = {
  logLevel: 'info',
  httpTimeoutMs: 10000,
  discovery: {
    intervalMs: 30000,
    livenessIntervals: 3,
    mx: 1,
    describeDevices: true
  },
  callback: {
    port: 3500,
    path: '/notify'
  },
  subscription: {
    timeoutSeconds: 300,
    renewalMarginMs: 30000,
    requestTimeoutMs: 5000,
    maxAttempts: 3,
    initialRetryDelayMs: 1000,
    maxRetryDelayMs: 30000,
    backoffFactor: 2
  },
  topology: {
    graceMs: 30000,
    conflictWindowMs: 10000
  }
};

/**
 * Parse comma-separated environment variable into array
 */
function parseArrayEnv(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

function parseIntEnv(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Result of configuration loading
 */
export interface ConfigLoadResult {
  config: ClientConfig;
  sources: string[];
  envOverrides: string[];
}

export interface LoadConfigurationOptions {
  settingsPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: DeepPartial<ClientConfig>;
}

/**
 * Format the configuration loading info as a message
 */
export function formatConfigInfo(result: ConfigLoadResult): string {
  return result.envOverrides.length > 0
    ? `Configuration loaded from: ${result.sources.join(' → ')} (${result.envOverrides.join(', ')})`
    : `Configuration loaded from: ${result.sources.join(' → ')}`;
}

/**
 * Load configuration from multiple sources with precedence:
 * 1. Default values
 * 2. settings.json (if it exists)
 * 3. Environment variables
 * 4. Explicit overrides passed by the caller
 */
export function loadConfiguration(options: LoadConfigurationOptions = {}): ConfigLoadResult {
  const env = options.env ?? process.env;
  const settingsPath = options.settingsPath ?? './settings.json';
  const sources = ['defaults'];

  let config: ClientConfig = defaultConfig;

  try {
    const settings: unknown = JSON.parse(readFileSync(settingsPath, 'utf-8'));
    if (isObject(settings)) {
      config = mergeConfig(config, settings);
      sources.push(settingsPath);
      logger.debug(`Loaded settings from ${settingsPath}`);
    }
  } catch (_error) {
    // settings.json is optional
    logger.debug(`No usable ${settingsPath}, using defaults`);
  }

  const fromEnv: DeepPartial<ClientConfig> = {
    logLevel: env.LOG_LEVEL,
    debugCategories: parseArrayEnv(env.DEBUG_CATEGORIES),
    httpTimeoutMs: parseIntEnv(env.HTTP_TIMEOUT),
    discovery: {
      intervalMs: parseIntEnv(env.DISCOVERY_INTERVAL),
      livenessIntervals: parseIntEnv(env.DISCOVERY_LIVENESS_INTERVALS)
    },
    callback: {
      host: env.CALLBACK_HOST,
      port: parseIntEnv(env.CALLBACK_PORT)
    },
    subscription: {
      timeoutSeconds: parseIntEnv(env.SUBSCRIPTION_TIMEOUT),
      renewalMarginMs: parseIntEnv(env.SUBSCRIPTION_RENEWAL_MARGIN),
      maxAttempts: parseIntEnv(env.SUBSCRIPTION_MAX_ATTEMPTS)
    },
    topology: {
      graceMs: parseIntEnv(env.TOPOLOGY_GRACE)
    }
  };

  const envOverrides = getEnvironmentOverrides(env);
  config = mergeConfig(config, fromEnv);
  if (envOverrides.length > 0) {
    sources.push('env');
  }

  if (options.overrides) {
    config = mergeConfig(config, options.overrides);
    sources.push('overrides');
  }

  return { config, sources, envOverrides };
}

const ENV_VARS = [
  'LOG_LEVEL', 'DEBUG_CATEGORIES', 'HTTP_TIMEOUT',
  'DISCOVERY_INTERVAL', 'DISCOVERY_LIVENESS_INTERVALS',
  'CALLBACK_HOST', 'CALLBACK_PORT',
  'SUBSCRIPTION_TIMEOUT', 'SUBSCRIPTION_RENEWAL_MARGIN', 'SUBSCRIPTION_MAX_ATTEMPTS',
  'TOPOLOGY_GRACE'
];

/**
 * Get list of environment variables that are overriding config
 */
function getEnvironmentOverrides(env: NodeJS.ProcessEnv): string[] {
  return ENV_VARS.filter(name => env[name] !== undefined && env[name] !== '');
}

/**
 * Deep merge a partial configuration over a complete one. Undefined values
 * in the partial leave the base untouched.
 */
export function mergeConfig(base: ClientConfig, partial: DeepPartial<ClientConfig> | Record<string, unknown>): ClientConfig {
  const merged = deepMerge(base, partial);
  return {
    ...base,
    ...merged,
    discovery: { ...base.discovery, ...pick(merged['discovery']) },
    callback: { ...base.callback, ...pick(merged['callback']) },
    subscription: { ...base.subscription, ...pick(merged['subscription']) },
    topology: { ...base.topology, ...pick(merged['topology']) }
  };
}

function pick(value: unknown): Record<string, unknown> {
  return isObject(value) ? value : {};
}

function deepMerge(target: object, source: object): Record<string, unknown> {
  const output: Record<string, unknown> = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) {
      continue;
    }
    const existing = output[key];
    output[key] = isObject(value) && isObject(existing) ? deepMerge(existing, value) : value;
  }

  return output;
}

/**
 * Check if value is a plain object
 */
function isObject(item: unknown): item is Record<string, unknown> {
  return item !== null && typeof item === 'object' && !Array.isArray(item);
}
