import { InvalidConfigurationError, MissingConfigurationError } from './errors';
import { isLogLevel, type LogLevel } from './logger';

export const DEFAULT_DATA_DIR = 'data';
export const DEFAULT_DAYS = 365;
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

export interface TrackerConfig {
  githubToken: string;
  githubUsername: string;
  dataDir: string;
  days: number;
  fetchTimeoutMs: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const REQUIRED_VARS = ['GITHUB_TOKEN', 'GITHUB_USERNAME'] as const;

const readPositiveInt = (env: Env, name: string, fallback: number): number => {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidConfigurationError(name, raw, 'a positive integer');
  }
  return parsed;
};

/**
 * Builds the run configuration from environment variables.
 * Called once at start-up; nothing below the CLI entry reads `process.env`.
 */
export function loadConfig(env: Env = process.env): TrackerConfig {
  const missing = REQUIRED_VARS.filter((name) => !env[name]?.trim());
  if (missing.length > 0) {
    throw new MissingConfigurationError([...missing]);
  }

  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || 'info';
  if (!isLogLevel(logLevel)) {
    throw new InvalidConfigurationError('LOG_LEVEL', logLevel, 'one of debug, info, warn, error');
  }

  return {
    githubToken: env.GITHUB_TOKEN?.trim() ?? '',
    githubUsername: env.GITHUB_USERNAME?.trim() ?? '',
    dataDir: env.TRACKER_DATA_DIR?.trim() || DEFAULT_DATA_DIR,
    days: readPositiveInt(env, 'TRACKER_DAYS', DEFAULT_DAYS),
    fetchTimeoutMs: readPositiveInt(env, 'TRACKER_FETCH_TIMEOUT_MS', DEFAULT_FETCH_TIMEOUT_MS),
    logLevel,
  };
}
