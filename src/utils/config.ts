/**
 * Configuration loading for the interview agenda server
 */

import { config as loadEnv } from 'dotenv';
import type {
  CandidateStartMode,
  SchedulingPolicy,
  SearchLimits,
  SelectionStrategy,
  TimeOfDayWindow,
} from '../types/index.js';

// Load environment variables
loadEnv();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Server configuration
 */
export interface ServerConfig {
  name: string;
  version: string;
  logLevel: LogLevel;
}

/**
 * Full application configuration
 */
export interface AppConfig {
  server: ServerConfig;
  /** Default policy; tools may override any field per call */
  policy: SchedulingPolicy;
  limits: SearchLimits;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const SELECTION_STRATEGIES: readonly SelectionStrategy[] = ['spread', 'first-found'];
const CANDIDATE_START_MODES: readonly CandidateStartMode[] = ['block-starts', 'every-quantum'];

/**
 * Get environment variable with default
 */
function getEnv(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

/**
 * Get optional environment variable
 */
function getOptionalEnv(key: string): string | undefined {
  const value = process.env[key];
  return value ? value : undefined;
}

/**
 * Get boolean environment variable
 */
function getBoolEnv(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get number environment variable
 */
function getNumberEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get an environment variable restricted to a set of values
 */
function getChoiceEnv<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const value = process.env[key]?.trim().toLowerCase();
  if (!value) return defaultValue;
  const match = choices.find(choice => choice === value);
  if (!match) {
    console.error(`[interview-agenda] Ignoring ${key}="${value}"; expected one of ${choices.join(', ')}`);
    return defaultValue;
  }
  return match;
}

/**
 * Load working hours only when both ends are configured
 */
function loadWorkingHours(): TimeOfDayWindow | undefined {
  const start = getOptionalEnv('WORKING_HOURS_START');
  const end = getOptionalEnv('WORKING_HOURS_END');
  if (!start || !end) {
    return undefined;
  }
  return { start, end };
}

/**
 * Load full application configuration
 */
export function loadConfig(): AppConfig {
  return {
    server: {
      name: getEnv('MCP_SERVER_NAME', 'interview-agenda'),
      version: getEnv('MCP_SERVER_VERSION', '1.0.0'),
      logLevel: getChoiceEnv('LOG_LEVEL', LOG_LEVELS, 'info'),
    },
    policy: {
      timezone: getEnv('DEFAULT_TIMEZONE', 'America/New_York'),
      gridQuantumMinutes: getNumberEnv('GRID_QUANTUM_MINUTES', 15),
      allowedGapMinutes: getNumberEnv('ALLOWED_GAP_MINUTES', 0),
      maxAgendasPerDay: getNumberEnv('MAX_AGENDAS_PER_DAY', 2),
      lunchAvoidance: getBoolEnv('LUNCH_AVOIDANCE', true),
      lunchWindow: {
        start: getEnv('LUNCH_WINDOW_START', '12:00'),
        end: getEnv('LUNCH_WINDOW_END', '12:30'),
      },
      selectionStrategy: getChoiceEnv('SELECTION_STRATEGY', SELECTION_STRATEGIES, 'spread'),
      candidateStarts: getChoiceEnv('CANDIDATE_STARTS', CANDIDATE_START_MODES, 'block-starts'),
      workingHours: loadWorkingHours(),
    },
    limits: {
      maxInterviewers: getNumberEnv('SEARCH_MAX_INTERVIEWERS', 8),
      warnInterviewers: getNumberEnv('SEARCH_WARN_INTERVIEWERS', 6),
      timeoutMs: getNumberEnv('SEARCH_TIMEOUT_MS', 10000),
    },
  };
}

/**
 * Singleton configuration instance
 */
let configInstance: AppConfig | null = null;

/**
 * Get configuration (loads once)
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
