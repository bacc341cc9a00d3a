/**
 * Runtime configuration, read from the environment.
 */

import { setLogLevel, type LogLevel } from './utils/logger';

export interface EngineConfig {
  inventoryApiUrl: string;
  inventoryApiToken: string | null;
  inventoryTimeoutMs: number;
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || '').trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return {
    inventoryApiUrl: (env.INVENTORY_API_URL || 'http://localhost:8000/api').replace(/\/+$/, ''),
    inventoryApiToken: env.INVENTORY_API_TOKEN || null,
    inventoryTimeoutMs: parsePositiveInt(env.INVENTORY_TIMEOUT_MS, 10000),
    logLevel: parseLogLevel(env.FABRIC_LOG_LEVEL),
  };
}

/** Apply the process-wide settings of a config: the log threshold. */
export function configure(config: Pick<EngineConfig, 'logLevel'>): void {
  setLogLevel(config.logLevel);
}
