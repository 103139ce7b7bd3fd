/**
 * Store configuration
 * Fail-closed: invalid environment values throw StoreMisconfiguredError
 */

import { StoreMisconfiguredError } from './errors';
import { LogLevel, isLogLevel } from './logger';

export const MEMORY_PATH = ':memory:';

export interface QcStoreConfig {
  /** SQLite file path, or :memory: */
  path: string;
  /** WAL journal for file databases (default: true) */
  walMode: boolean;
  /** Log every SQL statement at debug level (default: false) */
  echo: boolean;
  /** Milliseconds to wait on a locked database (default: 5000) */
  busyTimeout: number;
  logLevel: LogLevel;
}

export const DEFAULT_STORE_CONFIG: QcStoreConfig = {
  path: MEMORY_PATH,
  walMode: true,
  echo: false,
  busyTimeout: 5000,
  logLevel: 'info',
};

function parseBool(name: string, raw: string | undefined, fallback: boolean): boolean {
  const value = (raw || '').trim().toLowerCase();
  if (!value) return fallback;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new StoreMisconfiguredError(`Invalid ${name}: ${raw} (expected true|false).`);
}

/**
 * Read QCSTORE_* variables.
 * QCSTORE_DB_PATH is required; use ":memory:" for a transient database.
 */
export function loadStoreConfigFromEnv(env: NodeJS.ProcessEnv = process.env): QcStoreConfig {
  const path = (env.QCSTORE_DB_PATH || '').trim();
  if (!path) throw new StoreMisconfiguredError('Missing QCSTORE_DB_PATH.');

  const busyRaw = (env.QCSTORE_BUSY_TIMEOUT_MS || '').trim();
  let busyTimeout = DEFAULT_STORE_CONFIG.busyTimeout;
  if (busyRaw) {
    if (!/^\d+$/.test(busyRaw)) {
      throw new StoreMisconfiguredError(`Invalid QCSTORE_BUSY_TIMEOUT_MS: ${busyRaw} (expected a non-negative integer).`);
    }
    busyTimeout = parseInt(busyRaw, 10);
  }

  const logLevel = (env.QCSTORE_LOG_LEVEL || DEFAULT_STORE_CONFIG.logLevel).trim().toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new StoreMisconfiguredError(`Invalid QCSTORE_LOG_LEVEL: ${logLevel} (expected debug|info|warn|error).`);
  }

  return {
    path,
    walMode: parseBool('QCSTORE_WAL', env.QCSTORE_WAL, DEFAULT_STORE_CONFIG.walMode),
    echo: parseBool('QCSTORE_ECHO', env.QCSTORE_ECHO, DEFAULT_STORE_CONFIG.echo),
    busyTimeout,
    logLevel,
  };
}
