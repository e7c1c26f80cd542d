/**
 * Static Registry Configuration
 *
 * Design decisions:
 * - Loaded once per registry, then frozen
 * - Environment variables override defaults, explicit overrides sit in between
 * - Deep freeze to prevent accidental mutation
 * - No external dependencies
 */

import { LogLevel } from './logger.js';

export interface LoggingConfig {
  readonly level: number;
  readonly enabled: boolean;
  readonly timestamp: boolean;
}

export interface RegistryConfig {
  readonly logging: LoggingConfig;
  /** Reject values that are not instances of the class (or fail the token guard) */
  readonly typeGuard: boolean;
}

export interface ConfigOverrides {
  logging?: Partial<LoggingConfig>;
  typeGuard?: boolean;
}

/** Deep freeze an object */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Object.getOwnPropertyNames(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (typeof value === 'object' && value !== null) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/** Get env as integer */
export function envInt(key: string, defaultValue: number): number {
  const val = process.env[key];
  if (val !== undefined) {
    const parsed = parseInt(val, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }
  return defaultValue;
}

/** Get env as boolean */
export function envBool(key: string, defaultValue: boolean): boolean {
  const val = process.env[key];
  if (val !== undefined) {
    return val === 'true' || val === '1' || val === 'yes';
  }
  return defaultValue;
}

export const DEFAULT_CONFIG: RegistryConfig = {
  logging: { level: LogLevel.WARN, enabled: true, timestamp: true },
  typeGuard: true,
};

/**
 * Load configuration: merges defaults with overrides and env vars
 */
export function loadConfig(overrides: ConfigOverrides = {}): Readonly<RegistryConfig> {
  const config: RegistryConfig = {
    logging: {
      level: envInt(
        'SINGLETON_LOG_LEVEL',
        overrides.logging?.level ?? DEFAULT_CONFIG.logging.level
      ),
      enabled: envBool(
        'SINGLETON_LOG_ENABLED',
        overrides.logging?.enabled ?? DEFAULT_CONFIG.logging.enabled
      ),
      timestamp: overrides.logging?.timestamp ?? DEFAULT_CONFIG.logging.timestamp,
    },
    typeGuard: envBool('SINGLETON_TYPE_GUARD', overrides.typeGuard ?? DEFAULT_CONFIG.typeGuard),
  };

  return deepFreeze(config);
}
