/**
 * singleton-slots: Public API
 *
 * ESM-only, tree-shakable exports
 *   import { singletons, token } from 'singleton-slots';
 */

// Registry
export { Registry, createRegistry, singletons } from './core/registry.js';
export type { RegistryOptions, Selector, SelectorItem, Selected } from './core/registry.js';

// Slots
export { Slot, Settlement } from './core/slot.js';
export type {
  SlotKind,
  SlotStatus,
  SlotFactory,
  SlotDescriptor,
  SlotHost,
  Outcome,
} from './core/slot.js';

// Keys
export { SlotKey, SlotToken, token, typeName, matchesType, isTypeIdentifier } from './core/key.js';
export type { ClassType, TypeGuard, TypeIdentifier } from './core/key.js';

// Errors
export {
  RegistryError,
  isRegistryError,
  conflict,
  notFound,
  notYetResolved,
  invalidArgument,
  typeMismatch,
} from './core/errors.js';
export type { ErrorCode, ErrorJson } from './core/errors.js';

// Logging
export { Logger, createLogger, noopLogger, LogLevel } from './core/logger.js';
export type { LoggerOptions, ILogger, LogFields } from './core/logger.js';

// Config
export { loadConfig, envInt, envBool, DEFAULT_CONFIG } from './core/config.js';
export type { RegistryConfig, LoggingConfig, ConfigOverrides } from './core/config.js';
