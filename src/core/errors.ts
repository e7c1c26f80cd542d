/**
 * Registry Errors
 *
 * Design decisions:
 * - Single RegistryError class for every failure the registry raises itself
 * - No stack trace capture in production (configurable via NODE_ENV)
 * - Failures of a deferred value are never wrapped; the rejection reason is rethrown as is
 * - No error class hierarchy; switch on `code`
 */

import type { SlotKey } from './key.js';

export type ErrorCode = 'CONFLICT' | 'NOT_FOUND' | 'NOT_YET_RESOLVED' | 'INVALID_ARGUMENT';

export interface ErrorJson {
  error: string;
  code: ErrorCode;
  details?: Record<string, unknown>;
}

export class RegistryError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown> | null;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RegistryError';
    this.code = code;
    this.details = details || null;

    if (process.env.NODE_ENV === 'production') {
      this.stack = undefined;
    }
  }

  toJSON(): ErrorJson {
    const obj: ErrorJson = { error: this.message, code: this.code };
    if (this.details) obj.details = this.details;
    return obj;
  }
}

export function isRegistryError(err: unknown, code?: ErrorCode): err is RegistryError {
  return err instanceof RegistryError && (code === undefined || err.code === code);
}

function keyDetails(key: SlotKey<unknown>): Record<string, unknown> {
  return key.name === undefined ? { type: key.typeName } : { type: key.typeName, name: key.name };
}

function describeKey(key: SlotKey<unknown>): string {
  return key.name === undefined ? key.typeName : `${key.typeName} with name "${key.name}"`;
}

// =================== Error Factories ===================

export function conflict(key: SlotKey<unknown>): RegistryError {
  return new RegistryError(
    'CONFLICT',
    `Double registration for singleton ${describeKey(key)}`,
    keyDetails(key)
  );
}

export function notFound(key: SlotKey<unknown>): RegistryError {
  return new RegistryError('NOT_FOUND', `Unknown singleton ${describeKey(key)}`, keyDetails(key));
}

export function notYetResolved(key: SlotKey<unknown>): RegistryError {
  return new RegistryError(
    'NOT_YET_RESOLVED',
    `Singleton ${describeKey(key)} is used before being resolved`,
    keyDetails(key)
  );
}

export function invalidArgument(msg: string, details?: Record<string, unknown>): RegistryError {
  return new RegistryError('INVALID_ARGUMENT', msg, details);
}

export function typeMismatch(key: SlotKey<unknown>, value: unknown): RegistryError {
  return invalidArgument(`Value registered for singleton ${describeKey(key)} has the wrong type`, {
    ...keyDetails(key),
    received: describeValue(value),
  });
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') {
    const ctor: unknown = Reflect.getPrototypeOf(value)?.constructor;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  }
  return typeof value;
}
