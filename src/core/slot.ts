/**
 * Singleton Slot
 *
 * Design decisions:
 * - One class, behaviour selected by a tagged state; every method switches on
 *   `kind` and the compiler checks the switch is exhaustive
 * - Constructing a registered slot inserts it into its table; the insert
 *   throws on a key that is already taken
 * - getInstance() never waits: it returns or throws immediately
 * - A deferred outcome is captured once and replayed on every read
 */

import { SlotKey, matchesType } from './key.js';
import type { ILogger } from './logger.js';
import { notFound, notYetResolved, typeMismatch } from './errors.js';

export type SlotKind = 'eager' | 'lazy' | 'deferred' | 'unknown';
export type SlotFactory<T> = () => T;

/** ready: instance available · pending: promise not settled · failed: promise rejected · empty: lazy, not created · missing: nothing registered */
export type SlotStatus = 'ready' | 'pending' | 'failed' | 'empty' | 'missing';

export interface SlotDescriptor {
  key: string;
  type: string;
  name?: string;
  kind: SlotKind;
  status: SlotStatus;
}

/** The table a slot lives in */
export interface SlotHost {
  readonly logger: ILogger;
  readonly typeGuard: boolean;
  /** Insert the slot, or throw a conflict if its key is taken */
  claim(slot: Slot<unknown>): void;
  /** Remove the slot if it still owns its key */
  release(slot: Slot<unknown>): boolean;
}

export type Outcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: unknown };

/**
 * Captures the outcome of a promise exactly once. `settled` never rejects:
 * a rejection, or a throw from `accept`, becomes a failed outcome.
 */
export class Settlement<T> {
  readonly settled: Promise<void>;
  private _outcome: Outcome<T> | null = null;
  private readonly _listeners: Array<(outcome: Outcome<unknown>) => void> = [];

  constructor(pending: PromiseLike<T>, accept: (value: T) => Outcome<T>) {
    this.settled = new Promise<T>((resolve, reject) => {
      pending.then(resolve, reject);
    }).then(
      (value) => {
        let outcome: Outcome<T>;
        try {
          outcome = accept(value);
        } catch (reason) {
          outcome = { ok: false, reason };
        }
        this._settle(outcome);
      },
      (reason: unknown) => this._settle({ ok: false, reason })
    );
  }

  get outcome(): Outcome<T> | null {
    return this._outcome;
  }

  /** Called once with the outcome; immediately if it is already known */
  onSettled(listener: (outcome: Outcome<unknown>) => void): void {
    if (this._outcome) {
      listener(this._outcome);
      return;
    }
    this._listeners.push(listener);
  }

  private _settle(outcome: Outcome<T>): void {
    this._outcome = outcome;
    const listeners = this._listeners.splice(0);
    for (const listener of listeners) listener(outcome);
  }
}

type SlotState<T> =
  | { readonly kind: 'eager'; readonly value: T }
  | { readonly kind: 'lazy'; readonly factory: SlotFactory<T>; cached: { readonly value: T } | null }
  | { readonly kind: 'deferred'; readonly settlement: Settlement<T> }
  | { readonly kind: 'unknown' };

function assertNever(state: never): never {
  throw new Error(`Unhandled slot state: ${JSON.stringify(state)}`);
}

export class Slot<T> {
  readonly key: SlotKey<T>;
  private readonly _host: SlotHost | null;
  private readonly _state: SlotState<T>;

  private constructor(host: SlotHost | null, key: SlotKey<T>, state: SlotState<T>) {
    this.key = key;
    this._host = host;
    this._state = state;
    if (host) host.claim(this);
  }

  // =================== Construction ===================

  static eager<T>(host: SlotHost, key: SlotKey<T>, value: T): Slot<T> {
    return new Slot(host, key, { kind: 'eager', value });
  }

  static lazy<T>(host: SlotHost, key: SlotKey<T>, factory: SlotFactory<T>): Slot<T> {
    return new Slot(host, key, { kind: 'lazy', factory, cached: null });
  }

  static deferred<T>(host: SlotHost, key: SlotKey<T>, pending: PromiseLike<T>): Slot<T> {
    const settlement = new Settlement<T>(pending, (value) =>
      host.typeGuard && !matchesType(key.type, value)
        ? { ok: false, reason: typeMismatch(key, value) }
        : { ok: true, value }
    );
    const slot = new Slot(host, key, { kind: 'deferred', settlement });

    settlement.onSettled((outcome) => {
      if (!outcome.ok) {
        host.logger.warn('Deferred singleton failed', { key: key.toString(), error: outcome.reason });
      }
    });
    return slot;
  }

  /** Sentinel for a key with nothing registered, never stored */
  static unknown<T>(key: SlotKey<T>): Slot<T> {
    return new Slot(null, key, { kind: 'unknown' });
  }

  // =================== Access ===================

  get kind(): SlotKind {
    return this._state.kind;
  }

  /** Synchronous access; throws instead of waiting */
  getInstance(): T {
    const state = this._state;
    switch (state.kind) {
      case 'eager':
        return state.value;
      case 'lazy':
        return state.cached ? state.cached.value : this._create(state);
      case 'deferred': {
        const outcome = state.settlement.outcome;
        if (!outcome) throw notYetResolved(this.key);
        if (!outcome.ok) throw outcome.reason;
        return outcome.value;
      }
      case 'unknown':
        throw notFound(this.key);
      default:
        return assertNever(state);
    }
  }

  /** Wait until the instance exists; deferred slots wait for their promise */
  async awaitReady(): Promise<T> {
    const state = this._state;
    if (state.kind === 'deferred') {
      await state.settlement.settled;
    }
    return this.getInstance();
  }

  /** Leave the registry. A lazy slot also forgets its instance */
  deregister(): void {
    const state = this._state;
    switch (state.kind) {
      case 'unknown':
        return;
      case 'lazy':
        state.cached = null;
        this._release();
        return;
      case 'eager':
      case 'deferred':
        // a pending promise keeps running; its outcome stays on this handle
        this._release();
        return;
      default:
        assertNever(state);
    }
  }

  // =================== Diagnostics ===================

  get status(): SlotStatus {
    const state = this._state;
    switch (state.kind) {
      case 'eager':
        return 'ready';
      case 'lazy':
        return state.cached ? 'ready' : 'empty';
      case 'deferred': {
        const outcome = state.settlement.outcome;
        if (!outcome) return 'pending';
        return outcome.ok ? 'ready' : 'failed';
      }
      case 'unknown':
        return 'missing';
      default:
        return assertNever(state);
    }
  }

  describe(): SlotDescriptor {
    const descriptor: SlotDescriptor = {
      key: this.key.toString(),
      type: this.key.typeName,
      kind: this.kind,
      status: this.status,
    };
    if (this.key.name !== undefined) descriptor.name = this.key.name;
    return descriptor;
  }

  toString(): string {
    return `Slot<${this.key.toString()}>(${this.kind}, ${this.status})`;
  }

  private _create(state: { readonly factory: SlotFactory<T>; cached: { readonly value: T } | null }): T {
    const value = state.factory();
    if (this._host && this._host.typeGuard && !matchesType(this.key.type, value)) {
      throw typeMismatch(this.key, value);
    }
    state.cached = { value };
    if (this._host) this._host.logger.debug('Lazy singleton created', { key: this.key.toString() });
    return value;
  }

  private _release(): void {
    if (this._host && this._host.release(this)) {
      this._host.logger.debug('Singleton deregistered', { key: this.key.toString(), kind: this.kind });
    }
  }
}
