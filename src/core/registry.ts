/**
 * Singleton Registry
 *
 * Design decisions:
 * - Map-based storage keyed by type identifier, then by name
 * - Three ways to fill a slot: a value, a promise, or a lazy factory
 * - At most one slot per key; the slot's own construction enforces it
 * - lookup() never throws for a missing key; it hands back an unknown slot
 *   whose accessors do
 * - resetAllForTest() is the only way to empty the table in one call
 */

import { SlotKey, isTypeIdentifier, matchesType } from './key.js';
import type { ClassType, SlotToken, TypeIdentifier } from './key.js';
import { Slot } from './slot.js';
import type { SlotDescriptor, SlotFactory, SlotHost } from './slot.js';
import { conflict, invalidArgument, notFound, typeMismatch } from './errors.js';
import { createLogger, noopLogger } from './logger.js';
import type { ILogger } from './logger.js';
import { loadConfig } from './config.js';
import type { ConfigOverrides, RegistryConfig } from './config.js';

export type SelectorItem = TypeIdentifier<unknown> | SlotKey<unknown> | Slot<unknown>;
export type Selector = SelectorItem | readonly SelectorItem[];

export interface RegistryOptions {
  config?: ConfigOverrides;
  logger?: ILogger;
}

/** Instance type behind a single selector */
export type Selected<S> =
  S extends Slot<infer T>
    ? T
    : S extends SlotKey<infer T>
      ? T
      : S extends ClassType<infer T>
        ? T
        : S extends SlotToken<infer T>
          ? T
          : never;

class SlotTable implements SlotHost {
  private readonly _byType = new Map<TypeIdentifier<unknown>, Map<string | undefined, Slot<unknown>>>();

  constructor(
    readonly logger: ILogger,
    readonly typeGuard: boolean
  ) {}

  get size(): number {
    let count = 0;
    for (const byName of this._byType.values()) count += byName.size;
    return count;
  }

  find(key: SlotKey<unknown>): Slot<unknown> | undefined {
    return this._byType.get(key.type)?.get(key.name);
  }

  claim(slot: Slot<unknown>): void {
    const { key } = slot;
    let byName = this._byType.get(key.type);
    if (byName?.has(key.name)) throw conflict(key);

    if (!byName) {
      byName = new Map();
      this._byType.set(key.type, byName);
    }
    byName.set(key.name, slot);
    this.logger.debug('Singleton registered', { key: key.toString(), kind: slot.kind });
  }

  release(slot: Slot<unknown>): boolean {
    const { key } = slot;
    const byName = this._byType.get(key.type);
    if (!byName || byName.get(key.name) !== slot) return false;

    byName.delete(key.name);
    if (byName.size === 0) this._byType.delete(key.type);
    return true;
  }

  all(): Slot<unknown>[] {
    const slots: Slot<unknown>[] = [];
    for (const byName of this._byType.values()) {
      for (const slot of byName.values()) slots.push(slot);
    }
    return slots;
  }

  clear(): number {
    const cleared = this.size;
    this._byType.clear();
    return cleared;
  }
}

function isPromiseLike<T>(value: T | PromiseLike<T>): value is PromiseLike<T> {
  if (typeof value !== 'object' && typeof value !== 'function') return false;
  if (value === null) return false;
  return 'then' in value && typeof value.then === 'function';
}

function isSelectorList(selector: Selector): selector is readonly SelectorItem[] {
  return Array.isArray(selector);
}

export class Registry {
  readonly config: Readonly<RegistryConfig>;
  readonly logger: ILogger;

  private readonly _table: SlotTable;

  constructor(opts: RegistryOptions = {}) {
    this.config = loadConfig(opts.config);
    this.logger =
      opts.logger ??
      (this.config.logging.enabled
        ? createLogger({
            level: this.config.logging.level,
            timestamp: this.config.logging.timestamp,
            name: 'singleton',
          })
        : noopLogger);
    this._table = new SlotTable(this.logger, this.config.typeGuard);
  }

  /** Number of registered slots */
  get size(): number {
    return this._table.size;
  }

  // =================== Lookup ===================

  /** The registered slot for the key, or an unknown slot that throws on access */
  lookup<T>(type: TypeIdentifier<T>, name?: string): Slot<T> {
    const key = this._key(type, name);
    return this._find(key) ?? Slot.unknown(key);
  }

  has<T>(type: TypeIdentifier<T>, name?: string): boolean {
    return this._find(this._key(type, name)) !== undefined;
  }

  /** Instance of a registered singleton */
  get<T>(type: TypeIdentifier<T>, name?: string): T {
    return this.lookup(type, name).getInstance();
  }

  // =================== Registration ===================

  /**
   * Register a value, or a promise of one, for `type`.
   *
   * A promise produces a deferred slot: getInstance() throws until it settles.
   * Throws a conflict when the key is already registered.
   */
  registerValue<T>(type: TypeIdentifier<T>, value: T | PromiseLike<T>, name?: string): Slot<T> {
    const key = this._key(type, name);
    if (value === null || value === undefined) {
      throw invalidArgument(`Cannot register singleton ${key.toString()} with ${String(value)}`, {
        type: key.typeName,
      });
    }

    if (isPromiseLike(value)) {
      return Slot.deferred(this._table, key, value);
    }

    // an occupied key reports CONFLICT whatever the value
    if (this._find(key)) throw conflict(key);
    if (this.config.typeGuard && !matchesType(type, value)) {
      throw typeMismatch(key, value);
    }
    return Slot.eager(this._table, key, value);
  }

  /**
   * Register a factory that runs on first access. Registering the same key
   * again returns the slot already there instead of throwing.
   */
  registerLazy<T>(type: TypeIdentifier<T>, factory: SlotFactory<T>, name?: string): Slot<T> {
    const key = this._key(type, name);
    if (typeof factory !== 'function') {
      throw invalidArgument(`Lazy singleton ${key.toString()} needs a factory function`, {
        type: key.typeName,
      });
    }
    return this._find(key) ?? Slot.lazy(this._table, key, factory);
  }

  /** Register (once) and return the lazily created instance */
  lazy<T>(type: TypeIdentifier<T>, factory: SlotFactory<T>, name?: string): T {
    return this.registerLazy(type, factory, name).getInstance();
  }

  /** Remove the slot for the key; does nothing when none is registered */
  deregister<T>(type: TypeIdentifier<T>, name?: string): void {
    const slot = this._find(this._key(type, name));
    if (slot) slot.deregister();
  }

  // =================== Readiness ===================

  /**
   * Wait until every selected slot holds an instance.
   *
   *   await registry.awaitReady(Settings);
   *   await registry.awaitReady([Settings, registry.lookup(Api), new SlotKey(Db, 'replica')]);
   *
   * Rejects with NOT_FOUND for a type or key that has no slot, and with the
   * first failure among the selected slots.
   */
  awaitReady<S extends SelectorItem>(selector: S): Promise<Selected<S>>;
  awaitReady(selector: readonly SelectorItem[]): Promise<unknown[]>;
  async awaitReady(selector: Selector): Promise<unknown> {
    if (isSelectorList(selector)) {
      const slots = selector.map((item) => this._select(item, true, true));
      return Promise.all(slots.map((slot) => slot.awaitReady()));
    }
    return this._select(selector, true, false).awaitReady();
  }

  // =================== Test & Diagnostics ===================

  /**
   * Forget every registered slot. For test teardown only:
   *
   *   afterEach(() => singletons.resetAllForTest());
   */
  resetAllForTest(): void {
    const cleared = this._table.clear();
    this.logger.info('Singleton registry reset', { cleared });
  }

  /**
   * Describe the selected slots, or every registered slot. Unregistered types
   * are listed with status `missing`. Diagnostics only.
   */
  debugListAll(selector?: Selector): SlotDescriptor[] {
    let slots: Slot<unknown>[];
    if (selector === undefined) {
      slots = this._table.all();
    } else if (isSelectorList(selector)) {
      slots = selector.map((item) => this._select(item, false, true));
    } else {
      slots = [this._select(selector, false, false)];
    }

    const descriptors = slots.map((slot) => slot.describe());
    this.logger.info('Registered singletons', { slots: descriptors });
    return descriptors;
  }

  // =================== Internals ===================

  private _key<T>(type: TypeIdentifier<T>, name: string | undefined): SlotKey<T> {
    if (!isTypeIdentifier(type)) {
      throw invalidArgument('Singleton type must be a class or a token', { received: typeof type });
    }
    if (name !== undefined && typeof name !== 'string') {
      throw invalidArgument('Singleton name must be a string', { received: typeof name });
    }
    return new SlotKey(type, name);
  }

  private _find<T>(key: SlotKey<T>): Slot<T> | undefined {
    // Slots are filed under the identifier they were built with, so a hit holds a T
    return this._table.find(key) as Slot<T> | undefined;
  }

  private _select(item: unknown, strict: boolean, inList: boolean): Slot<unknown> {
    if (item === null || item === undefined) {
      throw invalidArgument('Singleton selector must not be null or undefined');
    }
    if (item instanceof Slot) {
      return item;
    }

    let key: SlotKey<unknown>;
    if (item instanceof SlotKey) {
      key = item;
    } else if (isTypeIdentifier(item)) {
      key = new SlotKey(item);
    } else if (Array.isArray(item)) {
      throw invalidArgument(
        inList ? 'Singleton selector lists cannot be nested' : 'Invalid singleton selector'
      );
    } else {
      throw invalidArgument('Invalid singleton selector', { received: typeof item });
    }

    const slot = this._table.find(key);
    if (slot) return slot;
    if (strict) throw notFound(key);
    return Slot.unknown(key);
  }
}

export function createRegistry(opts?: RegistryOptions): Registry {
  return new Registry(opts);
}

/** Process-wide registry */
export const singletons: Registry = createRegistry();
