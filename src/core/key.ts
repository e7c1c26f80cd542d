/**
 * Slot identity: a runtime type identifier plus an optional name.
 *
 * Generic parameters are erased at runtime, so the "type" of a slot is an
 * explicit value: a class, or a token for shapes that have no class
 * (interfaces, primitives, functions).
 */

/** Any class, including ones with a private constructor */
export type ClassType<T> = Function & { readonly prototype: T };

export type TypeGuard<T> = (value: unknown) => value is T;

/** Runtime stand-in for a type that has no class of its own */
export class SlotToken<T> {
  constructor(
    readonly name: string,
    readonly guard?: TypeGuard<T>
  ) {}

  toString(): string {
    return this.name;
  }
}

export type TypeIdentifier<T> = ClassType<T> | SlotToken<T>;

/**
 * Create a token for `T`.
 *
 *   interface Settings { debug: boolean }
 *   const Settings = token<Settings>('Settings');
 */
export function token<T>(name: string, guard?: TypeGuard<T>): SlotToken<T> {
  return new SlotToken<T>(name, guard);
}

export function isTypeIdentifier(value: unknown): value is TypeIdentifier<unknown> {
  return typeof value === 'function' || value instanceof SlotToken;
}

export function typeName(type: TypeIdentifier<unknown>): string {
  return typeof type === 'function' ? type.name || '<anonymous>' : type.name;
}

/** True when `value` may be stored under `type` */
export function matchesType<T>(type: TypeIdentifier<T>, value: unknown): value is T {
  if (typeof type === 'function') {
    return value instanceof type;
  }
  return type.guard ? type.guard(value) : true;
}

export class SlotKey<T = unknown> {
  constructor(
    readonly type: TypeIdentifier<T>,
    readonly name?: string
  ) {}

  get typeName(): string {
    return typeName(this.type);
  }

  /** Same type identifier and same name; an absent name only equals an absent name */
  equals(other: SlotKey<unknown>): boolean {
    return other.type === this.type && other.name === this.name;
  }

  toString(): string {
    return this.name === undefined ? this.typeName : `${this.typeName}(${this.name})`;
  }
}
