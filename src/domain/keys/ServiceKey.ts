/**
 * @fileoverview Service keys
 *
 * @module inject-graph/domain/keys
 *
 * A key identifies a registry slot. Classes (including abstract classes used
 * as interfaces), strings and symbols are all valid keys and compare by
 * identity. Every key also has a canonical name, used to build the name-based
 * alias index.
 */

/**
 * A concrete class whose instances are `T`.
 */
export type Constructor<T = unknown> = new (...args: any[]) => T;

/**
 * A class, concrete or abstract, whose instances are `T`.
 */
export type AbstractConstructor<T = unknown> = abstract new (...args: any[]) => T;

/**
 * Identifier of a registered service.
 *
 * @example
 * ```typescript
 * abstract class CatsRepository { abstract getById(id: string): Cat; }
 * const CONNECTION_STRING = Symbol('ConnectionString');
 *
 * container.addTransient(CatsRepository, SqlCatsRepository); // class key
 * container.addInstance('foodb://local', CONNECTION_STRING);  // symbol key
 * ```
 */
export type ServiceKey<T = unknown> = AbstractConstructor<T> | string | symbol;

/**
 * Check whether a value can be activated with `new`.
 */
export function isConstructor(value: unknown): value is Constructor<object> {
  return typeof value === 'function' && typeof value.prototype === 'object';
}

/**
 * Get the canonical name of a key: a class name, a symbol description or the
 * string itself.
 */
export function getKeyName(key: ServiceKey): string {
  if (typeof key === 'string') {
    return key;
  }
  if (typeof key === 'symbol') {
    return key.description ?? 'Symbol()';
  }
  return key.name;
}
