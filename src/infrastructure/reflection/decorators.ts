/**
 * @fileoverview Decorators recording injection metadata
 *
 * Decorating a class is also what makes the compiler emit
 * `design:paramtypes` for its constructor (under `emitDecoratorMetadata`),
 * so classes relying on declared parameter types must carry a decorator.
 *
 * @example
 * ```typescript
 * @Injectable({ lifetime: ServiceLifetime.Scoped })
 * class CreateOrderHandler {
 *   @Inject() clock!: Clock;
 *
 *   constructor(
 *     private readonly orders: OrdersRepository,
 *     @Inject(PAYMENT_GATEWAY) private readonly payments: PaymentGateway,
 *   ) {}
 * }
 * ```
 */

import 'reflect-metadata';
import type { DeclaredType } from '../../domain/descriptors';
import { isUnionType } from '../../domain/descriptors';
import { ServiceLifetime } from '../../domain/lifetime';

export const INJECTABLE_KEY = Symbol('inject-graph:injectable');
export const INJECT_PARAMETERS_KEY = Symbol('inject-graph:parameters');
export const INJECT_FIELDS_KEY = Symbol('inject-graph:fields');

export interface InjectableOptions {
  /** Lifetime used by `Container.register()` when none is given */
  lifetime?: ServiceLifetime;
}

/**
 * A field declared with `@Inject()`.
 */
export interface InjectedField {
  readonly name: string;
  readonly type?: DeclaredType;
}

function isDeclaredType(value: unknown): value is DeclaredType {
  return (
    typeof value === 'string' ||
    typeof value === 'symbol' ||
    typeof value === 'function' ||
    isUnionType(value)
  );
}

/**
 * Parameter overrides declared on a constructor, by parameter index.
 */
export function getParameterOverrides(target: object): ReadonlyMap<number, DeclaredType> {
  const stored: unknown = Reflect.getOwnMetadata(INJECT_PARAMETERS_KEY, target);
  const overrides = new Map<number, DeclaredType>();
  if (stored instanceof Map) {
    const entries: Map<unknown, unknown> = stored;
    for (const [index, type] of entries) {
      if (typeof index === 'number' && isDeclaredType(type)) {
        overrides.set(index, type);
      }
    }
  }
  return overrides;
}

/**
 * Fields declared with `@Inject()` on exactly this class.
 */
export function getInjectedFields(target: object): readonly InjectedField[] {
  const stored: unknown = Reflect.getOwnMetadata(INJECT_FIELDS_KEY, target);
  if (!Array.isArray(stored)) {
    return [];
  }
  const entries: unknown[] = stored;
  const fields: InjectedField[] = [];
  for (const entry of entries) {
    if (typeof entry === 'object' && entry !== null && 'name' in entry) {
      const { name } = entry;
      const type: unknown = 'type' in entry ? entry.type : undefined;
      if (typeof name === 'string') {
        fields.push(isDeclaredType(type) ? { name, type } : { name });
      }
    }
  }
  return fields;
}

export function getInjectableOptions(target: object): InjectableOptions | undefined {
  const stored: unknown = Reflect.getOwnMetadata(INJECTABLE_KEY, target);
  if (typeof stored !== 'object' || stored === null) {
    return undefined;
  }
  const declared: unknown = 'lifetime' in stored ? stored.lifetime : undefined;
  const lifetime = Object.values(ServiceLifetime).find((value) => value === declared);
  return lifetime === undefined ? {} : { lifetime };
}

/**
 * Mark a class as injectable.
 */
export function Injectable(options: InjectableOptions = {}): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(INJECTABLE_KEY, { ...options }, target);
  };
}

/**
 * Override the declared type of a constructor parameter, or declare an
 * injectable field.
 *
 * @remarks
 * On a constructor parameter, `key` replaces the type emitted by the
 * compiler; without a key the decorator has no effect there. On a field, the
 * field is set after construction of a class that declares no constructor
 * parameters; without a key the field's `design:type` is used, and without
 * that, its name. Parameters of methods are ignored.
 *
 * @throws {TypeError} When applied to a symbol-named field
 */
export function Inject(key?: DeclaredType) {
  return function (
    target: object,
    propertyKey: string | symbol | undefined,
    parameterIndex?: number,
  ): void {
    if (typeof parameterIndex === 'number') {
      if (propertyKey !== undefined || key === undefined) {
        return;
      }
      const overrides = new Map(getParameterOverrides(target));
      overrides.set(parameterIndex, key);
      Reflect.defineMetadata(INJECT_PARAMETERS_KEY, overrides, target);
      return;
    }

    if (typeof propertyKey !== 'string') {
      throw new TypeError('@Inject() fields must have string names.');
    }
    const owner = target.constructor;
    const fields = getInjectedFields(owner).filter((field) => field.name !== propertyKey);
    fields.push(key === undefined ? { name: propertyKey } : { name: propertyKey, type: key });
    Reflect.defineMetadata(INJECT_FIELDS_KEY, fields, owner);
  };
}
