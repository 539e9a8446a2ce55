/**
 * @fileoverview Descriptor provider backed by reflect-metadata
 *
 * @packageDocumentation
 * @module inject-graph/infrastructure/reflection
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Adapter implementing `IDescriptorProvider` on top of what the run time can
 * see of a class:
 *
 * | Source | Gives |
 * |--------|-------|
 * | Function source text | parameter names, whether a constructor exists |
 * | `design:paramtypes` / `design:type` | declared types (decorated classes only) |
 * | `@Inject(key)` | type overrides, injectable fields |
 * | `declare*()` tables | everything, for code the compiler cannot describe |
 *
 * Types the compiler emits for interfaces, unions and `unknown` (`Object`),
 * as well as `Function` and `undefined`, count as undeclared: those
 * dependencies fall back to name-based resolution.
 *
 * @version 1.0.0
 */

import 'reflect-metadata';
import { isConstructor } from '../../domain/keys';
import type { Constructor, ServiceKey } from '../../domain/keys';
import type {
  Callable,
  DeclaredType,
  IDescriptorProvider,
  ParameterDescriptor,
} from '../../domain/descriptors';
import { getInjectedFields, getParameterOverrides } from './decorators';
import { parseCallableParameters, parseConstructorParameters } from './signature';

/**
 * Keep only types the resolver can act on.
 */
function toDeclaredType(designType: unknown): DeclaredType | undefined {
  if (designType === Object || designType === Function) {
    return undefined;
  }
  return isConstructor(designType) ? designType : undefined;
}

function describe(name: string, type: DeclaredType | undefined): ParameterDescriptor {
  return type === undefined ? { name } : { name, type };
}

/**
 * The class itself, then each base class up to (not including)
 * `Function.prototype`.
 */
function* classHierarchy(type: Constructor): Generator<Constructor<object>> {
  let current: unknown = type;
  while (isConstructor(current)) {
    yield current;
    current = Object.getPrototypeOf(current);
  }
}

/**
 * Descriptor provider reading reflect-metadata, decorators and source text.
 *
 * @example Describing what the compiler cannot
 * ```typescript
 * const descriptors = new MetadataDescriptorProvider()
 *   .declareParameters(Notifier, [{ name: 'sender', type: union(EmailSender, SmsSender) }])
 *   .declareReturnType(createSettings, Settings);
 *
 * const container = new Container({ descriptors });
 * ```
 */
export class MetadataDescriptorProvider implements IDescriptorProvider {
  private readonly parameters = new WeakMap<object, readonly ParameterDescriptor[]>();
  private readonly fields = new WeakMap<object, readonly ParameterDescriptor[]>();
  private readonly returnTypes = new WeakMap<object, ServiceKey>();

  /**
   * Declare the parameters of a constructor or function, replacing anything
   * read from metadata.
   */
  declareParameters(target: Constructor | Callable, parameters: readonly ParameterDescriptor[]): this {
    this.parameters.set(target, [...parameters]);
    return this;
  }

  /**
   * Declare the injectable fields of a class, replacing decorated ones.
   */
  declareFields(target: Constructor, fields: readonly ParameterDescriptor[]): this {
    this.fields.set(target, [...fields]);
    return this;
  }

  /**
   * Declare the key a factory produces.
   */
  declareReturnType(fn: Callable, key: ServiceKey): this {
    this.returnTypes.set(fn, key);
    return this;
  }

  describeConstructor(type: Constructor): readonly ParameterDescriptor[] | undefined {
    for (const current of classHierarchy(type)) {
      const declared = this.parameters.get(current);
      if (declared !== undefined) {
        return declared;
      }
      const names = parseConstructorParameters(current);
      if (names !== undefined) {
        return this.describeConstructorParameters(current, names);
      }
    }
    return undefined;
  }

  describeFields(type: Constructor): readonly ParameterDescriptor[] {
    const declared = this.fields.get(type);
    if (declared !== undefined) {
      return declared;
    }
    const byName = new Map<string, ParameterDescriptor>();
    const hierarchy = [...classHierarchy(type)].reverse();
    for (const current of hierarchy) {
      for (const field of getInjectedFields(current)) {
        const fieldType =
          field.type ?? toDeclaredType(Reflect.getMetadata('design:type', current.prototype, field.name));
        byName.delete(field.name);
        byName.set(field.name, describe(field.name, fieldType));
      }
    }
    return [...byName.values()];
  }

  describeCallable(fn: Callable): readonly ParameterDescriptor[] {
    const declared = this.parameters.get(fn);
    if (declared !== undefined) {
      return declared;
    }
    return parseCallableParameters(fn).map((name) => ({ name }));
  }

  describeReturnType(fn: Callable): ServiceKey | undefined {
    return this.returnTypes.get(fn);
  }

  private describeConstructorParameters(
    type: Constructor<object>,
    names: readonly string[],
  ): ParameterDescriptor[] {
    const designTypes: unknown = Reflect.getOwnMetadata('design:paramtypes', type);
    const emitted: readonly unknown[] = Array.isArray(designTypes) ? designTypes : [];
    const overrides = getParameterOverrides(type);
    return names.map((name, index) =>
      describe(name, overrides.get(index) ?? toDeclaredType(emitted[index])),
    );
  }
}

/**
 * Provider shared by containers created without `descriptors`.
 */
export const defaultDescriptorProvider = new MetadataDescriptorProvider();
