/**
 * @fileoverview Container exceptions
 *
 * Every failure the container reports is a `DIException`. Configuration
 * errors are thrown while registering, graph errors while building, and a
 * built provider only throws `CannotResolveTypeException` for unknown keys
 * (or `ActivationScopeDisposedException` when a disposed scope is used).
 * None of them is transient: each one points at configuration to fix.
 */

import { getKeyName } from '../keys';
import type { ServiceKey } from '../keys';

/**
 * Render a resolution chain as a tree, ending with the failing node.
 *
 * @example
 * ```typescript
 * buildDependencyGraph(['A', 'B'], 'A (CIRCULAR!)');
 * // ├─ A
 * //   └─ B
 * //     └─ A (CIRCULAR!)
 * ```
 */
export function buildDependencyGraph(chain: readonly string[], current: string): string {
  let graph = '';
  for (let i = 0; i < chain.length; i++) {
    const indent = '  '.repeat(i);
    const branch = i === chain.length - 1 ? '└─' : '├─';
    graph += `${indent}${branch} ${chain[i]}\n`;
  }
  const indent = '  '.repeat(chain.length);
  graph += `${indent}└─ ${current}\n`;
  return graph;
}

function describeValue(value: unknown): string {
  if (typeof value === 'function') {
    return value.name || '<anonymous>';
  }
  return String(value);
}

/**
 * Base class of all container errors.
 */
export class DIException extends Error {
  /**
   * Tree of the resolution path that led to the failure, or an empty string
   * when the error is not tied to a path.
   */
  readonly dependencyGraph: string;

  constructor(message: string, dependencyGraph: string = '') {
    super(message);
    this.name = new.target.name;
    this.dependencyGraph = dependencyGraph;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): { name: string; message: string; dependencyGraph: string } {
    return {
      name: this.name,
      message: this.message,
      dependencyGraph: this.dependencyGraph,
    };
  }
}

/**
 * A key was registered twice.
 */
export class OverridingServiceException extends DIException {
  constructor(
    readonly key: ServiceKey,
    value: unknown,
  ) {
    super(
      `A service with key '${getKeyName(key)}' is already registered ` +
        `and would be overridden by value ${describeValue(value)}.`,
    );
  }
}

/**
 * A constructor parameter or field has no satisfiable key.
 */
export class CannotResolveParameterException extends DIException {
  constructor(
    readonly parameterName: string,
    readonly desiredType: ServiceKey,
    chain: readonly string[] = [],
    reason: string = '',
  ) {
    super(
      `Unable to resolve parameter '${parameterName}' ` +
        `when resolving '${getKeyName(desiredType)}'${reason}`,
      buildDependencyGraph(chain, `${parameterName} (UNREGISTERED)`),
    );
  }
}

/**
 * A parameter name matches an inferred alias shared by several keys.
 */
export class AmbiguousReferenceNameException extends DIException {
  constructor(
    readonly parameterName: string,
    readonly candidates: readonly ServiceKey[],
    readonly desiredType?: ServiceKey,
    chain: readonly string[] = [],
  ) {
    const names = candidates.map((key) => getKeyName(key)).join(', ');
    super(
      desiredType === undefined
        ? `The name '${parameterName}' is ambiguous between ${names}.`
        : `Unable to resolve parameter '${parameterName}' ` +
            `when resolving '${getKeyName(desiredType)}': the name is ambiguous between ${names}`,
      desiredType === undefined ? '' : buildDependencyGraph(chain, `${parameterName} (AMBIGUOUS)`),
    );
  }
}

/**
 * A key requested from the provider is not registered.
 */
export class CannotResolveTypeException extends DIException {
  constructor(readonly desiredType: ServiceKey) {
    super(`Unable to resolve the type '${getKeyName(desiredType)}'.`);
  }
}

/**
 * A dependency is declared as a union of several types.
 */
export class UnsupportedUnionTypeException extends DIException {
  constructor(
    readonly parameterName: string,
    readonly desiredType: ServiceKey,
  ) {
    super(
      `Union or Optional type declaration is not supported. ` +
        `Cannot resolve parameter '${parameterName}' ` +
        `when resolving '${getKeyName(desiredType)}'`,
    );
  }
}

/**
 * A type depends on itself, directly or through other types.
 */
export class CircularDependencyException extends DIException {
  constructor(
    readonly expectedType: ServiceKey,
    readonly desiredType: ServiceKey,
    chain: readonly string[] = [],
  ) {
    super(
      'A circular dependency was detected for the service ' +
        `of type '${getKeyName(expectedType)}' ` +
        `for '${getKeyName(desiredType)}'`,
      buildDependencyGraph(chain, `${getKeyName(desiredType)} (CIRCULAR!)`),
    );
  }
}

/**
 * Alias mutation attempted on a strict container.
 */
export class InvalidOperationInStrictMode extends DIException {
  constructor() {
    super('The services are configured in strict mode, the operation is invalid.');
  }
}

/**
 * An alias with the same name already exists.
 */
export class AliasAlreadyDefined extends DIException {
  constructor(readonly aliasName: string) {
    super(`Cannot define alias '${aliasName}'. An alias with given name is already defined.`);
  }
}

/**
 * An alias points at a key that was never registered.
 */
export class AliasConfigurationError extends DIException {
  constructor(
    readonly aliasName: string,
    readonly desiredType: ServiceKey,
  ) {
    super(
      `An alias '${aliasName}' for type '${getKeyName(desiredType)}' was defined, ` +
        'but the type was not configured in the Container.',
    );
  }
}

/**
 * A factory was registered without a return type.
 */
export class MissingTypeException extends DIException {
  constructor() {
    super(
      'Please specify the factory return type or declare it with declareReturnType().',
    );
  }
}

/**
 * A factory is not a function, or takes more than two parameters.
 */
export class InvalidFactory extends DIException {
  constructor(readonly desiredType: ServiceKey | undefined) {
    super(
      `The factory specified for type ${desiredType === undefined ? 'unknown' : getKeyName(desiredType)} ` +
        'is not valid, it must be a function with either these signatures: ' +
        '(), (scope), (scope, activatingType).',
    );
  }
}

/**
 * An activation scope was used after `dispose()`.
 */
export class ActivationScopeDisposedException extends DIException {
  constructor() {
    super('This ActivationScope is disposed and not bound to any provider.');
  }
}
