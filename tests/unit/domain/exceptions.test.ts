/**
 * @fileoverview Unit tests for container exceptions
 */

import {
  ActivationScopeDisposedException,
  AliasAlreadyDefined,
  AliasConfigurationError,
  AmbiguousReferenceNameException,
  buildDependencyGraph,
  CannotResolveParameterException,
  CannotResolveTypeException,
  CircularDependencyException,
  DIException,
  InvalidFactory,
  InvalidOperationInStrictMode,
  MissingTypeException,
  OverridingServiceException,
  UnsupportedUnionTypeException,
} from '../../../src';

class OrderService {}
class PaymentService {}

describe('Container exceptions', () => {
  describe('buildDependencyGraph', () => {
    it('should render the chain as a tree ending with the failing node', () => {
      expect(buildDependencyGraph(['A', 'B'], 'A (CIRCULAR!)')).toBe(
        '├─ A\n  └─ B\n    └─ A (CIRCULAR!)\n',
      );
    });

    it('should render a lone failing node', () => {
      expect(buildDependencyGraph([], 'db (UNREGISTERED)')).toBe('└─ db (UNREGISTERED)\n');
    });
  });

  describe('DIException', () => {
    it('should keep the prototype chain and the class name', () => {
      const error = new CannotResolveTypeException(OrderService);

      expect(error).toBeInstanceOf(CannotResolveTypeException);
      expect(error).toBeInstanceOf(DIException);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('CannotResolveTypeException');
    });

    it('should serialize to JSON', () => {
      const error = new CircularDependencyException(OrderService, PaymentService, ['OrderService']);

      expect(error.toJSON()).toEqual({
        name: 'CircularDependencyException',
        message:
          "A circular dependency was detected for the service of type 'OrderService' for 'PaymentService'",
        dependencyGraph: '└─ OrderService\n  └─ PaymentService (CIRCULAR!)\n',
      });
    });
  });

  describe('messages', () => {
    it('should describe an overriding registration', () => {
      expect(new OverridingServiceException('timeout', 42).message).toBe(
        "A service with key 'timeout' is already registered and would be overridden by value 42.",
      );
      expect(new OverridingServiceException(OrderService, PaymentService).message).toBe(
        "A service with key 'OrderService' is already registered " +
          'and would be overridden by value PaymentService.',
      );
    });

    it('should describe an unresolved parameter with its graph', () => {
      const error = new CannotResolveParameterException('db', OrderService, ['OrderService']);

      expect(error.message).toBe("Unable to resolve parameter 'db' when resolving 'OrderService'");
      expect(error.dependencyGraph).toBe('└─ OrderService\n  └─ db (UNREGISTERED)\n');
    });

    it('should describe an ambiguous name with and without a consumer', () => {
      const candidates = [OrderService, PaymentService];

      expect(new AmbiguousReferenceNameException('service', candidates, OrderService).message).toBe(
        "Unable to resolve parameter 'service' when resolving 'OrderService': " +
          'the name is ambiguous between OrderService, PaymentService',
      );
      expect(new AmbiguousReferenceNameException('service', candidates).message).toBe(
        "The name 'service' is ambiguous between OrderService, PaymentService.",
      );
    });

    it('should describe configuration errors', () => {
      expect(new CannotResolveTypeException('clock').message).toBe("Unable to resolve the type 'clock'.");
      expect(new UnsupportedUnionTypeException('sender', OrderService).message).toBe(
        "Union or Optional type declaration is not supported. Cannot resolve parameter 'sender' " +
          "when resolving 'OrderService'",
      );
      expect(new InvalidOperationInStrictMode().message).toBe(
        'The services are configured in strict mode, the operation is invalid.',
      );
      expect(new AliasAlreadyDefined('db').message).toBe(
        "Cannot define alias 'db'. An alias with given name is already defined.",
      );
      expect(new AliasConfigurationError('db', OrderService).message).toBe(
        "An alias 'db' for type 'OrderService' was defined, but the type was not configured in the Container.",
      );
      expect(new MissingTypeException().message).toBe(
        'Please specify the factory return type or declare it with declareReturnType().',
      );
      expect(new InvalidFactory(undefined).message).toBe(
        'The factory specified for type unknown is not valid, it must be a function with either ' +
          'these signatures: (), (scope), (scope, activatingType).',
      );
      expect(new ActivationScopeDisposedException().message).toBe(
        'This ActivationScope is disposed and not bound to any provider.',
      );
    });
  });
});
