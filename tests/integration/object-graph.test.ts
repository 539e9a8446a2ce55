/**
 * @fileoverview Integration tests for object graphs built by the container
 *
 * End-to-end checks of registration, build and activation: lifetimes,
 * cycles, alias precedence, strict mode and typical application graphs.
 */

import 'reflect-metadata';

import {
  AmbiguousReferenceNameException,
  CannotResolveParameterException,
  CircularDependencyException,
  Container,
  Injectable,
  InvalidOperationInStrictMode,
  OverridingServiceException,
} from '../../src';

// ============================================================================
// Test Fixtures
// ============================================================================

@Injectable()
class A {}

@Injectable()
class B {
  constructor(readonly a: A) {}
}

class Settings {
  constructor(readonly connectionString: string) {}
}

abstract class Repo {
  abstract find(id: string): string;
}

@Injectable()
class SqlRepo implements Repo {
  constructor(readonly settings: Settings) {}

  find(id: string): string {
    return `${this.settings.connectionString}#${id}`;
  }
}

class X {
  constructor(readonly y: unknown) {}
}

class Cat {
  constructor(readonly name: string) {}
}

@Injectable()
class UnitOfWork {}

@Injectable()
class Clock {}

class Ping {
  constructor(readonly pong: unknown) {}
}

class Pong {
  constructor(readonly ping: unknown) {}
}

function definePaymentGateway() {
  return class PaymentGateway {};
}

const CardGateway = definePaymentGateway();
const BankGateway = definePaymentGateway();

class Checkout {
  constructor(readonly payment_gateway: unknown) {}
}

@Injectable()
class Dashboard {
  constructor(
    readonly clock: Clock,
    readonly unitOfWork: UnitOfWork,
  ) {}
}

// ============================================================================
// Test Suites
// ============================================================================

describe('Object graphs', () => {
  describe('registration uniqueness', () => {
    it('should reject a second registration and keep the registry unchanged', () => {
      const container = new Container().addTransient(A);
      const before = container.entries();

      expect(() => container.addTransient(A)).toThrowErrorType(OverridingServiceException);
      expect(() => container.addInstance(new A())).toThrowErrorType(OverridingServiceException);
      expect(container.entries()).toEqual(before);
    });
  });

  describe('lifetimes', () => {
    it('should create a new transient instance on every activation', () => {
      const provider = new Container().addTransient(A).build();

      expect(provider.get(A)).not.toBe(provider.get(A));
    });

    it('should share a scoped instance within one scope only', () => {
      const provider = new Container().addScoped(UnitOfWork).build();
      const scope = provider.createScope();
      const other = provider.createScope();

      expect(provider.get(UnitOfWork, scope)).toBe(provider.get(UnitOfWork, scope));
      expect(provider.get(UnitOfWork, scope)).not.toBe(provider.get(UnitOfWork, other));
      expect(provider.get(UnitOfWork)).not.toBe(provider.get(UnitOfWork));
      scope.dispose();
      other.dispose();
    });

    it('should share a singleton across scopes until the provider is rebuilt', () => {
      const container = new Container().addSingleton(Clock);
      const provider = container.build();
      const scope = provider.createScope();

      expect(provider.get(Clock)).toBe(provider.get(Clock, scope));
      expect(container.build().get(Clock)).not.toBe(provider.get(Clock));
      scope.dispose();
    });

    it('should share scoped dependencies of one activation', () => {
      const provider = new Container()
        .addSingleton(Clock)
        .addScoped(UnitOfWork)
        .addTransient(Dashboard)
        .build();
      const scope = provider.createScope();

      const first = provider.get(Dashboard, scope);
      const second = provider.get(Dashboard, scope);

      expect(first).not.toBe(second);
      expect(first.unitOfWork).toBe(second.unitOfWork);
      expect(first.clock).toBe(provider.get(Clock));
      scope.dispose();
    });
  });

  describe('cycles', () => {
    it('should fail the build for A → B → A', () => {
      const container = new Container().addTransient(Ping).addTransient(Pong);

      expect(() => container.build()).toThrowErrorType(CircularDependencyException);
    });

    it('should build when a factory supplies the back edge', () => {
      const provider = new Container()
        .addTransient(Ping)
        .addTransientByFactory(() => new Pong(undefined), Pong)
        .build();

      expect(provider.get(Ping).pong).toEqual(new Pong(undefined));
    });
  });

  describe('alias precedence', () => {
    it('should resolve an unambiguous inferred name', () => {
      const provider = new Container().addSingleton(CardGateway).addTransient(Checkout).build();

      expect(provider.get(Checkout).payment_gateway).toBe(provider.get(CardGateway));
    });

    it('should fail an ambiguous inferred name without an exact alias', () => {
      const container = new Container()
        .addSingleton(CardGateway)
        .addSingleton(BankGateway)
        .addTransient(Checkout);

      expect(() => container.build()).toThrowErrorType(AmbiguousReferenceNameException);
    });

    it('should resolve an ambiguous name with an exact alias', () => {
      const provider = new Container()
        .addSingleton(CardGateway)
        .addSingleton(BankGateway)
        .setAlias('payment_gateway', BankGateway)
        .addTransient(Checkout)
        .build();

      expect(provider.get(Checkout).payment_gateway).toBe(provider.get(BankGateway));
    });
  });

  describe('strict mode', () => {
    it('should fail the build for an untyped dependency', () => {
      const container = new Container({ strict: true }).addTransient(A).addTransient(X);

      expect(() => container.build()).toThrowErrorType(CannotResolveParameterException);
    });

    it('should still resolve declared types', () => {
      const provider = new Container({ strict: true }).addTransient(A).addTransient(B).build();

      expect(provider.get(B).a).toBeInstanceOf(A);
    });

    it('should reject aliases immediately', () => {
      const container = new Container({ strict: true });

      expect(() => container.addAlias('y', A)).toThrowErrorType(InvalidOperationInStrictMode);
      expect(() => container.setAlias('y', A)).toThrowErrorType(InvalidOperationInStrictMode);
    });
  });

  describe('scenarios', () => {
    it('should build a transient with a nested transient dependency', () => {
      const provider = new Container().addTransient(A).addTransient(B).build();

      const first = provider.get(B);
      const second = provider.get(B);

      expect(first).toBeInstanceOf(B);
      expect(first.a).toBeInstanceOf(A);
      expect(first).not.toBe(second);
      expect(first.a).not.toBe(second.a);
    });

    it('should bind an abstract key to a concrete repository', () => {
      const provider = new Container()
        .addInstance(new Settings('conn-str'))
        .addTransient(Repo, SqlRepo)
        .build();

      const repo = provider.get(Repo);

      expect(repo).toBeInstanceOf(SqlRepo);
      expect(repo.find('cat-1')).toBe('conn-str#cat-1');
    });

    it('should report an unresolvable untyped parameter', () => {
      const container = new Container().addTransient(X);

      expect(() => container.build()).toThrow("Unable to resolve parameter 'y' when resolving 'X'");
      expect(() => container.build()).toThrowWithDependencyGraph('└─ X\n  └─ y (UNREGISTERED)\n');
    });

    it('should keep the instance of a singleton factory', () => {
      const provider = new Container().addSingletonByFactory(() => new Cat('Celine'), Cat).build();

      expect(provider.get(Cat).name).toBe('Celine');
      expect(provider.get(Cat)).toBe(provider.get(Cat));
    });
  });
});
