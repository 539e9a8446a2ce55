/**
 * @fileoverview Unit tests for the built provider and activation scopes
 */

import 'reflect-metadata';

import {
  ActivationScope,
  ActivationScopeDisposedException,
  CannotResolveTypeException,
  Container,
  Injectable,
  MetadataDescriptorProvider,
  OverridingServiceException,
  union,
  UnsupportedUnionTypeException,
} from '../../../src';
import type { IActivationScope, ServiceKey } from '../../../src';

// ============================================================================
// Test Fixtures
// ============================================================================

@Injectable()
class Clock {}

class Settings {
  constructor(readonly connectionString: string) {}
}

class UnitOfWork {
  constructor(readonly scope: IActivationScope) {}
}

function buildProvider(descriptors?: MetadataDescriptorProvider) {
  return new Container({ descriptors })
    .addInstance(new Settings('conn-str'))
    .addSingleton(Clock)
    .addScopedByFactory((scope: IActivationScope) => new UnitOfWork(scope), UnitOfWork)
    .addAlias('unitOfWork', UnitOfWork)
    .build();
}

// ============================================================================
// Test Suites
// ============================================================================

describe('Services', () => {
  describe('get', () => {
    it('should throw for unknown keys', () => {
      const provider = buildProvider();

      expect(() => provider.get('mailer')).toThrowErrorType(CannotResolveTypeException);
      expect(() => provider.get('mailer')).toThrow("Unable to resolve the type 'mailer'.");
    });

    it('should return the default value for unknown keys', () => {
      const provider = buildProvider();

      expect(provider.get('mailer', undefined, null)).toBeNull();
      expect(provider.get('mailer', undefined, undefined)).toBeUndefined();
    });

    it('should prefer values seeded in the scope', () => {
      const provider = buildProvider();
      const seeded = new Settings('other-conn-str');
      const scope = provider.createScope(new Map<ServiceKey, unknown>([[Settings, seeded]]));

      expect(provider.get(Settings, scope)).toBe(seeded);
      expect(provider.get(Settings)).not.toBe(seeded);
      scope.dispose();
    });

    it('should use a one-shot scope when none is given', () => {
      const provider = buildProvider();

      expect(provider.get(UnitOfWork)).not.toBe(provider.get(UnitOfWork));
    });
  });

  describe('set', () => {
    it('should add a value under its key and canonical name', () => {
      const provider = buildProvider();
      class Mailer {}
      const mailer = new Mailer();

      provider.set(Mailer, mailer);

      expect(provider.get(Mailer)).toBe(mailer);
      expect(provider.get('Mailer')).toBe(mailer);
      expect(provider.has(Mailer)).toBe(true);
    });

    it('should not override existing entries', () => {
      const provider = buildProvider();

      expect(() => provider.set(Clock, new Clock())).toThrowErrorType(OverridingServiceException);
      expect(() => provider.set('Clock', new Clock())).toThrowErrorType(OverridingServiceException);
    });
  });

  describe('exec', () => {
    it('should resolve parameters by name and from seeded values', () => {
      const provider = buildProvider();

      const result = provider.exec(
        (settings: Settings, requestId: string) => `${settings.connectionString}/${requestId}`,
        { requestId: 'req-1' },
      );

      expect(result).toBe('conn-str/req-1');
    });

    it('should resolve parameters by declared type', () => {
      const descriptors = new MetadataDescriptorProvider();
      const handler = (current: Clock) => current;
      descriptors.declareParameters(handler, [{ name: 'current', type: Clock }]);
      const provider = buildProvider(descriptors);

      expect(provider.exec(handler)).toBe(provider.get(Clock));
    });

    it('should reject parameters declared as unions', () => {
      const descriptors = new MetadataDescriptorProvider();
      const handler = (source: unknown) => source;
      descriptors.declareParameters(handler, [{ name: 'source', type: union(Clock, Settings) }]);
      const provider = buildProvider(descriptors);

      expect(() => provider.getExecutor(handler)).toThrowErrorType(UnsupportedUnionTypeException);
    });

    it('should share scoped services within one call and dispose the scope after it', () => {
      const provider = buildProvider();

      const [first, second] = provider.exec((unitOfWork: UnitOfWork) => [
        unitOfWork,
        provider.get(UnitOfWork, unitOfWork.scope),
      ]);

      expect(first).toBe(second);
      expect(first.scope.isDisposed()).toBe(true);
    });

    it('should dispose the scope when the function throws', () => {
      const provider = buildProvider();
      const captured: { unitOfWork?: UnitOfWork } = {};

      expect(() =>
        provider.exec((unitOfWork: UnitOfWork) => {
          captured.unitOfWork = unitOfWork;
          throw new Error('boom');
        }),
      ).toThrow('boom');
      expect(captured.unitOfWork?.scope.isDisposed()).toBe(true);
    });
  });

  describe('getExecutor', () => {
    it('should describe the function once', () => {
      const descriptors = new MetadataDescriptorProvider();
      const describeCallable = jest.spyOn(descriptors, 'describeCallable');
      const provider = buildProvider(descriptors);
      const handler = (settings: Settings) => settings.connectionString;

      const execute = provider.getExecutor(handler);

      expect(execute()).toBe('conn-str');
      expect(execute()).toBe('conn-str');
      expect(provider.exec(handler)).toBe('conn-str');
      expect(describeCallable).toHaveBeenCalledTimes(1);
    });

    it('should open a new scope for every call', () => {
      const provider = buildProvider();
      const execute = provider.getExecutor((unitOfWork: UnitOfWork) => unitOfWork);

      expect(execute()).not.toBe(execute());
    });

    it('should dispose the scope once an async function has completed', async () => {
      const provider = buildProvider();
      const execute = provider.getExecutor(async (unitOfWork: UnitOfWork) => {
        await Promise.resolve();
        expect(unitOfWork.scope.isDisposed()).toBe(false);
        return unitOfWork;
      });

      const unitOfWork = await execute();

      expect(unitOfWork.scope.isDisposed()).toBe(true);
    });

    it('should dispose the scope once an async function has failed', async () => {
      const provider = buildProvider();
      const captured: { unitOfWork?: UnitOfWork } = {};
      const execute = provider.getExecutor(async (unitOfWork: UnitOfWork) => {
        captured.unitOfWork = unitOfWork;
        await Promise.resolve();
        throw new Error('payment declined');
      });

      await expect(execute()).rejects.toThrow('payment declined');
      expect(captured.unitOfWork?.scope.isDisposed()).toBe(true);
    });
  });
});

describe('ActivationScope', () => {
  it('should cache scoped services and seeded values', () => {
    const provider = buildProvider();
    const scope = provider.createScope({ requestId: 'req-1' });

    const unitOfWork = scope.get(UnitOfWork);

    expect(scope.get(UnitOfWork)).toBe(unitOfWork);
    expect(scope.get('requestId')).toBe('req-1');
    expect(scope.scopedServices.get(UnitOfWork)).toBe(unitOfWork);
    expect(scope.provider).toBe(provider);
    scope.dispose();
  });

  it('should return the default value for unknown keys', () => {
    const scope = buildProvider().createScope();

    expect(scope.get('mailer', 'none')).toBe('none');
    scope.dispose();
  });

  it('should refuse use after dispose', () => {
    const scope = buildProvider().createScope();

    scope.dispose();

    expect(scope.isDisposed()).toBe(true);
    expect(() => scope.get(Clock)).toThrowErrorType(ActivationScopeDisposedException);
    expect(() => scope.scopedServices).toThrowErrorType(ActivationScopeDisposedException);
    expect(() => scope.provider).toThrowErrorType(ActivationScopeDisposedException);
  });

  it('should allow dispose to be called twice', () => {
    const scope = buildProvider().createScope();

    scope.dispose();

    expect(() => scope.dispose()).not.toThrow();
  });

  it('should be constructible directly', () => {
    const provider = buildProvider();
    const scope = new ActivationScope(provider, { requestId: 'req-2' });

    expect(provider.get('requestId', scope)).toBe('req-2');
    scope.dispose();
  });
});
