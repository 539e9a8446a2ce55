/**
 * @fileoverview Unit tests for keys and name variants
 */

import {
  getKeyName,
  getNameVariants,
  isAliasableName,
  isConstructor,
  toStandardParamName,
} from '../../../src';

class UserService {}
abstract class CatsRepository {}

describe('Service keys', () => {
  describe('getKeyName', () => {
    it('should use the class name for classes', () => {
      expect(getKeyName(UserService)).toBe('UserService');
      expect(getKeyName(CatsRepository)).toBe('CatsRepository');
    });

    it('should use the description for symbols', () => {
      expect(getKeyName(Symbol('ConnectionString'))).toBe('ConnectionString');
      expect(getKeyName(Symbol())).toBe('Symbol()');
    });

    it('should use strings as they are', () => {
      expect(getKeyName('connection_string')).toBe('connection_string');
    });
  });

  describe('isConstructor', () => {
    it('should accept classes and constructor functions', () => {
      function Legacy(this: unknown) {}
      expect(isConstructor(UserService)).toBe(true);
      expect(isConstructor(Legacy)).toBe(true);
    });

    it('should reject arrow functions and values', () => {
      expect(isConstructor(() => 1)).toBe(false);
      expect(isConstructor('UserService')).toBe(false);
      expect(isConstructor(undefined)).toBe(false);
    });
  });
});

describe('Name variants', () => {
  describe('toStandardParamName', () => {
    it.each([
      ['CamelCase', 'camel_case'],
      ['UserService', 'user_service'],
      ['HTTPResponse', 'http_response'],
      ['ICatsRepository', 'icats_repository'],
      ['Cat', 'cat'],
      ['already_snake', 'already_snake'],
    ])('should convert %s to %s', (name, expected) => {
      expect(toStandardParamName(name)).toBe(expected);
    });
  });

  describe('getNameVariants', () => {
    it('should list the name, its lower case and its parameter form', () => {
      expect(getNameVariants('UserService')).toEqual(['UserService', 'userservice', 'user_service']);
    });

    it('should drop duplicate variants', () => {
      expect(getNameVariants('Cat')).toEqual(['Cat', 'cat']);
      expect(getNameVariants('cat')).toEqual(['cat']);
    });
  });

  describe('isAliasableName', () => {
    it('should exclude empty and dotted names', () => {
      expect(isAliasableName('')).toBe(false);
      expect(isAliasableName('app.Settings')).toBe(false);
      expect(isAliasableName('Settings')).toBe(true);
    });
  });
});
