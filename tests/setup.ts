/**
 * @fileoverview Jest test setup and global utilities
 *
 * Loads reflect-metadata once for every test file and provides custom
 * matchers for container errors.
 */

import 'reflect-metadata';
import { DIException } from '../src/domain/exceptions';

// ============================================================================
// Global Type Declarations
// ============================================================================

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace jest {
    interface Matchers<R, T = {}> {
      /**
       * Check if error is of specific type
       * @param expected Error constructor
       */
      toThrowErrorType(expected: new (...args: any[]) => Error): R;

      /**
       * Check the dependency graph carried by a thrown container error
       * @param expected Rendered graph
       */
      toThrowWithDependencyGraph(expected: string): R;
    }
  }
}

// ============================================================================
// Custom Jest Matchers
// ============================================================================

expect.extend({
  /**
   * Check if thrown error is of specific type
   */
  toThrowErrorType(received: () => void, expected: new (...args: any[]) => Error) {
    try {
      received();
      return {
        pass: false,
        message: () => `Expected function to throw ${expected.name}, but it didn't throw`,
      };
    } catch (error) {
      const pass = error instanceof expected;
      return {
        pass,
        message: () =>
          pass
            ? `Expected function not to throw ${expected.name}`
            : `Expected function to throw ${expected.name}, but it threw ${
                error instanceof Error ? error.constructor.name : typeof error
              }`,
      };
    }
  },

  /**
   * Check the dependency graph of a thrown DIException
   */
  toThrowWithDependencyGraph(received: () => void, expected: string) {
    try {
      received();
      return {
        pass: false,
        message: () => "Expected function to throw a DIException, but it didn't throw",
      };
    } catch (error) {
      if (!(error instanceof DIException)) {
        return {
          pass: false,
          message: () => 'Expected function to throw a DIException',
        };
      }
      const pass = error.dependencyGraph === expected;
      return {
        pass,
        message: () =>
          pass
            ? 'Expected a different dependency graph'
            : `Expected dependency graph:\n${expected}\nReceived:\n${error.dependencyGraph}`,
      };
    }
  },
});
