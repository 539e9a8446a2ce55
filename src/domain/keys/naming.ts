/**
 * @fileoverview Name variants used for name-based resolution
 *
 * @module inject-graph/domain/keys
 */

const FIRST_CAP = /(.)([A-Z][a-z]+)/g;
const ALL_CAP = /([a-z0-9])([A-Z])/g;

/**
 * Convert a type name to the snake_case form a parameter would use.
 *
 * @example
 * ```typescript
 * toStandardParamName('CamelCase');       // 'camel_case'
 * toStandardParamName('HTTPResponse');    // 'http_response'
 * toStandardParamName('ICatsRepository'); // 'icats_repository'
 * ```
 */
export function toStandardParamName(name: string): string {
  const value = name.replace(FIRST_CAP, '$1_$2').replace(ALL_CAP, '$1_$2').toLowerCase();
  if (value.startsWith('i_')) {
    return 'i' + value.slice(2);
  }
  return value;
}

/**
 * The names under which a key is indexed for inferred aliases: the canonical
 * name, its lower-case form and its standard parameter name. Duplicates are
 * removed, order is kept.
 */
export function getNameVariants(name: string): string[] {
  return [...new Set([name, name.toLowerCase(), toStandardParamName(name)])];
}

/**
 * Names containing a dot (qualified or generated names) never take part in
 * name-based resolution.
 */
export function isAliasableName(name: string): boolean {
  return name.length > 0 && !name.includes('.');
}
