/**
 * @fileoverview Parameter names from function source text
 *
 * Parameter names are not part of any run-time metadata, so they are read
 * from `Function.prototype.toString()`. The scanner only understands what it
 * must: nesting of brackets, string and template literals, and comments.
 *
 * Naming rules for a parameter list:
 * - a rest parameter (`...items`) is skipped;
 * - a default value (`retries = 3`) is dropped;
 * - a destructured parameter (`{ id }`, `[first]`) is named `arg<index>`.
 */

const IDENTIFIER = /^[A-Za-z_$][\w$]*/;
const LEADING_TRIVIA = /^(?:\s|\/\*[\s\S]*?\*\/|\/\/[^\n]*\n?)*/;
const CLASS_SOURCE = /^class[\s{]/;
const BARE_ARROW = /^(?:async\s+)?([A-Za-z_$][\w$]*)\s*=>/;
const IDENTIFIER_CHAR = /[\w$]/;
const FORWARDING_BODY = /^\s*\{\s*super\(\.\.\.arguments\)/;

/**
 * Index just past the literal or comment starting at `index`, or `index`
 * itself when none starts there.
 */
function skipLiteral(source: string, index: number): number {
  const char = source[index];
  const next = source[index + 1];
  if (char === '/' && next === '/') {
    const end = source.indexOf('\n', index);
    return end === -1 ? source.length : end + 1;
  }
  if (char === '/' && next === '*') {
    const end = source.indexOf('*/', index + 2);
    return end === -1 ? source.length : end + 2;
  }
  if (char === '"' || char === "'" || char === '`') {
    let i = index + 1;
    while (i < source.length && source[i] !== char) {
      i += source[i] === '\\' ? 2 : 1;
    }
    return i + 1;
  }
  return index;
}

/**
 * Index of the bracket closing the one at `open`.
 */
function findClosing(source: string, open: number): number {
  let depth = 0;
  let i = open;
  while (i < source.length) {
    const skipped = skipLiteral(source, i);
    if (skipped !== i) {
      i = skipped;
      continue;
    }
    const char = source[i];
    if (char === '(' || char === '[' || char === '{') {
      depth++;
    } else if (char === ')' || char === ']' || char === '}') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
    i++;
  }
  return source.length;
}

/**
 * Split a parameter list on its top-level commas.
 */
function splitParameters(list: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  let i = 0;
  while (i < list.length) {
    const skipped = skipLiteral(list, i);
    if (skipped !== i) {
      i = skipped;
      continue;
    }
    const char = list[i];
    if (char === '(' || char === '[' || char === '{') {
      depth++;
    } else if (char === ')' || char === ']' || char === '}') {
      depth--;
    } else if (char === ',' && depth === 0) {
      parts.push(list.slice(start, i));
      start = i + 1;
    }
    i++;
  }
  parts.push(list.slice(start));
  return parts;
}

/**
 * Names of the parameters in a list, following the naming rules above.
 */
export function parseParameterList(list: string): string[] {
  const names: string[] = [];
  splitParameters(list).forEach((part, index) => {
    const parameter = part.replace(LEADING_TRIVIA, '');
    if (parameter.length === 0 || parameter.startsWith('...')) {
      return;
    }
    const match = IDENTIFIER.exec(parameter);
    names.push(match ? match[0] : `arg${index}`);
  });
  return names;
}

function parseListAt(source: string, open: number): string[] {
  return parseParameterList(source.slice(open + 1, findClosing(source, open)));
}

/**
 * Parameter names of the constructor declared directly in a class body.
 *
 * @returns `undefined` when the class declares no constructor of its own
 */
function parseClassConstructor(source: string): string[] | undefined {
  let i = 0;
  let depth = 0;
  let bodyStart = -1;
  while (i < source.length && bodyStart === -1) {
    const skipped = skipLiteral(source, i);
    if (skipped !== i) {
      i = skipped;
      continue;
    }
    const char = source[i];
    if (char === '{' && depth === 0) {
      bodyStart = i;
    } else if (char === '(' || char === '[' || char === '{') {
      depth++;
    } else if (char === ')' || char === ']' || char === '}') {
      depth--;
    }
    i++;
  }
  if (bodyStart === -1) {
    return undefined;
  }

  depth = 0;
  i = bodyStart + 1;
  while (i < source.length) {
    const skipped = skipLiteral(source, i);
    if (skipped !== i) {
      i = skipped;
      continue;
    }
    const char = source[i];
    if (char === '(' || char === '[' || char === '{') {
      depth++;
    } else if (char === ')' || char === ']' || char === '}') {
      depth--;
      if (depth < 0) {
        return undefined;
      }
    } else if (depth === 0 && isConstructorAt(source, i)) {
      const open = source.indexOf('(', i);
      const close = findClosing(source, open);
      const names = parseParameterList(source.slice(open + 1, close));
      // compiler-generated constructor forwarding to the base class
      if (names.length === 0 && FORWARDING_BODY.test(source.slice(close + 1))) {
        return undefined;
      }
      return names;
    }
    i++;
  }
  return undefined;
}

function isConstructorAt(source: string, index: number): boolean {
  if (!source.startsWith('constructor', index)) {
    return false;
  }
  const before = source[index - 1] ?? '';
  if (IDENTIFIER_CHAR.test(before) || before === '.') {
    return false;
  }
  const rest = source.slice(index + 'constructor'.length);
  return /^\s*\(/.test(rest);
}

/**
 * Source text of a function, trimmed.
 */
export function getSource(fn: Function): string {
  return Function.prototype.toString.call(fn).trim();
}

export function isClassSource(source: string): boolean {
  return CLASS_SOURCE.test(source);
}

/**
 * Constructor parameter names of a class or constructor function.
 *
 * @returns `undefined` for a class that declares no constructor itself;
 * inherited constructors are not looked at
 */
export function parseConstructorParameters(type: Function): string[] | undefined {
  const source = getSource(type);
  if (isClassSource(source)) {
    return parseClassConstructor(source);
  }
  return parseCallableParameters(type);
}

/**
 * Parameter names of a function, arrow function or method.
 */
export function parseCallableParameters(fn: Function): string[] {
  const source = getSource(fn);
  if (isClassSource(source)) {
    return parseClassConstructor(source) ?? [];
  }
  const arrow = BARE_ARROW.exec(source);
  if (arrow) {
    return [arrow[1]];
  }
  let i = 0;
  while (i < source.length) {
    const skipped = skipLiteral(source, i);
    if (skipped !== i) {
      i = skipped;
      continue;
    }
    if (source[i] === '(') {
      return parseListAt(source, i);
    }
    i++;
  }
  return [];
}
