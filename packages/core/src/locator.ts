/**
 * Locator parsing
 * Turns strings such as `#login`, `//button`, `~submit` or `text=Sign in`
 * into strategy/value pairs that each driver translates to its own syntax.
 */

import type { Locator, LocatorInput, LocatorStrategy } from './schema.js';

const STRATEGIES: readonly LocatorStrategy[] = [
  'css',
  'xpath',
  'id',
  'name',
  'text',
  'testId',
  'accessibilityId',
  'className',
];

const PREFIX = /^([A-Za-z]+)=(.+)$/s;

function isStrategy(value: string): value is LocatorStrategy {
  return (STRATEGIES as readonly string[]).includes(value);
}

export function parseLocator(input: LocatorInput): Locator {
  if (typeof input !== 'string') {
    if (input.value.trim() === '') {
      throw new Error(`Locator value for strategy "${input.strategy}" is empty`);
    }
    return { strategy: input.strategy, value: input.value };
  }

  const raw = input.trim();
  if (raw === '') {
    throw new Error('Locator string is empty');
  }

  const prefixed = PREFIX.exec(raw);
  if (prefixed && isStrategy(prefixed[1])) {
    return { strategy: prefixed[1], value: prefixed[2] };
  }

  if (raw.startsWith('//') || raw.startsWith('(//') || raw.startsWith('./')) {
    return { strategy: 'xpath', value: raw };
  }

  if (raw.startsWith('~') && raw.length > 1) {
    return { strategy: 'accessibilityId', value: raw.slice(1) };
  }

  return { strategy: 'css', value: raw };
}

export function describeLocator(locator: Locator): string {
  return locator.strategy === 'css' ? locator.value : `${locator.strategy}=${locator.value}`;
}

/** Quotes a value for use inside a CSS attribute selector. */
export function cssString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/** Quotes a value as an XPath 1.0 string literal, falling back to concat() when it holds both quote kinds. */
export function xpathString(value: string): string {
  if (!value.includes('"')) return `"${value}"`;
  if (!value.includes("'")) return `'${value}'`;
  const parts = value.split('"').map((part) => `"${part}"`);
  return `concat(${parts.join(`, '"', `)})`;
}
