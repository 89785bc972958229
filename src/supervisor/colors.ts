import type { ColorToken } from './types';

export const RESET = '\u001b[0m';

export const COLOR_TABLE: readonly ColorToken[] = Object.freeze([
  { name: 'cyan', code: '\u001b[36m' },
  { name: 'magenta', code: '\u001b[35m' },
  { name: 'red', code: '\u001b[31m' },
  { name: 'green', code: '\u001b[32m' },
  { name: 'yellow', code: '\u001b[33m' },
] satisfies ColorToken[]);

/**
 * Color for the process at launch index `index`: cycles through the table.
 */
export function pickColor(index: number): ColorToken {
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`Color index must be a non-negative integer, got ${index}`);
  }
  return COLOR_TABLE[index % COLOR_TABLE.length];
}

export function withoutColor(token: ColorToken): ColorToken {
  return { name: token.name, code: '' };
}
