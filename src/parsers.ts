import type { CellValue } from './Cell.ts';

import { DIGITS } from './Cell.ts';
import { ParseError } from './errors.ts';
import { CELL_COUNT } from './geometry.ts';
import { ensureDigit } from './typeGuards.ts';

/**
 * Maps one character of board text to a cell value.
 *
 * `1`-`9` are givens, any ASCII letter or `0` is an empty cell, and everything
 * else returns `null` so the caller can skip it.
 */
export function parseCellValue(char: string): CellValue | null {
  if (/^[1-9]$/.test(char)) {
    return { kind: 'fixed', value: ensureDigit(parseInt(char, 10)) };
  }
  if (/^[0a-zA-Z]$/.test(char)) {
    return { candidates: new Set(DIGITS), kind: 'candidates' };
  }
  return null;
}

/** Reads the first 81 recognized characters of `text`, row-major. */
export function parseCellValues(text: string): CellValue[] {
  const values: CellValue[] = [];
  for (const char of text) {
    const value = parseCellValue(char);
    if (value === null) {
      continue;
    }
    values.push(value);
    if (values.length === CELL_COUNT) {
      return values;
    }
  }
  throw new ParseError(values.length);
}
