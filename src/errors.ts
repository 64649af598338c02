import type { Digit } from './Cell.ts';
import type { Point } from './geometry.ts';

import { formatPoint } from './geometry.ts';

export type SudokuErrorKind = 'invalidAssignment' | 'overwrite' | 'parse' | 'unsolvable';

/**
 * Base class for every failure the engine raises while parsing or mutating a board.
 *
 * The solver treats any `SudokuError` thrown inside a speculative branch as proof
 * that the branch's guess was wrong.
 */
export abstract class SudokuError extends Error {
  public abstract readonly kind: SudokuErrorKind;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidAssignmentError extends SudokuError {
  public readonly kind = 'invalidAssignment';

  public constructor(public readonly point: Point, public readonly value: Digit) {
    super(`Cannot assign ${String(value)} to ${formatPoint(point)}: not a remaining candidate`);
  }
}

export class OverwriteError extends SudokuError {
  public readonly kind = 'overwrite';

  public constructor(public readonly point: Point, public readonly existing: Digit, public readonly value: Digit) {
    super(`Cannot assign ${String(value)} to ${formatPoint(point)}: already fixed to ${String(existing)}`);
  }
}

export class ParseError extends SudokuError {
  public readonly kind = 'parse';

  public constructor(public readonly cellCount: number) {
    super(`Expected 81 cells but found ${String(cellCount)}`);
  }
}

export class UnsolvableError extends SudokuError {
  public readonly kind = 'unsolvable';

  public constructor(message: string) {
    super(message);
  }
}
