export interface AlreadyEliminatedResult {
  readonly type: 'alreadyEliminated';
}

export interface BecameFixedResult {
  readonly type: 'becameFixed';
  readonly value: Digit;
}

export interface CandidatesValue {
  readonly candidates: Set<Digit>;
  readonly kind: 'candidates';
}

export type CellValue = CandidatesValue | FixedValue;

export interface ContradictionResult {
  readonly type: 'contradiction';
}

/* eslint-disable no-magic-numbers -- The nine sudoku digits. */
export type Digit = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;
/* eslint-enable no-magic-numbers -- End digit type. */

export interface EliminatedResult {
  readonly type: 'eliminated';
}

export type EliminationResult =
  | AlreadyEliminatedResult
  | BecameFixedResult
  | ContradictionResult
  | EliminatedResult;

export interface FixedValue {
  readonly kind: 'fixed';
  readonly value: Digit;
}

/* eslint-disable no-magic-numbers -- The nine sudoku digits. */
export const DIGITS: readonly Digit[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];
/* eslint-enable no-magic-numbers -- End digit list. */

export const PLACEHOLDER_GLYPH = '.';

export class Cell {
  public get candidateCount(): number {
    return this.state.kind === 'candidates' ? this.state.candidates.size : 0;
  }

  public get fixedValue(): Digit | null {
    return this.state.kind === 'fixed' ? this.state.value : null;
  }

  public get isFixed(): boolean {
    return this.state.kind === 'fixed';
  }

  /** A snapshot of the cell's state; changing it does not affect the cell. */
  public get value(): CellValue {
    return copyValue(this.state);
  }

  private state: CellValue;

  public constructor(value: CellValue) {
    this.state = copyValue(value);
  }

  public static candidates(values: Iterable<Digit> = DIGITS): Cell {
    return new Cell({ candidates: new Set(values), kind: 'candidates' });
  }

  public static fixed(value: Digit): Cell {
    return new Cell({ kind: 'fixed', value });
  }

  public clone(): Cell {
    return new Cell(this.state);
  }

  /**
   * Rules `value` out for this cell.
   *
   * Removing the second-to-last candidate fixes the cell to the one that remains.
   * Removing the last one, or eliminating the digit a cell is fixed to, is a contradiction.
   */
  public eliminate(value: Digit): EliminationResult {
    if (this.state.kind === 'fixed') {
      return this.state.value === value ? { type: 'contradiction' } : { type: 'alreadyEliminated' };
    }

    const candidates = this.state.candidates;
    if (!candidates.delete(value)) {
      return { type: 'alreadyEliminated' };
    }

    if (candidates.size === 0) {
      return { type: 'contradiction' };
    }

    if (candidates.size === 1) {
      const [remaining] = candidates;
      if (remaining === undefined) {
        return { type: 'contradiction' };
      }
      this.state = { kind: 'fixed', value: remaining };
      return { type: 'becameFixed', value: remaining };
    }

    return { type: 'eliminated' };
  }

  public fix(value: Digit): void {
    this.state = { kind: 'fixed', value };
  }

  public getCandidates(): Digit[] {
    return this.state.kind === 'candidates' ? [...this.state.candidates].sort((a, b) => a - b) : [];
  }

  public hasCandidate(value: Digit): boolean {
    return this.state.kind === 'candidates' && this.state.candidates.has(value);
  }

  public toString(): string {
    return this.state.kind === 'fixed' ? String(this.state.value) : PLACEHOLDER_GLYPH;
  }
}

function copyValue(value: CellValue): CellValue {
  return value.kind === 'candidates'
    ? { candidates: new Set(value.candidates), kind: 'candidates' }
    : value;
}
