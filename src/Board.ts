import type {
  Digit,
  EliminationResult
} from './Cell.ts';
import type {
  Point,
  Unit
} from './geometry.ts';

import {
  Cell,
  DIGITS
} from './Cell.ts';
import {
  InvalidAssignmentError,
  OverwriteError,
  UnsolvableError
} from './errors.ts';
import {
  adjacentCells,
  allPoints,
  allUnits,
  formatPoint,
  formatUnit,
  pointIndex
} from './geometry.ts';
import { parseCellValues } from './parsers.ts';
import { renderBoardLines } from './renderer.ts';
import { ensureNonNullable } from './typeGuards.ts';

interface FixedEntry {
  readonly point: Point;
  readonly value: Digit;
}

const UNRESOLVED_COMPACT_GLYPH = '0';

export class Board {
  public get emptyCount(): number {
    return this._emptyCount;
  }

  public get isInitialized(): boolean {
    return this._initialized;
  }

  private _emptyCount: number;
  private _initialized: boolean;
  private cells: Cell[];

  private constructor(cells: Cell[], emptyCount: number, initialized: boolean) {
    this.cells = cells;
    this._emptyCount = emptyCount;
    this._initialized = initialized;
  }

  /** Builds a board from board text; throws `ParseError` when fewer than 81 cells are recognized. */
  public static parse(text: string): Board {
    const cells = parseCellValues(text).map((value) => new Cell(value));
    const emptyCount = cells.filter((cell) => !cell.isFixed).length;
    return new Board(cells, emptyCount, false);
  }

  /** Replaces this board's whole state with `other`'s, e.g. to keep a solved speculative branch. */
  public adopt(other: Board): void {
    this.cells = other.cells.map((cell) => cell.clone());
    this._emptyCount = other._emptyCount;
    this._initialized = other._initialized;
  }

  public clone(): Board {
    return new Board(this.cells.map((cell) => cell.clone()), this._emptyCount, this._initialized);
  }

  /** Eliminates `value` at `point`, keeping `emptyCount` in step when the cell becomes fixed. */
  public eliminate(point: Point, value: Digit): EliminationResult {
    const result = this.getCell(point).eliminate(value);
    if (result.type === 'becameFixed') {
      this._emptyCount--;
    }
    return result;
  }

  /**
   * Assigns `value` to `point` and propagates it to every adjacent cell.
   *
   * Adjacent cells forced down to a single candidate are filled recursively.
   * Returns how many cells this call fixed, cascades included; re-assigning a cell
   * its current value fixes nothing new but still propagates.
   */
  public fillSpace(point: Point, value: Digit): number {
    const cell = this.getCell(point);
    let newlyKnown = 0;

    const existing = cell.fixedValue;
    if (existing === null) {
      if (!cell.hasCandidate(value)) {
        throw new InvalidAssignmentError(point, value);
      }
      cell.fix(value);
      this._emptyCount--;
      newlyKnown++;
    } else if (existing !== value) {
      throw new OverwriteError(point, existing, value);
    }

    for (const adjacent of adjacentCells(point)) {
      const result = this.eliminate(adjacent, value);
      switch (result.type) {
        case 'alreadyEliminated':
        case 'eliminated':
          break;
        case 'becameFixed':
          newlyKnown++;
          newlyKnown += this.fillSpace(adjacent, result.value);
          break;
        case 'contradiction':
          throw new UnsolvableError(`Placing ${String(value)} at ${formatPoint(point)} contradicts ${formatPoint(adjacent)}`);
        default: {
          const exhaustive: never = result;
          throw new Error(`Unknown elimination result: ${String(exhaustive)}`);
        }
      }
    }

    return newlyKnown;
  }

  public getCell(point: Point): Cell {
    return ensureNonNullable(this.cells[pointIndex(point)]);
  }

  /**
   * Removes every given digit from the cells it can see, following any cells that become fixed.
   *
   * Runs once per board; later calls return immediately.
   */
  public initialCheck(): void {
    if (this._initialized) {
      return;
    }
    this._initialized = true;

    const queue: FixedEntry[] = [];
    for (const point of allPoints()) {
      const value = this.getCell(point).fixedValue;
      if (value !== null) {
        queue.push({ point, value });
      }
    }

    let entry = queue.shift();
    while (entry !== undefined) {
      for (const adjacent of adjacentCells(entry.point)) {
        const result = this.eliminate(adjacent, entry.value);
        if (result.type === 'contradiction') {
          throw new UnsolvableError(`${formatPoint(entry.point)} and ${formatPoint(adjacent)} both hold ${String(entry.value)}`);
        }
        if (result.type === 'becameFixed') {
          queue.push({ point: adjacent, value: result.value });
        }
      }
      entry = queue.shift();
    }
  }

  public isSolved(): boolean {
    return this._emptyCount === 0;
  }

  /**
   * Places every digit that has exactly one possible cell left in some unit.
   *
   * Throws `UnsolvableError` when a unit has no cell left for a digit it has not placed.
   * Returns how many cells were fixed, cascades included.
   */
  public narrow(): number {
    let newlyKnown = 0;
    for (const unit of allUnits()) {
      newlyKnown += this.narrowUnit(unit);
    }
    return newlyKnown;
  }

  /** Repeats `narrow` until it stops making progress; returns whether the board is solved. */
  public narrowFull(): boolean {
    let newlyKnown = this.narrow();
    while (newlyKnown > 0 && !this.isSolved()) {
      newlyKnown = this.narrow();
    }
    return this.isSolved();
  }

  /** The board as 81 characters, `0` for unresolved cells; `Board.parse` reads it back. */
  public toCompactString(): string {
    return this.cells.map((cell) => cell.fixedValue ?? UNRESOLVED_COMPACT_GLYPH).join('');
  }

  public toString(): string {
    return renderBoardLines(this).join('\n');
  }

  private narrowUnit(unit: Unit): number {
    let newlyKnown = 0;
    for (const digit of DIGITS) {
      if (unit.points.some((point) => this.getCell(point).fixedValue === digit)) {
        continue;
      }
      const holders = unit.points.filter((point) => this.getCell(point).hasCandidate(digit));
      const [only] = holders;
      if (only === undefined) {
        throw new UnsolvableError(`${formatUnit(unit)} has no place left for ${String(digit)}`);
      }
      if (holders.length === 1) {
        newlyKnown += this.fillSpace(only, digit);
      }
    }
    return newlyKnown;
  }
}
