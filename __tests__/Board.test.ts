import {
  describe,
  expect,
  it
} from 'vitest';

import { Board } from '../src/Board.ts';
import {
  InvalidAssignmentError,
  OverwriteError,
  ParseError,
  UnsolvableError
} from '../src/errors.ts';
import {
  blankCells,
  countCandidateCells,
  EMPTY_GRID,
  findDuplicateDigits,
  gridWith,
  point,
  SOLVED_GRID
} from './boardTestHelper.ts';

// Digit 1 is ruled out of A1's row everywhere except A1 itself.
const HIDDEN_SINGLE_GRID = gridWith([
  [point(1, 3), 1],
  [point(2, 6), 1],
  [point(3, 1), 1],
  [point(6, 2), 1]
]);

// Row 3 has no cell left for digit 1.
const NO_PLACE_FOR_ONE_GRID = gridWith([
  [point(0, 3), 1],
  [point(1, 6), 1],
  [point(5, 0), 1],
  [point(2, 1), 2],
  [point(2, 2), 3]
]);

describe('Board.parse', () => {
  it('counts unresolved cells', () => {
    const board = Board.parse(blankCells(SOLVED_GRID, [point(4, 4)]));
    expect(board.emptyCount).toBe(1);
    expect(board.isSolved()).toBe(false);
    expect(board.isInitialized).toBe(false);
  });

  it('treats a complete grid as solved', () => {
    const board = Board.parse(SOLVED_GRID);
    expect(board.emptyCount).toBe(0);
    expect(board.isSolved()).toBe(true);
  });

  it('accepts letters as placeholders and ignores layout characters', () => {
    const text = [
      'x2x | 456 | 789',
      ...SOLVED_GRID.slice(9).match(/.{9}/g) ?? []
    ].join('\n');
    const board = Board.parse(text);
    expect(board.emptyCount).toBe(2);
    expect(board.toCompactString()).toBe(`020${SOLVED_GRID.slice(3)}`);
  });

  it('fails with a parse error when only 80 cells are recognized', () => {
    expect(() => Board.parse(SOLVED_GRID.slice(1))).toThrow(ParseError);
  });

  it('accepts a board whose givens conflict', () => {
    const board = Board.parse(gridWith([[point(0, 0), 5], [point(0, 5), 5]]));
    expect(board.emptyCount).toBe(79);
  });
});

describe('initialCheck', () => {
  it('fills a cell that its givens force', () => {
    const board = Board.parse(blankCells(SOLVED_GRID, [point(4, 4)]));
    board.initialCheck();
    expect(board.getCell(point(4, 4)).fixedValue).toBe(9);
    expect(board.isSolved()).toBe(true);
    expect(board.isInitialized).toBe(true);
  });

  it('follows cells fixed along the way', () => {
    const board = Board.parse(gridWith(([1, 2, 3, 4, 5, 6, 7, 8] as const).map((value, col) => [point(0, col), value] as const)));
    board.initialCheck();
    expect(board.getCell(point(0, 8)).fixedValue).toBe(9);
    expect(board.emptyCount).toBe(72);
    expect(board.getCell(point(1, 8)).getCandidates()).toEqual([1, 2, 3, 4, 5, 6]);
    expect(countCandidateCells(board)).toBe(board.emptyCount);
  });

  it('rejects two equal givens in one row', () => {
    const board = Board.parse(gridWith([[point(0, 0), 5], [point(0, 5), 5]]));
    expect(() => {
      board.initialCheck();
    }).toThrow(UnsolvableError);
  });

  it('runs only once per board', () => {
    const board = Board.parse(gridWith([[point(0, 0), 5], [point(0, 5), 5]]));
    expect(() => {
      board.initialCheck();
    }).toThrow(UnsolvableError);
    expect(() => {
      board.initialCheck();
    }).not.toThrow();
  });
});

describe('fillSpace', () => {
  it('counts the cells fixed by the cascade', () => {
    const board = Board.parse(EMPTY_GRID);
    for (const value of [3, 4, 5, 6, 7, 8, 9] as const) {
      expect(board.eliminate(point(0, 1), value)).toEqual({ type: 'eliminated' });
    }

    expect(board.fillSpace(point(0, 0), 1)).toBe(2);
    expect(board.emptyCount).toBe(79);
    expect(board.getCell(point(0, 1)).fixedValue).toBe(2);
    expect(board.getCell(point(0, 2)).getCandidates()).toEqual([3, 4, 5, 6, 7, 8, 9]);
    expect(board.getCell(point(1, 0)).getCandidates()).toEqual([3, 4, 5, 6, 7, 8, 9]);
    expect(countCandidateCells(board)).toBe(board.emptyCount);
  });

  it('still propagates when the cell already holds the value', () => {
    const board = Board.parse(gridWith([[point(0, 0), 5]]));
    expect(board.fillSpace(point(0, 0), 5)).toBe(0);
    expect(board.emptyCount).toBe(80);
    expect(board.getCell(point(0, 1)).hasCandidate(5)).toBe(false);
    expect(board.getCell(point(1, 1)).hasCandidate(5)).toBe(false);
    expect(board.getCell(point(1, 3)).hasCandidate(5)).toBe(true);
  });

  it('refuses to overwrite a different fixed value', () => {
    const board = Board.parse(gridWith([[point(0, 0), 5]]));
    expect(() => board.fillSpace(point(0, 0), 3)).toThrow(OverwriteError);
    expect(() => board.fillSpace(point(0, 0), 3)).toThrow('Cannot assign 3 to A1: already fixed to 5');
  });

  it('refuses a value that is no longer a candidate', () => {
    const board = Board.parse(gridWith([[point(0, 0), 5]]));
    board.initialCheck();
    expect(() => board.fillSpace(point(0, 1), 5)).toThrow(InvalidAssignmentError);
  });

  it('fails when a neighbour already holds the value', () => {
    const board = Board.parse(gridWith([[point(0, 1), 5]]));
    expect(() => board.fillSpace(point(0, 0), 5)).toThrow(UnsolvableError);
  });
});

describe('narrow', () => {
  it('places a digit that fits only one cell of a unit', () => {
    const board = Board.parse(HIDDEN_SINGLE_GRID);
    board.initialCheck();
    expect(board.emptyCount).toBe(77);
    expect(board.narrow()).toBe(1);
    expect(board.getCell(point(0, 0)).fixedValue).toBe(1);
    expect(board.emptyCount).toBe(76);
  });

  it('returns 0 and changes nothing once no unit has a single placement', () => {
    const board = Board.parse(HIDDEN_SINGLE_GRID);
    board.initialCheck();
    board.narrow();
    const before = board.toCompactString();
    const candidatesBefore = board.getCell(point(4, 4)).getCandidates();

    expect(board.narrow()).toBe(0);
    expect(board.toCompactString()).toBe(before);
    expect(board.getCell(point(4, 4)).getCandidates()).toEqual(candidatesBefore);
    expect(board.emptyCount).toBe(76);
  });

  it('does nothing on an empty board', () => {
    const board = Board.parse(EMPTY_GRID);
    board.initialCheck();
    expect(board.narrow()).toBe(0);
    expect(board.emptyCount).toBe(81);
  });

  it('fails when a unit has no cell left for a digit', () => {
    const board = Board.parse(NO_PLACE_FOR_ONE_GRID);
    board.initialCheck();
    expect(() => board.narrow()).toThrow('Row 3 has no place left for 1');
  });
});

describe('narrowFull', () => {
  it('solves a board whose last gap is a single placement', () => {
    const board = Board.parse(blankCells(SOLVED_GRID, [point(4, 4)]));
    expect(board.narrowFull()).toBe(true);
    expect(board.getCell(point(4, 4)).fixedValue).toBe(9);
  });

  it('stops when narrowing makes no more progress', () => {
    const board = Board.parse(HIDDEN_SINGLE_GRID);
    board.initialCheck();
    expect(board.narrowFull()).toBe(false);
    expect(board.emptyCount).toBe(76);
    expect(findDuplicateDigits(board)).toEqual([]);
  });

  it('propagates failures', () => {
    const board = Board.parse(NO_PLACE_FOR_ONE_GRID);
    board.initialCheck();
    expect(() => board.narrowFull()).toThrow(UnsolvableError);
  });
});

describe('eliminate', () => {
  it('decrements the empty count when a cell becomes fixed', () => {
    const board = Board.parse(EMPTY_GRID);
    for (const value of [1, 2, 3, 4, 5, 6, 7] as const) {
      board.eliminate(point(0, 0), value);
    }
    expect(board.emptyCount).toBe(81);
    expect(board.eliminate(point(0, 0), 8)).toEqual({ type: 'becameFixed', value: 9 });
    expect(board.emptyCount).toBe(80);
    expect(board.eliminate(point(0, 0), 9)).toEqual({ type: 'contradiction' });
  });
});

describe('clone and adopt', () => {
  it('keeps clones independent of the original', () => {
    const board = Board.parse(EMPTY_GRID);
    board.initialCheck();
    const copy = board.clone();
    copy.fillSpace(point(0, 0), 4);

    expect(copy.isInitialized).toBe(true);
    expect(copy.emptyCount).toBe(80);
    expect(board.emptyCount).toBe(81);
    expect(board.getCell(point(0, 0)).fixedValue).toBeNull();
    expect(board.getCell(point(0, 1)).hasCandidate(4)).toBe(true);
  });

  it('adopts another board\'s state', () => {
    const board = Board.parse(blankCells(SOLVED_GRID, [point(4, 4)]));
    const copy = board.clone();
    copy.initialCheck();
    board.adopt(copy);

    expect(board.isSolved()).toBe(true);
    expect(board.isInitialized).toBe(true);
    expect(board.toCompactString()).toBe(SOLVED_GRID);
  });

  it('does not share cells with the adopted board', () => {
    const board = Board.parse(EMPTY_GRID);
    const other = Board.parse(EMPTY_GRID);
    board.adopt(other);
    other.fillSpace(point(0, 0), 1);
    expect(board.getCell(point(0, 0)).fixedValue).toBeNull();
  });
});

describe('toCompactString', () => {
  it('writes unresolved cells as 0 so the text parses back', () => {
    const text = blankCells(SOLVED_GRID, [point(0, 0), point(8, 8)]);
    const board = Board.parse(text);
    expect(board.toCompactString()).toBe(text);
    expect(Board.parse(board.toCompactString()).emptyCount).toBe(2);
  });
});

describe('getCell', () => {
  it('keeps the board consistent when a read cell value is changed', () => {
    const board = Board.parse(EMPTY_GRID);
    const value = board.getCell(point(0, 0)).value;
    if (value.kind === 'candidates') {
      value.candidates.clear();
    }
    expect(board.getCell(point(0, 0)).candidateCount).toBe(9);
    expect(board.emptyCount).toBe(81);
    expect(countCandidateCells(board)).toBe(81);
  });
});
