import type { Board } from '../Board.ts';
import type { Digit } from '../Cell.ts';
import type { Point } from '../geometry.ts';
import type {
  Guess,
  GuessStrategy
} from './GuessStrategy.ts';

import {
  adjacentCells,
  allPoints
} from '../geometry.ts';

interface ScoredGuess extends Guess {
  readonly candidateCount: number;
  readonly possibleValuesRemoved: number;
  readonly spacesSolved: number;
}

const PAIR_SIZE = 2;

/**
 * Prefers the cell with the fewest candidates, then the digit that would fix the
 * most adjacent pair cells, then the digit that would prune the most adjacent cells.
 *
 * Ties keep the first guess in row-major, ascending-digit order.
 */
export class MostConstrainedGuessStrategy implements GuessStrategy {
  public pickGuess(board: Board): Guess {
    let best: null | ScoredGuess = null;

    for (const point of allPoints()) {
      const cell = board.getCell(point);
      if (cell.isFixed) {
        continue;
      }
      const candidateCount = cell.candidateCount;
      if (best && candidateCount > best.candidateCount) {
        continue;
      }
      for (const value of cell.getCandidates()) {
        const scored = this.score(board, point, value, candidateCount);
        if (!best || this.isBetter(scored, best)) {
          best = scored;
        }
      }
    }

    if (!best) {
      throw new Error('Cannot pick a guess on a solved board');
    }
    return { point: best.point, value: best.value };
  }

  private isBetter(candidate: ScoredGuess, best: ScoredGuess): boolean {
    if (candidate.candidateCount !== best.candidateCount) {
      return candidate.candidateCount < best.candidateCount;
    }
    if (candidate.spacesSolved !== best.spacesSolved) {
      return candidate.spacesSolved > best.spacesSolved;
    }
    return candidate.possibleValuesRemoved > best.possibleValuesRemoved;
  }

  private score(board: Board, point: Point, value: Digit, candidateCount: number): ScoredGuess {
    let spacesSolved = 0;
    let possibleValuesRemoved = 0;
    for (const adjacent of adjacentCells(point)) {
      const cell = board.getCell(adjacent);
      if (!cell.hasCandidate(value)) {
        continue;
      }
      possibleValuesRemoved++;
      if (cell.candidateCount === PAIR_SIZE) {
        spacesSolved++;
      }
    }
    return { candidateCount, point, possibleValuesRemoved, spacesSolved, value };
  }
}
