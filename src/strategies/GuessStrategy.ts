import type { Board } from '../Board.ts';
import type { Digit } from '../Cell.ts';
import type { Point } from '../geometry.ts';

export interface Guess {
  readonly point: Point;
  readonly value: Digit;
}

/** Chooses the speculative assignment to try when propagation stalls. */
export interface GuessStrategy {
  pickGuess(board: Board): Guess;
}
