import type { Board } from './Board.ts';
import type {
  Guess,
  GuessStrategy
} from './strategies/GuessStrategy.ts';

import { SudokuError } from './errors.ts';
import { MostConstrainedGuessStrategy } from './strategies/MostConstrainedGuessStrategy.ts';

export interface SolveObserver {
  onBranchAdopted?(guess: Guess, depth: number): void;
  onGuess?(guess: Guess, depth: number): void;
  onGuessRejected?(guess: Guess, depth: number): void;
}

export interface SolveOptions {
  readonly guessStrategy?: GuessStrategy;
  readonly observer?: SolveObserver;
}

class BacktrackingSolver {
  public constructor(private readonly guessStrategy: GuessStrategy, private readonly observer: SolveObserver) {
  }

  public solve(board: Board, depth: number): boolean {
    const propagated = this.tryPropagate(() => {
      board.initialCheck();
      return board.isSolved() || board.narrowFull();
    });
    if (propagated !== null) {
      return propagated;
    }

    for (;;) {
      const guess = this.guessStrategy.pickGuess(board);
      this.observer.onGuess?.(guess, depth);

      const branch = board.clone();
      if (this.tryBranch(branch, guess, depth)) {
        board.adopt(branch);
        this.observer.onBranchAdopted?.(guess, depth);
        return true;
      }
      this.observer.onGuessRejected?.(guess, depth);

      const result = board.eliminate(guess.point, guess.value);
      if (result.type === 'contradiction') {
        return false;
      }
      if (result.type === 'becameFixed') {
        const forced = result.value;
        const outcome = this.tryPropagate(() => {
          board.fillSpace(guess.point, forced);
          return board.isSolved() || board.narrowFull();
        });
        if (outcome !== null) {
          return outcome;
        }
      }
    }
  }

  private tryBranch(branch: Board, guess: Guess, depth: number): boolean {
    try {
      branch.fillSpace(guess.point, guess.value);
    } catch (error: unknown) {
      if (error instanceof SudokuError) {
        return false;
      }
      throw error;
    }
    return this.solve(branch, depth + 1);
  }

  /**
   * Runs a propagation step, turning engine errors into `false`.
   *
   * Returns `null` when the board is still unsolved and the search has to guess.
   */
  private tryPropagate(step: () => boolean): boolean | null {
    try {
      return step() ? true : null;
    } catch (error: unknown) {
      if (error instanceof SudokuError) {
        return false;
      }
      throw error;
    }
  }
}

/**
 * Solves `board` in place by propagation, falling back to guesses on cloned boards.
 *
 * Returns `false` when the puzzle has no solution; the board is then left in
 * whatever partially propagated state the search reached.
 */
export function solve(board: Board, options: SolveOptions = {}): boolean {
  return new BacktrackingSolver(options.guessStrategy ?? new MostConstrainedGuessStrategy(), options.observer ?? {}).solve(board, 0);
}
