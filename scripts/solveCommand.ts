import { existsSync } from 'node:fs';
import { basename } from 'node:path';

import type {
  BoardSpec,
  Guess,
  SolveObserver
} from '../src/index.ts';

import {
  Board,
  formatPoint,
  listBoardFiles,
  loadBoardSpec,
  solve
} from '../src/index.ts';

export interface CommandOutput {
  error(message: string): void;
  log(message: string): void;
}

export interface SolveCommandOptions {
  readonly boardsDir: string;
  readonly output: CommandOutput;
}

interface LoadedBoard {
  readonly board: Board;
  readonly spec: BoardSpec;
}

interface SolveOutcome {
  readonly microseconds: number;
  readonly solved: boolean;
}

const DEFAULT_BENCHMARK_SECONDS = 10;
const MICROSECONDS_PER_MILLISECOND = 1000;
const MILLISECONDS_PER_SECOND = 1000;
const QUANTILE_COUNT = 10;
const MEDIAN_QUANTILE_INDEX = 4;

class LoggingSolveObserver implements SolveObserver {
  public constructor(private readonly output: CommandOutput) {
  }

  public onBranchAdopted(guess: Guess, depth: number): void {
    this.output.log(`${indent(depth)}Kept ${describeGuess(guess)}`);
  }

  public onGuess(guess: Guess, depth: number): void {
    this.output.log(`${indent(depth)}Guessing ${describeGuess(guess)}`);
  }

  public onGuessRejected(guess: Guess, depth: number): void {
    this.output.log(`${indent(depth)}Ruled out ${describeGuess(guess)}`);
  }
}

/**
 * Runs the solve command and returns the process exit code.
 *
 * With no board path every file in `boardsDir` is solved; otherwise the one board is
 * solved and printed, or timed repeatedly under `--benchmark <board> [seconds]`.
 */
export function runSolveCommand(args: readonly string[], options: SolveCommandOptions): number {
  const { boardsDir, output } = options;
  const verbose = args.includes('--verbose');
  const isBenchmark = args.includes('--benchmark');
  const positional = args.filter((arg) => !arg.startsWith('--'));
  const boardPath = positional[0];

  if (boardPath === undefined) {
    if (isBenchmark) {
      output.error('Usage: npm run solve -- --benchmark <board> [seconds]');
      return 1;
    }
    solveAllBoards(boardsDir, output);
    return 0;
  }

  if (!existsSync(boardPath)) {
    output.error(`Can't find board at ${boardPath}`);
    return 1;
  }

  const loaded = readBoard(boardPath, output);
  if (loaded === null) {
    return 1;
  }

  if (isBenchmark) {
    const seconds = positional[1] === undefined ? DEFAULT_BENCHMARK_SECONDS : Number(positional[1]);
    if (!Number.isFinite(seconds) || seconds <= 0) {
      output.error(`Invalid benchmark duration: ${String(positional[1])}`);
      return 1;
    }
    benchmark(loaded.spec.text, seconds, output);
    return 0;
  }

  solveSingleBoard(loaded, verbose, output);
  return 0;
}

function benchmark(text: string, seconds: number, output: CommandOutput): void {
  const end = performance.now() + seconds * MILLISECONDS_PER_SECOND;
  const times: number[] = [];
  let solvedCount = 0;

  while (performance.now() < end) {
    const outcome = timeSolve(Board.parse(text));
    if (outcome.solved) {
      solvedCount++;
    }
    times.push(outcome.microseconds);
  }

  times.sort((a, b) => a - b);
  const quantiles: number[] = [];
  for (let quantile = 1; quantile < QUANTILE_COUNT; quantile++) {
    const index = Math.min(Math.round(quantile / QUANTILE_COUNT * times.length), times.length - 1);
    quantiles.push(times[index] ?? 0);
  }

  output.log(`Trials: ${String(times.length)} (${String(solvedCount)} solved)`);
  output.log(`10-quantiles: [${quantiles.join(', ')}]`);
  output.log(`Median: ${String(quantiles[MEDIAN_QUANTILE_INDEX] ?? 0)}`);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeGuess(guess: Guess): string {
  return `${String(guess.value)} at ${formatPoint(guess.point)}`;
}

function indent(depth: number): string {
  return '  '.repeat(depth);
}

function readBoard(boardPath: string, output: CommandOutput): LoadedBoard | null {
  try {
    const spec = loadBoardSpec(boardPath);
    return { board: Board.parse(spec.text), spec };
  } catch (error: unknown) {
    output.error(`Couldn't read ${basename(boardPath)}: ${describeError(error)}`);
    return null;
  }
}

function solveAllBoards(boardsDir: string, output: CommandOutput): void {
  if (!existsSync(boardsDir)) {
    output.error('`boards` dir doesn\'t exist');
    output.error('Run with a path as an argument to solve a sudoku');
    return;
  }

  for (const boardPath of listBoardFiles(boardsDir)) {
    const loaded = readBoard(boardPath, output);
    if (loaded === null) {
      continue;
    }
    const { microseconds, solved } = timeSolve(loaded.board);
    output.log(`${basename(boardPath)}\t${solved ? 'Solved' : 'Unsolvable'} in ${String(microseconds)}us`);
  }
}

function solveSingleBoard(loaded: LoadedBoard, verbose: boolean, output: CommandOutput): void {
  const { board, spec } = loaded;
  const { microseconds, solved } = timeSolve(board, verbose ? new LoggingSolveObserver(output) : undefined);

  output.log(`Board ${spec.title}`);
  output.log(board.toString());
  if (solved) {
    output.log(`Solved in ${String(microseconds)}us`);
  } else {
    output.log(`Found that no solutions exist in ${String(microseconds)}us`);
  }
}

function timeSolve(board: Board, observer?: SolveObserver): SolveOutcome {
  const start = performance.now();
  const solved = solve(board, observer ? { observer } : {});
  const microseconds = Math.round((performance.now() - start) * MICROSECONDS_PER_MILLISECOND);
  return { microseconds, solved };
}
