/**
 * Solve sudoku boards and report how long each solve took.
 *
 * Usage:
 *     npm run solve                                    solve every board in boards/
 *     npm run solve boards/01-few-gaps.txt             solve one board and print it
 *     npm run solve -- --verbose boards/03-blank.txt   also log every guess
 *     npm run solve -- --benchmark boards/02-sparse.txt 30  solve repeatedly for 30 seconds
 */

import {
  dirname,
  resolve
} from 'node:path';
import { fileURLToPath } from 'node:url';

import { runSolveCommand } from './solveCommand.ts';

const FIRST_CLI_ARG_INDEX = 2;

const ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..');

process.exitCode = runSolveCommand(process.argv.slice(FIRST_CLI_ARG_INDEX), {
  boardsDir: resolve(ROOT, 'boards'),
  output: console
});
