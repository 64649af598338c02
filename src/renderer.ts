import type { Board } from './Board.ts';

import {
  BOARD_SIZE,
  BOX_SIZE
} from './geometry.ts';

const BOX_SEPARATOR = '|';
const SEPARATOR_LINE = '------+-------+------';

/**
 * Renders the board as 11 lines: nine rows of space-separated cells with a `|`
 * after the third and sixth columns, and a horizontal rule after the third and
 * sixth rows.
 */
export function renderBoardLines(board: Board): string[] {
  const lines: string[] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    const tokens: string[] = [];
    for (let col = 0; col < BOARD_SIZE; col++) {
      tokens.push(board.getCell({ col, row }).toString());
      if (isBoxBoundary(col)) {
        tokens.push(BOX_SEPARATOR);
      }
    }
    lines.push(tokens.join(' '));
    if (isBoxBoundary(row)) {
      lines.push(SEPARATOR_LINE);
    }
  }
  return lines;
}

function isBoxBoundary(index: number): boolean {
  return index % BOX_SIZE === BOX_SIZE - 1 && index < BOARD_SIZE - 1;
}
