import { ensureNonNullable } from './typeGuards.ts';

export const BOARD_SIZE = 9;
export const BOX_SIZE = 3;
export const CELL_COUNT = BOARD_SIZE * BOARD_SIZE;

export interface Point {
  readonly col: number;
  readonly row: number;
}

/** A row, column or 3x3 box: nine points that must hold each digit exactly once. */
export interface Unit {
  readonly id: number;
  readonly points: readonly Point[];
  readonly type: UnitType;
}

export type UnitType = 'box' | 'column' | 'row';

const CHAR_CODE_A = 65;

const POINTS: readonly Point[] = Array.from({ length: CELL_COUNT }, (_, index) => ({
  col: index % BOARD_SIZE,
  row: Math.floor(index / BOARD_SIZE)
}));

const ADJACENT: readonly (readonly Point[])[] = POINTS.map(computeAdjacentCells);

const UNITS: readonly Unit[] = [
  ...Array.from({ length: BOARD_SIZE }, (_, id) => buildUnit('row', id)),
  ...Array.from({ length: BOARD_SIZE }, (_, id) => buildUnit('column', id)),
  ...Array.from({ length: BOARD_SIZE }, (_, id) => buildUnit('box', id))
];

/**
 * Returns the 20 points that share a row, column or box with `point`, excluding `point` itself.
 *
 * The order is fixed: the rest of the row by column, the rest of the column by row,
 * then the four box cells outside both, row-major.
 */
export function adjacentCells(point: Point): readonly Point[] {
  return ensureNonNullable(ADJACENT[pointIndex(point)]);
}

export function allPoints(): readonly Point[] {
  return POINTS;
}

/** Rows 0-8, then columns 0-8, then boxes 0-8. */
export function allUnits(): readonly Unit[] {
  return UNITS;
}

/** Formats a point as a spreadsheet-style reference: column letter, 1-based row. */
export function formatPoint(point: Point): string {
  return String.fromCharCode(CHAR_CODE_A + point.col) + String(point.row + 1);
}

export function formatUnit(unit: Unit): string {
  switch (unit.type) {
    case 'box':
      return `Box ${String(unit.id + 1)}`;
    case 'column':
      return `Column ${String.fromCharCode(CHAR_CODE_A + unit.id)}`;
    case 'row':
      return `Row ${String(unit.id + 1)}`;
    default: {
      const exhaustive: never = unit.type;
      throw new Error(`Unknown unit type: ${String(exhaustive)}`);
    }
  }
}

export function pointIndex(point: Point): number {
  if (!isInBounds(point.row) || !isInBounds(point.col)) {
    throw new Error(`Point out of bounds: (${String(point.row)}, ${String(point.col)})`);
  }
  return point.row * BOARD_SIZE + point.col;
}

function buildUnit(type: UnitType, id: number): Unit {
  const points: Point[] = [];
  for (let i = 0; i < BOARD_SIZE; i++) {
    switch (type) {
      case 'box': {
        const boxRow = Math.floor(id / BOX_SIZE) * BOX_SIZE;
        const boxCol = (id % BOX_SIZE) * BOX_SIZE;
        points.push({ col: boxCol + i % BOX_SIZE, row: boxRow + Math.floor(i / BOX_SIZE) });
        break;
      }
      case 'column':
        points.push({ col: id, row: i });
        break;
      case 'row':
        points.push({ col: i, row: id });
        break;
      default: {
        const exhaustive: never = type;
        throw new Error(`Unknown unit type: ${String(exhaustive)}`);
      }
    }
  }
  return { id, points, type };
}

function computeAdjacentCells(point: Point): Point[] {
  const result: Point[] = [];
  for (let col = 0; col < BOARD_SIZE; col++) {
    if (col !== point.col) {
      result.push({ col, row: point.row });
    }
  }
  for (let row = 0; row < BOARD_SIZE; row++) {
    if (row !== point.row) {
      result.push({ col: point.col, row });
    }
  }

  const rowOffset = point.row % BOX_SIZE;
  const colOffset = point.col % BOX_SIZE;
  const boxRow = point.row - rowOffset;
  const boxCol = point.col - colOffset;
  for (let r = 0; r < BOX_SIZE; r++) {
    if (r === rowOffset) {
      continue;
    }
    for (let c = 0; c < BOX_SIZE; c++) {
      if (c !== colOffset) {
        result.push({ col: boxCol + c, row: boxRow + r });
      }
    }
  }
  return result;
}

function isInBounds(coordinate: number): boolean {
  return Number.isInteger(coordinate) && coordinate >= 0 && coordinate < BOARD_SIZE;
}
