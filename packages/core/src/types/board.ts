export const ROWS = ["A", "B", "C", "D", "E", "F", "G", "H", "I"] as const;
export const COLS = ["1", "2", "3", "4", "5", "6", "7", "8", "9"] as const;
export const DIGITS = [1, 2, 3, 4, 5, 6, 7, 8, 9] as const;

export type RowLabel = (typeof ROWS)[number];
export type ColLabel = (typeof COLS)[number];
export type Digit = (typeof DIGITS)[number];

/** Cell identifier, row letter then column digit (e.g. "A1", "I9") */
export type CellId = `${RowLabel}${ColLabel}`;

/**
 * Digits still possible for a cell, ascending.
 * Length 1 = solved, length 0 = contradiction.
 */
export type CandidateSet = readonly Digit[];

/** All 81 cells in row-major order mapped to their candidates */
export type Board = Map<CellId, CandidateSet>;

/** Read-only view of a board, as held in assignment snapshots */
export type BoardView = ReadonlyMap<CellId, CandidateSet>;

/** Nine cells that must hold each digit exactly once */
export type Unit = readonly CellId[];

export type Variant = "standard" | "diagonal";

export const VARIANTS: readonly Variant[] = ["standard", "diagonal"];

/** Cross product of row labels and column labels, row-major. */
export function cross<R extends RowLabel, C extends ColLabel>(
  rows: readonly R[],
  cols: readonly C[]
): `${R}${C}`[] {
  const result: `${R}${C}`[] = [];
  for (const r of rows) {
    for (const c of cols) {
      result.push(`${r}${c}` as const);
    }
  }
  return result;
}

export const CELLS: readonly CellId[] = cross(ROWS, COLS);

export function isDigit(value: number): value is Digit {
  return Number.isInteger(value) && value >= 1 && value <= 9;
}

export function isVariant(value: string): value is Variant {
  return value === "standard" || value === "diagonal";
}

/** Read a cell's candidates; a missing cell reads as a contradiction. */
export function candidatesOf(board: BoardView, cell: CellId): CandidateSet {
  return board.get(cell) ?? [];
}

/** Deep copy so that two search branches never share candidate arrays */
export function cloneBoard(board: BoardView): Board {
  const copy: Board = new Map();
  for (const [cell, candidates] of board) {
    copy.set(cell, [...candidates]);
  }
  return copy;
}

export function countSolvedCells(board: BoardView): number {
  let solved = 0;
  for (const candidates of board.values()) {
    if (candidates.length === 1) solved++;
  }
  return solved;
}

export function hasContradiction(board: BoardView): boolean {
  for (const cell of CELLS) {
    if (candidatesOf(board, cell).length === 0) return true;
  }
  return false;
}

export function isBoardComplete(board: BoardView): boolean {
  return CELLS.every((cell) => candidatesOf(board, cell).length === 1);
}

export function boardsEqual(a: BoardView, b: BoardView): boolean {
  for (const cell of CELLS) {
    const left = candidatesOf(a, cell);
    const right = candidatesOf(b, cell);
    if (left.length !== right.length) return false;
    for (let i = 0; i < left.length; i++) {
      if (left[i] !== right[i]) return false;
    }
  }
  return true;
}
