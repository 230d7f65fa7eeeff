import { GridFormatError } from "../errors";
import {
  Board,
  BoardView,
  CELLS,
  DIGITS,
  candidatesOf,
  isDigit,
} from "../types/board";

export const GRID_LENGTH = 81;
export const EMPTY_SYMBOL = ".";

const GRID_CHAR_RE = /^[1-9]$/;

/**
 * Parse an 81-character grid (digits for givens, "." for unknowns) into a
 * board. Unknown cells start with every digit as a candidate.
 */
export function parseGrid(grid: string): Board {
  if (grid.length !== GRID_LENGTH) {
    throw new GridFormatError(
      `Grid must be exactly ${GRID_LENGTH} characters, got ${grid.length}`
    );
  }

  const board: Board = new Map();
  CELLS.forEach((cell, i) => {
    const ch = grid[i];
    if (ch === EMPTY_SYMBOL) {
      board.set(cell, [...DIGITS]);
      return;
    }
    const value = Number(ch);
    if (!GRID_CHAR_RE.test(ch) || !isDigit(value)) {
      throw new GridFormatError(
        `Invalid character "${ch}" at position ${i} (cell ${cell}). Use 1-9 for givens and "${EMPTY_SYMBOL}" for unknowns.`,
        i
      );
    }
    board.set(cell, [value]);
  });
  return board;
}

/** Encode a board as 81 characters, "." for cells that are not solved. */
export function encodeGrid(board: BoardView): string {
  return CELLS.map((cell) => {
    const candidates = candidatesOf(board, cell);
    return candidates.length === 1 ? String(candidates[0]) : EMPTY_SYMBOL;
  }).join("");
}
