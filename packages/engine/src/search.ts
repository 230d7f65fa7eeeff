import {
  Board,
  CellId,
  SearchStats,
  candidatesOf,
  cloneBoard,
} from "@sudoprop/core";
import {
  IPropagationRule,
  PropagationContext,
  assignCandidates,
} from "./interfaces/IPropagationRule";
import { reducePuzzle } from "./reduce";
import { DEFAULT_RULES } from "./rules";

export interface SearchContext extends PropagationContext {
  rules?: readonly IPropagationRule[];
  /** Counters updated as the search runs */
  stats?: SearchStats;
}

/**
 * Undetermined cell with the fewest candidates, first in row-major order
 * on ties. Null when every cell is solved.
 */
export function selectBranchCell(
  board: Board,
  cells: readonly CellId[]
): CellId | null {
  let best: CellId | null = null;
  let bestSize = Infinity;
  for (const cell of cells) {
    const size = candidatesOf(board, cell).length;
    if (size > 1 && size < bestSize) {
      best = cell;
      bestSize = size;
    }
  }
  return best;
}

/**
 * Depth-first search with propagation at every node. Returns a fully solved
 * board or false when no solution is reachable from `board`.
 * The board passed in is narrowed in place; each trial works on its own copy.
 */
export function search(board: Board, ctx: SearchContext): Board | false {
  if (ctx.stats) ctx.stats.nodes++;

  const reduced = reducePuzzle(board, ctx, ctx.rules ?? DEFAULT_RULES);
  if (reduced === false) return false;

  const cell = selectBranchCell(reduced, ctx.topology.cells);
  if (cell === null) return reduced;

  const options = [...candidatesOf(reduced, cell)].sort((a, b) => a - b);
  for (const digit of options) {
    const trial = cloneBoard(reduced);
    assignCandidates(trial, cell, [digit], ctx, "search");

    const result = search(trial, ctx);
    if (result !== false) return result;
    if (ctx.stats) ctx.stats.backtracks++;
  }

  return false;
}
