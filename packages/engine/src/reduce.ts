import { Board, countSolvedCells, hasContradiction } from "@sudoprop/core";
import {
  IPropagationRule,
  PropagationContext,
} from "./interfaces/IPropagationRule";
import { DEFAULT_RULES } from "./rules";

/**
 * Apply the rules in order until the number of solved cells stops growing.
 * Returns the board at that fixed point, or false once any cell has no
 * candidates left. The board is narrowed in place.
 */
export function reducePuzzle(
  board: Board,
  ctx: PropagationContext,
  rules: readonly IPropagationRule[] = DEFAULT_RULES
): Board | false {
  let stalled = false;
  while (!stalled) {
    const solvedBefore = countSolvedCells(board);
    for (const rule of rules) {
      board = rule.apply(board, ctx);
    }
    const solvedAfter = countSolvedCells(board);
    stalled = solvedBefore === solvedAfter;

    if (hasContradiction(board)) {
      return false;
    }
  }
  return board;
}
