import { Board, CellId, Unit, candidatesOf } from "@sudoprop/core";
import {
  IPropagationRule,
  PropagationContext,
  assignCandidates,
} from "../interfaces/IPropagationRule";

/**
 * Pairs of distinct cells in `unit` whose candidate sets are identical and
 * hold exactly two digits.
 */
export function findTwinPairs(board: Board, unit: Unit): [CellId, CellId][] {
  const bivalue = unit.filter((cell) => candidatesOf(board, cell).length === 2);
  const pairs: [CellId, CellId][] = [];
  for (let i = 0; i < bivalue.length; i++) {
    const [a, b] = candidatesOf(board, bivalue[i]);
    for (let j = i + 1; j < bivalue.length; j++) {
      const [c, d] = candidatesOf(board, bivalue[j]);
      if (a === c && b === d) pairs.push([bivalue[i], bivalue[j]]);
    }
  }
  return pairs;
}

/**
 * When a unit holds exactly one naked pair, strip both of its digits from
 * every other cell of that unit. Units with several pairs, or with three or
 * more cells sharing the same two digits, are skipped.
 */
export function nakedTwins(board: Board, ctx: PropagationContext): Board {
  for (const unit of ctx.topology.units) {
    const pairs = findTwinPairs(board, unit);
    if (pairs.length !== 1) continue;

    const [first, second] = pairs[0];
    const twins = candidatesOf(board, first);
    for (const cell of unit) {
      if (cell === first || cell === second) continue;
      const candidates = candidatesOf(board, cell);
      if (!candidates.some((d) => twins.includes(d))) continue;
      assignCandidates(
        board,
        cell,
        candidates.filter((d) => !twins.includes(d)),
        ctx,
        "naked-twins"
      );
    }
  }
  return board;
}

export const NakedTwinsRule: IPropagationRule = {
  name: "naked-twins",
  apply: nakedTwins,
};
