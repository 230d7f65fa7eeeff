import { Board, candidatesOf } from "@sudoprop/core";
import {
  IPropagationRule,
  PropagationContext,
  assignCandidates,
} from "../interfaces/IPropagationRule";

/** Remove each solved cell's digit from all of its peers. */
export function eliminate(board: Board, ctx: PropagationContext): Board {
  const solved = ctx.topology.cells.filter(
    (cell) => candidatesOf(board, cell).length === 1
  );

  for (const cell of solved) {
    const current = candidatesOf(board, cell);
    // An earlier elimination in this pass may have emptied it.
    if (current.length !== 1) continue;
    const digit = current[0];
    for (const peer of ctx.topology.peersOf(cell)) {
      const candidates = candidatesOf(board, peer);
      if (!candidates.includes(digit)) continue;
      assignCandidates(
        board,
        peer,
        candidates.filter((d) => d !== digit),
        ctx,
        "eliminate"
      );
    }
  }
  return board;
}

export const EliminateRule: IPropagationRule = {
  name: "eliminate",
  apply: eliminate,
};
