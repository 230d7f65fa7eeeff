import { Board, CellId, DIGITS, candidatesOf } from "@sudoprop/core";
import {
  IPropagationRule,
  PropagationContext,
  assignCandidates,
} from "../interfaces/IPropagationRule";

/** A digit that fits only one cell of a unit goes in that cell. */
export function onlyChoice(board: Board, ctx: PropagationContext): Board {
  for (const unit of ctx.topology.units) {
    for (const digit of DIGITS) {
      const places: CellId[] = unit.filter((cell) =>
        candidatesOf(board, cell).includes(digit)
      );
      if (places.length === 1) {
        assignCandidates(board, places[0], [digit], ctx, "only-choice");
      }
    }
  }
  return board;
}

export const OnlyChoiceRule: IPropagationRule = {
  name: "only-choice",
  apply: onlyChoice,
};
