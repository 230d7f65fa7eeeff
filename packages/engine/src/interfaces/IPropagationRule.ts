import { AssignmentSource, Board, CandidateSet, CellId } from "@sudoprop/core";
import { Topology } from "../Topology";
import { Recorder } from "../AssignmentRecorder";

/** Shared, read-only inputs every propagation rule receives */
export interface PropagationContext {
  topology: Topology;
  recorder: Recorder;
}

/**
 * A constraint-propagation rule. Rules narrow candidate sets in place and
 * return the board they were given.
 */
export interface IPropagationRule {
  /** Stable name, used for rule selection from the CLI */
  readonly name: string;

  apply(board: Board, ctx: PropagationContext): Board;
}

/**
 * Set a cell's candidates, recording it when the cell goes from
 * undetermined to solved.
 */
export function assignCandidates(
  board: Board,
  cell: CellId,
  candidates: CandidateSet,
  ctx: PropagationContext,
  source: AssignmentSource
): void {
  const before = board.get(cell)?.length ?? 0;
  board.set(cell, candidates);
  if (candidates.length === 1 && before !== 1) {
    ctx.recorder.record(board, cell, source);
  }
}
