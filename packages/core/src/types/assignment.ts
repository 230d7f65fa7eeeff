import { Board, BoardView, CandidateSet, CellId, Variant } from "./board";

/** What caused a cell to be recorded */
export type AssignmentSource =
  | "initial"
  | "eliminate"
  | "only-choice"
  | "naked-twins"
  | "search";

export interface AssignmentEntry {
  sequence: number;
  cell: CellId;
  /** The cell's candidates at the moment it was recorded */
  candidates: CandidateSet;
  source: AssignmentSource;
  /** Frozen copy of the whole board right after the assignment */
  snapshot: BoardView;
}

/** Serializable form of a single log entry, consumed by visualizers */
export interface ExportedAssignment {
  sequence: number;
  cell: CellId;
  source: AssignmentSource;
  candidates: number[];
  /** 81-character encoding of the snapshot, "." for undetermined cells */
  grid: string;
}

export interface AssignmentLogExport {
  variant: Variant;
  entries: ExportedAssignment[];
}

export interface SearchStats {
  /** Number of search calls, the root included */
  nodes: number;
  /** Trial assignments that led to a contradiction */
  backtracks: number;
}

export type SolveOutcome =
  | { status: "solved"; board: Board; grid: string; stats: SearchStats }
  | { status: "unsolvable"; stats: SearchStats };
