import {
  AssignmentEntry,
  AssignmentLogExport,
  AssignmentSource,
  BoardView,
  CandidateSet,
  CELLS,
  CellId,
  Variant,
  candidatesOf,
  encodeGrid,
} from "@sudoprop/core";

/** Sink for cell assignments made while solving */
export interface Recorder {
  /** Log every cell of the starting board, solved or not */
  recordInitial(board: BoardView): void;
  /** Log a cell that has just become solved */
  record(board: BoardView, cell: CellId, source: AssignmentSource): void;
}

/**
 * Append-only log of board snapshots, one per solved-cell event.
 * Each solve run owns its own recorder.
 */
export class AssignmentRecorder implements Recorder {
  private variant: Variant;
  private entries: AssignmentEntry[] = [];

  constructor(variant: Variant = "standard") {
    this.variant = variant;
  }

  recordInitial(board: BoardView): void {
    const snapshot = freeze(board);
    for (const cell of CELLS) {
      this.push(cell, snapshot, "initial");
    }
  }

  record(board: BoardView, cell: CellId, source: AssignmentSource): void {
    this.push(cell, freeze(board), source);
  }

  getLog(): readonly AssignmentEntry[] {
    return this.entries;
  }

  getEntryCount(): number {
    return this.entries.length;
  }

  toJSON(): AssignmentLogExport {
    return {
      variant: this.variant,
      entries: this.entries.map((entry) => ({
        sequence: entry.sequence,
        cell: entry.cell,
        source: entry.source,
        candidates: [...entry.candidates],
        grid: encodeGrid(entry.snapshot),
      })),
    };
  }

  private push(cell: CellId, snapshot: BoardView, source: AssignmentSource): void {
    this.entries.push({
      sequence: this.entries.length,
      cell,
      candidates: candidatesOf(snapshot, cell),
      source,
      snapshot,
    });
  }
}

/** Discards everything; used when the caller wants no log */
export class NullRecorder implements Recorder {
  recordInitial(_board: BoardView): void {}

  record(_board: BoardView, _cell: CellId, _source: AssignmentSource): void {}
}

/** Copy of the board holding all 81 cells in row-major order, arrays frozen */
function freeze(board: BoardView): BoardView {
  const copy = new Map<CellId, CandidateSet>();
  for (const cell of CELLS) {
    copy.set(cell, Object.freeze([...candidatesOf(board, cell)]));
  }
  return copy;
}
