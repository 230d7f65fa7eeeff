import {
  Board,
  BoardView,
  SearchStats,
  SolveOutcome,
  Variant,
  cloneBoard,
  encodeGrid,
  parseGrid,
} from "@sudoprop/core";
import { Topology, getTopology } from "./Topology";
import { NullRecorder, Recorder } from "./AssignmentRecorder";
import { IPropagationRule } from "./interfaces/IPropagationRule";
import { DEFAULT_RULES, withEliminate } from "./rules";
import { search } from "./search";

export interface SudokuSolverOptions {
  variant?: Variant;
  /** Receives every solved-cell event; defaults to discarding them */
  recorder?: Recorder;
  /** Propagation rules in order; eliminate is added in front when missing */
  rules?: readonly IPropagationRule[];
  /** Optional debug log function */
  log?: (fields: Record<string, unknown>, message: string) => void;
}

/**
 * Runs one solve: parses the grid, records the starting board, then searches.
 * The topology is shared; the board and counters belong to this solver.
 */
export class SudokuSolver {
  private topology: Topology;
  private recorder: Recorder;
  private rules: readonly IPropagationRule[];
  private log?: (fields: Record<string, unknown>, message: string) => void;

  constructor(opts: SudokuSolverOptions = {}) {
    this.topology = getTopology(opts.variant ?? "standard");
    this.recorder = opts.recorder ?? new NullRecorder();
    this.rules = withEliminate(opts.rules ?? DEFAULT_RULES);
    this.log = opts.log;
  }

  getTopology(): Topology {
    return this.topology;
  }

  /**
   * Parse and solve an 81-character grid. Throws GridFormatError on
   * malformed input; an unsolvable puzzle is a normal outcome.
   */
  solveGrid(grid: string): SolveOutcome {
    return this.solveBoard(parseGrid(grid));
  }

  /** Solve from a parsed board. `board` itself is left untouched. */
  solveBoard(board: BoardView): SolveOutcome {
    const working: Board = cloneBoard(board);
    const stats: SearchStats = { nodes: 0, backtracks: 0 };

    this.recorder.recordInitial(working);
    this.log?.(
      { variant: this.topology.variant, rules: this.rules.map((r) => r.name) },
      "Search started"
    );

    const result = search(working, {
      topology: this.topology,
      recorder: this.recorder,
      rules: this.rules,
      stats,
    });

    if (result === false) {
      this.log?.({ ...stats }, "No solution");
      return { status: "unsolvable", stats };
    }

    this.log?.({ ...stats }, "Solved");
    return { status: "solved", board: result, grid: encodeGrid(result), stats };
  }
}

/** One-shot solve of a grid string */
export function solve(
  grid: string,
  options: SudokuSolverOptions = {}
): SolveOutcome {
  return new SudokuSolver(options).solveGrid(grid);
}
