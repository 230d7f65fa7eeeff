export { Topology, getTopology } from "./Topology";
export { AssignmentRecorder, NullRecorder } from "./AssignmentRecorder";
export type { Recorder } from "./AssignmentRecorder";
export { assignCandidates } from "./interfaces/IPropagationRule";
export type {
  IPropagationRule,
  PropagationContext,
} from "./interfaces/IPropagationRule";
export {
  DEFAULT_RULES,
  selectRules,
  withEliminate,
  eliminate,
  onlyChoice,
  nakedTwins,
  findTwinPairs,
  EliminateRule,
  OnlyChoiceRule,
  NakedTwinsRule,
} from "./rules";
export { reducePuzzle } from "./reduce";
export { search, selectBranchCell } from "./search";
export type { SearchContext } from "./search";
export { isSolvedBoard, respectsGivens } from "./verify";
export { SudokuSolver, solve } from "./SudokuSolver";
export type { SudokuSolverOptions } from "./SudokuSolver";
