import { BoardView, CELLS, candidatesOf, isBoardComplete } from "@sudoprop/core";
import { Topology } from "./Topology";

/** Check if the board is completely and correctly solved */
export function isSolvedBoard(board: BoardView, topology: Topology): boolean {
  if (!isBoardComplete(board)) return false;
  // Every unit holds nine distinct digits
  for (const unit of topology.units) {
    const seen = new Set<number>();
    for (const cell of unit) seen.add(candidatesOf(board, cell)[0]);
    if (seen.size !== 9) return false;
  }
  return true;
}

/** True when every given of `puzzle` is still the value in `solution` */
export function respectsGivens(puzzle: BoardView, solution: BoardView): boolean {
  for (const cell of CELLS) {
    const given = candidatesOf(puzzle, cell);
    if (given.length !== 1) continue;
    const solved = candidatesOf(solution, cell);
    if (solved.length !== 1 || solved[0] !== given[0]) return false;
  }
  return true;
}
