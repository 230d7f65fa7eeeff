import { AssignmentEntry, renderBoard } from "@sudoprop/core";

export type Printer = (line: string) => void;

/**
 * Print the assignment log step by step: the starting board once, then
 * every solved-cell event with the board as it stood right after it.
 */
export function replayLog(log: readonly AssignmentEntry[], out: Printer): void {
  const initial = log.filter((entry) => entry.source === "initial");
  if (initial.length > 0) {
    out(`Initial board (${initial.length} cells):`);
    out(renderBoard(initial[0].snapshot));
    out("");
  }

  const steps = log.filter((entry) => entry.source !== "initial");
  steps.forEach((entry, i) => {
    out(
      `Step ${i + 1}/${steps.length}: ${entry.cell} = ${entry.candidates.join("")} (${entry.source})`,
    );
    out(renderBoard(entry.snapshot));
    out("");
  });
}
