import { Command } from "commander";
import { parseGrid, renderBoard } from "@sudoprop/core";
import { Printer } from "../visualize";
import { EXIT_ERROR, EXIT_OK } from "./solve";

/** Print a grid as a board without solving it */
export function runDisplay(grid: string, out: Printer): number {
  try {
    out(renderBoard(parseGrid(grid)));
    return EXIT_OK;
  } catch (err: unknown) {
    if (err instanceof Error) {
      out(`Error: ${err.message}`);
      return EXIT_ERROR;
    }
    throw err;
  }
}

export function registerDisplayCommand(program: Command): void {
  program
    .command("display <grid>")
    .description("Render a grid with its candidates, without solving")
    .action((grid: string) => {
      process.exitCode = runDisplay(grid, (line) => console.log(line));
    });
}
