import { Command } from "commander";
import type Logger from "bunyan";
import {
  GridFormatError,
  SolveOutcome,
  Variant,
  isVariant,
  renderBoard,
} from "@sudoprop/core";
import {
  AssignmentRecorder,
  DEFAULT_RULES,
  IPropagationRule,
  SudokuSolver,
  selectRules,
} from "@sudoprop/engine";
import { ConfigData, getConfig } from "../config";
import { Printer, exportLog, replayLog, runVisualizer } from "../visualize";
import log from "../logger";

export interface SolveCommandOptions {
  diagonal?: boolean;
  replay?: boolean;
  export?: string;
  rules?: string;
}

export interface CommandContext {
  config: ConfigData;
  log: Logger;
  out: Printer;
}

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_UNSOLVABLE = 2;

export function resolveVariant(
  opts: { diagonal?: boolean },
  config: ConfigData,
): Variant {
  if (opts.diagonal) return "diagonal";
  return isVariant(config.variant) ? config.variant : "standard";
}

function parseRules(spec: string | undefined): readonly IPropagationRule[] {
  if (!spec) return DEFAULT_RULES;
  return selectRules(
    spec
      .split(",")
      .map((name) => name.trim())
      .filter((name) => name !== ""),
  );
}

function fail(ctx: CommandContext, message: string): number {
  ctx.log.info({ err: message }, "Solve rejected");
  ctx.out(`Error: ${message}`);
  return EXIT_ERROR;
}

/**
 * Solve one grid and print the result. Replay and export run afterwards;
 * their failures never change the exit code.
 */
export async function runSolve(
  grid: string,
  opts: SolveCommandOptions,
  ctx: CommandContext,
): Promise<number> {
  const variant = resolveVariant(opts, ctx.config);
  const recorder = new AssignmentRecorder(variant);

  let rules: readonly IPropagationRule[];
  try {
    rules = parseRules(opts.rules);
  } catch (err: unknown) {
    if (err instanceof Error) return fail(ctx, err.message);
    throw err;
  }

  const solver = new SudokuSolver({
    variant,
    recorder,
    rules,
    log: (fields, message) => ctx.log.debug(fields, message),
  });

  let outcome: SolveOutcome;
  try {
    outcome = solver.solveGrid(grid);
  } catch (err: unknown) {
    if (err instanceof GridFormatError) return fail(ctx, err.message);
    throw err;
  }

  let code = EXIT_OK;
  if (outcome.status === "solved") {
    ctx.log.info({ variant, ...outcome.stats }, "Solved");
    ctx.out(renderBoard(outcome.board));
    ctx.out("");
    ctx.out(outcome.grid);
  } else {
    ctx.log.info({ variant, ...outcome.stats }, "No solution");
    ctx.out("No solution.");
    code = EXIT_UNSOLVABLE;
  }
  ctx.out(
    `Search: ${outcome.stats.nodes} nodes, ${outcome.stats.backtracks} backtracks, ${recorder.getEntryCount()} log entries`,
  );

  if (opts.replay) {
    ctx.out("");
    await runVisualizer("replay", () => replayLog(recorder.getLog(), ctx.out), ctx.log, ctx.out);
  }

  const exportPath = opts.export || ctx.config.exportPath;
  if (exportPath) {
    await runVisualizer(
      "export",
      async () => {
        const count = await exportLog(recorder, exportPath);
        ctx.out(`Assignment log (${count} entries) written to ${exportPath}`);
      },
      ctx.log,
      ctx.out,
    );
  }

  return code;
}

export function registerSolveCommand(program: Command): void {
  program
    .command("solve <grid>")
    .description("Solve an 81-character grid (1-9 for givens, . for unknowns)")
    .option("-d, --diagonal", "Also require both main diagonals to hold 1-9")
    .option("-r, --replay", "Print every assignment step after solving")
    .option("-e, --export <file>", "Write the assignment log as JSON")
    .option("--rules <list>", "Comma-separated propagation rules (eliminate is always on)")
    .action(async (grid: string, opts: SolveCommandOptions) => {
      process.exitCode = await runSolve(grid, opts, {
        config: getConfig(),
        log,
        out: (line) => console.log(line),
      });
    });
}
