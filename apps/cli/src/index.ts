#!/usr/bin/env node
import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { registerSolveCommand } from "./commands/solve";
import { registerDisplayCommand } from "./commands/display";
import { registerConfigCommand } from "./commands/config";
import { initConfig, isLogLevel, setCliOverride } from "./config";
import log from "./logger";

program
  .name("sudoprop")
  .description("Sudoku solver: constraint propagation with backtracking search")
  .version("0.1.0", "-v, --version")
  .option("--log-level <level>", "Override the configured log level")
  .hook("preAction", async () => {
    const level: unknown = program.opts().logLevel;
    if (typeof level === "string") setCliOverride("logLevel", level);
    const config = await initConfig();
    if (isLogLevel(config.logLevel)) log.level(config.logLevel);
  });

registerSolveCommand(program);
registerDisplayCommand(program);
registerConfigCommand(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  log.error({ err }, "Command failed");
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
