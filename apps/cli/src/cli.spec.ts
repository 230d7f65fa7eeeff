import { strict as assert } from "assert";
import { mkdtempSync, readFileSync, rmSync, writeFileSync, mkdirSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import bunyan from "bunyan";
import { renderBoard, parseGrid } from "@sudoprop/core";
import { runSolve, resolveVariant, CommandContext } from "./commands/solve";
import { runDisplay } from "./commands/display";
import { runConfigGet, runConfigList, runConfigSet } from "./commands/config";
import {
  ConfigData,
  DEFAULTS,
  ENV_MAP,
  CONFIG_KEYS,
  clearCliOverrides,
  getConfig,
  getConfigPath,
  initConfig,
  resolveConfig,
  setCliOverride,
} from "./config";
import { replayLog, runVisualizer } from "./visualize";

const PATTERN =
  "123456789456789123789123456234567891567891234891234567345678912678912345912345678";

const DIAGONAL_PUZZLE =
  "2.............62....1....7...6..8...3...9...7...6..4...4....8....52.............3";

const DIAGONAL_SOLUTION =
  "267945381853716249491823576576438192384192657129657438642379815935281764718564923";

interface LogRecord {
  level: number;
  msg: string;
}

function harness(config: Partial<ConfigData> = {}): {
  ctx: CommandContext;
  lines: string[];
  records: LogRecord[];
} {
  const records: LogRecord[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      records.push(JSON.parse(chunk.toString()));
      callback();
    },
  });
  const log = bunyan.createLogger({
    name: "sudoprop-test",
    streams: [{ stream: sink, level: "trace" }],
  });
  const lines: string[] = [];
  return {
    ctx: { config: { ...DEFAULTS, ...config }, log, out: (line) => lines.push(line) },
    lines,
    records,
  };
}

describe("solve command", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "sudoprop-solve-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("prints the board, the grid and search stats", async () => {
    const { ctx, lines } = harness();
    const code = await runSolve(DIAGONAL_PUZZLE, { diagonal: true }, ctx);

    assert.equal(code, 0);
    assert.deepEqual(lines, [
      renderBoard(parseGrid(DIAGONAL_SOLUTION)),
      "",
      DIAGONAL_SOLUTION,
      "Search: 1 nodes, 0 backtracks, 145 log entries",
    ]);
  });

  it("takes the variant from config when --diagonal is absent", () => {
    assert.equal(resolveVariant({}, { ...DEFAULTS, variant: "diagonal" }), "diagonal");
    assert.equal(resolveVariant({}, { ...DEFAULTS, variant: "bogus" }), "standard");
    assert.equal(resolveVariant({ diagonal: true }, DEFAULTS), "diagonal");
  });

  it("exits with 2 when there is no solution", async () => {
    const { ctx, lines, records } = harness();
    const code = await runSolve("11" + ".".repeat(79), {}, ctx);

    assert.equal(code, 2);
    assert.deepEqual(lines, ["No solution.", "Search: 1 nodes, 0 backtracks, 81 log entries"]);
    assert.ok(records.some((r) => r.msg === "No solution" && r.level === bunyan.INFO));
  });

  it("rejects a malformed grid", async () => {
    const { ctx, lines } = harness();
    const code = await runSolve("123", {}, ctx);

    assert.equal(code, 1);
    assert.deepEqual(lines, ["Error: Grid must be exactly 81 characters, got 3"]);
  });

  it("does not trim whitespace from the grid", async () => {
    const { ctx, lines } = harness();
    const code = await runSolve(` ${PATTERN.slice(1)}`, {}, ctx);

    assert.equal(code, 1);
    assert.equal(lines[0].startsWith('Error: Invalid character " " at position 0'), true);
  });

  it("rejects an unknown rule", async () => {
    const { ctx, lines } = harness();
    const code = await runSolve(PATTERN, { rules: "eliminate, x-wing" }, ctx);

    assert.equal(code, 1);
    assert.deepEqual(lines, [
      'Error: Unknown rule: "x-wing". Valid rules: eliminate, only-choice, naked-twins',
    ]);
  });

  it("replays every step after solving", async () => {
    const puzzle = "." + PATTERN.slice(1);
    const { ctx, lines } = harness();
    const code = await runSolve(puzzle, { replay: true }, ctx);

    assert.equal(code, 0);
    assert.deepEqual(lines.slice(3), [
      "Search: 1 nodes, 0 backtracks, 82 log entries",
      "",
      "Initial board (81 cells):",
      renderBoard(parseGrid(puzzle)),
      "",
      "Step 1/1: A1 = 1 (eliminate)",
      renderBoard(parseGrid(PATTERN)),
      "",
    ]);
  });

  it("exports the assignment log as JSON", async () => {
    const file = join(dir, "log.json");
    const { ctx, lines } = harness();
    const code = await runSolve(PATTERN, { export: file }, ctx);

    assert.equal(code, 0);
    assert.equal(lines[lines.length - 1], `Assignment log (81 entries) written to ${file}`);
    const exported = JSON.parse(readFileSync(file, "utf-8"));
    assert.equal(exported.variant, "standard");
    assert.equal(exported.entries.length, 81);
    assert.deepEqual(exported.entries[0], {
      candidates: [1],
      cell: "A1",
      grid: PATTERN,
      sequence: 0,
      source: "initial",
    });
  });

  it("uses the configured export path", async () => {
    const file = join(dir, "configured.json");
    const { ctx } = harness({ exportPath: file });
    await runSolve(PATTERN, {}, ctx);
    assert.equal(JSON.parse(readFileSync(file, "utf-8")).entries.length, 81);
  });

  it("downgrades an export failure to a notice", async () => {
    const file = join(dir, "missing", "log.json");
    const { ctx, lines, records } = harness();
    const code = await runSolve(PATTERN, { export: file }, ctx);

    assert.equal(code, 0);
    assert.equal(lines[0], renderBoard(parseGrid(PATTERN)));
    assert.ok(lines[lines.length - 1].startsWith("Note: export of the assignment log failed ("));
    assert.ok(records.some((r) => r.msg === "Visualizer failed" && r.level === bunyan.WARN));
  });
});

describe("runVisualizer", () => {
  it("reports a thrown error and returns false", async () => {
    const { ctx, lines } = harness();
    const ok = await runVisualizer(
      "replay",
      () => {
        throw new Error("no terminal");
      },
      ctx.log,
      ctx.out,
    );

    assert.equal(ok, false);
    assert.deepEqual(lines, [
      "Note: replay of the assignment log failed (no terminal). The result above is unaffected.",
    ]);
  });

  it("returns true when the task succeeds", async () => {
    const { ctx, lines } = harness();
    assert.equal(await runVisualizer("replay", () => undefined, ctx.log, ctx.out), true);
    assert.deepEqual(lines, []);
  });
});

describe("replayLog", () => {
  it("prints nothing for an empty log", () => {
    const lines: string[] = [];
    replayLog([], (line) => lines.push(line));
    assert.deepEqual(lines, []);
  });
});

describe("display command", () => {
  it("renders candidates without solving", () => {
    const lines: string[] = [];
    const code = runDisplay("1" + ".".repeat(80), (line) => lines.push(line));

    assert.equal(code, 0);
    const first = lines[0].split("\n")[0];
    assert.ok(first.startsWith("    1     123456789 123456789 |123456789 "));
  });

  it("reports a malformed grid", () => {
    const lines: string[] = [];
    assert.equal(runDisplay("", (line) => lines.push(line)), 1);
    assert.deepEqual(lines, ["Error: Grid must be exactly 81 characters, got 0"]);
  });
});

describe("config", () => {
  let dir: string;
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "sudoprop-config-"));
    saved.SUDOPROP_HOME = process.env.SUDOPROP_HOME;
    process.env.SUDOPROP_HOME = dir;
    for (const key of CONFIG_KEYS) {
      saved[ENV_MAP[key]] = process.env[ENV_MAP[key]];
      delete process.env[ENV_MAP[key]];
    }
    clearCliOverrides();
  });

  afterEach(() => {
    for (const [name, value] of Object.entries(saved)) {
      if (value === undefined) delete process.env[name];
      else process.env[name] = value;
    }
    clearCliOverrides();
    rmSync(dir, { recursive: true, force: true });
  });

  it("falls back to defaults without a config file", async () => {
    assert.deepEqual(await resolveConfig(), DEFAULTS);
  });

  it("stores and reads back a value", async () => {
    const lines: string[] = [];
    assert.equal(await runConfigSet("variant", "diagonal", (l) => lines.push(l)), 0);
    assert.equal(await runConfigGet("variant", (l) => lines.push(l)), 0);

    assert.deepEqual(lines, ["Set variant = diagonal", "diagonal"]);
    assert.deepEqual(JSON.parse(readFileSync(getConfigPath(), "utf-8")), { variant: "diagonal" });
  });

  it("lets the environment override the file and CLI flags override both", async () => {
    await runConfigSet("logLevel", "info", () => undefined);
    assert.equal((await resolveConfig()).logLevel, "info");

    process.env.LOG_LEVEL = "debug";
    assert.equal((await resolveConfig()).logLevel, "debug");

    setCliOverride("logLevel", "error");
    assert.equal((await resolveConfig()).logLevel, "error");
  });

  it("rejects unknown keys and bad values", async () => {
    const lines: string[] = [];
    assert.equal(await runConfigSet("color", "red", (l) => lines.push(l)), 1);
    assert.equal(await runConfigSet("variant", "hex", (l) => lines.push(l)), 1);
    assert.equal(await runConfigGet("color", (l) => lines.push(l)), 1);

    assert.deepEqual(lines, [
      'Unknown config key: "color". Valid keys: variant, logLevel, exportPath',
      'Invalid variant: "hex". Must be one of standard, diagonal.',
      'Unknown config key: "color". Valid keys: variant, logLevel, exportPath',
    ]);
  });

  it("lists values with their sources", async () => {
    await runConfigSet("variant", "diagonal", () => undefined);
    process.env.LOG_LEVEL = "info";
    const lines: string[] = [];
    await runConfigList((l) => lines.push(l));

    assert.deepEqual(lines, [
      `Config file: ${getConfigPath()}`,
      "  variant: diagonal  (config file)",
      "  logLevel: info  (env: LOG_LEVEL)",
      "  exportPath: (not set)  (default)",
    ]);
  });

  it("serves the config resolved by initConfig", async () => {
    await runConfigSet("variant", "diagonal", () => undefined);
    process.env.SUDOPROP_EXPORT_PATH = "/tmp/sudoprop-log.json";

    const config = await initConfig();
    assert.deepEqual(config, {
      variant: "diagonal",
      logLevel: "warn",
      exportPath: "/tmp/sudoprop-log.json",
    });
    assert.equal(getConfig(), config);
  });

  it("ignores a malformed config file", async () => {
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, "config.json"), "{oops");
    assert.deepEqual(await resolveConfig(), DEFAULTS);
  });

  it("ignores non-string values in the config file", async () => {
    writeFileSync(join(dir, "config.json"), JSON.stringify({ variant: 3, logLevel: "info" }));
    assert.deepEqual(await resolveConfig(), { ...DEFAULTS, logLevel: "info" });
  });
});
