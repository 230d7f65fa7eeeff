import { Command } from "commander";
import {
  resolveConfig,
  readConfigFile,
  updateConfigFile,
  getConfigPath,
  validateConfigValue,
  CONFIG_KEYS,
  ENV_MAP,
  ConfigData,
} from "../config";
import { Printer } from "../visualize";
import { EXIT_ERROR, EXIT_OK } from "./solve";

export function isValidKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}

function unknownKey(key: string, out: Printer): number {
  out(`Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`);
  return EXIT_ERROR;
}

export async function runConfigSet(
  key: string,
  value: string,
  out: Printer,
): Promise<number> {
  if (!isValidKey(key)) return unknownKey(key, out);
  const problem = validateConfigValue(key, value);
  if (problem) {
    out(problem);
    return EXIT_ERROR;
  }
  await updateConfigFile(key, value);
  out(`Set ${key} = ${value}`);
  return EXIT_OK;
}

export async function runConfigGet(key: string, out: Printer): Promise<number> {
  if (!isValidKey(key)) return unknownKey(key, out);
  const resolved = await resolveConfig();
  out(resolved[key]);
  return EXIT_OK;
}

export async function runConfigList(out: Printer): Promise<number> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  out(`Config file: ${getConfigPath()}`);
  for (const key of CONFIG_KEYS) {
    const value = resolved[key] === "" ? "(not set)" : resolved[key];
    out(`  ${key}: ${value}  (${getSource(key, fileData)})`);
  }
  return EXIT_OK;
}

export function getSource(
  key: keyof ConfigData,
  fileData: Partial<ConfigData>,
): string {
  const envVal = process.env[ENV_MAP[key]];
  if (envVal !== undefined && envVal !== "") return `env: ${ENV_MAP[key]}`;
  const fileVal = fileData[key];
  if (fileVal !== undefined && fileVal !== "") return "config file";
  return "default";
}

export function registerConfigCommand(program: Command): void {
  const print: Printer = (line) => console.log(line);
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.sudoprop/config.json)");

  configCmd.action(async () => {
    process.exitCode = await runConfigList(print);
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      process.exitCode = await runConfigSet(key, value, print);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      process.exitCode = await runConfigGet(key, print);
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      process.exitCode = await runConfigList(print);
    });
}
