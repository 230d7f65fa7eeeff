import { ConfigData } from "./defaults";
import { resolveConfig } from "./resolve";

let resolved: ConfigData | undefined;

/** Resolve the layered config once; the preAction hook calls this before any command runs */
export async function initConfig(): Promise<ConfigData> {
  resolved = await resolveConfig();
  return resolved;
}

/** Config resolved by the last initConfig() call */
export function getConfig(): ConfigData {
  if (resolved === undefined) {
    throw new Error("getConfig() called before initConfig()");
  }
  return resolved;
}
