import { isVariant, VARIANTS } from "@sudoprop/core";

export interface ConfigData {
  /** Default board variant when --diagonal is not given */
  variant: string;
  /** bunyan level name */
  logLevel: string;
  /** Where to write the assignment log after every solve; empty = never */
  exportPath: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "variant",
  "logLevel",
  "exportPath",
];

export const DEFAULTS: ConfigData = {
  variant: "standard",
  logLevel: "warn",
  exportPath: "",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  variant: "SUDOPROP_VARIANT",
  logLevel: "LOG_LEVEL",
  exportPath: "SUDOPROP_EXPORT_PATH",
};

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

/** Returns an error message for a bad value, or null when it is acceptable */
export function validateConfigValue(
  key: keyof ConfigData,
  value: string,
): string | null {
  if (key === "variant" && !isVariant(value)) {
    return `Invalid variant: "${value}". Must be one of ${VARIANTS.join(", ")}.`;
  }
  if (key === "logLevel" && !isLogLevel(value)) {
    return `Invalid log level: "${value}". Must be one of ${LOG_LEVELS.join(", ")}.`;
  }
  return null;
}
