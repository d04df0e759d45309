/**
 * Configuration from environment variables.
 */

import type { LogLevel } from "./utils/logger.js";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

function getEnvList(key: string): string[] {
  const value = process.env[key];
  if (!value) return [];
  return value
    .split(",")
    .map((s) => s.trim().toUpperCase())
    .filter((s) => s.length > 0);
}

function parseLogLevel(value: string): LogLevel {
  const lower = value.toLowerCase();
  return LOG_LEVELS.find((l) => l === lower) ?? "info";
}

export interface AppConfig {
  /**
   * Minimum log level written to stderr
   * @env DAC_EQ_LOG_LEVEL
   * @default "info"
   */
  logLevel: LogLevel;
  /**
   * Shortcut for logLevel=debug (hex dump of every HID packet)
   * @env DAC_EQ_DEBUG
   * @default false
   */
  debug: boolean;
  /**
   * Product-name keywords of Tanchjim sub-models whose firmware takes pregain
   * as unscaled whole dB. Matched before the default half-dB variant.
   * @env DAC_EQ_TANCHJIM_RAW_PREGAIN_MODELS (comma separated)
   * @default [] (no sub-model uses the raw encoding)
   */
  tanchjimRawPregainModels: string[];
}

export function loadConfig(): AppConfig {
  const debug = getEnvBoolean("DAC_EQ_DEBUG", false);
  return {
    logLevel: debug ? "debug" : parseLogLevel(getEnvString("DAC_EQ_LOG_LEVEL", "info")),
    debug,
    tanchjimRawPregainModels: getEnvList("DAC_EQ_TANCHJIM_RAW_PREGAIN_MODELS"),
  };
}
