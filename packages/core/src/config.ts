/**
 * Argument parsing and graph config resolution.
 * Supports --key=value and --flag syntax.
 */
import { ConfigError } from "./errors.js";
import { defaultGraphConfig, LOG_LEVEL_NAMES, type GraphConfig, type LogLevelName } from "./types.js";

export function parseKV(args: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function intArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  if (val === undefined) return defaultVal;
  if (!/^-?\d+$/.test(val)) {
    throw new ConfigError({ message: `--${key} must be an integer, got "${val}"` });
  }
  return Number(val);
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

export function isLogLevelName(s: string): s is LogLevelName {
  return LOG_LEVEL_NAMES.some((name) => name === s);
}

/** Overlay CLI-style overrides on the default graph config. */
export function resolveGraphConfig(
  kv: Record<string, string>,
  base: GraphConfig = defaultGraphConfig,
): GraphConfig {
  const poolMaxPerSize = intArg(kv, "pool-max-per-size", base.poolMaxPerSize);
  if (poolMaxPerSize < 0) {
    throw new ConfigError({ message: `--pool-max-per-size must be >= 0, got ${poolMaxPerSize}` });
  }

  const level = strArg(kv, "log-level", base.logLevel).toLowerCase();
  if (!isLogLevelName(level)) {
    throw new ConfigError({
      message: `--log-level must be one of ${LOG_LEVEL_NAMES.join(", ")}, got "${level}"`,
    });
  }

  return { poolMaxPerSize, logLevel: level };
}
