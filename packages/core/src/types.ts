/**
 * Core types for the lumen render graph.
 */

// ── Stage data ─────────────────────────────────────────────────────────────
/** Per-frame values handed to every stage by `update`. */
export type StageData = Readonly<Record<string, unknown>>;

// ── Graph config ───────────────────────────────────────────────────────────
export type LogLevelName = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_NAMES: readonly LogLevelName[] = ["debug", "info", "warn", "error"];

export interface GraphConfig {
  /** Idle textures kept per size class before extras are dropped. */
  readonly poolMaxPerSize: number;
  readonly logLevel: LogLevelName;
}

export const defaultGraphConfig: GraphConfig = {
  poolMaxPerSize: 8,
  logLevel: "info",
};
