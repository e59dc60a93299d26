/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

// ── Graph structure ────────────────────────────────────────────────────────

export class MissingRootError extends Data.TaggedError("MissingRootError")<{
  readonly message: string;
}> {}

export class RootAlreadySetError extends Data.TaggedError("RootAlreadySetError")<{
  readonly message: string;
}> {}

export class UnconnectedSourceError extends Data.TaggedError("UnconnectedSourceError")<{
  readonly message: string;
}> {}

export class CycleDetectedError extends Data.TaggedError("CycleDetectedError")<{
  readonly message: string;
}> {}

// ── Execution ──────────────────────────────────────────────────────────────

export class MissingInputError extends Data.TaggedError("MissingInputError")<{
  readonly message: string;
  readonly layer: number;
}> {}

export type GraphError =
  | MissingRootError
  | RootAlreadySetError
  | UnconnectedSourceError
  | CycleDetectedError
  | MissingInputError;

export function isGraphError(u: unknown): u is GraphError {
  return (
    u instanceof MissingRootError ||
    u instanceof RootAlreadySetError ||
    u instanceof UnconnectedSourceError ||
    u instanceof CycleDetectedError ||
    u instanceof MissingInputError
  );
}

// ── Collaborators ──────────────────────────────────────────────────────────

export class TextureError extends Data.TaggedError("TextureError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class StageError extends Data.TaggedError("StageError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
