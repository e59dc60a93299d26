/**
 * Effect wrappers around the synchronous graph API.
 *
 * Nothing here adds asynchrony: every program runs to completion under
 * `Effect.runSync`. Errors thrown by the graph or its stages land in the
 * error channel as tagged errors.
 */
import { Effect, type Scope } from "effect";
import { StageError, isGraphError, type GraphError, type StageData, type Texture } from "@lumen/core";
import type { RenderGraph } from "@lumen/graph";

export type FrameError = GraphError | StageError;

export interface FrameRequest<T extends Texture> {
  readonly frame: number;
  readonly inputs: T | readonly T[];
  readonly output: T | null;
  readonly data?: StageData;
}

export interface FrameResult<T extends Texture> {
  readonly frame: number;
  readonly output: T | null;
  readonly needsRender: boolean;
}

/** Graph errors pass through; anything else a stage throws becomes a StageError. */
export function toFrameError(cause: unknown): FrameError {
  if (isGraphError(cause) || cause instanceof StageError) return cause;
  const message = cause instanceof Error ? cause.message : String(cause);
  return new StageError({ message: `stage failed: ${message}`, cause });
}

export function renderFrame<T extends Texture>(
  graph: RenderGraph<T>,
  request: FrameRequest<T>,
): Effect.Effect<FrameResult<T>, FrameError> {
  const program = Effect.gen(function* () {
    graph.setInput(request.inputs);
    graph.setOutput(request.output);
    const needsRender = yield* Effect.try({
      try: () => graph.update(request.data ?? {}),
      catch: toFrameError,
    });
    yield* Effect.logDebug(`update done, needsRender=${needsRender}`);
    yield* Effect.try({ try: () => graph.render(), catch: toFrameError });
    yield* Effect.logDebug(`rendered ${graph.size} stage(s)`);
    return { frame: request.frame, output: graph.getOutput(), needsRender };
  });
  return program.pipe(Effect.withSpan("render-frame"), Effect.annotateLogs("frame", request.frame));
}

/** Initialize a graph for the lifetime of the scope, releasing it on close. */
export function acquireGraph<T extends Texture, E, R>(
  build: Effect.Effect<RenderGraph<T>, E, R>,
): Effect.Effect<RenderGraph<T>, E | FrameError, R | Scope.Scope> {
  return Effect.acquireRelease(
    Effect.flatMap(build, (graph) =>
      Effect.try({
        try: () => {
          graph.init();
          return graph;
        },
        catch: toFrameError,
      }),
    ),
    (graph) =>
      Effect.sync(() => graph.release()).pipe(
        Effect.tap(() => Effect.logDebug(`released ${graph.size} stage(s)`)),
      ),
  );
}
