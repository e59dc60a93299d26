/**
 * Effect layers for dependency injection.
 *
 * Config and the texture pool are services; graphs are built from them.
 */
import { Context, Effect, Layer } from "effect";
import { GraphConfigService, type GraphConfig } from "@lumen/core";
import { RenderGraph } from "@lumen/graph";
import { MemoryTexturePool, type PixelTexture } from "@lumen/texture";

// ── Config Layer ───────────────────────────────────────────────────────────

export const GraphConfigLive = (config: GraphConfig) =>
  Layer.succeed(GraphConfigService, config);

// ── Texture pool Layer ─────────────────────────────────────────────────────

export class PixelPoolService extends Context.Tag("PixelPoolService")<
  PixelPoolService,
  MemoryTexturePool
>() {}

export const PixelPoolFrom = (pool: MemoryTexturePool) =>
  Layer.succeed(PixelPoolService, pool);

export const PixelPoolLive = Layer.effect(
  PixelPoolService,
  Effect.map(GraphConfigService, (config) => new MemoryTexturePool({ maxPerSize: config.poolMaxPerSize })),
);

// ── Graph ──────────────────────────────────────────────────────────────────

/** An empty graph drawing its intermediates from the pool service. */
export const makePixelGraph: Effect.Effect<RenderGraph<PixelTexture>, never, PixelPoolService> =
  Effect.map(PixelPoolService, (pool) => RenderGraph.create({ pool }));
