/**
 * Collaborator interfaces (ports). The graph core only ever talks to stages,
 * textures and pools through these.
 */
import { Context } from "effect";
import type { GraphConfig, StageData } from "./types.js";

// ── Texture ────────────────────────────────────────────────────────────────
export interface Texture {
  readonly width: number;
  readonly height: number;
  /** Register `count` additional consumers of this texture. */
  increaseRef(count: number): void;
}

// ── Texture pool ───────────────────────────────────────────────────────────
export interface TexturePool<T extends Texture = Texture> {
  /** Hand out a texture of the given size, recycled when one is idle. */
  obtain(width: number, height: number): T;
}

// ── Stage ──────────────────────────────────────────────────────────────────
export interface Stage<T extends Texture = Texture> {
  init(): void;
  /** Push per-frame data into the stage. Returns whether it needs to render. */
  update(data: StageData): boolean;
  setInput(input: T | readonly T[]): void;
  setOutput(output: T | null): void;
  getOutput(): T | null;
  render(): void;
  release(): void;
}

export function isTextureList<T>(input: T | readonly T[]): input is readonly T[] {
  return Array.isArray(input);
}

/** Normalize a single texture or a list of textures into a fresh array. */
export function toTextureList<T>(input: T | readonly T[]): T[] {
  return isTextureList(input) ? [...input] : [input];
}

// ── Config ─────────────────────────────────────────────────────────────────
export class GraphConfigService extends Context.Tag("GraphConfigService")<
  GraphConfigService,
  GraphConfig
>() {}
