/**
 * pool.ts — MemoryTexturePool: size-keyed free lists of PixelTextures.
 *
 * Idle textures are kept per `width x height` class, capped at `maxPerSize`
 * per class; a texture recycled into a full class is dropped.
 */
import type { TexturePool } from "@lumen/core";
import { CHANNELS, PixelTexture, assertTextureSize, type TextureRecycler } from "./texture.js";

const DEFAULT_MAX_PER_SIZE = 8;
const BYTES_PER_PIXEL = CHANNELS * Float32Array.BYTES_PER_ELEMENT;

export interface TexturePoolOptions {
  readonly maxPerSize?: number;
}

export interface TexturePoolStats {
  readonly freeEntries: number;
  readonly freeBytes: number;
  readonly sizeClasses: number;
  readonly totalAllocs: number;
  readonly liveAllocs: number;
}

function sizeKey(width: number, height: number): string {
  return `${width}x${height}`;
}

export class MemoryTexturePool implements TexturePool<PixelTexture>, TextureRecycler {
  readonly maxPerSize: number;
  private readonly free = new Map<string, PixelTexture[]>();
  private totalAllocs = 0;
  private liveAllocs = 0;

  constructor(options: TexturePoolOptions = {}) {
    this.maxPerSize = options.maxPerSize ?? DEFAULT_MAX_PER_SIZE;
  }

  obtain(width: number, height: number): PixelTexture {
    assertTextureSize(width, height);
    const idle = this.free.get(sizeKey(width, height))?.pop();
    if (idle) {
      idle.revive();
      return idle;
    }
    this.totalAllocs++;
    this.liveAllocs++;
    return new PixelTexture(width, height, this);
  }

  recycle(texture: PixelTexture): void {
    const key = sizeKey(texture.width, texture.height);
    let list = this.free.get(key);
    if (!list) { list = []; this.free.set(key, list); }
    if (list.length < this.maxPerSize) {
      list.push(texture);
    } else {
      this.liveAllocs--;
    }
  }

  /** Drop every idle texture. Textures still in use are unaffected. */
  purge(): void {
    for (const list of this.free.values()) this.liveAllocs -= list.length;
    this.free.clear();
  }

  stats(): TexturePoolStats {
    let freeEntries = 0, freeBytes = 0;
    for (const list of this.free.values()) {
      for (const tex of list) {
        freeEntries++;
        freeBytes += tex.width * tex.height * BYTES_PER_PIXEL;
      }
    }
    return {
      freeEntries,
      freeBytes,
      sizeClasses: this.free.size,
      totalAllocs: this.totalAllocs,
      liveAllocs: this.liveAllocs,
    };
  }
}
