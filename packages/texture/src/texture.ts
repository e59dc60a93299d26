/**
 * texture.ts — PixelTexture: RGBA float image with a manual reference count.
 *
 * A texture obtained from a pool starts with one reference. Every consumer
 * that finishes with it calls `decreaseRef`; when the count reaches zero the
 * texture goes back to its pool and must not be touched again until the pool
 * hands it out anew.
 *
 * Textures made with `createTexture` belong to the caller. Their counts are
 * tracked but never recycle anything.
 */
import { TextureError, type Texture } from "@lumen/core";

export const CHANNELS = 4;

export type Rgba = readonly [number, number, number, number];

/** Receives a texture whose reference count dropped to zero. */
export interface TextureRecycler {
  recycle(texture: PixelTexture): void;
}

let nextTextureId = 0;

export class PixelTexture implements Texture {
  readonly id = nextTextureId++;
  readonly data: Float32Array;
  private refs = 1;
  private recycled = false;

  constructor(
    readonly width: number,
    readonly height: number,
    private readonly owner: TextureRecycler | null = null,
  ) {
    this.data = new Float32Array(width * height * CHANNELS);
  }

  get refCount(): number {
    return this.refs;
  }

  get pooled(): boolean {
    return this.owner !== null;
  }

  get isRecycled(): boolean {
    return this.recycled;
  }

  increaseRef(count = 1): void {
    this.assertLive("increaseRef");
    if (!Number.isInteger(count) || count < 0) {
      throw new TextureError({ message: `increaseRef count must be a non-negative integer, got ${count}` });
    }
    this.refs += count;
  }

  decreaseRef(count = 1): void {
    this.assertLive("decreaseRef");
    if (!Number.isInteger(count) || count < 0) {
      throw new TextureError({ message: `decreaseRef count must be a non-negative integer, got ${count}` });
    }
    if (!this.owner) {
      this.refs = Math.max(0, this.refs - count);
      return;
    }
    if (count > this.refs) {
      throw new TextureError({
        message: `texture #${this.id} released ${count} time(s) with only ${this.refs} reference(s) left`,
      });
    }
    this.refs -= count;
    if (this.refs === 0) {
      this.recycled = true;
      this.owner.recycle(this);
    }
  }

  /** Called by the owning pool when the texture is handed out again. */
  revive(): void {
    this.refs = 1;
    this.recycled = false;
  }

  getPixel(x: number, y: number): Rgba {
    this.assertLive("getPixel");
    const i = this.offset(x, y);
    const d = this.data;
    return [d[i], d[i + 1], d[i + 2], d[i + 3]];
  }

  setPixel(x: number, y: number, rgba: Rgba): void {
    this.assertLive("setPixel");
    this.data.set(rgba, this.offset(x, y));
  }

  fill(rgba: Rgba): void {
    this.assertLive("fill");
    for (let i = 0; i < this.data.length; i += CHANNELS) this.data.set(rgba, i);
  }

  private offset(x: number, y: number): number {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new TextureError({ message: `pixel (${x}, ${y}) outside ${this.width}x${this.height} texture` });
    }
    return (y * this.width + x) * CHANNELS;
  }

  private assertLive(op: string): void {
    if (this.recycled) {
      throw new TextureError({ message: `${op} on texture #${this.id} after it was recycled` });
    }
  }
}

export function assertTextureSize(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new TextureError({ message: `invalid texture size ${width}x${height}` });
  }
}

/** Create a caller-owned texture, optionally filled with one color. */
export function createTexture(width: number, height: number, fill?: Rgba): PixelTexture {
  assertTextureSize(width, height);
  const tex = new PixelTexture(width, height);
  if (fill) tex.fill(fill);
  return tex;
}
