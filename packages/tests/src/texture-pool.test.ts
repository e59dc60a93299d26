import { describe, it, expect } from "vitest";
import { TextureError } from "@lumen/core";
import { MemoryTexturePool, createTexture } from "@lumen/texture";

describe("MemoryTexturePool", () => {
  it("hands out fresh textures with one reference", () => {
    const pool = new MemoryTexturePool();
    const tex = pool.obtain(3, 2);

    expect(tex.width).toBe(3);
    expect(tex.height).toBe(2);
    expect(tex.refCount).toBe(1);
    expect(tex.pooled).toBe(true);
    expect(tex.data.length).toBe(3 * 2 * 4);
    expect(pool.stats()).toEqual({
      freeEntries: 0, freeBytes: 0, sizeClasses: 0, totalAllocs: 1, liveAllocs: 1,
    });
  });

  it("recycles a texture when its last reference is dropped", () => {
    const pool = new MemoryTexturePool();
    const tex = pool.obtain(2, 2);
    tex.decreaseRef();

    expect(tex.refCount).toBe(0);
    expect(tex.isRecycled).toBe(true);
    expect(pool.stats()).toMatchObject({ freeEntries: 1, freeBytes: 64, sizeClasses: 1 });

    const again = pool.obtain(2, 2);
    expect(again).toBe(tex);
    expect(again.refCount).toBe(1);
    expect(again.isRecycled).toBe(false);
    expect(pool.stats()).toMatchObject({ freeEntries: 0, totalAllocs: 1, liveAllocs: 1 });
  });

  it("keeps sizes apart", () => {
    const pool = new MemoryTexturePool();
    pool.obtain(2, 2).decreaseRef();
    const other = pool.obtain(3, 3);

    expect(other.width).toBe(3);
    expect(pool.stats()).toMatchObject({ freeEntries: 1, totalAllocs: 2, liveAllocs: 2 });
  });

  it("waits for every consumer before recycling", () => {
    const pool = new MemoryTexturePool();
    const tex = pool.obtain(2, 2);
    tex.increaseRef(2);

    tex.decreaseRef();
    tex.decreaseRef();
    expect(tex.isRecycled).toBe(false);
    expect(pool.stats().freeEntries).toBe(0);

    tex.decreaseRef();
    expect(tex.isRecycled).toBe(true);
    expect(pool.stats().freeEntries).toBe(1);
  });

  it("drops textures beyond maxPerSize", () => {
    const pool = new MemoryTexturePool({ maxPerSize: 1 });
    const a = pool.obtain(2, 2);
    const b = pool.obtain(2, 2);
    a.decreaseRef();
    b.decreaseRef();

    expect(pool.stats()).toMatchObject({ freeEntries: 1, totalAllocs: 2, liveAllocs: 1 });
  });

  it("purges idle textures", () => {
    const pool = new MemoryTexturePool();
    const busy = pool.obtain(2, 2);
    pool.obtain(2, 2).decreaseRef();
    pool.obtain(4, 4).decreaseRef();
    pool.purge();

    expect(pool.stats()).toEqual({
      freeEntries: 0, freeBytes: 0, sizeClasses: 0, totalAllocs: 3, liveAllocs: 1,
    });
    expect(busy.refCount).toBe(1);
  });

  it("rejects invalid sizes", () => {
    const pool = new MemoryTexturePool();
    expect(() => pool.obtain(0, 4)).toThrow(TextureError);
    expect(() => pool.obtain(4, -1)).toThrow(TextureError);
    expect(() => pool.obtain(1.5, 2)).toThrow(TextureError);
  });

  it("rejects releasing more references than exist", () => {
    const pool = new MemoryTexturePool();
    const tex = pool.obtain(2, 2);
    expect(() => tex.decreaseRef(2)).toThrow(TextureError);
    expect(tex.refCount).toBe(1);
  });

  it("rejects use after recycle", () => {
    const pool = new MemoryTexturePool();
    const tex = pool.obtain(2, 2);
    tex.decreaseRef();

    expect(() => tex.increaseRef(1)).toThrow(TextureError);
    expect(() => tex.decreaseRef()).toThrow(TextureError);
    expect(() => tex.fill([1, 1, 1, 1])).toThrow(TextureError);
    expect(() => tex.setPixel(0, 0, [1, 1, 1, 1])).toThrow(TextureError);
    expect(() => tex.getPixel(0, 0)).toThrow(/^getPixel on texture #\d+ after it was recycled$/);
  });

  it("rejects negative reference counts", () => {
    const tex = new MemoryTexturePool().obtain(1, 1);
    expect(() => tex.increaseRef(-1)).toThrow(TextureError);
  });
});

describe("createTexture", () => {
  it("makes a caller-owned texture that never recycles", () => {
    const tex = createTexture(2, 1, [0.5, 0.25, 0, 1]);

    expect(tex.pooled).toBe(false);
    expect(tex.getPixel(1, 0)).toEqual([0.5, 0.25, 0, 1]);

    tex.decreaseRef();
    tex.decreaseRef();
    expect(tex.refCount).toBe(0);
    expect(tex.isRecycled).toBe(false);
  });

  it("reads and writes single pixels", () => {
    const tex = createTexture(2, 2);
    tex.setPixel(1, 1, [1, 0.5, 0.25, 0.125]);

    expect(tex.getPixel(1, 1)).toEqual([1, 0.5, 0.25, 0.125]);
    expect(tex.getPixel(0, 0)).toEqual([0, 0, 0, 0]);
    expect(Array.from(tex.data.subarray(12, 16))).toEqual([1, 0.5, 0.25, 0.125]);
  });

  it("rejects out-of-range pixels", () => {
    const tex = createTexture(2, 2);
    expect(() => tex.getPixel(2, 0)).toThrow(TextureError);
    expect(() => tex.setPixel(0, -1, [0, 0, 0, 0])).toThrow(TextureError);
  });
});
