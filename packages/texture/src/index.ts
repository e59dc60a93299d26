/**
 * @lumen/texture — in-memory textures and the pool that recycles them.
 */

export { PixelTexture, createTexture, CHANNELS } from "./texture.js";
export type { Rgba, TextureRecycler } from "./texture.js";
export { MemoryTexturePool } from "./pool.js";
export type { TexturePoolOptions, TexturePoolStats } from "./pool.js";
