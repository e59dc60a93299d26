/**
 * @lumen/stages — CPU reference stages over PixelTexture.
 */

export { PixelStage, assertSameSize } from "./base.js";
export { CopyStage, InvertStage, BrightnessStage, MixStage } from "./pixel-ops.js";

// ── Stage registry ─────────────────────────────────────────────────────────

import { Registry, type Stage } from "@lumen/core";
import type { PixelTexture } from "@lumen/texture";
import { CopyStage, InvertStage, BrightnessStage, MixStage } from "./pixel-ops.js";

export const stageRegistry = new Registry<Stage<PixelTexture>>("stage")
  .register("copy", () => new CopyStage())
  .register("invert", () => new InvertStage())
  .register("brightness", () => new BrightnessStage())
  .register("mix", () => new MixStage());
