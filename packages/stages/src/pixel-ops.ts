/**
 * Per-pixel CPU stages. Data is RGBA, channel order [r, g, b, a].
 */
import type { StageData } from "@lumen/core";
import { CHANNELS, type PixelTexture } from "@lumen/texture";
import { PixelStage, assertSameSize } from "./base.js";

function clamp01(v: number): number {
  return v < 0 ? 0 : v > 1 ? 1 : v;
}

export class CopyStage extends PixelStage {
  readonly name = "copy";

  protected draw(inputs: readonly PixelTexture[], output: PixelTexture): void {
    const src = inputs[0];
    assertSameSize(this.name, src, output);
    output.data.set(src.data);
  }
}

export class InvertStage extends PixelStage {
  readonly name = "invert";

  protected draw(inputs: readonly PixelTexture[], output: PixelTexture): void {
    const src = inputs[0];
    assertSameSize(this.name, src, output);
    const s = src.data, d = output.data;
    for (let i = 0; i < s.length; i += CHANNELS) {
      d[i] = 1 - s[i];
      d[i + 1] = 1 - s[i + 1];
      d[i + 2] = 1 - s[i + 2];
      d[i + 3] = s[i + 3];
    }
  }
}

/** Adds `data.brightness` (a number) to rgb, clamped to [0, 1]. */
export class BrightnessStage extends PixelStage {
  readonly name = "brightness";
  private amount = 0;

  get brightness(): number {
    return this.amount;
  }

  update(data: StageData): boolean {
    const next = data["brightness"];
    if (typeof next !== "number" || next === this.amount) return false;
    this.amount = next;
    return true;
  }

  protected draw(inputs: readonly PixelTexture[], output: PixelTexture): void {
    const src = inputs[0];
    assertSameSize(this.name, src, output);
    const s = src.data, d = output.data, k = this.amount;
    for (let i = 0; i < s.length; i += CHANNELS) {
      d[i] = clamp01(s[i] + k);
      d[i + 1] = clamp01(s[i + 1] + k);
      d[i + 2] = clamp01(s[i + 2] + k);
      d[i + 3] = s[i + 3];
    }
  }
}

/** Per-channel average of every input. */
export class MixStage extends PixelStage {
  readonly name = "mix";

  protected draw(inputs: readonly PixelTexture[], output: PixelTexture): void {
    for (const src of inputs) assertSameSize(this.name, src, output);
    const d = output.data;
    const n = inputs.length;
    for (let i = 0; i < d.length; i++) {
      let sum = 0;
      for (const src of inputs) sum += src.data[i];
      d[i] = sum / n;
    }
  }
}
