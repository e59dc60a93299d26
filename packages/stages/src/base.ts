/**
 * base.ts — PixelStage: shared input/output handling for CPU stages.
 *
 * Subclasses only implement `draw`. After drawing, every input texture gets
 * one reference dropped, which is what lets the pool reclaim intermediates.
 */
import { StageError, toTextureList, type Stage, type StageData } from "@lumen/core";
import type { PixelTexture } from "@lumen/texture";

export abstract class PixelStage implements Stage<PixelTexture> {
  abstract readonly name: string;
  protected inputs: PixelTexture[] = [];
  protected output: PixelTexture | null = null;
  private initialized = false;

  get isInitialized(): boolean {
    return this.initialized;
  }

  init(): void {
    this.initialized = true;
  }

  update(_data: StageData): boolean {
    return true;
  }

  setInput(input: PixelTexture | readonly PixelTexture[]): void {
    this.inputs = toTextureList(input);
  }

  setOutput(output: PixelTexture | null): void {
    this.output = output;
  }

  getOutput(): PixelTexture | null {
    return this.output;
  }

  render(): void {
    if (this.inputs.length === 0) {
      throw new StageError({ message: `${this.name}: render called without input` });
    }
    // Inputs are dropped even when drawing fails.
    try {
      if (!this.output) {
        throw new StageError({ message: `${this.name}: render called without output` });
      }
      this.draw(this.inputs, this.output);
    } finally {
      for (const tex of this.inputs) tex.decreaseRef(1);
      this.inputs = [];
    }
  }

  release(): void {
    this.initialized = false;
    this.inputs = [];
    this.output = null;
  }

  protected abstract draw(inputs: readonly PixelTexture[], output: PixelTexture): void;
}

export function assertSameSize(stage: string, a: PixelTexture, b: PixelTexture): void {
  if (a.width !== b.width || a.height !== b.height) {
    throw new StageError({
      message: `${stage}: size mismatch ${a.width}x${a.height} vs ${b.width}x${b.height}`,
    });
  }
}
