/**
 * node.ts — GraphNode: one stage plus its per-frame scheduling state.
 */
import type { Stage, Texture } from "@lumen/core";

/**
 * Per-frame lifecycle. `done` goes back to `idle` when the next pass starts.
 */
export type NodeState = "idle" | "armed" | "executing" | "done";

export class GraphNode<T extends Texture> {
  /** Textures delivered for the current pass, in delivery order. */
  readonly pendingInputs: T[] = [];
  /** Outgoing edges, deduplicated, in the order they were connected. */
  readonly downstream: GraphNode<T>[] = [];
  /** Distinct predecessors, i.e. how many deliveries gate this node. */
  upstreamCount = 0;
  /** Predecessors that finished during the current pass. */
  received = 0;
  needsRender = true;
  state: NodeState = "idle";

  constructor(
    readonly stage: Stage<T>,
    public layer = 0,
  ) {}

  get isLeaf(): boolean {
    return this.downstream.length === 0;
  }

  /** Returns false when the edge already exists. */
  addDownstream(next: GraphNode<T>): boolean {
    if (this.downstream.includes(next)) return false;
    this.downstream.push(next);
    next.upstreamCount++;
    return true;
  }

  /** Record that one predecessor finished, optionally handing over its output. */
  deliver(texture: T | null): void {
    if (texture !== null) this.pendingInputs.push(texture);
    this.received++;
    if (this.state === "idle") this.state = "armed";
  }

  /** Seed inputs that do not come from a predecessor (the frame inputs). */
  seed(textures: readonly T[]): void {
    this.pendingInputs.push(...textures);
    if (textures.length > 0) this.state = "armed";
  }

  isReady(): boolean {
    return this.received >= this.upstreamCount;
  }

  reset(): void {
    this.pendingInputs.length = 0;
    this.received = 0;
    this.state = "idle";
  }
}
