/**
 * render-graph.ts — RenderGraph: links stages into a DAG and renders it.
 *
 * Build once with `setRoot` and `connect`, then per frame:
 *   setInput → update → render → getOutput
 * and `release` when done.
 *
 * Scheduling:
 *   - Each node sits at a layer, strictly above every predecessor.
 *   - Ready nodes are batched per layer and batches run in ascending order.
 *   - A node becomes ready once every distinct predecessor has finished
 *     (indegree countdown), so it renders exactly once per pass.
 *
 * Intermediate outputs come from the injected TexturePool, sized like the
 * node's first input. Leaves render straight into the graph's output. A node
 * feeding n > 1 successors bumps its output's reference count by n - 1 before
 * any successor runs; consumers drop their reference when they are done.
 */
import {
  CycleDetectedError,
  MissingInputError,
  MissingRootError,
  RootAlreadySetError,
  UnconnectedSourceError,
  toTextureList,
  type Stage,
  type StageData,
  type Texture,
  type TexturePool,
} from "@lumen/core";
import { GraphNode, type NodeState } from "./node.js";

export interface RenderGraphOptions<T extends Texture> {
  readonly pool: TexturePool<T>;
}

export interface NodeInfo<T extends Texture> {
  readonly layer: number;
  readonly state: NodeState;
  readonly needsRender: boolean;
  readonly pendingInputs: number;
  readonly upstreamCount: number;
  readonly downstream: readonly Stage<T>[];
}

function stageName(stage: object): string {
  return stage.constructor.name || "stage";
}

export class RenderGraph<T extends Texture = Texture> implements Stage<T> {
  private readonly pool: TexturePool<T>;
  private readonly nodes = new Map<Stage<T>, GraphNode<T>>();
  private root: GraphNode<T> | null = null;
  private input: T[] = [];
  private output: T | null = null;

  private constructor(options: RenderGraphOptions<T>) {
    this.pool = options.pool;
  }

  static create<T extends Texture>(options: RenderGraphOptions<T>): RenderGraph<T> {
    return new RenderGraph(options);
  }

  // ── Building ─────────────────────────────────────────────────────────────

  setRoot(stage: Stage<T>): this {
    if (this.root) {
      throw new RootAlreadySetError({ message: "setRoot may only be called once per graph" });
    }
    const node = new GraphNode(stage, 0);
    this.root = node;
    this.nodes.set(stage, node);
    return this;
  }

  connect(pre: Stage<T>, next: Stage<T>): this {
    this.requireRoot("connect");
    const preNode = this.nodes.get(pre);
    if (!preNode) {
      throw new UnconnectedSourceError({
        message: `cannot connect from ${stageName(pre)}: it is neither the root nor the target of an earlier connect`,
      });
    }

    let nextNode = this.nodes.get(next);
    if (!nextNode) {
      nextNode = new GraphNode(next, preNode.layer + 1);
      this.nodes.set(next, nextNode);
    } else if (preNode.downstream.includes(nextNode)) {
      return this;
    } else if (this.reaches(nextNode, preNode)) {
      throw new CycleDetectedError({
        message: `connecting ${stageName(pre)} -> ${stageName(next)} would create a cycle`,
      });
    }

    preNode.addDownstream(nextNode);
    this.raiseLayer(nextNode, preNode.layer + 1);
    return this;
  }

  get size(): number {
    return this.nodes.size;
  }

  layerOf(stage: Stage<T>): number | undefined {
    return this.nodes.get(stage)?.layer;
  }

  nodeInfo(stage: Stage<T>): NodeInfo<T> | undefined {
    const node = this.nodes.get(stage);
    if (!node) return undefined;
    return {
      layer: node.layer,
      state: node.state,
      needsRender: node.needsRender,
      pendingInputs: node.pendingInputs.length,
      upstreamCount: node.upstreamCount,
      downstream: node.downstream.map((n) => n.stage),
    };
  }

  // ── Stage lifecycle ──────────────────────────────────────────────────────

  init(): void {
    this.visit("init", (node) => node.stage.init());
  }

  /** Returns true when at least one stage asked to render. */
  update(data: StageData): boolean {
    let needsRender = false;
    this.visit("update", (node) => {
      node.needsRender = node.stage.update(data);
      needsRender = needsRender || node.needsRender;
    });
    return needsRender;
  }

  release(): void {
    this.visit("release", (node) => node.stage.release());
  }

  setInput(input: T | readonly T[]): void {
    this.input = toTextureList(input);
  }

  setOutput(output: T | null): void {
    this.output = output;
  }

  getOutput(): T | null {
    return this.output;
  }

  render(): void {
    this.output = this.performTraversal();
  }

  // ── Internals ────────────────────────────────────────────────────────────

  private requireRoot(op: string): GraphNode<T> {
    if (!this.root) {
      throw new MissingRootError({ message: `${op} called before setRoot` });
    }
    return this.root;
  }

  /** Breadth-first from root, each node once. */
  private visit(op: string, fn: (node: GraphNode<T>) => void): void {
    const root = this.requireRoot(op);
    const seen = new Set<GraphNode<T>>([root]);
    const queue = [root];
    for (let i = 0; i < queue.length; i++) {
      const node = queue[i];
      fn(node);
      for (const next of node.downstream) {
        if (!seen.has(next)) {
          seen.add(next);
          queue.push(next);
        }
      }
    }
  }

  private reaches(from: GraphNode<T>, target: GraphNode<T>): boolean {
    const seen = new Set<GraphNode<T>>();
    const stack = [from];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node || seen.has(node)) continue;
      if (node === target) return true;
      seen.add(node);
      stack.push(...node.downstream);
    }
    return false;
  }

  /** Lift `node` to at least `layer` and push the change through its descendants. */
  private raiseLayer(node: GraphNode<T>, layer: number): void {
    if (node.layer >= layer) return;
    node.layer = layer;
    const queue = [node];
    for (let i = 0; i < queue.length; i++) {
      const parent = queue[i];
      for (const child of parent.downstream) {
        if (child.layer < parent.layer + 1) {
          child.layer = parent.layer + 1;
          queue.push(child);
        }
      }
    }
  }

  private performTraversal(): T | null {
    const root = this.requireRoot("render");
    for (const node of this.nodes.values()) node.reset();

    const batches: GraphNode<T>[][] = [];
    const schedule = (node: GraphNode<T>): void => {
      let batch = batches[node.layer];
      if (!batch) {
        batch = [];
        batches[node.layer] = batch;
      }
      batch.push(node);
    };

    root.seed(this.input);
    schedule(root);

    let produced: T | null = null;
    for (let layer = 0; layer < batches.length; layer++) {
      const batch = batches[layer];
      if (!batch) continue;
      for (const node of batch) {
        produced = this.execute(node);
        for (const next of node.downstream) {
          next.deliver(produced);
          if (next.isReady()) schedule(next);
        }
      }
    }
    return produced;
  }

  private execute(node: GraphNode<T>): T | null {
    const first = node.pendingInputs[0];
    if (first === undefined) {
      throw new MissingInputError({
        message: `${stageName(node.stage)} at layer ${node.layer} has no input for this frame`,
        layer: node.layer,
      });
    }

    node.state = "executing";
    const stage = node.stage;
    stage.setInput([...node.pendingInputs]);
    stage.setOutput(node.isLeaf ? this.output : this.pool.obtain(first.width, first.height));
    stage.render();
    const out = stage.getOutput();

    node.pendingInputs.length = 0;
    node.state = "done";

    const fanOut = node.downstream.length;
    if (out !== null && fanOut > 1) out.increaseRef(fanOut - 1);
    return out;
  }
}
