/**
 * @lumen/graph — DAG of stages with layered, reference-counted execution.
 */

export { RenderGraph } from "./render-graph.js";
export type { RenderGraphOptions, NodeInfo } from "./render-graph.js";
export { GraphNode } from "./node.js";
export type { NodeState } from "./node.js";
