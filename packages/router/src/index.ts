/**
 * @routebench/router - Shortest paths on weighted road networks.
 *
 * Builds an immutable graph of cities and roads and runs A*, Dijkstra and
 * Bellman-Ford against it under a distance or travel-time metric, returning
 * directly comparable results with per-run counters.
 *
 * Key features:
 * - **Graph construction**: Validated rows, keep-best parallel edges, optional symmetrization.
 * - **Three engines**: A* with a WGS84 geodesic heuristic, Dijkstra, Bellman-Ford.
 * - **Negative cycles**: Bellman-Ford flags them and whether they reach the goal.
 * - **Deterministic**: Equal-cost ties break by node id.
 *
 * @example
 * ```ts
 * import { buildGraph, runAll } from "@routebench/router"
 *
 * const graph = buildGraph(cityRows, edgeRows)
 * for (const result of runAll(graph, "Lyon", "Nice", { metric: "time" })) {
 *   console.log(result.algorithm, result.total, result.path)
 * }
 * ```
 *
 * @module @routebench/router
 */

export * from "./algorithms"
export * from "./cities"
export * from "./errors"
export * from "./graph"
export * from "./heuristic"
export * from "./load"
export * from "./path"
export * from "./router"
export * from "./settings"
export * from "./types"
export * from "./weights"
