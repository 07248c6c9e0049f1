/**
 * Shortest-path algorithm implementations.
 *
 * Provides three algorithms:
 * - `astar`: Optimal with geodesic heuristic guidance, non-negative weights.
 * - `dijkstra`: Optimal, explores in order of cost, non-negative weights.
 * - `bellmanFord`: Optimal with negative weights; detects negative cycles.
 *
 * @module
 */

import type { RoutingAlgorithm, ShortestPathAlgorithmFn } from "../types"
import { bellmanFord } from "./bellman-ford"
import { astar, dijkstra } from "./shortest-path"

export { canReach, relaxationOrder } from "./bellman-ford"
export { astar, bellmanFord, dijkstra }

export const routingAlgorithms: Record<RoutingAlgorithm, ShortestPathAlgorithmFn> =
	{
		astar,
		dijkstra,
		"bellman-ford": bellmanFord,
	}

/** Display names, in the order `runAll` runs the algorithms. */
export const ALGORITHM_LABELS: Record<RoutingAlgorithm, string> = {
	astar: "A*",
	dijkstra: "Dijkstra",
	"bellman-ford": "Bellman-Ford",
}

export const ROUTING_ALGORITHMS: readonly RoutingAlgorithm[] = [
	"astar",
	"dijkstra",
	"bellman-ford",
]

export function isRoutingAlgorithm(value: string): value is RoutingAlgorithm {
	return Object.hasOwn(routingAlgorithms, value)
}
