import { BinaryHeap } from "../binary-heap"
import type { RoutingGraph } from "../graph"
import { createHeuristic } from "../heuristic"
import { DEFAULT_METRIC } from "../settings"
import type { SearchResult, ShortestPathAlgorithmFn, WeightFn } from "../types"
import { searchMetric } from "../weights"
import { toSearchResult } from "./result"

/**
 * Best-first search shared by A* and Dijkstra.
 *
 * Entries are keyed by `g + h`. Duplicate queue entries are allowed; an entry is
 * stale when its key exceeds the key recorded for the node's current best cost.
 * When the heuristic returns 0 for all nodes, this is Dijkstra's algorithm.
 * With an admissible heuristic, paths are optimal.
 */
function shortestPath(
	graph: RoutingGraph,
	start: number,
	goal: number,
	getWeight: WeightFn,
	heuristic: (nodeId: number) => number,
): SearchResult {
	const gScore = new Map<number, number>() // Best known cost to reach node
	const fScore = new Map<number, number>() // Queue key for that cost
	const predecessors = new Map<number, number>()
	const closed = new Set<number>() // Settled nodes
	const heap = new BinaryHeap()

	let explored = 0
	let relaxations = 0
	let edgesScanned = 0

	const startF = heuristic(start)
	gScore.set(start, 0)
	fScore.set(start, startF)
	heap.push(start, startF)

	while (heap.size > 0) {
		const entry = heap.pop()
		if (!entry) break
		explored++

		const current = entry.item
		if (closed.has(current)) continue
		if (entry.priority > (fScore.get(current) ?? Number.POSITIVE_INFINITY)) {
			continue
		}
		closed.add(current)

		if (current === goal) break

		const currentG = gScore.get(current) ?? Number.POSITIVE_INFINITY
		for (const edge of graph.getEdges(current)) {
			edgesScanned++
			const neighbor = edge.targetNodeId
			if (closed.has(neighbor)) continue

			const tentativeG = currentG + getWeight(edge)
			if (tentativeG < (gScore.get(neighbor) ?? Number.POSITIVE_INFINITY)) {
				gScore.set(neighbor, tentativeG)
				predecessors.set(neighbor, current)
				relaxations++

				const f = tentativeG + heuristic(neighbor)
				fScore.set(neighbor, f)
				heap.push(neighbor, f)
			}
		}
	}

	return toSearchResult(start, goal, gScore.get(goal), predecessors, {
		exploredOrIterations: explored,
		relaxationsDone: relaxations,
		edgesScanned,
		negativeCycle: false,
		goalAffectedByNegCycle: false,
	})
}

/**
 * Dijkstra's algorithm - optimal shortest path without heuristic guidance.
 * Explores nodes in order of increasing cost from start. Weights must be
 * non-negative.
 */
export const dijkstra: ShortestPathAlgorithmFn = (
	graph,
	start,
	goal,
	getWeight,
) => {
	return shortestPath(graph, start, goal, getWeight, () => 0)
}

/**
 * A* algorithm - uses a geodesic heuristic to guide search toward the goal.
 *
 * The heuristic follows the metric `getWeight` selects:
 * - distance: geodesic kilometers to the goal
 * - time: geodesic kilometers at `options.maxKmh`, in minutes
 *
 * `options.metric` only decides for custom weight functions. The metric and
 * speed are validated before any search work.
 */
export const astar: ShortestPathAlgorithmFn = (
	graph,
	start,
	goal,
	getWeight,
	options = {},
) => {
	const heuristic = createHeuristic(
		goal,
		graph.nodes,
		searchMetric(getWeight, options.metric, DEFAULT_METRIC),
		{ maxKmh: options.maxKmh },
	)
	return shortestPath(graph, start, goal, getWeight, (nodeId) =>
		heuristic.estimate(nodeId),
	)
}
