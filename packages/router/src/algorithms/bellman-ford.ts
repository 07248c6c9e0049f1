import type { RoutingGraph } from "../graph"
import type { ShortestPathAlgorithmFn } from "../types"
import { toSearchResult } from "./result"

/**
 * Nodes visited by each relaxation pass: adjacency keys, then every edge
 * target, then the start node, each once and in first-seen order. Targets with
 * no outgoing edges are included so |V| counts them.
 */
export function relaxationOrder(graph: RoutingGraph, start: number): number[] {
	const order = new Set<number>(graph.sourceIds())
	for (const source of graph.sourceIds()) {
		for (const edge of graph.getEdges(source)) order.add(edge.targetNodeId)
	}
	order.add(start)
	return Array.from(order)
}

/**
 * Breadth-first reachability: can `goal` be reached from any of `sources`?
 */
export function canReach(
	graph: RoutingGraph,
	sources: Iterable<number>,
	goal: number,
): boolean {
	const queue = Array.from(sources)
	const visited = new Set<number>(queue)
	for (let head = 0; head < queue.length; head++) {
		const current = queue[head]
		if (current === undefined) break
		if (current === goal) return true
		for (const edge of graph.getEdges(current)) {
			if (visited.has(edge.targetNodeId)) continue
			visited.add(edge.targetNodeId)
			queue.push(edge.targetNodeId)
		}
	}
	return false
}

/**
 * Bellman-Ford - shortest paths with negative edge weights.
 *
 * Runs at most |V| - 1 relaxation passes, stopping after the first pass that
 * improves nothing. When every pass ran, one more scan looks for edges that
 * still relax: each one marks a negative cycle reachable from start, and a
 * breadth-first search from their targets decides whether the goal's cost is
 * affected.
 */
export const bellmanFord: ShortestPathAlgorithmFn = (
	graph,
	start,
	goal,
	getWeight,
) => {
	const nodeIds = relaxationOrder(graph, start)
	const maxPasses = nodeIds.length - 1

	const costs = new Map<number, number>([[start, 0]])
	const predecessors = new Map<number, number>()

	let iterations = 0
	let relaxations = 0
	let edgesScanned = 0

	for (let pass = 0; pass < maxPasses; pass++) {
		iterations++
		let relaxed = false

		for (const source of nodeIds) {
			const sourceCost = costs.get(source)
			// Not reached yet
			if (sourceCost === undefined) continue

			for (const edge of graph.getEdges(source)) {
				edgesScanned++
				const target = edge.targetNodeId
				const candidate = sourceCost + getWeight(edge)
				if (candidate < (costs.get(target) ?? Number.POSITIVE_INFINITY)) {
					costs.set(target, candidate)
					predecessors.set(target, source)
					relaxations++
					relaxed = true
				}
			}
		}

		if (!relaxed) break
	}

	let negativeCycle = false
	const affected = new Set<number>()

	if (iterations === maxPasses) {
		for (const source of nodeIds) {
			const sourceCost = costs.get(source)
			if (sourceCost === undefined) continue

			for (const edge of graph.getEdges(source)) {
				edgesScanned++
				const target = edge.targetNodeId
				const candidate = sourceCost + getWeight(edge)
				if (candidate < (costs.get(target) ?? Number.POSITIVE_INFINITY)) {
					negativeCycle = true
					affected.add(target)
				}
			}
		}
	}

	return toSearchResult(start, goal, costs.get(goal), predecessors, {
		exploredOrIterations: iterations,
		relaxationsDone: relaxations,
		edgesScanned,
		negativeCycle,
		goalAffectedByNegCycle: negativeCycle && canReach(graph, affected, goal),
	})
}
