import { reconstructPath } from "../path"
import type { SearchResult } from "../types"

type SearchCounters = Pick<
	SearchResult,
	| "exploredOrIterations"
	| "relaxationsDone"
	| "edgesScanned"
	| "negativeCycle"
	| "goalAffectedByNegCycle"
>

/**
 * Assemble a search result from the goal's final cost and the predecessor map.
 *
 * An infinite or missing cost, or a predecessor chain that cannot be walked
 * back to `start`, yields the unreachable result: empty path, infinite total.
 * When start and goal coincide the result is always `[start]` with total 0.
 */
export function toSearchResult(
	start: number,
	goal: number,
	goalCost: number | undefined,
	predecessors: Map<number, number>,
	counters: SearchCounters,
): SearchResult {
	const reachable = goalCost !== undefined && Number.isFinite(goalCost)
	const path = reachable ? reconstructPath(predecessors, start, goal) : []
	let total = Number.POSITIVE_INFINITY
	// The one-node path weighs nothing, even when a negative cycle lowered the start's cost
	if (start === goal) total = 0
	else if (reachable && path.length > 0) total = goalCost

	return {
		path: Object.freeze(path),
		total,
		...counters,
		predecessors,
	}
}
