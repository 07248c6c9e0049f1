/**
 * Admissible A* heuristics based on geodesic distance to the goal.
 *
 * - distance: geodesic kilometers from a node to the goal
 * - time: those kilometers at `maxKmh`, in minutes (lower bound on travel time)
 *
 * @module
 */

import { geodesicDistanceKm } from "@routebench/shared/geodesic-distance"
import { type LonLat, toLonLat } from "@routebench/shared/types"
import { InvalidParameterError } from "./errors"
import { DEFAULT_MAX_KMH } from "./settings"
import type { HeuristicOptions, NodeMap, RoutingMetric } from "./types"
import { isRoutingMetric } from "./weights"

/**
 * Lower-bound estimator for a fixed goal.
 *
 * Estimates are memoized per node id for the lifetime of the instance; create
 * one per search.
 */
export class GeodesicHeuristic {
	private readonly cache = new Map<number, number>()
	private readonly goalCoord: LonLat | undefined
	/** Kilometers covered per unit of cost. */
	private readonly kmPerUnit: number

	constructor(
		readonly goalId: number,
		private readonly nodes: NodeMap,
		readonly metric: RoutingMetric,
		maxKmh: number,
	) {
		const goal = nodes.get(goalId)
		this.goalCoord = goal ? toLonLat(goal) : undefined
		this.kmPerUnit = metric === "time" ? maxKmh / 60 : 1
	}

	/** Estimated remaining cost from `nodeId` to the goal. */
	estimate(nodeId: number): number {
		const cached = this.cache.get(nodeId)
		if (cached !== undefined) return cached

		const value = this.compute(nodeId)
		this.cache.set(nodeId, value)
		return value
	}

	/** Number of memoized estimates. */
	get size(): number {
		return this.cache.size
	}

	private compute(nodeId: number): number {
		if (!this.goalCoord) return 0
		const node = this.nodes.get(nodeId)
		if (!node) return 0
		return geodesicDistanceKm(toLonLat(node), this.goalCoord) / this.kmPerUnit
	}
}

/**
 * Create the heuristic for a goal and metric.
 *
 * @throws InvalidParameterError for an unknown metric, or for a time metric
 * whose `maxKmh` is not a positive finite number.
 */
export function createHeuristic(
	goalId: number,
	nodes: NodeMap,
	metric: string,
	options: Partial<HeuristicOptions> = {},
): GeodesicHeuristic {
	if (!isRoutingMetric(metric)) {
		throw new InvalidParameterError(
			`Invalid metric '${metric}'. Expected "distance" or "time".`,
			"metric",
		)
	}

	const maxKmh = options.maxKmh ?? DEFAULT_MAX_KMH
	if (metric === "time" && !(Number.isFinite(maxKmh) && maxKmh > 0)) {
		throw new InvalidParameterError(
			`maxKmh must be > 0, received ${maxKmh}`,
			"maxKmh",
		)
	}

	return new GeodesicHeuristic(goalId, nodes, metric, maxKmh)
}
