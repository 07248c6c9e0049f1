/**
 * High-level router API.
 *
 * Resolves city identifiers, selects the weight function, and runs one or all
 * algorithms against a shared graph, returning uniform result records.
 *
 * @module
 */

import {
	logProgress,
	type ProgressListener,
	progressEvent,
} from "@routebench/shared/progress"
import {
	ALGORITHM_LABELS,
	isRoutingAlgorithm,
	ROUTING_ALGORITHMS,
	routingAlgorithms,
} from "./algorithms"
import { cityLabel, resolveId } from "./cities"
import { InvalidParameterError } from "./errors"
import type { RoutingGraph } from "./graph"
import { DEFAULT_MAX_KMH, DEFAULT_METRIC } from "./settings"
import type { RunResult, SearchOptions, WeightFn } from "./types"
import { weightAccessor } from "./weights"

/**
 * Run one algorithm and time it.
 *
 * @throws InvalidParameterError for an unknown algorithm, or (A*) an unknown
 * metric or non-positive `maxKmh`.
 */
export function runShortestPath(
	algorithm: string,
	graph: RoutingGraph,
	startId: number,
	goalId: number,
	getWeight: WeightFn,
	options: Partial<SearchOptions> = {},
): RunResult {
	if (!isRoutingAlgorithm(algorithm)) {
		throw new InvalidParameterError(
			`Unknown algorithm '${algorithm}'. Choose one of: ${ROUTING_ALGORITHMS.join(", ")}`,
			"algorithm",
		)
	}

	const search = routingAlgorithms[algorithm]
	const startedAt = performance.now()
	const result = search(graph, startId, goalId, getWeight, options)
	const runtimeSec = (performance.now() - startedAt) / 1000

	return Object.freeze({
		algorithm,
		path: result.path,
		total: result.total,
		runtimeSec,
		exploredOrIterations: result.exploredOrIterations,
		relaxationsDone: result.relaxationsDone,
		edgesScanned: result.edgesScanned,
		negativeCycle: result.negativeCycle,
		goalAffectedByNegCycle: result.goalAffectedByNegCycle,
	})
}

/**
 * One-line summary of a run, e.g.
 * `Dijkstra: total=2.000 path=3 nodes explored=3 relaxations=2 scanned=4 (0.125 ms)`.
 */
export function formatRunSummary(result: RunResult): string {
	const total = Number.isFinite(result.total)
		? result.total.toFixed(3)
		: "unreachable"
	const counter =
		result.algorithm === "bellman-ford" ? "iterations" : "explored"
	const parts = [
		`${ALGORITHM_LABELS[result.algorithm]}:`,
		`total=${total}`,
		`path=${result.path.length} nodes`,
		`${counter}=${result.exploredOrIterations}`,
		`relaxations=${result.relaxationsDone}`,
		`scanned=${result.edgesScanned}`,
	]
	if (result.negativeCycle) parts.push("NEGATIVE CYCLE")
	if (result.goalAffectedByNegCycle) parts.push("(goal affected)")
	parts.push(`(${(result.runtimeSec * 1000).toFixed(3)} ms)`)
	return parts.join(" ")
}

/**
 * Router comparing all algorithms on one graph.
 *
 * @example
 * ```ts
 * const router = new Router(graph, { metric: "time" })
 * const [astar, dijkstra, bellmanFord] = router.runAll("Lyon", "Nice")
 * console.log(astar.total === dijkstra.total)
 * ```
 */
export class Router {
	readonly graph: RoutingGraph
	private readonly defaults: SearchOptions
	private readonly onProgress: ProgressListener

	constructor(
		graph: RoutingGraph,
		options: Partial<SearchOptions> = {},
		onProgress: ProgressListener = logProgress,
	) {
		this.graph = graph
		this.defaults = {
			metric: options.metric ?? DEFAULT_METRIC,
			maxKmh: options.maxKmh ?? DEFAULT_MAX_KMH,
		}
		this.onProgress = onProgress
	}

	/**
	 * Run one algorithm between two cities given by id or name.
	 * @throws NotFoundError if either city does not resolve.
	 */
	route(
		algorithm: string,
		start: number | string,
		goal: number | string,
		options: Partial<SearchOptions> = {},
	): RunResult {
		const searchOptions = this.searchOptions(options)
		const startId = resolveId(start, this.graph.nodes)
		const goalId = resolveId(goal, this.graph.nodes)
		return runShortestPath(
			algorithm,
			this.graph,
			startId,
			goalId,
			weightAccessor(searchOptions.metric),
			searchOptions,
		)
	}

	/**
	 * Run A*, Dijkstra and Bellman-Ford, in that order, between two cities.
	 * Emits one progress line per run.
	 */
	runAll(
		start: number | string,
		goal: number | string,
		options: Partial<SearchOptions> = {},
	): RunResult[] {
		const searchOptions = this.searchOptions(options)
		const startId = resolveId(start, this.graph.nodes)
		const goalId = resolveId(goal, this.graph.nodes)
		const getWeight = weightAccessor(searchOptions.metric)

		this.onProgress(
			progressEvent(
				`Routing ${cityLabel(startId, this.graph.nodes)} -> ${cityLabel(goalId, this.graph.nodes)} by ${searchOptions.metric}`,
			),
		)

		return ROUTING_ALGORITHMS.map((algorithm) => {
			const result = runShortestPath(
				algorithm,
				this.graph,
				startId,
				goalId,
				getWeight,
				searchOptions,
			)
			this.onProgress(
				progressEvent(
					formatRunSummary(result),
					result.negativeCycle ? "warn" : "info",
				),
			)
			return result
		})
	}

	private searchOptions(options: Partial<SearchOptions>): SearchOptions {
		return {
			metric: options.metric ?? this.defaults.metric,
			maxKmh: options.maxKmh ?? this.defaults.maxKmh,
		}
	}
}

/**
 * Run every algorithm between two cities on the same graph.
 * @see Router.runAll
 */
export function runAll(
	graph: RoutingGraph,
	start: number | string,
	goal: number | string,
	options: Partial<SearchOptions> = {},
	onProgress: ProgressListener = logProgress,
): RunResult[] {
	return new Router(graph, options, onProgress).runAll(start, goal)
}
