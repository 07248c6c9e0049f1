/**
 * Type definitions for the routing module.
 * @module
 */

import type { RoutingGraph } from "./graph"

/** A city in the road network. */
export interface CityNode {
	/** City id, unique within the graph. */
	id: number
	/** Display name. */
	name: string
	/** Latitude in degrees. */
	lat: number
	/** Longitude in degrees. */
	lon: number
}

/** Directed edge in the routing graph. */
export interface GraphEdge {
	/** Target node id. */
	targetNodeId: number
	/** Road distance in kilometers. */
	distanceKm: number
	/** Travel time in minutes. */
	travelTimeMin: number
}

/** Cities keyed by id. */
export type NodeMap = ReadonlyMap<number, CityNode>

/** Outgoing edges keyed by source id. A missing key means no edges. */
export type AdjacencyMap = ReadonlyMap<number, readonly GraphEdge[]>

/** Available routing algorithms. */
export type RoutingAlgorithm = "astar" | "dijkstra" | "bellman-ford"

/** Routing metric (edge weight dimension) to optimize. */
export type RoutingMetric = "distance" | "time"

/** Selects the weight of an edge. */
export type WeightFn = (edge: GraphEdge) => number

/** Raw row values as read from CSV or supplied in memory. */
export type RawRow = Readonly<Record<string, string | number | undefined>>

/** Options controlling graph construction. */
export interface BuildGraphOptions {
	/** Insert every kept edge in both directions. Default: true. */
	symmetrize: boolean
	/** Drop edges whose source equals their target. Default: true. */
	dropSelfLoops: boolean
	/** Keep only the smallest (distance, time) edge per ordered pair. Default: true. */
	keepBestEdge: boolean
}

/** Options for heuristic-guided search. */
export interface HeuristicOptions {
	/** Maximum speed (km/h) used to bound travel time. Default: 70. */
	maxKmh: number
}

/** Options passed to every algorithm. */
export interface SearchOptions extends HeuristicOptions {
	/** Metric the weight function selects; picks the A* heuristic. Default: "distance". */
	metric: RoutingMetric
}

/** Outcome of a single engine invocation. */
export interface SearchResult {
	/** Node ids from start to goal; empty when unreachable. */
	path: readonly number[]
	/** Total path weight; Infinity when unreachable. */
	total: number
	/** Queue pops for A* and Dijkstra, relaxation passes for Bellman-Ford. */
	exploredOrIterations: number
	/** Improving relaxations. */
	relaxationsDone: number
	/** Edge evaluations. */
	edgesScanned: number
	/** A negative-weight cycle is reachable from start (Bellman-Ford only). */
	negativeCycle: boolean
	/** The goal is reachable from a negative cycle (Bellman-Ford only). */
	goalAffectedByNegCycle: boolean
	/** Predecessor of every node whose cost was improved. */
	predecessors: ReadonlyMap<number, number>
}

/** Uniform record returned by the orchestrator. */
export interface RunResult {
	algorithm: RoutingAlgorithm
	path: readonly number[]
	total: number
	/** Wall time in seconds. */
	runtimeSec: number
	exploredOrIterations: number
	relaxationsDone: number
	edgesScanned: number
	negativeCycle: boolean
	goalAffectedByNegCycle: boolean
}

/** Function signature for routing algorithms. */
export type ShortestPathAlgorithmFn = (
	graph: RoutingGraph,
	startId: number,
	goalId: number,
	getWeight: WeightFn,
	options?: Partial<SearchOptions>,
) => SearchResult
