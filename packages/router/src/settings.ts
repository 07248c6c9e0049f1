import type { BuildGraphOptions, RoutingMetric } from "./types"

/** Maximum speed (km/h) assumed by the travel-time heuristic. */
export const DEFAULT_MAX_KMH = 70

export const DEFAULT_METRIC: RoutingMetric = "distance"

export const DEFAULT_BUILD_OPTIONS: BuildGraphOptions = {
	symmetrize: true,
	dropSelfLoops: true,
	keepBestEdge: true,
}

/** CSV locations used by `loadGraphFromCsv`, relative to the working directory. */
export const DEFAULT_CITIES_CSV = "data/cities.csv"
export const DEFAULT_EDGES_CSV = "data/edges.csv"
