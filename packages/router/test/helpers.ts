import { geodesicDistanceKm } from "@routebench/shared/geodesic-distance"
import { buildGraph, RoutingGraph } from "../src/graph"
import type { CityNode, GraphEdge, RawRow, WeightFn } from "../src/types"

/**
 * Creates an edge. Travel time defaults to the distance.
 */
export function mockEdge(
	targetNodeId: number,
	distanceKm: number,
	travelTimeMin = distanceKm,
): GraphEdge {
	return { targetNodeId, distanceKm, travelTimeMin }
}

export function mockCity(id: number, lat: number, lon: number): CityNode {
	return { id, name: `City ${id}`, lat, lon }
}

/**
 * Creates a graph from an adjacency list. Nodes are optional; engines other
 * than A* never read them.
 */
export function createGraph(
	adjacency: [number, GraphEdge[]][],
	cities: CityNode[] = [],
): RoutingGraph {
	return new RoutingGraph(
		new Map(cities.map((city) => [city.id, city])),
		new Map(adjacency),
	)
}

/**
 * Three cities along the equator, one degree of longitude apart:
 *
 *   1 <--(1 km, 2 min)--> 2 <--(1 km, 2 min)--> 3
 */
export const LINE_CITY_ROWS: RawRow[] = [
	{ id: 1, name_en: "Alpha", latitude: 0, longitude: 0 },
	{ id: 2, name_en: "Bravo", latitude: 0, longitude: 1 },
	{ id: 3, name_en: "Charlie", latitude: 0, longitude: 2 },
]

export const LINE_EDGE_ROWS: RawRow[] = [
	{ source_id: 1, target_id: 2, distance_km: 1, travel_time_min: 2 },
	{ source_id: 2, target_id: 3, distance_km: 1, travel_time_min: 2 },
]

export function createLineGraph(): RoutingGraph {
	return buildGraph(LINE_CITY_ROWS, LINE_EDGE_ROWS, { symmetrize: true })
}

/**
 * Sum of weights along a path, using the cheapest edge between each pair.
 * Returns undefined if a consecutive pair has no edge.
 */
export function pathWeight(
	graph: RoutingGraph,
	path: readonly number[],
	getWeight: WeightFn,
): number | undefined {
	let total = 0
	for (let i = 1; i < path.length; i++) {
		const from = path[i - 1]
		const to = path[i]
		if (from === undefined || to === undefined) return undefined
		const weights = graph
			.getEdges(from)
			.filter((edge) => edge.targetNodeId === to)
			.map(getWeight)
		if (weights.length === 0) return undefined
		total += Math.min(...weights)
	}
	return total
}

/** Deterministic pseudo-random numbers in [0, 1). */
export function seededRandom(seed: number): () => number {
	let state = seed >>> 0
	return () => {
		state = (state * 1664525 + 1013904223) % 4294967296
		return state / 4294967296
	}
}

/**
 * Random road network whose roads are never shorter than the geodesic
 * distance between their cities and never faster than 70 km/h, so the A*
 * heuristics stay admissible.
 *
 * A chain 1 -> 2 -> ... -> n keeps every city reachable from city 1.
 */
export function createRandomGraph(
	seed: number,
	cityCount: number,
	extraRoads: number,
	symmetrize = true,
): RoutingGraph {
	const random = seededRandom(seed)
	const cities: RawRow[] = []
	for (let id = 1; id <= cityCount; id++) {
		cities.push({
			id,
			name_en: `City ${id}`,
			latitude: 45 + random() * 2,
			longitude: 4 + random() * 3,
		})
	}

	const road = (source: number, target: number): RawRow => {
		const a = cities[source - 1]
		const b = cities[target - 1]
		const straight = geodesicDistanceKm(
			[Number(a?.["longitude"]), Number(a?.["latitude"])],
			[Number(b?.["longitude"]), Number(b?.["latitude"])],
		)
		const distance = straight * (1 + random() * 0.6)
		const speedKmh = 30 + random() * 40
		return {
			source_id: source,
			target_id: target,
			distance_km: distance,
			travel_time_min: (distance / speedKmh) * 60,
		}
	}

	const roads: RawRow[] = []
	for (let id = 1; id < cityCount; id++) roads.push(road(id, id + 1))
	for (let i = 0; i < extraRoads; i++) {
		const source = 1 + Math.floor(random() * cityCount)
		const target = 1 + Math.floor(random() * cityCount)
		if (source !== target) roads.push(road(source, target))
	}

	return buildGraph(cities, roads, { symmetrize })
}
