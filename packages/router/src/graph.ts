/**
 * Routing graph construction from city and road rows.
 *
 * Cities become nodes keyed by id; roads become directed edges carrying a
 * distance and a travel time. Construction validates every row, drops roads
 * whose endpoints are unknown, and optionally drops self-loops, collapses
 * parallel roads and mirrors every road in both directions.
 *
 * @module
 */

import { type LonLat, toLonLat } from "@routebench/shared/types"
import { z } from "zod"
import { DataIntegrityError } from "./errors"
import { DEFAULT_BUILD_OPTIONS } from "./settings"
import type {
	AdjacencyMap,
	BuildGraphOptions,
	CityNode,
	GraphEdge,
	NodeMap,
	RawRow,
} from "./types"

/**
 * Immutable routing graph: a node map plus per-node outgoing edges.
 *
 * Engines only read from the graph, so one instance can back any number of
 * runs.
 *
 * @example
 * ```ts
 * const graph = buildGraph(cityRows, edgeRows, { symmetrize: true })
 * for (const edge of graph.getEdges(1)) console.log(edge.targetNodeId)
 * ```
 */
export class RoutingGraph {
	readonly nodes: NodeMap
	readonly adjacency: AdjacencyMap
	readonly edgeCount: number

	constructor(nodes: NodeMap, adjacency: AdjacencyMap) {
		this.nodes = new Map(nodes)
		const copy = new Map<number, readonly GraphEdge[]>()
		let edgeCount = 0
		for (const [source, edges] of adjacency) {
			copy.set(
				source,
				edges.map((edge) => ({ ...edge })),
			)
			edgeCount += edges.length
		}
		this.adjacency = copy
		this.edgeCount = edgeCount
	}

	/** Outgoing edges of a node; empty when the node has none. */
	getEdges(nodeId: number): readonly GraphEdge[] {
		return this.adjacency.get(nodeId) ?? []
	}

	getNode(nodeId: number): CityNode | undefined {
		return this.nodes.get(nodeId)
	}

	hasNode(nodeId: number): boolean {
		return this.nodes.has(nodeId)
	}

	getNodeLonLat(nodeId: number): LonLat | undefined {
		const node = this.nodes.get(nodeId)
		return node ? toLonLat(node) : undefined
	}

	/** Ids of every city. */
	nodeIds(): number[] {
		return Array.from(this.nodes.keys())
	}

	/** Ids that appear as adjacency keys, in insertion order. */
	sourceIds(): number[] {
		return Array.from(this.adjacency.keys())
	}
}

// ---------------------------------------------------------------------------
// Row validation
// ---------------------------------------------------------------------------

const numberCell = z
	.union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
	.pipe(z.number().finite())

const idCell = numberCell.pipe(z.number().int())

const textCell = z.union([z.string(), z.number()]).transform(String)

const cityRowSchema = z.object({
	id: idCell,
	name_en: textCell,
	latitude: numberCell,
	longitude: numberCell,
})

const edgeRowSchema = z.object({
	source_id: idCell,
	target_id: idCell,
	distance_km: numberCell,
	travel_time_min: numberCell,
})

/** Columns required in city rows. */
export const CITY_COLUMNS = Object.keys(cityRowSchema.shape)
/** Columns required in edge rows. */
export const EDGE_COLUMNS = Object.keys(edgeRowSchema.shape)

function parseRows<T extends z.ZodTypeAny>(
	schema: T,
	columns: readonly string[],
	rows: readonly RawRow[],
	label: string,
): z.output<T>[] {
	return rows.map((row, index) => {
		const parsed = schema.safeParse(row)
		if (parsed.success) return parsed.data

		const issue = parsed.error.issues[0]
		const column = String(issue?.path[0] ?? "")
		const value = row[column]
		const problem =
			value === undefined
				? `missing column '${column}' (expected ${columns.join(", ")})`
				: `invalid value '${String(value)}' in column '${column}'`
		throw new DataIntegrityError(
			`${label} row ${index}: ${problem}`,
			parsed.error.issues,
		)
	})
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/** True when `a` is lexicographically smaller than `b` by (distance, time). */
function isBetterEdge(a: GraphEdge, b: GraphEdge): boolean {
	if (a.distanceKm !== b.distanceKm) return a.distanceKm < b.distanceKm
	return a.travelTimeMin < b.travelTimeMin
}

/**
 * Build a routing graph from raw city and edge rows.
 *
 * @param cityRows - Rows with `id`, `name_en`, `latitude`, `longitude`.
 * @param edgeRows - Rows with `source_id`, `target_id`, `distance_km`, `travel_time_min`.
 * @throws DataIntegrityError if a row lacks a required column or holds an unparsable value.
 */
export function buildGraph(
	cityRows: readonly RawRow[],
	edgeRows: readonly RawRow[],
	options: Partial<BuildGraphOptions> = {},
): RoutingGraph {
	const symmetrize = options.symmetrize ?? DEFAULT_BUILD_OPTIONS.symmetrize
	const dropSelfLoops =
		options.dropSelfLoops ?? DEFAULT_BUILD_OPTIONS.dropSelfLoops
	const keepBestEdge = options.keepBestEdge ?? DEFAULT_BUILD_OPTIONS.keepBestEdge

	const cities = parseRows(cityRowSchema, CITY_COLUMNS, cityRows, "cities")
	const roads = parseRows(edgeRowSchema, EDGE_COLUMNS, edgeRows, "edges")

	const nodes = new Map<number, CityNode>()
	for (const city of cities) {
		nodes.set(city.id, {
			id: city.id,
			name: city.name_en,
			lat: city.latitude,
			lon: city.longitude,
		})
	}

	// Directed edges that survive filtering, in input order
	const kept: { source: number; edge: GraphEdge }[] = []
	const pairSlots = new Map<string, number>()

	for (const road of roads) {
		const source = road.source_id
		const target = road.target_id
		if (!nodes.has(source) || !nodes.has(target)) continue
		if (dropSelfLoops && source === target) continue

		const edge: GraphEdge = {
			targetNodeId: target,
			distanceKm: road.distance_km,
			travelTimeMin: road.travel_time_min,
		}

		if (keepBestEdge) {
			const key = `${source}->${target}`
			const slot = pairSlots.get(key)
			if (slot !== undefined) {
				const current = kept[slot]
				if (current && isBetterEdge(edge, current.edge)) {
					kept[slot] = { source, edge }
				}
				continue
			}
			pairSlots.set(key, kept.length)
		}

		kept.push({ source, edge })
	}

	const adjacency = new Map<number, GraphEdge[]>()
	const addEdge = (from: number, edge: GraphEdge) => {
		let edges = adjacency.get(from)
		if (!edges) {
			edges = []
			adjacency.set(from, edges)
		}
		edges.push(edge)
	}

	for (const { source, edge } of kept) {
		addEdge(source, edge)
		if (symmetrize) {
			addEdge(edge.targetNodeId, { ...edge, targetNodeId: source })
		}
	}

	return new RoutingGraph(nodes, adjacency)
}
