/**
 * City lookup helpers: resolve user-supplied identifiers and format labels.
 * @module
 */

import { geodesicDistanceKm } from "@routebench/shared/geodesic-distance"
import { toLonLat } from "@routebench/shared/types"
import { NotFoundError } from "./errors"
import type { NodeMap } from "./types"

/**
 * Resolve a city id or exact city name to a node id.
 *
 * Numbers must be ids present in the map. Strings are matched against city
 * names; the first match in map order wins.
 *
 * @throws NotFoundError if nothing matches.
 */
export function resolveId(identifier: number | string, nodes: NodeMap): number {
	if (typeof identifier === "number") {
		if (nodes.has(identifier)) return identifier
		throw new NotFoundError(`City id ${identifier} not found.`, identifier)
	}
	for (const [id, node] of nodes) {
		if (node.name === identifier) return id
	}
	throw new NotFoundError(`City name '${identifier}' not found.`, identifier)
}

/**
 * All cities as `[id, name]` pairs sorted by name, ignoring case.
 */
export function listCities(nodes: NodeMap): [id: number, name: string][] {
	return Array.from(nodes.values(), (node): [number, string] => [
		node.id,
		node.name,
	]).sort(([idA, nameA], [idB, nameB]) => {
		const a = nameA.toLowerCase()
		const b = nameB.toLowerCase()
		if (a !== b) return a < b ? -1 : 1
		return idA - idB
	})
}

/** "Name (id)", or "<unknown:id>" for ids not in the map. */
export function cityLabel(nodeId: number, nodes: NodeMap): string {
	const node = nodes.get(nodeId)
	if (!node) return `<unknown:${nodeId}>`
	return `${node.name} (${nodeId})`
}

/**
 * Geodesic distance in kilometers between two cities.
 * @throws NotFoundError if either id is unknown.
 */
export function nodeDistanceKm(a: number, b: number, nodes: NodeMap): number {
	const nodeA = nodes.get(a)
	if (!nodeA) throw new NotFoundError(`City id ${a} not found.`, a)
	const nodeB = nodes.get(b)
	if (!nodeB) throw new NotFoundError(`City id ${b} not found.`, b)
	return geodesicDistanceKm(toLonLat(nodeA), toLonLat(nodeB))
}
