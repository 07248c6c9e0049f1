/**
 * Load a routing graph from `cities.csv` and `edges.csv` files.
 * @module
 */

import { readFile } from "node:fs/promises"
import { parseCsvText } from "@routebench/shared/csv-parse-stream"
import {
	logProgress,
	type ProgressListener,
	progressEvent,
} from "@routebench/shared/progress"
import { buildGraph, type RoutingGraph } from "./graph"
import { DEFAULT_CITIES_CSV, DEFAULT_EDGES_CSV } from "./settings"
import type { BuildGraphOptions } from "./types"

export interface LoadGraphOptions extends BuildGraphOptions {
	citiesPath: string
	edgesPath: string
}

/**
 * Read a CSV file with a header row into records keyed by trimmed header.
 */
export async function readCsvRows(
	path: string,
): Promise<Record<string, string>[]> {
	const text = await readFile(path, "utf8")
	return parseCsvText(text, { mapHeaders: ({ header }) => header.trim() })
}

/**
 * Read city and edge CSV files and build the routing graph.
 *
 * @example
 * ```ts
 * const graph = await loadGraphFromCsv({ symmetrize: false })
 * ```
 */
export async function loadGraphFromCsv(
	options: Partial<LoadGraphOptions> = {},
	onProgress: ProgressListener = logProgress,
): Promise<RoutingGraph> {
	const citiesPath = options.citiesPath ?? DEFAULT_CITIES_CSV
	const edgesPath = options.edgesPath ?? DEFAULT_EDGES_CSV

	onProgress(progressEvent(`Reading cities from ${citiesPath}...`))
	const cityRows = await readCsvRows(citiesPath)
	onProgress(progressEvent(`Reading edges from ${edgesPath}...`))
	const edgeRows = await readCsvRows(edgesPath)

	const graph = buildGraph(cityRows, edgeRows, options)
	onProgress(
		progressEvent(
			`Built graph with ${graph.nodes.size} cities and ${graph.edgeCount} edges`,
		),
	)
	return graph
}
