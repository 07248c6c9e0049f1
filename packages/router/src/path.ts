/**
 * Path reconstruction from a predecessor map.
 * @module
 */

/**
 * Walk predecessors back from `goal` to `start` and return the path in order.
 *
 * Returns `[start]` when start and goal coincide, and an empty path when the
 * chain breaks before reaching `start` or revisits a node.
 */
export function reconstructPath(
	predecessors: ReadonlyMap<number, number>,
	start: number,
	goal: number,
): number[] {
	if (start === goal) return [start]

	const path: number[] = []
	const seen = new Set<number>()
	let current = goal

	while (current !== start) {
		if (seen.has(current)) return []
		seen.add(current)
		path.push(current)

		const previous = predecessors.get(current)
		if (previous === undefined) return []
		current = previous
	}

	path.push(start)
	return path.reverse()
}
