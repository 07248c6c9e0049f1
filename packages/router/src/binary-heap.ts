/**
 * Min-heap priority queue for lazy-deletion searches.
 *
 * Stores `(priority, item)` pairs in two flat arrays. The same item may be
 * pushed several times; callers discard stale entries when they pop them.
 * Equal priorities pop in ascending item order, so searches are reproducible.
 */
export class BinaryHeap {
	private items: number[] = []
	private priorities: number[] = []

	get size(): number {
		return this.items.length
	}

	/**
	 * Add an item with the given priority.
	 */
	push(item: number, priority: number): void {
		this.items.push(item)
		this.priorities.push(priority)
		this.bubbleUp(this.items.length - 1)
	}

	/**
	 * Remove and return the entry with the smallest priority.
	 */
	pop(): { item: number; priority: number } | undefined {
		const item = this.items[0]
		const priority = this.priorities[0]
		if (item === undefined || priority === undefined) return undefined

		const lastItem = this.items.pop()
		const lastPriority = this.priorities.pop()
		if (
			this.items.length > 0 &&
			lastItem !== undefined &&
			lastPriority !== undefined
		) {
			this.items[0] = lastItem
			this.priorities[0] = lastPriority
			this.bubbleDown(0)
		}

		return { item, priority }
	}

	/**
	 * Smallest entry without removing it.
	 */
	peek(): { item: number; priority: number } | undefined {
		const item = this.items[0]
		const priority = this.priorities[0]
		if (item === undefined || priority === undefined) return undefined
		return { item, priority }
	}

	clear(): void {
		this.items.length = 0
		this.priorities.length = 0
	}

	/** Whether the entry at `a` must sit above the entry at `b`. */
	private precedes(a: number, b: number): boolean {
		const pa = this.priorities[a] ?? Number.POSITIVE_INFINITY
		const pb = this.priorities[b] ?? Number.POSITIVE_INFINITY
		if (pa !== pb) return pa < pb
		return (this.items[a] ?? 0) < (this.items[b] ?? 0)
	}

	private swap(a: number, b: number): void {
		const item = this.items[a]
		const priority = this.priorities[a]
		const otherItem = this.items[b]
		const otherPriority = this.priorities[b]
		if (
			item === undefined ||
			priority === undefined ||
			otherItem === undefined ||
			otherPriority === undefined
		) {
			return
		}
		this.items[a] = otherItem
		this.priorities[a] = otherPriority
		this.items[b] = item
		this.priorities[b] = priority
	}

	private bubbleUp(startIndex: number): void {
		let index = startIndex
		while (index > 0) {
			const parentIndex = (index - 1) >> 1
			if (!this.precedes(index, parentIndex)) break
			this.swap(index, parentIndex)
			index = parentIndex
		}
	}

	private bubbleDown(startIndex: number): void {
		const length = this.items.length
		let index = startIndex

		while (true) {
			const leftIndex = (index << 1) + 1
			const rightIndex = leftIndex + 1
			let smallest = index

			if (leftIndex < length && this.precedes(leftIndex, smallest)) {
				smallest = leftIndex
			}
			if (rightIndex < length && this.precedes(rightIndex, smallest)) {
				smallest = rightIndex
			}
			if (smallest === index) break

			this.swap(index, smallest)
			index = smallest
		}
	}
}
