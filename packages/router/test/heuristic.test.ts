import { describe, expect, it } from "vitest"
import { InvalidParameterError } from "../src/errors"
import { createHeuristic } from "../src/heuristic"
import { metricOf, searchMetric, weightAccessor } from "../src/weights"
import { createLineGraph, mockEdge } from "./helpers"

describe("weightAccessor", () => {
	const edge = mockEdge(2, 12.5, 9)

	it("selects distance or travel time", () => {
		expect(weightAccessor("distance")(edge)).toBe(12.5)
		expect(weightAccessor("time")(edge)).toBe(9)
	})

	it("rejects unknown metrics", () => {
		expect(() => weightAccessor("distance_km")).toThrow(InvalidParameterError)
		expect(() => weightAccessor("speed")).toThrow(
			"Invalid metric 'speed'. Choose one of: distance, time",
		)
	})

	it("does not accept inherited object keys", () => {
		expect(() => weightAccessor("toString")).toThrow(InvalidParameterError)
	})
})

describe("searchMetric", () => {
	const custom = () => 1

	it("maps the built-in accessors back to their metric", () => {
		expect(metricOf(weightAccessor("distance"))).toBe("distance")
		expect(metricOf(weightAccessor("time"))).toBe("time")
		expect(metricOf(custom)).toBeUndefined()
	})

	it("lets the accessor decide over the fallback", () => {
		expect(searchMetric(weightAccessor("time"), undefined, "distance")).toBe("time")
		expect(searchMetric(weightAccessor("time"), "time", "distance")).toBe("time")
	})

	it("uses the metric option, then the fallback, for custom functions", () => {
		expect(searchMetric(custom, "time", "distance")).toBe("time")
		expect(searchMetric(custom, undefined, "distance")).toBe("distance")
	})

	it("rejects a metric that contradicts the accessor", () => {
		expect(() =>
			searchMetric(weightAccessor("distance"), "time", "distance"),
		).toThrow(InvalidParameterError)
	})
})

describe("createHeuristic", () => {
	const { nodes } = createLineGraph()

	it("estimates geodesic kilometers to the goal", () => {
		const heuristic = createHeuristic(3, nodes, "distance")

		expect(heuristic.estimate(1)).toBeCloseTo(222.638982, 5)
		expect(heuristic.estimate(2)).toBeCloseTo(111.319491, 5)
		expect(heuristic.estimate(3)).toBe(0)
	})

	it("estimates minutes at the default 70 km/h for time", () => {
		const heuristic = createHeuristic(3, nodes, "time")
		expect(heuristic.estimate(1)).toBeCloseTo(190.833413, 5)
	})

	it("uses the configured maximum speed", () => {
		const heuristic = createHeuristic(3, nodes, "time", { maxKmh: 50 })
		expect(heuristic.estimate(1)).toBeCloseTo(267.166778, 5)
	})

	it("memoizes estimates per node", () => {
		const heuristic = createHeuristic(3, nodes, "distance")
		const first = heuristic.estimate(1)

		expect(heuristic.estimate(1)).toBe(first)
		expect(heuristic.size).toBe(1)
		heuristic.estimate(2)
		expect(heuristic.size).toBe(2)
	})

	it("estimates 0 for nodes without coordinates", () => {
		expect(createHeuristic(3, nodes, "distance").estimate(99)).toBe(0)
	})

	it("estimates 0 everywhere when the goal has no coordinates", () => {
		const heuristic = createHeuristic(99, nodes, "distance")
		expect(heuristic.estimate(1)).toBe(0)
		expect(heuristic.estimate(2)).toBe(0)
	})

	it("rejects non-positive or non-finite speeds for time", () => {
		expect(() => createHeuristic(3, nodes, "time", { maxKmh: 0 })).toThrow(
			InvalidParameterError,
		)
		expect(() => createHeuristic(3, nodes, "time", { maxKmh: -10 })).toThrow(
			"maxKmh must be > 0, received -10",
		)
		expect(() =>
			createHeuristic(3, nodes, "time", { maxKmh: Number.NaN }),
		).toThrow(InvalidParameterError)
	})

	it("ignores the speed for the distance metric", () => {
		const heuristic = createHeuristic(3, nodes, "distance", { maxKmh: 0 })
		expect(heuristic.estimate(2)).toBeCloseTo(111.319491, 5)
	})

	it("rejects unknown metrics", () => {
		try {
			createHeuristic(3, nodes, "travel_time_min")
			expect.unreachable()
		} catch (error) {
			expect(error).toBeInstanceOf(InvalidParameterError)
			if (error instanceof InvalidParameterError) {
				expect(error.parameter).toBe("metric")
				expect(error.code).toBe("INVALID_PARAMETER")
			}
		}
	})
})
