/**
 * Edge weight selection by routing metric.
 * @module
 */

import { InvalidParameterError } from "./errors"
import type { RoutingMetric, WeightFn } from "./types"

const WEIGHT_ACCESSORS: Record<RoutingMetric, WeightFn> = {
	distance: (edge) => edge.distanceKm,
	time: (edge) => edge.travelTimeMin,
}

export const ROUTING_METRICS: readonly RoutingMetric[] = ["distance", "time"]

export function isRoutingMetric(value: string): value is RoutingMetric {
	return Object.hasOwn(WEIGHT_ACCESSORS, value)
}

/**
 * Weight function for a metric: `distance` selects kilometers, `time` minutes.
 * @throws InvalidParameterError for any other metric.
 */
export function weightAccessor(metric: string): WeightFn {
	if (!isRoutingMetric(metric)) {
		throw new InvalidParameterError(
			`Invalid metric '${metric}'. Choose one of: ${ROUTING_METRICS.join(", ")}`,
			"metric",
		)
	}
	return WEIGHT_ACCESSORS[metric]
}

/** The metric whose accessor is `getWeight`, or undefined for a custom function. */
export function metricOf(getWeight: WeightFn): RoutingMetric | undefined {
	return ROUTING_METRICS.find((metric) => WEIGHT_ACCESSORS[metric] === getWeight)
}

/**
 * Metric that selects the A* heuristic for a search.
 *
 * The weight function decides when it is one of the built-in accessors; an
 * explicit `metric` must then agree with it. Custom weight functions fall back
 * to `metric`, then to the default.
 *
 * @throws InvalidParameterError when `metric` contradicts the accessor.
 */
export function searchMetric(
	getWeight: WeightFn,
	metric: RoutingMetric | undefined,
	fallback: RoutingMetric,
): RoutingMetric {
	const selected = metricOf(getWeight)
	if (selected === undefined) return metric ?? fallback
	if (metric !== undefined && metric !== selected) {
		throw new InvalidParameterError(
			`Metric '${metric}' does not match the weight function, which selects '${selected}'.`,
			"metric",
		)
	}
	return selected
}
