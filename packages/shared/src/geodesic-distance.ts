/**
 * Geodesic distance on the WGS84 ellipsoid.
 *
 * Implements Vincenty's inverse formula. Points are given as `[lon, lat]` in
 * degrees to match the `LonLat` convention used across packages.
 *
 * @module
 */

import type { LonLat } from "./types"

/** WGS84 semi-major axis in meters. */
export const WGS84_A = 6378137
/** WGS84 flattening. */
export const WGS84_F = 1 / 298.257223563
/** WGS84 semi-minor (polar) axis in meters. */
export const WGS84_B = WGS84_A * (1 - WGS84_F)

const DEG = Math.PI / 180
const MAX_ITERATIONS = 200
const CONVERGENCE = 1e-12

/**
 * Great-circle distance on a sphere of the given radius.
 * Used when Vincenty's iteration does not converge (nearly antipodal points).
 */
function sphericalDistance(p1: LonLat, p2: LonLat, radius: number): number {
	const dLat = (p2[1] - p1[1]) * DEG
	const dLon = (p2[0] - p1[0]) * DEG
	const lat1 = p1[1] * DEG
	const lat2 = p2[1] * DEG
	const a =
		Math.sin(dLat / 2) ** 2 +
		Math.sin(dLon / 2) ** 2 * Math.cos(lat1) * Math.cos(lat2)
	return radius * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a))
}

/**
 * Calculate the geodesic distance between two LonLat points on the WGS84 ellipsoid.
 * @param p1 - The first point
 * @param p2 - The second point
 * @returns The distance in meters
 */
export function geodesicDistance(p1: LonLat, p2: LonLat): number {
	const L = (p2[0] - p1[0]) * DEG
	const U1 = Math.atan((1 - WGS84_F) * Math.tan(p1[1] * DEG))
	const U2 = Math.atan((1 - WGS84_F) * Math.tan(p2[1] * DEG))
	const sinU1 = Math.sin(U1)
	const cosU1 = Math.cos(U1)
	const sinU2 = Math.sin(U2)
	const cosU2 = Math.cos(U2)

	let lambda = L
	let sinSigma = 0
	let cosSigma = 0
	let sigma = 0
	let cosSqAlpha = 0
	let cos2SigmaM = 0

	for (let i = 0; i < MAX_ITERATIONS; i++) {
		const sinLambda = Math.sin(lambda)
		const cosLambda = Math.cos(lambda)
		sinSigma = Math.sqrt(
			(cosU2 * sinLambda) ** 2 +
				(cosU1 * sinU2 - sinU1 * cosU2 * cosLambda) ** 2,
		)
		// Coincident points
		if (sinSigma === 0) return 0

		cosSigma = sinU1 * sinU2 + cosU1 * cosU2 * cosLambda
		sigma = Math.atan2(sinSigma, cosSigma)
		const sinAlpha = (cosU1 * cosU2 * sinLambda) / sinSigma
		cosSqAlpha = 1 - sinAlpha * sinAlpha
		// Equatorial line: cosSqAlpha = 0
		cos2SigmaM =
			cosSqAlpha !== 0 ? cosSigma - (2 * sinU1 * sinU2) / cosSqAlpha : 0
		const C = (WGS84_F / 16) * cosSqAlpha * (4 + WGS84_F * (4 - 3 * cosSqAlpha))

		const previous = lambda
		lambda =
			L +
			(1 - C) *
				WGS84_F *
				sinAlpha *
				(sigma +
					C *
						sinSigma *
						(cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM ** 2)))

		if (Math.abs(lambda - previous) < CONVERGENCE) {
			const uSq = (cosSqAlpha * (WGS84_A ** 2 - WGS84_B ** 2)) / WGS84_B ** 2
			const A =
				1 + (uSq / 16384) * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)))
			const B = (uSq / 1024) * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)))
			const deltaSigma =
				B *
				sinSigma *
				(cos2SigmaM +
					(B / 4) *
						(cosSigma * (-1 + 2 * cos2SigmaM ** 2) -
							(B / 6) *
								cos2SigmaM *
								(-3 + 4 * sinSigma ** 2) *
								(-3 + 4 * cos2SigmaM ** 2)))
			return WGS84_B * A * (sigma - deltaSigma)
		}
	}

	return sphericalDistance(p1, p2, WGS84_B)
}

/**
 * Geodesic distance in kilometers.
 */
export function geodesicDistanceKm(p1: LonLat, p2: LonLat): number {
	return geodesicDistance(p1, p2) / 1000
}
