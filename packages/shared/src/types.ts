/**
 * Shared coordinate types.
 */

export type LonLat = [lon: number, lat: number]

export interface ILonLat {
	lon: number
	lat: number
}

/**
 * Convert an object with `lon` and `lat` fields into a LonLat tuple.
 */
export function toLonLat(point: ILonLat): LonLat {
	return [point.lon, point.lat]
}
