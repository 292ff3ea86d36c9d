import type { Coordinate } from '@walkloop/domain';

/** Meters per degree of latitude (and of longitude at the equator) */
export const METERS_PER_DEGREE = 111_000;

/**
 * Shift a coordinate by a planar offset in meters using the equirectangular
 * approximation. Longitude is scaled by the cosine of the origin latitude,
 * which keeps loops under ~20 km close enough to their intended shape.
 */
export function offsetCoordinate(origin: Coordinate, northM: number, eastM: number): Coordinate {
  return {
    lat: origin.lat + northM / METERS_PER_DEGREE,
    lng: origin.lng + eastM / (METERS_PER_DEGREE * Math.cos((origin.lat * Math.PI) / 180)),
  };
}

/** Offset along a bearing in radians, clockwise from north. */
export function polarOffset(origin: Coordinate, distanceM: number, bearingRad: number): Coordinate {
  return offsetCoordinate(origin, distanceM * Math.cos(bearingRad), distanceM * Math.sin(bearingRad));
}

export function midpoint(a: Coordinate, b: Coordinate): Coordinate {
  return { lat: (a.lat + b.lat) / 2, lng: (a.lng + b.lng) / 2 };
}
