import type { Coordinate } from '../../entities/coordinate.js';

export interface WalkingPath {
  readonly points: readonly Coordinate[];
  readonly distanceM: number;
  readonly travelTimeSec: number;
}

export type DirectionsFailureReason = 'no_route' | 'timeout' | 'unavailable';

export type DirectionsResult =
  | { readonly ok: true; readonly path: WalkingPath }
  | { readonly ok: false; readonly reason: DirectionsFailureReason; readonly message?: string };

/**
 * Point-to-point walking directions from a street-network service.
 * Implementations never reject: every failure comes back as `{ ok: false }`.
 */
export interface DirectionsPort {
  walkingRoute(from: Coordinate, to: Coordinate): Promise<DirectionsResult>;
}
