import type { Coordinate } from './coordinate.js';

export type RouteDifficulty = 'easy' | 'moderate' | 'challenging';

export type RouteTerrain = 'urban' | 'park' | 'mixed';

export type RouteStrategy = 'geometric' | 'street';

export type RouteShape =
  | 'circle'
  | 'square'
  | 'figure_eight'
  | 'meander'
  | 'loop_clockwise'
  | 'loop_counterclockwise'
  | 'out_and_back'
  | 'exploration';

export interface RoutePoint {
  readonly coordinate: Coordinate;
  readonly instruction?: string;
}

export interface WalkRoute {
  readonly id: string;
  readonly name: string;
  readonly shape: RouteShape;
  readonly strategy: RouteStrategy;
  readonly points: readonly RoutePoint[];
  readonly estimatedDistanceM: number;
  readonly estimatedSteps: number;
  readonly estimatedDurationSec: number;
  readonly difficulty: RouteDifficulty;
  readonly terrain: RouteTerrain;
}

/** Steps per meter assumed for idealized geometric loops */
export const GEOMETRIC_STEPS_PER_METER = 1.25;

/** Steps per meter assumed for street-snapped routes */
export const STREET_STEPS_PER_METER = 1.3;
