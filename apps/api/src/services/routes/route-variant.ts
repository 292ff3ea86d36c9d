import { v4 as uuidv4 } from 'uuid';
import type {
  Coordinate,
  RouteDifficulty,
  RoutePoint,
  RouteShape,
  RouteStrategy,
  RouteTerrain,
  WalkRoute,
} from '@walkloop/domain';

export interface RouteBuildContext {
  start: Coordinate;
  targetDistanceM: number;
  signal?: AbortSignal;
}

/** One independently buildable candidate; `null` means it could not be built. */
export interface RouteVariant {
  readonly name: string;
  readonly shape: RouteShape;
  build(ctx: RouteBuildContext): Promise<WalkRoute | null>;
}

export interface RouteProfile {
  name: string;
  shape: RouteShape;
  strategy: RouteStrategy;
  difficulty: RouteDifficulty;
  terrain: RouteTerrain;
}

export interface RouteEstimate {
  distanceM: number;
  durationSec: number;
  stepsPerMeter: number;
}

export function routePoint(coordinate: Coordinate, instruction?: string): RoutePoint {
  return instruction === undefined ? { coordinate } : { coordinate, instruction };
}

export function assembleRoute(
  profile: RouteProfile,
  points: RoutePoint[],
  estimate: RouteEstimate,
): WalkRoute {
  return {
    id: uuidv4(),
    ...profile,
    points,
    estimatedDistanceM: estimate.distanceM,
    estimatedSteps: Math.floor(estimate.distanceM * estimate.stepsPerMeter),
    estimatedDurationSec: estimate.durationSec,
  };
}
