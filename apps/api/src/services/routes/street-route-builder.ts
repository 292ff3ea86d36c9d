import { STREET_STEPS_PER_METER } from '@walkloop/domain';
import type { Coordinate, DirectionsPort, RoutePoint, WalkingPath, WalkRoute } from '@walkloop/domain';
import { polarOffset } from './geo.js';
import { assembleRoute, routePoint } from './route-variant.js';
import type { RouteBuildContext, RouteProfile, RouteVariant } from './route-variant.js';

const LOOP_WAYPOINTS = 6;

export type LoopDirection = 'clockwise' | 'counterclockwise';

const LOOP_PROFILES: Record<LoopDirection, RouteProfile> = {
  clockwise: {
    name: 'Neighborhood Loop',
    shape: 'loop_clockwise',
    strategy: 'street',
    difficulty: 'easy',
    terrain: 'urban',
  },
  counterclockwise: {
    name: 'Counter Loop',
    shape: 'loop_counterclockwise',
    strategy: 'street',
    difficulty: 'easy',
    terrain: 'urban',
  },
};

const OUT_AND_BACK_PROFILE: RouteProfile = {
  name: 'Out & Back',
  shape: 'out_and_back',
  strategy: 'street',
  difficulty: 'moderate',
  terrain: 'mixed',
};

const EXPLORATION_PROFILE: RouteProfile = {
  name: 'Discovery Route',
  shape: 'exploration',
  strategy: 'street',
  difficulty: 'moderate',
  terrain: 'park',
};

interface LoopCues {
  start: string;
  waypoint: string;
  finish: string;
}

const LOOP_CUES: LoopCues = {
  start: 'Start your walk',
  waypoint: 'Continue to next waypoint',
  finish: "You're back at the start!",
};

const EXPLORATION_CUES: LoopCues = {
  start: 'Start exploring',
  waypoint: 'Exploring new area',
  finish: 'Back to start!',
};

// ---------------------------------------------------------------------------
// Waypoint geometry
// ---------------------------------------------------------------------------

/** Six points on a circle of circumference `targetDistanceM`, starting due north. */
export function loopWaypoints(
  center: Coordinate,
  targetDistanceM: number,
  direction: LoopDirection,
): Coordinate[] {
  const radius = targetDistanceM / (2 * Math.PI);
  const sign = direction === 'clockwise' ? 1 : -1;
  return Array.from({ length: LOOP_WAYPOINTS }, (_, i) =>
    polarOffset(center, radius, sign * ((i * 2 * Math.PI) / LOOP_WAYPOINTS)),
  );
}

/** Turnaround candidates due N, E, S and W of the start. */
export function outAndBackDestinations(start: Coordinate, outDistanceM: number): Coordinate[] {
  return [0, Math.PI / 2, Math.PI, (3 * Math.PI) / 2].map((bearing) =>
    polarOffset(start, outDistanceM, bearing),
  );
}

/** The start plus three diagonal waypoints (NE, SE, SW). */
export function explorationWaypoints(start: Coordinate, targetDistanceM: number): Coordinate[] {
  const radius = targetDistanceM / (3 * Math.PI);
  const diagonals = [Math.PI / 4, (3 * Math.PI) / 4, (5 * Math.PI) / 4];
  return [start, ...diagonals.map((bearing) => polarOffset(start, radius, bearing))];
}

// ---------------------------------------------------------------------------
// Stitching
// ---------------------------------------------------------------------------

function totals(legs: readonly WalkingPath[]): { distanceM: number; durationSec: number } {
  return legs.reduce(
    (acc, leg) => ({
      distanceM: acc.distanceM + leg.distanceM,
      durationSec: acc.durationSec + leg.travelTimeSec,
    }),
    { distanceM: 0, durationSec: 0 },
  );
}

/** A directions leg and the index of the waypoint it starts from */
interface CircuitLeg {
  from: number;
  path: WalkingPath;
}

// Finish cue only when the leg back to the first waypoint exists
function tagLoop(legs: readonly CircuitLeg[], waypointCount: number, cues: LoopCues): RoutePoint[] {
  const points: RoutePoint[] = [];
  for (const leg of legs) {
    const lastIndex = leg.path.points.length - 1;
    const closes = leg.from === waypointCount - 1;
    leg.path.points.forEach((coordinate, j) => {
      let cue: string | undefined;
      if (j === 0) cue = leg.from === 0 ? cues.start : cues.waypoint;
      else if (closes && j === lastIndex) cue = cues.finish;
      points.push(routePoint(coordinate, cue));
    });
  }
  return points;
}

function streetRoute(profile: RouteProfile, points: RoutePoint[], legs: readonly WalkingPath[]): WalkRoute | null {
  if (points.length < 2) return null;
  const { distanceM, durationSec } = totals(legs);
  return assembleRoute(profile, points, {
    distanceM,
    durationSec,
    stepsPerMeter: STREET_STEPS_PER_METER,
  });
}

/**
 * Closed loops snapped to the street network by asking the directions
 * service for a walking path between consecutive waypoints. Variants run
 * concurrently; lookups inside a variant run one after another.
 */
export class StreetRouteBuilder {
  constructor(private readonly directions: DirectionsPort) {}

  /** Neighborhood loop, counter loop, out & back and discovery, in that order. */
  async build(start: Coordinate, targetDistanceM: number, signal?: AbortSignal): Promise<(WalkRoute | null)[]> {
    return Promise.all(this.variants().map((v) => v.build({ start, targetDistanceM, signal })));
  }

  variants(): RouteVariant[] {
    const variant = (
      profile: RouteProfile,
      make: (ctx: RouteBuildContext) => Promise<WalkRoute | null>,
    ): RouteVariant => ({ name: profile.name, shape: profile.shape, build: make });

    return [
      variant(LOOP_PROFILES.clockwise, (ctx) => this.loop(ctx, 'clockwise')),
      variant(LOOP_PROFILES.counterclockwise, (ctx) => this.loop(ctx, 'counterclockwise')),
      variant(OUT_AND_BACK_PROFILE, (ctx) => this.outAndBack(ctx)),
      variant(EXPLORATION_PROFILE, (ctx) => this.exploration(ctx)),
    ];
  }

  async loop(ctx: RouteBuildContext, direction: LoopDirection): Promise<WalkRoute | null> {
    const waypoints = loopWaypoints(ctx.start, ctx.targetDistanceM, direction);
    const legs = await this.stitchCircuit(waypoints, ctx.signal);
    if (!legs) return null;
    const points = tagLoop(legs, waypoints.length, LOOP_CUES);
    return streetRoute(LOOP_PROFILES[direction], points, legs.map((leg) => leg.path));
  }

  async outAndBack(ctx: RouteBuildContext): Promise<WalkRoute | null> {
    const [turnaround] = outAndBackDestinations(ctx.start, ctx.targetDistanceM / 2);
    if (!turnaround) return null;

    const points: RoutePoint[] = [];
    const legs: WalkingPath[] = [];

    const outbound = await this.lookup(ctx.start, turnaround, ctx.signal);
    if (outbound) {
      const lastIndex = outbound.points.length - 1;
      outbound.points.forEach((coordinate, i) => {
        const cue = i === 0 ? 'Head out on your route' : i === lastIndex ? 'Turnaround point reached' : undefined;
        points.push(routePoint(coordinate, cue));
      });
      legs.push(outbound);
    }

    const inbound = await this.lookup(turnaround, ctx.start, ctx.signal);
    if (inbound) {
      // The turnaround point is already on the outbound leg
      const lastIndex = inbound.points.length - 1;
      inbound.points.forEach((coordinate, i) => {
        if (i === 0) return;
        points.push(routePoint(coordinate, i === lastIndex ? "You're back where you started!" : undefined));
      });
      legs.push(inbound);
    }

    if (ctx.signal?.aborted) return null;
    return streetRoute(OUT_AND_BACK_PROFILE, points, legs);
  }

  async exploration(ctx: RouteBuildContext): Promise<WalkRoute | null> {
    const waypoints = explorationWaypoints(ctx.start, ctx.targetDistanceM);
    const legs = await this.stitchCircuit(waypoints, ctx.signal);
    if (!legs) return null;
    const points = tagLoop(legs, waypoints.length, EXPLORATION_CUES);
    return streetRoute(EXPLORATION_PROFILE, points, legs.map((leg) => leg.path));
  }

  // Walk waypoint[i] -> waypoint[i + 1], wrapping back to the first; failed legs are skipped
  private async stitchCircuit(waypoints: readonly Coordinate[], signal?: AbortSignal): Promise<CircuitLeg[] | null> {
    const legs: CircuitLeg[] = [];
    for (let i = 0; i < waypoints.length; i++) {
      const from = waypoints[i];
      const to = waypoints[(i + 1) % waypoints.length];
      if (!from || !to) continue;
      const leg = await this.lookup(from, to, signal);
      if (leg) legs.push({ from: i, path: leg });
    }
    return signal?.aborted ? null : legs;
  }

  private async lookup(from: Coordinate, to: Coordinate, signal?: AbortSignal): Promise<WalkingPath | null> {
    if (signal?.aborted) return null;
    const result = await this.directions.walkingRoute(from, to);
    if (!result.ok) {
      console.warn(`[street-routes] leg skipped: ${result.reason}${result.message ? ` (${result.message})` : ''}`);
      return null;
    }
    return result.path;
  }
}
