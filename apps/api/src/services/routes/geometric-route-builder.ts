import { GEOMETRIC_STEPS_PER_METER, WALKING_SPEED_MPS } from '@walkloop/domain';
import type { Coordinate, RandomSource, RoutePoint, WalkRoute } from '@walkloop/domain';
import { mathRandomSource } from '@walkloop/adapters';
import { midpoint, offsetCoordinate, polarOffset } from './geo.js';
import { assembleRoute, routePoint } from './route-variant.js';
import type { RouteProfile, RouteVariant } from './route-variant.js';

const CIRCLE_SAMPLES = 20;
const FIGURE_EIGHT_SAMPLES = 16;
const MEANDER_SEGMENTS = 12;

const CIRCLE_PROFILE: RouteProfile = {
  name: 'Perfect Circle',
  shape: 'circle',
  strategy: 'geometric',
  difficulty: 'easy',
  terrain: 'urban',
};

const SQUARE_PROFILE: RouteProfile = {
  name: 'City Block Loop',
  shape: 'square',
  strategy: 'geometric',
  difficulty: 'easy',
  terrain: 'urban',
};

const FIGURE_EIGHT_PROFILE: RouteProfile = {
  name: 'Figure Eight',
  shape: 'figure_eight',
  strategy: 'geometric',
  difficulty: 'moderate',
  terrain: 'mixed',
};

const MEANDER_PROFILE: RouteProfile = {
  name: 'Scenic Meander',
  shape: 'meander',
  strategy: 'geometric',
  difficulty: 'moderate',
  terrain: 'park',
};

const CIRCLE_CUES = new Map<number, string>([
  [0, 'Start walking clockwise'],
  [Math.floor(CIRCLE_SAMPLES / 4), 'Continue straight'],
  [Math.floor(CIRCLE_SAMPLES / 2), "You're halfway!"],
  [Math.floor((3 * CIRCLE_SAMPLES) / 4), 'Almost back to start'],
]);

const SQUARE_CORNER_CUES = ['Head north', 'Turn right', 'Turn right again', 'Final turn'];

const FIGURE_EIGHT_CUES = new Map<number, string>([
  [0, 'Start first loop'],
  [Math.floor(FIGURE_EIGHT_SAMPLES / 2), 'Cross to second loop'],
]);

const MEANDER_CUES = new Map<number, string>([
  [Math.floor(MEANDER_SEGMENTS / 3), 'Enjoy the scenery'],
  [Math.floor((2 * MEANDER_SEGMENTS) / 3), 'Heading back'],
]);

function uniform(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

// Repeat the first coordinate so the loop closes; the cue is not repeated
function closingPoint(points: RoutePoint[]): RoutePoint {
  const first = points[0];
  if (!first) throw new Error('cannot close an empty loop');
  return routePoint(first.coordinate);
}

function geometricRoute(profile: RouteProfile, points: RoutePoint[], distanceM: number): WalkRoute {
  return assembleRoute(profile, points, {
    distanceM,
    durationSec: distanceM / WALKING_SPEED_MPS,
    stepsPerMeter: GEOMETRIC_STEPS_PER_METER,
  });
}

/**
 * Idealized closed loops computed from a center and a target length alone.
 * Makes no external calls; only the meander consumes randomness.
 */
export class GeometricRouteBuilder {
  constructor(private readonly rng: RandomSource = mathRandomSource) {}

  /** Circle, square, figure-eight and meander, in that order. */
  build(center: Coordinate, targetDistanceM: number): WalkRoute[] {
    return [
      this.circle(center, targetDistanceM),
      this.square(center, targetDistanceM),
      this.figureEight(center, targetDistanceM),
      this.meander(center, targetDistanceM),
    ];
  }

  variants(): RouteVariant[] {
    const variant = (
      profile: RouteProfile,
      make: (center: Coordinate, targetDistanceM: number) => WalkRoute,
    ): RouteVariant => ({
      name: profile.name,
      shape: profile.shape,
      build: async ({ start, targetDistanceM }) => make(start, targetDistanceM),
    });

    return [
      variant(CIRCLE_PROFILE, (c, d) => this.circle(c, d)),
      variant(SQUARE_PROFILE, (c, d) => this.square(c, d)),
      variant(FIGURE_EIGHT_PROFILE, (c, d) => this.figureEight(c, d)),
      variant(MEANDER_PROFILE, (c, d) => this.meander(c, d)),
    ];
  }

  circle(center: Coordinate, targetDistanceM: number): WalkRoute {
    const radius = targetDistanceM / (2 * Math.PI);
    const points: RoutePoint[] = [];

    for (let i = 0; i < CIRCLE_SAMPLES; i++) {
      const angle = (i * 2 * Math.PI) / CIRCLE_SAMPLES;
      points.push(routePoint(polarOffset(center, radius, angle), CIRCLE_CUES.get(i)));
    }
    points.push(closingPoint(points));

    return geometricRoute(CIRCLE_PROFILE, points, 2 * Math.PI * radius);
  }

  square(center: Coordinate, targetDistanceM: number): WalkRoute {
    const side = targetDistanceM / 4;
    const half = side / 2;

    // NW, NE, SE, SW
    const corners: Coordinate[] = [
      offsetCoordinate(center, half, -half),
      offsetCoordinate(center, half, half),
      offsetCoordinate(center, -half, half),
      offsetCoordinate(center, -half, -half),
    ];

    const points: RoutePoint[] = [];
    corners.forEach((corner, index) => {
      points.push(routePoint(corner, SQUARE_CORNER_CUES[index]));
      const next = corners[index + 1];
      if (next) points.push(routePoint(midpoint(corner, next)));
    });
    points.push(closingPoint(points));

    return geometricRoute(SQUARE_PROFILE, points, 4 * side);
  }

  figureEight(center: Coordinate, targetDistanceM: number): WalkRoute {
    const radius = targetDistanceM / (4 * Math.PI);
    const westCenter = offsetCoordinate(center, 0, -radius);
    const eastCenter = offsetCoordinate(center, 0, radius);
    const points: RoutePoint[] = [];

    for (let i = 0; i < FIGURE_EIGHT_SAMPLES; i++) {
      const angle = (i * 2 * Math.PI) / FIGURE_EIGHT_SAMPLES;
      const loopCenter = i < FIGURE_EIGHT_SAMPLES / 2 ? westCenter : eastCenter;
      points.push(routePoint(polarOffset(loopCenter, radius, angle), FIGURE_EIGHT_CUES.get(i)));
    }
    points.push(closingPoint(points));

    return geometricRoute(FIGURE_EIGHT_PROFILE, points, 4 * Math.PI * radius);
  }

  /**
   * Random walk with a drifting heading. The final point jumps back to the
   * center, so closure is not geometric, and the reported distance is the
   * target rather than the sampled path length.
   */
  meander(center: Coordinate, targetDistanceM: number): WalkRoute {
    const baseRadius = targetDistanceM / (MEANDER_SEGMENTS * Math.PI);
    const points: RoutePoint[] = [routePoint(center, 'Begin scenic walk')];

    let current = center;
    let heading = 0;
    for (let i = 1; i < MEANDER_SEGMENTS; i++) {
      heading += Math.PI / 3 + uniform(this.rng, -Math.PI / 6, Math.PI / 6);
      const segmentLength = baseRadius * (0.8 + uniform(this.rng, 0, 0.4));
      current = polarOffset(current, segmentLength, heading);
      points.push(routePoint(current, MEANDER_CUES.get(i)));
    }
    points.push(routePoint(center, "You're back!"));

    return geometricRoute(MEANDER_PROFILE, points, targetDistanceM);
  }
}
