import type { Coordinate } from '../../entities/coordinate.js';
import type { WalkGoal } from '../../entities/walk-goal.js';
import type { WalkRoute } from '../../entities/walk-route.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Which family of route variants to generate */
export type PlanningStrategy = 'geometric' | 'street' | 'all';

export interface GenerateRoutesOptions {
  strategy?: PlanningStrategy;
  /** Checked between directions lookups; an aborted batch stops issuing calls */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Inbound port
// ---------------------------------------------------------------------------

export interface RoutePlanningPort {
  /**
   * Candidate routes in fixed variant order. Variants that could not be
   * built are omitted; an empty list is a valid answer.
   */
  generateRoutes(
    start: Coordinate,
    goal: WalkGoal,
    opts?: GenerateRoutesOptions,
  ): Promise<WalkRoute[]>;
}
