import type { Coordinate, WalkGoal, WalkRoute } from '@walkloop/domain';
import { resolveTargetDistance } from './goal-distance.js';
import type { RouteVariant } from './route-variant.js';

export interface RouteGeneratorRunOptions {
  signal?: AbortSignal;
}

/**
 * Fans out to every configured variant and collects results by position,
 * so output order is the declaration order whatever finishes first.
 * Never rejects: failed or empty variants are dropped.
 */
export class RouteGenerator {
  constructor(private readonly variants: readonly RouteVariant[]) {}

  async generateRoutes(
    start: Coordinate,
    goal: WalkGoal,
    opts: RouteGeneratorRunOptions = {},
  ): Promise<WalkRoute[]> {
    const targetDistanceM = resolveTargetDistance(goal);
    const ctx = { start, targetDistanceM, signal: opts.signal };

    const settled = await Promise.allSettled(
      this.variants.map((variant) => Promise.resolve().then(() => variant.build(ctx))),
    );

    const routes: WalkRoute[] = [];
    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        if (outcome.value) routes.push(outcome.value);
        return;
      }
      console.warn(
        `[route-generator] variant "${this.variants[index]?.name}" failed`,
        outcome.reason instanceof Error ? outcome.reason.message : outcome.reason,
      );
    });

    if (routes.length === 0) {
      console.warn(`[route-generator] no routes for target ${targetDistanceM.toFixed(0)}m`);
    }
    return routes;
  }
}
