import type {
  Coordinate,
  DirectionsPort,
  GenerateRoutesOptions,
  PlanningStrategy,
  RandomSource,
  RoutePlanningPort,
  WalkGoal,
  WalkRoute,
} from '@walkloop/domain';
import { GeometricRouteBuilder } from './geometric-route-builder.js';
import { RouteGenerator } from './route-generator.js';
import { StreetRouteBuilder } from './street-route-builder.js';

export class StrategyUnavailableError extends Error {
  readonly status = 400;

  constructor(strategy: PlanningStrategy) {
    super(`${strategy} routing is not configured`);
    this.name = 'StrategyUnavailableError';
  }
}

export interface RoutePlanningDeps {
  /** null disables the street-snapped variants */
  directions: DirectionsPort | null;
  rng?: RandomSource;
  defaultStrategy?: PlanningStrategy;
}

/**
 * Chooses the variant set for a request and delegates to a RouteGenerator.
 * `all` lists street variants first, then the geometric fallbacks.
 */
export class RoutePlanningService implements RoutePlanningPort {
  private readonly generators = new Map<PlanningStrategy, RouteGenerator>();
  readonly defaultStrategy: PlanningStrategy;

  constructor(deps: RoutePlanningDeps) {
    const geometric = new GeometricRouteBuilder(deps.rng).variants();
    this.generators.set('geometric', new RouteGenerator(geometric));

    if (deps.directions) {
      const street = new StreetRouteBuilder(deps.directions).variants();
      this.generators.set('street', new RouteGenerator(street));
      this.generators.set('all', new RouteGenerator([...street, ...geometric]));
    }

    const requested = deps.defaultStrategy ?? (deps.directions ? 'street' : 'geometric');
    if (this.generators.has(requested)) {
      this.defaultStrategy = requested;
    } else {
      console.warn(`[route-planning] ${requested} routing unavailable, defaulting to geometric`);
      this.defaultStrategy = 'geometric';
    }
  }

  supports(strategy: PlanningStrategy): boolean {
    return this.generators.has(strategy);
  }

  resolveStrategy(strategy?: PlanningStrategy): PlanningStrategy {
    return strategy ?? this.defaultStrategy;
  }

  async generateRoutes(
    start: Coordinate,
    goal: WalkGoal,
    opts: GenerateRoutesOptions = {},
  ): Promise<WalkRoute[]> {
    const strategy = this.resolveStrategy(opts.strategy);
    const generator = this.generators.get(strategy);
    if (!generator) throw new StrategyUnavailableError(strategy);
    return generator.generateRoutes(start, goal, { signal: opts.signal });
  }
}
