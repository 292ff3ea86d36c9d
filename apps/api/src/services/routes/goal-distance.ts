import { STRIDE_LENGTH_M, WALKING_SPEED_MPS } from '@walkloop/domain';
import type { WalkGoal } from '@walkloop/domain';

/** Collapse any goal into the path length, in meters, a route should approximate. */
export function resolveTargetDistance(goal: WalkGoal): number {
  switch (goal.kind) {
    case 'steps':
      return goal.value * STRIDE_LENGTH_M;
    case 'distance':
      return goal.value * 1000;
    case 'time':
      return goal.value * 60 * WALKING_SPEED_MPS;
  }
}
