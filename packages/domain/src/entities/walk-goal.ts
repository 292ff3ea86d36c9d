// Walk goal kinds and the constants used to collapse them into meters

export type WalkGoalKind = 'steps' | 'distance' | 'time';

export interface WalkGoal {
  readonly kind: WalkGoalKind;
  /** steps, kilometers or minutes depending on `kind`; always > 0 */
  readonly value: number;
}

/** Empirical stride length used to turn a step goal into meters */
export const STRIDE_LENGTH_M = 0.8;

/** Average walking pace used for time goals and geometric duration estimates */
export const WALKING_SPEED_MPS = 1.4;
