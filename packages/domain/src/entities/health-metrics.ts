export type HealthQuantityType =
  | 'step_count'
  | 'distance_walking_running'
  | 'walking_speed';

export const HEALTH_QUANTITY_TYPES: readonly HealthQuantityType[] = [
  'step_count',
  'distance_walking_running',
  'walking_speed',
];

export type HealthAuthorizationStatus = 'granted' | 'denied' | 'undetermined';

/** A single reading pushed by the device (count, meters or m/s depending on type) */
export interface HealthSample {
  readonly type: HealthQuantityType;
  readonly value: number;
  readonly startTs: Date;
  readonly endTs: Date;
}

/** Today's activity; unset metrics mean the data was unavailable */
export interface DailyActivitySummary {
  readonly date: string; // YYYY-MM-DD, local time
  readonly from: Date;
  readonly to: Date;
  readonly authorized: boolean;
  readonly steps?: number;
  readonly distanceM?: number;
  readonly averageSpeedMps?: number;
}
