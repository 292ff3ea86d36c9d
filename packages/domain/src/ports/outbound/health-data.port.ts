import type {
  HealthAuthorizationStatus,
  HealthQuantityType,
} from '../../entities/health-metrics.js';

export type HealthChangeListener = (type: HealthQuantityType) => void;

/** Read-only access to the device health store */
export interface HealthDataPort {
  /** Resolves true when the request itself succeeded (not necessarily granted). */
  requestAuthorization(types: readonly HealthQuantityType[]): Promise<boolean>;
  authorizationStatus(type: HealthQuantityType): HealthAuthorizationStatus;
  queryCumulativeSum(type: HealthQuantityType, from: Date, to: Date): Promise<number | null>;
  queryAverage(type: HealthQuantityType, from: Date, to: Date): Promise<number | null>;
  /** Returns an unsubscribe function. */
  observe(type: HealthQuantityType, onChange: HealthChangeListener): () => void;
}
