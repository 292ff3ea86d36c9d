import type {
  DailyActivitySummary,
  HealthAuthorizationStatus,
  HealthQuantityType,
} from '../../entities/health-metrics.js';

export type HealthAuthorizationMap = Record<HealthQuantityType, HealthAuthorizationStatus>;

export interface ActivityAccessResult {
  authorized: boolean;
  statuses: HealthAuthorizationMap;
}

export interface ActivityQueryPort {
  requestAccess(): Promise<ActivityAccessResult>;
  getAuthorization(): ActivityAccessResult;
  getDailySummary(): Promise<DailyActivitySummary>;
}
