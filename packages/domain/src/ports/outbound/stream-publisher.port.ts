import type { DailyActivitySummary } from '../../entities/health-metrics.js';

export interface StreamPublisherPort {
  publishActivitySummary(summary: DailyActivitySummary): Promise<void>;
}
