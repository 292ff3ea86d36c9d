import { HEALTH_QUANTITY_TYPES } from '@walkloop/domain';
import type {
  ActivityAccessResult,
  ActivityQueryPort,
  DailyActivitySummary,
  HealthDataPort,
  StreamPublisherPort,
} from '@walkloop/domain';
import { wallClockNow } from '@walkloop/adapters';

function startOfLocalDay(ts: Date): Date {
  const d = new Date(ts.getTime());
  d.setHours(0, 0, 0, 0);
  return d;
}

function localDateKey(ts: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${ts.getFullYear()}-${pad(ts.getMonth() + 1)}-${pad(ts.getDate())}`;
}

/**
 * Today's steps, distance and walking speed read from the health store.
 * Missing permission or missing data leaves the metric unset.
 */
export class ActivitySummaryService implements ActivityQueryPort {
  constructor(
    private readonly health: HealthDataPort,
    private readonly now: () => Date = wallClockNow,
  ) {}

  async requestAccess(): Promise<ActivityAccessResult> {
    const ok = await this.health.requestAuthorization(HEALTH_QUANTITY_TYPES);
    if (!ok) console.warn('[activity] health authorization request failed');
    return this.getAuthorization();
  }

  getAuthorization(): ActivityAccessResult {
    const statuses = {
      step_count: this.health.authorizationStatus('step_count'),
      distance_walking_running: this.health.authorizationStatus('distance_walking_running'),
      walking_speed: this.health.authorizationStatus('walking_speed'),
    };
    const authorized = Object.values(statuses).every((s) => s === 'granted');
    return { authorized, statuses };
  }

  async getDailySummary(): Promise<DailyActivitySummary> {
    const to = this.now();
    const from = startOfLocalDay(to);
    const base = { date: localDateKey(from), from, to };

    if (!this.getAuthorization().authorized) {
      return { ...base, authorized: false };
    }

    const [steps, distanceM, averageSpeedMps] = await Promise.all([
      this.health.queryCumulativeSum('step_count', from, to),
      this.health.queryCumulativeSum('distance_walking_running', from, to),
      this.health.queryAverage('walking_speed', from, to),
    ]);

    return {
      ...base,
      authorized: true,
      steps: steps === null ? undefined : Math.floor(steps),
      distanceM: distanceM ?? undefined,
      averageSpeedMps: averageSpeedMps ?? undefined,
    };
  }

  /** Push a fresh summary whenever step data changes. Returns a stop function. */
  startLiveUpdates(publisher: StreamPublisherPort): () => void {
    return this.health.observe('step_count', () => {
      this.getDailySummary()
        .then((summary) => publisher.publishActivitySummary(summary))
        .catch((err) => console.error('[activity] live summary update failed', err));
    });
  }
}
