import { EventEmitter } from 'node:events';
import type {
  HealthAuthorizationStatus,
  HealthChangeListener,
  HealthDataPort,
  HealthQuantityType,
  HealthSample,
} from '@walkloop/domain';
import { wallClockNow } from '../random/seeded-rng.js';

export interface InMemoryHealthStoreOptions {
  /** When false, authorization requests are answered with 'denied'. */
  autoGrant?: boolean;
  /** Clock used to expire samples from earlier days */
  now?: () => Date;
}

function startOfLocalDay(ts: Date): number {
  const d = new Date(ts.getTime());
  d.setHours(0, 0, 0, 0);
  return d.getTime();
}

/**
 * Process-local health store fed by samples the device uploads.
 * Stands in for the platform health service; nothing is persisted and
 * only samples ending today (local time) are kept.
 */
export class InMemoryHealthStore implements HealthDataPort {
  private samples: HealthSample[] = [];
  private readonly statuses = new Map<HealthQuantityType, HealthAuthorizationStatus>();
  private readonly changes = new EventEmitter();
  private readonly autoGrant: boolean;
  private readonly now: () => Date;

  constructor(opts: InMemoryHealthStoreOptions = {}) {
    this.autoGrant = opts.autoGrant ?? true;
    this.now = opts.now ?? wallClockNow;
  }

  async requestAuthorization(types: readonly HealthQuantityType[]): Promise<boolean> {
    const status: HealthAuthorizationStatus = this.autoGrant ? 'granted' : 'denied';
    for (const type of types) {
      this.statuses.set(type, status);
    }
    return true;
  }

  authorizationStatus(type: HealthQuantityType): HealthAuthorizationStatus {
    return this.statuses.get(type) ?? 'undetermined';
  }

  async queryCumulativeSum(type: HealthQuantityType, from: Date, to: Date): Promise<number | null> {
    const values = this.valuesInWindow(type, from, to);
    if (values === null) return null;
    return values.reduce((sum, v) => sum + v, 0);
  }

  async queryAverage(type: HealthQuantityType, from: Date, to: Date): Promise<number | null> {
    const values = this.valuesInWindow(type, from, to);
    if (values === null) return null;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
  }

  observe(type: HealthQuantityType, onChange: HealthChangeListener): () => void {
    this.changes.on(type, onChange);
    return () => {
      this.changes.off(type, onChange);
    };
  }

  /**
   * Store uploaded samples and drop any that ended before today.
   * Observers fire once per affected type. Returns how many were kept.
   */
  appendMany(samples: readonly HealthSample[]): number {
    const cutoff = startOfLocalDay(this.now());
    const fresh = samples.filter((s) => s.endTs.getTime() >= cutoff);
    this.samples = this.samples.filter((s) => s.endTs.getTime() >= cutoff);
    this.samples.push(...fresh);

    const touched = new Set(fresh.map((s) => s.type));
    for (const type of touched) {
      this.changes.emit(type, type);
    }
    return fresh.length;
  }

  get size(): number {
    return this.samples.length;
  }

  // Samples must lie wholly inside [from, to]; null when unreadable or empty
  private valuesInWindow(type: HealthQuantityType, from: Date, to: Date): number[] | null {
    if (this.authorizationStatus(type) !== 'granted') return null;
    const fromMs = from.getTime();
    const toMs = to.getTime();
    const values = this.samples
      .filter(
        (s) => s.type === type && s.startTs.getTime() >= fromMs && s.endTs.getTime() <= toMs,
      )
      .map((s) => s.value);
    return values.length > 0 ? values : null;
  }
}
