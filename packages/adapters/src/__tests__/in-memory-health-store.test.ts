import { describe, it, expect, jest } from '@jest/globals';
import type { HealthSample } from '@walkloop/domain';
import { InMemoryHealthStore } from '../memory/in-memory-health-store.js';

const DAY_START = new Date(2026, 4, 12, 0, 0, 0);
const NOW = new Date(2026, 4, 12, 18, 0, 0);

function at(hour: number, minute = 0): Date {
  return new Date(2026, 4, 12, hour, minute, 0);
}

function sample(overrides: Partial<HealthSample> = {}): HealthSample {
  return { type: 'step_count', value: 100, startTs: at(9), endTs: at(9, 10), ...overrides };
}

describe('InMemoryHealthStore authorization', () => {
  it('starts undetermined for every type', () => {
    const store = new InMemoryHealthStore({ now: () => NOW });
    expect(store.authorizationStatus('step_count')).toBe('undetermined');
    expect(store.authorizationStatus('walking_speed')).toBe('undetermined');
  });

  it('grants only the requested types', async () => {
    const store = new InMemoryHealthStore({ now: () => NOW });
    await expect(store.requestAuthorization(['step_count'])).resolves.toBe(true);
    expect(store.authorizationStatus('step_count')).toBe('granted');
    expect(store.authorizationStatus('distance_walking_running')).toBe('undetermined');
  });

  it('records a denial when auto-grant is off', async () => {
    const store = new InMemoryHealthStore({ autoGrant: false, now: () => NOW });
    await store.requestAuthorization(['step_count']);
    expect(store.authorizationStatus('step_count')).toBe('denied');
  });
});

describe('InMemoryHealthStore queries', () => {
  it('returns null while the type is not granted', async () => {
    const store = new InMemoryHealthStore({ now: () => NOW });
    store.appendMany([sample()]);
    await expect(store.queryCumulativeSum('step_count', DAY_START, NOW)).resolves.toBeNull();
  });

  it('sums samples that fall inside the window', async () => {
    const store = new InMemoryHealthStore({ now: () => NOW });
    await store.requestAuthorization(['step_count']);
    store.appendMany([
      sample({ value: 1200 }),
      sample({ value: 800, startTs: at(12), endTs: at(12, 30) }),
      // ends after the window
      sample({ value: 500, startTs: at(17, 50), endTs: at(18, 20) }),
      // other type
      sample({ type: 'distance_walking_running', value: 950 }),
    ]);

    await expect(store.queryCumulativeSum('step_count', DAY_START, NOW)).resolves.toBe(2000);
  });

  it('averages samples and returns null for an empty window', async () => {
    const store = new InMemoryHealthStore({ now: () => NOW });
    await store.requestAuthorization(['walking_speed']);
    store.appendMany([
      sample({ type: 'walking_speed', value: 1.2 }),
      sample({ type: 'walking_speed', value: 1.6, startTs: at(10), endTs: at(10, 5) }),
    ]);

    await expect(store.queryAverage('walking_speed', DAY_START, NOW)).resolves.toBeCloseTo(1.4, 10);
    await expect(store.queryAverage('walking_speed', at(19), at(20))).resolves.toBeNull();
  });
});

describe('InMemoryHealthStore.observe', () => {
  it('notifies once per affected type and stops after unsubscribe', () => {
    const store = new InMemoryHealthStore({ now: () => NOW });
    const onSteps = jest.fn();
    const unsubscribe = store.observe('step_count', onSteps);

    store.appendMany([sample(), sample({ value: 30 }), sample({ type: 'walking_speed', value: 1.3 })]);
    expect(onSteps).toHaveBeenCalledTimes(1);
    expect(onSteps).toHaveBeenCalledWith('step_count');

    unsubscribe();
    store.appendMany([sample()]);
    expect(onSteps).toHaveBeenCalledTimes(1);
    expect(store.size).toBe(4);
  });
});

describe('InMemoryHealthStore retention', () => {
  it('drops uploads that ended before today', () => {
    const store = new InMemoryHealthStore({ now: () => NOW });
    const onSteps = jest.fn();
    store.observe('step_count', onSteps);

    const kept = store.appendMany([
      sample({ startTs: new Date(2026, 4, 11, 23, 0), endTs: new Date(2026, 4, 11, 23, 50) }),
      // straddles midnight, so it ends today
      sample({ startTs: new Date(2026, 4, 11, 23, 55), endTs: at(0, 5) }),
    ]);

    expect(kept).toBe(1);
    expect(store.size).toBe(1);
    expect(onSteps).toHaveBeenCalledTimes(1);
  });

  it('expires stored samples once the day rolls over', async () => {
    let now = NOW;
    const store = new InMemoryHealthStore({ now: () => now });
    await store.requestAuthorization(['step_count']);
    store.appendMany([sample({ value: 1200 }), sample({ value: 800, startTs: at(12), endTs: at(12, 30) })]);
    expect(store.size).toBe(2);

    now = new Date(2026, 4, 13, 8, 0);
    store.appendMany([sample({ value: 50, startTs: new Date(2026, 4, 13, 7, 0), endTs: new Date(2026, 4, 13, 7, 10) })]);

    expect(store.size).toBe(1);
    await expect(store.queryCumulativeSum('step_count', DAY_START, NOW)).resolves.toBeNull();
  });

  it('notifies nobody when every sample is stale', () => {
    const store = new InMemoryHealthStore({ now: () => NOW });
    const onSteps = jest.fn();
    store.observe('step_count', onSteps);

    expect(store.appendMany([sample({ startTs: new Date(2026, 4, 10, 9, 0), endTs: new Date(2026, 4, 10, 9, 10) })])).toBe(0);
    expect(onSteps).not.toHaveBeenCalled();
  });
});
