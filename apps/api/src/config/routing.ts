/**
 * Routing configuration
 * Street routing is enabled by OSRM_BASE_URL; ROUTE_STRATEGY picks the default
 * variant set: geometric | street | all
 */

import { InMemoryHealthStore, OsrmDirectionsAdapter, SeededRng, mathRandomSource } from '@walkloop/adapters';
import type { DirectionsPort, PlanningStrategy, RandomSource } from '@walkloop/domain';

export function getRouteStrategy(): PlanningStrategy | undefined {
  const raw = process.env['ROUTE_STRATEGY']?.toLowerCase();
  if (raw === 'geometric' || raw === 'street' || raw === 'all') return raw;
  if (raw) console.warn(`[config] unknown ROUTE_STRATEGY "${raw}", ignoring`);
  return undefined;
}

export function createDirectionsAdapter(): DirectionsPort | null {
  const baseUrl = process.env['OSRM_BASE_URL'];
  if (!baseUrl) return null;

  const timeoutMs = parseInt(process.env['DIRECTIONS_TIMEOUT_MS'] ?? '', 10);
  return new OsrmDirectionsAdapter({
    baseUrl,
    profile: process.env['OSRM_PROFILE'] || undefined,
    timeoutMs: Number.isFinite(timeoutMs) && timeoutMs > 0 ? timeoutMs : undefined,
  });
}

export function createMeanderRandomSource(): RandomSource {
  const seed = parseInt(process.env['MEANDER_SEED'] ?? '', 10);
  return Number.isNaN(seed) ? mathRandomSource : new SeededRng(seed);
}

export function createHealthStore(): InMemoryHealthStore {
  const autoGrant = (process.env['HEALTH_AUTO_GRANT'] ?? 'true').toLowerCase() !== 'false';
  return new InMemoryHealthStore({ autoGrant });
}
