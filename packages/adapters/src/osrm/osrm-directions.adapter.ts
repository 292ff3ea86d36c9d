import { fetch } from 'undici';
import type { Dispatcher } from 'undici';
import { z } from 'zod';
import type { Coordinate, DirectionsPort, DirectionsResult } from '@walkloop/domain';

export const OSRM_DEFAULTS = {
  baseUrl: 'http://localhost:5000',
  profile: 'foot',
  timeoutMs: 8000,
} as const;

// OSRM returns GeoJSON positions as [lng, lat]
const positionSchema = z.tuple([z.number(), z.number()]).rest(z.number());

const routeResponseSchema = z.object({
  code: z.string(),
  message: z.string().optional(),
  routes: z
    .array(
      z.object({
        distance: z.number().min(0),
        duration: z.number().min(0),
        geometry: z.object({
          type: z.literal('LineString'),
          coordinates: z.array(positionSchema),
        }),
      }),
    )
    .optional()
    .default([]),
});

export interface OsrmDirectionsOptions {
  baseUrl?: string;
  profile?: string;
  /** Upper bound for a single lookup; a slow edge degrades one route only */
  timeoutMs?: number;
  /** undici dispatcher override (connection pooling, tests) */
  dispatcher?: Dispatcher;
}

export class OsrmDirectionsAdapter implements DirectionsPort {
  private readonly baseUrl: string;
  readonly profile: string;
  readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;

  constructor(opts: OsrmDirectionsOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? OSRM_DEFAULTS.baseUrl).replace(/\/+$/, '');
    this.profile = opts.profile ?? OSRM_DEFAULTS.profile;
    this.timeoutMs = opts.timeoutMs ?? OSRM_DEFAULTS.timeoutMs;
    this.dispatcher = opts.dispatcher;
  }

  buildUrl(from: Coordinate, to: Coordinate): string {
    const coords = `${from.lng},${from.lat};${to.lng},${to.lat}`;
    return `${this.baseUrl}/route/v1/${this.profile}/${coords}?overview=full&geometries=geojson`;
  }

  async walkingRoute(from: Coordinate, to: Coordinate): Promise<DirectionsResult> {
    let body: unknown;
    try {
      const res = await fetch(this.buildUrl(from, to), {
        signal: AbortSignal.timeout(this.timeoutMs),
        dispatcher: this.dispatcher,
      });
      body = await res.json();
      if (!res.ok && !isOsrmBody(body)) {
        console.warn(`[osrm] HTTP ${res.status} for walking route`);
        return { ok: false, reason: 'unavailable', message: `HTTP ${res.status}` };
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (isTimeout(err)) {
        console.warn(`[osrm] walking route timed out after ${this.timeoutMs}ms`);
        return { ok: false, reason: 'timeout', message };
      }
      console.warn('[osrm] walking route request failed', message);
      return { ok: false, reason: 'unavailable', message };
    }

    const parsed = routeResponseSchema.safeParse(body);
    if (!parsed.success) {
      console.warn('[osrm] unexpected response shape', parsed.error.issues[0]?.message);
      return { ok: false, reason: 'unavailable', message: 'malformed response' };
    }

    const route = parsed.data.routes[0];
    if (parsed.data.code !== 'Ok' || !route) {
      return { ok: false, reason: 'no_route', message: parsed.data.message ?? parsed.data.code };
    }

    return {
      ok: true,
      path: {
        points: route.geometry.coordinates.map(([lng, lat]) => ({ lat, lng })),
        distanceM: route.distance,
        travelTimeSec: route.duration,
      },
    };
  }
}

// AbortSignal.timeout rejects with a DOMException named TimeoutError
function isTimeout(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError';
}

function isOsrmBody(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'code' in body;
}
