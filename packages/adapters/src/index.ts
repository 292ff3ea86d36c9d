// ─── Directions Adapters ──────────────────────────────────────────────────────
export { OsrmDirectionsAdapter, OSRM_DEFAULTS } from './osrm/osrm-directions.adapter.js';
export type { OsrmDirectionsOptions } from './osrm/osrm-directions.adapter.js';

// ─── Health Data ──────────────────────────────────────────────────────────────
export { InMemoryHealthStore } from './memory/in-memory-health-store.js';
export type { InMemoryHealthStoreOptions } from './memory/in-memory-health-store.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export { SeededRng, mathRandomSource, wallClockNow } from './random/seeded-rng.js';
