// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/coordinate.js';
export * from './entities/walk-goal.js';
export * from './entities/walk-route.js';
export * from './entities/health-metrics.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/route-planning.port.js';
export * from './ports/inbound/activity-query.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/directions.port.js';
export * from './ports/outbound/health-data.port.js';
export * from './ports/outbound/random-source.port.js';
export * from './ports/outbound/stream-publisher.port.js';
