// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/telemetry-frame.js';
export * from './entities/uav-track-state.js';
export * from './entities/tracking-update.js';
export * from './entities/bridge-config.js';
export * from './entities/publisher-status.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/telemetry-source.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/tracking-publisher.port.js';
export * from './ports/outbound/flight-state-policy.port.js';
export * from './ports/outbound/track-eviction-policy.port.js';
export * from './ports/outbound/logger.port.js';
