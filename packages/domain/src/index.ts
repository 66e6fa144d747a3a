// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/model-route.js';
export * from './entities/canonical-request.js';
export * from './entities/canonical-response.js';
export * from './entities/stream-event.js';
export * from './entities/embedding-batch.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors/gateway-error.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/dispatch.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/model-registry.port.js';
export * from './ports/outbound/upstream-provider.port.js';
export * from './ports/outbound/credential-verifier.port.js';
export * from './ports/outbound/gateway-hooks.port.js';
