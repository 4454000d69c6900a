/**
 * @tideway/core - Demand-driven streams over push-based query engines
 *
 * Turns an engine that pushes rows and live-query change events through
 * listener callbacks into streams a consumer pulls from with `request(n)`,
 * with bounded buffering, overflow strategies and cancellation at any time.
 *
 * @packageDocumentation
 * @module @tideway/core
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Configuration & validation
export * from './validation/index.js';

// Observability
export * from './observability/index.js';

// Flow control
export * from './flow/index.js';

// Query submission
export * from './query/index.js';

// Interop
export * from './interop/index.js';
