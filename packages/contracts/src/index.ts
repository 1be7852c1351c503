// Reverie Contracts
// Shared type-level contracts for the agent and its backend collaborators
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only DTOs, event schemas, request/response shapes
// - If something needs logic, it lives in a module, not here

export * from './questions/index.js';
export * from './events/index.js';
export * from './api/index.js';
export * from './realtime/index.js';
