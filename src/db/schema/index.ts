// ============================================
// MELIAPP - Schema Barrel Export
// ============================================

export * from './users.js';
export * from './lots.js';
