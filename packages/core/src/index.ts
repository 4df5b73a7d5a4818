// ============================================================================
// CARDLEAGUE - Core League Engine
// ============================================================================
// Main entry point for the @cardleague/core package

// Re-export all types
export * from './types';

// Errors and configuration
export * from './errors';
export * from './config';
export * from './rng';

// Re-export card catalog
export * from './card';

// Re-export team system
export * from './team';

// Re-export game simulator
export * from './match';

// Re-export season system
export * from './season';
export * from './season/awards';
export * from './season/season-end';

// Re-export playoffs
export * from './playoffs';

// Re-export economy
export * from './shop';
export * from './transfer';

// Re-export history and integrity checks
export * from './history';
export * from './state';

// Re-export the engine facade
export * from './engine';

// Re-export seed data
export * from './data';
