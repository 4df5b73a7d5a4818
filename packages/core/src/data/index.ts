// ============================================================================
// CARDLEAGUE - Seed Data
// ============================================================================
// Template data for teams and cards, used when creating a new league

export * from './teams';
export * from './cards';
