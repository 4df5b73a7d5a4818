// ============================================================================
// CARDLEAGUE - Card Seed Data
// ============================================================================
// Name pool, shop catalogue and patch nicknames

import type { ShopItem } from '../types';

/** Base names; the league appends a running number to keep names unique */
export const CARD_BASE_NAMES: string[] = [
  'Miner',
  'Ice Wizard',
  'Mega Knight',
  'Giant Skeleton',
  'Electro Spirit',
  'Goblin Gang',
  'Royal Ghost',
  'Dart Goblin',
  'Battle Healer',
  'Cannon Cart',
  'Magic Archer',
  'Inferno Dragon',
  'Electro Wizard',
  'Bandit',
  'Lumberjack',
  'Skeleton King',
  'Archer Queen',
  'Golden Knight',
  'Monk',
  'Phoenix',
  'Goblin Drill',
  'Ram Rider',
];

export const SHOP_ITEMS: ShopItem[] = [
  {
    key: 'rating-boost-3',
    label: '+3 Rating (2 games)',
    kind: 'rating',
    amount: 3,
    games: 2,
    capCost: 1.5,
  },
  {
    key: 'rating-boost-5',
    label: '+5 Rating (1 game)',
    kind: 'rating',
    amount: 5,
    games: 1,
    capCost: 2,
  },
  {
    key: 'team-boost-2',
    label: '+2 Team Rating (2 games)',
    kind: 'team-rating',
    amount: 2,
    games: 2,
    capCost: 3,
  },
  {
    key: 'stamina-reset',
    label: 'Stamina Reset',
    kind: 'fatigue-reset',
    amount: 100,
    games: 1,
    capCost: 0.75,
  },
];

export const PATCH_NICKNAMES: string[] = [
  'Tank Nerf Patch',
  'Speed Era Begins',
  'Synergy Shuffle',
  'Meta Mixer',
  'Balance Tuning',
];
