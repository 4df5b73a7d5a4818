// ============================================================================
// CARDLEAGUE - Card Catalog
// ============================================================================
// Card creation, rating, synergy tables and catalog lifecycle

import type {
  Archetype,
  AttackType,
  Card,
  CardGrade,
  League,
  RetirementEntry,
} from '../types';
import { ARCHETYPES, ATTACK_TYPES, createEmptyStatLine } from '../types';
import type { LeagueConfig } from '../config';
import type { SeededRNG } from '../rng';
import { NotFoundError } from '../errors';
import { CARD_BASE_NAMES } from '../data';

// ============================================================================
// CONSTANTS
// ============================================================================

export const GENESIS_STAT_RANGE = { min: 50, max: 95 } as const;
export const ROOKIE_STAT_RANGE = { min: 55, max: 92 } as const;
export const LIFESPAN_RANGE = { min: 3, max: 8 } as const;
export const GENESIS_MAX_AGE = 4;

/** Rating weights for attack, defense and speed */
const RATING_WEIGHTS = { attack: 0.4, defense: 0.3, speed: 0.3 } as const;

/** Retirement score penalty per season of age */
const RETIREMENT_AGE_WEIGHT = 5;

// ============================================================================
// SYNERGY TABLES
// ============================================================================

function matrixKey(a: string, b: string): string {
  return a < b ? `${a}+${b}` : `${b}+${a}`;
}

function buildMatrix(entries: [string, string, number][]): Map<string, number> {
  const matrix = new Map<string, number>();
  for (const [a, b, value] of entries) {
    matrix.set(matrixKey(a, b), value);
  }
  return matrix;
}

// Symmetric: every unordered pair appears exactly once
const ARCHETYPE_SYNERGY = buildMatrix([
  ['Tank', 'Tank', -3],
  ['Tank', 'DPS', 2],
  ['Tank', 'Control', -2],
  ['Tank', 'Support', 5],
  ['Tank', 'Hybrid', 1],
  ['DPS', 'DPS', -2],
  ['DPS', 'Control', 2],
  ['DPS', 'Support', 1],
  ['DPS', 'Hybrid', 1],
  ['Control', 'Control', -1],
  ['Control', 'Support', 3],
  ['Control', 'Hybrid', 1],
  ['Support', 'Support', 0],
  ['Support', 'Hybrid', 2],
  ['Hybrid', 'Hybrid', 0],
]);

const ATTACK_TYPE_SYNERGY = buildMatrix([
  ['Melee', 'Melee', -1],
  ['Melee', 'Ranged', 2],
  ['Melee', 'Splash', 1],
  ['Melee', 'Magic', 1],
  ['Ranged', 'Ranged', -1],
  ['Ranged', 'Splash', 1],
  ['Ranged', 'Magic', 2],
  ['Splash', 'Splash', -2],
  ['Splash', 'Magic', 3],
  ['Magic', 'Magic', 0],
]);

export function archetypeSynergy(a: Archetype, b: Archetype): number {
  return ARCHETYPE_SYNERGY.get(matrixKey(a, b)) ?? 0;
}

export function attackTypeSynergy(a: AttackType, b: AttackType): number {
  return ATTACK_TYPE_SYNERGY.get(matrixKey(a, b)) ?? 0;
}

/** Combined pair bonus of two cards sharing a lineup */
export function synergyBonus(a: Card, b: Card): number {
  return (
    archetypeSynergy(a.archetype, b.archetype) +
    attackTypeSynergy(a.attackType, b.attackType)
  );
}

// ============================================================================
// DERIVED VALUES
// ============================================================================

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Salary values are kept at two decimals */
export function roundCost(value: number): number {
  return Math.round(value * 100) / 100;
}

export function rateCard(stats: {
  attack: number;
  defense: number;
  speed: number;
}): number {
  return Math.round(
    stats.attack * RATING_WEIGHTS.attack +
      stats.defense * RATING_WEIGHTS.defense +
      stats.speed * RATING_WEIGHTS.speed,
  );
}

export function gradeFor(rating: number): CardGrade {
  if (rating >= 90) return 'S';
  if (rating >= 80) return 'A';
  if (rating >= 70) return 'B';
  if (rating >= 60) return 'C';
  return 'D';
}

export function costFor(rating: number): number {
  return roundCost(Math.max(0.5, (rating - 50) / 12));
}

// ============================================================================
// CREATION
// ============================================================================

export interface CardBlueprint {
  name: string;
  archetype: Archetype;
  attackType: AttackType;
  attack: number;
  defense: number;
  speed: number;
  age: number;
  lifespan: number;
}

export function createCard(blueprint: CardBlueprint): Card {
  const rating = rateCard(blueprint);
  const cost = costFor(rating);
  return {
    ...blueprint,
    baseRating: rating,
    rating,
    grade: gradeFor(rating),
    cost,
    baseCost: cost,
    fatigue: 100,
    season: createEmptyStatLine(),
    career: createEmptyStatLine(),
    awards: [],
    hofProbability: 0,
    retiredSeason: null,
  };
}

function rollCard(
  rng: SeededRNG,
  name: string,
  statRange: { min: number; max: number },
  age: number,
): Card {
  return createCard({
    name,
    archetype: rng.pick(ARCHETYPES),
    attackType: rng.pick(ATTACK_TYPES),
    attack: rng.int(statRange.min, statRange.max),
    defense: rng.int(statRange.min, statRange.max),
    speed: rng.int(statRange.min, statRange.max),
    age,
    lifespan: rng.int(
      Math.max(LIFESPAN_RANGE.min, age + 1),
      Math.max(LIFESPAN_RANGE.max, age + 1),
    ),
  });
}

function numberedName(rng: SeededRNG, cardNumber: number): string {
  return `${rng.pick(CARD_BASE_NAMES)} #${cardNumber}`;
}

/**
 * Genesis card pool: size drawn from the configured bounds, names numbered
 * from 1 so they never collide
 */
export function generateCardPool(
  rng: SeededRNG,
  config: LeagueConfig,
): { cards: Record<string, Card>; nextCardNumber: number } {
  const size = rng.int(config.minCardPool, config.maxCardPool);
  const cards: Record<string, Card> = {};

  for (let i = 1; i <= size; i++) {
    const card = rollCard(
      rng,
      numberedName(rng, i),
      GENESIS_STAT_RANGE,
      rng.int(0, GENESIS_MAX_AGE),
    );
    cards[card.name] = card;
  }

  return { cards, nextCardNumber: size + 1 };
}

/** Add `count` age-0 cards to the catalog */
export function generateRookies(
  league: League,
  rng: SeededRNG,
  count = 4,
): Card[] {
  const rookies: Card[] = [];
  for (let i = 0; i < count; i++) {
    const card = rollCard(
      rng,
      numberedName(rng, league.nextCardNumber),
      ROOKIE_STAT_RANGE,
      0,
    );
    league.nextCardNumber += 1;
    league.cards[card.name] = card;
    rookies.push(card);
  }
  return rookies;
}

// ============================================================================
// CATALOG OPERATIONS
// ============================================================================

export function getCard(league: League, name: string): Card {
  const card = league.cards[name];
  if (!card) {
    throw new NotFoundError(`Card "${name}" not found`);
  }
  return card;
}

export function listCards(league: League): Card[] {
  return Object.values(league.cards);
}

export interface CardPatchResult {
  card: Card;
  before: number;
  after: number;
  delta: number;
}

/**
 * Move a card's rating by delta, clamped to [0, 100]. The reported delta is
 * the applied one, which differs from the request at the bounds.
 */
export function applyCardPatch(
  league: League,
  name: string,
  delta: number,
): CardPatchResult {
  const card = getCard(league, name);
  const before = card.rating;
  const after = clamp(before + delta, 0, 100);
  card.rating = after;
  card.grade = gradeFor(after);
  return { card, before, after, delta: after - before };
}

export function isLifespanExpired(card: Card): boolean {
  return card.age >= card.lifespan;
}

/** Lower means retires sooner */
export function retirementScore(card: Card): number {
  return card.rating - RETIREMENT_AGE_WEIGHT * card.age;
}

/**
 * Retirement order: expired lifespans first, then lowest retirement score,
 * then name
 */
export function compareRetirementOrder(a: Card, b: Card): number {
  const expiredA = isLifespanExpired(a);
  const expiredB = isLifespanExpired(b);
  if (expiredA !== expiredB) return expiredA ? -1 : 1;
  const scoreDiff = retirementScore(a) - retirementScore(b);
  if (scoreDiff !== 0) return scoreDiff;
  return a.name.localeCompare(b.name);
}

/**
 * Move exactly `count` cards (or every card, if fewer) from the catalog to
 * the retired list. Roster references are left to the caller.
 */
export function retireCards(
  league: League,
  count = 3,
): { card: Card; reason: RetirementEntry['reason'] }[] {
  const chosen = listCards(league)
    .sort(compareRetirementOrder)
    .slice(0, count);

  return chosen.map((card) => {
    const reason: RetirementEntry['reason'] = isLifespanExpired(card)
      ? 'lifespan'
      : 'decline';
    delete league.cards[card.name];
    card.retiredSeason = league.season;
    league.retiredCards[card.name] = card;
    return { card, reason };
  });
}

/** Restore fatigue on every active card, capped at fresh */
export function recoverAllCards(league: League, amount: number): void {
  for (const card of listCards(league)) {
    card.fatigue = clamp(card.fatigue + amount, 0, 100);
  }
}

/** Effective power multiplier for a fatigue level */
export function fatigueFactor(fatigue: number, config: LeagueConfig): number {
  const floor = config.fatigueFloor;
  return floor + (1 - floor) * (clamp(fatigue, 0, 100) / 100);
}
