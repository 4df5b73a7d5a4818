// ============================================================================
// CARDLEAGUE - Team System
// ============================================================================
// Rosters, salary cap bookkeeping, chemistry and fatigue substitution

import type { Card, League, Substitution, Team } from '../types';
import { createEmptyRecord } from '../types';
import type { LeagueConfig } from '../config';
import type { SeededRNG } from '../rng';
import {
  CapExceededError,
  InvalidConfigError,
  NotFoundError,
} from '../errors';
import { clamp, getCard, listCards, roundCost, synergyBonus } from '../card';
import { TEAMS } from '../data';
import { logTransaction } from '../history';

export const STARTER_COUNT = 3;
export const ROSTER_SIZE = STARTER_COUNT + 1;
export const BASE_CHEMISTRY = 50;

// ============================================================================
// LOOKUPS
// ============================================================================

export function getTeam(league: League, teamId: string): Team {
  const team = league.teams.find((t) => t.id === teamId);
  if (!team) {
    throw new NotFoundError(`Team "${teamId}" not found`);
  }
  return team;
}

/** Starters first, backup last */
export function rosterOf(team: Team): string[] {
  return [...team.starters, team.backup];
}

export function findCardOwner(league: League, cardName: string): Team | null {
  return league.teams.find((t) => rosterOf(t).includes(cardName)) ?? null;
}

export function listFreeAgents(league: League): Card[] {
  const rostered = new Set(league.teams.flatMap(rosterOf));
  return listCards(league).filter((card) => !rostered.has(card.name));
}

// ============================================================================
// SALARY CAP
// ============================================================================

export function rosterCost(league: League, roster: string[]): number {
  return roundCost(
    roster.reduce((sum, name) => sum + getCard(league, name).cost, 0),
  );
}

/** Cap points held by active shop boosts */
export function boostAllocation(team: Team): number {
  return roundCost(team.boosts.reduce((sum, b) => sum + b.capCost, 0));
}

export function salaryUsed(league: League, team: Team): number {
  return roundCost(rosterCost(league, rosterOf(team)) + boostAllocation(team));
}

export function capRoom(league: League, team: Team, cap: number): number {
  return roundCost(cap - salaryUsed(league, team));
}

/**
 * Throws CapExceededError when the roster plus boosts plus an extra
 * allocation would go over the cap
 */
export function validateCap(
  league: League,
  team: Team,
  proposedRoster: string[] = rosterOf(team),
  extraAllocation = 0,
): void {
  const total = roundCost(
    rosterCost(league, proposedRoster) + boostAllocation(team) + extraAllocation,
  );
  if (total > league.config.salaryCap) {
    throw new CapExceededError(team.id, total, league.config.salaryCap);
  }
}

export function fitsCap(
  league: League,
  team: Team,
  proposedRoster: string[],
): boolean {
  const total = roundCost(
    rosterCost(league, proposedRoster) + boostAllocation(team),
  );
  return total <= league.config.salaryCap;
}

// ============================================================================
// CHEMISTRY
// ============================================================================

/**
 * 50 plus the synergy of every starter pair, clamped to [0, 100]
 */
export function computeChemistry(
  league: League,
  team: Team,
  lineup: string[] = team.starters,
): number {
  const cards = lineup.map((name) => getCard(league, name));
  let chemistry = BASE_CHEMISTRY;
  for (let i = 0; i < cards.length; i++) {
    for (let j = i + 1; j < cards.length; j++) {
      chemistry += synergyBonus(cards[i], cards[j]);
    }
  }
  return clamp(chemistry, 0, 100);
}

export function refreshChemistry(league: League, team: Team): void {
  team.chemistry = computeChemistry(league, team);
}

// ============================================================================
// FATIGUE SUBSTITUTION
// ============================================================================

export interface Lineup {
  active: string[];
  benched: string[];
  substitution: Substitution | null;
}

/**
 * Pick the lineup for one game. The backup replaces the most fatigued
 * starter under the threshold, if the backup is fresher. At most one swap;
 * the stored roster is never changed.
 *
 * The cap counts all four rostered cards whether they start or sit, so the
 * swapped lineup costs the same as the roster. The cap check only refuses a
 * swap for a team that is already over the cap, which engine commands never
 * produce but a loaded save can hold.
 */
export function checkFatigueAndSubstitute(
  league: League,
  team: Team,
  config: LeagueConfig,
): Lineup {
  const original: Lineup = {
    active: [...team.starters],
    benched: [team.backup],
    substitution: null,
  };

  const backup = getCard(league, team.backup);
  const tired = team.starters
    .map((name) => getCard(league, name))
    .filter(
      (card) =>
        card.fatigue < config.substitutionThreshold &&
        backup.fatigue > card.fatigue,
    )
    .sort((a, b) => a.fatigue - b.fatigue || a.name.localeCompare(b.name));

  const out = tired[0];
  if (!out) return original;

  const active = team.starters.map((name) =>
    name === out.name ? backup.name : name,
  );

  try {
    validateCap(league, team, [...active, out.name]);
  } catch (error) {
    if (error instanceof CapExceededError) return original;
    throw error;
  }

  return {
    active,
    benched: [out.name],
    substitution: { teamId: team.id, out: out.name, in: backup.name },
  };
}

// ============================================================================
// GENESIS & SIGNINGS
// ============================================================================

/** Teams from seed data with empty rosters, ready for the draft */
export function createTeams(config: LeagueConfig): Team[] {
  if (config.teamCount > TEAMS.length) {
    throw new InvalidConfigError(
      `teamCount cannot exceed ${TEAMS.length} seeded teams`,
    );
  }
  return TEAMS.slice(0, config.teamCount).map((seed) => ({
    id: seed.id,
    name: seed.name,
    shortName: seed.shortName,
    owner: seed.owner,
    color: seed.color,
    gmPersonality: seed.gmPersonality,
    starters: [],
    backup: '',
    boosts: [],
    tradeUsed: false,
    record: createEmptyRecord(),
    chemistry: BASE_CHEMISTRY,
    titles: 0,
  }));
}

function compareByRating(a: Card, b: Card): number {
  return b.rating - a.rating || a.name.localeCompare(b.name);
}

/**
 * Snake draft over a shuffled order: rounds 1-3 fill starters, round 4 the
 * backup. Each pick is the highest-rated card the team can still afford.
 */
export function draftTeams(league: League, rng: SeededRNG): void {
  const cap = league.config.salaryCap;
  const order = rng.shuffle(league.teams);
  const picks = new Map(
    league.teams.map((t): [string, Card[]] => [t.id, []]),
  );
  const pool = listCards(league).sort(compareByRating);
  const taken = new Set<string>();

  for (let round = 0; round < ROSTER_SIZE; round++) {
    const roundOrder = round % 2 === 0 ? order : [...order].reverse();
    for (const team of roundOrder) {
      const teamPicks = picks.get(team.id) ?? [];
      const spent = teamPicks.reduce((sum, c) => sum + c.cost, 0);
      const pick =
        pool.find(
          (c) => !taken.has(c.name) && roundCost(spent + c.cost) <= cap,
        ) ?? pool.find((c) => !taken.has(c.name));
      if (!pick) {
        throw new InvalidConfigError('Card pool ran out during the draft');
      }
      taken.add(pick.name);
      teamPicks.push(pick);
      picks.set(team.id, teamPicks);
      logTransaction(
        league,
        'draft',
        `${team.name} drafted ${pick.name} (round ${round + 1})`,
      );
    }
  }

  for (const team of league.teams) {
    const teamPicks = picks.get(team.id) ?? [];
    team.starters = teamPicks.slice(0, STARTER_COUNT).map((c) => c.name);
    team.backup = teamPicks[STARTER_COUNT].name;
    refreshChemistry(league, team);
  }
}

/**
 * Replace a card that left the roster with the best-rated free agent that
 * keeps the team under the cap (cheapest free agent if none fits).
 * Chemistry is left to the caller, once every slot is filled again.
 */
export function signReplacement(
  league: League,
  team: Team,
  outgoing: string,
): Card {
  const freeAgents = listFreeAgents(league).sort(compareByRating);
  // Other retirees may still sit on the roster; they carry no cost
  const swap = (name: string) =>
    rosterOf(team)
      .map((n) => (n === outgoing ? name : n))
      .filter((n) => n in league.cards);

  const signing =
    freeAgents.find((card) => fitsCap(league, team, swap(card.name))) ??
    [...freeAgents].sort((a, b) => a.cost - b.cost)[0];
  if (!signing) {
    throw new NotFoundError('No free agent available to sign');
  }

  const starterIndex = team.starters.indexOf(outgoing);
  if (starterIndex >= 0) {
    team.starters[starterIndex] = signing.name;
  } else if (team.backup === outgoing) {
    team.backup = signing.name;
  } else {
    throw new NotFoundError(`Card "${outgoing}" is not on ${team.name}`);
  }
  logTransaction(
    league,
    'signing',
    `${team.name} signed ${signing.name} to replace ${outgoing}`,
  );
  return signing;
}
