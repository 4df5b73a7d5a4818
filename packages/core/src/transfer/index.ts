// ============================================================================
// CARDLEAGUE - Trade Desk
// ============================================================================
// One-for-one card swaps between teams
// - Each team makes at most one trade per season
// - Both sides must stay under the salary cap
// - Everything is validated before the rosters change

import type { League, Team } from '../types';
import {
  InvalidPhaseError,
  InvalidTradeError,
  NotFoundError,
  TradeLimitExceededError,
} from '../errors';
import { getCard } from '../card';
import {
  fitsCap,
  getTeam,
  refreshChemistry,
  rosterOf,
  validateCap,
} from '../team';
import { logTransaction } from '../history';

export interface TradeOffer {
  teamId: string;
  teamName: string;
  card: string;
  rating: number;
  cost: number;
  ratingGap: number;
}

export interface TradeReceipt {
  teamA: string;
  teamB: string;
  cardOut: string;
  cardIn: string;
}

function swapCard(roster: string[], out: string, incoming: string): string[] {
  return roster.map((name) => (name === out ? incoming : name));
}

function assertOnRoster(team: Team, cardName: string): void {
  if (!rosterOf(team).includes(cardName)) {
    throw new NotFoundError(`Card "${cardName}" is not on ${team.name}`);
  }
}

function assertTradeWindow(league: League): void {
  if (league.phase === 'playoffs') {
    throw new InvalidPhaseError('Trades are frozen during the playoffs');
  }
}

// ============================================================================
// TRADE FINDER
// ============================================================================

/**
 * Cards on other teams within the rating window that both sides could
 * swap without breaking the cap. Closest rating first.
 */
export function findTradeOffers(
  league: League,
  teamId: string,
  cardName: string,
): TradeOffer[] {
  const team = getTeam(league, teamId);
  assertOnRoster(team, cardName);
  if (team.tradeUsed) return [];

  const outgoing = getCard(league, cardName);
  const window = league.config.tradeRatingWindow;
  const offers: TradeOffer[] = [];

  for (const other of league.teams) {
    if (other.id === team.id || other.tradeUsed) continue;

    for (const name of rosterOf(other)) {
      const candidate = getCard(league, name);
      const gap = candidate.rating - outgoing.rating;
      if (Math.abs(gap) > window) continue;

      const ours = swapCard(rosterOf(team), cardName, name);
      const theirs = swapCard(rosterOf(other), name, cardName);
      if (!fitsCap(league, team, ours) || !fitsCap(league, other, theirs)) {
        continue;
      }

      offers.push({
        teamId: other.id,
        teamName: other.name,
        card: name,
        rating: candidate.rating,
        cost: candidate.cost,
        ratingGap: gap,
      });
    }
  }

  return offers.sort(
    (a, b) =>
      Math.abs(a.ratingGap) - Math.abs(b.ratingGap) ||
      b.rating - a.rating ||
      a.card.localeCompare(b.card),
  );
}

// ============================================================================
// TRADE EXECUTION
// ============================================================================

/**
 * Swap cardOut (on team A) for cardIn (on team B). Each card takes the
 * other's slot. Throws before any change when the trade is not allowed.
 */
export function proposeTrade(
  league: League,
  teamAId: string,
  cardOut: string,
  teamBId: string,
  cardIn: string,
): TradeReceipt {
  assertTradeWindow(league);

  const teamA = getTeam(league, teamAId);
  const teamB = getTeam(league, teamBId);
  if (teamA.id === teamB.id) {
    throw new InvalidTradeError('A team cannot trade with itself');
  }

  assertOnRoster(teamA, cardOut);
  assertOnRoster(teamB, cardIn);

  for (const team of [teamA, teamB]) {
    if (team.tradeUsed) {
      throw new TradeLimitExceededError(team.id);
    }
  }

  validateCap(league, teamA, swapCard(rosterOf(teamA), cardOut, cardIn));
  validateCap(league, teamB, swapCard(rosterOf(teamB), cardIn, cardOut));

  teamA.starters = swapCard(teamA.starters, cardOut, cardIn);
  teamA.backup = teamA.backup === cardOut ? cardIn : teamA.backup;
  teamB.starters = swapCard(teamB.starters, cardIn, cardOut);
  teamB.backup = teamB.backup === cardIn ? cardOut : teamB.backup;

  // Boosts on a traded card keep their cap hold but lose their target
  for (const boost of teamA.boosts) {
    if (boost.target === cardOut) boost.target = null;
  }
  for (const boost of teamB.boosts) {
    if (boost.target === cardIn) boost.target = null;
  }

  teamA.tradeUsed = true;
  teamB.tradeUsed = true;
  refreshChemistry(league, teamA);
  refreshChemistry(league, teamB);

  logTransaction(
    league,
    'trade',
    `${teamA.name} traded ${cardOut} to ${teamB.name} for ${cardIn}`,
  );
  return { teamA: teamA.id, teamB: teamB.id, cardOut, cardIn };
}
