// ============================================================================
// CARDLEAGUE - Season Awards
// ============================================================================
// MVP, DPOY, Sixth Man, Rookie of the Year and Finals MVP

import type {
  AwardName,
  AwardWinner,
  Card,
  League,
  SeasonAwards,
} from '../types';
import { AWARD_NAMES, averageContribution } from '../types';
import { InvalidPhaseError } from '../errors';
import { listCards, roundCost } from '../card';
import { capRoom, findCardOwner } from '../team';
import { finalSeries } from '../playoffs';
import { logTransaction } from '../history';

/** Salary bump each award adds to the winning card */
export const AWARD_COST_BUMPS: Record<AwardName, number> = {
  MVP: 0.5,
  DPOY: 0.3,
  'Finals MVP': 0.3,
  ROY: 0.2,
  'Sixth Man': 0.2,
};

interface Candidate {
  card: Card;
  score: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function ownerWinPct(league: League, card: Card): number {
  const owner = findCardOwner(league, card.name);
  if (!owner) return 0;
  const played = owner.record.wins + owner.record.losses;
  return played > 0 ? owner.record.wins / played : 0;
}

function mvpComposite(league: League, card: Card): number {
  return (
    averageContribution(card.season) * (0.75 + 0.5 * ownerWinPct(league, card))
  );
}

/** Highest score wins; ties go to the higher base rating, then the name */
function pickWinner(
  league: League,
  award: AwardName,
  candidates: Candidate[],
): AwardWinner | null {
  const best = [...candidates].sort(
    (a, b) =>
      b.score - a.score ||
      b.card.baseRating - a.card.baseRating ||
      a.card.name.localeCompare(b.card.name),
  )[0];
  if (!best) return null;
  return {
    award,
    card: best.card.name,
    teamId: findCardOwner(league, best.card.name)?.id ?? null,
    score: round2(best.score),
  };
}

function finalsCandidates(league: League): Candidate[] {
  const series = finalSeries(league.playoffs);
  const championId = league.playoffs?.championId ?? null;
  if (!series || !championId) return [];

  const totals = new Map<string, { sum: number; games: number }>();
  for (const game of series.games) {
    for (const line of game.lines) {
      if (line.teamId !== championId) continue;
      const total = totals.get(line.card) ?? { sum: 0, games: 0 };
      total.sum += line.contribution;
      total.games += 1;
      totals.set(line.card, total);
    }
  }

  const candidates: Candidate[] = [];
  for (const [name, total] of totals) {
    const card = league.cards[name];
    if (card) {
      candidates.push({ card, score: total.sum / total.games });
    }
  }
  return candidates;
}

/**
 * Score every award from this season's stats. Pure: the league is not
 * changed.
 */
export function calculateAwards(league: League): SeasonAwards {
  const minGames = league.config.minAwardGames;
  const cards = listCards(league);
  const eligible = cards.filter((c) => c.season.games >= minGames);

  return {
    MVP: pickWinner(
      league,
      'MVP',
      eligible.map((card) => ({ card, score: mvpComposite(league, card) })),
    ),
    DPOY: pickWinner(
      league,
      'DPOY',
      eligible.map((card) => ({
        card,
        score:
          (card.season.defense / card.season.games) *
          (0.6 + (0.4 * averageContribution(card.season)) / 100),
      })),
    ),
    'Sixth Man': pickWinner(
      league,
      'Sixth Man',
      cards
        .filter((c) => c.season.backupGames > 0)
        .map((card) => ({
          card,
          score: card.season.backupContribution / card.season.backupGames,
        })),
    ),
    ROY: pickWinner(
      league,
      'ROY',
      cards
        .filter((c) => c.age === 0 && c.season.games > 0)
        .map((card) => ({ card, score: mvpComposite(league, card) })),
    ),
    'Finals MVP': pickWinner(league, 'Finals MVP', finalsCandidates(league)),
  };
}

/**
 * Raise each winner's cost by its award bump, never past the owning team's
 * cap room
 */
export function applyAwardCostBumps(
  league: League,
  awards: SeasonAwards,
): void {
  for (const name of AWARD_NAMES) {
    const winner = awards[name];
    if (!winner) continue;
    const card = league.cards[winner.card];
    if (!card) continue;

    const owner = findCardOwner(league, card.name);
    const room = owner
      ? Math.max(0, capRoom(league, owner, league.config.salaryCap))
      : AWARD_COST_BUMPS[name];
    const bump = Math.min(AWARD_COST_BUMPS[name], room);
    card.cost = roundCost(card.cost + bump);
  }
}

/**
 * Decide the season's awards once the champion is known: store them, label
 * the winning cards and apply the cost bumps
 */
export function finalizeAwards(league: League): SeasonAwards {
  if (league.phase !== 'offseason') {
    throw new InvalidPhaseError('Awards are decided after the playoffs');
  }
  if (league.awards) return league.awards;

  const awards = calculateAwards(league);
  for (const name of AWARD_NAMES) {
    const winner = awards[name];
    if (!winner) continue;
    const card = league.cards[winner.card];
    if (!card) continue;
    card.awards.push(`${name} S${league.season}`);
    logTransaction(league, 'award', `${card.name} won ${name}`);
  }

  applyAwardCostBumps(league, awards);
  league.awards = awards;
  return awards;
}
