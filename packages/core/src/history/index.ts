// ============================================================================
// CARDLEAGUE - League History
// ============================================================================
// Transaction log, league records and Hall of Fame tracking

import type {
  AwardName,
  Card,
  GameResult,
  League,
  SeasonAwards,
  StandingEntry,
  TransactionKind,
} from '../types';
import { AWARD_NAMES, averageContribution } from '../types';
import { clamp } from '../card';

// ============================================================================
// TRANSACTIONS
// ============================================================================

export function logTransaction(
  league: League,
  kind: TransactionKind,
  message: string,
): void {
  league.transactions.push({
    season: league.season,
    week: league.week,
    kind,
    message,
  });
}

// ============================================================================
// RECORDS
// ============================================================================

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Keep the biggest upset: the largest pre-noise power gap a winner overcame
 */
export function trackUpset(league: League, result: GameResult): void {
  const homeWon = result.winnerId === result.homeId;
  const winnerPower = homeWon ? result.homePower : result.awayPower;
  const loserPower = homeWon ? result.awayPower : result.homePower;
  const gap = round2(loserPower - winnerPower);
  if (gap <= 0) return;

  const current = league.records.biggestUpset;
  if (current && current.powerGap >= gap) return;

  const winnerScore = homeWon ? result.homeScore : result.awayScore;
  const loserScore = homeWon ? result.awayScore : result.homeScore;
  league.records.biggestUpset = {
    season: league.season,
    stage: result.stage,
    winnerId: result.winnerId,
    loserId: result.loserId,
    score: `${winnerScore}-${loserScore}`,
    powerGap: gap,
  };
}

/** Count awards per card in one season's haul */
export function countAwardsByCard(awards: SeasonAwards): Map<string, number> {
  const counts = new Map<string, number>();
  for (const name of AWARD_NAMES) {
    const winner = awards[name];
    if (winner) {
      counts.set(winner.card, (counts.get(winner.card) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Fold a finished season into the all-time records. Earlier holders keep a
 * record on ties.
 */
export function updateSeasonRecords(
  league: League,
  standings: StandingEntry[],
  awards: SeasonAwards,
): void {
  const records = league.records;

  for (const entry of standings) {
    const mark = {
      season: league.season,
      teamId: entry.teamId,
      teamName: entry.teamName,
      wins: entry.wins,
      losses: entry.losses,
    };
    if (!records.bestRecord || entry.wins > records.bestRecord.wins) {
      records.bestRecord = mark;
    }
    if (!records.worstRecord || entry.wins < records.worstRecord.wins) {
      records.worstRecord = mark;
    }
  }

  for (const [card, count] of countAwardsByCard(awards)) {
    const best = records.mostAwardsOneSeason;
    if (!best || count > best.count) {
      records.mostAwardsOneSeason = { season: league.season, card, count };
    }
  }
}

// ============================================================================
// HALL OF FAME
// ============================================================================

export const HOF_AWARD_WEIGHTS: Record<AwardName, number> = {
  MVP: 10,
  'Finals MVP': 6,
  DPOY: 4,
  ROY: 2,
  'Sixth Man': 2,
};

const HOF_CONTRIBUTION_CAP = 10;
const HOF_LONGEVITY_CAP = 8;
const HOF_LONGEVITY_PER_SEASON = 0.75;
const HOF_RATING_BASELINE = 60;
const HOF_RATING_WEIGHT = 0.2;

function isAwardName(value: string): value is AwardName {
  return AWARD_NAMES.some((name) => name === value);
}

/** "Finals MVP S3" -> "Finals MVP" */
export function awardNameOf(label: string): AwardName | null {
  const name = label.replace(/ S\d+$/, '');
  return isAwardName(name) ? name : null;
}

export function hofScore(card: Card): number {
  const awardPoints = card.awards.reduce((sum, label) => {
    const name = awardNameOf(label);
    return sum + (name ? HOF_AWARD_WEIGHTS[name] : 0);
  }, 0);
  const contribution = Math.min(
    HOF_CONTRIBUTION_CAP,
    averageContribution(card.career) / 10,
  );
  const longevity = Math.min(
    HOF_LONGEVITY_CAP,
    card.age * HOF_LONGEVITY_PER_SEASON,
  );
  const rating = (card.rating - HOF_RATING_BASELINE) * HOF_RATING_WEIGHT;

  return round2(clamp(awardPoints + contribution + longevity + rating, 0, 100));
}

/**
 * Raise each active card's probability to its current score. Retired cards
 * live outside the catalog and stay frozen.
 */
export function updateHallOfFame(league: League): void {
  for (const card of Object.values(league.cards)) {
    card.hofProbability = Math.max(card.hofProbability, hofScore(card));
  }
}

/** Retired cards ordered by Hall of Fame probability */
export function getHallOfFame(league: League, limit = 10): Card[] {
  return Object.values(league.retiredCards)
    .sort(
      (a, b) =>
        b.hofProbability - a.hofProbability || a.name.localeCompare(b.name),
    )
    .slice(0, limit);
}
