// ============================================================================
// CARDLEAGUE - Playoffs
// ============================================================================
// Seeded single-elimination bracket of best-of series

import type {
  League,
  PlayoffRound,
  PlayoffRoundName,
  PlayoffState,
  Series,
  SeriesSeat,
  SimulationContext,
} from '../types';
import { winsToClinch } from '../config';
import { InvalidPhaseError } from '../errors';
import { recoverAllCards } from '../card';
import { getTeam } from '../team';
import { simulateGame } from '../match';
import { getStandings, isRegularSeasonComplete, isRivalry } from '../season';
import { logTransaction, trackUpset } from '../history';

// Named from the final backwards
const ROUND_NAMES_FROM_FINAL: PlayoffRoundName[] = [
  'final',
  'semifinal',
  'quarterfinal',
  'round-of-16',
];

export function roundNameFor(
  roundIndex: number,
  totalRounds: number,
): PlayoffRoundName {
  return ROUND_NAMES_FROM_FINAL[totalRounds - 1 - roundIndex] ?? 'round-of-16';
}

function createSeries(
  round: PlayoffRoundName,
  a: SeriesSeat,
  b: SeriesSeat,
  bestOf: number,
): Series {
  const [higher, lower] = a.seed <= b.seed ? [a, b] : [b, a];
  return {
    round,
    higher,
    lower,
    winsRequired: winsToClinch(bestOf),
    games: [],
    higherWins: 0,
    lowerWins: 0,
    winnerId: null,
  };
}

function createRound(
  seats: SeriesSeat[],
  roundIndex: number,
  ctx: SimulationContext,
): PlayoffRound {
  const bestOfs = ctx.config.playoffBestOf;
  const name = roundNameFor(roundIndex, bestOfs.length);
  const bestOf = bestOfs[roundIndex];
  const series: Series[] = [];
  for (let i = 0; i < seats.length; i += 2) {
    series.push(createSeries(name, seats[i], seats[i + 1], bestOf));
  }
  return { name, bestOf, series };
}

// ============================================================================
// SEEDING
// ============================================================================

/**
 * Seed the top teams of the final standings and pair them 1vN, 2v(N-1), ...
 */
export function seedPlayoffs(
  league: League,
  ctx: SimulationContext,
): PlayoffState {
  if (league.phase !== 'regular-season') {
    throw new InvalidPhaseError(`Cannot seed playoffs during ${league.phase}`);
  }
  if (!isRegularSeasonComplete(league)) {
    throw new InvalidPhaseError('The regular season is not complete');
  }

  const size = ctx.config.playoffTeams;
  const seeds: SeriesSeat[] = getStandings(league)
    .slice(0, size)
    .map((entry, index) => ({ teamId: entry.teamId, seed: index + 1 }));

  const firstRound: SeriesSeat[] = [];
  for (let i = 0; i < size / 2; i++) {
    firstRound.push(seeds[i], seeds[size - 1 - i]);
  }

  const playoffs: PlayoffState = {
    seeds,
    rounds: [createRound(firstRound, 0, ctx)],
    championId: null,
  };

  league.playoffs = playoffs;
  league.phase = 'playoffs';
  league.week = ctx.config.totalWeeks;
  logTransaction(league, 'playoffs', `Playoffs seeded with ${size} teams`);
  return playoffs;
}

// ============================================================================
// SERIES
// ============================================================================

/**
 * Play games until one side reaches the wins required. The higher seed
 * hosts games 1, 3, 5 and 7.
 */
export function runSeries(
  league: League,
  series: Series,
  ctx: SimulationContext,
): string {
  const rivalry = isRivalry(league, series.higher.teamId, series.lower.teamId);

  for (;;) {
    if (series.winnerId !== null) return series.winnerId;

    const higherHosts = series.games.length % 2 === 0;
    const [homeId, awayId] = higherHosts
      ? [series.higher.teamId, series.lower.teamId]
      : [series.lower.teamId, series.higher.teamId];

    const result = simulateGame(league, homeId, awayId, {
      ...ctx,
      rivalry,
      stage: 'playoffs',
    });
    series.games.push(result);
    trackUpset(league, result);

    if (result.winnerId === series.higher.teamId) {
      series.higherWins += 1;
    } else {
      series.lowerWins += 1;
    }

    if (series.higherWins >= series.winsRequired) {
      series.winnerId = series.higher.teamId;
    } else if (series.lowerWins >= series.winsRequired) {
      series.winnerId = series.lower.teamId;
    }
  }
}

// ============================================================================
// ROUNDS
// ============================================================================

export function currentRound(playoffs: PlayoffState): PlayoffRound | null {
  return playoffs.rounds[playoffs.rounds.length - 1] ?? null;
}

/**
 * Play the current round. Seeds the bracket first when the regular season
 * has just finished; crowns the champion after the final.
 */
export function advancePlayoffRound(
  league: League,
  ctx: SimulationContext,
): PlayoffRound {
  if (league.phase === 'regular-season') {
    seedPlayoffs(league, ctx);
  }
  const playoffs = league.playoffs;
  if (league.phase !== 'playoffs' || !playoffs) {
    throw new InvalidPhaseError(
      `No playoff round to play during ${league.phase}`,
    );
  }
  const round = currentRound(playoffs);
  if (!round) {
    throw new InvalidPhaseError('The playoff bracket has no rounds');
  }

  const winners: SeriesSeat[] = round.series.map((series) => {
    const winnerId = runSeries(league, series, ctx);
    return winnerId === series.higher.teamId ? series.higher : series.lower;
  });
  recoverAllCards(league, ctx.config.weeklyRecovery);

  if (winners.length === 1) {
    const champion = getTeam(league, winners[0].teamId);
    playoffs.championId = champion.id;
    champion.titles += 1;
    league.phase = 'offseason';
    logTransaction(league, 'playoffs', `${champion.name} won the title`);
  } else {
    playoffs.rounds.push(createRound(winners, playoffs.rounds.length, ctx));
  }

  return round;
}

/** Seed if needed and play every remaining round to a champion */
export function runPlayoffs(
  league: League,
  ctx: SimulationContext,
): PlayoffState {
  if (league.phase === 'offseason') {
    throw new InvalidPhaseError('The playoffs are already finished');
  }
  advancePlayoffRound(league, ctx);
  while (league.phase === 'playoffs') {
    advancePlayoffRound(league, ctx);
  }
  if (!league.playoffs) {
    throw new InvalidPhaseError('Playoffs did not produce a bracket');
  }
  return league.playoffs;
}

/** The final series, once it exists */
export function finalSeries(playoffs: PlayoffState | null): Series | null {
  if (!playoffs) return null;
  const round = currentRound(playoffs);
  return round?.name === 'final' ? round.series[0] ?? null : null;
}
