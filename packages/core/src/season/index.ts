// ============================================================================
// CARDLEAGUE - Season System
// ============================================================================
// Calendar, week and matchday advance, standings

import type {
  Game,
  GameResult,
  League,
  SimulationContext,
  StandingEntry,
  Team,
} from '../types';
import { pairKey } from '../types';
import { gamesPerWeek, type LeagueConfig } from '../config';
import type { SeededRNG } from '../rng';
import { InvalidConfigError, InvalidPhaseError } from '../errors';
import { recoverAllCards } from '../card';
import { simulateGame } from '../match';
import { trackUpset } from '../history';

type Venue = 'H' | 'A';

interface Pairing {
  home: string;
  away: string;
}

// ============================================================================
// CALENDAR
// ============================================================================

/**
 * Circle-method schedule over a shuffled team order. A single round-robin
 * is followed by its opening rounds replayed until every team has
 * `gamesPerTeam` games.
 *
 * Venues are picked game by game in calendar order. In priority order:
 * no team plays three home or three away games in a row, a rematch swaps
 * the first meeting's venue, each team alternates home and away, and home
 * games stay level. Only team positions drive these choices, so every seed
 * gets the same venue pattern.
 *
 * Teams paired in the first round are rivals and both of their meetings
 * are flagged.
 */
export function generateCalendar(
  teams: Team[],
  rng: SeededRNG,
  config: LeagueConfig,
): Game[] {
  const teamIds = rng.shuffle(teams.map((t) => t.id));
  const n = teamIds.length;
  if (n < 2 || n % 2 !== 0) {
    throw new InvalidConfigError('The calendar needs an even number of teams');
  }

  const singleRounds = n - 1;
  const perRound = n / 2;
  const perWeek = gamesPerWeek(config);

  const fixed = teamIds[0];
  const rotating = teamIds.slice(1);
  const rounds: Array<Array<[string, string]>> = [];

  for (let round = 0; round < singleRounds; round++) {
    const rotation = [fixed, ...rotating];
    const pairs: Array<[string, string]> = [];
    for (let match = 0; match < perRound; match++) {
      pairs.push([rotation[match], rotation[n - 1 - match]]);
    }
    rounds.push(pairs);

    // Rotate teams (keep first fixed)
    const last = rotating.pop();
    if (last !== undefined) rotating.unshift(last);
  }

  const venueHistory = new Map<string, Venue[]>(
    teamIds.map((id): [string, Venue[]] => [id, []]),
  );
  const homeGames = new Map<string, number>(
    teamIds.map((id): [string, number] => [id, 0]),
  );
  const firstHost = new Map<string, string>();

  const lastVenue = (teamId: string): Venue | undefined =>
    venueHistory.get(teamId)?.at(-1);
  // The venue a team must take after two in a row at the same one
  const forcedVenue = (teamId: string): Venue | null => {
    const history = venueHistory.get(teamId) ?? [];
    if (history.length < 2) return null;
    const [before, last] = history.slice(-2);
    if (before !== last) return null;
    return last === 'H' ? 'A' : 'H';
  };
  const cost = (home: string, away: string): number[] => [
    Number(forcedVenue(home) === 'A') + Number(forcedVenue(away) === 'H'),
    Number(firstHost.get(pairKey(home, away)) === home),
    Number(lastVenue(home) === 'H') + Number(lastVenue(away) === 'A'),
    (homeGames.get(home) ?? 0) - (homeGames.get(away) ?? 0),
  ];
  const cheaper = (a: number[], b: number[]): boolean => {
    for (let i = 0; i < a.length; i++) {
      if (a[i] !== b[i]) return a[i] < b[i];
    }
    return true;
  };

  const scheduled: Pairing[][] = [];
  for (let r = 0; r < config.gamesPerTeam; r++) {
    const pairings: Pairing[] = [];
    for (const [team1, team2] of rounds[r % singleRounds]) {
      const pairing: Pairing = cheaper(cost(team1, team2), cost(team2, team1))
        ? { home: team1, away: team2 }
        : { home: team2, away: team1 };

      venueHistory.get(pairing.home)?.push('H');
      venueHistory.get(pairing.away)?.push('A');
      homeGames.set(pairing.home, (homeGames.get(pairing.home) ?? 0) + 1);
      const key = pairKey(pairing.home, pairing.away);
      if (!firstHost.has(key)) firstHost.set(key, pairing.home);
      pairings.push(pairing);
    }
    scheduled.push(pairings);
  }

  const rivals = new Set(rounds[0].map(([a, b]) => pairKey(a, b)));

  return scheduled.flatMap((pairings, r) => {
    const week = Math.floor(r / perWeek) + 1;
    const matchday = (r % perWeek) + 1;
    return pairings.map(
      (p, index): Game => ({
        id: `w${week}-m${matchday}-g${index + 1}`,
        week,
        matchday,
        home: p.home,
        away: p.away,
        rivalry: rivals.has(pairKey(p.home, p.away)),
        played: false,
        result: null,
      }),
    );
  });
}

export function isRivalry(league: League, a: string, b: string): boolean {
  const key = pairKey(a, b);
  return league.calendar.some(
    (game) => game.rivalry && pairKey(game.home, game.away) === key,
  );
}

// ============================================================================
// RESULTS
// ============================================================================

/** Fold a regular-season result into records and head-to-head */
export function applyResultToStandings(
  league: League,
  result: GameResult,
): void {
  for (const team of league.teams) {
    if (team.id !== result.homeId && team.id !== result.awayId) continue;
    const isHome = team.id === result.homeId;
    const scored = isHome ? result.homeScore : result.awayScore;
    const conceded = isHome ? result.awayScore : result.homeScore;
    const record = team.record;

    record.pointsFor += scored;
    record.pointsAgainst += conceded;
    if (team.id === result.winnerId) {
      record.wins += 1;
      record.streak = record.streak > 0 ? record.streak + 1 : 1;
    } else {
      record.losses += 1;
      record.streak = record.streak < 0 ? record.streak - 1 : -1;
    }
  }

  const key = pairKey(result.homeId, result.awayId);
  const meeting = league.headToHead[key] ?? { games: 0, wins: {} };
  meeting.games += 1;
  meeting.wins[result.winnerId] = (meeting.wins[result.winnerId] ?? 0) + 1;
  league.headToHead[key] = meeting;
}

function playCalendarGame(
  league: League,
  game: Game,
  ctx: SimulationContext,
): GameResult {
  const result = simulateGame(league, game.home, game.away, {
    ...ctx,
    rivalry: game.rivalry,
    stage: 'regular-season',
  });
  game.played = true;
  game.result = result;
  applyResultToStandings(league, result);
  trackUpset(league, result);
  return result;
}

// ============================================================================
// ADVANCE
// ============================================================================

export interface WeekReport {
  week: number;
  games: GameResult[];
}

export interface MatchdayReport {
  week: number;
  matchday: number;
  games: GameResult[];
}

function assertWeekOpen(league: League, ctx: SimulationContext): number {
  if (league.phase !== 'regular-season') {
    throw new InvalidPhaseError(
      `Cannot advance the regular season during ${league.phase}`,
    );
  }
  if (league.week >= ctx.config.totalWeeks) {
    throw new InvalidPhaseError('The regular season is already complete');
  }
  return league.week + 1;
}

/**
 * Play whatever is left of the next week, apply weekly recovery and close
 * the week. Games already played by matchday are never replayed.
 */
export function advanceWeek(
  league: League,
  ctx: SimulationContext,
): WeekReport {
  const week = assertWeekOpen(league, ctx);
  const games = league.calendar
    .filter((g) => g.week === week && !g.played)
    .map((g) => playCalendarGame(league, g, ctx));

  recoverAllCards(league, ctx.config.weeklyRecovery);
  league.week = week;
  return { week, games };
}

/**
 * Play only the next unplayed matchday of the coming week. The week stays
 * open until advanceWeek closes it.
 */
export function advanceMatchday(
  league: League,
  ctx: SimulationContext,
): MatchdayReport {
  const week = assertWeekOpen(league, ctx);
  const pending = league.calendar.filter((g) => g.week === week && !g.played);
  if (pending.length === 0) {
    throw new InvalidPhaseError(
      `Every matchday of week ${week} is played; advance the week to close it`,
    );
  }

  const matchday = Math.min(...pending.map((g) => g.matchday));
  const games = pending
    .filter((g) => g.matchday === matchday)
    .map((g) => playCalendarGame(league, g, ctx));

  return { week, matchday, games };
}

export function isRegularSeasonComplete(league: League): boolean {
  return league.calendar.every((g) => g.played);
}

export function getWeekGames(league: League, week: number): Game[] {
  return league.calendar.filter((g) => g.week === week);
}

// ============================================================================
// STANDINGS
// ============================================================================

function headToHeadWins(
  league: League,
  teamId: string,
  group: StandingEntry[],
): number {
  return group.reduce((sum, other) => {
    if (other.teamId === teamId) return sum;
    const meeting = league.headToHead[pairKey(teamId, other.teamId)];
    return sum + (meeting?.wins[teamId] ?? 0);
  }, 0);
}

/**
 * Wins, then point differential, then head-to-head wins inside the tied
 * group, then team name
 */
export function getStandings(league: League): StandingEntry[] {
  const entries: StandingEntry[] = league.teams.map((team) => ({
    position: 0,
    teamId: team.id,
    teamName: team.name,
    played: team.record.wins + team.record.losses,
    wins: team.record.wins,
    losses: team.record.losses,
    pointsFor: team.record.pointsFor,
    pointsAgainst: team.record.pointsAgainst,
    pointDifferential: team.record.pointsFor - team.record.pointsAgainst,
    streak: team.record.streak,
  }));

  entries.sort(
    (a, b) =>
      b.wins - a.wins ||
      b.pointDifferential - a.pointDifferential ||
      a.teamName.localeCompare(b.teamName),
  );

  const ordered: StandingEntry[] = [];
  let start = 0;
  while (start < entries.length) {
    let end = start + 1;
    while (
      end < entries.length &&
      entries[end].wins === entries[start].wins &&
      entries[end].pointDifferential === entries[start].pointDifferential
    ) {
      end++;
    }
    const group = entries.slice(start, end);
    if (group.length > 1) {
      const h2h = new Map(
        group.map((e): [string, number] => [
          e.teamId,
          headToHeadWins(league, e.teamId, group),
        ]),
      );
      group.sort(
        (a, b) =>
          (h2h.get(b.teamId) ?? 0) - (h2h.get(a.teamId) ?? 0) ||
          a.teamName.localeCompare(b.teamName),
      );
    }
    ordered.push(...group);
    start = end;
  }

  return ordered.map((entry, index) => ({ ...entry, position: index + 1 }));
}
