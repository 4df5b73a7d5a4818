import { describe, expect, it } from 'vitest';
import type { League } from '../types';
import { SeededRNG } from '../rng';
import { InvalidPhaseError } from '../errors';
import { getTeam } from '../team';
import { advanceWeek, getStandings } from '../season';
import { LeagueEngine } from '../engine';
import { SMALL_LEAGUE_CONFIG } from '../testing';
import {
  advancePlayoffRound,
  finalSeries,
  roundNameFor,
  runPlayoffs,
  seedPlayoffs,
} from './index';

function contextFor(league: League, seed = 'playoffs') {
  return { rng: new SeededRNG(seed), config: league.config };
}

function finishedSmallSeason(): League {
  const league = LeagueEngine.createState({
    seed: 'bracket',
    config: SMALL_LEAGUE_CONFIG,
  });
  const ctx = contextFor(league, 'bracket-season');
  for (let week = 0; week < 4; week++) {
    advanceWeek(league, ctx);
  }
  return league;
}

describe('roundNameFor', () => {
  it('names rounds counting back from the final', () => {
    expect([0, 1, 2, 3].map((i) => roundNameFor(i, 4))).toEqual([
      'round-of-16',
      'quarterfinal',
      'semifinal',
      'final',
    ]);
    expect([0, 1].map((i) => roundNameFor(i, 2))).toEqual([
      'semifinal',
      'final',
    ]);
  });
});

describe('seedPlayoffs', () => {
  it('refuses to seed before every regular-season game is played', () => {
    const league = LeagueEngine.createState({
      seed: 'early',
      config: SMALL_LEAGUE_CONFIG,
    });

    expect(() => seedPlayoffs(league, contextFor(league))).toThrow(
      InvalidPhaseError,
    );
    expect(league.playoffs).toBeNull();
  });

  it('pairs the top seed with the lowest', () => {
    const league = finishedSmallSeason();
    const standings = getStandings(league);

    const playoffs = seedPlayoffs(league, contextFor(league));
    const [first, second] = playoffs.rounds[0].series;

    expect(league.phase).toBe('playoffs');
    expect(playoffs.seeds.map((s) => s.teamId)).toEqual(
      standings.slice(0, 4).map((s) => s.teamId),
    );
    expect([first.higher.seed, first.lower.seed]).toEqual([1, 4]);
    expect([second.higher.seed, second.lower.seed]).toEqual([2, 3]);
    expect(first.winsRequired).toBe(2);
  });
});

describe('advancePlayoffRound', () => {
  it('steps through each round to a champion', () => {
    const league = finishedSmallSeason();
    const ctx = contextFor(league);

    const semis = advancePlayoffRound(league, ctx);

    expect(semis.name).toBe('semifinal');
    expect(league.phase).toBe('playoffs');
    for (const series of semis.series) {
      expect(Math.max(series.higherWins, series.lowerWins)).toBe(2);
      expect(series.games[0].homeId).toBe(series.higher.teamId);
      expect(series.games[1].homeId).toBe(series.lower.teamId);
      expect(series.games.every((g) => g.stage === 'playoffs')).toBe(true);
    }
    expect(league.playoffs?.rounds).toHaveLength(2);

    const final = advancePlayoffRound(league, ctx);
    const series = final.series[0];

    expect(final.name).toBe('final');
    expect(Math.max(series.higherWins, series.lowerWins)).toBe(3);
    expect(league.phase).toBe('offseason');
    expect(league.playoffs?.championId).toBe(series.winnerId);
    expect(getTeam(league, series.winnerId ?? '').titles).toBe(1);
    expect(finalSeries(league.playoffs)).toBe(series);

    expect(() => advancePlayoffRound(league, ctx)).toThrow(InvalidPhaseError);
  });

  it('counts playoff games on the cards that played them', () => {
    const league = finishedSmallSeason();
    runPlayoffs(league, contextFor(league));

    const champion = getTeam(league, league.playoffs?.championId ?? '');
    const playoffGames = champion.starters
      .concat(champion.backup)
      .reduce((sum, name) => sum + league.cards[name].season.playoffGames, 0);
    // Three lineup slots for each of at least five series games
    expect(playoffGames).toBeGreaterThanOrEqual(15);
  });
});

describe('runPlayoffs', () => {
  it('halves the field every round of the full bracket', () => {
    const league = LeagueEngine.createState({ seed: 'full-bracket' });
    for (const game of league.calendar) {
      game.played = true;
    }

    const playoffs = runPlayoffs(league, contextFor(league));

    expect(playoffs.rounds.map((r) => [r.name, r.series.length])).toEqual([
      ['round-of-16', 8],
      ['quarterfinal', 4],
      ['semifinal', 2],
      ['final', 1],
    ]);
    expect(playoffs.rounds.map((r) => r.bestOf)).toEqual([3, 5, 5, 7]);
    expect(playoffs.championId).toBe(playoffs.rounds[3].series[0].winnerId);
    expect(league.phase).toBe('offseason');
  });

  it('refuses to run once the title is decided', () => {
    const league = finishedSmallSeason();
    const ctx = contextFor(league);
    runPlayoffs(league, ctx);

    expect(() => runPlayoffs(league, ctx)).toThrow(InvalidPhaseError);
  });
});
