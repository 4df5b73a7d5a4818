import { describe, expect, it } from 'vitest';
import type { League } from '../types';
import { createEmptyRecord } from '../types';
import type { LeagueConfig } from '../config';
import { SeededRNG } from '../rng';
import { makeCard, makeLeague, makeTeam } from '../testing';
import { effectiveCardPower, simulateGame, type SimulateGameOptions } from './index';

function makeMatchLeague(
  config: Partial<LeagueConfig> = {},
  ratings: { home?: number; away?: number } = {},
): League {
  const home = makeTeam('home', ['h1', 'h2', 'h3', 'h4']);
  const away = makeTeam('away', ['a1', 'a2', 'a3', 'a4']);
  const cards = [
    ...['h1', 'h2', 'h3', 'h4'].map((name) =>
      makeCard(name, {}, ratings.home ? { rating: ratings.home } : {}),
    ),
    ...['a1', 'a2', 'a3', 'a4'].map((name) =>
      makeCard(name, {}, ratings.away ? { rating: ratings.away } : {}),
    ),
  ];
  return makeLeague([home, away], cards, {}, config);
}

function optionsFor(league: League, seed = 'match'): SimulateGameOptions {
  return {
    rng: new SeededRNG(seed),
    config: league.config,
    rivalry: false,
    stage: 'regular-season',
  };
}

describe('effectiveCardPower', () => {
  it('scales rating by fatigue', () => {
    const league = makeMatchLeague();
    const card = makeCard('tired', {}, { rating: 80, fatigue: 50 });

    expect(
      effectiveCardPower(card, league.teams[0], { config: league.config }),
    ).toBe(60);
  });

  it('adds rating boosts aimed at the card before scaling', () => {
    const league = makeMatchLeague();
    const team = makeTeam('boosted', ['tired', 'x', 'y', 'z'], {
      boosts: [
        {
          itemKey: 'rating-boost-3',
          kind: 'rating',
          amount: 3,
          target: 'tired',
          gamesLeft: 2,
          capCost: 1.5,
        },
      ],
    });
    const card = makeCard('tired', {}, { rating: 80, fatigue: 50 });

    expect(effectiveCardPower(card, team, { config: league.config })).toBe(
      62.25,
    );
  });
});

describe('simulateGame', () => {
  it('breaks an exact tie in favour of the stronger side', () => {
    // Identical rosters, no noise: both sides land on 21 before the tiebreak
    const league = makeMatchLeague({ noiseSpread: 0 });
    const result = simulateGame(league, 'home', 'away', optionsFor(league));

    expect(result).toMatchObject({
      homeScore: 22,
      awayScore: 21,
      winnerId: 'home',
      loserId: 'away',
      tiebreak: 'power',
      homePower: 212.41,
      awayPower: 206.22,
    });
  });

  it('gives the home side the win when powers are equal too', () => {
    const league = makeMatchLeague({ noiseSpread: 0, homeAdvantage: 1 });
    const result = simulateGame(league, 'home', 'away', optionsFor(league));

    expect(result.tiebreak).toBe('home');
    expect(result.homeScore).toBe(22);
    expect(result.awayScore).toBe(21);
    expect(result.winnerId).toBe('home');
  });

  it('splits contribution and points by power share', () => {
    const league = makeMatchLeague({ noiseSpread: 0 });
    const result = simulateGame(league, 'home', 'away', optionsFor(league));
    const homeLines = result.lines.filter((l) => l.teamId === 'home');

    expect(homeLines.map((l) => l.card)).toEqual(['h1', 'h2', 'h3']);
    for (const line of homeLines) {
      expect(line).toMatchObject({
        role: 'starter',
        power: 70,
        contribution: 33.33,
        points: 7.33,
        defense: 70,
      });
    }
    const total = homeLines.reduce((sum, l) => sum + l.contribution, 0);
    expect(total).toBeCloseTo(100, 1);
  });

  it('records stats and drains fatigue for the cards that played', () => {
    const league = makeMatchLeague({ noiseSpread: 0 });
    simulateGame(league, 'home', 'away', optionsFor(league));

    const played = league.cards['h1'];
    expect(played.season).toMatchObject({
      games: 1,
      starts: 1,
      backupGames: 0,
      contribution: 33.33,
      points: 7.33,
      defense: 70,
    });
    expect(played.career.games).toBe(1);
    expect(played.fatigue).toBeGreaterThanOrEqual(85);
    expect(played.fatigue).toBeLessThanOrEqual(92);

    const idle = league.cards['h4'];
    expect(idle.season.games).toBe(0);
    expect(idle.fatigue).toBe(100);
  });

  it('brings the backup in for an exhausted starter, who then recovers', () => {
    const league = makeMatchLeague();
    league.cards['h1'].fatigue = 10;

    const result = simulateGame(league, 'home', 'away', optionsFor(league));

    expect(result.substitutions).toEqual([
      { teamId: 'home', out: 'h1', in: 'h4' },
    ]);
    expect(result.lines.find((l) => l.card === 'h4')?.role).toBe('backup');
    expect(league.cards['h4'].season.backupGames).toBe(1);
    expect(league.cards['h1'].season.games).toBe(0);
    expect(league.cards['h1'].fatigue).toBeGreaterThanOrEqual(20);
    expect(league.cards['h1'].fatigue).toBeLessThanOrEqual(28);
    expect(league.teams[0].starters).toEqual(['h1', 'h2', 'h3']);
  });

  it('counts down boosts and drops the expired ones', () => {
    const league = makeMatchLeague();
    league.teams[0].boosts = [
      {
        itemKey: 'rating-boost-3',
        kind: 'rating',
        amount: 3,
        target: 'h1',
        gamesLeft: 2,
        capCost: 1.5,
      },
      {
        itemKey: 'team-boost-2',
        kind: 'team-rating',
        amount: 2,
        target: null,
        gamesLeft: 1,
        capCost: 3,
      },
    ];

    simulateGame(league, 'home', 'away', optionsFor(league));

    expect(league.teams[0].boosts).toHaveLength(1);
    expect(league.teams[0].boosts[0]).toMatchObject({
      itemKey: 'rating-boost-3',
      gamesLeft: 1,
    });
  });

  it('leaves standings to the caller', () => {
    const league = makeMatchLeague();
    simulateGame(league, 'home', 'away', optionsFor(league));

    expect(league.teams[0].record).toEqual(createEmptyRecord());
    expect(league.teams[1].record).toEqual(createEmptyRecord());
    expect(league.headToHead).toEqual({});
  });

  it('lets a far stronger roster win home or away', () => {
    for (let i = 0; i < 20; i++) {
      const atHome = makeMatchLeague({}, { home: 95, away: 40 });
      expect(
        simulateGame(atHome, 'home', 'away', optionsFor(atHome, `home-${i}`))
          .winnerId,
      ).toBe('home');

      const onRoad = makeMatchLeague({}, { home: 40, away: 95 });
      expect(
        simulateGame(onRoad, 'home', 'away', optionsFor(onRoad, `road-${i}`))
          .winnerId,
      ).toBe('away');
    }
  });
});
