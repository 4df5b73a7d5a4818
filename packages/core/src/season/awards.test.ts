import { describe, expect, it } from 'vitest';
import type {
  CardGameLine,
  CardStatLine,
  GameResult,
  League,
  PlayoffState,
  SeasonAwards,
} from '../types';
import { createEmptyRecord, createEmptyStatLine } from '../types';
import { InvalidPhaseError } from '../errors';
import { makeCard, makeLeague, makeTeam } from '../testing';
import {
  applyAwardCostBumps,
  calculateAwards,
  finalizeAwards,
} from './awards';

function stats(line: Partial<CardStatLine>): CardStatLine {
  return { ...createEmptyStatLine(), ...line };
}

function line(card: string, teamId: string, contribution: number): CardGameLine {
  return {
    card,
    teamId,
    role: 'starter',
    power: 70,
    contribution,
    points: 0,
    defense: 0,
  };
}

function finalGame(lines: CardGameLine[]): GameResult {
  return {
    homeId: 'alpha',
    awayId: 'bravo',
    homeScore: 30,
    awayScore: 25,
    winnerId: 'alpha',
    loserId: 'bravo',
    homePower: 210,
    awayPower: 205,
    rivalry: false,
    stage: 'playoffs',
    tiebreak: 'none',
    substitutions: [],
    lines,
  };
}

function finishedPlayoffs(): PlayoffState {
  return {
    seeds: [
      { teamId: 'alpha', seed: 1 },
      { teamId: 'bravo', seed: 2 },
    ],
    rounds: [
      {
        name: 'final',
        bestOf: 3,
        series: [
          {
            round: 'final',
            higher: { teamId: 'alpha', seed: 1 },
            lower: { teamId: 'bravo', seed: 2 },
            winsRequired: 2,
            games: [
              finalGame([
                line('a1', 'alpha', 30),
                line('a2', 'alpha', 40),
                line('b1', 'bravo', 60),
              ]),
              finalGame([
                line('a1', 'alpha', 35),
                line('a2', 'alpha', 40),
                line('b1', 'bravo', 60),
              ]),
            ],
            higherWins: 2,
            lowerWins: 0,
            winnerId: 'alpha',
          },
        ],
      },
    ],
    championId: 'alpha',
  };
}

/**
 * Alpha went 8-2, Bravo 5-5. Composite scores:
 * MVP a1 40 * 1.15 = 46, b1 45 * 1.0 = 45, a2 35 * 1.15 = 40.25
 * DPOY b2 80 * 0.72 = 57.6, a2 70 * 0.74 = 51.8
 */
function awardsLeague(): League {
  const alpha = makeTeam('alpha', ['a1', 'a2', 'a3', 'a4'], {
    record: { ...createEmptyRecord(), wins: 8, losses: 2 },
  });
  const bravo = makeTeam('bravo', ['b1', 'b2', 'b3', 'b4'], {
    record: { ...createEmptyRecord(), wins: 5, losses: 5 },
  });
  const cards = [
    makeCard('a1', {}, {
      season: stats({ games: 10, contribution: 400, defense: 600 }),
    }),
    makeCard('a2', {}, {
      season: stats({ games: 10, contribution: 350, defense: 700 }),
    }),
    makeCard('a3', { age: 0 }, {
      season: stats({ games: 2, contribution: 60 }),
    }),
    makeCard('a4', {}, {
      season: stats({ games: 2, backupGames: 2, backupContribution: 60 }),
    }),
    makeCard('b1', {}, {
      season: stats({ games: 10, contribution: 450, defense: 500 }),
    }),
    makeCard('b2', {}, {
      season: stats({ games: 10, contribution: 300, defense: 800 }),
    }),
    makeCard('b3', { age: 0 }),
    makeCard('b4', {}, {
      season: stats({
        games: 4,
        contribution: 140,
        backupGames: 4,
        backupContribution: 140,
      }),
    }),
  ];
  return makeLeague(
    [alpha, bravo],
    cards,
    { playoffs: finishedPlayoffs(), phase: 'offseason' },
    { minAwardGames: 3 },
  );
}

describe('calculateAwards', () => {
  it('scores every award from the season stat lines', () => {
    const awards = calculateAwards(awardsLeague());

    expect(awards).toEqual({
      MVP: { award: 'MVP', card: 'a1', teamId: 'alpha', score: 46 },
      DPOY: { award: 'DPOY', card: 'b2', teamId: 'bravo', score: 57.6 },
      'Sixth Man': {
        award: 'Sixth Man',
        card: 'b4',
        teamId: 'bravo',
        score: 35,
      },
      ROY: { award: 'ROY', card: 'a3', teamId: 'alpha', score: 34.5 },
      'Finals MVP': {
        award: 'Finals MVP',
        card: 'a2',
        teamId: 'alpha',
        score: 40,
      },
    });
  });

  it('does not change the league', () => {
    const league = awardsLeague();
    const before = JSON.stringify(league);

    calculateAwards(league);

    expect(JSON.stringify(league)).toBe(before);
  });

  it('breaks ties on base rating', () => {
    const team = makeTeam('alpha', ['x1', 'x2', 'x3', 'x4']);
    const season = stats({ games: 5, contribution: 200 });
    const league = makeLeague(
      [team],
      [
        makeCard('x1', {}, { baseRating: 70, season: { ...season } }),
        makeCard('x2', {}, { baseRating: 80, season: { ...season } }),
        makeCard('x3'),
        makeCard('x4'),
      ],
      {},
      { minAwardGames: 3 },
    );

    expect(calculateAwards(league).MVP?.card).toBe('x2');
  });

  it('leaves an award empty when nobody qualifies', () => {
    const league = makeLeague([], [makeCard('idle')]);

    expect(calculateAwards(league)).toEqual({
      MVP: null,
      DPOY: null,
      'Sixth Man': null,
      ROY: null,
      'Finals MVP': null,
    });
  });
});

describe('applyAwardCostBumps', () => {
  function mvpOnly(card: string, teamId: string): SeasonAwards {
    return {
      MVP: { award: 'MVP', card, teamId, score: 50 },
      DPOY: null,
      'Sixth Man': null,
      ROY: null,
      'Finals MVP': null,
    };
  }

  it('adds the full bump when the owner has room', () => {
    const league = makeLeague(
      [makeTeam('alpha', ['a1', 'a2', 'a3', 'a4'])],
      ['a1', 'a2', 'a3', 'a4'].map((name) => makeCard(name)),
    );

    applyAwardCostBumps(league, mvpOnly('a1', 'alpha'));

    expect(league.cards['a1'].cost).toBe(2.17);
  });

  it('limits the bump to the cap room the owner has left', () => {
    const costs = [5, 5, 5, 4.9];
    const league = makeLeague(
      [makeTeam('alpha', ['a1', 'a2', 'a3', 'a4'])],
      ['a1', 'a2', 'a3', 'a4'].map((name, i) =>
        makeCard(name, {}, { cost: costs[i] }),
      ),
    );

    applyAwardCostBumps(league, mvpOnly('a1', 'alpha'));

    expect(league.cards['a1'].cost).toBe(5.1);
  });
});

describe('finalizeAwards', () => {
  it('labels winners, bumps costs and stores the result once', () => {
    const league = awardsLeague();

    const awards = finalizeAwards(league);

    expect(league.awards).toBe(awards);
    expect(league.cards['a1'].awards).toEqual(['MVP S1']);
    expect(league.cards['a2'].awards).toEqual(['Finals MVP S1']);
    expect(league.cards['b4'].awards).toEqual(['Sixth Man S1']);
    expect(league.cards['a1'].cost).toBe(2.17);
    expect(
      league.transactions.filter((t) => t.kind === 'award'),
    ).toHaveLength(5);

    expect(finalizeAwards(league)).toBe(awards);
    expect(league.cards['a1'].awards).toEqual(['MVP S1']);
  });

  it('waits for the offseason', () => {
    const league = awardsLeague();
    league.phase = 'playoffs';

    expect(() => finalizeAwards(league)).toThrow(InvalidPhaseError);
    expect(league.awards).toBeNull();
  });
});
