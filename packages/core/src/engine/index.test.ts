import { describe, expect, it } from 'vitest';
import { CorruptStateError, InvalidPhaseError, NotFoundError } from '../errors';
import {
  makeCard,
  makeLeague,
  makeTeam,
  SMALL_LEAGUE_CONFIG,
} from '../testing';
import { salaryUsed } from '../team';
import { LeagueEngine } from './index';

function smallEngine(seed = 'engine'): LeagueEngine {
  return LeagueEngine.create({ seed, config: SMALL_LEAGUE_CONFIG });
}

function playRegularSeason(engine: LeagueEngine): void {
  for (let week = 0; week < 4; week++) {
    engine.advanceWeek();
  }
}

describe('LeagueEngine', () => {
  it('produces identical leagues from the same seed and commands', () => {
    const a = smallEngine('same-seed');
    const b = smallEngine('same-seed');

    a.advanceWeek();
    a.advanceMatchday();
    b.advanceWeek();
    b.advanceMatchday();

    expect(a.toJSON()).toEqual(b.toJSON());
  });

  it('continues the same sequence after a save and reload', () => {
    const original = smallEngine('reload');
    original.advanceWeek();

    const reloaded = new LeagueEngine(original.toJSON());
    original.advanceWeek();
    reloaded.advanceWeek();

    expect(reloaded.toJSON()).toEqual(original.toJSON());
    expect(reloaded.getRngState()).toBe(original.getRngState());
  });

  it('stores the generator state in the league after every command', () => {
    const engine = smallEngine();
    engine.advanceMatchday();

    expect(engine.getState().rngState).toBe(engine.getRngState());
  });

  it('leaves the league untouched when a command fails', () => {
    const engine = smallEngine('atomic');
    engine.advanceWeek();
    const before = engine.toJSON();
    const rngBefore = engine.getRngState();

    expect(() => engine.runPlayoffs()).toThrow(InvalidPhaseError);
    expect(() =>
      engine.proposeTrade({
        teamA: before.teams[0].id,
        cardOut: 'Nobody #0',
        teamB: before.teams[1].id,
        cardIn: before.teams[1].backup,
      }),
    ).toThrow(NotFoundError);
    expect(() => engine.completeSeason()).toThrow(InvalidPhaseError);

    expect(engine.toJSON()).toEqual(before);
    expect(engine.getRngState()).toBe(rngBefore);
  });

  it('hands out detached copies from toJSON', () => {
    const engine = smallEngine();
    const copy = engine.toJSON();
    copy.season = 99;

    expect(engine.getState().season).toBe(1);
  });

  it('refuses a corrupt league', () => {
    const league = LeagueEngine.createState({
      seed: 'broken',
      config: SMALL_LEAGUE_CONFIG,
    });
    league.teams[0].backup = 'Nobody #0';

    expect(() => new LeagueEngine(league)).toThrow(CorruptStateError);
  });

  it('previews awards without deciding them', () => {
    const engine = smallEngine('preview');
    playRegularSeason(engine);
    const before = engine.toJSON();

    const preview = engine.previewAwards();

    expect(preview.MVP).not.toBeNull();
    expect(engine.toJSON()).toEqual(before);
  });

  it('runs full seasons end to end', () => {
    const engine = smallEngine('lifecycle');
    const poolSize = Object.keys(engine.getState().cards).length;

    playRegularSeason(engine);
    expect(engine.getStandings().map((s) => s.played)).toEqual(
      Array.from({ length: 8 }, () => 8),
    );

    const purchaseTeam = engine.getState().teams[0];
    engine.purchaseShopItem({
      teamId: purchaseTeam.id,
      itemKey: 'stamina-reset',
      target: purchaseTeam.starters[0],
    });

    const playoffs = engine.runPlayoffs();
    expect(playoffs.championId).not.toBeNull();
    expect(engine.getState().phase).toBe('offseason');

    const patch = engine.applyPatch();
    expect(patch.changes.length).toBeGreaterThan(0);

    const archive = engine.completeSeason();
    expect(archive.championId).toBe(playoffs.championId);
    expect(archive.patch).toEqual(patch);
    expect(engine.getHistory()).toHaveLength(1);
    expect(engine.getHallOfFame()).toHaveLength(3);

    const state = engine.getState();
    expect(state.season).toBe(2);
    expect(state.phase).toBe('regular-season');
    expect(Object.keys(state.cards)).toHaveLength(poolSize + 1);

    playRegularSeason(engine);
    engine.runPlayoffs();
    engine.completeSeason();

    expect(engine.getHistory().map((a) => a.season)).toEqual([1, 2]);
    expect(engine.getHallOfFame()).toHaveLength(6);
    expect(engine.getHallOfFame(2)).toHaveLength(2);
    expect(Object.keys(engine.getState().cards)).toHaveLength(poolSize + 2);
  });

  it('offers trades and records the one it makes', () => {
    // Equal cards: every swap is within the rating window and cap-neutral
    const teams = ['alpha', 'bravo', 'charlie'].map((id) => {
      const prefix = id[0];
      return makeTeam(id, [
        `${prefix}1`,
        `${prefix}2`,
        `${prefix}3`,
        `${prefix}4`,
      ]);
    });
    const cards = teams.flatMap((team) =>
      [...team.starters, team.backup].map((name) => makeCard(name)),
    );
    const engine = new LeagueEngine(makeLeague(teams, cards));

    const offers = engine.findTradeOffers('alpha', 'a1');
    expect(offers).toHaveLength(8);
    expect(offers[0]).toEqual({
      teamId: 'bravo',
      teamName: 'BRAVO',
      card: 'b1',
      rating: 70,
      cost: 1.67,
      ratingGap: 0,
    });

    const receipt = engine.proposeTrade({
      teamA: 'alpha',
      cardOut: 'a1',
      teamB: 'bravo',
      cardIn: 'b1',
    });

    expect(receipt).toEqual({
      teamA: 'alpha',
      teamB: 'bravo',
      cardOut: 'a1',
      cardIn: 'b1',
    });
    expect(engine.getState().teams[0].starters).toEqual(['b1', 'a2', 'a3']);
    expect(engine.getState().transactions.at(-1)?.message).toBe(
      'ALPHA traded a1 to BRAVO for b1',
    );
    expect(engine.findTradeOffers('alpha', 'b1')).toEqual([]);
  });

  it('lists the shop catalogue', () => {
    expect(smallEngine().getShopCatalog()).toHaveLength(4);
  });
});

describe('LeagueEngine at full size', () => {
  function assertUnderCap(engine: LeagueEngine): void {
    const state = engine.getState();
    for (const team of state.teams) {
      expect(salaryUsed(state, team)).toBeLessThanOrEqual(
        state.config.salaryCap,
      );
    }
  }

  function hofSnapshot(engine: LeagueEngine): Map<string, number> {
    const state = engine.getState();
    return new Map(
      [...Object.values(state.cards), ...Object.values(state.retiredCards)].map(
        (card): [string, number] => [card.name, card.hofProbability],
      ),
    );
  }

  it('gives every team fourteen games after seven weeks', () => {
    const engine = LeagueEngine.create({ seed: 'seven-weeks' });
    for (let week = 0; week < 7; week++) {
      engine.advanceWeek();
    }

    const state = engine.getState();
    expect(state.week).toBe(7);
    expect(state.teams).toHaveLength(30);
    for (const team of state.teams) {
      const played = state.calendar.filter(
        (g) => g.played && (g.home === team.id || g.away === team.id),
      );
      expect(played).toHaveLength(14);
      expect(team.record.wins + team.record.losses).toBe(14);
    }
  }, 30_000);

  it('stays under the salary cap through a season and its rollover', () => {
    const engine = LeagueEngine.create({ seed: 'full-season' });
    assertUnderCap(engine);

    for (let week = 0; week < 20; week++) {
      engine.advanceWeek();
      assertUnderCap(engine);
    }
    engine.runPlayoffs();
    assertUnderCap(engine);

    const before = hofSnapshot(engine);
    engine.completeSeason();
    assertUnderCap(engine);

    const after = hofSnapshot(engine);
    for (const [name, probability] of before) {
      expect(after.get(name) ?? 0).toBeGreaterThanOrEqual(probability);
    }
    expect(engine.getState().season).toBe(2);
    expect(engine.getState().calendar).toHaveLength(600);
  }, 30_000);
});
