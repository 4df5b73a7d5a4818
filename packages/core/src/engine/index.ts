// ============================================================================
// CARDLEAGUE - League Engine
// ============================================================================
// Owns one League, its seeded RNG and its config. Every UI command is a
// method that runs to completion on a working copy; the copy replaces the
// state only when the command succeeds.

import type {
  ActiveBoost,
  Card,
  League,
  PatchNotes,
  PlayoffRound,
  PlayoffState,
  SeasonArchive,
  SeasonAwards,
  ShopItem,
  SimulationContext,
  StandingEntry,
} from '../types';
import { createEmptyRecords } from '../types';
import { resolveLeagueConfig, type LeagueConfig } from '../config';
import { SeededRNG } from '../rng';
import { generateCardPool } from '../card';
import { createTeams, draftTeams } from '../team';
import {
  advanceMatchday,
  advanceWeek,
  generateCalendar,
  getStandings,
  type MatchdayReport,
  type WeekReport,
} from '../season';
import { calculateAwards } from '../season/awards';
import { applySeasonPatch, completeSeason } from '../season/season-end';
import { advancePlayoffRound, runPlayoffs } from '../playoffs';
import { getShopCatalog, purchaseShopItem } from '../shop';
import {
  findTradeOffers,
  proposeTrade,
  type TradeOffer,
  type TradeReceipt,
} from '../transfer';
import { getHallOfFame } from '../history';
import { assertLeagueIntegrity } from '../state';

export interface CreateLeagueOptions {
  seed: string;
  config?: Partial<LeagueConfig>;
}

export interface TradeRequest {
  teamA: string;
  cardOut: string;
  teamB: string;
  cardIn: string;
}

export interface ShopPurchase {
  teamId: string;
  itemKey: string;
  target?: string | null;
}

export class LeagueEngine {
  private state: League;
  private rng: SeededRNG;

  constructor(initial: League) {
    assertLeagueIntegrity(initial);
    this.state = structuredClone(initial);
    this.rng = SeededRNG.deserialize(this.state.seed, this.state.rngState);
  }

  /** Genesis: card pool, teams, snake draft, first calendar */
  static createState(options: CreateLeagueOptions): League {
    const config = resolveLeagueConfig(options.config);
    const rng = new SeededRNG(options.seed);
    const { cards, nextCardNumber } = generateCardPool(rng, config);

    const league: League = {
      seed: options.seed,
      rngState: '',
      season: 1,
      week: 0,
      phase: 'regular-season',
      config,
      cards,
      retiredCards: {},
      teams: createTeams(config),
      calendar: [],
      headToHead: {},
      playoffs: null,
      awards: null,
      patch: null,
      retirements: null,
      rookies: [],
      transactions: [],
      history: [],
      records: createEmptyRecords(),
      nextCardNumber,
    };

    draftTeams(league, rng);
    league.calendar = generateCalendar(league.teams, rng, config);
    league.rngState = rng.serialize();
    return league;
  }

  static create(options: CreateLeagueOptions): LeagueEngine {
    return new LeagueEngine(LeagueEngine.createState(options));
  }

  getState(): Readonly<League> {
    return this.state;
  }

  getRngState(): string {
    return this.rng.serialize();
  }

  /** Detached copy, safe to persist */
  toJSON(): League {
    return structuredClone(this.state);
  }

  private run<T>(command: (league: League, ctx: SimulationContext) => T): T {
    const draft = structuredClone(this.state);
    const rng = SeededRNG.deserialize(draft.seed, this.rng.serialize());
    const result = command(draft, { rng, config: draft.config });
    draft.rngState = rng.serialize();
    this.state = draft;
    this.rng = rng;
    return result;
  }

  // ==========================================================================
  // SEASON
  // ==========================================================================

  advanceWeek(): WeekReport {
    return this.run((league, ctx) => advanceWeek(league, ctx));
  }

  advanceMatchday(): MatchdayReport {
    return this.run((league, ctx) => advanceMatchday(league, ctx));
  }

  getStandings(): StandingEntry[] {
    return getStandings(this.state);
  }

  // ==========================================================================
  // PLAYOFFS
  // ==========================================================================

  runPlayoffs(): PlayoffState {
    return this.run((league, ctx) => runPlayoffs(league, ctx));
  }

  advancePlayoffRound(): PlayoffRound {
    return this.run((league, ctx) => advancePlayoffRound(league, ctx));
  }

  // ==========================================================================
  // ROSTER MANAGEMENT
  // ==========================================================================

  proposeTrade(request: TradeRequest): TradeReceipt {
    return this.run((league) =>
      proposeTrade(
        league,
        request.teamA,
        request.cardOut,
        request.teamB,
        request.cardIn,
      ),
    );
  }

  findTradeOffers(teamId: string, cardName: string): TradeOffer[] {
    return findTradeOffers(this.state, teamId, cardName);
  }

  purchaseShopItem(purchase: ShopPurchase): ActiveBoost {
    return this.run((league) =>
      purchaseShopItem(
        league,
        purchase.teamId,
        purchase.itemKey,
        purchase.target ?? null,
      ),
    );
  }

  getShopCatalog(): ShopItem[] {
    return getShopCatalog();
  }

  // ==========================================================================
  // SEASON END
  // ==========================================================================

  applyPatch(): PatchNotes {
    return this.run((league, ctx) => applySeasonPatch(league, ctx));
  }

  /** Current award standings without deciding anything */
  previewAwards(): SeasonAwards {
    return calculateAwards(this.state);
  }

  completeSeason(): SeasonArchive {
    return this.run((league, ctx) => completeSeason(league, ctx));
  }

  getHistory(): SeasonArchive[] {
    return this.state.history;
  }

  getHallOfFame(limit?: number): Card[] {
    return getHallOfFame(this.state, limit);
  }
}
