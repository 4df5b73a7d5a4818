// ============================================================================
// CARDLEAGUE - League Session
// ============================================================================
// The single engine this process serves. Commands run one at a time in the
// order they arrive.

import { LeagueEngine, type LeagueConfig } from '@cardleague/core';
import type { LeagueStore } from './store';
import type { SavedLeague } from '../types/league.types';

export interface LeagueSessionOptions {
  store: LeagueStore;
  seed: string;
  /** Overrides applied when a new league is created */
  leagueConfig?: Partial<LeagueConfig>;
}

export interface ResetOptions {
  seed?: string;
  config?: Partial<LeagueConfig>;
}

export class LeagueSession {
  private engine: LeagueEngine | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly options: LeagueSessionOptions) {}

  /** Loaded save, or a fresh league from the configured seed */
  private async current(): Promise<LeagueEngine> {
    if (this.engine) return this.engine;

    const saved = await this.options.store.load();
    if (saved) {
      this.engine = new LeagueEngine(saved.league);
      console.info('league.session.loaded', {
        saveId: saved.saveId,
        season: saved.league.season,
        week: saved.league.week,
      });
    } else {
      this.engine = LeagueEngine.create({
        seed: this.options.seed,
        config: this.options.leagueConfig,
      });
      console.info('league.session.created', { seed: this.options.seed });
    }
    return this.engine;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.queue.then(task);
    // The caller sees the rejection through `next`; the queue only keeps order
    this.queue = next.catch(() => undefined);
    return next;
  }

  run<T>(command: (engine: LeagueEngine) => T): Promise<T> {
    return this.enqueue(async () => command(await this.current()));
  }

  /** Replace the league with a brand-new one; nothing is saved */
  reset(options: ResetOptions = {}): Promise<LeagueEngine> {
    return this.enqueue(async () => {
      const seed = options.seed ?? this.options.seed;
      this.engine = LeagueEngine.create({
        seed,
        config: { ...this.options.leagueConfig, ...options.config },
      });
      console.info('league.session.reset', { seed });
      return this.engine;
    });
  }

  save(): Promise<SavedLeague> {
    return this.enqueue(async () => {
      const engine = await this.current();
      return this.options.store.save(engine.toJSON());
    });
  }
}
