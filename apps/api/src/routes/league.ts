// ============================================================================
// CARDLEAGUE - League Routes
// ============================================================================
// One route per engine command. Errors are thrown to the app's onError,
// which maps them to status codes.

import { Hono, type Context } from 'hono';
import { z } from 'zod';
import type { AppEnv } from '../index';
import {
  HallOfFameQuerySchema,
  ResetRequestSchema,
  ShopPurchaseRequestSchema,
  TradeOffersQuerySchema,
  TradeRequestSchema,
} from '../types/league.types';

export const leagueRoutes = new Hono<AppEnv>();

async function parseBody<S extends z.ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
): Promise<z.infer<S>> {
  const text = await c.req.text();
  let json: unknown = {};
  if (text.trim()) {
    try {
      json = JSON.parse(text);
    } catch {
      throw new z.ZodError([
        {
          code: z.ZodIssueCode.custom,
          path: [],
          message: 'Request body is not valid JSON',
        },
      ]);
    }
  }
  return schema.parse(json);
}

function leagueSummary(c: Context<AppEnv>) {
  return c.var.session.run((engine) => {
    const state = engine.getState();
    return {
      seed: state.seed,
      season: state.season,
      week: state.week,
      phase: state.phase,
      teams: state.teams.length,
      cards: Object.keys(state.cards).length,
    };
  });
}

// =============================================================================
// STATE & SAVES
// =============================================================================

/**
 * GET /league/state
 * The whole league document
 */
leagueRoutes.get('/state', async (c) => {
  const state = await c.var.session.run((engine) => engine.toJSON());
  return c.json(state);
});

/**
 * POST /league/reset
 * Start a new league, optionally from a given seed and config overrides
 */
leagueRoutes.post('/reset', async (c) => {
  const body = await parseBody(c, ResetRequestSchema);
  await c.var.session.reset({ seed: body.seed, config: body.config });
  const summary = await leagueSummary(c);
  console.info('league.reset', summary);
  return c.json(summary, 201);
});

/**
 * POST /league/save
 * Persist the current league to the state file
 */
leagueRoutes.post('/save', async (c) => {
  const saved = await c.var.session.save();
  return c.json({
    saveId: saved.saveId,
    savedAt: saved.savedAt,
    season: saved.league.season,
    week: saved.league.week,
  });
});

// =============================================================================
// REGULAR SEASON
// =============================================================================

leagueRoutes.post('/advance-week', async (c) => {
  const report = await c.var.session.run((engine) => engine.advanceWeek());
  console.info('league.week.advanced', {
    week: report.week,
    games: report.games.length,
  });
  return c.json(report);
});

leagueRoutes.post('/advance-matchday', async (c) => {
  const report = await c.var.session.run((engine) => engine.advanceMatchday());
  console.info('league.matchday.advanced', {
    week: report.week,
    matchday: report.matchday,
    games: report.games.length,
  });
  return c.json(report);
});

leagueRoutes.get('/standings', async (c) => {
  const standings = await c.var.session.run((engine) => engine.getStandings());
  return c.json(standings);
});

// =============================================================================
// PLAYOFFS
// =============================================================================

/**
 * POST /league/playoffs
 * Play every remaining round to a champion
 */
leagueRoutes.post('/playoffs', async (c) => {
  const playoffs = await c.var.session.run((engine) => engine.runPlayoffs());
  console.info('league.playoffs.completed', {
    championId: playoffs.championId,
  });
  return c.json(playoffs);
});

/**
 * POST /league/playoffs/round
 * Play only the current round (seeding first if needed)
 */
leagueRoutes.post('/playoffs/round', async (c) => {
  const round = await c.var.session.run((engine) =>
    engine.advancePlayoffRound(),
  );
  console.info('league.playoffs.round', {
    round: round.name,
    series: round.series.length,
  });
  return c.json(round);
});

// =============================================================================
// TRADES & SHOP
// =============================================================================

leagueRoutes.post('/trade', async (c) => {
  const body = await parseBody(c, TradeRequestSchema);
  const receipt = await c.var.session.run((engine) =>
    engine.proposeTrade(body),
  );
  console.info('league.trade.completed', receipt);
  return c.json(receipt);
});

/**
 * GET /league/trade/offers?teamId=...&card=...
 */
leagueRoutes.get('/trade/offers', async (c) => {
  const query = TradeOffersQuerySchema.parse(c.req.query());
  const offers = await c.var.session.run((engine) =>
    engine.findTradeOffers(query.teamId, query.card),
  );
  return c.json(offers);
});

leagueRoutes.get('/shop', async (c) => {
  const items = await c.var.session.run((engine) => engine.getShopCatalog());
  return c.json(items);
});

leagueRoutes.post('/shop', async (c) => {
  const body = await parseBody(c, ShopPurchaseRequestSchema);
  const boost = await c.var.session.run((engine) =>
    engine.purchaseShopItem(body),
  );
  console.info('league.shop.purchased', {
    teamId: body.teamId,
    itemKey: boost.itemKey,
    target: boost.target,
  });
  return c.json(boost, 201);
});

// =============================================================================
// SEASON END
// =============================================================================

leagueRoutes.get('/awards/preview', async (c) => {
  const awards = await c.var.session.run((engine) => engine.previewAwards());
  return c.json(awards);
});

leagueRoutes.post('/patch', async (c) => {
  const notes = await c.var.session.run((engine) => engine.applyPatch());
  console.info('league.patch.applied', {
    season: notes.season,
    nickname: notes.nickname,
    changes: notes.changes.length,
  });
  return c.json(notes);
});

leagueRoutes.post('/season/complete', async (c) => {
  const archive = await c.var.session.run((engine) => engine.completeSeason());
  console.info('league.season.completed', {
    season: archive.season,
    championId: archive.championId,
  });
  return c.json(archive);
});

leagueRoutes.get('/history', async (c) => {
  const history = await c.var.session.run((engine) => engine.getHistory());
  return c.json(history);
});

/**
 * GET /league/hall-of-fame?limit=10
 */
leagueRoutes.get('/hall-of-fame', async (c) => {
  const { limit } = HallOfFameQuerySchema.parse(c.req.query());
  const cards = await c.var.session.run((engine) =>
    engine.getHallOfFame(limit),
  );
  return c.json(cards);
});
