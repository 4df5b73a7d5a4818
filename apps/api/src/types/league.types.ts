// ============================================================================
// CARDLEAGUE - League Type Definitions
// ============================================================================
// Runtime schemas for the persisted league document and command bodies

import { z } from 'zod';
import type { League, LeagueConfig } from '@cardleague/core';

// =============================================================================
// Zod Schemas for the persisted League
// =============================================================================

const ArchetypeSchema = z.enum(['Tank', 'DPS', 'Control', 'Support', 'Hybrid']);
const AttackTypeSchema = z.enum(['Melee', 'Ranged', 'Splash', 'Magic']);
const GameStageSchema = z.enum(['regular-season', 'playoffs']);
const AwardNameSchema = z.enum(['MVP', 'DPOY', 'Sixth Man', 'ROY', 'Finals MVP']);
const RoundNameSchema = z.enum([
  'round-of-16',
  'quarterfinal',
  'semifinal',
  'final',
]);

const StatLineSchema = z.object({
  games: z.number().int().min(0),
  starts: z.number().int().min(0),
  backupGames: z.number().int().min(0),
  contribution: z.number(),
  backupContribution: z.number(),
  points: z.number(),
  defense: z.number(),
  playoffGames: z.number().int().min(0),
});

const CardSchema = z.object({
  name: z.string().min(1),
  archetype: ArchetypeSchema,
  attackType: AttackTypeSchema,
  attack: z.number().min(0).max(100),
  defense: z.number().min(0).max(100),
  speed: z.number().min(0).max(100),
  baseRating: z.number().min(0).max(100),
  rating: z.number().min(0).max(100),
  grade: z.enum(['S', 'A', 'B', 'C', 'D']),
  cost: z.number().min(0),
  baseCost: z.number().min(0),
  age: z.number().int().min(0),
  lifespan: z.number().int().min(1),
  fatigue: z.number().min(0).max(100),
  season: StatLineSchema,
  career: StatLineSchema,
  awards: z.array(z.string()),
  hofProbability: z.number().min(0).max(100),
  retiredSeason: z.number().int().nullable(),
});

const TeamRecordSchema = z.object({
  wins: z.number().int().min(0),
  losses: z.number().int().min(0),
  pointsFor: z.number().min(0),
  pointsAgainst: z.number().min(0),
  streak: z.number().int(),
});

const BoostKindSchema = z.enum(['rating', 'team-rating', 'fatigue-reset']);

const ActiveBoostSchema = z.object({
  itemKey: z.string(),
  kind: BoostKindSchema,
  amount: z.number(),
  target: z.string().nullable(),
  gamesLeft: z.number().int().min(0),
  capCost: z.number().min(0),
});

const TeamSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  shortName: z.string(),
  owner: z.string(),
  color: z.string(),
  gmPersonality: z.enum([
    'Analyst',
    'Trader',
    'Culture',
    'Risk-Taker',
    'Balanced',
  ]),
  starters: z.array(z.string()),
  backup: z.string(),
  boosts: z.array(ActiveBoostSchema),
  tradeUsed: z.boolean(),
  record: TeamRecordSchema,
  chemistry: z.number().min(0).max(100),
  titles: z.number().int().min(0),
});

const GameLineSchema = z.object({
  card: z.string(),
  teamId: z.string(),
  role: z.enum(['starter', 'backup']),
  power: z.number(),
  contribution: z.number(),
  points: z.number(),
  defense: z.number(),
});

const SubstitutionSchema = z.object({
  teamId: z.string(),
  out: z.string(),
  in: z.string(),
});

const GameResultSchema = z.object({
  homeId: z.string(),
  awayId: z.string(),
  homeScore: z.number().int().min(0),
  awayScore: z.number().int().min(0),
  winnerId: z.string(),
  loserId: z.string(),
  homePower: z.number(),
  awayPower: z.number(),
  rivalry: z.boolean(),
  stage: GameStageSchema,
  tiebreak: z.enum(['none', 'reroll', 'power', 'home']),
  substitutions: z.array(SubstitutionSchema),
  lines: z.array(GameLineSchema),
});

const GameSchema = z.object({
  id: z.string(),
  week: z.number().int().min(1),
  matchday: z.number().int().min(1),
  home: z.string(),
  away: z.string(),
  rivalry: z.boolean(),
  played: z.boolean(),
  result: GameResultSchema.nullable(),
});

const SeriesSeatSchema = z.object({
  teamId: z.string(),
  seed: z.number().int().min(1),
});

const SeriesSchema = z.object({
  round: RoundNameSchema,
  higher: SeriesSeatSchema,
  lower: SeriesSeatSchema,
  winsRequired: z.number().int().min(1),
  games: z.array(GameResultSchema),
  higherWins: z.number().int().min(0),
  lowerWins: z.number().int().min(0),
  winnerId: z.string().nullable(),
});

const PlayoffStateSchema = z.object({
  seeds: z.array(SeriesSeatSchema),
  rounds: z.array(
    z.object({
      name: RoundNameSchema,
      bestOf: z.number().int().min(1),
      series: z.array(SeriesSchema),
    }),
  ),
  championId: z.string().nullable(),
});

const AwardWinnerSchema = z.object({
  award: AwardNameSchema,
  card: z.string(),
  teamId: z.string().nullable(),
  score: z.number(),
});

const SeasonAwardsSchema = z.object({
  MVP: AwardWinnerSchema.nullable(),
  DPOY: AwardWinnerSchema.nullable(),
  'Sixth Man': AwardWinnerSchema.nullable(),
  ROY: AwardWinnerSchema.nullable(),
  'Finals MVP': AwardWinnerSchema.nullable(),
});

const PatchNotesSchema = z.object({
  season: z.number().int().min(1),
  nickname: z.string(),
  changes: z.array(
    z.object({
      card: z.string(),
      kind: z.enum(['buff', 'nerf']),
      before: z.number(),
      after: z.number(),
      delta: z.number(),
    }),
  ),
});

const RetirementEntrySchema = z.object({
  card: z.string(),
  teamId: z.string().nullable(),
  reason: z.enum(['lifespan', 'decline']),
  hofProbability: z.number(),
});

const RookieEntrySchema = z.object({
  card: z.string(),
  archetype: ArchetypeSchema,
  attackType: AttackTypeSchema,
  rating: z.number(),
});

const TransactionSchema = z.object({
  season: z.number().int().min(1),
  week: z.number().int().min(0),
  kind: z.enum([
    'draft',
    'trade',
    'shop',
    'signing',
    'patch',
    'retirement',
    'rookie',
    'award',
    'playoffs',
  ]),
  message: z.string(),
});

const StandingEntrySchema = z.object({
  position: z.number().int().min(1),
  teamId: z.string(),
  teamName: z.string(),
  played: z.number().int().min(0),
  wins: z.number().int().min(0),
  losses: z.number().int().min(0),
  pointsFor: z.number(),
  pointsAgainst: z.number(),
  pointDifferential: z.number(),
  streak: z.number().int(),
});

const SeasonArchiveSchema = z.object({
  season: z.number().int().min(1),
  championId: z.string(),
  championName: z.string(),
  awards: SeasonAwardsSchema,
  standings: z.array(StandingEntrySchema),
  playoffs: z.array(
    z.object({
      round: RoundNameSchema,
      higherId: z.string(),
      lowerId: z.string(),
      higherWins: z.number().int(),
      lowerWins: z.number().int(),
      winnerId: z.string(),
    }),
  ),
  patch: PatchNotesSchema.nullable(),
  retirements: z.array(RetirementEntrySchema),
  rookies: z.array(RookieEntrySchema),
  transactions: z.array(TransactionSchema),
});

const RecordMarkSchema = z.object({
  season: z.number().int(),
  teamId: z.string(),
  teamName: z.string(),
  wins: z.number().int(),
  losses: z.number().int(),
});

const LeagueRecordsSchema = z.object({
  bestRecord: RecordMarkSchema.nullable(),
  worstRecord: RecordMarkSchema.nullable(),
  biggestUpset: z
    .object({
      season: z.number().int(),
      stage: GameStageSchema,
      winnerId: z.string(),
      loserId: z.string(),
      score: z.string(),
      powerGap: z.number(),
    })
    .nullable(),
  mostAwardsOneSeason: z
    .object({
      season: z.number().int(),
      card: z.string(),
      count: z.number().int(),
    })
    .nullable(),
});

export const LeagueConfigSchema = z.object({
  teamCount: z.number().int(),
  salaryCap: z.number().positive(),
  totalWeeks: z.number().int().positive(),
  gamesPerTeam: z.number().int().positive(),
  playoffTeams: z.number().int().positive(),
  playoffBestOf: z.array(z.number().int()),
  minCardPool: z.number().int(),
  maxCardPool: z.number().int(),
  substitutionThreshold: z.number(),
  fatigueFloor: z.number(),
  fatigueDrainMin: z.number().int(),
  fatigueDrainMax: z.number().int(),
  benchRecoveryMin: z.number().int(),
  benchRecoveryMax: z.number().int(),
  weeklyRecovery: z.number(),
  chemistryWeight: z.number(),
  homeAdvantage: z.number().positive(),
  noiseSpread: z.number().min(0),
  rivalryVarianceMultiplier: z.number().min(0),
  scoreDivisor: z.number().positive(),
  maxTieRerolls: z.number().int().min(0),
  minAwardGames: z.number().int().min(0),
  retirementsPerSeason: z.number().int().min(0),
  rookiesPerSeason: z.number().int().min(0),
  patchSize: z.number().int().min(0),
  patchDeltaMax: z.number().int().min(1),
  tradeRatingWindow: z.number().min(0),
}) satisfies z.ZodType<LeagueConfig>;

/**
 * Shape check for a league read from disk. Referential checks (rosters,
 * calendar teams) run afterwards in the engine.
 */
export const LeagueStateSchema: z.ZodType<League> = z.object({
  seed: z.string(),
  rngState: z.string(),
  season: z.number().int().min(1),
  week: z.number().int().min(0),
  phase: z.enum(['regular-season', 'playoffs', 'offseason']),
  config: LeagueConfigSchema,
  cards: z.record(z.string(), CardSchema),
  retiredCards: z.record(z.string(), CardSchema),
  teams: z.array(TeamSchema),
  calendar: z.array(GameSchema),
  headToHead: z.record(
    z.string(),
    z.object({
      games: z.number().int().min(0),
      wins: z.record(z.string(), z.number().int().min(0)),
    }),
  ),
  playoffs: PlayoffStateSchema.nullable(),
  awards: SeasonAwardsSchema.nullable(),
  patch: PatchNotesSchema.nullable(),
  retirements: z.array(RetirementEntrySchema).nullable(),
  rookies: z.array(RookieEntrySchema),
  transactions: z.array(TransactionSchema),
  history: z.array(SeasonArchiveSchema),
  records: LeagueRecordsSchema,
  nextCardNumber: z.number().int().min(1),
});

/**
 * Document written to the state file
 */
export const SavedLeagueSchema = z.object({
  saveId: z.string().min(1),
  savedAt: z.string(),
  league: LeagueStateSchema,
});

// =============================================================================
// Zod Schemas for request bodies
// =============================================================================

export const ResetRequestSchema = z.object({
  seed: z.string().min(1).max(200).optional(),
  config: LeagueConfigSchema.partial().optional(),
});

export const TradeRequestSchema = z.object({
  teamA: z.string().min(1),
  cardOut: z.string().min(1),
  teamB: z.string().min(1),
  cardIn: z.string().min(1),
});

export const TradeOffersQuerySchema = z.object({
  teamId: z.string().min(1),
  card: z.string().min(1),
});

export const ShopPurchaseRequestSchema = z.object({
  teamId: z.string().min(1),
  itemKey: z.string().min(1),
  target: z.string().min(1).nullable().optional(),
});

export const HallOfFameQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

// =============================================================================
// TypeScript Types (inferred from schemas)
// =============================================================================

export type SavedLeague = z.infer<typeof SavedLeagueSchema>;

export type ResetRequest = z.infer<typeof ResetRequestSchema>;

export type TradeRequestBody = z.infer<typeof TradeRequestSchema>;

export type ShopPurchaseRequest = z.infer<typeof ShopPurchaseRequestSchema>;
