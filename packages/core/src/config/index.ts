// ============================================================================
// CARDLEAGUE - League Configuration
// ============================================================================
// Tunable parameters for league structure and simulation balance

import { InvalidConfigError } from '../errors';

/**
 * Configuration for league structure and game balance.
 * The fatigue and power coefficients only shape balance; the structural
 * values (teams, weeks, playoff format) are validated together.
 */
export interface LeagueConfig {
  // Structure
  teamCount: number;
  salaryCap: number;
  totalWeeks: number;
  /** Regular-season games per team; must split evenly across weeks */
  gamesPerTeam: number;
  playoffTeams: number;
  /** Series length per playoff round, first round first */
  playoffBestOf: number[];

  // Card pool
  minCardPool: number;
  maxCardPool: number;

  // Fatigue
  /** Starters below this fatigue are replaced by a fresher backup */
  substitutionThreshold: number;
  /** Power multiplier of a fully fatigued card (linear up to 1 at 100) */
  fatigueFloor: number;
  fatigueDrainMin: number;
  fatigueDrainMax: number;
  benchRecoveryMin: number;
  benchRecoveryMax: number;
  /** Recovery every card gets when a week (or playoff round) closes */
  weeklyRecovery: number;

  // Game simulation
  /** Power multiplier per chemistry point away from 50 */
  chemistryWeight: number;
  homeAdvantage: number;
  /** Half-width of the uniform score perturbation (0.05 = ±5%) */
  noiseSpread: number;
  rivalryVarianceMultiplier: number;
  scoreDivisor: number;
  maxTieRerolls: number;

  // Season end
  minAwardGames: number;
  retirementsPerSeason: number;
  rookiesPerSeason: number;
  /** Cards buffed and cards nerfed by each season patch */
  patchSize: number;
  patchDeltaMax: number;

  // Trades
  /** Rating window the trade finder searches around the outgoing card */
  tradeRatingWindow: number;
}

/**
 * Default configuration: 30 teams, 20 weeks, 40 games, 16-team playoffs
 */
export const DEFAULT_LEAGUE_CONFIG: LeagueConfig = {
  teamCount: 30,
  salaryCap: 20,
  totalWeeks: 20,
  gamesPerTeam: 40,
  playoffTeams: 16,
  playoffBestOf: [3, 5, 5, 7],

  minCardPool: 160,
  maxCardPool: 168,

  substitutionThreshold: 25,
  fatigueFloor: 0.5,
  fatigueDrainMin: 8,
  fatigueDrainMax: 15,
  benchRecoveryMin: 10,
  benchRecoveryMax: 18,
  weeklyRecovery: 4,

  chemistryWeight: 0.002,
  homeAdvantage: 1.03,
  noiseSpread: 0.05,
  rivalryVarianceMultiplier: 2,
  scoreDivisor: 10,
  maxTieRerolls: 3,

  minAwardGames: 10,
  retirementsPerSeason: 3,
  rookiesPerSeason: 4,
  patchSize: 5,
  patchDeltaMax: 4,

  tradeRatingWindow: 8,
};

function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value >= 2 && (value & (value - 1)) === 0;
}

/**
 * Merge overrides onto the defaults and check that the structure is playable
 */
export function resolveLeagueConfig(
  overrides: Partial<LeagueConfig> = {},
): LeagueConfig {
  const config: LeagueConfig = {
    ...DEFAULT_LEAGUE_CONFIG,
    ...overrides,
    playoffBestOf: [
      ...(overrides.playoffBestOf ?? DEFAULT_LEAGUE_CONFIG.playoffBestOf),
    ],
  };

  if (config.teamCount < 2 || config.teamCount % 2 !== 0) {
    throw new InvalidConfigError('teamCount must be an even number >= 2');
  }
  if (config.gamesPerTeam % config.totalWeeks !== 0) {
    throw new InvalidConfigError('gamesPerTeam must split evenly into weeks');
  }
  if (config.gamesPerTeam > 2 * (config.teamCount - 1)) {
    throw new InvalidConfigError(
      'gamesPerTeam cannot exceed a double round-robin',
    );
  }
  if (!isPowerOfTwo(config.playoffTeams)) {
    throw new InvalidConfigError('playoffTeams must be a power of two');
  }
  if (config.playoffTeams > 16) {
    throw new InvalidConfigError('playoffTeams cannot exceed 16');
  }
  if (config.playoffTeams > config.teamCount) {
    throw new InvalidConfigError('playoffTeams cannot exceed teamCount');
  }
  if (config.playoffBestOf.length !== Math.log2(config.playoffTeams)) {
    throw new InvalidConfigError(
      'playoffBestOf needs one series length per playoff round',
    );
  }
  if (config.playoffBestOf.some((n) => n < 1 || n % 2 === 0)) {
    throw new InvalidConfigError('series lengths must be odd and positive');
  }
  if (config.minCardPool > config.maxCardPool) {
    throw new InvalidConfigError('minCardPool cannot exceed maxCardPool');
  }
  if (config.minCardPool < config.teamCount * 4) {
    throw new InvalidConfigError('card pool too small to fill every roster');
  }
  if (config.fatigueFloor < 0 || config.fatigueFloor > 1) {
    throw new InvalidConfigError('fatigueFloor must be within [0, 1]');
  }

  return config;
}

/** Games a team plays inside one week */
export function gamesPerWeek(config: LeagueConfig): number {
  return config.gamesPerTeam / config.totalWeeks;
}

/** Wins needed to take a best-of-N series */
export function winsToClinch(bestOf: number): number {
  return Math.floor(bestOf / 2) + 1;
}
