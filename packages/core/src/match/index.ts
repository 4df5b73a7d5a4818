// ============================================================================
// CARDLEAGUE - Game Simulator
// ============================================================================
// Resolves a single game between two teams: lineup, power, noisy scores,
// tiebreaks, per-card lines and the fatigue/stat side effects.
// Standings are left to the caller.

import type {
  Card,
  CardGameLine,
  CardStatLine,
  GameResult,
  GameStage,
  League,
  SimulationContext,
  Substitution,
  Team,
  TiebreakMethod,
} from '../types';
import { clamp, fatigueFactor, getCard } from '../card';
import {
  checkFatigueAndSubstitute,
  computeChemistry,
  getTeam,
  type Lineup,
} from '../team';

export interface SimulateGameOptions extends SimulationContext {
  rivalry: boolean;
  stage: GameStage;
}

interface SideSnapshot {
  team: Team;
  lineup: Lineup;
  powers: Map<string, number>;
  rawPower: number;
  power: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// ============================================================================
// POWER
// ============================================================================

/** Rating bonus from shop boosts targeting this card or the whole team */
export function boostFor(team: Team, cardName: string): number {
  return team.boosts.reduce((sum, boost) => {
    if (boost.kind === 'rating' && boost.target === cardName) {
      return sum + boost.amount;
    }
    if (boost.kind === 'team-rating') {
      return sum + boost.amount;
    }
    return sum;
  }, 0);
}

/** (rating + boost) scaled by the fatigue factor */
export function effectiveCardPower(
  card: Card,
  team: Team,
  options: Pick<SimulationContext, 'config'>,
): number {
  return (
    (card.rating + boostFor(team, card.name)) *
    fatigueFactor(card.fatigue, options.config)
  );
}

function snapshotSide(
  league: League,
  team: Team,
  isHome: boolean,
  options: SimulateGameOptions,
): SideSnapshot {
  const { config } = options;
  const lineup = checkFatigueAndSubstitute(league, team, config);
  const powers = new Map<string, number>();
  for (const name of lineup.active) {
    powers.set(name, effectiveCardPower(getCard(league, name), team, options));
  }

  const rawPower = [...powers.values()].reduce((sum, p) => sum + p, 0);
  const chemistry = computeChemistry(league, team, lineup.active);
  let power = rawPower * (1 + (chemistry - 50) * config.chemistryWeight);
  if (isHome) {
    power *= config.homeAdvantage;
  }

  return { team, lineup, powers, rawPower, power };
}

// ============================================================================
// SCORING
// ============================================================================

function rollScore(
  power: number,
  spread: number,
  options: SimulateGameOptions,
): number {
  const noise = options.rng.range(1 - spread, 1 + spread);
  return Math.max(0, Math.round((power * noise) / options.config.scoreDivisor));
}

interface Scoreline {
  homeScore: number;
  awayScore: number;
  tiebreak: TiebreakMethod;
}

/**
 * Noisy scores; a tie is re-rolled without the rivalry multiplier, then
 * settled by the higher power, then by home side
 */
function resolveScoreline(
  home: SideSnapshot,
  away: SideSnapshot,
  options: SimulateGameOptions,
): Scoreline {
  const { config } = options;
  const spread =
    config.noiseSpread *
    (options.rivalry ? config.rivalryVarianceMultiplier : 1);

  let homeScore = rollScore(home.power, spread, options);
  let awayScore = rollScore(away.power, spread, options);
  if (homeScore !== awayScore) {
    return { homeScore, awayScore, tiebreak: 'none' };
  }

  for (let i = 0; i < config.maxTieRerolls; i++) {
    homeScore = rollScore(home.power, config.noiseSpread, options);
    awayScore = rollScore(away.power, config.noiseSpread, options);
    if (homeScore !== awayScore) {
      return { homeScore, awayScore, tiebreak: 'reroll' };
    }
  }

  if (home.power !== away.power) {
    return home.power > away.power
      ? { homeScore: homeScore + 1, awayScore, tiebreak: 'power' }
      : { homeScore, awayScore: awayScore + 1, tiebreak: 'power' };
  }
  return { homeScore: homeScore + 1, awayScore, tiebreak: 'home' };
}

// ============================================================================
// SIDE EFFECTS
// ============================================================================

function buildLines(
  league: League,
  side: SideSnapshot,
  score: number,
  options: SimulateGameOptions,
): CardGameLine[] {
  return side.lineup.active.map((name): CardGameLine => {
    const card = getCard(league, name);
    const power = side.powers.get(name) ?? 0;
    const share = side.rawPower > 0 ? power / side.rawPower : 0;
    return {
      card: name,
      teamId: side.team.id,
      role: name === side.team.backup ? 'backup' : 'starter',
      power: round2(power),
      contribution: round2(share * 100),
      points: round2(score * share),
      defense: round2(card.defense * fatigueFactor(card.fatigue, options.config)),
    };
  });
}

function recordLine(
  stats: CardStatLine,
  line: CardGameLine,
  stage: GameStage,
): void {
  stats.games += 1;
  stats.contribution = round2(stats.contribution + line.contribution);
  stats.points = round2(stats.points + line.points);
  stats.defense = round2(stats.defense + line.defense);
  if (line.role === 'starter') {
    stats.starts += 1;
  } else {
    stats.backupGames += 1;
    stats.backupContribution = round2(
      stats.backupContribution + line.contribution,
    );
  }
  if (stage === 'playoffs') {
    stats.playoffGames += 1;
  }
}

function applyFatigue(
  league: League,
  side: SideSnapshot,
  lines: CardGameLine[],
  options: SimulateGameOptions,
): void {
  const { config, rng } = options;
  for (const line of lines) {
    const card = getCard(league, line.card);
    const usage = 0.5 + 1.5 * (line.contribution / 100);
    const drain = rng.int(config.fatigueDrainMin, config.fatigueDrainMax) * usage;
    card.fatigue = round2(clamp(card.fatigue - drain, 0, 100));
  }

  for (const name of side.lineup.benched) {
    if (!side.team.starters.includes(name)) continue;
    const card = getCard(league, name);
    const recovery = rng.int(config.benchRecoveryMin, config.benchRecoveryMax);
    card.fatigue = round2(clamp(card.fatigue + recovery, 0, 100));
  }
}

function tickBoosts(team: Team): void {
  team.boosts = team.boosts
    .map((boost) => ({ ...boost, gamesLeft: boost.gamesLeft - 1 }))
    .filter((boost) => boost.gamesLeft > 0);
}

// ============================================================================
// SIMULATION
// ============================================================================

/**
 * Play one game. Mutates card fatigue, card stats and boost countdowns;
 * never touches standings.
 */
export function simulateGame(
  league: League,
  homeId: string,
  awayId: string,
  options: SimulateGameOptions,
): GameResult {
  const home = snapshotSide(league, getTeam(league, homeId), true, options);
  const away = snapshotSide(league, getTeam(league, awayId), false, options);

  const { homeScore, awayScore, tiebreak } = resolveScoreline(
    home,
    away,
    options,
  );
  const homeWon = homeScore > awayScore;

  const homeLines = buildLines(league, home, homeScore, options);
  const awayLines = buildLines(league, away, awayScore, options);

  applyFatigue(league, home, homeLines, options);
  applyFatigue(league, away, awayLines, options);

  for (const line of [...homeLines, ...awayLines]) {
    const card = getCard(league, line.card);
    recordLine(card.season, line, options.stage);
    recordLine(card.career, line, options.stage);
  }

  tickBoosts(home.team);
  tickBoosts(away.team);

  const substitutions: Substitution[] = [];
  for (const side of [home, away]) {
    if (side.lineup.substitution) {
      substitutions.push(side.lineup.substitution);
    }
  }

  return {
    homeId,
    awayId,
    homeScore,
    awayScore,
    winnerId: homeWon ? homeId : awayId,
    loserId: homeWon ? awayId : homeId,
    homePower: round2(home.power),
    awayPower: round2(away.power),
    rivalry: options.rivalry,
    stage: options.stage,
    tiebreak,
    substitutions,
    lines: [...homeLines, ...awayLines],
  };
}
