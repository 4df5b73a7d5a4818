// ============================================================================
// CARDLEAGUE - Season End Processing
// ============================================================================
// Balance patch, retirements and rookies, archive, rollover to next season

import type {
  ArchivedSeries,
  League,
  PatchChange,
  PatchNotes,
  RetirementEntry,
  RookieEntry,
  SeasonArchive,
  SimulationContext,
  Team,
} from '../types';
import {
  averageContribution,
  createEmptyRecord,
  createEmptyStatLine,
} from '../types';
import { InvalidPhaseError } from '../errors';
import {
  applyCardPatch,
  generateRookies,
  listCards,
  retireCards,
} from '../card';
import {
  findCardOwner,
  getTeam,
  refreshChemistry,
  signReplacement,
} from '../team';
import { PATCH_NICKNAMES } from '../data';
import {
  logTransaction,
  updateHallOfFame,
  updateSeasonRecords,
} from '../history';
import { finalizeAwards } from './awards';
import { generateCalendar, getStandings } from './index';

function assertOffseason(league: League, action: string): void {
  if (league.phase !== 'offseason') {
    throw new InvalidPhaseError(`${action} is only possible in the offseason`);
  }
}

// ============================================================================
// PATCH
// ============================================================================

/**
 * Nerf the top over-performers and buff the bottom under-performers by
 * average contribution. One patch per season.
 */
export function applySeasonPatch(
  league: League,
  ctx: SimulationContext,
): PatchNotes {
  assertOffseason(league, 'A balance patch');
  if (league.patch) {
    throw new InvalidPhaseError(`Season ${league.season} is already patched`);
  }

  const { rng, config } = ctx;
  const ranked = listCards(league)
    .filter((c) => c.season.games >= config.minAwardGames)
    .sort(
      (a, b) =>
        averageContribution(b.season) - averageContribution(a.season) ||
        a.name.localeCompare(b.name),
    );

  const size = Math.min(config.patchSize, Math.floor(ranked.length / 2));
  const nerfed = ranked.slice(0, size);
  const buffed = size > 0 ? ranked.slice(-size) : [];

  const changes: PatchChange[] = [];
  for (const card of nerfed) {
    const result = applyCardPatch(
      league,
      card.name,
      -rng.int(1, config.patchDeltaMax),
    );
    changes.push({
      card: card.name,
      kind: 'nerf',
      ...pickPatchFields(result),
    });
  }
  for (const card of buffed) {
    const result = applyCardPatch(
      league,
      card.name,
      rng.int(1, config.patchDeltaMax),
    );
    changes.push({
      card: card.name,
      kind: 'buff',
      ...pickPatchFields(result),
    });
  }

  const notes: PatchNotes = {
    season: league.season,
    nickname: rng.pick(PATCH_NICKNAMES),
    changes,
  };
  league.patch = notes;
  logTransaction(
    league,
    'patch',
    `${notes.nickname}: ${nerfed.length} nerfs, ${buffed.length} buffs`,
  );
  return notes;
}

function pickPatchFields(result: {
  before: number;
  after: number;
  delta: number;
}): Pick<PatchChange, 'before' | 'after' | 'delta'> {
  return { before: result.before, after: result.after, delta: result.delta };
}

// ============================================================================
// RETIREMENTS & ROOKIES
// ============================================================================

export interface RetirementReport {
  retirements: RetirementEntry[];
  rookies: RookieEntry[];
}

/**
 * Age every card, retire exactly the configured number, add rookies and
 * sign replacements for rostered retirees. Retirees keep the Hall of Fame
 * probability they had on the way out.
 */
export function processRetirements(
  league: League,
  ctx: SimulationContext,
): RetirementReport {
  assertOffseason(league, 'Retirement');
  if (league.retirements) {
    throw new InvalidPhaseError(
      `Retirements for season ${league.season} are already processed`,
    );
  }

  // Rookie of the Year needs the ages from before the rollover
  finalizeAwards(league);

  const { rng, config } = ctx;
  for (const card of listCards(league)) {
    card.age += 1;
  }
  updateHallOfFame(league);

  const owners = new Map<string, Team>();
  for (const card of listCards(league)) {
    const owner = findCardOwner(league, card.name);
    if (owner) owners.set(card.name, owner);
  }

  const retired = retireCards(league, config.retirementsPerSeason);
  const retirements: RetirementEntry[] = retired.map(({ card, reason }) => {
    logTransaction(league, 'retirement', `${card.name} retired (${reason})`);
    return {
      card: card.name,
      teamId: owners.get(card.name)?.id ?? null,
      reason,
      hofProbability: card.hofProbability,
    };
  });

  const rookies: RookieEntry[] = generateRookies(
    league,
    rng,
    config.rookiesPerSeason,
  ).map((card) => {
    logTransaction(league, 'rookie', `${card.name} joined the league`);
    return {
      card: card.name,
      archetype: card.archetype,
      attackType: card.attackType,
      rating: card.rating,
    };
  });

  const affected = new Set<string>();
  for (const entry of retirements) {
    if (!entry.teamId) continue;
    signReplacement(league, getTeam(league, entry.teamId), entry.card);
    affected.add(entry.teamId);
  }
  for (const teamId of affected) {
    refreshChemistry(league, getTeam(league, teamId));
  }

  league.retirements = retirements;
  league.rookies = rookies;
  return { retirements, rookies };
}

// ============================================================================
// ARCHIVE & ROLLOVER
// ============================================================================

function archivePlayoffs(league: League): ArchivedSeries[] {
  const rounds = league.playoffs?.rounds ?? [];
  return rounds.flatMap((round) =>
    round.series.flatMap((series) =>
      series.winnerId
        ? [
            {
              round: series.round,
              higherId: series.higher.teamId,
              lowerId: series.lower.teamId,
              higherWins: series.higherWins,
              lowerWins: series.lowerWins,
              winnerId: series.winnerId,
            },
          ]
        : [],
    ),
  );
}

/**
 * Append the season to history and roll the league into the next season.
 * Awards and retirements run first if they have not yet.
 */
export function archiveSeason(
  league: League,
  ctx: SimulationContext,
): SeasonArchive {
  assertOffseason(league, 'Archiving');
  const championId = league.playoffs?.championId;
  if (!championId) {
    throw new InvalidPhaseError('The season has no champion yet');
  }

  const awards = finalizeAwards(league);
  const retirements =
    league.retirements ?? processRetirements(league, ctx).retirements;

  const standings = getStandings(league);
  updateSeasonRecords(league, standings, awards);
  updateHallOfFame(league);

  const archive: SeasonArchive = {
    season: league.season,
    championId,
    championName: getTeam(league, championId).name,
    awards,
    standings,
    playoffs: archivePlayoffs(league),
    patch: league.patch,
    retirements,
    rookies: league.rookies,
    transactions: league.transactions,
  };
  league.history.push(archive);

  for (const card of listCards(league)) {
    card.fatigue = 100;
    card.season = createEmptyStatLine();
  }
  for (const team of league.teams) {
    team.record = createEmptyRecord();
    team.boosts = [];
    team.tradeUsed = false;
    refreshChemistry(league, team);
  }

  league.headToHead = {};
  league.playoffs = null;
  league.awards = null;
  league.patch = null;
  league.retirements = null;
  league.rookies = [];
  league.transactions = [];
  league.season += 1;
  league.week = 0;
  league.calendar = generateCalendar(league.teams, ctx.rng, ctx.config);
  league.phase = 'regular-season';

  return archive;
}

/**
 * Full offseason pipeline: awards, patch, retirements and rookies, archive
 */
export function completeSeason(
  league: League,
  ctx: SimulationContext,
): SeasonArchive {
  assertOffseason(league, 'Completing the season');
  finalizeAwards(league);
  if (!league.patch) {
    applySeasonPatch(league, ctx);
  }
  if (!league.retirements) {
    processRetirements(league, ctx);
  }
  return archiveSeason(league, ctx);
}
