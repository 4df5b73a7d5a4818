// ============================================================================
// CARDLEAGUE - State Integrity
// ============================================================================
// Referential checks for a league loaded from storage

import type { League } from '../types';
import { CorruptStateError } from '../errors';
import { STARTER_COUNT } from '../team';

/**
 * List every broken reference in a league. Empty means the league is safe
 * to hand to the engine.
 */
export function findIntegrityProblems(league: League): string[] {
  const problems: string[] = [];
  const teamIds = new Set<string>();
  const owners = new Map<string, string>();

  for (const team of league.teams) {
    if (teamIds.has(team.id)) {
      problems.push(`duplicate team id "${team.id}"`);
    }
    teamIds.add(team.id);

    if (team.starters.length !== STARTER_COUNT) {
      problems.push(
        `team "${team.id}" has ${team.starters.length} starters, expected ${STARTER_COUNT}`,
      );
    }
    if (!team.backup) {
      problems.push(`team "${team.id}" has no backup`);
    }

    for (const name of [...team.starters, team.backup]) {
      if (!name) continue;
      if (!(name in league.cards)) {
        problems.push(`team "${team.id}" rosters unknown card "${name}"`);
      }
      const owner = owners.get(name);
      if (owner !== undefined) {
        problems.push(`card "${name}" is rostered by "${owner}" and "${team.id}"`);
      } else {
        owners.set(name, team.id);
      }
    }
  }

  if (league.teams.length !== league.config.teamCount) {
    problems.push(
      `league has ${league.teams.length} teams, config expects ${league.config.teamCount}`,
    );
  }

  for (const [key, card] of Object.entries(league.cards)) {
    if (card.name !== key) {
      problems.push(`card keyed "${key}" is named "${card.name}"`);
    }
    if (key in league.retiredCards) {
      problems.push(`card "${key}" is both active and retired`);
    }
  }

  for (const game of league.calendar) {
    if (!teamIds.has(game.home) || !teamIds.has(game.away)) {
      problems.push(`game "${game.id}" references an unknown team`);
    }
    if (game.home === game.away) {
      problems.push(`game "${game.id}" matches a team against itself`);
    }
    if (game.played !== (game.result !== null)) {
      problems.push(`game "${game.id}" played flag disagrees with its result`);
    }
  }

  for (const seat of league.playoffs?.seeds ?? []) {
    if (!teamIds.has(seat.teamId)) {
      problems.push(`playoff seed ${seat.seed} references an unknown team`);
    }
  }

  if (league.week < 0 || league.week > league.config.totalWeeks) {
    problems.push(`week ${league.week} is outside the season`);
  }

  return problems;
}

export function assertLeagueIntegrity(league: League): void {
  const problems = findIntegrityProblems(league);
  if (problems.length > 0) {
    throw new CorruptStateError(problems);
  }
}
