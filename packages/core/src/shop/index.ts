// ============================================================================
// CARDLEAGUE - Shop
// ============================================================================
// Temporary boosts bought with spare cap room

import type { ActiveBoost, League, ShopItem } from '../types';
import { InvalidPhaseError, NotFoundError } from '../errors';
import { getCard } from '../card';
import { getTeam, rosterOf, validateCap } from '../team';
import { logTransaction } from '../history';
import { SHOP_ITEMS } from '../data';

export function getShopCatalog(): ShopItem[] {
  return SHOP_ITEMS.map((item) => ({ ...item }));
}

export function getShopItem(itemKey: string): ShopItem {
  const item = SHOP_ITEMS.find((i) => i.key === itemKey);
  if (!item) {
    throw new NotFoundError(`Shop item "${itemKey}" not found`);
  }
  return item;
}

/**
 * Buy a boost for a team. Card-targeted items need a card on the team's
 * roster. The item's cap cost is held until its countdown runs out; a
 * stamina reset refreshes the card at once.
 */
export function purchaseShopItem(
  league: League,
  teamId: string,
  itemKey: string,
  target: string | null = null,
): ActiveBoost {
  if (league.phase !== 'regular-season' && league.phase !== 'playoffs') {
    throw new InvalidPhaseError(`The shop is closed during ${league.phase}`);
  }

  const item = getShopItem(itemKey);
  const team = getTeam(league, teamId);

  let targetName: string | null = null;
  if (item.kind !== 'team-rating') {
    if (!target || !rosterOf(team).includes(target)) {
      throw new NotFoundError(
        `${item.label} needs a target card on ${team.name}`,
      );
    }
    targetName = target;
  }

  validateCap(league, team, rosterOf(team), item.capCost);

  const boost: ActiveBoost = {
    itemKey: item.key,
    kind: item.kind,
    amount: item.amount,
    target: targetName,
    gamesLeft: item.games,
    capCost: item.capCost,
  };
  team.boosts.push(boost);

  if (item.kind === 'fatigue-reset' && targetName) {
    getCard(league, targetName).fatigue = 100;
  }

  logTransaction(
    league,
    'shop',
    targetName
      ? `${team.name} bought ${item.label} for ${targetName}`
      : `${team.name} bought ${item.label}`,
  );
  return boost;
}
