// ============================================================================
// CARDLEAGUE - Core Types
// ============================================================================

import type { LeagueConfig } from '../config';
import type { SeededRNG } from '../rng';

// Card archetypes (role in a trio)
export type Archetype = 'Tank' | 'DPS' | 'Control' | 'Support' | 'Hybrid';

// How a card deals damage
export type AttackType = 'Melee' | 'Ranged' | 'Splash' | 'Magic';

export const ARCHETYPES: Archetype[] = [
  'Tank',
  'DPS',
  'Control',
  'Support',
  'Hybrid',
];

export const ATTACK_TYPES: AttackType[] = ['Melee', 'Ranged', 'Splash', 'Magic'];

export type CardGrade = 'S' | 'A' | 'B' | 'C' | 'D';

// Accumulated usage for a card (one per season, one for the career)
export interface CardStatLine {
  games: number;
  starts: number;
  backupGames: number;
  contribution: number; // Sum of per-game contribution % (0-100 each)
  backupContribution: number;
  points: number; // Share of team scores
  defense: number; // Sum of per-game effective defense
  playoffGames: number;
}

// Card entity (a "player" of the league)
export interface Card {
  name: string; // Unique key across active and retired cards
  archetype: Archetype;
  attackType: AttackType;
  attack: number; // 0-100
  defense: number; // 0-100
  speed: number; // 0-100
  baseRating: number; // Rating when the card entered the league
  rating: number; // 0-100, moved by patches
  grade: CardGrade;
  cost: number; // Salary points
  baseCost: number;
  age: number; // Completed seasons
  lifespan: number; // Seasons before forced retirement
  fatigue: number; // 0-100, 100 = fresh
  season: CardStatLine;
  career: CardStatLine;
  awards: string[]; // e.g. "MVP S2"
  hofProbability: number; // 0-100
  retiredSeason: number | null;
}

export type GmPersonality =
  | 'Analyst'
  | 'Trader'
  | 'Culture'
  | 'Risk-Taker'
  | 'Balanced';

export interface TeamRecord {
  wins: number;
  losses: number;
  pointsFor: number;
  pointsAgainst: number;
  streak: number; // +N win streak, -N losing streak
}

export type BoostKind = 'rating' | 'team-rating' | 'fatigue-reset';

// Shop catalogue entry
export interface ShopItem {
  key: string;
  label: string;
  kind: BoostKind;
  amount: number;
  games: number; // Games the cap allocation (and effect) lasts
  capCost: number;
}

export interface ActiveBoost {
  itemKey: string;
  kind: BoostKind;
  amount: number;
  target: string | null; // Card name, null for team-wide
  gamesLeft: number;
  capCost: number;
}

// Team entity
export interface Team {
  id: string;
  name: string;
  shortName: string;
  owner: string;
  color: string;
  gmPersonality: GmPersonality;
  starters: string[]; // Exactly 3 card names
  backup: string; // Card name
  boosts: ActiveBoost[];
  tradeUsed: boolean;
  record: TeamRecord;
  chemistry: number; // 0-100, derived from starter synergy
  titles: number;
}

export type GameStage = 'regular-season' | 'playoffs';

// One card's share of a played game
export interface CardGameLine {
  card: string;
  teamId: string;
  role: 'starter' | 'backup';
  power: number;
  contribution: number; // % of the side's power
  points: number;
  defense: number;
}

export interface Substitution {
  teamId: string;
  out: string;
  in: string;
}

export type TiebreakMethod = 'none' | 'reroll' | 'power' | 'home';

export interface GameResult {
  homeId: string;
  awayId: string;
  homeScore: number;
  awayScore: number;
  winnerId: string;
  loserId: string;
  homePower: number;
  awayPower: number;
  rivalry: boolean;
  stage: GameStage;
  tiebreak: TiebreakMethod;
  substitutions: Substitution[];
  lines: CardGameLine[];
}

// Scheduled regular-season game
export interface Game {
  id: string;
  week: number;
  matchday: number; // Slot inside the week
  home: string;
  away: string;
  rivalry: boolean;
  played: boolean;
  result: GameResult | null;
}

export type PlayoffRoundName =
  | 'round-of-16'
  | 'quarterfinal'
  | 'semifinal'
  | 'final';

export interface SeriesSeat {
  teamId: string;
  seed: number;
}

export interface Series {
  round: PlayoffRoundName;
  higher: SeriesSeat;
  lower: SeriesSeat;
  winsRequired: number;
  games: GameResult[];
  higherWins: number;
  lowerWins: number;
  winnerId: string | null;
}

export interface PlayoffRound {
  name: PlayoffRoundName;
  bestOf: number;
  series: Series[];
}

export interface PlayoffState {
  seeds: SeriesSeat[];
  rounds: PlayoffRound[];
  championId: string | null;
}

// Regular-season meetings between two teams, keyed by pairKey()
export interface HeadToHeadRecord {
  games: number;
  wins: Record<string, number>;
}

export type AwardName = 'MVP' | 'DPOY' | 'Sixth Man' | 'ROY' | 'Finals MVP';

export const AWARD_NAMES: AwardName[] = [
  'MVP',
  'DPOY',
  'Sixth Man',
  'ROY',
  'Finals MVP',
];

export interface AwardWinner {
  award: AwardName;
  card: string;
  teamId: string | null;
  score: number;
}

export type SeasonAwards = Record<AwardName, AwardWinner | null>;

export interface PatchChange {
  card: string;
  kind: 'buff' | 'nerf';
  before: number;
  after: number;
  delta: number;
}

export interface PatchNotes {
  season: number;
  nickname: string;
  changes: PatchChange[];
}

export interface RetirementEntry {
  card: string;
  teamId: string | null;
  reason: 'lifespan' | 'decline';
  hofProbability: number;
}

export interface RookieEntry {
  card: string;
  archetype: Archetype;
  attackType: AttackType;
  rating: number;
}

export type TransactionKind =
  | 'draft'
  | 'trade'
  | 'shop'
  | 'signing'
  | 'patch'
  | 'retirement'
  | 'rookie'
  | 'award'
  | 'playoffs';

export interface Transaction {
  season: number;
  week: number;
  kind: TransactionKind;
  message: string;
}

// League standing entry
export interface StandingEntry {
  position: number;
  teamId: string;
  teamName: string;
  played: number;
  wins: number;
  losses: number;
  pointsFor: number;
  pointsAgainst: number;
  pointDifferential: number;
  streak: number;
}

export interface ArchivedSeries {
  round: PlayoffRoundName;
  higherId: string;
  lowerId: string;
  higherWins: number;
  lowerWins: number;
  winnerId: string;
}

// Immutable record of a finished season
export interface SeasonArchive {
  season: number;
  championId: string;
  championName: string;
  awards: SeasonAwards;
  standings: StandingEntry[];
  playoffs: ArchivedSeries[];
  patch: PatchNotes | null;
  retirements: RetirementEntry[];
  rookies: RookieEntry[];
  transactions: Transaction[];
}

export interface RecordMark {
  season: number;
  teamId: string;
  teamName: string;
  wins: number;
  losses: number;
}

export interface UpsetMark {
  season: number;
  stage: GameStage;
  winnerId: string;
  loserId: string;
  score: string;
  powerGap: number;
}

export interface AwardHaulMark {
  season: number;
  card: string;
  count: number;
}

export interface LeagueRecords {
  bestRecord: RecordMark | null;
  worstRecord: RecordMark | null;
  biggestUpset: UpsetMark | null;
  mostAwardsOneSeason: AwardHaulMark | null;
}

export type LeaguePhase = 'regular-season' | 'playoffs' | 'offseason';

// The aggregate root: one League is the entire persisted state
export interface League {
  seed: string;
  rngState: string;
  season: number;
  week: number; // Completed weeks of the regular season
  phase: LeaguePhase;
  config: LeagueConfig;
  cards: Record<string, Card>;
  retiredCards: Record<string, Card>;
  teams: Team[];
  calendar: Game[];
  headToHead: Record<string, HeadToHeadRecord>;
  playoffs: PlayoffState | null;
  awards: SeasonAwards | null;
  patch: PatchNotes | null;
  retirements: RetirementEntry[] | null;
  rookies: RookieEntry[];
  transactions: Transaction[];
  history: SeasonArchive[];
  records: LeagueRecords;
  nextCardNumber: number;
}

// Everything a command needs besides the league itself
export interface SimulationContext {
  rng: SeededRNG;
  config: LeagueConfig;
}

// Stable key for an unordered pair of team ids
export function pairKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

export function createEmptyStatLine(): CardStatLine {
  return {
    games: 0,
    starts: 0,
    backupGames: 0,
    contribution: 0,
    backupContribution: 0,
    points: 0,
    defense: 0,
    playoffGames: 0,
  };
}

export function createEmptyRecord(): TeamRecord {
  return { wins: 0, losses: 0, pointsFor: 0, pointsAgainst: 0, streak: 0 };
}

export function createEmptyRecords(): LeagueRecords {
  return {
    bestRecord: null,
    worstRecord: null,
    biggestUpset: null,
    mostAwardsOneSeason: null,
  };
}

// Average contribution % per game (0 when unused)
export function averageContribution(line: CardStatLine): number {
  return line.games > 0 ? line.contribution / line.games : 0;
}
