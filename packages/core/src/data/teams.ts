// ============================================================================
// CARDLEAGUE - Team Seed Data
// ============================================================================
// 30 fictional franchises, used when creating a new league

import type { GmPersonality } from '../types';

export interface TeamSeed {
  id: string;
  name: string;
  shortName: string;
  owner: string;
  color: string;
  gmPersonality: GmPersonality;
}

export const TEAMS: TeamSeed[] = [
  {
    id: 'iron-wardens',
    name: 'Iron Wardens',
    shortName: 'IWD',
    owner: 'Mara Quill',
    color: '#5B6770',
    gmPersonality: 'Analyst',
  },
  {
    id: 'ember-drakes',
    name: 'Ember Drakes',
    shortName: 'EMB',
    owner: 'Tobin Vale',
    color: '#D9481C',
    gmPersonality: 'Risk-Taker',
  },
  {
    id: 'sky-talons',
    name: 'Sky Talons',
    shortName: 'SKY',
    owner: 'Ines Marrow',
    color: '#3A8FD6',
    gmPersonality: 'Trader',
  },
  {
    id: 'reef-sharks',
    name: 'Reef Sharks',
    shortName: 'REF',
    owner: 'Dario Cole',
    color: '#1B7F8C',
    gmPersonality: 'Balanced',
  },
  {
    id: 'dune-stingers',
    name: 'Dune Stingers',
    shortName: 'DUN',
    owner: 'Priya Holt',
    color: '#C8A24A',
    gmPersonality: 'Culture',
  },
  {
    id: 'frost-howlers',
    name: 'Frost Howlers',
    shortName: 'FRO',
    owner: 'Anders Lune',
    color: '#9CC9E8',
    gmPersonality: 'Analyst',
  },
  {
    id: 'crown-lions',
    name: 'Crown Lions',
    shortName: 'CRL',
    owner: 'Selma Okafor',
    color: '#E3B505',
    gmPersonality: 'Balanced',
  },
  {
    id: 'jungle-tigers',
    name: 'Jungle Tigers',
    shortName: 'JUN',
    owner: 'Rafael Brum',
    color: '#F08A24',
    gmPersonality: 'Risk-Taker',
  },
  {
    id: 'bamboo-pandas',
    name: 'Bamboo Pandas',
    shortName: 'BAM',
    owner: 'Lin Wei',
    color: '#2F2F2F',
    gmPersonality: 'Culture',
  },
  {
    id: 'ash-foxes',
    name: 'Ash Foxes',
    shortName: 'ASH',
    owner: 'Corin Blake',
    color: '#B5472F',
    gmPersonality: 'Trader',
  },
  {
    id: 'marsh-frogs',
    name: 'Marsh Frogs',
    shortName: 'MAR',
    owner: 'Hedda Strand',
    color: '#5E9E3A',
    gmPersonality: 'Balanced',
  },
  {
    id: 'granite-bears',
    name: 'Granite Bears',
    shortName: 'GRB',
    owner: 'Owen Pratt',
    color: '#6B4F3A',
    gmPersonality: 'Analyst',
  },
  {
    id: 'prism-unicorns',
    name: 'Prism Unicorns',
    shortName: 'PRI',
    owner: 'Zoe Ferrand',
    color: '#C86DD7',
    gmPersonality: 'Culture',
  },
  {
    id: 'abyss-krakens',
    name: 'Abyss Krakens',
    shortName: 'ABY',
    owner: 'Nils Harrow',
    color: '#243B6B',
    gmPersonality: 'Risk-Taker',
  },
  {
    id: 'thorn-boars',
    name: 'Thorn Boars',
    shortName: 'THB',
    owner: 'Greta Voss',
    color: '#7A3E2B',
    gmPersonality: 'Trader',
  },
  {
    id: 'storm-eagles',
    name: 'Storm Eagles',
    shortName: 'STE',
    owner: 'Idris Lamb',
    color: '#44546A',
    gmPersonality: 'Balanced',
  },
  {
    id: 'rune-wyrms',
    name: 'Rune Wyrms',
    shortName: 'RUN',
    owner: 'Ada Kestrel',
    color: '#8E2C48',
    gmPersonality: 'Analyst',
  },
  {
    id: 'glacier-penguins',
    name: 'Glacier Penguins',
    shortName: 'GLA',
    owner: 'Pavel Dune',
    color: '#1F2A44',
    gmPersonality: 'Culture',
  },
  {
    id: 'night-owls',
    name: 'Night Owls',
    shortName: 'NIO',
    owner: 'Esme Hart',
    color: '#3D2C5C',
    gmPersonality: 'Analyst',
  },
  {
    id: 'fossil-raptors',
    name: 'Fossil Raptors',
    shortName: 'FOS',
    owner: 'Milo Grant',
    color: '#A08058',
    gmPersonality: 'Risk-Taker',
  },
  {
    id: 'venom-vipers',
    name: 'Venom Vipers',
    shortName: 'VEN',
    owner: 'Lucia Reyes',
    color: '#2E8B57',
    gmPersonality: 'Trader',
  },
  {
    id: 'plains-bison',
    name: 'Plains Bison',
    shortName: 'PLB',
    owner: 'Cal Whitfield',
    color: '#7B5C3E',
    gmPersonality: 'Balanced',
  },
  {
    id: 'savanna-giraffes',
    name: 'Savanna Giraffes',
    shortName: 'SAV',
    owner: 'Nadia Osei',
    color: '#E0A840',
    gmPersonality: 'Culture',
  },
  {
    id: 'zebra-strikers',
    name: 'Zebra Strikers',
    shortName: 'ZEB',
    owner: 'Felix Baird',
    color: '#111111',
    gmPersonality: 'Trader',
  },
  {
    id: 'grove-stags',
    name: 'Grove Stags',
    shortName: 'GRS',
    owner: 'Ruth Ember',
    color: '#4E6B34',
    gmPersonality: 'Balanced',
  },
  {
    id: 'tide-seals',
    name: 'Tide Seals',
    shortName: 'TID',
    owner: 'Jonah Pike',
    color: '#5A7D9A',
    gmPersonality: 'Analyst',
  },
  {
    id: 'harbor-dolphins',
    name: 'Harbor Dolphins',
    shortName: 'HAR',
    owner: 'Keira Moss',
    color: '#2BA3C4',
    gmPersonality: 'Risk-Taker',
  },
  {
    id: 'lake-swans',
    name: 'Lake Swans',
    shortName: 'LAK',
    owner: 'Bruno Sayer',
    color: '#E8E8E8',
    gmPersonality: 'Culture',
  },
  {
    id: 'coral-flamingos',
    name: 'Coral Flamingos',
    shortName: 'COR',
    owner: 'Tess Arlow',
    color: '#F27A8A',
    gmPersonality: 'Trader',
  },
  {
    id: 'royal-peacocks',
    name: 'Royal Peacocks',
    shortName: 'ROY',
    owner: 'Victor Nam',
    color: '#1E6F8C',
    gmPersonality: 'Balanced',
  },
];
