import {
  mkdir,
  mkdtemp,
  readFile,
  readdir,
  rm,
  writeFile,
} from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CorruptStateError,
  LeagueEngine,
  PersistenceError,
} from '@cardleague/core';
import { SMALL_LEAGUE_CONFIG } from '@cardleague/core/testing';
import { LeagueStore } from './store';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'cardleague-store-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function freshLeague() {
  return LeagueEngine.createState({
    seed: 'test-seed',
    config: SMALL_LEAGUE_CONFIG,
  });
}

describe('LeagueStore', () => {
  it('returns null when nothing has been saved', async () => {
    const store = new LeagueStore(join(dir, 'league.json'));
    expect(await store.load()).toBeNull();
  });

  it('saves and loads the same league', async () => {
    const store = new LeagueStore(join(dir, 'nested', 'league.json'));
    const league = freshLeague();

    const saved = await store.save(league);
    const loaded = await store.load();

    expect(loaded?.saveId).toBe(saved.saveId);
    expect(loaded?.savedAt).toBe(saved.savedAt);
    expect(loaded?.league).toEqual(league);
  });

  it('leaves no temp files behind', async () => {
    const store = new LeagueStore(join(dir, 'league.json'));
    await store.save(freshLeague());
    expect(await readdir(dir)).toEqual(['league.json']);
  });

  it('rejects a file that is not JSON', async () => {
    const file = join(dir, 'league.json');
    await writeFile(file, '{"saveId":', 'utf8');
    const store = new LeagueStore(file);

    await expect(store.load()).rejects.toBeInstanceOf(CorruptStateError);
    await expect(store.load()).rejects.toMatchObject({
      code: 'CORRUPT_STATE',
      problems: ['state file is not valid JSON'],
    });
  });

  it('names the fields a malformed save gets wrong', async () => {
    const file = join(dir, 'league.json');
    const store = new LeagueStore(file);
    await store.save(freshLeague());

    const document = JSON.parse(await readFile(file, 'utf8'));
    document.league.season = 0;
    await writeFile(file, JSON.stringify(document), 'utf8');

    await expect(store.load()).rejects.toMatchObject({
      problems: ['league.season: Number must be greater than or equal to 1'],
    });
  });

  it('wraps a failed read in PersistenceError', async () => {
    const file = join(dir, 'league.json');
    await mkdir(file);
    const store = new LeagueStore(file);

    await expect(store.load()).rejects.toBeInstanceOf(PersistenceError);
    await expect(store.load()).rejects.toMatchObject({
      code: 'PERSISTENCE',
      message: `Could not read ${file}`,
    });
  });

  it('wraps a failed write in PersistenceError', async () => {
    const blocker = join(dir, 'not-a-dir');
    await writeFile(blocker, 'plain file', 'utf8');
    const file = join(blocker, 'league.json');
    const store = new LeagueStore(file);

    await expect(store.save(freshLeague())).rejects.toMatchObject({
      code: 'PERSISTENCE',
      message: `Could not write ${file}`,
    });
    expect(await readdir(dir)).toEqual(['not-a-dir']);
  });
});
