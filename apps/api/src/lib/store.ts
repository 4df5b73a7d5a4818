// ============================================================================
// CARDLEAGUE - League Store
// ============================================================================
// One JSON document on disk holding the whole league

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { nanoid } from 'nanoid';
import {
  CorruptStateError,
  PersistenceError,
  type League,
} from '@cardleague/core';
import { SavedLeagueSchema, type SavedLeague } from '../types/league.types';

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

export class LeagueStore {
  constructor(readonly filePath: string) {}

  /**
   * Read and shape-check the saved league. Null when nothing has been saved
   * yet.
   */
  async load(): Promise<SavedLeague | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      console.error('league.load.failed', { file: this.filePath, error });
      throw new PersistenceError(`Could not read ${this.filePath}`, {
        cause: error,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CorruptStateError(['state file is not valid JSON'], {
        cause: error,
      });
    }

    const parsed = SavedLeagueSchema.safeParse(json);
    if (!parsed.success) {
      throw new CorruptStateError(
        parsed.error.issues.map(
          (issue) => `${issue.path.join('.') || 'document'}: ${issue.message}`,
        ),
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  /**
   * Write the league through a temp file and rename, so a crash never
   * leaves a half-written save
   */
  async save(league: League): Promise<SavedLeague> {
    const document: SavedLeague = {
      saveId: nanoid(),
      savedAt: new Date().toISOString(),
      league,
    };
    const tempPath = `${this.filePath}.${document.saveId}.tmp`;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(document), 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      console.error('league.save.failed', { file: this.filePath, error });
      throw new PersistenceError(`Could not write ${this.filePath}`, {
        cause: error,
      });
    }

    console.info('league.save.completed', {
      file: this.filePath,
      saveId: document.saveId,
      season: league.season,
      week: league.week,
    });
    return document;
  }
}
