import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { errorMessage } from '../core/errors.js';
import { searchDefinitionSchema } from '../core/search-definition.js';
import { SearchDefinitionStore, StoredSearches } from '../core/types.js';
import { logger } from '../util/logger.js';

const STORE_VERSION = 1;

const storeFileSchema = z.object({
  version: z.literal(STORE_VERSION),
  searches: z.record(z.unknown())
});

const fileNameFor = (account: string): string => `${encodeURIComponent(account)}.json`;

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export class JsonFileSearchStore implements SearchDefinitionStore {
  constructor(private readonly directory: string) {}

  async load(account: string): Promise<StoredSearches> {
    const file = this.pathFor(account);
    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn(`Suchdatei für ${account} ist kein gültiges JSON, starte ohne Suchen`, {
        file,
        error: errorMessage(error)
      });
      return {};
    }
    const parsed = storeFileSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn(`Suchdatei für ${account} hat ein unbekanntes Format, starte ohne Suchen`, { file });
      return {};
    }

    const searches: StoredSearches = {};
    for (const [searchId, entry] of Object.entries(parsed.data.searches)) {
      const definition = searchDefinitionSchema.safeParse(entry);
      if (!definition.success || definition.data.searchId !== searchId) {
        logger.warn(`Ungültige gespeicherte Suche ${searchId} für ${account} übersprungen`);
        continue;
      }
      searches[searchId] = definition.data;
    }
    return searches;
  }

  async save(account: string, searches: StoredSearches): Promise<void> {
    const file = this.pathFor(account);
    if (Object.keys(searches).length === 0) {
      await rm(file, { force: true });
      return;
    }
    await mkdir(this.directory, { recursive: true });
    const temporary = `${file}.tmp`;
    await writeFile(temporary, `${JSON.stringify({ version: STORE_VERSION, searches }, null, 2)}\n`, 'utf8');
    await rename(temporary, file);
  }

  private pathFor(account: string): string {
    return path.join(this.directory, fileNameFor(account));
  }
}

export class InMemorySearchStore implements SearchDefinitionStore {
  private readonly data = new Map<string, StoredSearches>();

  async load(account: string): Promise<StoredSearches> {
    return { ...this.data.get(account) };
  }

  async save(account: string, searches: StoredSearches): Promise<void> {
    if (Object.keys(searches).length === 0) {
      this.data.delete(account);
      return;
    }
    this.data.set(account, { ...searches });
  }
}
