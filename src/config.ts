import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ValidationError } from './core/errors.js';
import { CategoryIntervals, DEFAULT_CATEGORY_INTERVALS } from './core/registry.js';
import { DEFAULT_SITE, normalizeSite } from './core/search-definition.js';
import { EbayCredentials } from './providers/ebay.js';

export type AppConfig = {
  discordToken: string;
  discordChannelId?: string;
  accountsFile: string;
  searchStoreDir: string;
  intervals: CategoryIntervals;
  maxBackoffMs: number;
  requestTimeoutMs: number;
};

type Env = Record<string, string | undefined>;

export const resolvePositive = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value !== undefined && value.trim() !== '' && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const optional = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const discordToken = optional(env.DISCORD_TOKEN);
  if (!discordToken) {
    throw new Error('DISCORD_TOKEN muss gesetzt sein.');
  }
  return {
    discordToken,
    discordChannelId: optional(env.DISCORD_CHANNEL_ID),
    accountsFile: optional(env.ACCOUNTS_FILE) ?? './accounts.json',
    searchStoreDir: optional(env.SEARCH_STORE_DIR) ?? './data/searches',
    intervals: {
      bids: resolvePositive(env.BIDS_INTERVAL_MINUTES, DEFAULT_CATEGORY_INTERVALS.bids),
      watchlist: resolvePositive(env.WATCHLIST_INTERVAL_MINUTES, DEFAULT_CATEGORY_INTERVALS.watchlist),
      purchases: resolvePositive(env.PURCHASES_INTERVAL_MINUTES, DEFAULT_CATEGORY_INTERVALS.purchases)
    },
    maxBackoffMs: resolvePositive(env.MAX_BACKOFF_MINUTES, 60) * 60_000,
    requestTimeoutMs: resolvePositive(env.REQUEST_TIMEOUT_MS, 9000)
  };
};

const accountSchema = z.object({
  name: z.string().trim().min(1, 'Kontoname fehlt'),
  appId: z.string().min(1, 'appId fehlt'),
  devId: z.string().min(1, 'devId fehlt'),
  certId: z.string().min(1, 'certId fehlt'),
  token: z.string().min(1, 'token fehlt'),
  oauthToken: z.string().min(1).optional(),
  site: z
    .string()
    .optional()
    .transform((value) => normalizeSite(value ?? DEFAULT_SITE))
});

const accountsSchema = z
  .array(accountSchema)
  .refine((accounts) => new Set(accounts.map((account) => account.name)).size === accounts.length, {
    message: 'Kontonamen müssen eindeutig sein'
  });

export const parseAccounts = (json: unknown): EbayCredentials[] => {
  const parsed = accountsSchema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return parsed.data;
};

export const loadAccounts = async (file: string): Promise<EbayCredentials[]> => {
  const raw = await readFile(file, 'utf8');
  return parseAccounts(JSON.parse(raw));
};
