import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import { ListingTypeFilter, RequestDescriptor, SearchDefinition } from './types.js';

export const DEFAULT_SITE = 'EBAY-GB';
export const DEFAULT_SEARCH_INTERVAL_MINUTES = 15;

export const EBAY_SITES: Record<string, string> = {
  uk: 'EBAY-GB',
  us: 'EBAY-US',
  de: 'EBAY-DE',
  fr: 'EBAY-FR',
  it: 'EBAY-IT',
  es: 'EBAY-ES',
  au: 'EBAY-AU',
  ca: 'EBAY-ENCA'
};

export const LISTING_TYPES: readonly ListingTypeFilter[] = ['auction', 'buy_it_now', 'both'] as const;

export const normalizeSite = (site: string): string => {
  const trimmed = site.trim();
  return EBAY_SITES[trimmed.toLowerCase()] ?? trimmed.toUpperCase();
};

export type SearchDefinitionInput = {
  searchQuery: string;
  site?: string;
  categoryId?: string;
  minPrice?: number;
  maxPrice?: number;
  listingType?: ListingTypeFilter;
  updateInterval?: number;
};

/** `undefined` keeps a field as it is, `null` clears an optional one. */
export type SearchDefinitionChanges = {
  searchQuery?: string;
  site?: string;
  categoryId?: string | null;
  minPrice?: number | null;
  maxPrice?: number | null;
  listingType?: ListingTypeFilter;
  updateInterval?: number;
};

const searchFieldsSchema = z
  .object({
    searchQuery: z.string().trim().min(1, 'Suchbegriff darf nicht leer sein'),
    site: z
      .string()
      .trim()
      .min(1, 'Marktplatz darf nicht leer sein')
      .optional()
      .transform((value) => normalizeSite(value ?? DEFAULT_SITE)),
    categoryId: z.string().trim().min(1).optional(),
    minPrice: z.number().finite().nonnegative('Mindestpreis darf nicht negativ sein').optional(),
    maxPrice: z.number().finite().nonnegative('Höchstpreis darf nicht negativ sein').optional(),
    listingType: z.enum(['auction', 'buy_it_now', 'both']).default('both'),
    updateInterval: z
      .number()
      .finite()
      .positive('Aktualisierungsintervall muss größer als 0 sein')
      .default(DEFAULT_SEARCH_INTERVAL_MINUTES)
  })
  .refine(
    (value) => value.minPrice === undefined || value.maxPrice === undefined || value.minPrice <= value.maxPrice,
    { message: 'Mindestpreis darf nicht über dem Höchstpreis liegen', path: ['minPrice'] }
  );

export const searchDefinitionSchema = z.intersection(
  z.object({ searchId: z.string().min(1) }),
  searchFieldsSchema
);

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));

export const validateSearchDefinition = (searchId: string, input: SearchDefinitionInput): SearchDefinition => {
  const parsed = searchFieldsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error));
  }
  return { searchId, ...parsed.data };
};

export const createSearchDefinition = (input: SearchDefinitionInput): SearchDefinition =>
  validateSearchDefinition(randomUUID(), input);

const pick = <T>(change: T | null | undefined, current: T | undefined): T | undefined => {
  if (change === null) {
    return undefined;
  }
  return change ?? current;
};

export const applySearchChanges = (
  existing: SearchDefinition,
  changes: SearchDefinitionChanges
): SearchDefinition =>
  validateSearchDefinition(existing.searchId, {
    searchQuery: changes.searchQuery ?? existing.searchQuery,
    site: changes.site ?? existing.site,
    categoryId: pick(changes.categoryId, existing.categoryId),
    minPrice: pick(changes.minPrice, existing.minPrice),
    maxPrice: pick(changes.maxPrice, existing.maxPrice),
    listingType: changes.listingType ?? existing.listingType,
    updateInterval: changes.updateInterval ?? existing.updateInterval
  });

export const queryChanged = (before: SearchDefinition, after: SearchDefinition): boolean =>
  before.searchQuery !== after.searchQuery;

export const toSearchRequest = (search: SearchDefinition): RequestDescriptor => ({ kind: 'search', search });
