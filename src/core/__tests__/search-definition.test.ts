import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors.js';
import {
  applySearchChanges,
  createSearchDefinition,
  normalizeSite,
  queryChanged,
  searchDefinitionSchema,
  validateSearchDefinition
} from '../search-definition.js';

describe('search definitions', () => {
  it('fills in defaults and normalises the site', () => {
    expect(validateSearchDefinition('s1', { searchQuery: '  lego  ', site: 'uk' })).toEqual({
      searchId: 's1',
      searchQuery: 'lego',
      site: 'EBAY-GB',
      listingType: 'both',
      updateInterval: 15
    });
  });

  it('accepts global site ids in any case', () => {
    expect(normalizeSite('ebay-de')).toBe('EBAY-DE');
    expect(normalizeSite(' CA ')).toBe('EBAY-ENCA');
  });

  it('generates distinct ids', () => {
    const first = createSearchDefinition({ searchQuery: 'lego' });
    const second = createSearchDefinition({ searchQuery: 'lego' });
    expect(first.searchId).not.toBe(second.searchId);
  });

  it('collects every problem into one validation error', () => {
    try {
      validateSearchDefinition('s1', { searchQuery: ' ', updateInterval: 0, minPrice: -1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.code).toBe('VALIDATION');
        expect(error.issues).toEqual([
          'searchQuery: Suchbegriff darf nicht leer sein',
          'minPrice: Mindestpreis darf nicht negativ sein',
          'updateInterval: Aktualisierungsintervall muss größer als 0 sein'
        ]);
      }
    }
  });

  it('rejects a minimum above the maximum', () => {
    expect(() => validateSearchDefinition('s1', { searchQuery: 'lego', minPrice: 100, maxPrice: 50 })).toThrow(
      'minPrice: Mindestpreis darf nicht über dem Höchstpreis liegen'
    );
  });

  it('applies changes and clears fields set to null', () => {
    const existing = validateSearchDefinition('s1', {
      searchQuery: 'lego',
      categoryId: '19006',
      minPrice: 10,
      maxPrice: 50
    });
    const updated = applySearchChanges(existing, { categoryId: null, maxPrice: 80, listingType: 'auction' });

    expect(updated).toMatchObject({ searchId: 's1', searchQuery: 'lego', minPrice: 10, maxPrice: 80, listingType: 'auction' });
    expect(updated.categoryId).toBeUndefined();
    expect(queryChanged(existing, updated)).toBe(false);
    expect(queryChanged(existing, applySearchChanges(existing, { searchQuery: 'duplo' }))).toBe(true);
  });

  it('validates the combination after a change', () => {
    const existing = validateSearchDefinition('s1', { searchQuery: 'lego', maxPrice: 50 });
    expect(() => applySearchChanges(existing, { minPrice: 60 })).toThrow(ValidationError);
  });

  it('parses persisted definitions including their id', () => {
    const parsed = searchDefinitionSchema.safeParse({
      searchId: 's9',
      searchQuery: 'camera',
      site: 'EBAY-US',
      listingType: 'buy_it_now',
      updateInterval: 30
    });
    expect(parsed.success).toBe(true);
    expect(searchDefinitionSchema.safeParse({ searchQuery: 'camera' }).success).toBe(false);
  });
});
