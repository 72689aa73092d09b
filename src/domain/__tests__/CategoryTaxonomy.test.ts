import { describe, it, expect } from 'vitest';
import { allowedTopCategories, checkCategories, type CategoryTaxonomy } from '../entities/CategoryTaxonomy.js';

describe('CategoryTaxonomy', () => {
  const taxonomy: CategoryTaxonomy = {
    topCategories: ['Hardware', 'Network'],
    subCategories: {
      Hardware: ['Desktop', 'Laptop'],
      Software: ['Office'],
    },
    specificCategories: {},
  };

  it('should collect top categories from every part of the taxonomy', () => {
    expect(allowedTopCategories(taxonomy)).toEqual(['Hardware', 'Network', 'Software']);
  });

  it('should accept a sub-category listed under its top category', () => {
    expect(checkCategories(taxonomy, { top: 'Hardware', sub: 'Desktop', specific: 'Monitor defect' })).toEqual([]);
  });

  it('should reject a sub-category not listed under its top category', () => {
    expect(checkCategories(taxonomy, { top: 'Hardware', sub: 'Server', specific: 'Disk failure' })).toEqual([
      'Sub-Category "Server" is not allowed under "Hardware"',
    ]);
  });

  it('should reject an unknown top category without checking further', () => {
    expect(checkCategories(taxonomy, { top: 'Facilities', sub: 'Desktop', specific: 'x' })).toEqual([
      'Top-Category "Facilities" is not in the taxonomy',
    ]);
  });

  it('should leave sub-categories open for a top category without its own list', () => {
    expect(checkCategories(taxonomy, { top: 'Network', sub: 'WAN', specific: 'Link down' })).toEqual([]);
  });

  it('should not treat prototype keys as categories', () => {
    expect(checkCategories(taxonomy, { top: 'Hardware', sub: 'constructor', specific: 'x' })).toEqual([
      'Sub-Category "constructor" is not allowed under "Hardware"',
    ]);
  });

  it('should check specific categories when they are given', () => {
    const withSpecifics: CategoryTaxonomy = {
      topCategories: [],
      subCategories: {},
      specificCategories: { Hardware: ['Monitor defect'] },
    };

    expect(checkCategories(withSpecifics, { top: 'Hardware', sub: 'Anything', specific: 'Monitor defect' })).toEqual([]);
    expect(checkCategories(withSpecifics, { top: 'Hardware', sub: 'Anything', specific: 'Keyboard' })).toEqual([
      'Category "Keyboard" is not allowed under "Hardware"',
    ]);
  });

  it('should accept anything when the taxonomy is empty', () => {
    const open: CategoryTaxonomy = { topCategories: [], subCategories: {}, specificCategories: {} };
    expect(checkCategories(open, { top: 'Anything', sub: 'Goes', specific: 'Here' })).toEqual([]);
  });
});
