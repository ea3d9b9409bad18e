import { describe, expect, it } from 'vitest';

import {
  buildNaicsIndex,
  describeNaicsCode,
  findLongestPrefixMatch,
  makeNaicsResolver,
  normalizeNaicsCode,
  NAICS_DESCRIPTION_NOT_FOUND,
  UNKNOWN_NAICS_DESCRIPTION,
} from '@/modules/naics/index.js';

import { makeNaicsHierarchy } from '../../fixtures/builders.js';

describe('normalizeNaicsCode', () => {
  it('keeps plain digit strings as they are', () => {
    expect(normalizeNaicsCode('311221')).toBe('311221');
  });

  it('stringifies numbers', () => {
    expect(normalizeNaicsCode(42)).toBe('42');
  });

  it('strips whitespace and thousands separators', () => {
    expect(normalizeNaicsCode(' 311 221 ')).toBe('311221');
    expect(normalizeNaicsCode('311,221')).toBe('311221');
  });

  it('drops an all-zero decimal part', () => {
    expect(normalizeNaicsCode('311221.0')).toBe('311221');
    expect(normalizeNaicsCode('311221.00')).toBe('311221');
  });

  it('keeps a non-zero decimal part verbatim', () => {
    expect(normalizeNaicsCode('311221.5')).toBe('311221.5');
  });

  it('keeps non-numeric codes verbatim', () => {
    expect(normalizeNaicsCode('31-33')).toBe('31-33');
  });
});

describe('buildNaicsIndex', () => {
  it('indexes every titled node except the root, plus range aliases', () => {
    const index = buildNaicsIndex(makeNaicsHierarchy());

    expect([...index.keys()].sort()).toEqual(
      ['22', '221', '31', '31-33', '311', '3112', '311221', '32', '33'].sort()
    );
    expect(index.has('ROOT')).toBe(false);
  });

  it('uses description when a node has no title', () => {
    const index = buildNaicsIndex(makeNaicsHierarchy());

    expect(index.get('221')).toBe('Utilities');
  });

  it('registers range aliases with the range title', () => {
    const index = buildNaicsIndex(makeNaicsHierarchy());

    expect(index.get('32')).toBe('Manufacturing');
  });

  it('lets a real node win over an alias with the same code', () => {
    const index = buildNaicsIndex({
      code: 'ROOT',
      children: [
        { code: '44-45', title: 'Retail Trade', alternate_codes: ['44', '45'] },
        { code: '44', title: 'Motor Vehicle Dealers' },
      ],
    });

    expect(index.get('44')).toBe('Motor Vehicle Dealers');
    expect(index.get('45')).toBe('Retail Trade');
  });

  it('keeps the first node seen in document order for duplicate codes', () => {
    const index = buildNaicsIndex({
      code: 'ROOT',
      children: [
        { code: '11', title: 'Agriculture', children: [{ code: '111', title: 'Crop Production' }] },
        { code: '111', title: 'Duplicate Crop Production' },
      ],
    });

    expect(index.get('111')).toBe('Crop Production');
  });

  it('skips nodes without a title or description', () => {
    const index = buildNaicsIndex({
      code: 'ROOT',
      children: [{ code: '11', children: [{ code: '111', title: 'Crop Production' }] }],
    });

    expect(index.has('11')).toBe(false);
    expect(index.get('111')).toBe('Crop Production');
  });

  it('produces the same index when built twice', () => {
    const hierarchy = makeNaicsHierarchy();

    expect([...buildNaicsIndex(hierarchy)]).toEqual([...buildNaicsIndex(hierarchy)]);
  });
});

describe('findLongestPrefixMatch', () => {
  const index = new Map([
    ['31', 'Manufacturing'],
    ['311', 'Food Manufacturing'],
    ['3112', 'Grain and Oilseed Milling'],
    ['3', 'Single digit'],
  ]);

  it('returns the exact match when present', () => {
    expect(findLongestPrefixMatch(index, '3112')).toBe('Grain and Oilseed Milling');
  });

  it('returns the most specific ancestor', () => {
    expect(findLongestPrefixMatch(index, '311221')).toBe('Grain and Oilseed Milling');
    expect(findLongestPrefixMatch(index, '3119')).toBe('Food Manufacturing');
    expect(findLongestPrefixMatch(index, '3199')).toBe('Manufacturing');
  });

  it('does not shorten below two characters', () => {
    expect(findLongestPrefixMatch(index, '39')).toBeUndefined();
  });

  it('looks up a one character code exactly', () => {
    expect(findLongestPrefixMatch(index, '3')).toBe('Single digit');
    expect(findLongestPrefixMatch(index, '4')).toBeUndefined();
  });
});

describe('describeNaicsCode', () => {
  const index = buildNaicsIndex(makeNaicsHierarchy());

  it('resolves a full six digit code', () => {
    expect(describeNaicsCode(index, 311221)).toBe('Wet Corn Milling and Starch Manufacturing');
  });

  it('falls back to the longest known prefix', () => {
    expect(describeNaicsCode(index, '311299')).toBe('Grain and Oilseed Milling');
    expect(describeNaicsCode(index, '311999')).toBe('Food Manufacturing');
  });

  it('resolves codes under a range sector through its aliases', () => {
    expect(describeNaicsCode(index, '339999')).toBe('Manufacturing');
  });

  it('normalizes spreadsheet style codes before matching', () => {
    expect(describeNaicsCode(index, '311221.0')).toBe('Wet Corn Milling and Starch Manufacturing');
  });

  it('returns the not found sentinel when no prefix matches', () => {
    expect(describeNaicsCode(index, '9999')).toBe(NAICS_DESCRIPTION_NOT_FOUND);
    expect(describeNaicsCode(index, 'ABC')).toBe(NAICS_DESCRIPTION_NOT_FOUND);
    expect(describeNaicsCode(index, '3')).toBe(NAICS_DESCRIPTION_NOT_FOUND);
  });

  it('returns Unknown for missing or blank codes', () => {
    expect(describeNaicsCode(index, null)).toBe(UNKNOWN_NAICS_DESCRIPTION);
    expect(describeNaicsCode(index, undefined)).toBe(UNKNOWN_NAICS_DESCRIPTION);
    expect(describeNaicsCode(index, '')).toBe(UNKNOWN_NAICS_DESCRIPTION);
    expect(describeNaicsCode(index, '   ')).toBe(UNKNOWN_NAICS_DESCRIPTION);
  });

  it('treats a numeric zero code as blank', () => {
    expect(describeNaicsCode(index, 0)).toBe(UNKNOWN_NAICS_DESCRIPTION);
  });

  it('looks up the string "0" like any other code', () => {
    expect(describeNaicsCode(index, '0')).toBe(NAICS_DESCRIPTION_NOT_FOUND);
  });
});

describe('makeNaicsResolver', () => {
  it('exposes the index size and resolves through it', () => {
    const resolver = makeNaicsResolver(buildNaicsIndex(makeNaicsHierarchy()));

    expect(resolver.size).toBe(9);
    expect(resolver.describe('2211')).toBe('Utilities');
  });

  it('returns the same description every time a code is resolved', () => {
    const resolver = makeNaicsResolver(buildNaicsIndex(makeNaicsHierarchy()));
    const codes = ['311221', '311299', '339999', '9999', null];

    const first = codes.map((code) => resolver.describe(code));
    const second = codes.map((code) => resolver.describe(code));

    expect(first).toEqual([
      'Wet Corn Milling and Starch Manufacturing',
      'Grain and Oilseed Milling',
      'Manufacturing',
      NAICS_DESCRIPTION_NOT_FOUND,
      UNKNOWN_NAICS_DESCRIPTION,
    ]);
    expect(second).toEqual(first);
  });
});
