import { compareCodePoints, compareNatural, resolveSortKey } from '@file-ops/sort-keys';

import { captureError } from '../../../__tests__/test-helpers';

describe('sort keys', () => {
  const names = ['file2', 'file10', 'file1'];

  it('orders numbers by value with the natural key', () => {
    expect([...names].sort(resolveSortKey('natural'))).toEqual(['file1', 'file2', 'file10']);
  });

  it('orders by code point with the lex key', () => {
    expect([...names].sort(resolveSortKey('lex'))).toEqual(['file1', 'file10', 'file2']);
  });

  describe('compareNatural', () => {
    it('ignores case for text runs and breaks ties by code point', () => {
      expect(['b', 'A', 'a', 'B'].sort(compareNatural)).toEqual(['A', 'a', 'B', 'b']);
    });

    it('treats leading zeros as equal values and stays total', () => {
      expect(['a1', 'a01', 'a001'].sort(compareNatural)).toEqual(['a001', 'a01', 'a1']);
    });

    it('compares digit runs longer than a safe integer', () => {
      expect(compareNatural('v100000000000000000000', 'v99999999999999999999')).toBe(1);
      expect(compareNatural('v100000000000000000001', 'v100000000000000000000')).toBe(1);
    });

    it('places a name before its own extension', () => {
      expect(['file1b', 'file', 'file1'].sort(compareNatural)).toEqual(['file', 'file1', 'file1b']);
    });

    it('returns 0 only for identical names', () => {
      expect(compareNatural('Readme', 'Readme')).toBe(0);
      expect(compareNatural('Readme', 'README')).not.toBe(0);
    });
  });

  describe('compareCodePoints', () => {
    it('is case-sensitive', () => {
      expect(['b', 'a', 'B', 'A'].sort(compareCodePoints)).toEqual(['A', 'B', 'a', 'b']);
    });

    it('orders astral characters after the BMP', () => {
      expect(compareCodePoints('\u{1F600}', '\uFFFF')).toBe(1);
    });

    it('orders prefixes first', () => {
      expect(compareCodePoints('ab', 'abc')).toBe(-1);
    });
  });

  describe('resolveSortKey', () => {
    it('returns the custom comparator as-is', () => {
      const byLength = (a: string, b: string) => a.length - b.length;
      expect(resolveSortKey('custom', byLength)).toBe(byLength);
    });

    it('fails with MISSING_COMPARATOR when custom has no function', () => {
      expect(() => resolveSortKey('custom')).toThrow('A custom comparator must be specified');
      expect(captureError(() => resolveSortKey('custom', null))).toMatchObject({ code: 'MISSING_COMPARATOR' });
    });

    it('fails with UNKNOWN_SORT_KEY for other names', () => {
      expect(() => resolveSortKey('unknown_key')).toThrow('Invalid sort key name');
      expect(captureError(() => resolveSortKey('unknown_key'))).toMatchObject({ code: 'UNKNOWN_SORT_KEY' });
    });
  });
});
