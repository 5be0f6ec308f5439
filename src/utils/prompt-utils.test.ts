import { describe, it, expect } from 'vitest';
import { parseChoice, parseMultiChoice } from './prompt-utils';

describe('prompt-utils', () => {
  describe('parseChoice', () => {
    it('should convert a 1-based answer to an index', () => {
      expect(parseChoice('1', 3)).toBe(0);
      expect(parseChoice(' 3 ', 3)).toBe(2);
    });

    it('should reject out-of-range and non-numeric answers', () => {
      expect(parseChoice('0', 3)).toBeNull();
      expect(parseChoice('4', 3)).toBeNull();
      expect(parseChoice('two', 3)).toBeNull();
      expect(parseChoice('1.5', 3)).toBeNull();
      expect(parseChoice('', 3)).toBeNull();
    });
  });

  describe('parseMultiChoice', () => {
    it('should select everything for "all"', () => {
      expect(parseMultiChoice('ALL', 4)).toEqual([0, 1, 2, 3]);
    });

    it('should keep valid numbers in order without duplicates', () => {
      expect(parseMultiChoice('3 1  3 9 x 2', 4)).toEqual([2, 0, 1]);
    });

    it('should return nothing for empty input', () => {
      expect(parseMultiChoice('   ', 4)).toEqual([]);
    });
  });
});
