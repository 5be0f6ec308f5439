import { describe, it, expect } from 'vitest';
import {
  formatBytes,
  formatTimestamp,
  formatDateStamp,
  formatDateTimeStamp,
  formatIsoSeconds,
  truncate,
  capitalize,
} from './format-utils';

describe('format-utils', () => {
  describe('formatBytes', () => {
    it('should pick the largest whole unit', () => {
      expect(formatBytes(512)).toBe('512.0 B');
      expect(formatBytes(1536)).toBe('1.5 KB');
      expect(formatBytes(4.7 * 1024 ** 3)).toBe('4.7 GB');
    });
  });

  describe('local timestamps', () => {
    const date = new Date(2025, 0, 9, 7, 5, 3);

    it('should format usage log timestamps', () => {
      expect(formatTimestamp(date)).toBe('2025-01-09 07:05:03');
    });

    it('should format date stamps', () => {
      expect(formatDateStamp(date)).toBe('20250109');
    });

    it('should format date-time stamps', () => {
      expect(formatDateTimeStamp(date)).toBe('20250109-070503');
    });
  });

  describe('formatIsoSeconds', () => {
    it('should drop milliseconds', () => {
      expect(formatIsoSeconds(new Date(Date.UTC(2025, 11, 31, 23, 59, 59, 999)))).toBe('2025-12-31T23:59:59Z');
    });
  });

  describe('truncate', () => {
    it('should leave short strings alone', () => {
      expect(truncate('phi3', 10)).toBe('phi3');
    });

    it('should add an ellipsis within the limit', () => {
      expect(truncate('wizard-vicuna-uncensored', 10)).toBe('wizard-...');
    });
  });

  describe('capitalize', () => {
    it('should upper-case the first letter', () => {
      expect(capitalize('embedding')).toBe('Embedding');
    });
  });
});
