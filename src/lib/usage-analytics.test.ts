import { describe, it, expect } from 'vitest';
import { analyzeUsage, switchedModel } from './usage-analytics';
import { USAGE_LOG_LINES } from '../../tests/fixtures/usage-log';

describe('switchedModel', () => {
  it('should return the last field of a switch line', () => {
    expect(switchedModel('2025-03-01 09:10:00 - Switched to model: phi3')).toBe('phi3');
  });

  it('should handle the tui variant', () => {
    expect(switchedModel('2025-03-02 15:00:00 - Switched to model (tui): llama3.1:latest')).toBe(
      'llama3.1:latest'
    );
  });

  it('should return null for other lines', () => {
    expect(switchedModel('2025-03-01 09:01:10 - Installing model: phi3')).toBeNull();
  });
});

describe('analyzeUsage', () => {
  it('should rank models by switch count, then name', () => {
    const report = analyzeUsage(USAGE_LOG_LINES);

    expect(report.mostUsed).toEqual([
      { model: 'phi3', count: 2 },
      { model: 'codellama', count: 1 },
      { model: 'llama3.1', count: 1 },
    ]);
  });

  it('should list installs with their timestamps', () => {
    const report = analyzeUsage(USAGE_LOG_LINES);

    expect(report.recentInstalls).toEqual([
      { model: 'phi3', date: '2025-03-01 09:01:10' },
      { model: 'llama3.1', date: '2025-03-01 09:05:42' },
    ]);
  });

  it('should count switches, installs and updates', () => {
    expect(analyzeUsage(USAGE_LOG_LINES).stats).toEqual({
      switches: 4,
      installs: 2,
      updates: 1,
    });
  });

  it('should keep only the top five models', () => {
    const lines = ['a', 'b', 'c', 'd', 'e', 'f'].map(
      (m) => `2025-03-01 09:00:00 - Switched to model: model-${m}`
    );
    lines.push('2025-03-01 09:00:00 - Switched to model: model-f');

    const report = analyzeUsage(lines);
    expect(report.mostUsed.map((u) => u.model)).toEqual([
      'model-f',
      'model-a',
      'model-b',
      'model-c',
      'model-d',
    ]);
  });

  it('should keep only the five most recent installs', () => {
    const lines = [1, 2, 3, 4, 5, 6, 7].map(
      (n) => `2025-03-0${n} 10:00:00 - Installing model: model-${n}`
    );

    const report = analyzeUsage(lines);
    expect(report.recentInstalls.map((i) => i.model)).toEqual([
      'model-3',
      'model-4',
      'model-5',
      'model-6',
      'model-7',
    ]);
    expect(report.stats.installs).toBe(7);
  });

  it('should return an empty report for no lines', () => {
    expect(analyzeUsage([])).toEqual({
      mostUsed: [],
      recentInstalls: [],
      stats: { switches: 0, installs: 0, updates: 0 },
    });
  });
});
