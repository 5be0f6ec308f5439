import { describe, it, expect, beforeEach, vi } from 'vitest';
import chalk from 'chalk';
import { uiCommand } from './ui';
import { configStore } from '../lib/config-store';
import { usageLogger } from '../lib/usage-logger';
import { choose } from '../utils/prompt-utils';

vi.mock('../lib/config-store', async () => {
  const { createMockConfigStore } = await import('../../tests/mocks');
  return { configStore: createMockConfigStore() };
});

vi.mock('../lib/usage-logger', async () => {
  const { createMockUsageLogger } = await import('../../tests/mocks');
  return { usageLogger: createMockUsageLogger() };
});

vi.mock('../utils/prompt-utils', () => ({
  choose: vi.fn(),
}));

describe('uiCommand', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.mocked(configStore.get).mockResolvedValue('cli');
    vi.mocked(configStore.set).mockResolvedValue(undefined);
    vi.mocked(usageLogger.log).mockResolvedValue(undefined);
  });

  it('should store and log the selected mode', async () => {
    vi.mocked(choose).mockResolvedValue(1);

    await uiCommand();

    expect(configStore.set).toHaveBeenCalledWith('uiMode', 'tui');
    expect(usageLogger.log).toHaveBeenCalledWith('UI mode changed to: tui');
  });

  it('should leave the mode alone on an invalid selection', async () => {
    vi.mocked(choose).mockResolvedValue(null);

    await uiCommand();

    expect(configStore.set).not.toHaveBeenCalled();
    expect(usageLogger.log).not.toHaveBeenCalled();
    expect(vi.mocked(console.log)).toHaveBeenCalledWith(chalk.red('❌ Invalid selection'));
  });

  it('should set a mode given on the command line without prompting', async () => {
    await uiCommand('tui');

    expect(choose).not.toHaveBeenCalled();
    expect(configStore.set).toHaveBeenCalledWith('uiMode', 'tui');
  });

  it('should reject an unknown mode', async () => {
    await expect(uiCommand('gui')).rejects.toThrow('Invalid UI mode: gui. Must be cli or tui.');
    expect(configStore.set).not.toHaveBeenCalled();
  });
});
