import { UsageReport, ModelUsageCount, RecentInstall } from '../types/usage-types';

const SWITCH_MARKER = 'Switched to model';
const INSTALL_MARKER = 'Installing model';
const UPDATE_MARKER = 'updated to';
const TOP_N = 5;

/**
 * Model name of a "Switched to model" line (last whitespace-separated field)
 */
export function switchedModel(line: string): string | null {
  if (!line.includes(SWITCH_MARKER)) return null;
  const fields = line.trim().split(/\s+/);
  return fields[fields.length - 1] || null;
}

/**
 * Summarize usage log lines into counts and recent activity
 */
export function analyzeUsage(lines: string[]): UsageReport {
  const counts = new Map<string, number>();
  const installs: RecentInstall[] = [];
  let switches = 0;
  let updates = 0;

  for (const line of lines) {
    const model = switchedModel(line);
    if (model) {
      switches++;
      counts.set(model, (counts.get(model) ?? 0) + 1);
    }

    if (line.includes(INSTALL_MARKER)) {
      const [, name = ''] = line.split(': ');
      const date = line.split(/\s+/).slice(0, 2).join(' ');
      installs.push({ model: name.trim(), date });
    }

    if (line.includes(UPDATE_MARKER)) {
      updates++;
    }
  }

  const mostUsed: ModelUsageCount[] = [...counts.entries()]
    .map(([model, count]) => ({ model, count }))
    .sort((a, b) => b.count - a.count || a.model.localeCompare(b.model))
    .slice(0, TOP_N);

  return {
    mostUsed,
    recentInstalls: installs.slice(-TOP_N),
    stats: {
      switches,
      installs: installs.length,
      updates,
    },
  };
}
