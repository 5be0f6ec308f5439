import blessed from 'blessed';
import * as asciichart from 'asciichart';
import { systemDetector } from '../lib/system-detector';
import { OllamaProcess, ResourceUsage } from '../types/system-info';

const REFRESH_INTERVAL = 2000;
const MAX_POINTS = 60;

/**
 * Live CPU/RAM/GPU charts plus the ollama process table
 * Resolves when the user quits (q, Esc, Ctrl-C)
 */
export function createPerformanceMonitorUI(screen: blessed.Widgets.Screen): Promise<void> {
  let intervalId: NodeJS.Timeout | null = null;
  let fetching = false;
  const cpuHistory: number[] = [];
  const ramHistory: number[] = [];
  const gpuHistory: number[] = [];

  const contentBox = blessed.box({
    top: 0,
    left: 0,
    width: '100%',
    height: '100%',
    tags: true,
    scrollable: true,
    alwaysScroll: true,
    keys: true,
    vi: true,
    mouse: true,
    scrollbar: {
      ch: '█',
      style: {
        fg: 'blue',
      },
    },
  });
  screen.append(contentBox);

  function pushPoint(history: number[], value: number) {
    history.push(Math.round(value * 10) / 10);
    if (history.length > MAX_POINTS) history.shift();
  }

  function chart(history: number[], color: typeof asciichart.cyan): string {
    if (history.length < 2) return '{gray-fg}Collecting samples...{/gray-fg}';
    return asciichart.plot(history, { height: 6, min: 0, max: 100, colors: [color] });
  }

  function render(usage: ResourceUsage, processes: OllamaProcess[]) {
    const termWidth = Number(screen.width) || 80;
    const divider = '─'.repeat(Math.max(10, termWidth - 2));
    let content = '';

    content += '{bold}{cyan-fg}Model Performance Monitor{/cyan-fg}{/bold}\n';
    content += `{gray-fg}${new Date(usage.timestamp).toLocaleString()}{/gray-fg}\n`;
    content += divider + '\n';

    content += `{bold}CPU Usage:{/bold} ${usage.cpuPercent.toFixed(1)}%\n`;
    content += chart(cpuHistory, asciichart.cyan) + '\n\n';

    content += `{bold}RAM Usage:{/bold} ${usage.ramPercent.toFixed(1)}%\n`;
    content += chart(ramHistory, asciichart.green) + '\n\n';

    if (usage.gpuPercent !== undefined) {
      content += `{bold}GPU Usage:{/bold} ${usage.gpuPercent.toFixed(1)}%`;
      if (usage.gpuMemoryPercent !== undefined) {
        content += `   {bold}GPU Memory:{/bold} ${usage.gpuMemoryPercent.toFixed(1)}%`;
      }
      content += '\n' + chart(gpuHistory, asciichart.magenta) + '\n\n';
    }

    content += divider + '\n';
    content += '{bold}Ollama Processes:{/bold}\n';
    if (processes.length === 0) {
      content += '{gray-fg}No ollama processes running{/gray-fg}\n';
    } else {
      content += '{bold}PID       CPU%   MEM%   COMMAND{/bold}\n';
      for (const proc of processes) {
        content +=
          `${String(proc.pid).padEnd(10)}` +
          `${proc.cpu.toFixed(1).padStart(5)}  ` +
          `${proc.mem.toFixed(1).padStart(5)}   ` +
          `${blessed.escape(proc.command)}\n`;
      }
    }

    content += '\n' + divider + '\n';
    content += '{gray-fg}[Q]uit  [ESC] Back  Refresh: 2s{/gray-fg}';

    contentBox.setContent(content);
    screen.render();
  }

  async function refresh() {
    if (fetching) return;
    fetching = true;
    try {
      const [usage, processes] = await Promise.all([
        systemDetector.collectUsage(),
        systemDetector.listOllamaProcesses(),
      ]);
      pushPoint(cpuHistory, usage.cpuPercent);
      pushPoint(ramHistory, usage.ramPercent);
      if (usage.gpuPercent !== undefined) pushPoint(gpuHistory, usage.gpuPercent);
      render(usage, processes);
    } catch (error) {
      contentBox.setContent(`{red-fg}Failed to collect metrics: ${blessed.escape((error as Error).message)}{/red-fg}`);
      screen.render();
    } finally {
      fetching = false;
    }
  }

  return new Promise((resolve) => {
    const stop = () => {
      if (intervalId) clearInterval(intervalId);
      intervalId = null;
      screen.destroy();
      resolve();
    };

    screen.key(['q', 'Q', 'escape', 'C-c'], stop);

    contentBox.setContent('{cyan-fg}⏳ Collecting metrics...{/cyan-fg}');
    screen.render();
    void refresh();
    intervalId = setInterval(() => void refresh(), REFRESH_INTERVAL);
  });
}
