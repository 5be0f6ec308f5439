import blessed from 'blessed';
import { ollamaClient } from '../lib/ollama-client';

const PREVIEW_LINES = 20;

/**
 * Full-screen model picker with an `ollama show` preview pane
 * Resolves with the chosen model, or null when cancelled
 */
export function pickModelUI(
  screen: blessed.Widgets.Screen,
  models: string[],
  lastUsed: string
): Promise<string | null> {
  const previewCache = new Map<string, string>();
  let selectedIndex = Math.max(0, models.indexOf(lastUsed));

  const list = blessed.list({
    parent: screen,
    label: ' Select model ',
    top: 0,
    left: 0,
    width: '40%',
    height: '100%-1',
    border: { type: 'line' },
    keys: true,
    vi: true,
    mouse: true,
    tags: true,
    style: {
      border: { fg: 'cyan' },
      selected: { bg: 'blue', fg: 'white', bold: true },
    },
    items: models.map((m) => (m === lastUsed ? `${m} {green-fg}[LAST USED]{/green-fg}` : m)),
  });

  const preview = blessed.box({
    parent: screen,
    label: ' Preview ',
    top: 0,
    left: '40%',
    width: '60%',
    height: '100%-1',
    border: { type: 'line' },
    tags: true,
    scrollable: true,
    style: { border: { fg: 'gray' } },
  });

  blessed.box({
    parent: screen,
    bottom: 0,
    left: 0,
    width: '100%',
    height: 1,
    tags: true,
    content: '{gray-fg}[↑/↓] Move  [Enter] Run  [Q/ESC] Cancel{/gray-fg}',
  });

  async function showPreview(index: number) {
    const model = models[index];
    if (!model) return;

    let text = previewCache.get(model);
    if (text === undefined) {
      preview.setContent(`{cyan-fg}Model: ${blessed.escape(model)}{/cyan-fg}\n\nLoading...`);
      screen.render();
      const details = await ollamaClient.show(model);
      text = details.split('\n').slice(0, PREVIEW_LINES).join('\n');
      previewCache.set(model, text);
    }

    // Selection may have moved while `ollama show` was running
    if (models[selectedIndex] !== model) return;
    preview.setContent(`{cyan-fg}Model: ${blessed.escape(model)}{/cyan-fg}\n\n${blessed.escape(text)}`);
    screen.render();
  }

  return new Promise((resolve) => {
    let done = false;
    const finish = (result: string | null) => {
      if (done) return;
      done = true;
      screen.destroy();
      resolve(result);
    };

    list.on('select item', (_item: blessed.Widgets.BlessedElement, index: number) => {
      selectedIndex = index;
      void showPreview(index);
    });
    list.on('select', (_item: blessed.Widgets.BlessedElement, index: number) => {
      finish(models[index] ?? null);
    });
    screen.key(['q', 'Q', 'escape', 'C-c'], () => finish(null));

    list.select(selectedIndex);
    list.focus();
    screen.render();
    void showPreview(selectedIndex);
  });
}
