import {
  commandExists,
  execCommand,
  tryExecCommand,
  runInteractive,
  runWithLines,
  spawnDetached,
  sleep,
} from '../utils/process-utils';

const PROGRESS_PATTERN = /pulling|verifying|writing/;
const SUMMARY_PATTERN = /Parameters|Family|Format/;

export interface PullOptions {
  onProgress?: (line: string) => void;
  signal?: AbortSignal;
}

/**
 * Thin wrapper around the `ollama` binary
 * All model storage, download and inference stays inside ollama
 */
export class OllamaClient {
  private binary: string;

  constructor(binary: string = 'ollama') {
    this.binary = binary;
  }

  async isInstalled(): Promise<boolean> {
    return commandExists(this.binary);
  }

  /**
   * Installed version ("0.3.12"), or null if ollama is missing or prints no version
   */
  async getVersion(): Promise<string | null> {
    const output = await tryExecCommand(`${this.binary} --version 2>&1`);
    return output ? this.parseVersion(output) : null;
  }

  parseVersion(output: string): string | null {
    const match = output.match(/\d+\.\d+\.\d+/);
    return match ? match[0] : null;
  }

  /**
   * Installed model names, sorted
   * Returns an empty list when ollama is missing or the daemon is down
   */
  async listModels(): Promise<string[]> {
    const output = await tryExecCommand(`${this.binary} list 2>/dev/null`);
    return output ? this.parseList(output) : [];
  }

  /**
   * Parse `ollama list` output
   * NAME                ID              SIZE      MODIFIED
   * llama3.1:latest     42182419e950    4.7 GB    2 days ago
   */
  parseList(output: string): string[] {
    return output
      .split('\n')
      .slice(1)
      .map((line) => line.trim().split(/\s+/)[0])
      .filter((name) => name.length > 0)
      .sort();
  }

  /**
   * Prefix match, so "llama3.1" is satisfied by "llama3.1:latest"
   */
  async isModelInstalled(model: string): Promise<boolean> {
    const models = await this.listModels();
    return models.some((name) => name.startsWith(model));
  }

  /**
   * Pull a model, forwarding progress lines (pulling/verifying/writing)
   * Resolves with the ollama exit code
   */
  async pull(model: string, options: PullOptions = {}): Promise<number> {
    const { onProgress, signal } = options;
    return runWithLines(
      this.binary,
      ['pull', model],
      (line) => {
        if (onProgress && PROGRESS_PATTERN.test(line)) {
          onProgress(line);
        }
      },
      { signal }
    );
  }

  /**
   * Interactive chat session attached to this terminal
   */
  async run(model: string): Promise<number> {
    return runInteractive(this.binary, ['run', model]);
  }

  /**
   * One-shot prompt with output discarded (used for benchmarks)
   */
  async runPrompt(model: string, promptText: string): Promise<number> {
    return runWithLines(this.binary, ['run', model], () => undefined, { input: `${promptText}\n` });
  }

  async show(model: string): Promise<string> {
    return (await tryExecCommand(`${this.binary} show ${shellQuote(model)} 2>/dev/null`)) ?? '';
  }

  /**
   * One-line description (parameters, family or format) from `ollama show`
   */
  async showSummary(model: string): Promise<string> {
    return this.parseShowSummary(await this.show(model));
  }

  parseShowSummary(output: string): string {
    const line = output.split('\n').find((l) => SUMMARY_PATTERN.test(l));
    return line ? line.trim() : '';
  }

  async remove(model: string): Promise<void> {
    await execCommand(`${this.binary} rm ${shellQuote(model)}`);
  }

  async isServing(): Promise<boolean> {
    return (await tryExecCommand('pgrep -f "ollama serve"')) !== null;
  }

  /**
   * Start `ollama serve` in the background and give it time to bind its port
   */
  async startServe(waitMs: number = 3000): Promise<void> {
    spawnDetached(this.binary, ['serve']);
    await sleep(waitMs);
  }
}

/**
 * Whether a catalog name appears in `ollama list` output
 * Catalog names carry no tag while listed names do ("phi3" vs "phi3:latest")
 */
export function isListed(installed: ReadonlySet<string>, model: string): boolean {
  return installed.has(model) || (!model.includes(':') && installed.has(`${model}:latest`));
}

/**
 * Single-quote an argument for /bin/sh
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export const ollamaClient = new OllamaClient();
