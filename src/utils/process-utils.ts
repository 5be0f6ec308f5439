import { exec, execFile, spawn, SpawnOptions } from 'child_process';
import { promisify } from 'util';

export const execAsync = promisify(exec);
export const execFileAsync = promisify(execFile);

/**
 * Execute a command and return stdout
 * Throws on non-zero exit code
 */
export async function execCommand(command: string): Promise<string> {
  const { stdout } = await execAsync(command);
  return stdout.trim();
}

/**
 * Execute a command and return stdout, or null on any failure
 */
export async function tryExecCommand(command: string): Promise<string | null> {
  try {
    return await execCommand(command);
  } catch {
    return null;
  }
}

/**
 * Check if a command exists in PATH
 */
export async function commandExists(command: string): Promise<boolean> {
  try {
    await execAsync(`command -v ${command}`);
    return true;
  } catch {
    return false;
  }
}

/**
 * Run an operation with a signal that aborts on Ctrl-C
 * The SIGINT handler only lives as long as the operation, so the manager itself keeps running
 */
export async function withInterrupt<T>(operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    return await operation(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

/**
 * Run a command attached to the current terminal (sudo prompts, htop, ollama run)
 * Resolves with the exit code; never rejects on non-zero exit
 */
export function runInteractive(
  command: string,
  args: string[] = [],
  options: Pick<SpawnOptions, 'shell' | 'env'> = {}
): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'inherit', ...options });
    child.on('error', reject);
    child.on('close', (code) => resolve(code ?? 1));
  });
}

/**
 * Run a command and feed every output line (stdout and stderr) to a callback
 * Carriage returns count as line breaks so progress bars arrive as separate updates
 */
export function runWithLines(
  command: string,
  args: string[],
  onLine: (line: string) => void,
  options: { input?: string; signal?: AbortSignal } = {}
): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      signal: options.signal,
    });

    let pending = '';
    const handleChunk = (chunk: Buffer) => {
      pending += chunk.toString('utf-8');
      const parts = pending.split(/\r\n|\r|\n/);
      pending = parts.pop() ?? '';
      for (const part of parts) {
        const line = stripAnsi(part).trim();
        if (line) onLine(line);
      }
    };

    child.stdout?.on('data', handleChunk);
    child.stderr?.on('data', handleChunk);

    child.on('error', reject);
    child.on('close', (code) => {
      const rest = stripAnsi(pending).trim();
      if (rest) onLine(rest);
      resolve(code ?? 1);
    });

    if (options.input !== undefined) {
      child.stdin?.end(options.input);
    } else {
      child.stdin?.end();
    }
  });
}

/**
 * Start a detached background process that outlives the CLI
 */
export function spawnDetached(command: string, args: string[]): void {
  const child = spawn(command, args, { detached: true, stdio: 'ignore' });
  child.unref();
}

/**
 * Remove ANSI escape sequences (cursor movement, colours) from process output
 */
export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;?]*[A-Za-z]/g, '');
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
