import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { systemDetector } from './system-detector';
import { configStore } from './config-store';
import { fileExists } from '../utils/file-utils';
import { runInteractive } from '../utils/process-utils';

export type EnvSettings = Record<string, string>;

export const GPU_ENV: EnvSettings = {
  CUDA_VISIBLE_DEVICES: '0',
  OLLAMA_GPU_OVERHEAD: '0.1',
  OLLAMA_MAX_LOADED_MODELS: '3',
};

export const OLLAMA_ENV: EnvSettings = {
  OLLAMA_NUM_PARALLEL: '2',
  OLLAMA_MAX_QUEUE: '10',
  OLLAMA_KEEP_ALIVE: '5m',
};

export const RECOMMENDED_RAM_GB = 16;
export const RECOMMENDED_SWAP_GB = 8;
const SWAP_FILE = '/swapfile';

export interface OptimizationReport {
  ramGb: number;
  vramGb: number;
  swapGb: number;
  governor: string | null;
  ramLow: boolean;              // Below RECOMMENDED_RAM_GB
  swapLow: boolean;             // Only meaningful when ramLow
  gpuTunable: boolean;
  governorTunable: boolean;
}

export class Optimizer {
  private homeDir: string;

  constructor(homeDir: string = os.homedir()) {
    this.homeDir = homeDir;
  }

  async analyze(): Promise<OptimizationReport> {
    const ramGb = systemDetector.getRamGb();
    const vramGb = await configStore.getVramSize();
    const swapGb = await systemDetector.getSwapGb();
    const governor = await systemDetector.getCpuGovernor();

    return this.buildReport(ramGb, vramGb, swapGb, governor);
  }

  buildReport(ramGb: number, vramGb: number, swapGb: number, governor: string | null): OptimizationReport {
    const ramLow = ramGb < RECOMMENDED_RAM_GB;
    return {
      ramGb,
      vramGb,
      swapGb,
      governor,
      ramLow,
      swapLow: ramLow && swapGb < RECOMMENDED_SWAP_GB,
      gpuTunable: vramGb > 0,
      governorTunable: governor !== null && governor !== 'performance',
    };
  }

  /**
   * ~/.zshrc when present, otherwise ~/.bashrc
   */
  async shellProfilePath(): Promise<string> {
    const zshrc = path.join(this.homeDir, '.zshrc');
    if (await fileExists(zshrc)) {
      return zshrc;
    }
    return path.join(this.homeDir, '.bashrc');
  }

  formatEnvBlock(title: string, env: EnvSettings): string {
    const exports = Object.entries(env).map(([key, value]) => `export ${key}=${value}`);
    return ['', `# ${title}`, ...exports].join('\n') + '\n';
  }

  /**
   * Apply settings to this process (and children such as `ollama serve`)
   */
  applyEnv(env: EnvSettings): void {
    for (const [key, value] of Object.entries(env)) {
      process.env[key] = value;
    }
  }

  /**
   * Persist settings to the shell profile; returns the profile path
   */
  async saveEnvToProfile(title: string, env: EnvSettings): Promise<string> {
    const profile = await this.shellProfilePath();
    await fs.appendFile(profile, this.formatEnvBlock(title, env), 'utf-8');
    return profile;
  }

  /**
   * Create and enable an 8GB swap file with an fstab entry (root only)
   */
  async createSwapFile(): Promise<void> {
    if (typeof process.getuid === 'function' && process.getuid() !== 0) {
      throw new Error('Root privileges required for swap creation');
    }

    const steps = [
      `fallocate -l ${RECOMMENDED_SWAP_GB}G ${SWAP_FILE} || dd if=/dev/zero of=${SWAP_FILE} bs=1G count=${RECOMMENDED_SWAP_GB}`,
      `chmod 600 ${SWAP_FILE}`,
      `mkswap ${SWAP_FILE}`,
      `swapon ${SWAP_FILE}`,
    ];

    for (const step of steps) {
      const code = await runInteractive(step, [], { shell: true });
      if (code !== 0) {
        throw new Error(`Swap setup failed at "${step}" (exit code ${code})`);
      }
    }

    const fstab = await fs.readFile('/etc/fstab', 'utf-8').catch(() => '');
    if (!fstab.includes(SWAP_FILE)) {
      await fs.appendFile('/etc/fstab', `${SWAP_FILE} none swap sw 0 0\n`, 'utf-8');
    }
  }

  async setPerformanceGovernor(): Promise<void> {
    const code = await runInteractive(
      'echo performance | sudo tee /sys/devices/system/cpu/cpu*/cpufreq/scaling_governor >/dev/null',
      [],
      { shell: true }
    );
    if (code !== 0) {
      throw new Error(`Failed to set CPU governor (exit code ${code})`);
    }
  }
}

export const optimizer = new Optimizer();
