import * as os from 'os';
import * as fs from 'fs/promises';
import { execCommand, tryExecCommand, commandExists } from '../utils/process-utils';
import {
  GpuInfo,
  HardwareProfile,
  OllamaProcess,
  PerformanceRating,
  ResourceUsage,
} from '../types/system-info';
import { configStore } from './config-store';

const GIB = 1024 * 1024 * 1024;

interface CpuSample {
  idle: number;
  total: number;
}

/**
 * Hardware detection for model recommendations
 * Linux tools (lscpu, nvidia-smi, rocm-smi, lshw) and macOS system_profiler,
 * each optional; missing tools degrade to conservative defaults
 */
export class SystemDetector {
  private platform: NodeJS.Platform;
  private lastCpuSample: CpuSample | null = null;

  constructor(platform: NodeJS.Platform = process.platform) {
    this.platform = platform;
  }

  get isMac(): boolean {
    return this.platform === 'darwin';
  }

  /**
   * Distribution ID from /etc/os-release ("ubuntu", "fedora", ...), "macos" or "unknown"
   */
  async detectOs(): Promise<string> {
    if (this.isMac) {
      return 'macos';
    }

    try {
      const content = await fs.readFile('/etc/os-release', 'utf-8');
      return this.parseOsRelease(content) ?? 'unknown';
    } catch {
      return 'unknown';
    }
  }

  parseOsRelease(content: string): string | null {
    for (const line of content.split('\n')) {
      const match = line.match(/^ID=(.*)$/);
      if (match) {
        const id = match[1].trim().replace(/^["']|["']$/g, '');
        return id || null;
      }
    }
    return null;
  }

  /**
   * Total RAM in whole GiB (rounded down)
   */
  getRamGb(): number {
    return Math.floor(os.totalmem() / GIB);
  }

  async getCpuInfo(): Promise<string> {
    const cores = os.cpus().length;

    if (this.isMac) {
      const arch = (await tryExecCommand('uname -m')) || os.arch();
      return `${cores} cores (${arch})`;
    }

    const lscpu = await tryExecCommand('lscpu');
    const parsed = lscpu ? this.parseLscpu(lscpu) : {};
    const arch = parsed.architecture || os.arch();
    return `${cores} cores, ${parsed.threadsPerCore ?? 1} threads (${arch})`;
  }

  parseLscpu(output: string): { architecture?: string; threadsPerCore?: number } {
    const result: { architecture?: string; threadsPerCore?: number } = {};

    for (const line of output.split('\n')) {
      const [rawKey, ...rest] = line.split(':');
      const key = rawKey.trim();
      const value = rest.join(':').trim();
      if (!value) continue;

      if (key === 'Architecture') {
        result.architecture = value;
      } else if (key === 'Thread(s) per core') {
        const threads = parseInt(value, 10);
        if (!isNaN(threads)) result.threadsPerCore = threads;
      }
    }

    return result;
  }

  /**
   * Detect the primary GPU and persist its VRAM for later recommendations
   */
  async getGpuInfo(): Promise<GpuInfo> {
    const gpu = await this.detectGpu();
    await configStore.saveVramSize(gpu.vramGb);
    return gpu;
  }

  private async detectGpu(): Promise<GpuInfo> {
    if (await commandExists('nvidia-smi')) {
      const output = await tryExecCommand(
        'nvidia-smi --query-gpu=name,memory.total --format=csv,noheader,nounits'
      );
      const parsed = output ? this.parseNvidiaSmi(output) : null;
      if (parsed) {
        const vramGb = Math.floor(parsed.memoryMib / 1024);
        return {
          description: `${parsed.name}, ${parsed.memoryMib} (${vramGb}GB VRAM)`,
          vendor: 'nvidia',
          vramGb,
        };
      }
    }

    if (await commandExists('rocm-smi')) {
      const output = await tryExecCommand('rocm-smi --showproductname --csv');
      const product = output ? this.parseRocmSmi(output) : null;
      return {
        description: `${product ?? 'AMD GPU'} (AMD ROCm)`,
        vendor: 'amd',
        vramGb: 0,
      };
    }

    if (this.isMac) {
      const output = await tryExecCommand('system_profiler SPDisplaysDataType');
      const chipset = output ? this.parseSystemProfiler(output) : null;
      return {
        description: `${chipset ?? 'Unknown'} (Apple Silicon)`,
        vendor: 'apple',
        vramGb: 0,
      };
    }

    if (await commandExists('lshw')) {
      const output = await tryExecCommand('lshw -C display 2>/dev/null');
      const product = output ? this.parseLshw(output) : null;
      return {
        description: product ?? 'Integrated Graphics',
        vendor: 'generic',
        vramGb: 0,
      };
    }

    return { description: 'No GPU detected', vendor: 'none', vramGb: 0 };
  }

  /**
   * First GPU line of `nvidia-smi --query-gpu=name,memory.total --format=csv,noheader,nounits`
   * Example: "NVIDIA GeForce RTX 3080, 10240"
   */
  parseNvidiaSmi(output: string): { name: string; memoryMib: number } | null {
    const firstLine = output.split('\n').find((line) => line.trim().length > 0);
    if (!firstLine) return null;

    const separator = firstLine.lastIndexOf(',');
    if (separator === -1) return null;

    const name = firstLine.slice(0, separator).trim();
    const memoryMib = parseInt(firstLine.slice(separator + 1).trim(), 10);
    if (!name || isNaN(memoryMib)) return null;

    return { name, memoryMib };
  }

  /**
   * Last CSV row of `rocm-smi --showproductname --csv`, second column
   */
  parseRocmSmi(output: string): string | null {
    const lines = output.split('\n').filter((line) => line.trim().length > 0);
    if (lines.length < 2) return null;
    const product = lines[lines.length - 1].split(',')[1]?.trim();
    return product || null;
  }

  parseSystemProfiler(output: string): string | null {
    const match = output.match(/Chipset Model:\s*(.+)/);
    return match ? match[1].trim() : null;
  }

  parseLshw(output: string): string | null {
    const match = output.match(/product:\s*(.+)/i);
    return match ? match[1].trim() : null;
  }

  rate(ramGb: number, vramGb: number): PerformanceRating {
    if (ramGb >= 32 && vramGb >= 8) return 'Excellent';
    if (ramGb >= 16 && vramGb >= 4) return 'Very Good';
    if (ramGb >= 8) return 'Good';
    return 'Limited';
  }

  /**
   * Full hardware profile; refreshes the VRAM cache as a side effect
   */
  async analyze(): Promise<HardwareProfile> {
    const [osId, cpu, gpu] = await Promise.all([
      this.detectOs(),
      this.getCpuInfo(),
      this.getGpuInfo(),
    ]);
    const ramGb = this.getRamGb();

    return {
      os: osId,
      cpu,
      ramGb,
      gpu,
      vramGb: gpu.vramGb,
      rating: this.rate(ramGb, gpu.vramGb),
    };
  }

  /**
   * Swap size in whole GiB (Linux only, 0 elsewhere)
   */
  async getSwapGb(): Promise<number> {
    try {
      const content = await fs.readFile('/proc/meminfo', 'utf-8');
      const swapKb = this.parseMeminfo(content).SwapTotal ?? 0;
      return Math.floor((swapKb * 1024) / GIB);
    } catch {
      return 0;
    }
  }

  /**
   * /proc/meminfo values in kB, keyed by field name
   */
  parseMeminfo(content: string): Record<string, number> {
    const values: Record<string, number> = {};
    for (const line of content.split('\n')) {
      const match = line.match(/^(\w+):\s+(\d+)/);
      if (match) {
        values[match[1]] = parseInt(match[2], 10);
      }
    }
    return values;
  }

  async getCpuGovernor(): Promise<string | null> {
    try {
      const content = await fs.readFile('/sys/devices/system/cpu/cpu0/cpufreq/scaling_governor', 'utf-8');
      return content.trim() || null;
    } catch {
      return null;
    }
  }

  private sampleCpu(): CpuSample {
    let idle = 0;
    let total = 0;
    for (const cpu of os.cpus()) {
      const { user, nice, sys, irq } = cpu.times;
      idle += cpu.times.idle;
      total += user + nice + sys + irq + cpu.times.idle;
    }
    return { idle, total };
  }

  cpuPercentBetween(previous: CpuSample, current: CpuSample): number {
    const totalDelta = current.total - previous.total;
    if (totalDelta <= 0) return 0;
    const idleDelta = current.idle - previous.idle;
    return Math.max(0, Math.min(100, (1 - idleDelta / totalDelta) * 100));
  }

  private async getRamPercent(): Promise<number> {
    const total = os.totalmem();
    let available = os.freemem();

    // MemAvailable counts reclaimable page cache, which freemem() does not
    if (!this.isMac) {
      try {
        const meminfo = this.parseMeminfo(await fs.readFile('/proc/meminfo', 'utf-8'));
        if (meminfo.MemAvailable !== undefined) {
          available = meminfo.MemAvailable * 1024;
        }
      } catch {
        // keep freemem()
      }
    }

    return total > 0 ? ((total - available) / total) * 100 : 0;
  }

  /**
   * nvidia-smi utilization line: "<util>, <used MiB>, <total MiB>"
   */
  parseNvidiaUsage(output: string): { gpuPercent: number; gpuMemoryPercent: number } | null {
    const firstLine = output.split('\n').find((line) => line.trim().length > 0);
    if (!firstLine) return null;

    const [util, used, total] = firstLine.split(',').map((part) => parseFloat(part.trim()));
    if ([util, used, total].some((n) => n === undefined || isNaN(n)) || total === 0) {
      return null;
    }

    return { gpuPercent: util, gpuMemoryPercent: (used / total) * 100 };
  }

  /**
   * Current CPU/RAM/GPU utilization
   * CPU is measured against the previous call; the first call samples over 250ms
   */
  async collectUsage(): Promise<ResourceUsage> {
    let previous = this.lastCpuSample;
    if (!previous) {
      previous = this.sampleCpu();
      await new Promise((resolve) => setTimeout(resolve, 250));
    }
    const current = this.sampleCpu();
    this.lastCpuSample = current;

    const usage: ResourceUsage = {
      cpuPercent: this.cpuPercentBetween(previous, current),
      ramPercent: await this.getRamPercent(),
      timestamp: Date.now(),
    };

    if (await commandExists('nvidia-smi')) {
      const output = await tryExecCommand(
        'nvidia-smi --query-gpu=utilization.gpu,memory.used,memory.total --format=csv,noheader,nounits'
      );
      const gpu = output ? this.parseNvidiaUsage(output) : null;
      if (gpu) {
        usage.gpuPercent = gpu.gpuPercent;
        usage.gpuMemoryPercent = gpu.gpuMemoryPercent;
      }
    }

    return usage;
  }

  /**
   * Running ollama processes from `ps aux`
   */
  async listOllamaProcesses(): Promise<OllamaProcess[]> {
    const output = await execCommand('ps aux').catch(() => '');
    return this.parsePsAux(output);
  }

  parsePsAux(output: string): OllamaProcess[] {
    const processes: OllamaProcess[] = [];

    for (const line of output.split('\n').slice(1)) {
      const columns = line.trim().split(/\s+/);
      if (columns.length < 11) continue;

      const command = columns.slice(10).join(' ');
      if (!command.includes('ollama') || /\bgrep\b/.test(command)) continue;

      processes.push({
        pid: parseInt(columns[1], 10),
        cpu: parseFloat(columns[2]),
        mem: parseFloat(columns[3]),
        command,
      });
    }

    return processes;
  }
}

// Export singleton instance
export const systemDetector = new SystemDetector();
