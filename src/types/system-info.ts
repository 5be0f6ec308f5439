export type PerformanceRating = 'Excellent' | 'Very Good' | 'Good' | 'Limited';

export interface GpuInfo {
  description: string;  // Human-readable line shown in system analysis
  vendor: 'nvidia' | 'amd' | 'apple' | 'generic' | 'none';
  vramGb: number;       // Only measured for NVIDIA; 0 otherwise
}

export interface HardwareProfile {
  os: string;           // /etc/os-release ID, "macos" or "unknown"
  cpu: string;
  ramGb: number;
  gpu: GpuInfo;
  vramGb: number;
  rating: PerformanceRating;
}

export interface ResourceUsage {
  cpuPercent: number;
  ramPercent: number;
  gpuPercent?: number;
  gpuMemoryPercent?: number;
  timestamp: number;
}

export interface OllamaProcess {
  pid: number;
  cpu: number;
  mem: number;
  command: string;
}
