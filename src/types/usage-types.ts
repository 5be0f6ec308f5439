export interface ModelUsageCount {
  model: string;
  count: number;
}

export interface RecentInstall {
  model: string;
  date: string;         // "YYYY-MM-DD HH:MM:SS" as logged
}

export interface UsageReport {
  mostUsed: ModelUsageCount[];
  recentInstalls: RecentInstall[];
  stats: {
    switches: number;
    installs: number;
    updates: number;
  };
}
