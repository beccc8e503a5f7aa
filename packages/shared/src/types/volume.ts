/** One volume reading produced by a collection cycle. */
export interface VolumeMetric {
  hostname: string;
  mountpoint: string;
  device: string;
  fstype: string;
  totalBytes: number;
  usedBytes: number;
  freeBytes: number;
  /** 0-100, one decimal place */
  usagePercent: number;
}

export interface HistoryPoint {
  timestamp: string;
  usagePercent: number;
  usedBytes: number;
  totalBytes: number;
}

export interface UsageHistory {
  mountpoint: string;
  hours: number;
  data: HistoryPoint[];
}

export interface CurrentUsage {
  hostname: string;
  timestamp: string;
  disks: VolumeMetric[];
  alertThreshold: number;
}
