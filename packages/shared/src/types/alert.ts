export interface NewAlert {
  timestamp: Date;
  hostname: string;
  mountpoint: string;
  usagePercent: number;
  threshold: number;
}

export interface Alert {
  id: number;
  timestamp: string;
  hostname: string;
  mountpoint: string;
  usagePercent: number;
  threshold: number;
  acknowledged: boolean;
}

export interface AcknowledgeResult {
  status: 'ok';
}
