import { z } from 'zod';

export const volumeMetricSchema = z.object({
  hostname: z.string(),
  mountpoint: z.string(),
  device: z.string(),
  fstype: z.string(),
  totalBytes: z.number(),
  usedBytes: z.number(),
  freeBytes: z.number(),
  usagePercent: z.number(),
});

export const currentUsageSchema = z.object({
  hostname: z.string(),
  timestamp: z.string(),
  disks: z.array(volumeMetricSchema),
  alertThreshold: z.number(),
});

export const historyPointSchema = z.object({
  timestamp: z.string(),
  usagePercent: z.number(),
  usedBytes: z.number(),
  totalBytes: z.number(),
});

export const usageHistorySchema = z.object({
  mountpoint: z.string(),
  hours: z.number(),
  data: z.array(historyPointSchema),
});

export const alertSchema = z.object({
  id: z.number().int(),
  timestamp: z.string(),
  hostname: z.string(),
  mountpoint: z.string(),
  usagePercent: z.number(),
  threshold: z.number(),
  acknowledged: z.boolean(),
});

export const alertListSchema = z.array(alertSchema);

export const acknowledgeResultSchema = z.object({ status: z.literal('ok') });

export const apiErrorSchema = z.object({ error: z.string() });
