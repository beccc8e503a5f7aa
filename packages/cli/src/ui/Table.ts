import Table from 'cli-table3';
import chalk from 'chalk';
import type { Alert, CurrentUsage, UsageHistory } from '@diskwatch/shared';
import { colorUsage, formatBytes, formatTimestamp, usageBar } from '../utils/format.js';

const TABLE_STYLE = {
  head: [],
  border: ['gray'],
};

export function renderVolumeTable(usage: CurrentUsage): string {
  const table = new Table({
    head: [
      chalk.bold('mountpoint'),
      chalk.bold('device'),
      chalk.bold('type'),
      chalk.bold('size'),
      chalk.bold('used'),
      chalk.bold('avail'),
      chalk.bold('use%'),
      chalk.bold(''),
    ],
    style: TABLE_STYLE,
  });

  for (const disk of usage.disks) {
    table.push([
      disk.mountpoint,
      disk.device,
      disk.fstype,
      formatBytes(disk.totalBytes),
      formatBytes(disk.usedBytes),
      formatBytes(disk.freeBytes),
      colorUsage(disk.usagePercent, usage.alertThreshold),
      usageBar(disk.usagePercent),
    ]);
  }

  return table.toString();
}

export function renderHistoryTable(history: UsageHistory, threshold: number): string {
  const table = new Table({
    head: [chalk.bold('time (UTC)'), chalk.bold('use%'), chalk.bold('used'), chalk.bold('size')],
    style: TABLE_STYLE,
  });

  for (const point of history.data) {
    table.push([
      formatTimestamp(point.timestamp),
      colorUsage(point.usagePercent, threshold),
      formatBytes(point.usedBytes),
      formatBytes(point.totalBytes),
    ]);
  }

  return table.toString();
}

export function renderAlertTable(alerts: Alert[]): string {
  const table = new Table({
    head: [
      chalk.bold('id'),
      chalk.bold('time (UTC)'),
      chalk.bold('host'),
      chalk.bold('mountpoint'),
      chalk.bold('use%'),
      chalk.bold('threshold'),
      chalk.bold('ack'),
    ],
    style: TABLE_STYLE,
  });

  for (const alert of alerts) {
    table.push([
      String(alert.id),
      formatTimestamp(alert.timestamp),
      alert.hostname,
      alert.mountpoint,
      colorUsage(alert.usagePercent, alert.threshold),
      `${alert.threshold}%`,
      alert.acknowledged ? chalk.green('yes') : chalk.yellow('no'),
    ]);
  }

  return table.toString();
}
