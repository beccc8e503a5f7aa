import { execFile } from 'node:child_process';
import { hostname as osHostname } from 'node:os';
import { z } from 'zod';
import type { VolumeMetric } from '@diskwatch/shared';
import {
  DEFAULT_DUF_COMMAND,
  DEFAULT_DUF_TIMEOUT,
  SourceUnavailableError,
  roundPercent,
} from '@diskwatch/shared';
import type { VolumeSource } from './VolumeSource.js';

export type CommandRunner = (command: string, args: string[], timeoutMs: number) => Promise<string>;

export const runCommand: CommandRunner = (command, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { encoding: 'utf8', timeout: timeoutMs, maxBuffer: 4 * 1024 * 1024 },
      (error, stdout) => {
        if (error) {
          reject(error.killed ? new Error(`${command} timed out after ${timeoutMs}ms`) : error);
          return;
        }
        resolve(stdout);
      },
    );
  });

const dufEntrySchema = z.object({
  device: z.string().default('unknown'),
  device_type: z.string().optional(),
  mount_point: z.string().default('unknown'),
  fs_type: z.string().optional(),
  type: z.string().optional(),
  file_system: z.string().optional(),
  total: z.number().nonnegative().default(0),
  used: z.number().nonnegative().default(0),
  free: z.number().nonnegative().optional(),
});

export const dufReportSchema = z.array(dufEntrySchema);

export interface DufVolumeSourceOptions {
  hostname?: string;
  command?: string;
  timeout?: number;
  run?: CommandRunner;
}

/**
 * Reads volumes from `duf --json`. Any failure (missing binary, timeout,
 * non-zero exit, malformed report) fails the whole source; partial reports
 * are never returned.
 */
export class DufVolumeSource implements VolumeSource {
  readonly name = 'duf';
  private hostname: string;
  private command: string;
  private timeout: number;
  private run: CommandRunner;

  constructor(options: DufVolumeSourceOptions = {}) {
    this.hostname = options.hostname ?? osHostname();
    this.command = options.command ?? DEFAULT_DUF_COMMAND;
    this.timeout = options.timeout ?? DEFAULT_DUF_TIMEOUT;
    this.run = options.run ?? runCommand;
  }

  async read(): Promise<VolumeMetric[]> {
    let stdout: string;
    try {
      stdout = await this.run(this.command, ['--json'], this.timeout);
    } catch (err) {
      throw new SourceUnavailableError(this.name, err instanceof Error ? err.message : String(err));
    }

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch {
      throw new SourceUnavailableError(this.name, 'output is not valid JSON');
    }

    const parsed = dufReportSchema.safeParse(json);
    if (!parsed.success) {
      throw new SourceUnavailableError(
        this.name,
        `unexpected report shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      );
    }

    return parsed.data
      .filter((entry) => entry.device_type !== 'special')
      .map((entry) => {
        const free = entry.free ?? Math.max(0, entry.total - entry.used);
        return {
          hostname: this.hostname,
          mountpoint: entry.mount_point,
          device: entry.device,
          fstype: entry.fs_type ?? entry.type ?? entry.file_system ?? 'unknown',
          totalBytes: entry.total,
          usedBytes: entry.used,
          freeBytes: free,
          usagePercent: entry.total > 0 ? roundPercent((entry.used / entry.total) * 100) : 0,
        };
      });
  }
}
