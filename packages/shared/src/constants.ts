import { homedir } from 'node:os';
import { join } from 'node:path';

export const DISKWATCH_HOME = process.env.DISKWATCH_HOME || join(homedir(), '.diskwatch');
export const DISKWATCH_DB_FILE = join(DISKWATCH_HOME, 'diskwatch.db');

export const DEFAULT_POLL_INTERVAL = 300;
export const DEFAULT_ALERT_THRESHOLD = 90;
export const DEFAULT_HTTP_PORT = 8503;
export const DEFAULT_HTTP_HOST = '0.0.0.0';
export const DEFAULT_DELIVERY_TIMEOUT = 5000;
export const DEFAULT_WEBHOOK_TIMEOUT = 5000;
export const DEFAULT_DUF_COMMAND = 'duf';
export const DEFAULT_DUF_TIMEOUT = 10_000;
export const DEFAULT_API_URL = `http://127.0.0.1:${DEFAULT_HTTP_PORT}`;

export const DEFAULT_HISTORY_HOURS = 24;
export const MIN_HISTORY_HOURS = 1;
export const MAX_HISTORY_HOURS = 8760;

export const DEFAULT_ALERT_LIMIT = 50;
export const MIN_ALERT_LIMIT = 1;
export const MAX_ALERT_LIMIT = 500;

export const DISKWATCH_VERSION = '1.0.0';
