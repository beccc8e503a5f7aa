import { describe, it, expect, afterEach } from 'vitest';
import {
  createLogger,
  getLogger,
  parseLogLevel,
  setDefaultLogger,
  setLogLevel,
} from '../utils/logger.js';

describe('createLogger', () => {
  it('should default to the info level', () => {
    expect(createLogger().level).toBe('info');
  });

  it('should use the requested level', () => {
    expect(createLogger({ level: 'debug' }).level).toBe('debug');
  });
});

describe('parseLogLevel', () => {
  it('should accept known levels regardless of case and padding', () => {
    expect(parseLogLevel('warn')).toBe('warn');
    expect(parseLogLevel(' DEBUG ')).toBe('debug');
  });

  it('should fall back for missing or unknown values', () => {
    expect(parseLogLevel(undefined)).toBe('info');
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel('', 'error')).toBe('error');
  });
});

describe('setLogLevel', () => {
  afterEach(() => {
    setDefaultLogger(createLogger({ level: 'fatal' }));
  });

  it('should change the level of the instance modules already hold', () => {
    const held = getLogger();

    setLogLevel('debug');

    expect(held.level).toBe('debug');
    expect(getLogger()).toBe(held);
  });
});
