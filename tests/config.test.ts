import { describe, expect, it } from 'vitest';
import { loadConfig, splitCommands } from '../src/config';
import { ConfigurationError } from '../src/errors';

describe('loadConfig', () => {
  it('falls back to defaults on an empty environment', () => {
    expect(loadConfig({})).toEqual({
      logFile: undefined,
      startTime: undefined,
      delta: undefined,
      commands: [],
      analytics: { slowRequestMs: 1000, queuePeakThreshold: 1, topIpsLimit: 10 },
      verbose: false,
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      LOG_FILE: '/var/log/haproxy.log',
      START: '11/Dec/2013:10:00:00',
      DELTA: '2h',
      COMMANDS: 'counter,top_ips',
      SLOW_REQUEST_MS: '250',
      QUEUE_PEAK_THRESHOLD: '3',
      TOP_IPS_LIMIT: '5',
      VERBOSE: 'true',
    });

    expect(config.logFile).toBe('/var/log/haproxy.log');
    expect(config.startTime?.toISOString()).toBe('2013-12-11T10:00:00.000Z');
    expect(config.delta).toBe(7_200_000);
    expect(config.commands).toEqual(['counter', 'top_ips']);
    expect(config.analytics).toEqual({ slowRequestMs: 250, queuePeakThreshold: 3, topIpsLimit: 5 });
    expect(config.verbose).toBe(true);
  });

  it('treats empty values as unset', () => {
    const config = loadConfig({ LOG_FILE: '', SLOW_REQUEST_MS: '', START: '' });
    expect(config.logFile).toBeUndefined();
    expect(config.startTime).toBeUndefined();
    expect(config.analytics.slowRequestMs).toBe(1000);
  });

  it('rejects non-numeric and out-of-range thresholds', () => {
    expect(() => loadConfig({ SLOW_REQUEST_MS: 'fast' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ SLOW_REQUEST_MS: 'fast' })).toThrow(/SLOW_REQUEST_MS/);
    expect(() => loadConfig({ TOP_IPS_LIMIT: '0' })).toThrow(/TOP_IPS_LIMIT/);
    expect(() => loadConfig({ QUEUE_PEAK_THRESHOLD: '1.5' })).toThrow(/QUEUE_PEAK_THRESHOLD/);
  });

  it('rejects a malformed window', () => {
    expect(() => loadConfig({ START: 'monday' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ DELTA: 'soon' })).toThrow(ConfigurationError);
  });

  it('only enables verbose output for 1 or true', () => {
    expect(loadConfig({ VERBOSE: '1' }).verbose).toBe(true);
    expect(loadConfig({ VERBOSE: 'yes' }).verbose).toBe(false);
  });
});

describe('splitCommands', () => {
  it('trims names and drops empty ones', () => {
    expect(splitCommands(' counter, ,top_ips ,')).toEqual(['counter', 'top_ips']);
  });
});
