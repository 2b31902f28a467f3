import { describe, expect, it } from 'vitest';
import { AnalyticsCommands } from '../src/analytics';
import { COMMANDS, isCommandName, listCommands, runCommand } from '../src/commands';
import { ConfigurationError } from '../src/errors';
import { LogStore } from '../src/logStore';
import { logLine } from './fixtures';

function sampleAnalytics(): AnalyticsCommands {
  const store = new LogStore({ source: [logLine(), logLine({ queueBackend: 3 }), 'junk'] });
  store.ingest();
  return new AnalyticsCommands(store);
}

describe('command registry', () => {
  it('lists every command name alphabetically', () => {
    expect(listCommands()).toEqual([
      'counter',
      'counter_invalid',
      'http_methods',
      'ip_counter',
      'queue_peaks',
      'request_path_counter',
      'server_load',
      'slow_requests',
      'status_codes_counter',
      'top_ips',
    ]);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(COMMANDS)).toBe(true);
  });

  it('recognises only registered names', () => {
    expect(isCommandName('top_ips')).toBe(true);
    expect(isCommandName('topIps')).toBe(false);
    expect(isCommandName('toString')).toBe(false);
    expect(isCommandName('__proto__')).toBe(false);
  });

  it('dispatches by name', () => {
    const analytics = sampleAnalytics();
    expect(runCommand('counter', analytics)).toBe(2);
    expect(runCommand('counter_invalid', analytics)).toBe(1);
    expect(runCommand('ip_counter', analytics)).toEqual(new Map([['1.2.3.4', 2]]));
  });

  it('runs every listed command', () => {
    const analytics = sampleAnalytics();
    for (const name of listCommands()) {
      expect(() => runCommand(name, analytics)).not.toThrow();
    }
  });

  it('rejects unknown names', () => {
    expect(() => runCommand('nope', sampleAnalytics())).toThrow(ConfigurationError);
    expect(() => runCommand('nope', sampleAnalytics())).toThrow('unknown command "nope" (try --list-commands)');
  });
});
