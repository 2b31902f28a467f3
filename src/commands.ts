import { AnalyticsCommands } from './analytics';
import { ConfigurationError } from './errors';

export const COMMANDS = Object.freeze({
  counter: (a: AnalyticsCommands) => a.counter(),
  counter_invalid: (a: AnalyticsCommands) => a.counterInvalid(),
  http_methods: (a: AnalyticsCommands) => a.httpMethods(),
  ip_counter: (a: AnalyticsCommands) => a.ipCounter(),
  queue_peaks: (a: AnalyticsCommands) => a.queuePeaks(),
  request_path_counter: (a: AnalyticsCommands) => a.requestPathCounter(),
  server_load: (a: AnalyticsCommands) => a.serverLoad(),
  slow_requests: (a: AnalyticsCommands) => a.slowRequests(),
  status_codes_counter: (a: AnalyticsCommands) => a.statusCodesCounter(),
  top_ips: (a: AnalyticsCommands) => a.topIps(),
});

export type CommandName = keyof typeof COMMANDS;

export type CommandResult = ReturnType<(typeof COMMANDS)[CommandName]>;

export function listCommands(): CommandName[] {
  return Object.keys(COMMANDS)
    .filter(isCommandName)
    .sort();
}

export function isCommandName(name: string): name is CommandName {
  return Object.prototype.hasOwnProperty.call(COMMANDS, name);
}

export function runCommand(name: string, analytics: AnalyticsCommands): CommandResult {
  if (!isCommandName(name)) {
    throw new ConfigurationError(`unknown command "${name}" (try --list-commands)`);
  }
  return COMMANDS[name](analytics);
}
