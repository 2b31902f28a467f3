import { CommandResult } from './commands';

// Dates already arrive as ISO strings via Date#toJSON
function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Map) return Object.fromEntries(value);
  return value;
}

export function formatResult(name: string, result: CommandResult): string {
  return `${name}:\n${JSON.stringify(result, replacer, 2)}`;
}
