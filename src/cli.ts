import { AnalyticsCommands } from './analytics';
import { isCommandName, listCommands, runCommand } from './commands';
import { loadConfig, splitCommands } from './config';
import { ConfigurationError } from './errors';
import { formatResult } from './format';
import { readLogLines } from './logFile';
import { LogStore } from './logStore';

export interface CliOptions {
  logFile?: string;
  start?: string;
  delta?: string;
  commands?: string[];
  listCommands: boolean;
  verbose: boolean;
  help: boolean;
}

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const consoleIO: CliIO = {
  // eslint-disable-next-line no-console
  out: (line) => console.log(line),
  // eslint-disable-next-line no-console
  err: (line) => console.error(line),
};

const VALUE_FLAGS: Record<string, 'logFile' | 'start' | 'delta' | 'commands'> = {
  '--log': 'logFile',
  '-l': 'logFile',
  '--start': 'start',
  '-s': 'start',
  '--delta': 'delta',
  '-d': 'delta',
  '--command': 'commands',
  '-c': 'commands',
};

export function usage(): string {
  return [
    'Usage: haproxy-log-insights --log <file> [options]',
    '',
    'Options:',
    '  -l, --log <file>        HAProxy log file to analyze (env LOG_FILE)',
    '  -s, --start <date>      Window start, DD/Mon/YYYY[:HH:MM:SS] UTC (env START)',
    '  -d, --delta <dur>       Window length from start, e.g. 30m, 1h30m, 2d (env DELTA)',
    '  -c, --command <names>   Comma-separated commands to run (env COMMANDS)',
    '      --list-commands     Print available commands and exit',
    '  -v, --verbose           Print progress notices to stderr (env VERBOSE)',
    '  -h, --help              Show help',
  ].join('\n');
}

export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = { listCommands: false, verbose: false, help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    const target = VALUE_FLAGS[arg];
    if (target) {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new ConfigurationError(`Missing value for ${arg}`);
      }
      if (target === 'commands') {
        options.commands = [...(options.commands ?? []), ...splitCommands(next)];
      } else {
        options[target] = next;
      }
      i += 1;
      continue;
    }

    if (arg === '--list-commands') {
      options.listCommands = true;
    } else if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else {
      throw new ConfigurationError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

async function analyze(argv: string[], env: NodeJS.ProcessEnv, io: CliIO): Promise<number> {
  const cli = parseCliArgs(argv);
  if (cli.help) {
    io.out(usage());
    return 0;
  }
  if (cli.listCommands) {
    for (const name of listCommands()) io.out(name);
    return 0;
  }

  // --start/--delta take the place of START/DELTA before they are parsed
  const config = loadConfig({
    ...env,
    START: cli.start ?? env.START,
    DELTA: cli.delta ?? env.DELTA,
  });
  const verbose = cli.verbose || config.verbose;
  const notice = (msg: string) => {
    if (verbose) io.err(`[notice] ${msg}`);
  };
  const logFile = cli.logFile ?? config.logFile;
  const { startTime, delta } = config;
  const commands = cli.commands ?? config.commands;

  const unknown = commands.filter((name) => !isCommandName(name));
  if (unknown.length > 0) {
    throw new ConfigurationError(`unknown command(s): ${unknown.join(', ')} (try --list-commands)`);
  }

  let source: string[] | undefined;
  if (logFile) {
    notice(`reading ${logFile}`);
    source = await readLogLines(logFile);
  }
  const store = new LogStore({ source, startTime, delta });
  store.ingest();
  notice(`ingested total=${store.totalLines} valid=${store.entries.length} invalid=${store.counterOfInvalidLines()}`);

  if (commands.length === 0) {
    io.err('no commands given; pass --command (see --list-commands)');
    return 0;
  }

  const analytics = new AnalyticsCommands(store, config.analytics);
  for (const name of commands) {
    io.out(formatResult(name, runCommand(name, analytics)));
  }
  return 0;
}

/** Resolves to the process exit code; failures are reported on `io.err`. */
export async function run(argv: string[], env: NodeJS.ProcessEnv = process.env, io: CliIO = consoleIO): Promise<number> {
  try {
    return await analyze(argv, env, io);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    io.err(`error: ${message}`);
    return 1;
  }
}
