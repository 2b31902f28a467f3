import { ConfigurationError } from './errors';
import { parseLine } from './parser';
import { LineParser, LogEntry } from './types';
import { isInWindow, resolveWindow, TimeWindow } from './window';

export interface LogStoreOptions {
  source?: Iterable<string>;
  startTime?: Date;
  delta?: number; // ms; only meaningful together with startTime
  parser?: LineParser;
}

/**
 * Holds one ingestion run over a closed log: the valid entries (resequenced by
 * accept time once ingestion ends), the raw text of lines that failed to parse,
 * and the number of lines read. Build a new store for a new run.
 */
export class LogStore {
  private readonly source?: Iterable<string>;
  private readonly parser: LineParser;
  private readonly window: TimeWindow;
  private readonly validLines: LogEntry[] = [];
  private readonly invalidLines: string[] = [];
  private lineCount = 0;
  private ingested = false;

  constructor(options: LogStoreOptions = {}) {
    this.source = options.source;
    this.parser = options.parser ?? parseLine;
    this.window = resolveWindow(options.startTime, options.delta);
  }

  get startTime(): Date | undefined {
    return this.window.start;
  }

  get endTime(): Date | undefined {
    return this.window.end;
  }

  get totalLines(): number {
    return this.lineCount;
  }

  /** Sorted by accept date once `ingest()` has returned. */
  get entries(): readonly LogEntry[] {
    return this.validLines;
  }

  /** In file order, whitespace trimmed. */
  get invalid(): readonly string[] {
    return this.invalidLines;
  }

  counterOfInvalidLines(): number {
    return this.invalidLines.length;
  }

  ingest(): void {
    if (!this.source) {
      throw new ConfigurationError('No log source is configured');
    }
    if (this.ingested) {
      throw new ConfigurationError('Log source was already ingested');
    }
    this.ingested = true;
    for (const line of this.source) {
      this.lineCount++;
      const stripped = line.trim();
      const result = this.parser(stripped);
      if (!result.valid) {
        this.invalidLines.push(stripped);
      } else if (isInWindow(this.window, result.acceptDate)) {
        this.validLines.push(result);
      }
    }
    this.sortLines();
  }

  // HAProxy logs a connection once it completes, so file order is completion
  // order. Accept order is what queue analysis needs.
  private sortLines(): void {
    this.validLines.sort((a, b) => a.acceptDate.getTime() - b.acceptDate.getTime());
  }
}
