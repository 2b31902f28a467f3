import { BoundedMinHeap } from './boundedHeap';
import { AnalyticsSettings, Histogram, IpRepetitions, LogEntry, QueuePeak } from './types';

export const DEFAULT_ANALYTICS_SETTINGS: Readonly<AnalyticsSettings> = Object.freeze({
  slowRequestMs: 1000,
  queuePeakThreshold: 1,
  topIpsLimit: 10,
});

/** What the commands read; a finished `LogStore` satisfies it. */
export interface AnalyticsSource {
  readonly entries: readonly LogEntry[];
  readonly invalid: readonly string[];
  readonly totalLines: number;
}

export function increment<K>(histogram: Map<K, number>, key: K): void {
  histogram.set(key, (histogram.get(key) ?? 0) + 1);
}

interface RankedIp extends IpRepetitions {
  seen: number;
}

// Smaller ranks first; among equal counts the later-seen key is evicted first.
function compareRanked(a: RankedIp, b: RankedIp): number {
  return a.repetitions - b.repetitions || b.seen - a.seen;
}

/**
 * Read-only queries over an ingested log. Every method derives its answer from
 * the source alone, so they may run in any order and any number of times.
 */
export class AnalyticsCommands {
  private readonly settings: AnalyticsSettings;

  constructor(private readonly source: AnalyticsSource, settings: Partial<AnalyticsSettings> = {}) {
    this.settings = { ...DEFAULT_ANALYTICS_SETTINGS, ...settings };
  }

  counter(): number {
    return this.source.entries.length;
  }

  counterInvalid(): number {
    return this.source.invalid.length;
  }

  httpMethods(): Histogram {
    return this.histogram((entry) => entry.httpMethod);
  }

  statusCodesCounter(): Histogram<number> {
    return this.histogram((entry) => entry.statusCode);
  }

  requestPathCounter(): Histogram {
    return this.histogram((entry) => entry.httpPath);
  }

  serverLoad(): Histogram {
    return this.histogram((entry) => entry.serverName);
  }

  /**
   * Needs HAProxy to capture exactly one request header carrying the client
   * address (usually X-Forwarded-For). Entries without captured headers are skipped.
   */
  ipCounter(): Histogram {
    const ips: Histogram = new Map();
    for (const entry of this.source.entries) {
      if (entry.capturedRequestHeaders !== null) {
        increment(ips, entry.capturedRequestHeaders.slice(1, -1));
      }
    }
    return ips;
  }

  topIps(): IpRepetitions[] {
    const heap = new BoundedMinHeap<RankedIp>(this.settings.topIpsLimit, compareRanked);
    let seen = 0;
    for (const [ip, repetitions] of this.ipCounter()) {
      heap.push({ ip, repetitions, seen: seen++ });
    }
    return heap
      .toArray()
      .sort((a, b) => compareRanked(b, a))
      .map(({ ip, repetitions }) => ({ ip, repetitions }));
  }

  slowRequests(): number[] {
    const slow: number[] = [];
    for (const entry of this.source.entries) {
      if (entry.timeWaitResponse > this.settings.slowRequestMs) {
        slow.push(entry.timeWaitResponse);
      }
    }
    return slow;
  }

  /**
   * Runs of consecutive entries with a non-empty backend queue, reported when
   * the deepest queue in the run exceeds the threshold. `last` is the accept
   * date of the entry that drained the queue, or of the final entry when the
   * log ends mid-run.
   */
  queuePeaks(): QueuePeak[] {
    const threshold = this.settings.queuePeakThreshold;
    const peaks: QueuePeak[] = [];
    let currentPeak = 0;
    let currentSpan = 0;
    let firstOnQueue: Date | undefined;
    let lastSeen: Date | undefined;

    for (const entry of this.source.entries) {
      const queue = entry.queueBackend;
      lastSeen = entry.acceptDate;
      if (queue > 0) {
        currentSpan++;
        if (!firstOnQueue) firstOnQueue = entry.acceptDate;
        currentPeak = Math.max(currentPeak, queue);
        continue;
      }
      if (firstOnQueue && currentPeak > threshold) {
        peaks.push({ peak: currentPeak, span: currentSpan, first: firstOnQueue, last: entry.acceptDate });
      }
      currentPeak = 0;
      currentSpan = 0;
      firstOnQueue = undefined;
    }

    if (firstOnQueue && lastSeen && currentPeak > threshold) {
      peaks.push({ peak: currentPeak, span: currentSpan, first: firstOnQueue, last: lastSeen });
    }
    return peaks;
  }

  private histogram<K extends string | number>(key: (entry: LogEntry) => K): Histogram<K> {
    const counts: Histogram<K> = new Map();
    for (const entry of this.source.entries) {
      increment(counts, key(entry));
    }
    return counts;
  }
}
