export interface LogEntry {
  readonly valid: true;
  readonly clientIp: string;
  readonly clientPort: number;
  readonly acceptDate: Date;
  readonly frontendName: string;
  readonly backendName: string;
  readonly serverName: string; // '<NOSRV>' when never dispatched
  readonly timeWaitRequest: number; // Tq, ms; -1 when aborted
  readonly timeWaitQueues: number; // Tw
  readonly timeConnectServer: number; // Tc
  readonly timeWaitResponse: number; // Tr
  readonly totalTime: number; // Tt
  readonly statusCode: number;
  readonly bytesRead: number;
  readonly activeConnections: number;
  readonly frontendConnections: number;
  readonly backendConnections: number;
  readonly serverConnections: number;
  readonly retries: number;
  readonly queueServer: number;
  readonly queueBackend: number;
  readonly capturedRequestHeaders: string | null; // braces kept, e.g. '{1.2.3.4}'
  readonly capturedResponseHeaders: string | null;
  readonly httpRequest: string;
  readonly httpMethod: string;
  readonly httpPath: string;
  readonly httpProtocol: string;
}

export interface InvalidLine {
  readonly valid: false;
}

export type ParseResult = LogEntry | InvalidLine;

export type LineParser = (line: string) => ParseResult;

export type Histogram<K extends string | number = string> = Map<K, number>;

export interface IpRepetitions {
  ip: string;
  repetitions: number;
}

export interface QueuePeak {
  peak: number;
  span: number;
  first: Date;
  last: Date;
}

export interface AnalyticsSettings {
  slowRequestMs: number;
  queuePeakThreshold: number;
  topIpsLimit: number;
}
