import { InvalidLine, LogEntry, ParseResult } from './types';

const MONTHS: Record<string, number> = {
  Jan: 0, Feb: 1, Mar: 2, Apr: 3, May: 4, Jun: 5,
  Jul: 6, Aug: 7, Sep: 8, Oct: 9, Nov: 10, Dec: 11,
};

const INVALID: InvalidLine = Object.freeze({ valid: false });

// Optional syslog prefix, then the HAProxy HTTP log format:
// 10.0.0.1:41234 [09/Dec/2013:12:59:46.633] fe be/srv1 0/0/1/48/52 200 832 - - ---- 8/8/4/1/0 0/0 {1.2.3.4} "GET / HTTP/1.1"
const LINE_RE = new RegExp(
  '^(?:.*?haproxy\\[\\d+\\]:\\s+)?' +
    '(?<clientIp>[0-9a-fA-F.:]+):(?<clientPort>\\d+)\\s+' +
    '\\[(?<acceptDate>[^\\]]+)\\]\\s+' +
    '(?<frontend>\\S+)\\s+' +
    '(?<backend>[^\\s/]+)/(?<server>\\S+)\\s+' +
    '(?<tq>-?\\d+)/(?<tw>-?\\d+)/(?<tc>-?\\d+)/(?<tr>-?\\d+)/(?<tt>\\+?\\d+)\\s+' +
    '(?<status>-?\\d+)\\s+' +
    '(?<bytes>\\+?\\d+)\\s+' +
    '\\S+\\s+\\S+\\s+\\S+\\s+' + // request cookie, response cookie, termination state
    '(?<act>\\d+)/(?<fe>\\d+)/(?<be>\\d+)/(?<srv>\\d+)/(?<retries>\\+?\\d+)\\s+' +
    '(?<queueServer>\\d+)/(?<queueBackend>\\d+)\\s+' +
    '(?:\\{(?<reqHeaders>[^}]*)\\}\\s+(?:\\{(?<resHeaders>[^}]*)\\}\\s+)?)?' +
    '"(?<request>.*)"$'
);

const DATE_RE = /^(\d{2})\/([A-Za-z]{3})\/(\d{4}):(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,3}))?$/;

const REQUEST_RE = /^([A-Z]+) (\S+)(?: (\S+))?$/;

/**
 * Parses an HAProxy date such as `09/Dec/2013:12:59:46.633` as UTC.
 * Returns null for anything that is not a real calendar instant.
 */
export function parseAcceptDate(text: string): Date | null {
  const m = DATE_RE.exec(text);
  if (!m) return null;
  const month = MONTHS[m[2]];
  if (month === undefined) return null;
  const [day, year, hour, minute, second] = [m[1], m[3], m[4], m[5], m[6]].map(Number);
  const millis = m[7] ? Number(m[7].padEnd(3, '0')) : 0;
  if (hour > 23 || minute > 59 || second > 59) return null;
  // Date.UTC would read years 0-99 as 19xx
  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  date.setUTCHours(hour, minute, second, millis);
  // 31/Feb rolls over into March; reject instead
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month) return null;
  return date;
}

function splitRequest(request: string): { method: string; path: string; protocol: string } {
  const m = REQUEST_RE.exec(request);
  if (!m) return { method: '', path: '', protocol: '' };
  return { method: m[1], path: m[2], protocol: m[3] ?? '' };
}

function braced(value: string | undefined): string | null {
  return value === undefined ? null : `{${value}}`;
}

export function parseLine(rawLine: string): ParseResult {
  const cleaned = rawLine.replace(/[\r\n]+$/, '');
  const g = LINE_RE.exec(cleaned)?.groups;
  if (!g) return INVALID;

  const acceptDate = parseAcceptDate(g.acceptDate);
  if (!acceptDate) return INVALID;

  const { method, path, protocol } = splitRequest(g.request);
  const entry: LogEntry = {
    valid: true,
    clientIp: g.clientIp,
    clientPort: Number(g.clientPort),
    acceptDate,
    frontendName: g.frontend,
    backendName: g.backend,
    serverName: g.server,
    timeWaitRequest: Number(g.tq),
    timeWaitQueues: Number(g.tw),
    timeConnectServer: Number(g.tc),
    timeWaitResponse: Number(g.tr),
    totalTime: Number(g.tt),
    statusCode: Number(g.status),
    bytesRead: Number(g.bytes),
    activeConnections: Number(g.act),
    frontendConnections: Number(g.fe),
    backendConnections: Number(g.be),
    serverConnections: Number(g.srv),
    retries: Number(g.retries),
    queueServer: Number(g.queueServer),
    queueBackend: Number(g.queueBackend),
    capturedRequestHeaders: braced(g.reqHeaders),
    capturedResponseHeaders: braced(g.resHeaders),
    httpRequest: g.request,
    httpMethod: method,
    httpPath: path,
    httpProtocol: protocol,
  };
  return Object.freeze(entry);
}
