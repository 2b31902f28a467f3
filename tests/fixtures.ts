import { parseLine } from '../src/parser';
import { LogEntry } from '../src/types';

export interface LineFields {
  clientIp?: string;
  acceptDate?: string;
  server?: string;
  tr?: number;
  status?: number;
  queueBackend?: number;
  headers?: string | null;
  request?: string;
}

export function logLine(fields: LineFields = {}): string {
  const {
    clientIp = '127.0.0.1',
    acceptDate = '09/Dec/2013:12:59:46.633',
    server = 'web1',
    tr = 69,
    status = 200,
    queueBackend = 0,
    headers = '1.2.3.4',
    request = 'GET /index.html HTTP/1.1',
  } = fields;
  const captured = headers === null ? '' : `{${headers}} `;
  return (
    `Dec  9 13:01:26 localhost haproxy[28029]: ${clientIp}:39759 [${acceptDate}] ` +
    `http-in backend/${server} 10/0/30/${tr}/${tr + 40} ${status} 2750 - - ---- ` +
    `1/1/1/1/0 0/${queueBackend} ${captured}"${request}"`
  );
}

export function entry(fields: LineFields = {}): LogEntry {
  const result = parseLine(logLine(fields));
  if (!result.valid) throw new Error(`fixture line did not parse: ${logLine(fields)}`);
  return result;
}

/** `09/Dec/2013:12:00:SS.000` for second offsets 0-59. */
export function at(second: number): string {
  return `09/Dec/2013:12:00:${String(second).padStart(2, '0')}.000`;
}

export function isoAt(second: number): string {
  return `2013-12-09T12:00:${String(second).padStart(2, '0')}.000Z`;
}
