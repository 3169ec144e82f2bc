import * as fs from 'node:fs';
import * as path from 'node:path';
import * as url from 'node:url';
import type { Logger } from '../logger.js';

const __dirname = path.dirname(url.fileURLToPath(import.meta.url));

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8');
}

export interface RecordedLines {
  log: string[];
  warn: string[];
  error: string[];
}

/**
 * Logger that keeps every line instead of printing it
 */
export function recordingLogger(): { logger: Logger; lines: RecordedLines } {
  const lines: RecordedLines = { log: [], warn: [], error: [] };
  const logger: Logger = {
    log: (...args: unknown[]) => { lines.log.push(args.join(' ')); },
    warn: (...args: unknown[]) => { lines.warn.push(args.join(' ')); },
    error: (...args: unknown[]) => { lines.error.push(args.join(' ')); }
  };
  return { logger, lines };
}

/**
 * In-process stand-in for fetch that serves a fixed body and records requested URLs
 */
export function stubFetch(body: string, init: ResponseInit = { status: 200 }): { fetchFn: typeof fetch; requests: string[] } {
  const requests: string[] = [];
  const fetchFn: typeof fetch = async (input) => {
    requests.push(String(input));
    return new Response(body, init);
  };
  return { fetchFn, requests };
}
