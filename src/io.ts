import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse';
import { z } from 'zod';
import { MalformedRecordError, errorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import type { EventSource, TestEvent, TestStatus } from './types';

export type JsonlRecord = { position: number; value: unknown };

export type JsonlContent = {
  records: JsonlRecord[];
  /** Lines (or objects) that are not valid JSON; the rest of the file is still read. */
  rejected: MalformedRecordError[];
};

/**
 * Tolerant reader for:
 *  - Proper JSONL (one object per line)
 *  - Multi-line pretty-printed objects (records separated by blank lines)
 *  - A single JSON array file
 *  - BOM, CRLF, trailing commas, comment lines (# or //)
 *
 * Strategy:
 * 1) If whole file parses as JSON array → one record per element.
 * 2) If every line opens an object → one record per line, bad lines rejected alone.
 * 3) Otherwise, extract balanced JSON objects by counting braces outside strings.
 *
 * Positions are 1-based line numbers (element numbers for an array file).
 */
export async function readJsonl(file: string): Promise<JsonlContent> {
  const raw = await fs.promises.readFile(file, 'utf-8');
  return parseJsonl(raw, path.basename(file));
}

export function parseJsonl(raw: string, label = 'input'): JsonlContent {
  const content = raw.replace(/^\uFEFF/, ''); // strip BOM
  const trimmed = content.trim();
  if (!trimmed) return { records: [], rejected: [] };

  if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
    try {
      const arr: unknown = JSON.parse(trimmed);
      if (Array.isArray(arr)) return { records: arr.map((value, i) => ({ position: i + 1, value })), rejected: [] };
    } catch {
      // not a plain array, fall through to the line reader
    }
  }

  const lines = content
    .split(/\r?\n/)
    .map((text, i) => ({ text: text.trim(), line: i + 1 }))
    .filter(({ text }) => text && !text.startsWith('//') && !text.startsWith('#'));

  return lines.every(l => l.text.startsWith('{')) ? parseLines(lines) : scanObjects(lines, label);
}

type SourceLine = { text: string; line: number };

function invalidJson(position: number, err: unknown) {
  return new MalformedRecordError(position, [`invalid JSON: ${errorMessage(err)}`]);
}

// Strict JSONL
function parseLines(lines: SourceLine[]): JsonlContent {
  const out: JsonlContent = { records: [], rejected: [] };
  for (const { text, line } of lines) {
    try {
      out.records.push({ position: line, value: JSON.parse(stripTrailingComma(text)) });
    } catch (err) {
      out.rejected.push(invalidJson(line, err));
    }
  }
  return out;
}

// Multi-line objects (brace-aware)
function scanObjects(lines: SourceLine[], label: string): JsonlContent {
  const out: JsonlContent = { records: [], rejected: [] };
  let buf = '';
  let start = 0;
  let depth = 0;
  let inStr = false;
  let esc = false;

  for (const { text, line } of lines) {
    for (const ch of `${text}\n`) {
      if (depth === 0) {
        if (ch !== '{') continue; // separators between objects
        start = line;
      }
      buf += ch;

      if (inStr) {
        if (esc) esc = false;
        else if (ch === '\\') esc = true;
        else if (ch === '"') inStr = false;
        continue;
      }
      if (ch === '"') inStr = true;
      else if (ch === '{') depth++;
      else if (ch === '}' && --depth === 0) {
        try {
          out.records.push({ position: start, value: JSON.parse(stripTrailingComma(buf.trim())) });
        } catch (err) {
          out.rejected.push(invalidJson(start, err));
        }
        buf = '';
      }
    }
  }
  if (buf) out.rejected.push(new MalformedRecordError(start, ['unterminated record']));

  if (!out.records.length && !out.rejected.length) {
    throw new SyntaxError(`Could not parse ${label} as JSONL or array. Check formatting around the reported line.`);
  }
  return out;
}

function stripTrailingComma(s: string) {
  return s
    .replace(/,\s*}/g, '}')
    .replace(/,\s*]/g, ']')
    .replace(/,$/, '')
    .trim();
}

// ── Event records ───────────────────────────────────────────

const STATUSES: readonly TestStatus[] = ['STARTED', 'PASSED', 'FAILED', 'SKIPPED'];

const upper = (v: unknown) => (typeof v === 'string' ? v.trim().toUpperCase() : v);
const numeric = (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v);

function toStatus(s: string): TestStatus {
  return STATUSES.find(known => known === s) ?? 'OTHER';
}

const EventRecord = z.object({
  eventId: z.string().default(''),
  timestamp: z.string().default(''),
  testId: z.string().default(''),
  testName: z.string().default(''),
  suite: z.string().default(''),
  className: z.string().default(''),
  environment: z.string().default('local'),
  level: z.preprocess(upper, z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'])).default('INFO'),
  status: z.preprocess(upper, z.string()).default('').transform(toStatus),
  message: z.string().default(''),
  stacktrace: z.string().nullish().transform(s => s ?? undefined),
  durationMs: z.preprocess(numeric, z.number().int().nonnegative()).default(0),
  service: z.string().default('selenium-ui-tests'),
  attributes: z.record(z.string()).default({}),
});

/**
 * Validates one wire record (camelCase keys) into a TestEvent.
 * @param position 1-based line or row number, used in the error
 * @throws MalformedRecordError
 */
export function parseEvent(raw: unknown, position = 0): TestEvent {
  const parsed = EventRecord.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedRecordError(
      position,
      parsed.error.issues.map(i => `${i.path.join('.') || 'record'}: ${i.message}`),
    );
  }
  return parsed.data;
}

export type EventLog = {
  events: TestEvent[];
  rejected: MalformedRecordError[];
};

/** Validates each record on its own; `rejected` also takes records already refused upstream. */
export function parseEvents(records: JsonlRecord[], rejected: MalformedRecordError[] = []): EventLog {
  const log: EventLog = { events: [], rejected: [...rejected] };
  for (const { position, value } of records) {
    try {
      log.events.push(parseEvent(value, position));
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;
      log.rejected.push(err);
    }
  }
  log.rejected.sort((a, b) => a.position - b.position);
  return log;
}

function report(file: string, result: EventLog, log: Logger) {
  for (const err of result.rejected) log.warn({ file, position: err.position, issues: err.issues }, 'rejected record');
  log.info({ file, events: result.events.length, rejected: result.rejected.length }, 'event log loaded');
  return result;
}

/** Reads an event log; a missing file is an empty log. */
export async function readEventLog(file: string, log: Logger = createLogger('io')): Promise<EventLog> {
  if (!fs.existsSync(file)) {
    log.warn({ file }, 'event log not found');
    return { events: [], rejected: [] };
  }
  const { records, rejected } = await readJsonl(file);
  return report(file, parseEvents(records, rejected), log);
}

const CSV_FIELDS = new Set(Object.keys(EventRecord.shape));

/**
 * CSV export with a header row; columns outside the event fields become
 * attributes. Positions count the header as line 1.
 */
export async function readEventsCsv(file: string, log: Logger = createLogger('io')): Promise<EventLog> {
  const rows: Record<string, string>[] = await new Promise((resolve, reject) => {
    const acc: Record<string, string>[] = [];
    fs.createReadStream(file)
      .pipe(parse({ columns: true, trim: true, skip_empty_lines: true }))
      .on('data', (r: Record<string, string>) => acc.push(r))
      .on('end', () => resolve(acc))
      .on('error', reject);
  });

  const records = rows.map((row, i) => {
    const record: Record<string, unknown> = {};
    const attributes: Record<string, string> = {};
    for (const [k, v] of Object.entries(row)) {
      if (v === '') continue;
      if (CSV_FIELDS.has(k) && k !== 'attributes') record[k] = v;
      else attributes[k] = v;
    }
    record.attributes = attributes;
    return { position: i + 2, value: record };
  });
  return report(file, parseEvents(records), log);
}

export class JsonlEventSource implements EventSource {
  constructor(private readonly file: string, private readonly log?: Logger) {}

  async load(): Promise<TestEvent[]> {
    return (await readEventLog(this.file, this.log)).events;
  }
}

export class StaticEventSource implements EventSource {
  constructor(private readonly events: TestEvent[] = []) {}

  async load(): Promise<TestEvent[]> {
    return [...this.events];
  }
}
