import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

type LogAttrValue = boolean | number | string | null;
export type LogAttrs = Readonly<Record<string, LogAttrValue>>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEventRecord {
  type: 'event';
  level: LogLevel;
  name: string;
  'ts-ms': number;
  attrs?: LogAttrs;
}

export interface LogSpanRecord {
  type: 'span';
  level: LogLevel;
  name: string;
  'duration-ms': number;
  'end-ms': number;
  'span-id': string;
  attrs?: LogAttrs;
}

export type LogRecord = LogEventRecord | LogSpanRecord;

export interface BridgeLogOptions {
  readonly filePath?: string | null;
  readonly stderrLevel?: LogLevel | 'off';
  readonly onRecord?: (record: LogRecord) => void;
  readonly writeStderr?: (text: string) => void;
  readonly nowMs?: () => number;
  readonly maxPendingRecords?: number;
}

export interface LogSpan {
  end(extraAttrs?: LogAttrs): void;
}

const DEFAULT_MAX_PENDING_RECORDS = 4096;

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function mergeAttrs(base?: LogAttrs, extra?: LogAttrs): LogAttrs | undefined {
  if (base === undefined) {
    return extra;
  }
  if (extra === undefined) {
    return base;
  }
  return { ...base, ...extra };
}

function formatStderrLine(record: LogRecord): string {
  const parts = [`[${record.level}] ${record.name}`];
  if (record.type === 'span') {
    parts.push(`duration-ms=${String(record['duration-ms'])}`);
  }
  if (record.attrs !== undefined) {
    for (const [key, value] of Object.entries(record.attrs)) {
      parts.push(`${key}=${typeof value === 'string' ? JSON.stringify(value) : String(value)}`);
    }
  }
  return `${parts.join(' ')}\n`;
}

/**
 * JSONL event log owned by the bridge context.
 *
 * Records are buffered and flushed on an unref'd zero-delay timer so logging never blocks a
 * scheduler tick. Once `maxPendingRecords` is reached the oldest unflushed record is shed.
 */
export class BridgeLog {
  private readonly filePath: string | null;
  private readonly stderrRank: number;
  private readonly onRecord: ((record: LogRecord) => void) | undefined;
  private readonly writeStderr: (text: string) => void;
  private readonly nowMs: () => number;
  private readonly maxPendingRecords: number;
  private readonly pendingRecords: string[] = [];
  private fd: number | null = null;
  private flushTimer: NodeJS.Timeout | null = null;
  private nextSpanId = 1;
  private closed = false;

  constructor(options: BridgeLogOptions = {}) {
    this.filePath = options.filePath ?? null;
    const stderrLevel = options.stderrLevel ?? 'warn';
    this.stderrRank = stderrLevel === 'off' ? Number.POSITIVE_INFINITY : LEVEL_RANK[stderrLevel];
    this.onRecord = options.onRecord;
    this.writeStderr = options.writeStderr ?? ((text) => process.stderr.write(text));
    this.nowMs = options.nowMs ?? Date.now;
    this.maxPendingRecords = Math.max(1, options.maxPendingRecords ?? DEFAULT_MAX_PENDING_RECORDS);
  }

  debug(name: string, attrs?: LogAttrs): void {
    this.event('debug', name, attrs);
  }

  info(name: string, attrs?: LogAttrs): void {
    this.event('info', name, attrs);
  }

  warn(name: string, attrs?: LogAttrs): void {
    this.event('warn', name, attrs);
  }

  error(name: string, attrs?: LogAttrs): void {
    this.event('error', name, attrs);
  }

  event(level: LogLevel, name: string, attrs?: LogAttrs): void {
    const record: LogEventRecord = {
      type: 'event',
      level,
      name,
      'ts-ms': this.nowMs(),
    };
    if (attrs !== undefined) {
      record.attrs = attrs;
    }
    this.writeRecord(record);
  }

  startSpan(name: string, attrs?: LogAttrs, level: LogLevel = 'debug'): LogSpan {
    const startedAtMs = this.nowMs();
    const spanId = `span-${this.nextSpanId}`;
    this.nextSpanId += 1;
    let ended = false;
    return {
      end: (extraAttrs?: LogAttrs): void => {
        if (ended) {
          return;
        }
        ended = true;
        const endedAtMs = this.nowMs();
        const record: LogSpanRecord = {
          type: 'span',
          level,
          name,
          'duration-ms': Math.max(0, endedAtMs - startedAtMs),
          'end-ms': endedAtMs,
          'span-id': spanId,
        };
        const merged = mergeAttrs(attrs, extraAttrs);
        if (merged !== undefined) {
          record.attrs = merged;
        }
        this.writeRecord(record);
      },
    };
  }

  flush(): void {
    if (this.fd === null || this.pendingRecords.length === 0) {
      return;
    }
    const chunk = this.pendingRecords.join('');
    this.pendingRecords.length = 0;
    writeSync(this.fd, chunk);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.flush();
    this.closed = true;
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }

  private writeRecord(record: LogRecord): void {
    this.onRecord?.(record);
    if (LEVEL_RANK[record.level] >= this.stderrRank) {
      this.writeStderr(formatStderrLine(record));
    }
    if (this.filePath === null || this.closed) {
      return;
    }
    this.ensureWriter();
    if (this.pendingRecords.length >= this.maxPendingRecords) {
      this.pendingRecords.shift();
    }
    this.pendingRecords.push(`${JSON.stringify(record)}\n`);
    this.scheduleFlush();
  }

  private ensureWriter(): void {
    if (this.fd !== null || this.filePath === null) {
      return;
    }
    const resolvedPath = resolve(this.filePath);
    mkdirSync(dirname(resolvedPath), { recursive: true });
    this.fd = openSync(resolvedPath, 'a');
  }

  private scheduleFlush(): void {
    if (this.fd === null || this.flushTimer !== null) {
      return;
    }
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.flush();
    }, 0);
    this.flushTimer.unref();
  }
}

export function createSilentLog(onRecord?: (record: LogRecord) => void): BridgeLog {
  return new BridgeLog({
    stderrLevel: 'off',
    ...(onRecord === undefined ? {} : { onRecord }),
  });
}
