import {
  isNoticeKind,
  isRequestKind,
  noticeEnvelopeSchema,
  requestEnvelopeSchema,
  submitEnvelopeSchema,
  type Envelope,
} from './envelope.ts';

export type MalformedReason =
  | 'invalid-json'
  | 'not-an-object'
  | 'missing-type'
  | 'invalid-id'
  | 'missing-id'
  | 'invalid-fields'
  | 'line-too-long';

export interface MalformedLine {
  readonly reason: MalformedReason;
  readonly detail: string;
  readonly line: string;
}

export type DecodeResult =
  | {
      readonly ok: true;
      readonly envelope: Envelope;
    }
  | {
      readonly ok: false;
      readonly malformed: MalformedLine;
    };

export type WireRecord = Readonly<Record<string, unknown>> & { readonly type: string };

interface ConsumedLines {
  readonly lines: string[];
  readonly overflowed: number;
}

const MALFORMED_PREVIEW_LENGTH = 200;

function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  return value as Record<string, unknown>;
}

function malformed(reason: MalformedReason, detail: string, line: string): DecodeResult {
  return {
    ok: false,
    malformed: {
      reason,
      detail,
      line: line.length > MALFORMED_PREVIEW_LENGTH ? `${line.slice(0, MALFORMED_PREVIEW_LENGTH)}…` : line,
    },
  };
}

function describeIssue(error: { issues: ReadonlyArray<{ path: (string | number)[]; message: string }> }): string {
  const issue = error.issues[0];
  if (issue === undefined) {
    return 'invalid fields';
  }
  const path = issue.path.join('.');
  return path.length === 0 ? issue.message : `${path}: ${issue.message}`;
}

/**
 * Decodes one protocol line. Kinds this host does not know decode to an `unknown` envelope so
 * newer scripts keep working against an older host.
 */
export function decodeLine(line: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error: unknown) {
    return malformed('invalid-json', error instanceof Error ? error.message : String(error), line);
  }

  const record = asRecord(parsed);
  if (record === null) {
    return malformed('not-an-object', 'envelope must be a json object', line);
  }

  const tag = record['type'];
  if (typeof tag !== 'string' || tag.length === 0) {
    return malformed('missing-type', 'envelope has no type tag', line);
  }

  const id = record['id'];
  if (id !== undefined && (typeof id !== 'string' || id.length === 0)) {
    return malformed('invalid-id', 'correlation id must be a non-empty string', line);
  }

  if (tag === 'submit' || isRequestKind(tag)) {
    if (id === undefined) {
      return malformed('missing-id', `${tag} envelope requires an id`, line);
    }
    const result =
      tag === 'submit' ? submitEnvelopeSchema.safeParse(record) : requestEnvelopeSchema.safeParse(record);
    if (!result.success) {
      return malformed('invalid-fields', describeIssue(result.error), line);
    }
    return { ok: true, envelope: result.data };
  }

  if (isNoticeKind(tag)) {
    const result = noticeEnvelopeSchema.safeParse(record);
    if (!result.success) {
      return malformed('invalid-fields', describeIssue(result.error), line);
    }
    return { ok: true, envelope: result.data };
  }

  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (key !== 'type' && key !== 'id') {
      fields[key] = value;
    }
  }
  return {
    ok: true,
    envelope: {
      type: 'unknown',
      tag,
      ...(id === undefined ? {} : { id }),
      fields,
    },
  };
}

// JSON string escaping turns embedded newlines into `\n`, so a record always encodes to one line.
export function encodeWireRecord(record: WireRecord): string {
  return JSON.stringify(record);
}

export function encodeEnvelope(envelope: Envelope): string {
  if (envelope.type === 'unknown') {
    return encodeWireRecord({
      type: envelope.tag,
      ...(envelope.id === undefined ? {} : { id: envelope.id }),
      ...envelope.fields,
    });
  }
  return encodeWireRecord(envelope);
}

/**
 * Splits a stream of text chunks into complete lines. A line longer than `maxLineLength` is
 * discarded up to its terminating newline and counted in `overflowed`.
 */
export class LineBuffer {
  private remainder = '';
  private discarding = false;

  constructor(private readonly maxLineLength: number = Number.POSITIVE_INFINITY) {}

  push(chunk: string): ConsumedLines {
    const lines: string[] = [];
    let overflowed = 0;
    let text = chunk;

    for (;;) {
      const newlineIdx = text.indexOf('\n');
      if (newlineIdx === -1) {
        if (this.discarding) {
          break;
        }
        this.remainder += text;
        if (this.remainder.length > this.maxLineLength) {
          this.remainder = '';
          this.discarding = true;
          overflowed += 1;
        }
        break;
      }

      const segment = text.slice(0, newlineIdx);
      text = text.slice(newlineIdx + 1);
      if (this.discarding) {
        this.discarding = false;
        continue;
      }

      const full = `${this.remainder}${segment}`;
      this.remainder = '';
      if (full.length > this.maxLineLength) {
        overflowed += 1;
        continue;
      }
      const line = full.endsWith('\r') ? full.slice(0, -1) : full;
      if (line.trim().length === 0) {
        continue;
      }
      lines.push(line);
    }

    return {
      lines,
      overflowed,
    };
  }

  flush(): string | null {
    if (this.discarding) {
      this.discarding = false;
      this.remainder = '';
      return null;
    }
    const rest = this.remainder.endsWith('\r') ? this.remainder.slice(0, -1) : this.remainder;
    this.remainder = '';
    return rest.trim().length === 0 ? null : rest;
  }
}
