import type { BridgeLog, LogSpan } from '../log/event-log.ts';
import type { Envelope, EnvelopeType } from '../protocol/envelope.ts';
import { DuplicateCorrelationIdError } from '../runtime/bridge-errors.ts';

export type CancelReason = 'user-cancel' | 'session-closed' | 'send-failed';

export type RequestOutcome =
  | {
      readonly status: 'resolved';
      readonly envelope: Envelope;
    }
  | {
      readonly status: 'cancelled';
      readonly reason: CancelReason;
    }
  | {
      readonly status: 'timed-out';
      readonly timeoutMs: number;
    };

export type ResolveStatus = 'resolved' | 'kind-mismatch' | 'unknown-id';

interface RegisterOptions {
  readonly timeoutMs?: number | null;
}

interface PendingRequest {
  readonly id: string;
  readonly expectedKind: EnvelopeType;
  readonly createdAtMs: number;
  readonly span: LogSpan;
  readonly timer: NodeJS.Timeout | null;
  settle: (outcome: RequestOutcome) => void;
}

interface RequestCorrelatorOptions {
  readonly sessionId: string;
  readonly log: BridgeLog;
  readonly nowMs?: () => number;
  readonly setTimer?: (callback: () => void, delayMs: number) => NodeJS.Timeout;
  readonly clearTimer?: (timer: NodeJS.Timeout) => void;
}

/**
 * Tracks the requests one session is waiting on. Ids are scoped to the session, and every
 * registered request settles exactly once: by a matching response, a cancel, or its timeout.
 */
export class RequestCorrelator {
  private readonly sessionId: string;
  private readonly log: BridgeLog;
  private readonly nowMs: () => number;
  private readonly setTimer: (callback: () => void, delayMs: number) => NodeJS.Timeout;
  private readonly clearTimer: (timer: NodeJS.Timeout) => void;
  private readonly pending = new Map<string, PendingRequest>();
  private nextIdValue = 1;
  private closed = false;

  constructor(options: RequestCorrelatorOptions) {
    this.sessionId = options.sessionId;
    this.log = options.log;
    this.nowMs = options.nowMs ?? Date.now;
    this.setTimer = options.setTimer ?? ((callback, delayMs) => setTimeout(callback, delayMs));
    this.clearTimer = options.clearTimer ?? ((timer) => clearTimeout(timer));
  }

  nextId(): string {
    const id = String(this.nextIdValue);
    this.nextIdValue += 1;
    return id;
  }

  register(
    id: string,
    expectedKind: EnvelopeType,
    options: RegisterOptions = {},
  ): Promise<RequestOutcome> {
    if (this.closed) {
      return Promise.resolve({ status: 'cancelled', reason: 'session-closed' });
    }
    if (this.pending.has(id)) {
      throw new DuplicateCorrelationIdError(id);
    }

    return new Promise<RequestOutcome>((resolve) => {
      const timeoutMs = options.timeoutMs ?? null;
      const timer =
        timeoutMs === null
          ? null
          : this.setTimer(() => {
              this.settle(id, { status: 'timed-out', timeoutMs });
            }, timeoutMs);
      this.pending.set(id, {
        id,
        expectedKind,
        createdAtMs: this.nowMs(),
        span: this.log.startSpan('request.rtt', {
          session: this.sessionId,
          id,
          expected: expectedKind,
        }),
        timer,
        settle: resolve,
      });
    });
  }

  resolve(id: string, envelope: Envelope): ResolveStatus {
    const pending = this.pending.get(id);
    if (pending === undefined) {
      this.log.debug('protocol.unknown-correlation-id', {
        session: this.sessionId,
        id,
        type: envelope.type,
      });
      return 'unknown-id';
    }
    if (pending.expectedKind !== envelope.type) {
      this.log.warn('protocol.kind-mismatch', {
        session: this.sessionId,
        id,
        expected: pending.expectedKind,
        received: envelope.type,
      });
      return 'kind-mismatch';
    }
    this.settle(id, { status: 'resolved', envelope });
    return 'resolved';
  }

  cancel(id: string, reason: CancelReason): boolean {
    return this.settle(id, { status: 'cancelled', reason });
  }

  cancelAll(reason: CancelReason): number {
    if (reason === 'session-closed') {
      this.closed = true;
    }
    const ids = [...this.pending.keys()];
    for (const id of ids) {
      this.settle(id, { status: 'cancelled', reason });
    }
    return ids.length;
  }

  has(id: string): boolean {
    return this.pending.has(id);
  }

  pendingCount(): number {
    return this.pending.size;
  }

  pendingIds(): readonly string[] {
    return [...this.pending.keys()];
  }

  isClosed(): boolean {
    return this.closed;
  }

  private settle(id: string, outcome: RequestOutcome): boolean {
    const pending = this.pending.get(id);
    if (pending === undefined) {
      return false;
    }
    this.pending.delete(id);
    if (pending.timer !== null) {
      this.clearTimer(pending.timer);
    }
    pending.span.end({
      status: outcome.status,
      'age-ms': Math.max(0, this.nowMs() - pending.createdAtMs),
    });
    pending.settle(outcome);
    return true;
  }
}
