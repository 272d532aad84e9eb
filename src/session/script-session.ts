import type { BridgeLog } from '../log/event-log.ts';
import {
  isRequestEnvelope,
  noticeEnvelopeSchema,
  requestEnvelopeSchema,
  type Envelope,
  type NoticeEnvelope,
  type NoticeInput,
  type PromptRequest,
  type RequestEnvelope,
  type UnknownEnvelope,
} from '../protocol/envelope.ts';
import { encodeEnvelope, encodeWireRecord } from '../protocol/line-codec.ts';
import type { ExitOutcome, ScriptProcessLike } from '../process/script-process.ts';
import type { BridgeScheduler } from '../runtime/bridge-scheduler.ts';
import {
  ConcurrentPromptNotAllowedError,
  formatErrorMessage,
  SessionClosedError,
} from '../runtime/bridge-errors.ts';
import { PromptStateMachine, type PromptState } from './prompt-state-machine.ts';
import { RequestCorrelator, type CancelReason, type RequestOutcome } from './request-correlator.ts';

export type PromptResult =
  | {
      readonly status: 'submitted';
      readonly value: string | null;
    }
  | {
      readonly status: 'cancelled';
      readonly reason: CancelReason;
    }
  | {
      readonly status: 'timed-out';
      readonly timeoutMs: number;
    };

export interface InboundPrompt {
  readonly sessionId: string;
  readonly scriptPath: string;
  readonly request: RequestEnvelope;
}

/** Shows a prompt the script asked for; resolves with the submitted value, or null when dismissed. */
export interface PromptPresenter {
  present(prompt: InboundPrompt, signal: AbortSignal): Promise<string | null>;
}

export interface ExitRequest {
  readonly code: number | null;
  readonly message: string | null;
}

export interface ScriptRunReport {
  readonly sessionId: string;
  readonly scriptPath: string;
  readonly outcome: ExitOutcome;
  readonly stderrTail: readonly string[];
  readonly exitRequest: ExitRequest | null;
}

export interface SessionUiSink {
  onNotice(sessionId: string, envelope: NoticeEnvelope | UnknownEnvelope): void;
  onScriptError(report: ScriptRunReport): void;
}

export interface PromptOptions {
  readonly timeoutMs?: number | null;
}

export interface ScriptSessionOptions {
  readonly sessionId: string;
  readonly scriptPath: string;
  readonly process: ScriptProcessLike;
  readonly scheduler: BridgeScheduler;
  readonly log: BridgeLog;
  readonly presenter?: PromptPresenter;
  readonly ui?: SessionUiSink;
  readonly promptTimeoutMs?: number | null;
  readonly exitRequestGraceMs?: number;
  readonly onClosed?: (report: ScriptRunReport) => void;
  readonly setTimer?: (callback: () => void, delayMs: number) => NodeJS.Timeout;
  readonly clearTimer?: (timer: NodeJS.Timeout) => void;
}

interface InboundSlot {
  readonly id: string;
  readonly controller: AbortController;
}

const DEFAULT_EXIT_REQUEST_GRACE_MS = 1000;

export class ScriptSession {
  readonly id: string;
  readonly scriptPath: string;
  private readonly process: ScriptProcessLike;
  private readonly scheduler: BridgeScheduler;
  private readonly log: BridgeLog;
  private readonly presenter: PromptPresenter | undefined;
  private readonly ui: SessionUiSink | undefined;
  private readonly promptTimeoutMs: number | null;
  private readonly exitRequestGraceMs: number;
  private readonly onClosed: ((report: ScriptRunReport) => void) | undefined;
  private readonly setTimer: (callback: () => void, delayMs: number) => NodeJS.Timeout;
  private readonly clearTimer: (timer: NodeJS.Timeout) => void;
  private readonly correlator: RequestCorrelator;
  private readonly state: PromptStateMachine;
  private readonly closedWaiters: Array<(report: ScriptRunReport) => void> = [];
  private inbound: InboundSlot | null = null;
  private exitRequest: ExitRequest | null = null;
  private exitRequestTimer: NodeJS.Timeout | null = null;
  private report: ScriptRunReport | null = null;
  private started = false;

  constructor(options: ScriptSessionOptions) {
    this.id = options.sessionId;
    this.scriptPath = options.scriptPath;
    this.process = options.process;
    this.scheduler = options.scheduler;
    this.log = options.log;
    this.presenter = options.presenter;
    this.ui = options.ui;
    this.promptTimeoutMs = options.promptTimeoutMs ?? null;
    this.exitRequestGraceMs = options.exitRequestGraceMs ?? DEFAULT_EXIT_REQUEST_GRACE_MS;
    this.onClosed = options.onClosed;
    this.setTimer = options.setTimer ?? ((callback, delayMs) => setTimeout(callback, delayMs));
    this.clearTimer = options.clearTimer ?? ((timer) => clearTimeout(timer));
    this.correlator = new RequestCorrelator({
      sessionId: this.id,
      log: this.log,
    });
    this.state = new PromptStateMachine(this.id, this.log);
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.process.attach({
      onEnvelope: (envelope) => {
        const queued = this.scheduler.enqueueProtocol(
          () => this.handleEnvelope(envelope),
          `envelope:${envelope.type}`,
        );
        if (!queued) {
          this.log.debug('session.envelope-dropped', {
            session: this.id,
            type: envelope.type,
          });
        }
      },
      onExit: (outcome) => {
        // Exit must always close the session, even once the scheduler has stopped.
        if (!this.scheduler.enqueueProtocol(() => this.handleExit(outcome), 'session-exit')) {
          this.handleExit(outcome);
        }
      },
    });
  }

  /**
   * Sends a request to the script and waits for its `submit`. Rejects with
   * `ConcurrentPromptNotAllowedError` while another prompt holds the slot.
   */
  async prompt(request: PromptRequest, options: PromptOptions = {}): Promise<PromptResult> {
    this.state.beginSend(request.type);
    const id = this.correlator.nextId();
    let outcome: Promise<RequestOutcome>;
    try {
      // Validated here, sent as the caller wrote it.
      const { type, ...fields } = request;
      const record = { type, id, ...fields };
      requestEnvelopeSchema.parse(record);
      outcome = this.correlator.register(id, 'submit', {
        timeoutMs: options.timeoutMs === undefined ? this.promptTimeoutMs : options.timeoutMs,
      });
      this.process.writeLine(encodeWireRecord(record));
    } catch (error: unknown) {
      this.correlator.cancel(id, 'send-failed');
      this.state.abortSend();
      throw error;
    }
    this.state.markAwaiting(id);

    const settled = await outcome;
    if (settled.status === 'resolved') {
      this.state.complete(id);
      const envelope = settled.envelope;
      return {
        status: 'submitted',
        value: envelope.type === 'submit' ? envelope.value : null,
      };
    }
    if (this.state.activePrompt()?.id === id) {
      this.state.cancel();
    }
    if (settled.status === 'timed-out') {
      this.log.info('prompt.timed-out', { session: this.id, id, 'timeout-ms': settled.timeoutMs });
      return { status: 'timed-out', timeoutMs: settled.timeoutMs };
    }
    return { status: 'cancelled', reason: settled.reason };
  }

  send(notice: NoticeInput): void {
    if (this.state.isClosed()) {
      throw new SessionClosedError(this.id);
    }
    this.process.writeLine(encodeEnvelope(noticeEnvelopeSchema.parse(notice)));
  }

  /** Cancels whichever prompt holds the slot. Returns false when there is nothing to cancel. */
  cancelPrompt(): boolean {
    const cancelled = this.state.cancel();
    if (cancelled === null) {
      return false;
    }
    this.log.info('prompt.cancelled', {
      session: this.id,
      id: cancelled.id,
      kind: cancelled.kind,
      direction: cancelled.direction,
    });
    if (cancelled.direction === 'outbound') {
      this.correlator.cancel(cancelled.id, 'user-cancel');
      return true;
    }
    if (this.inbound?.id === cancelled.id) {
      this.inbound.controller.abort();
      this.inbound = null;
    }
    this.replySubmit(cancelled.id, null);
    return true;
  }

  kill(): void {
    this.process.terminate();
  }

  snapshot(): PromptState {
    return this.state.snapshot();
  }

  onStateChange(listener: (from: PromptState, to: PromptState) => void): () => void {
    return this.state.onTransition(listener);
  }

  pendingRequestCount(): number {
    return this.correlator.pendingCount();
  }

  isClosed(): boolean {
    return this.report !== null;
  }

  closed(): Promise<ScriptRunReport> {
    if (this.report !== null) {
      return Promise.resolve(this.report);
    }
    return new Promise<ScriptRunReport>((resolve) => {
      this.closedWaiters.push(resolve);
    });
  }

  private handleEnvelope(envelope: Envelope): void {
    if (this.state.isClosed()) {
      this.log.debug('session.envelope-after-close', { session: this.id, type: envelope.type });
      return;
    }
    if (envelope.type === 'submit') {
      this.correlator.resolve(envelope.id, envelope);
      return;
    }
    if (isRequestEnvelope(envelope)) {
      this.openInbound(envelope);
      return;
    }
    if (envelope.type === 'exit') {
      this.recordExitRequest(envelope.code ?? null, envelope.message ?? null);
    }
    this.ui?.onNotice(this.id, envelope);
  }

  private openInbound(request: RequestEnvelope): void {
    const presenter = this.presenter;
    if (presenter === undefined) {
      this.log.warn('prompt.no-presenter', { session: this.id, id: request.id, kind: request.type });
      this.replySubmit(request.id, null);
      return;
    }
    try {
      this.state.beginInbound(request.id, request.type);
    } catch (error: unknown) {
      if (error instanceof ConcurrentPromptNotAllowedError) {
        this.replySubmit(request.id, null);
        return;
      }
      throw error;
    }

    const slot: InboundSlot = {
      id: request.id,
      controller: new AbortController(),
    };
    this.inbound = slot;
    const prompt: InboundPrompt = {
      sessionId: this.id,
      scriptPath: this.scriptPath,
      request,
    };
    let answer: Promise<string | null>;
    try {
      answer = presenter.present(prompt, slot.controller.signal);
    } catch (error: unknown) {
      answer = Promise.reject(error);
    }
    void answer.then(
      (value) => {
        this.scheduler.enqueueProtocol(() => this.finishInbound(slot, value), 'prompt-answer');
      },
      (error: unknown) => {
        this.log.warn('prompt.presenter-failed', {
          session: this.id,
          id: slot.id,
          message: formatErrorMessage(error, false),
        });
        this.scheduler.enqueueProtocol(() => this.finishInbound(slot, null), 'prompt-answer');
      },
    );
  }

  private finishInbound(slot: InboundSlot, value: string | null): void {
    if (this.inbound !== slot || slot.controller.signal.aborted) {
      return;
    }
    this.inbound = null;
    if (!this.state.complete(slot.id)) {
      return;
    }
    this.replySubmit(slot.id, value);
  }

  private replySubmit(id: string, value: string | null): void {
    try {
      this.process.writeLine(encodeEnvelope({ type: 'submit', id, value }));
    } catch (error: unknown) {
      this.log.debug('session.reply-dropped', {
        session: this.id,
        id,
        message: formatErrorMessage(error, false),
      });
    }
  }

  private recordExitRequest(code: number | null, message: string | null): void {
    this.exitRequest = { code, message };
    this.log.info('session.exit-requested', { session: this.id, code, message });
    if (this.exitRequestTimer !== null || this.process.hasExited()) {
      return;
    }
    this.exitRequestTimer = this.setTimer(() => {
      this.exitRequestTimer = null;
      if (!this.process.hasExited()) {
        this.process.terminate();
      }
    }, this.exitRequestGraceMs);
    this.exitRequestTimer.unref();
  }

  private handleExit(outcome: ExitOutcome): void {
    if (this.report !== null) {
      return;
    }
    if (this.exitRequestTimer !== null) {
      this.clearTimer(this.exitRequestTimer);
      this.exitRequestTimer = null;
    }
    if (this.inbound !== null) {
      this.inbound.controller.abort();
      this.inbound = null;
    }
    this.state.close(outcome.kind);
    const cancelled = this.correlator.cancelAll('session-closed');
    const report: ScriptRunReport = {
      sessionId: this.id,
      scriptPath: this.scriptPath,
      outcome,
      stderrTail: this.process.stderrTail(),
      exitRequest: this.exitRequest,
    };
    this.report = report;
    this.log.info('session.closed', {
      session: this.id,
      outcome: outcome.kind,
      'cancelled-requests': cancelled,
    });
    for (const resolve of this.closedWaiters.splice(0)) {
      resolve(report);
    }
    this.onClosed?.(report);
  }
}
