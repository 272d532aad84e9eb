import type { BridgeLog } from '../log/event-log.ts';
import type { RequestKind } from '../protocol/envelope.ts';
import { ConcurrentPromptNotAllowedError, SessionClosedError } from '../runtime/bridge-errors.ts';

// outbound: the host asked the script; inbound: the script asked the host UI.
export type PromptDirection = 'outbound' | 'inbound';

export interface ActivePrompt {
  readonly id: string;
  readonly kind: RequestKind;
  readonly direction: PromptDirection;
}

export type PromptState =
  | {
      readonly phase: 'idle';
    }
  | {
      readonly phase: 'sending';
      readonly kind: RequestKind;
      readonly direction: PromptDirection;
    }
  | ({
      readonly phase: 'awaiting';
    } & ActivePrompt)
  | ({
      readonly phase: 'cancelled';
    } & ActivePrompt)
  | {
      readonly phase: 'closed';
      readonly reason: string;
    };

export type PromptPhase = PromptState['phase'];

type TransitionListener = (from: PromptState, to: PromptState) => void;

const IDLE: PromptState = { phase: 'idle' };

export class PromptStateMachine {
  private state: PromptState = IDLE;
  private readonly listeners = new Set<TransitionListener>();

  constructor(
    private readonly sessionId: string,
    private readonly log: BridgeLog,
  ) {}

  snapshot(): PromptState {
    return this.state;
  }

  phase(): PromptPhase {
    return this.state.phase;
  }

  isClosed(): boolean {
    return this.state.phase === 'closed';
  }

  activePrompt(): ActivePrompt | null {
    if (this.state.phase !== 'awaiting' && this.state.phase !== 'cancelled') {
      return null;
    }
    return {
      id: this.state.id,
      kind: this.state.kind,
      direction: this.state.direction,
    };
  }

  onTransition(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** idle → sending; throws when the slot is taken or the session has closed. */
  beginSend(kind: RequestKind): void {
    this.assertSlotFree(kind);
    this.transition({ phase: 'sending', kind, direction: 'outbound' });
  }

  markAwaiting(id: string): boolean {
    if (this.state.phase !== 'sending') {
      return false;
    }
    this.transition({ phase: 'awaiting', id, kind: this.state.kind, direction: this.state.direction });
    return true;
  }

  abortSend(): boolean {
    if (this.state.phase !== 'sending') {
      return false;
    }
    this.transition(IDLE);
    return true;
  }

  /** idle → awaiting for a prompt the script opened on the host. */
  beginInbound(id: string, kind: RequestKind): void {
    this.assertSlotFree(kind);
    this.transition({ phase: 'awaiting', id, kind, direction: 'inbound' });
  }

  complete(id: string): boolean {
    if (this.state.phase !== 'awaiting' || this.state.id !== id) {
      return false;
    }
    this.transition(IDLE);
    return true;
  }

  /** awaiting → cancelled → idle, returning the prompt that was cancelled. */
  cancel(): ActivePrompt | null {
    if (this.state.phase !== 'awaiting') {
      return null;
    }
    const prompt: ActivePrompt = {
      id: this.state.id,
      kind: this.state.kind,
      direction: this.state.direction,
    };
    this.transition({ phase: 'cancelled', ...prompt });
    this.transition(IDLE);
    return prompt;
  }

  close(reason: string): boolean {
    if (this.state.phase === 'closed') {
      return false;
    }
    this.transition({ phase: 'closed', reason });
    return true;
  }

  private assertSlotFree(kind: RequestKind): void {
    const state = this.state;
    if (state.phase === 'closed') {
      throw new SessionClosedError(this.sessionId);
    }
    if (state.phase !== 'idle') {
      this.log.warn('prompt.concurrent-rejected', {
        session: this.sessionId,
        active: state.kind,
        requested: kind,
      });
      throw new ConcurrentPromptNotAllowedError(state.kind, kind);
    }
  }

  private transition(next: PromptState): void {
    const previous = this.state;
    this.state = next;
    this.log.debug('prompt.transition', {
      session: this.sessionId,
      from: previous.phase,
      to: next.phase,
    });
    for (const listener of this.listeners) {
      listener(previous, next);
    }
  }
}
