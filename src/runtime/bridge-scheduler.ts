export type BridgeTaskLane = 'interactive' | 'protocol';

type BridgeTask = () => void | Promise<void>;

interface QueuedBridgeTask {
  readonly id: number;
  readonly lane: BridgeTaskLane;
  readonly label: string;
  readonly enqueuedAtMs: number;
  readonly task: BridgeTask;
}

interface BridgeSchedulerMetrics {
  readonly interactiveQueued: number;
  readonly protocolQueued: number;
  readonly running: boolean;
}

export interface BridgeTaskEvent {
  readonly id: number;
  readonly lane: BridgeTaskLane;
  readonly label: string;
  readonly enqueuedAtMs: number;
  readonly waitMs: number;
}

interface BridgeSchedulerOptions {
  readonly nowMs?: () => number;
  readonly schedule?: (callback: () => void) => void;
  readonly onStart?: (event: BridgeTaskEvent, metrics: BridgeSchedulerMetrics) => void;
  readonly onError?: (event: BridgeTaskEvent, metrics: BridgeSchedulerMetrics, error: unknown) => void;
  readonly onFatal?: (error: unknown) => void;
}

function defaultSchedule(callback: () => void): void {
  setImmediate(callback);
}

/**
 * Single cooperative queue that owns prompt-state transitions and window actions. Tasks run
 * one at a time; hotkey and window work on the interactive lane goes ahead of queued envelope
 * handling, and each lane is FIFO. Tasks must not wait on a script or the UI: anything slow is
 * started from a task and reports back by enqueueing another one.
 */
export class BridgeScheduler {
  private readonly nowMs: () => number;
  private readonly schedule: (callback: () => void) => void;
  private readonly onStart: BridgeSchedulerOptions['onStart'];
  private readonly onError: BridgeSchedulerOptions['onError'];
  private readonly onFatal: BridgeSchedulerOptions['onFatal'];

  private readonly interactiveQueue: QueuedBridgeTask[] = [];
  private readonly protocolQueue: QueuedBridgeTask[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private nextId = 1;
  private running = false;
  private pumpScheduled = false;
  private stopped = false;

  constructor(options: BridgeSchedulerOptions = {}) {
    this.nowMs = options.nowMs ?? Date.now;
    this.schedule = options.schedule ?? defaultSchedule;
    this.onStart = options.onStart;
    this.onError = options.onError;
    this.onFatal = options.onFatal;
  }

  enqueueInteractive(task: BridgeTask, label = 'interactive-task'): boolean {
    return this.enqueue(task, 'interactive', label);
  }

  enqueueProtocol(task: BridgeTask, label = 'protocol-task'): boolean {
    return this.enqueue(task, 'protocol', label);
  }

  async waitForIdle(): Promise<void> {
    if (this.isIdle()) {
      return;
    }
    await new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Drops queued tasks and refuses new ones; a running task finishes. */
  stop(): void {
    this.stopped = true;
    this.interactiveQueue.length = 0;
    this.protocolQueue.length = 0;
    this.resolveIdleWaiters();
  }

  metrics(): BridgeSchedulerMetrics {
    return {
      interactiveQueued: this.interactiveQueue.length,
      protocolQueued: this.protocolQueue.length,
      running: this.running,
    };
  }

  private enqueue(task: BridgeTask, lane: BridgeTaskLane, label: string): boolean {
    if (this.stopped) {
      return false;
    }
    const entry: QueuedBridgeTask = {
      id: this.nextId,
      lane,
      label,
      enqueuedAtMs: this.nowMs(),
      task,
    };
    this.nextId += 1;
    if (lane === 'interactive') {
      this.interactiveQueue.push(entry);
    } else {
      this.protocolQueue.push(entry);
    }
    this.schedulePump();
    return true;
  }

  private isIdle(): boolean {
    return !this.running && this.interactiveQueue.length === 0 && this.protocolQueue.length === 0;
  }

  private resolveIdleWaiters(): void {
    if (this.running) {
      return;
    }
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }

  private pickNext(): QueuedBridgeTask | null {
    return this.interactiveQueue.shift() ?? this.protocolQueue.shift() ?? null;
  }

  private schedulePump(): void {
    if (this.pumpScheduled) {
      return;
    }
    this.pumpScheduled = true;
    this.schedule(() => {
      this.pumpScheduled = false;
      void this.runQueue().catch((error: unknown) => {
        this.onFatal?.(error);
      });
    });
  }

  private async runQueue(): Promise<void> {
    if (this.running) {
      return;
    }
    const next = this.pickNext();
    if (next === null) {
      if (this.isIdle()) {
        this.resolveIdleWaiters();
      }
      return;
    }

    this.running = true;
    const event: BridgeTaskEvent = {
      id: next.id,
      lane: next.lane,
      label: next.label,
      enqueuedAtMs: next.enqueuedAtMs,
      waitMs: Math.max(0, this.nowMs() - next.enqueuedAtMs),
    };

    try {
      this.onStart?.(event, this.metrics());
      await next.task();
    } catch (error: unknown) {
      this.onError?.(event, this.metrics(), error);
    } finally {
      this.running = false;
      if (this.isIdle()) {
        this.resolveIdleWaiters();
      } else {
        this.schedulePump();
      }
    }
  }
}
