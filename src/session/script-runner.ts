import type { BridgeConfig } from '../config/bridge-config.ts';
import type { BridgeLog } from '../log/event-log.ts';
import {
  buildScriptEnv,
  spawnScriptProcess,
  type ScriptProcessLike,
  type SpawnScriptOptions,
} from '../process/script-process.ts';
import type { BridgeScheduler } from '../runtime/bridge-scheduler.ts';
import type { SpawnFailedError } from '../runtime/bridge-errors.ts';
import {
  ScriptSession,
  type PromptPresenter,
  type ScriptRunReport,
  type SessionUiSink,
} from './script-session.ts';

export interface LaunchOptions {
  readonly cwd?: string;
  readonly env?: Readonly<Record<string, string>>;
  readonly promptTimeoutMs?: number | null;
}

export type LaunchResult =
  | {
      readonly ok: true;
      readonly session: ScriptSession;
    }
  | {
      readonly ok: false;
      readonly error: SpawnFailedError;
    };

type SpawnProcess = (
  options: SpawnScriptOptions,
) => Promise<{ ok: true; process: ScriptProcessLike } | { ok: false; error: SpawnFailedError }>;

interface ScriptRunnerOptions {
  readonly config: BridgeConfig;
  readonly scheduler: BridgeScheduler;
  readonly log: BridgeLog;
  readonly presenter?: PromptPresenter;
  readonly ui?: SessionUiSink;
  readonly baseEnv?: NodeJS.ProcessEnv;
  readonly spawnProcess?: SpawnProcess;
  readonly onSessionClosed?: (report: ScriptRunReport) => void;
}

/**
 * Launches scripts and tracks the sessions that are still running. Session ids are
 * `session-1`, `session-2`, … per runner.
 */
export class ScriptRunner {
  private readonly config: BridgeConfig;
  private readonly scheduler: BridgeScheduler;
  private readonly log: BridgeLog;
  private readonly presenter: PromptPresenter | undefined;
  private readonly ui: SessionUiSink | undefined;
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly spawnProcess: SpawnProcess;
  private readonly onSessionClosed: ((report: ScriptRunReport) => void) | undefined;
  private readonly sessions = new Map<string, ScriptSession>();
  private nextSessionNumber = 1;

  constructor(options: ScriptRunnerOptions) {
    this.config = options.config;
    this.scheduler = options.scheduler;
    this.log = options.log;
    this.presenter = options.presenter;
    this.ui = options.ui;
    this.baseEnv = options.baseEnv ?? process.env;
    this.spawnProcess = options.spawnProcess ?? spawnScriptProcess;
    this.onSessionClosed = options.onSessionClosed;
  }

  async launch(
    scriptPath: string,
    args: readonly string[] = [],
    options: LaunchOptions = {},
  ): Promise<LaunchResult> {
    const sessionId = `session-${String(this.nextSessionNumber)}`;
    this.nextSessionNumber += 1;
    const { session: sessionConfig } = this.config;

    const spawned = await this.spawnProcess({
      sessionId,
      scriptPath,
      args,
      ...(options.cwd === undefined ? {} : { cwd: options.cwd }),
      env: buildScriptEnv(sessionConfig.envAllowlist, this.baseEnv, sessionId, options.env),
      runtimes: this.config.runtimes,
      log: this.log,
      maxLineLength: this.config.protocol.maxLineLength,
      stderrTailLines: sessionConfig.stderrTailLines,
      terminateGraceMs: sessionConfig.terminateGraceMs,
      stdioDrainMs: sessionConfig.stdioDrainMs,
    });
    if (!spawned.ok) {
      return { ok: false, error: spawned.error };
    }

    const session = new ScriptSession({
      sessionId,
      scriptPath,
      process: spawned.process,
      scheduler: this.scheduler,
      log: this.log,
      ...(this.presenter === undefined ? {} : { presenter: this.presenter }),
      ...(this.ui === undefined ? {} : { ui: this.ui }),
      promptTimeoutMs:
        options.promptTimeoutMs === undefined ? sessionConfig.promptTimeoutMs : options.promptTimeoutMs,
      exitRequestGraceMs: sessionConfig.exitRequestGraceMs,
      onClosed: (report) => {
        this.handleClosed(report);
      },
    });
    this.sessions.set(sessionId, session);
    session.start();
    this.log.info('runner.launched', { session: sessionId, script: scriptPath });
    return { ok: true, session };
  }

  get(sessionId: string): ScriptSession | null {
    return this.sessions.get(sessionId) ?? null;
  }

  list(): readonly ScriptSession[] {
    return [...this.sessions.values()];
  }

  kill(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (session === undefined) {
      return false;
    }
    session.kill();
    return true;
  }

  /** Terminates every live session and resolves once all of them have closed. */
  async killAll(): Promise<readonly ScriptRunReport[]> {
    const live = [...this.sessions.values()];
    for (const session of live) {
      session.kill();
    }
    return await Promise.all(live.map((session) => session.closed()));
  }

  private handleClosed(report: ScriptRunReport): void {
    this.sessions.delete(report.sessionId);
    if (report.outcome.kind === 'crashed') {
      this.log.warn('runner.script-crashed', {
        session: report.sessionId,
        script: report.scriptPath,
        code: report.outcome.code,
        signal: report.outcome.signal,
        'stderr-tail': report.stderrTail.join('\n'),
      });
      this.ui?.onScriptError(report);
    }
    this.onSessionClosed?.(report);
  }
}
