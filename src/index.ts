export { DEFAULT_BRIDGE_CONFIG, resolveBridgeConfig } from './config/bridge-config.ts';
export type { BridgeConfig } from './config/bridge-config.ts';
export { BridgeLog, createSilentLog, isLogLevel, LOG_LEVELS } from './log/event-log.ts';
export type {
  BridgeLogOptions,
  LogAttrs,
  LogEventRecord,
  LogLevel,
  LogRecord,
  LogSpan,
  LogSpanRecord,
} from './log/event-log.ts';
export {
  envelopeId,
  isNoticeKind,
  isRequestKind,
  NOTICE_KINDS,
  REQUEST_KINDS,
} from './protocol/envelope.ts';
export type {
  Choice,
  Envelope,
  EnvelopeType,
  NoticeEnvelope,
  NoticeInput,
  NoticeKind,
  PromptRequest,
  RequestEnvelope,
  RequestKind,
  SubmitEnvelope,
  UnknownEnvelope,
} from './protocol/envelope.ts';
export { decodeLine, encodeEnvelope, LineBuffer } from './protocol/line-codec.ts';
export type { DecodeResult, MalformedLine, MalformedReason } from './protocol/line-codec.ts';
export { RequestCorrelator } from './session/request-correlator.ts';
export type { CancelReason, RequestOutcome, ResolveStatus } from './session/request-correlator.ts';
export { PromptStateMachine } from './session/prompt-state-machine.ts';
export type { ActivePrompt, PromptDirection, PromptState } from './session/prompt-state-machine.ts';
export { ScriptSession } from './session/script-session.ts';
export type {
  ExitRequest,
  InboundPrompt,
  PromptPresenter,
  PromptResult,
  ScriptRunReport,
  SessionUiSink,
} from './session/script-session.ts';
export { ScriptRunner } from './session/script-runner.ts';
export type { LaunchOptions, LaunchResult } from './session/script-runner.ts';
export {
  buildScriptEnv,
  resolveScriptCommand,
  ScriptProcess,
  spawnScriptProcess,
} from './process/script-process.ts';
export type { ExitOutcome, ScriptProcessLike, SpawnResult } from './process/script-process.ts';
export { formatKeyStroke, parseHotkeyCombo } from './hotkey/hotkey-combo.ts';
export type { KeyStroke } from './hotkey/hotkey-combo.ts';
export { describeHotkeySignal, isWindowKind, WINDOW_KINDS } from './hotkey/hotkey-signal.ts';
export type { HotkeyBinding, HotkeySignal, WindowKind } from './hotkey/hotkey-signal.ts';
export { SignalRing } from './hotkey/signal-ring.ts';
export { HotkeyBridge, InProcessHotkeyBackend } from './hotkey/hotkey-bridge.ts';
export type {
  BackendRegistration,
  HotkeyBackend,
  HotkeyId,
  HotkeyRegistration,
  RegistrationFailureReason,
} from './hotkey/hotkey-bridge.ts';
export { WorkerHotkeyBackend } from './hotkey/worker-hotkey-backend.ts';
export { runHotkeyWorker } from './hotkey/hotkey-worker-host.ts';
export type { HotkeyWorkerPort, OsHotkeyHook } from './hotkey/hotkey-worker-host.ts';
export { HotkeyDispatcher } from './hotkey/hotkey-dispatcher.ts';
export type { ScriptLauncher } from './hotkey/hotkey-dispatcher.ts';
export { BridgeScheduler } from './runtime/bridge-scheduler.ts';
export type { BridgeTaskEvent, BridgeTaskLane } from './runtime/bridge-scheduler.ts';
export { WindowRegistry } from './runtime/window-registry.ts';
export type { WindowController, WindowHandle } from './runtime/window-registry.ts';
export { createBridgeContext } from './runtime/bridge-context.ts';
export type { BridgeContext, BridgeContextOptions } from './runtime/bridge-context.ts';
export {
  BridgeError,
  BrokenPipeError,
  ConcurrentPromptNotAllowedError,
  DuplicateCorrelationIdError,
  SessionClosedError,
  SpawnFailedError,
} from './runtime/bridge-errors.ts';
export type { BridgeErrorCode } from './runtime/bridge-errors.ts';
