export type BridgeErrorCode =
  | 'spawn-failed'
  | 'broken-pipe'
  | 'concurrent-prompt-not-allowed'
  | 'session-closed'
  | 'duplicate-correlation-id';

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;

  constructor(code: BridgeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BridgeError';
    this.code = code;
  }
}

export class SpawnFailedError extends BridgeError {
  readonly scriptPath: string;

  constructor(scriptPath: string, cause: unknown) {
    super('spawn-failed', `failed to spawn script ${scriptPath}: ${formatErrorMessage(cause, false)}`, {
      cause,
    });
    this.name = 'SpawnFailedError';
    this.scriptPath = scriptPath;
  }
}

export class BrokenPipeError extends BridgeError {
  constructor(detail: string) {
    super('broken-pipe', `script stdin is closed: ${detail}`);
    this.name = 'BrokenPipeError';
  }
}

export class ConcurrentPromptNotAllowedError extends BridgeError {
  readonly activeKind: string;

  constructor(activeKind: string, requestedKind: string) {
    super(
      'concurrent-prompt-not-allowed',
      `cannot open ${requestedKind} prompt while ${activeKind} prompt is outstanding`,
    );
    this.name = 'ConcurrentPromptNotAllowedError';
    this.activeKind = activeKind;
  }
}

export class SessionClosedError extends BridgeError {
  constructor(sessionId: string) {
    super('session-closed', `session ${sessionId} is closed`);
    this.name = 'SessionClosedError';
  }
}

export class DuplicateCorrelationIdError extends BridgeError {
  constructor(id: string) {
    super('duplicate-correlation-id', `request id ${id} is already pending`);
    this.name = 'DuplicateCorrelationIdError';
  }
}

export function formatErrorMessage(error: unknown, withStack = true): string {
  if (error instanceof Error) {
    return withStack ? (error.stack ?? error.message) : error.message;
  }
  return String(error);
}

export function readErrorCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return null;
  }
  return typeof error.code === 'string' ? error.code : null;
}
