export type FramingErrorReason =
  | 'missing-length'
  | 'invalid-length'
  | 'oversized'
  | 'buffer-overflow';

/**
 * Raised (and usually only logged) when a byte stream cannot be split into messages.
 * The framer resynchronises after reporting it.
 */
export class FramingError extends Error {
  constructor(
    message: string,
    public readonly reason: FramingErrorReason,
    public readonly discardedBytes: number,
  ) {
    super(message);
    this.name = 'FramingError';
    Object.setPrototypeOf(this, FramingError.prototype);
  }
}

export class BackendUnreachableError extends Error {
  constructor(
    message: string,
    public readonly address: string,
    public readonly attempts: number,
    public readonly underlyingError?: Error,
  ) {
    super(message);
    this.name = 'BackendUnreachableError';
    Object.setPrototypeOf(this, BackendUnreachableError.prototype);
  }
}

export type InternalRequestFailure = 'timeout' | 'closed' | 'backend-error';

/**
 * Failure of a request the proxy issued to the backend on its own behalf.
 */
export class InternalRequestError extends Error {
  constructor(
    message: string,
    public readonly failure: InternalRequestFailure,
    public readonly requestId: string,
    public readonly method: string,
    public readonly backendError?: unknown,
  ) {
    super(message);
    this.name = 'InternalRequestError';
    Object.setPrototypeOf(this, InternalRequestError.prototype);
  }
}

export class ProfileConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
  ) {
    super(message);
    this.name = 'ProfileConfigError';
    Object.setPrototypeOf(this, ProfileConfigError.prototype);
  }
}

export type BackendProcessStage = 'spawn' | 'early_exit';

export interface BackendProcessFailure {
  stage: BackendProcessStage;
  language: string;
  command: string;
  stderr?: string;
  exitCode?: number;
  signal?: string;
  cause?: Error;
}

/**
 * The `--start` backend could not be spawned, or died before it was up.
 */
export class BackendProcessError extends Error {
  public readonly stage: BackendProcessStage;
  public readonly language: string;
  public readonly command: string;
  public readonly stderr: string;
  public readonly exitCode: number | undefined;
  public readonly signal: string | undefined;
  public readonly underlyingError: Error | undefined;

  constructor(message: string, failure: BackendProcessFailure) {
    super(message);
    this.name = 'BackendProcessError';
    this.stage = failure.stage;
    this.language = failure.language;
    this.command = failure.command;
    this.stderr = failure.stderr ?? '';
    this.exitCode = failure.exitCode;
    this.signal = failure.signal;
    this.underlyingError = failure.cause;
    Object.setPrototypeOf(this, BackendProcessError.prototype);
  }
}

const CLOSED_CONNECTION_CODES = new Set([
  'ECONNRESET',
  'EPIPE',
  'ECONNABORTED',
  'ERR_STREAM_DESTROYED',
  'ERR_STREAM_WRITE_AFTER_END',
]);

const CLOSED_CONNECTION_PATTERNS = [
  'use of closed network connection',
  'connection reset by peer',
  'broken pipe',
  'EOF',
  'socket hang up',
  'This socket has been ended by the other party',
];

/**
 * Distinguishes an ordinary peer disconnect from a real transport failure,
 * so the former can be logged at info level.
 */
export function isConnectionClosedError(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }
  if (
    'code' in err &&
    typeof err.code === 'string' &&
    CLOSED_CONNECTION_CODES.has(err.code)
  ) {
    return true;
  }
  return CLOSED_CONNECTION_PATTERNS.some((pattern) =>
    err.message.includes(pattern),
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
