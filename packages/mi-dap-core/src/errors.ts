import type { BackendConfig } from './config/backendConfigLoader';

/**
 * A frame on the client socket could not be decoded. Recovered locally by
 * dropping that one frame.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly rawFrame?: string,
  ) {
    super(message);
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * A command was issued while the GDB process is not running.
 */
export class BackendUnavailableError extends Error {
  constructor(message: string = 'GDB is not running') {
    super(message);
    this.name = 'BackendUnavailableError';
    Object.setPrototypeOf(this, BackendUnavailableError.prototype);
  }
}

/**
 * GDB answered with an explicit `^error` record.
 */
export class CommandFailedError extends Error {
  constructor(
    message: string,
    public readonly command: string,
  ) {
    super(message);
    this.name = 'CommandFailedError';
    Object.setPrototypeOf(this, CommandFailedError.prototype);
  }
}

/**
 * A referenced pid, inferior, breakpoint or variable handle does not exist.
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * A request is missing a required field or names an unknown command.
 */
export class ProtocolViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolViolationError';
    Object.setPrototypeOf(this, ProtocolViolationError.prototype);
  }
}

export type BackendStartStage = 'spawn' | 'early_exit' | 'stream_setup';

/**
 * The GDB executable could not be started. This is the one error that ends
 * the whole adapter session.
 */
export class BackendStartError extends Error {
  constructor(
    message: string,
    public readonly stage: BackendStartStage,
    public readonly backendConfig: BackendConfig,
    public readonly underlyingError?: Error,
    public readonly stderrOutput?: string,
    public readonly exitCode?: number | null,
    public readonly signal?: string | null,
  ) {
    super(message);
    this.name = 'BackendStartError';
    Object.setPrototypeOf(this, BackendStartError.prototype);
  }
}

export class BackendStartErrorBuilder {
  private _stage?: BackendStartStage;
  private _backendConfig?: BackendConfig;
  private _underlyingError?: Error;
  private _stderrOutput?: string;
  private _exitCode?: number | null;
  private _signal?: string | null;

  constructor(private readonly _message: string) {}

  public stage(stage: BackendStartStage): this {
    this._stage = stage;
    return this;
  }

  public backendConfig(backendConfig: BackendConfig): this {
    this._backendConfig = backendConfig;
    return this;
  }

  public underlyingError(error: Error): this {
    this._underlyingError = error;
    return this;
  }

  public stderrOutput(stderr: string): this {
    this._stderrOutput = stderr;
    return this;
  }

  public exitCode(exitCode: number | null): this {
    this._exitCode = exitCode;
    return this;
  }

  public signal(signal: string | null): this {
    this._signal = signal;
    return this;
  }

  public build(): BackendStartError {
    if (!this._message) {
      throw new Error("BackendStartErrorBuilder: 'message' is required.");
    }
    if (!this._stage) {
      throw new Error("BackendStartErrorBuilder: 'stage' is required.");
    }
    if (!this._backendConfig) {
      throw new Error("BackendStartErrorBuilder: 'backendConfig' is required.");
    }
    return new BackendStartError(
      this._message,
      this._stage,
      this._backendConfig,
      this._underlyingError,
      this._stderrOutput,
      this._exitCode,
      this._signal,
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
