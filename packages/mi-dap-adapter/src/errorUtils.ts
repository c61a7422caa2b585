import { DebugProtocol } from '@vscode/debugprotocol';
import {
  BackendStartError,
  BackendUnavailableError,
  CommandFailedError,
  NotFoundError,
  PARSE_ERROR_ID,
  ProtocolViolationError,
  TransportError,
} from 'mi-dap-core';

export const ERROR_IDS = {
  transport: PARSE_ERROR_ID,
  unknown: 1000,
  protocolViolation: 1001,
  notFound: 1002,
  commandFailed: 1003,
  backendUnavailable: 1004,
  backendStart: 1005,
} as const;

interface NormalizedError {
  message: string;
  id: number;
}

/**
 * Builds a failed DAP response from any thrown value.
 */
export class DapErrorBuilder {
  private _error?: unknown;
  private _requestSeq?: number;
  private _command?: string;

  private static normalizeErrorObject(error: unknown): NormalizedError {
    if (!(error instanceof Error)) {
      return { message: String(error), id: ERROR_IDS.unknown };
    }
    return { message: error.message, id: DapErrorBuilder.idOf(error) };
  }

  private static idOf(error: Error): number {
    if (error instanceof TransportError) return ERROR_IDS.transport;
    if (error instanceof ProtocolViolationError) return ERROR_IDS.protocolViolation;
    if (error instanceof NotFoundError) return ERROR_IDS.notFound;
    if (error instanceof CommandFailedError) return ERROR_IDS.commandFailed;
    if (error instanceof BackendUnavailableError) return ERROR_IDS.backendUnavailable;
    if (error instanceof BackendStartError) return ERROR_IDS.backendStart;
    return ERROR_IDS.unknown;
  }

  public error(error: unknown): this {
    this._error = error;
    return this;
  }

  /** The request being answered. Omit for frames that could not be decoded. */
  public request(request: Pick<DebugProtocol.Request, 'seq' | 'command'>): this {
    this._requestSeq = request.seq;
    this._command = request.command;
    return this;
  }

  public build(): DebugProtocol.ErrorResponse {
    if (this._error === undefined) {
      throw new Error("DapErrorBuilder: 'error' is required.");
    }
    const normalized = DapErrorBuilder.normalizeErrorObject(this._error);
    const { message } = normalized;
    return {
      seq: 0,
      type: 'response',
      request_seq: this._requestSeq ?? 0,
      command: this._command ?? '',
      success: false,
      message,
      body: {
        error: {
          id: normalized.id,
          format: message,
          showUser: normalized.id !== ERROR_IDS.transport,
        },
      },
    };
  }
}
