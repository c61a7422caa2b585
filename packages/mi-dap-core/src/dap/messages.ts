import { DebugProtocol } from '@vscode/debugprotocol';

/** Error id reported for frames that cannot be decoded. */
export const PARSE_ERROR_ID = -32700;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isProtocolMessage(value: unknown): value is DebugProtocol.ProtocolMessage {
  return isRecord(value) && typeof value['seq'] === 'number' && typeof value['type'] === 'string';
}

export function isRequest(message: DebugProtocol.ProtocolMessage): message is DebugProtocol.Request {
  return message.type === 'request' && isRecord(message) && typeof message['command'] === 'string';
}

export function createResponse(
  request: Pick<DebugProtocol.Request, 'seq' | 'command'>,
  success: boolean = true,
  message?: string,
  body?: unknown,
): DebugProtocol.Response {
  const response: DebugProtocol.Response = {
    seq: 0,
    type: 'response',
    request_seq: request.seq,
    command: request.command,
    success,
  };
  if (message) {
    response.message = message;
  }
  if (body !== undefined) {
    response.body = body;
  }
  return response;
}

export function createEvent(event: string, body?: unknown): DebugProtocol.Event {
  const message: DebugProtocol.Event = { seq: 0, type: 'event', event };
  if (body !== undefined) {
    message.body = body;
  }
  return message;
}
