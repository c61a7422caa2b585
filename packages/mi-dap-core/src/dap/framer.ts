import { DebugProtocol } from '@vscode/debugprotocol';
import { TransportError } from '../errors';
import { isProtocolMessage } from './messages';

const TWO_CRLF = '\r\n\r\n';
const CONTENT_LENGTH = 'Content-Length:';
const MAX_CONTENT_LENGTH = 16 * 1024 * 1024;

export type FrameResult =
  | { kind: 'incomplete'; remaining: Buffer }
  | { kind: 'message'; message: DebugProtocol.ProtocolMessage; remaining: Buffer }
  | { kind: 'malformed'; error: TransportError; remaining: Buffer };

/**
 * Decodes the first frame in `buffer`.
 *
 * A header block without a usable `Content-Length` is dropped as malformed;
 * so is a complete body that is not a JSON protocol message. Bytes before
 * the `Content-Length` header in a block are ignored, which lets the reader
 * pick up the next frame after a dropped one.
 */
export function decode(buffer: Buffer): FrameResult {
  const headerIndex = buffer.indexOf(TWO_CRLF);
  if (headerIndex === -1) {
    return { kind: 'incomplete', remaining: buffer };
  }

  const headerBlock = buffer.toString('utf8', 0, headerIndex);
  const bodyStart = headerIndex + TWO_CRLF.length;
  const afterHeader = buffer.subarray(bodyStart);

  const lengthStart = headerBlock.lastIndexOf(CONTENT_LENGTH);
  if (lengthStart === -1) {
    return {
      kind: 'malformed',
      error: new TransportError('Missing Content-Length header', headerBlock),
      remaining: afterHeader,
    };
  }

  const lengthText = headerBlock.slice(lengthStart + CONTENT_LENGTH.length).split('\r\n')[0].trim();
  const length = /^\d+$/.test(lengthText) ? parseInt(lengthText, 10) : NaN;
  if (Number.isNaN(length) || length > MAX_CONTENT_LENGTH) {
    return {
      kind: 'malformed',
      error: new TransportError(`Invalid Content-Length: ${lengthText}`, headerBlock),
      remaining: afterHeader,
    };
  }

  if (afterHeader.length < length) {
    return { kind: 'incomplete', remaining: buffer };
  }

  const body = afterHeader.toString('utf8', 0, length);
  const remaining = afterHeader.subarray(length);
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return {
      kind: 'malformed',
      error: new TransportError(`Error parsing DAP message JSON: ${reason}`, body),
      remaining,
    };
  }
  if (!isProtocolMessage(parsed)) {
    return {
      kind: 'malformed',
      error: new TransportError('Frame body is not a DAP protocol message', body),
      remaining,
    };
  }
  return { kind: 'message', message: parsed, remaining };
}

export function encode(message: DebugProtocol.ProtocolMessage): Buffer {
  const payload = JSON.stringify(message);
  return Buffer.from(`${CONTENT_LENGTH} ${Buffer.byteLength(payload, 'utf8')}${TWO_CRLF}${payload}`, 'utf8');
}

export type DecodedFrame = Exclude<FrameResult, { kind: 'incomplete' }>;

/**
 * Accumulates socket chunks and returns every complete frame they finish.
 */
export class MessageReader {
  private buffer: Buffer = Buffer.alloc(0);

  public get pendingBytes(): number {
    return this.buffer.length;
  }

  public append(chunk: Buffer): DecodedFrame[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const frames: DecodedFrame[] = [];
    for (;;) {
      const result = decode(this.buffer);
      this.buffer = result.remaining;
      if (result.kind === 'incomplete') {
        return frames;
      }
      frames.push(result);
    }
  }
}
