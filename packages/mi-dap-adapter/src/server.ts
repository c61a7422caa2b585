import * as fs from 'fs';
import * as net from 'net';
import * as os from 'os';
import * as path from 'path';
import { Readable, Writable } from 'stream';
import { DebugProtocol } from '@vscode/debugprotocol';
import {
  DecodedFrame,
  EventSink,
  LoggerInterface,
  MessageReader,
  Session,
  childLogger,
  encode,
  isRequest,
} from 'mi-dap-core';
import { DapErrorBuilder } from './errorUtils';
import { RequestDispatcher, RequestDispatcherOptions } from './requestDispatcher';

export const SOCKET_FILE_NAME = 'dap.sock';

/**
 * Serves one DAP client over a Unix domain socket.
 *
 * Requests are handled strictly one after another on a single promise
 * chain. Responses and the EventTranslator's events share one writer that
 * stamps the outgoing `seq`.
 */
export class DapServer implements EventSink {
  private readonly logger: LoggerInterface;
  private readonly dispatcher: RequestDispatcher;
  private readonly reader = new MessageReader();
  private server?: net.Server;
  private client?: net.Socket;
  private socketDir?: string;
  private output?: Writable;
  private queue: Promise<void> = Promise.resolve();
  private outgoingSeq = 1;
  private closed?: () => void;
  private stopped = false;

  constructor(
    private readonly session: Session,
    logger: LoggerInterface,
    options: RequestDispatcherOptions = {},
  ) {
    this.logger = childLogger(logger, { className: 'DapServer' });
    this.dispatcher = new RequestDispatcher(session, logger, (message) => this.send(message), options);
    session.events.setSink(this);
  }

  /**
   * Creates the socket in a fresh temporary directory and prints its path
   * as `SOCKET_PATH=<path>` on stdout. Resolves with the path once listening.
   */
  public listen(): Promise<string> {
    this.socketDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mi-dap-'));
    const socketPath = path.join(this.socketDir, SOCKET_FILE_NAME);

    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => {
        if (this.output) {
          this.logger.warn('Rejecting a second client connection');
          socket.destroy();
          return;
        }
        this.logger.info('Client connected');
        this.client = socket;
        this.serve(socket, socket).then(
          () => this.stop(),
          (error: unknown) => {
            this.logger.error({ err: error }, 'Client connection failed');
            return this.stop();
          },
        ).catch((error: unknown) => this.logger.error({ err: error }, 'Failed to stop the server'));
      });
      this.server = server;
      server.once('error', reject);
      server.listen(socketPath, () => {
        server.removeListener('error', reject);
        process.stdout.write(`SOCKET_PATH=${socketPath}\n`);
        this.logger.info(`Listening on ${socketPath}`);
        resolve(socketPath);
      });
    });
  }

  /**
   * Reads frames from `input` and writes responses and events to `output`.
   * Resolves once the input ends or a `disconnect` request has been answered.
   */
  public serve(input: Readable, output: Writable): Promise<void> {
    this.output = output;
    return new Promise((resolve) => {
      this.closed = resolve;
      input.on('data', (chunk: Buffer | string) => {
        const frames = this.reader.append(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
        for (const frame of frames) {
          this.enqueue(frame);
        }
      });
      input.on('end', () => {
        this.logger.info('Client closed the connection');
        this.queue = this.queue.then(() => this.finish());
      });
      input.on('error', (err) => {
        this.logger.error({ err }, 'Client stream error');
        this.finish();
      });
    });
  }

  private enqueue(frame: DecodedFrame): void {
    this.queue = this.queue.then(() => this.handleFrame(frame));
  }

  private async handleFrame(frame: DecodedFrame): Promise<void> {
    if (frame.kind === 'malformed') {
      this.logger.warn({ err: frame.error }, 'Dropping malformed frame');
      this.send(new DapErrorBuilder().error(frame.error).build());
      return;
    }
    try {
      await this.dispatcher.dispatch(frame.message);
    } catch (error) {
      this.logger.error({ err: error }, 'Unexpected failure while handling a request');
    }
    if (isRequest(frame.message) && frame.message.command === 'disconnect') {
      this.finish();
    }
  }

  private finish(): void {
    const closed = this.closed;
    this.closed = undefined;
    closed?.();
  }

  public sendEvent(event: DebugProtocol.Event): void {
    this.send(event);
  }

  private send(message: DebugProtocol.ProtocolMessage): void {
    if (!this.output || this.output.destroyed || this.output.writableEnded) {
      this.logger.debug({ type: message.type }, 'Dropping outgoing message, no client');
      return;
    }
    const stamped = { ...message, seq: this.outgoingSeq++ };
    this.logger.trace({ dapMessage: stamped }, 'Sending DAP message');
    this.output.write(encode(stamped));
  }

  /** Stops GDB, closes the socket and removes its directory. Idempotent. */
  public async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.session.events.setSink(undefined);
    if (this.session.isRunning()) {
      await this.session.stop();
    }
    if (this.output && !this.output.writableEnded) {
      this.output.end();
    }
    this.client?.destroySoon();
    const server = this.server;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    if (this.socketDir) {
      fs.rmSync(this.socketDir, { recursive: true, force: true });
      this.socketDir = undefined;
    }
    this.logger.info('Server stopped');
  }
}
