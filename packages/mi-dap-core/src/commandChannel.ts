import { BackendConnection } from './backendConnection';
import { Disposable } from './common/events';
import { MessageChannel } from './common/messageChannel';
import { BackendUnavailableError } from './errors';
import { EventTranslator } from './eventTranslator';
import { LoggerInterface, childLogger } from './logging';
import { BackendRecord, CommandResult, checkRecords } from './mi/miRecords';

export const DEFAULT_COMMAND_TIMEOUT_MS = 20000;
export const DEFAULT_ACCEPTED_KINDS: readonly string[] = ['done', 'error', 'running'];

export type ChannelState = 'idle' | 'awaiting';

export interface CommandChannelOptions {
  /** Used when `send` is called without a timeout. */
  defaultTimeoutMs?: number;
}

/**
 * Serializes MI commands to GDB and correlates each one with its output.
 *
 * The record listener registered on the backend (the monitor) routes event
 * notifications to the EventTranslator and queues everything else. `send`
 * holds a lock for the whole write-and-wait, so there is never more than one
 * command in flight.
 */
export class CommandChannel {
  private readonly logger: LoggerInterface;
  private readonly queue = new MessageChannel<BackendRecord>();
  private readonly subscription: Disposable;
  private readonly defaultTimeoutMs: number;
  private sendLock: Promise<void> = Promise.resolve();
  private _state: ChannelState = 'idle';

  constructor(
    private readonly backend: BackendConnection,
    private readonly eventTranslator: EventTranslator,
    logger: LoggerInterface,
    options: CommandChannelOptions = {},
  ) {
    this.logger = childLogger(logger, { className: 'CommandChannel' });
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.subscription = backend.onRecord((record) => this.dispatch(record));
  }

  public get state(): ChannelState {
    return this._state;
  }

  private dispatch(record: BackendRecord): void {
    try {
      if (this.eventTranslator.notify(record)) {
        return;
      }
    } catch (error) {
      this.logger.error({ err: error, record }, 'Failed to translate notification');
      return;
    }
    this.queue.push(record);
  }

  /**
   * Sends a command and resolves with every record received up to and
   * including the first result record whose class is in `acceptedKinds`.
   *
   * A missing answer does not reject: the result is a single synthetic
   * `^error` record describing the timeout.
   */
  public send(
    command: string,
    timeoutMs: number = this.defaultTimeoutMs,
    acceptedKinds: readonly string[] = DEFAULT_ACCEPTED_KINDS,
  ): Promise<BackendRecord[]> {
    const run = this.sendLock.then(() => this.sendUnlocked(command, timeoutMs, acceptedKinds));
    this.sendLock = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /**
   * Sends a command and reports the first `^error` as a failed result.
   */
  public async sendChecked(command: string, ignoreFailures: boolean = false): Promise<CommandResult> {
    const records = await this.send(command);
    return checkRecords(records, ignoreFailures);
  }

  private async sendUnlocked(
    command: string,
    timeoutMs: number,
    acceptedKinds: readonly string[],
  ): Promise<BackendRecord[]> {
    if (!this.backend.isRunning()) {
      throw new BackendUnavailableError();
    }

    const stale = this.queue.drain();
    if (stale > 0) {
      this.logger.debug(`Discarded ${stale} stale record(s) before '${command}'`);
    }

    this._state = 'awaiting';
    try {
      this.backend.writeLine(command);
      return await this.collect(command, timeoutMs, acceptedKinds);
    } finally {
      this._state = 'idle';
    }
  }

  private async collect(
    command: string,
    timeoutMs: number,
    acceptedKinds: readonly string[],
  ): Promise<BackendRecord[]> {
    const deadline = Date.now() + timeoutMs;
    const records: BackendRecord[] = [];

    for (;;) {
      const remaining = deadline - Date.now();
      const record = remaining > 0 ? await this.queue.receive(remaining) : undefined;
      if (!record) {
        this.logger.warn(`No response from GDB within ${timeoutMs}ms for '${command}'`);
        return [
          {
            kind: 'result',
            message: 'error',
            payload: {
              msg: `Expected response not received within ${timeoutMs / 1000} seconds for command '${command}'.`,
            },
            token: null,
          },
        ];
      }
      records.push(record);
      if (record.kind === 'result' && record.message !== null && acceptedKinds.includes(record.message)) {
        return records;
      }
    }
  }

  public dispose(): void {
    this.subscription.dispose();
    this.queue.drain();
  }
}
