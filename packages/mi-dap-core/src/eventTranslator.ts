import { DebugProtocol } from '@vscode/debugprotocol';
import { LoggerInterface, childLogger } from './logging';
import { BackendRecord, MiTuple, payloadTuple, stringOf } from './mi/miRecords';

/** Notify record classes that are turned into events instead of being queued. */
export const EVENT_NOTIFY_CLASSES: ReadonlySet<string> = new Set([
  'stopped',
  'running',
  'thread-group-started',
  'thread-group-exited',
]);

const DEFAULT_THREAD_ID = 1;

/**
 * Destination for outgoing DAP events. The server's writer implements it
 * and queues socket writes without blocking the caller.
 */
export interface EventSink {
  sendEvent(event: DebugProtocol.Event): void;
}

export interface SuspendGuard {
  /** Restores the gate to the state it had before `suspend()`. Idempotent. */
  release(): void;
}

export interface NewProcessEventBody {
  groupId: string;
  pid?: number;
}

export interface ExitedProcessEventBody {
  groupId: string;
  exitCode?: number;
}

function threadIdOf(value: string | undefined): number {
  if (value === undefined || value === 'all') {
    return DEFAULT_THREAD_ID;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? DEFAULT_THREAD_ID : parsed;
}

/**
 * Turns asynchronous GDB notifications into DAP events and gates their
 * delivery. The gate starts closed; events produced while it is closed are
 * dropped.
 */
export class EventTranslator {
  private readonly logger: LoggerInterface;
  private sink?: EventSink;
  private enabled = false;

  constructor(logger: LoggerInterface) {
    this.logger = childLogger(logger, { className: 'EventTranslator' });
  }

  public setSink(sink: EventSink | undefined): void {
    this.sink = sink;
  }

  public enable(): void {
    this.enabled = true;
  }

  public disable(): void {
    this.enabled = false;
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Closes the gate until the returned guard is released.
   */
  public suspend(): SuspendGuard {
    const previous = this.enabled;
    this.enabled = false;
    let released = false;
    return {
      release: () => {
        if (released) {
          return;
        }
        released = true;
        this.enabled = previous;
      },
    };
  }

  public async runSuspended<T>(operation: () => Promise<T>): Promise<T> {
    const guard = this.suspend();
    try {
      return await operation();
    } finally {
      guard.release();
    }
  }

  /**
   * Classifies a notify record. Returns false for records that are not
   * events, which the caller should queue as ordinary output.
   */
  public notify(record: BackendRecord): boolean {
    if (record.kind !== 'notify' || record.message === null || !EVENT_NOTIFY_CLASSES.has(record.message)) {
      return false;
    }
    const payload: MiTuple = payloadTuple(record) ?? {};

    switch (record.message) {
      case 'stopped': {
        const reason = stringOf(payload['reason']) ?? 'unknown';
        const hitBreakpointIds: number[] = [];
        if (reason.includes('breakpoint')) {
          const number = stringOf(payload['bkptno']);
          if (number) {
            hitBreakpointIds.push(parseInt(number, 10));
          }
        }
        this.notifyStopped(
          reason,
          threadIdOf(stringOf(payload['thread-id'])),
          stringOf(payload['stopped-threads']) === 'all',
          hitBreakpointIds,
        );
        break;
      }
      case 'running': {
        const threadId = stringOf(payload['thread-id']);
        this.notifyContinued(
          threadIdOf(threadId),
          threadId === 'all' || stringOf(payload['continued-threads']) === 'all',
        );
        this.notifyInvalidated(['stacks']);
        break;
      }
      case 'thread-group-started': {
        const pid = stringOf(payload['pid']);
        this.notifyProcessCreated(stringOf(payload['id']) ?? '', pid ? parseInt(pid, 10) : undefined);
        break;
      }
      case 'thread-group-exited': {
        const exitCode = stringOf(payload['exit-code']);
        // GDB prints the exit code in octal.
        this.notifyProcessExited(stringOf(payload['id']) ?? '', exitCode ? parseInt(exitCode, 8) : undefined);
        break;
      }
    }
    return true;
  }

  public notifyStopped(
    reason: string,
    threadId: number,
    allThreadsStopped: boolean,
    hitBreakpointIds: number[] = [],
  ): void {
    const event: DebugProtocol.StoppedEvent = {
      seq: 0,
      type: 'event',
      event: 'stopped',
      body: { reason, threadId, allThreadsStopped, hitBreakpointIds },
    };
    this.send(event);
  }

  public notifyContinued(threadId: number, allThreadsContinued: boolean): void {
    const event: DebugProtocol.ContinuedEvent = {
      seq: 0,
      type: 'event',
      event: 'continued',
      body: { threadId, allThreadsContinued },
    };
    this.send(event);
  }

  public notifyInvalidated(areas: DebugProtocol.InvalidatedAreas[]): void {
    const event: DebugProtocol.InvalidatedEvent = {
      seq: 0,
      type: 'event',
      event: 'invalidated',
      body: { areas },
    };
    this.send(event);
  }

  public notifyProcessCreated(groupId: string, pid?: number): void {
    const body: NewProcessEventBody = { groupId };
    if (pid !== undefined && !Number.isNaN(pid)) {
      body.pid = pid;
    }
    this.send({ seq: 0, type: 'event', event: 'newProcess', body });
  }

  public notifyProcessExited(groupId: string, exitCode?: number): void {
    const body: ExitedProcessEventBody = { groupId };
    if (exitCode !== undefined && !Number.isNaN(exitCode)) {
      body.exitCode = exitCode;
    }
    this.send({ seq: 0, type: 'event', event: 'exitedProcess', body });
  }

  private send(event: DebugProtocol.Event): void {
    if (!this.enabled || !this.sink) {
      this.logger.debug({ event: event.event }, 'Event dropped, delivery is disabled');
      return;
    }
    try {
      this.sink.sendEvent(event);
    } catch (error) {
      this.logger.error({ err: error, event: event.event }, 'Failed to deliver event');
    }
  }
}
