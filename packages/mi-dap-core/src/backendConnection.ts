import { Disposable } from './common/events';
import { BackendRecord } from './mi/miRecords';

/**
 * The line-oriented link to a running GDB/MI process.
 */
export interface BackendConnection {
  isRunning(): boolean;
  /** Writes one MI command followed by a newline. */
  writeLine(line: string): void;
  /** Registers a listener called for every parsed output record, in order. */
  onRecord(listener: (record: BackendRecord) => void): Disposable;
  /** Registers a listener called once the process has gone away. */
  onExit(listener: (exitCode: number | null) => void): Disposable;
  stop(): Promise<void>;
}
