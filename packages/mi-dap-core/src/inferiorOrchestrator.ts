import * as fs from 'fs';
import { CommandChannel } from './commandChannel';
import { EventTranslator } from './eventTranslator';
import { LoggerInterface, childLogger } from './logging';
import {
  BackendRecord,
  CommandResult,
  MiTuple,
  checkRecords,
  isErrorResult,
  resultPayload,
  stringOf,
  tupleOf,
  tuplesOf,
} from './mi/miRecords';

export interface Inferior {
  /** GDB thread group id, e.g. `i2`. */
  backendHandle: string;
  /** Inferior number used by CLI commands such as `inferior 2`. */
  number: string;
  osPid: number;
  isCurrent: boolean;
}

export interface OsProcess {
  pid: number;
  name: string;
}

export interface AddInferiorsResult {
  attached: number[];
  failed: number[];
}

export interface InferiorOrchestratorOptions {
  /** Settings re-sent after connecting to a gdbserver. */
  sharedSettings?: string[];
  pathExists?: (path: string) => boolean;
}

interface TrackedGroup {
  id: string;
  number: string;
  pid: number;
}

const ADDED_INFERIOR = /Added inferior (\d+)/;

/**
 * Reads the new inferior's number from the console output of `add-inferior`.
 * This is the only place console text is interpreted.
 */
export function parseAddedInferiorNumber(records: BackendRecord[]): number | null {
  for (const record of records) {
    if (record.kind !== 'console' || typeof record.payload !== 'string') {
      continue;
    }
    const match = ADDED_INFERIOR.exec(record.payload);
    if (match) {
      return parseInt(match[1], 10);
    }
  }
  return null;
}

/**
 * Extracts the process id from a thread's `target-id`, e.g.
 * `Thread 1234.1235`, `Thread 0x7f... (LWP 1234)` or `process 1234`.
 */
export function pidFromTargetId(targetId: string): number | null {
  const match =
    /Thread (\d+)\.(\d+)/.exec(targetId) ?? /\(LWP (\d+)\)/.exec(targetId) ?? /process (\d+)/.exec(targetId);
  return match ? parseInt(match[1], 10) : null;
}

function inferiorNumber(groupId: string): string {
  return groupId.replace(/^i/, '');
}

function trackedGroup(group: MiTuple): TrackedGroup | undefined {
  const id = stringOf(group['id']);
  const pidText = stringOf(group['pid']);
  const type = stringOf(group['type']);
  if (!id || !pidText || !/^\d+$/.test(pidText) || (type !== undefined && type !== 'process')) {
    return undefined;
  }
  return { id, number: inferiorNumber(id), pid: parseInt(pidText, 10) };
}

/**
 * Attaches, detaches and switches between the processes GDB debugs.
 *
 * GDB is the source of truth: thread groups are listed again for every
 * operation instead of being cached, and only groups with a live process id
 * count as tracked inferiors.
 */
export class InferiorOrchestrator {
  private readonly logger: LoggerInterface;
  private readonly sharedSettings: string[];
  private readonly pathExists: (path: string) => boolean;

  constructor(
    private readonly channel: CommandChannel,
    private readonly eventTranslator: EventTranslator,
    logger: LoggerInterface,
    options: InferiorOrchestratorOptions = {},
  ) {
    this.logger = childLogger(logger, { className: 'InferiorOrchestrator' });
    this.sharedSettings = options.sharedSettings ?? [];
    this.pathExists = options.pathExists ?? fs.existsSync;
  }

  /**
   * Attaches to `pid` unless GDB already tracks it, makes it current, detaches
   * every other inferior and loads symbols from `programPath`.
   *
   * Steps are not rolled back when a later one fails.
   */
  public async attach(pid: number, programPath?: string): Promise<CommandResult> {
    const failure = (message: string): CommandResult => ({
      success: false,
      message: `Failed to attach to PID ${pid}: ${message}`,
    });

    if (!(await this.trackedGroups()).some((group) => group.pid === pid)) {
      const attached = await this.channel.sendChecked(`attach ${pid}`);
      if (!attached.success) {
        return failure(attached.message);
      }
    }

    const groups = await this.trackedGroups();
    const target = groups.find((group) => group.pid === pid);
    if (!target) {
      return failure(`No inferior found for PID ${pid}`);
    }

    const switched = await this.channel.sendChecked(`inferior ${target.number}`);
    if (!switched.success) {
      return failure(`Failed to switch to inferior ${target.number}`);
    }

    for (const other of groups) {
      if (other.id === target.id) {
        continue;
      }
      const detached = await this.channel.sendChecked(`detach inferior ${other.number}`);
      if (!detached.success) {
        return failure(`Failed to detach inferior ${other.id}: ${detached.message}`);
      }
    }

    return this.loadProgramSymbols(programPath);
  }

  /**
   * Creates one inferior per pid and attaches it. Events stay suspended for
   * the whole operation and the originally current inferior is selected again
   * at the end.
   */
  public addInferiorsWithPids(pids: number[]): Promise<AddInferiorsResult> {
    return this.eventTranslator.runSuspended(async () => {
      const result: AddInferiorsResult = { attached: [], failed: [] };
      if (pids.length === 0) {
        return result;
      }

      const original = await this.currentGroup(await this.trackedGroups());
      if (!original) {
        this.logger.warn('Failed to determine the current inferior');
        result.failed.push(...pids);
        return result;
      }

      try {
        for (const pid of pids) {
          const number = parseAddedInferiorNumber(await this.channel.send('add-inferior'));
          if (number === null) {
            this.logger.warn(`Failed to create an inferior for PID ${pid}`);
            result.failed.push(pid);
            continue;
          }
          const switched = await this.channel.sendChecked(`inferior ${number}`);
          const attached = switched.success && (await this.channel.sendChecked(`attach ${pid}`)).success;
          (attached ? result.attached : result.failed).push(pid);
        }
      } finally {
        await this.channel.send(`inferior ${original.number}`);
      }
      return result;
    });
  }

  /**
   * Detaches and removes the inferiors of `pids`. When the current inferior
   * is among them another one is selected first, or GDB detaches when none
   * would remain.
   */
  public async detachInferiors(pids: number[]): Promise<CommandResult> {
    if (pids.length === 0) {
      return { success: true, message: '' };
    }

    const groups = await this.trackedGroups();
    const current = await this.currentGroup(groups);
    const removed = groups.filter((group) => pids.includes(group.pid));
    if (removed.length === 0) {
      return { success: false, message: `No inferior found for PID(s) ${pids.join(', ')}` };
    }

    if (current && removed.some((group) => group.id === current.id)) {
      const remaining = groups.find((group) => !pids.includes(group.pid));
      if (remaining) {
        await this.channel.send(`inferior ${remaining.number}`);
      } else {
        await this.channel.send('detach');
      }
    }

    for (const group of removed) {
      const detached = await this.channel.sendChecked(`detach inferior ${group.number}`);
      if (!detached.success) {
        this.logger.debug(`detach inferior ${group.number}: ${detached.message}`);
      }
      const removedResult = await this.channel.sendChecked(`remove-inferior ${group.number}`);
      if (!removedResult.success) {
        this.logger.warn(`remove-inferior ${group.number}: ${removedResult.message}`);
      }
    }
    return { success: true, message: '' };
  }

  /** Makes the inferior of `pid` current without detaching anything. */
  public async selectInferior(pid: number): Promise<boolean> {
    const target = (await this.trackedGroups()).find((group) => group.pid === pid);
    if (!target) {
      this.logger.info(`No inferior found for PID ${pid}`);
      return false;
    }
    return (await this.channel.sendChecked(`inferior ${target.number}`)).success;
  }

  /**
   * Pid of the current thread's process, or of the first tracked inferior
   * when the current thread does not name one.
   */
  public async currentPid(): Promise<number | null> {
    const pid = await this.currentThreadPid();
    if (pid !== null) {
      return pid;
    }
    const [first] = await this.trackedGroups();
    return first ? first.pid : null;
  }

  public async listInferiors(): Promise<Inferior[]> {
    const groups = await this.trackedGroups();
    const current = await this.currentGroup(groups);
    return groups.map((group) => ({
      backendHandle: group.id,
      number: group.number,
      osPid: group.pid,
      isCurrent: current !== undefined && group.id === current.id,
    }));
  }

  public async listProcesses(): Promise<{ result: CommandResult; processes: OsProcess[] }> {
    const records = await this.channel.send('-info-os processes');
    const table = tupleOf(resultPayload(records)['OSDataTable']);
    const processes: OsProcess[] = [];
    for (const row of tuplesOf(table?.['body'])) {
      const pid = stringOf(row['col0']);
      const name = stringOf(row['col1']);
      if (pid !== undefined && name !== undefined && /^\d+$/.test(pid)) {
        processes.push({ pid: parseInt(pid, 10), name });
      }
    }
    return { result: checkRecords(records), processes };
  }

  public async getPidByName(processName: string): Promise<number | null> {
    const { result, processes } = await this.listProcesses();
    if (!result.success) {
      return null;
    }
    return processes.find((process) => process.name === processName)?.pid ?? null;
  }

  /**
   * Connects to a gdbserver with `target extended-remote`, re-applies the
   * shared settings on success and detaches from the server's initial process.
   */
  public async connectToGdbServer(address: string): Promise<CommandResult> {
    const result = await this.channel.sendChecked(`target extended-remote ${address}`);
    if (result.success) {
      for (const setting of this.sharedSettings) {
        await this.channel.send(setting);
      }
    }
    await this.channel.send('detach');
    return result;
  }

  public async loadProgramSymbols(programPath?: string): Promise<CommandResult> {
    if (!programPath) {
      return { success: true, message: '' };
    }
    if (!this.pathExists(programPath)) {
      return { success: false, message: `The path ${programPath} does not exist` };
    }
    return this.channel.sendChecked(`file ${programPath}`);
  }

  private async trackedGroups(): Promise<TrackedGroup[]> {
    const records = await this.channel.send('-list-thread-groups');
    if (records.some(isErrorResult)) {
      return [];
    }
    const groups: TrackedGroup[] = [];
    for (const group of tuplesOf(resultPayload(records)['groups'])) {
      const tracked = trackedGroup(group);
      if (tracked) {
        groups.push(tracked);
      }
    }
    return groups;
  }

  private async currentThreadPid(): Promise<number | null> {
    const payload = resultPayload(await this.channel.send('-thread-info'));
    const currentId = stringOf(payload['current-thread-id']);
    if (!currentId) {
      return null;
    }
    const thread = tuplesOf(payload['threads']).find((candidate) => stringOf(candidate['id']) === currentId);
    return thread ? pidFromTargetId(stringOf(thread['target-id']) ?? '') : null;
  }

  /**
   * The group of the current thread's process. When GDB reports no usable
   * current thread the first tracked group is selected and returned.
   */
  private async currentGroup(groups: TrackedGroup[]): Promise<TrackedGroup | undefined> {
    if (groups.length === 0) {
      return undefined;
    }
    const pid = await this.currentThreadPid();
    const current = pid === null ? undefined : groups.find((group) => group.pid === pid);
    if (current) {
      return current;
    }
    const [first] = groups;
    await this.channel.send(`inferior ${first.number}`);
    return first;
  }
}
