import { DebugProtocol } from '@vscode/debugprotocol';
import { CommandChannel } from './commandChannel';
import { LoggerInterface, childLogger } from './logging';
import {
  CommandResult,
  checkRecords,
  resultPayload,
  stringOf,
  tupleOf,
  tuplesOf,
} from './mi/miRecords';

export interface Breakpoint {
  sourcePath: string;
  line: number;
  /** GDB breakpoint number, absent when the insert failed. */
  backendNumber?: string;
  verified: boolean;
  message: string;
}

/** A breakpoint requested by the client. Entries without a line are ignored. */
export interface BreakpointSpec {
  line?: number;
  condition?: string;
}

export interface SetBreakpointsResult extends CommandResult {
  breakpoints: DebugProtocol.Breakpoint[];
}

export interface BreakpointLocationsResult extends CommandResult {
  breakpoints: DebugProtocol.BreakpointLocation[];
}

function quoteCondition(condition: string): string {
  return `"${condition.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Breakpoints per source file. Setting breakpoints for a file always clears
 * every breakpoint GDB has for it first and then inserts the requested list.
 */
export class BreakpointManager {
  private readonly logger: LoggerInterface;
  private readonly bySource = new Map<string, Breakpoint[]>();

  constructor(
    private readonly channel: CommandChannel,
    logger: LoggerInterface,
  ) {
    this.logger = childLogger(logger, { className: 'BreakpointManager' });
  }

  public async setBreakpoints(sourcePath: string, specs: BreakpointSpec[]): Promise<SetBreakpointsResult> {
    await this.clear(sourcePath);

    const inserted: Breakpoint[] = [];
    for (const spec of specs) {
      if (spec.line === undefined) {
        continue;
      }
      const conditionArg = spec.condition ? `-c ${quoteCondition(spec.condition)} ` : '';
      const records = await this.channel.send(`-break-insert ${conditionArg}${sourcePath}:${spec.line}`);
      const result = checkRecords(records);
      const bkpt = tupleOf(resultPayload(records)['bkpt']);
      inserted.push({
        sourcePath,
        line: spec.line,
        backendNumber: bkpt ? stringOf(bkpt['number']) : undefined,
        verified: result.success,
        message: result.success ? '' : result.message,
      });
    }
    this.bySource.set(sourcePath, inserted);

    return {
      success: true,
      message: '',
      breakpoints: inserted.map((breakpoint) => {
        const reported: DebugProtocol.Breakpoint = {
          verified: breakpoint.verified,
          line: breakpoint.line,
          source: { path: sourcePath },
          message: breakpoint.message,
        };
        const id = breakpoint.backendNumber ? parseInt(breakpoint.backendNumber, 10) : NaN;
        if (!Number.isNaN(id)) {
          reported.id = id;
        }
        return reported;
      }),
    };
  }

  /**
   * Deletes every GDB breakpoint that belongs to `sourcePath`, matched by
   * full file name, by any location's file name, or by a number this manager
   * inserted for the file. Returns the deleted numbers.
   */
  public async clear(sourcePath: string): Promise<string[]> {
    const tracked = new Set(
      (this.bySource.get(sourcePath) ?? []).flatMap((breakpoint) =>
        breakpoint.backendNumber ? [breakpoint.backendNumber] : [],
      ),
    );
    const table = tupleOf(resultPayload(await this.channel.send('-break-list'))['BreakpointTable']);

    const numbers: string[] = [];
    for (const bkpt of tuplesOf(table?.['body'])) {
      const number = stringOf(bkpt['number']);
      if (!number) {
        continue;
      }
      const matches =
        stringOf(bkpt['fullname']) === sourcePath ||
        tuplesOf(bkpt['locations']).some((location) => stringOf(location['fullname']) === sourcePath) ||
        tracked.has(number);
      if (matches) {
        numbers.push(number);
      }
    }

    for (const number of numbers) {
      const deleted = await this.channel.sendChecked(`-break-delete ${number}`);
      if (!deleted.success) {
        this.logger.warn(`Could not delete breakpoint ${number}: ${deleted.message}`);
      }
    }
    this.bySource.delete(sourcePath);
    return numbers;
  }

  /**
   * Lines of `sourcePath` with code, either exactly `line` or within
   * `[line, endLine]`.
   */
  public async getBreakpointLocations(
    sourcePath: string,
    line: number,
    endLine?: number,
  ): Promise<BreakpointLocationsResult> {
    const records = await this.channel.send(`-symbol-list-lines ${sourcePath}`);
    const result = checkRecords(records);
    if (!result.success) {
      return { ...result, breakpoints: [] };
    }

    const lines = new Set<number>();
    for (const entry of tuplesOf(resultPayload(records)['lines'])) {
      const candidate = parseInt(stringOf(entry['line']) ?? '', 10);
      if (Number.isNaN(candidate)) {
        continue;
      }
      const wanted = endLine === undefined ? candidate === line : candidate >= line && candidate <= endLine;
      if (wanted) {
        lines.add(candidate);
      }
    }
    return {
      success: true,
      message: '',
      breakpoints: [...lines].sort((a, b) => a - b).map((found) => ({ line: found })),
    };
  }

  public listForSource(sourcePath: string): Breakpoint[] {
    return [...(this.bySource.get(sourcePath) ?? [])];
  }

  public setBreakpointOnMain(): Promise<CommandResult> {
    return this.channel.sendChecked('-break-insert main');
  }

  /** Stops the program when it calls exec(). */
  public setExecCatchpoint(): Promise<CommandResult> {
    return this.channel.sendChecked('catch exec');
  }
}
