import * as fs from 'fs';
import { CommandChannel } from './commandChannel';
import { LoggerInterface, childLogger } from './logging';
import { CommandResult } from './mi/miRecords';

const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quotes one argument for GDB's `-exec-arguments`, which hands the string
 * to a shell when the program starts.
 */
export function quoteShellArgument(arg: string): string {
  if (arg === '') {
    return "''";
  }
  if (SHELL_SAFE.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Run control: continue, interrupt, stepping and program start.
 */
export class ExecutionManager {
  private readonly logger: LoggerInterface;

  constructor(
    private readonly channel: CommandChannel,
    logger: LoggerInterface,
    private readonly pathExists: (path: string) => boolean = fs.existsSync,
  ) {
    this.logger = childLogger(logger, { className: 'ExecutionManager' });
  }

  public continue(threadId?: number): Promise<CommandResult> {
    return this.channel.sendChecked(threadId ? `-exec-continue --thread ${threadId}` : '-exec-continue');
  }

  public async pause(threadId?: number): Promise<CommandResult> {
    if (threadId) {
      await this.channel.send(`-thread-select ${threadId}`);
    }
    return this.channel.sendChecked('-exec-interrupt');
  }

  public async next(threadId?: number): Promise<CommandResult> {
    return (await this.selectThread(threadId)) ?? this.channel.sendChecked('-exec-next');
  }

  public async stepIn(threadId?: number): Promise<CommandResult> {
    return (await this.selectThread(threadId)) ?? this.channel.sendChecked('-exec-step');
  }

  /**
   * Runs until the selected frame returns. With `singleThread` the other
   * threads stay stopped while it does.
   */
  public async stepOut(threadId?: number, singleThread: boolean = false): Promise<CommandResult> {
    const failed = await this.selectThread(threadId);
    if (failed) {
      return failed;
    }
    await this.channel.send(`set scheduler-locking ${singleThread ? 'on' : 'off'}`);
    return this.channel.sendChecked('finish &');
  }

  public async loadExecutableAndSymbols(programPath: string): Promise<CommandResult> {
    if (!this.pathExists(programPath)) {
      return { success: false, message: `The path ${programPath} does not exist` };
    }
    return this.channel.sendChecked(`-file-exec-and-symbols ${programPath}`);
  }

  public async setProgramArguments(args: string[]): Promise<CommandResult> {
    const argString = args.map(quoteShellArgument).join(' ');
    this.logger.debug(`Program arguments: ${argString}`);
    return this.channel.sendChecked(argString ? `-exec-arguments ${argString}` : '-exec-arguments');
  }

  public run(): Promise<CommandResult> {
    return this.channel.sendChecked('-exec-run');
  }

  /** Returns a failed result when the thread cannot be selected. */
  private async selectThread(threadId?: number): Promise<CommandResult | undefined> {
    if (!threadId) {
      return undefined;
    }
    const result = await this.channel.sendChecked(`-thread-select ${threadId}`);
    return result.success ? undefined : { success: false, message: `Failed to select thread ${threadId}: ${result.message}` };
  }
}
