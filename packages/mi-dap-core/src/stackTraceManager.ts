import { DebugProtocol } from '@vscode/debugprotocol';
import { CommandChannel } from './commandChannel';
import { CommandResult, MiTuple, checkRecords, resultPayload, stringOf, tuplesOf } from './mi/miRecords';

export interface StackTraceResult extends CommandResult {
  stackFrames: DebugProtocol.StackFrame[];
}

function safeInt(value: string | undefined): number {
  const parsed = parseInt(value ?? '0', 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

function toStackFrame(frame: MiTuple): DebugProtocol.StackFrame {
  const fullname = stringOf(frame['fullname']);
  const file = stringOf(frame['file']);
  const stackFrame: DebugProtocol.StackFrame = {
    id: safeInt(stringOf(frame['level'])),
    name: stringOf(frame['func']) ?? stringOf(frame['addr']) ?? '<unknown>',
    line: safeInt(stringOf(frame['line'])),
    column: 0,
    instructionPointerReference: stringOf(frame['addr']),
  };
  if (file !== undefined || fullname !== undefined) {
    stackFrame.source = { name: file ?? '<unknown>', path: fullname ?? '' };
  } else {
    stackFrame.presentationHint = 'subtle';
  }
  return stackFrame;
}

export class StackTraceManager {
  constructor(private readonly channel: CommandChannel) {}

  /** Frames of `threadId`, innermost first; a frame's id is its level. */
  public async getStackTrace(threadId: number): Promise<StackTraceResult> {
    await this.channel.send(`-thread-select ${threadId}`);
    const records = await this.channel.send('-stack-list-frames');
    const result = checkRecords(records);
    if (!result.success) {
      return { ...result, stackFrames: [] };
    }
    return {
      success: true,
      message: '',
      stackFrames: tuplesOf(resultPayload(records)['stack']).map(toStackFrame),
    };
  }
}
