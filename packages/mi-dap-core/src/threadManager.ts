import { DebugProtocol } from '@vscode/debugprotocol';
import { CommandChannel } from './commandChannel';
import { CommandResult, checkRecords, resultPayload, stringOf, tuplesOf } from './mi/miRecords';

export interface ThreadsResult extends CommandResult {
  threads: DebugProtocol.Thread[];
}

export class ThreadManager {
  constructor(private readonly channel: CommandChannel) {}

  /**
   * Threads of every inferior as reported by `-thread-info`. A thread is
   * named after GDB's `name`, then its `target-id`, then `Thread <id>`.
   */
  public async getThreads(): Promise<ThreadsResult> {
    const records = await this.channel.send('-thread-info');
    const result = checkRecords(records);
    if (!result.success) {
      return { ...result, threads: [] };
    }

    const threads: DebugProtocol.Thread[] = [];
    for (const thread of tuplesOf(resultPayload(records)['threads'])) {
      const id = parseInt(stringOf(thread['id']) ?? '', 10);
      if (Number.isNaN(id)) {
        continue;
      }
      threads.push({
        id,
        name: stringOf(thread['name']) ?? stringOf(thread['target-id']) ?? `Thread ${id}`,
      });
    }
    return { success: true, message: '', threads };
  }
}
