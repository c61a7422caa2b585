import { BackendConnection } from './backendConnection';
import { BackendProcess } from './backendProcess';
import { BreakpointManager } from './breakpointManager';
import { CommandChannel } from './commandChannel';
import { Event } from './common/events';
import { BackendConfig } from './config/backendConfigLoader';
import { EventTranslator } from './eventTranslator';
import { ExecutionManager } from './executionManager';
import { InferiorOrchestrator } from './inferiorOrchestrator';
import { LoggerInterface, childLogger } from './logging';
import { CommandResult } from './mi/miRecords';
import { StackTraceManager } from './stackTraceManager';
import { ThreadManager } from './threadManager';
import { VariableReferenceTree } from './variableReferenceTree';

export interface SessionOptions {
  /** Replaces `fs.existsSync` for program path checks. */
  pathExists?: (path: string) => boolean;
}

/**
 * Everything that belongs to one GDB process: the command channel, the
 * event gate and the managers built on top of them.
 */
export class Session {
  public readonly channel: CommandChannel;
  public readonly events: EventTranslator;
  public readonly variables: VariableReferenceTree;
  public readonly inferiors: InferiorOrchestrator;
  public readonly breakpoints: BreakpointManager;
  public readonly execution: ExecutionManager;
  public readonly threads: ThreadManager;
  public readonly stackTrace: StackTraceManager;
  private readonly logger: LoggerInterface;

  constructor(
    private readonly backend: BackendConnection,
    public readonly config: BackendConfig,
    logger: LoggerInterface,
    options: SessionOptions = {},
  ) {
    this.logger = childLogger(logger, { className: 'Session' });
    this.events = new EventTranslator(logger);
    this.channel = new CommandChannel(backend, this.events, logger, {
      defaultTimeoutMs: config.commandTimeoutMs,
    });
    this.variables = new VariableReferenceTree(this.channel, logger);
    this.inferiors = new InferiorOrchestrator(this.channel, this.events, logger, {
      sharedSettings: config.sharedSettings,
      pathExists: options.pathExists,
    });
    this.breakpoints = new BreakpointManager(this.channel, logger);
    this.execution = new ExecutionManager(this.channel, logger, options.pathExists);
    this.threads = new ThreadManager(this.channel);
    this.stackTrace = new StackTraceManager(this.channel);
  }

  /**
   * Starts GDB and prepares it. Rejects with a `BackendStartError` when the
   * executable cannot be started.
   */
  public static async start(
    config: BackendConfig,
    logger: LoggerInterface,
    options: SessionOptions = {},
  ): Promise<Session> {
    const backend = await BackendProcess.spawn(config, logger);
    const session = new Session(backend, config, logger, options);
    await session.initialize();
    return session;
  }

  /** Sends the init commands followed by the shared settings. */
  public async initialize(): Promise<void> {
    for (const command of [...this.config.initCommands, ...this.config.sharedSettings]) {
      const result = await this.channel.sendChecked(command);
      if (!result.success) {
        this.logger.warn(`Setup command '${command}' failed: ${result.message}`);
      }
    }
  }

  public get onBackendExit(): Event<number | null> {
    return (listener) => this.backend.onExit(listener);
  }

  public isRunning(): boolean {
    return this.backend.isRunning();
  }

  public selectFrame(frameId: number): Promise<CommandResult> {
    return this.channel.sendChecked(`-stack-select-frame ${frameId}`);
  }

  public async stop(): Promise<void> {
    this.events.disable();
    this.channel.dispose();
    await this.backend.stop();
  }
}
