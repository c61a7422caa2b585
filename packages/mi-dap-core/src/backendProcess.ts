import * as child_process from 'child_process';
import * as readline from 'readline';
import { BackendConnection } from './backendConnection';
import { Disposable, Emitter } from './common/events';
import { BackendConfig } from './config/backendConfigLoader';
import { BackendStartErrorBuilder, BackendUnavailableError } from './errors';
import { LoggerInterface, childLogger } from './logging';
import { parseMiLine } from './mi/miParser';
import { BackendRecord } from './mi/miRecords';

export const GDB_ARGS: readonly string[] = ['--nx', '--quiet', '--interpreter=mi3'];

const STOP_GRACE_MS = 2000;

/**
 * A GDB child process speaking MI on its stdio pipes. Stdout is read line
 * by line and every parsed record is handed to the `onRecord` listeners.
 */
export class BackendProcess implements BackendConnection {
  private readonly logger: LoggerInterface;
  private readonly recordEmitter = new Emitter<BackendRecord>();
  private readonly exitEmitter = new Emitter<number | null>();
  private running = true;
  private lineReader?: readline.Interface;

  private constructor(
    private readonly child: child_process.ChildProcess,
    logger: LoggerInterface,
  ) {
    this.logger = childLogger(logger, { className: 'BackendProcess', pid: child.pid });
    this.attach();
  }

  /**
   * Spawns GDB and resolves once the process has a pid. Rejects with a
   * `BackendStartError` when the executable cannot be started or exits first.
   */
  public static spawn(config: BackendConfig, logger: LoggerInterface): Promise<BackendProcess> {
    return new Promise((resolve, reject) => {
      const errMsgPrefix = `Failed to start GDB. Command: ${config.gdbPath}`;
      let stderrOutput = '';
      let settled = false;
      let child: child_process.ChildProcess | undefined;

      const onSpawnError = (spawnError: Error): void => {
        if (settled) return;
        settled = true;
        logger.error({ err: spawnError, stderr: stderrOutput }, `${errMsgPrefix}: process emitted 'error'`);
        child?.removeAllListeners();
        reject(
          new BackendStartErrorBuilder(`${errMsgPrefix}: ${spawnError.message}`)
            .stage('spawn')
            .backendConfig(config)
            .underlyingError(spawnError)
            .stderrOutput(stderrOutput)
            .build(),
        );
      };

      const onEarlyExit = (code: number | null, signal: NodeJS.Signals | null): void => {
        if (settled) return;
        settled = true;
        logger.error({ stderr: stderrOutput }, `${errMsgPrefix}: exited early. Code: ${code}, Signal: ${signal}`);
        child?.removeAllListeners();
        reject(
          new BackendStartErrorBuilder(`${errMsgPrefix}: exited early. Code: ${code}, Signal: ${signal}`)
            .stage('early_exit')
            .backendConfig(config)
            .stderrOutput(stderrOutput)
            .exitCode(code)
            .signal(signal)
            .build(),
        );
      };

      const onStderr = (data: Buffer): void => {
        stderrOutput += data.toString();
      };

      try {
        child = child_process.spawn(config.gdbPath, [...GDB_ARGS], {
          stdio: ['pipe', 'pipe', 'pipe'],
          env: process.env,
          detached: false,
        });
      } catch (syncError: unknown) {
        const err = syncError instanceof Error ? syncError : new Error(String(syncError));
        onSpawnError(err);
        return;
      }

      const spawned = child;
      spawned.on('error', onSpawnError);
      spawned.on('exit', onEarlyExit);
      spawned.stderr?.on('data', onStderr);

      spawned.once('spawn', () => {
        if (settled) return;
        if (!spawned.stdin || !spawned.stdout) {
          settled = true;
          spawned.kill();
          reject(
            new BackendStartErrorBuilder(`${errMsgPrefix}: stdio pipes are unavailable`)
              .stage('stream_setup')
              .backendConfig(config)
              .build(),
          );
          return;
        }
        settled = true;
        spawned.removeListener('error', onSpawnError);
        spawned.removeListener('exit', onEarlyExit);
        spawned.stderr?.removeListener('data', onStderr);
        logger.info(`GDB started with PID: ${spawned.pid}`);
        resolve(new BackendProcess(spawned, logger));
      });
    });
  }

  private attach(): void {
    const stdout = this.child.stdout;
    if (stdout) {
      this.lineReader = readline.createInterface({ input: stdout, crlfDelay: Infinity });
      this.lineReader.on('line', (line) => this.handleLine(line));
    }
    this.child.stderr?.on('data', (data: Buffer) => {
      this.logger.debug({ stderr: data.toString() }, 'GDB stderr');
    });
    this.child.stdin?.on('error', (err) => {
      this.logger.warn({ err }, 'GDB stdin error');
    });
    this.child.on('error', (err) => {
      this.logger.error({ err }, 'GDB process error');
    });
    this.child.on('exit', (code, signal) => {
      this.running = false;
      this.logger.info(`GDB exited. Code: ${code}, Signal: ${signal}`);
      this.lineReader?.close();
      this.exitEmitter.fire(code);
    });
  }

  private handleLine(line: string): void {
    const record = parseMiLine(line);
    if (!record) {
      return;
    }
    this.logger.trace({ record }, 'GDB record');
    this.recordEmitter.fire(record);
  }

  public isRunning(): boolean {
    return this.running;
  }

  public writeLine(line: string): void {
    const stdin = this.child.stdin;
    if (!this.running || !stdin || stdin.destroyed) {
      throw new BackendUnavailableError();
    }
    this.logger.debug(`-> ${line}`);
    stdin.write(`${line}\n`);
  }

  public onRecord(listener: (record: BackendRecord) => void): Disposable {
    return this.recordEmitter.event(listener);
  }

  public onExit(listener: (exitCode: number | null) => void): Disposable {
    return this.exitEmitter.event(listener);
  }

  /**
   * Asks GDB to exit and kills it if it is still alive after a grace period.
   */
  public stop(): Promise<void> {
    if (!this.running) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.logger.warn('GDB did not exit in time, killing it');
        this.child.kill('SIGKILL');
      }, STOP_GRACE_MS);
      this.child.once('exit', () => {
        clearTimeout(timer);
        resolve();
      });
      try {
        this.writeLine('-gdb-exit');
      } catch (error) {
        this.logger.warn({ err: error }, 'Could not send -gdb-exit, terminating GDB');
        this.child.kill('SIGTERM');
      }
    });
  }
}
