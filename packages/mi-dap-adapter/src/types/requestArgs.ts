import { DebugProtocol } from '@vscode/debugprotocol';
import { ProtocolViolationError } from 'mi-dap-core';

// Arguments of the requests this adapter adds to DAP or extends.

export interface SetupCommand {
  text: string;
  ignoreFailures?: boolean;
}

/** Shared by `launch` and `attach`. */
export interface BackendSetupArgs {
  /** Raw GDB commands run before anything else. */
  setupCommands?: SetupCommand[];
  /** `host:port` of a gdbserver to connect to with `target extended-remote`. */
  gdbServer?: string;
}

export interface LaunchArgs extends BackendSetupArgs {
  /** Required unless `programRunner` is given. */
  program?: string;
  args?: string[];
  /**
   * Shell script that starts the program through `processSpawner`, a running
   * process that forks and execs the programs to debug.
   */
  programRunner?: string;
  processSpawner?: string;
}

export interface LaunchResponseBody {
  /** Pid of the spawner when launched through a program runner. */
  spawnerPid: number | null;
}

/** Sent once the spawner has exec'd the program: hands debugging over to it. */
export interface HandleNewProcessArgs {
  spawnerPid: number;
  program?: string;
}

export interface ContinueAfterProcessExitResponseBody {
  /** False when no inferior is left to debug. */
  continue: boolean;
}

export interface AttachArgs extends BackendSetupArgs {
  pid: number;
  program?: string;
}

export interface ListProcessesResponseBody {
  processes: { pid: number; name: string }[];
  currentProcess: number | null;
}

type ArgType = 'string' | 'number' | 'boolean' | 'object';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Typed access to a request's `arguments`. Every accessor throws a
 * `ProtocolViolationError` naming the parameter when it is missing or has
 * the wrong type.
 */
export class RequestArgs {
  private readonly args: Record<string, unknown>;

  constructor(private readonly request: DebugProtocol.Request) {
    this.args = isRecord(request.arguments) ? request.arguments : {};
  }

  private invalid(key: string, type: string): ProtocolViolationError {
    return new ProtocolViolationError(
      `Missing or invalid parameter '${key}' for ${this.request.command}. Expected type: ${type}.`,
    );
  }

  private check(key: string, type: ArgType): unknown {
    const value = this.args[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    const matches = type === 'object' ? isRecord(value) : typeof value === type;
    if (!matches) {
      throw this.invalid(key, type);
    }
    return value;
  }

  public optionalString(key: string): string | undefined {
    const value = this.check(key, 'string');
    return typeof value === 'string' ? value : undefined;
  }

  public requireString(key: string): string {
    const value = this.optionalString(key);
    if (value === undefined) {
      throw this.invalid(key, 'string');
    }
    return value;
  }

  public optionalNumber(key: string): number | undefined {
    const value = this.check(key, 'number');
    return typeof value === 'number' ? value : undefined;
  }

  public requireNumber(key: string): number {
    const value = this.optionalNumber(key);
    if (value === undefined) {
      throw this.invalid(key, 'number');
    }
    return value;
  }

  public optionalBoolean(key: string): boolean | undefined {
    const value = this.check(key, 'boolean');
    return typeof value === 'boolean' ? value : undefined;
  }

  public optionalObject(key: string): Record<string, unknown> | undefined {
    const value = this.check(key, 'object');
    return isRecord(value) ? value : undefined;
  }

  public requireObject(key: string): Record<string, unknown> {
    const value = this.optionalObject(key);
    if (value === undefined) {
      throw this.invalid(key, 'object');
    }
    return value;
  }

  /** A list of numbers; missing means empty. */
  public numberList(key: string): number[] {
    const value = this.args[key];
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value) || !value.every((item): item is number => typeof item === 'number')) {
      throw this.invalid(key, 'number[]');
    }
    return value;
  }

  /** A list of strings; missing means empty. */
  public stringList(key: string): string[] {
    const value = this.args[key];
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
      throw this.invalid(key, 'string[]');
    }
    return value;
  }

  /** A list of objects; missing means empty. */
  public objectList(key: string): Record<string, unknown>[] {
    const value = this.args[key];
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value) || !value.every(isRecord)) {
      throw this.invalid(key, 'object[]');
    }
    return value;
  }

  /** `arguments.source.path`, required by source-scoped requests. */
  public sourcePath(): string {
    const path = this.requireObject('source')['path'];
    if (typeof path !== 'string' || path === '') {
      throw this.invalid('source.path', 'string');
    }
    return path;
  }

  public setupCommands(): SetupCommand[] {
    return this.objectList('setupCommands').flatMap((entry) => {
      const text = entry['text'];
      if (typeof text !== 'string' || text === '') {
        return [];
      }
      return [{ text, ignoreFailures: entry['ignoreFailures'] === true }];
    });
  }
}
