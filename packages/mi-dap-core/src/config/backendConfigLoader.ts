import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from '../errors';
import { LoggerInterface, childLogger } from '../logging';

/**
 * How the GDB backend is started and prepared.
 */
export interface BackendConfig {
  /** GDB executable, resolved through PATH when not absolute. */
  gdbPath: string;
  /** Default deadline for a single MI command. */
  commandTimeoutMs: number;
  /** Sent once after GDB starts, before anything else. */
  initCommands: string[];
  /** Fork, exec and scheduler settings shared by every inferior. */
  sharedSettings: string[];
}

type BackendConfigKey = keyof BackendConfig;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Loads backend configuration from JSON files.
 */
export class BackendConfigLoader {
  private readonly logger: LoggerInterface;

  constructor(logger: LoggerInterface) {
    this.logger = childLogger(logger, { className: 'BackendConfigLoader' });
  }

  /**
   * Reads a configuration file. Keys missing from the file are taken from
   * `defaults`; without defaults every key is required.
   */
  public loadFromFile(configPath: string, defaults?: BackendConfig): BackendConfig {
    try {
      const resolvedPath = path.isAbsolute(configPath)
        ? configPath
        : path.resolve(process.cwd(), configPath);

      if (!fs.existsSync(resolvedPath)) {
        throw new Error(`Backend configuration file not found: ${resolvedPath}`);
      }

      this.logger.info(`Loading backend configuration from ${resolvedPath}`);
      const parsed: unknown = JSON.parse(fs.readFileSync(resolvedPath, 'utf8'));
      return this.fromObject(parsed, defaults);
    } catch (error) {
      this.logger.error({ err: error }, 'Error loading backend configuration');
      throw new Error(`Failed to load backend configuration: ${errorMessage(error)}`);
    }
  }

  /**
   * Validates an already-parsed configuration object.
   */
  public fromObject(raw: unknown, defaults?: BackendConfig): BackendConfig {
    if (!isRecord(raw)) {
      throw new Error('Invalid backend configuration: expected a JSON object');
    }

    const gdbPath = this.pick(raw, 'gdbPath', defaults, (v): v is string => typeof v === 'string' && v.length > 0);
    const commandTimeoutMs = this.pick(
      raw,
      'commandTimeoutMs',
      defaults,
      (v): v is number => typeof v === 'number' && Number.isFinite(v) && v > 0,
    );
    const initCommands = this.pick(raw, 'initCommands', defaults, isStringArray);
    const sharedSettings = this.pick(raw, 'sharedSettings', defaults, isStringArray);

    return { gdbPath, commandTimeoutMs, initCommands, sharedSettings };
  }

  private pick<K extends BackendConfigKey>(
    raw: Record<string, unknown>,
    key: K,
    defaults: BackendConfig | undefined,
    guard: (value: unknown) => value is BackendConfig[K],
  ): BackendConfig[K] {
    const value = raw[key];
    if (value === undefined) {
      if (defaults) {
        return defaults[key];
      }
      throw new Error(`Invalid backend configuration: missing "${key}"`);
    }
    if (!guard(value)) {
      throw new Error(`Invalid backend configuration: "${key}" has the wrong type`);
    }
    return value;
  }
}
