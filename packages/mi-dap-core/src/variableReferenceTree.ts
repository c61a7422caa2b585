import { DebugProtocol } from '@vscode/debugprotocol';
import { CommandChannel } from './commandChannel';
import { CommandFailedError, NotFoundError, ProtocolViolationError } from './errors';
import { LoggerInterface, childLogger } from './logging';
import {
  BackendRecord,
  MiTuple,
  errorText,
  isErrorResult,
  listOf,
  resultPayload,
  stringOf,
  tuplesOf,
} from './mi/miRecords';

export const NO_NESTING = 0;
export const LOCALS_BASE = 100000;
export const REGISTERS_BASE = 200000;
export const DYNAMIC_BASE = 300000;

export type HandleKind = 'none' | 'locals' | 'registers' | 'dynamic';

const UNKNOWN_VALUE = '<unknown>';
const HEX_POINTER = /^0x[0-9a-fA-F]+$/;
const NULL_POINTERS: ReadonlySet<string> = new Set(['0x0', 'NULL', 'nullptr']);
/** Frames a scope handle can name before it runs into the next range. */
const MAX_FRAMES = REGISTERS_BASE - LOCALS_BASE;

/**
 * Quotes a variable object name for MI, escaping commas and double quotes.
 */
export function quoteVarName(name: string): string {
  return `"${name.replace(/,/g, '\\,').replace(/"/g, '\\"')}"`;
}

/** Quotes an expression as an MI C string. */
export function quoteExpression(expression: string): string {
  return `"${expression.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function isHexPointer(value: string): boolean {
  return HEX_POINTER.test(value.trim());
}

/** A value worth expanding: an aggregate or a non-null pointer. */
function looksComposite(value: string): boolean {
  return value.includes('{') || value.includes('[') || (isHexPointer(value) && value.trim() !== '0x0');
}

function looksLikePointer(type: string, value: string): boolean {
  return type.replace(/ /g, '').includes('*') || isHexPointer(value) || NULL_POINTERS.has(value.trim());
}

function canExpand(info: MiTuple): boolean {
  return (
    parseInt(stringOf(info['numchild']) ?? '0', 10) > 0 ||
    stringOf(info['has_more']) === '1' ||
    stringOf(info['displayhint']) === 'array'
  );
}

/**
 * Maps DAP `variablesReference` handles onto scopes and GDB variable objects.
 *
 * Handles live in three disjoint ranges: locals scopes `[100000, 200000)`,
 * register scopes `[200000, 300000)` and dynamic variable objects from
 * `300000` up. `0` means the variable has no children.
 */
export class VariableReferenceTree {
  private readonly logger: LoggerInterface;
  /** Dynamic handle to GDB variable object name. */
  private readonly handles = new Map<number, string>();
  /** Display name (an expression typed by the user or a local) to object name. */
  private readonly objectsByDisplayName = new Map<string, string>();
  private nextDynamicHandle = DYNAMIC_BASE;

  constructor(
    private readonly channel: CommandChannel,
    logger: LoggerInterface,
  ) {
    this.logger = childLogger(logger, { className: 'VariableReferenceTree' });
  }

  public kindOf(handle: number): HandleKind {
    if (handle >= DYNAMIC_BASE) return 'dynamic';
    if (handle >= REGISTERS_BASE) return 'registers';
    if (handle >= LOCALS_BASE) return 'locals';
    return 'none';
  }

  public localsHandle(frameId: number): number {
    return LOCALS_BASE + this.checkFrameId(frameId);
  }

  public registersHandle(frameId: number): number {
    return REGISTERS_BASE + this.checkFrameId(frameId);
  }

  /** Frame a scope handle refers to, or undefined for other handles. */
  public frameOf(handle: number): number | undefined {
    switch (this.kindOf(handle)) {
      case 'locals':
        return handle - LOCALS_BASE;
      case 'registers':
        return handle - REGISTERS_BASE;
      default:
        return undefined;
    }
  }

  /** Object name a dynamic handle is bound to. */
  public objectNameOf(handle: number): string | undefined {
    return this.handles.get(handle);
  }

  public async resolve(handle: number): Promise<DebugProtocol.Variable[]> {
    switch (this.kindOf(handle)) {
      case 'locals':
        return this.resolveLocals(handle - LOCALS_BASE);
      case 'registers':
        return this.resolveRegisters(handle - REGISTERS_BASE);
      case 'dynamic':
        return this.resolveChildren(handle);
      default:
        throw new NotFoundError(`Unknown variables reference: ${handle}`);
    }
  }

  /**
   * Creates a GDB variable object for an expression, replacing the one made
   * earlier for the same display name.
   */
  public async createForName(displayName: string): Promise<DebugProtocol.Variable> {
    await this.forget(displayName);

    const command = `-var-create - * ${quoteExpression(displayName)}`;
    const records = await this.channel.send(command);
    const payload = this.payloadOrThrow(records, command);

    const objectName = stringOf(payload['name']) ?? '';
    if (objectName) {
      this.objectsByDisplayName.set(displayName, objectName);
    }
    const variablesReference = objectName && canExpand(payload) ? this.mint(objectName) : NO_NESTING;

    return {
      name: displayName,
      value: stringOf(payload['value']) ?? UNKNOWN_VALUE,
      type: stringOf(payload['type']) ?? 'unknown',
      variablesReference,
    };
  }

  public async hasLocals(): Promise<boolean> {
    const records = await this.channel.send('-stack-list-variables --all-values');
    return listOf(resultPayload(records)['variables']).length > 0;
  }

  public async hasRegisters(): Promise<boolean> {
    const records = await this.channel.send('-data-list-register-names');
    return listOf(resultPayload(records)['register-names']).some((name) => name !== '');
  }

  private checkFrameId(frameId: number): number {
    if (!Number.isInteger(frameId) || frameId < 0 || frameId >= MAX_FRAMES) {
      throw new ProtocolViolationError(`Frame id ${frameId} is out of range [0, ${MAX_FRAMES})`);
    }
    return frameId;
  }

  /** Deletes the object created earlier for `displayName`, if any. */
  private async forget(displayName: string): Promise<void> {
    const previous = this.objectsByDisplayName.get(displayName);
    if (previous !== undefined) {
      this.objectsByDisplayName.delete(displayName);
      await this.deleteObject(previous);
    }
  }

  private mint(objectName: string): number {
    const handle = this.nextDynamicHandle++;
    this.handles.set(handle, objectName);
    return handle;
  }

  private async deleteObject(objectName: string): Promise<void> {
    await this.channel.send(`-var-delete ${quoteVarName(objectName)}`);
    const childPrefix = `${objectName}.`;
    for (const [handle, name] of this.handles) {
      if (name === objectName || name.startsWith(childPrefix)) {
        this.handles.delete(handle);
      }
    }
  }

  private payloadOrThrow(records: BackendRecord[], command: string): MiTuple {
    const failure = records.find(isErrorResult);
    if (failure) {
      throw new CommandFailedError(errorText(failure), command);
    }
    return resultPayload(records);
  }

  private async selectFrame(frameId: number): Promise<void> {
    const command = `-stack-select-frame ${frameId}`;
    this.payloadOrThrow(await this.channel.send(command), command);
  }

  private async resolveLocals(frameId: number): Promise<DebugProtocol.Variable[]> {
    await this.selectFrame(frameId);
    const command = '-stack-list-variables --all-values';
    const payload = this.payloadOrThrow(await this.channel.send(command), command);

    const variables: DebugProtocol.Variable[] = [];
    for (const local of tuplesOf(payload['variables'])) {
      const name = stringOf(local['name']);
      if (!name) {
        continue;
      }
      const value = stringOf(local['value']) ?? UNKNOWN_VALUE;
      let variablesReference = NO_NESTING;
      if (looksComposite(value)) {
        try {
          variablesReference = (await this.createForName(name)).variablesReference;
        } catch (error) {
          if (!(error instanceof CommandFailedError)) {
            throw error;
          }
          this.logger.warn({ err: error }, `Could not create a variable object for '${name}'`);
        }
      }
      variables.push({ name, value, variablesReference });
    }
    return variables;
  }

  private async resolveRegisters(frameId: number): Promise<DebugProtocol.Variable[]> {
    await this.selectFrame(frameId);
    const namesCommand = '-data-list-register-names';
    const names = listOf(this.payloadOrThrow(await this.channel.send(namesCommand), namesCommand)['register-names']);
    const valuesCommand = '-data-list-register-values --skip-unavailable x';
    const values = tuplesOf(
      this.payloadOrThrow(await this.channel.send(valuesCommand), valuesCommand)['register-values'],
    );

    const registers: DebugProtocol.Variable[] = [];
    for (const entry of values) {
      const name = stringOf(names[parseInt(stringOf(entry['number']) ?? '-1', 10)]);
      if (!name) {
        continue;
      }
      registers.push({
        name,
        value: stringOf(entry['value']) ?? UNKNOWN_VALUE,
        variablesReference: NO_NESTING,
      });
    }
    return registers;
  }

  private async resolveChildren(handle: number): Promise<DebugProtocol.Variable[]> {
    const objectName = this.handles.get(handle);
    if (objectName === undefined) {
      throw new NotFoundError(`Unknown variables reference: ${handle}`);
    }
    const command = `-var-list-children --all-values ${quoteVarName(objectName)}`;
    const payload = this.payloadOrThrow(await this.channel.send(command), command);

    const variables: DebugProtocol.Variable[] = [];
    for (const child of tuplesOf(payload['children'])) {
      const childName = stringOf(child['name']);
      if (!childName) {
        continue;
      }
      const exp = stringOf(child['exp']) ?? UNKNOWN_VALUE;
      const value = stringOf(child['value']) ?? UNKNOWN_VALUE;
      const type = stringOf(child['type']) ?? '';
      variables.push({
        name: exp,
        value,
        type: type || undefined,
        variablesReference: canExpand(child) ? this.mint(childName) : NO_NESTING,
      });
      if (looksLikePointer(type, value)) {
        const dereferenced = await this.dereference(childName, exp);
        if (dereferenced) {
          variables.push(dereferenced);
        }
      }
    }
    return variables;
  }

  /**
   * Creates an object for `*(<child>)` and keeps it only when it has
   * children of its own. The object made for the same pointer on an earlier
   * expansion is deleted first.
   */
  private async dereference(childName: string, exp: string): Promise<DebugProtocol.Variable | undefined> {
    const pathRecords = await this.channel.send(`-var-info-path-expression ${quoteVarName(childName)}`);
    if (pathRecords.some(isErrorResult)) {
      return undefined;
    }
    const pathExpression = stringOf(resultPayload(pathRecords)['path_expr']);
    if (!pathExpression) {
      return undefined;
    }

    const displayName = `*(${pathExpression})`;
    await this.forget(displayName);
    const records = await this.channel.send(`-var-create - * ${quoteExpression(displayName)}`);
    if (records.some(isErrorResult)) {
      this.logger.debug(`Pointer '${exp}' cannot be dereferenced`);
      return undefined;
    }
    const target = resultPayload(records);
    const objectName = stringOf(target['name']);
    if (!objectName) {
      return undefined;
    }
    if (!canExpand(target)) {
      await this.channel.send(`-var-delete ${quoteVarName(objectName)}`);
      return undefined;
    }
    this.objectsByDisplayName.set(displayName, objectName);
    return { name: `*(${exp})`, value: '', variablesReference: this.mint(objectName) };
  }
}
