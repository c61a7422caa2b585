export type RecordKind = 'result' | 'notify' | 'console' | 'target' | 'log' | 'other';

/**
 * A value in GDB/MI output. Lists of `key=value` results are stored as
 * arrays of the values; repeated keys inside a tuple collapse into an array.
 */
export type MiValue = string | MiTuple | MiValue[];

export interface MiTuple {
  [key: string]: MiValue;
}

export interface BackendRecord {
  kind: RecordKind;
  /** `done`, `error`, `stopped`, `thread-group-added`, ... ; null for streams. */
  message: string | null;
  /** A tuple for result/notify records, decoded text for stream records. */
  payload: MiTuple | string | null;
  token: number | null;
}

export interface CommandResult {
  success: boolean;
  message: string;
}

export const GDB_ERROR_PREFIX = 'Error from GDB: ';

export function isTuple(value: MiValue | null | undefined): value is MiTuple {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringOf(value: MiValue | null | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function tupleOf(value: MiValue | null | undefined): MiTuple | undefined {
  return isTuple(value) ? value : undefined;
}

/** A list value; a lone tuple or string is treated as a one-element list. */
export function listOf(value: MiValue | null | undefined): MiValue[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

export function tuplesOf(value: MiValue | null | undefined): MiTuple[] {
  return listOf(value).filter(isTuple);
}

export function payloadTuple(record: BackendRecord): MiTuple | undefined {
  return typeof record.payload === 'object' && record.payload !== null
    ? record.payload
    : undefined;
}

export function field(record: BackendRecord, key: string): MiValue | undefined {
  return payloadTuple(record)?.[key];
}

/** The terminating result record of a command's output, if any. */
export function findResult(records: BackendRecord[]): BackendRecord | undefined {
  return records.find((record) => record.kind === 'result');
}

/** The payload of the first `^done` (or other non-error) result record. */
export function resultPayload(records: BackendRecord[]): MiTuple {
  const result = findResult(records);
  if (!result || result.message === 'error') {
    return {};
  }
  return payloadTuple(result) ?? {};
}

export function isErrorResult(record: BackendRecord): boolean {
  return record.kind === 'result' && record.message === 'error';
}

export function errorText(record: BackendRecord): string {
  return stringOf(field(record, 'msg')) ?? 'unknown error';
}

/**
 * Inspects a command's records for a `^error` result.
 */
export function checkRecords(
  records: BackendRecord[],
  ignoreFailures: boolean = false,
): CommandResult {
  if (!ignoreFailures) {
    const failure = records.find(isErrorResult);
    if (failure) {
      return { success: false, message: `${GDB_ERROR_PREFIX}${errorText(failure)}` };
    }
  }
  return { success: true, message: '' };
}

/** Concatenated console-stream text of a command's output. */
export function consoleText(records: BackendRecord[]): string {
  let text = '';
  for (const record of records) {
    if (record.kind === 'console' && typeof record.payload === 'string') {
      text += record.payload;
    }
  }
  return text;
}
