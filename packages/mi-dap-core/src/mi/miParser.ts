import { BackendRecord, MiTuple, MiValue, RecordKind } from './miRecords';

const PROMPT = /^\(gdb\)\s*$/;

const PREFIX_KINDS: Record<string, RecordKind> = {
  '^': 'result',
  '*': 'notify',
  '+': 'notify',
  '=': 'notify',
  '~': 'console',
  '@': 'target',
  '&': 'log',
};

const SIMPLE_ESCAPES: Record<string, number> = {
  n: 0x0a,
  t: 0x09,
  r: 0x0d,
  e: 0x1b,
  a: 0x07,
  b: 0x08,
  f: 0x0c,
  v: 0x0b,
  '"': 0x22,
  '\\': 0x5c,
  "'": 0x27,
};

class MiSyntaxError extends Error {
  constructor(message: string, position: number) {
    super(`${message} at column ${position}`);
    this.name = 'MiSyntaxError';
    Object.setPrototypeOf(this, MiSyntaxError.prototype);
  }
}

/**
 * Cursor over a single MI output line.
 */
class LineCursor {
  private pos = 0;

  constructor(private readonly text: string) {}

  public get position(): number {
    return this.pos;
  }

  public atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  public peek(): string {
    return this.text.charAt(this.pos);
  }

  public next(): string {
    return this.text.charAt(this.pos++);
  }

  public expect(char: string): void {
    if (this.next() !== char) {
      throw new MiSyntaxError(`expected '${char}'`, this.pos - 1);
    }
  }

  public readWhile(predicate: (char: string) => boolean): string {
    const start = this.pos;
    while (!this.atEnd() && predicate(this.peek())) {
      this.pos++;
    }
    return this.text.slice(start, this.pos);
  }

  public rest(): string {
    return this.text.slice(this.pos);
  }
}

const isDigit = (char: string): boolean => char >= '0' && char <= '9';
const isVariableChar = (char: string): boolean => char !== '=' && char !== ',' && char !== '{' && char !== '}' && char !== '[' && char !== ']' && char !== '"';

function parseCString(cursor: LineCursor): string {
  cursor.expect('"');
  const bytes: number[] = [];
  for (;;) {
    if (cursor.atEnd()) {
      throw new MiSyntaxError('unterminated string', cursor.position);
    }
    const char = cursor.next();
    if (char === '"') {
      break;
    }
    if (char !== '\\') {
      bytes.push(...Buffer.from(char, 'utf8'));
      continue;
    }
    const escaped = cursor.next();
    if (escaped >= '0' && escaped <= '7') {
      let digits = escaped;
      while (digits.length < 3 && cursor.peek() >= '0' && cursor.peek() <= '7') {
        digits += cursor.next();
      }
      bytes.push(parseInt(digits, 8) & 0xff);
    } else if (escaped in SIMPLE_ESCAPES) {
      bytes.push(SIMPLE_ESCAPES[escaped]);
    } else {
      bytes.push(...Buffer.from(`\\${escaped}`, 'utf8'));
    }
  }
  return Buffer.from(bytes).toString('utf8');
}

function parseValue(cursor: LineCursor): MiValue {
  switch (cursor.peek()) {
    case '"':
      return parseCString(cursor);
    case '{':
      return parseTuple(cursor);
    case '[':
      return parseList(cursor);
    default:
      throw new MiSyntaxError('expected a value', cursor.position);
  }
}

/**
 * Adds `key=value` to `target`. A key that repeats turns into an array of
 * every value seen for it.
 */
function addResult(target: MiTuple, repeated: Set<string>, key: string, value: MiValue): void {
  if (!(key in target)) {
    target[key] = value;
    return;
  }
  const existing = target[key];
  if (repeated.has(key) && Array.isArray(existing)) {
    existing.push(value);
    return;
  }
  repeated.add(key);
  target[key] = [existing, value];
}

function parseResult(cursor: LineCursor): [string, MiValue] {
  const key = cursor.readWhile(isVariableChar);
  if (!key) {
    throw new MiSyntaxError('expected a variable name', cursor.position);
  }
  cursor.expect('=');
  return [key, parseValue(cursor)];
}

function parseResults(cursor: LineCursor, terminator: string | null): MiTuple {
  const tuple: MiTuple = {};
  const repeated = new Set<string>();
  while (!cursor.atEnd() && cursor.peek() !== terminator) {
    const [key, value] = parseResult(cursor);
    addResult(tuple, repeated, key, value);
    if (cursor.peek() === ',') {
      cursor.next();
    }
  }
  return tuple;
}

function parseTuple(cursor: LineCursor): MiTuple {
  cursor.expect('{');
  const tuple = parseResults(cursor, '}');
  cursor.expect('}');
  return tuple;
}

function parseList(cursor: LineCursor): MiValue[] {
  cursor.expect('[');
  const items: MiValue[] = [];
  while (cursor.peek() !== ']') {
    if (cursor.atEnd()) {
      throw new MiSyntaxError('unterminated list', cursor.position);
    }
    const char = cursor.peek();
    if (char === '"' || char === '{' || char === '[') {
      items.push(parseValue(cursor));
    } else {
      // `frame={...},frame={...}`: only the values are kept.
      items.push(parseResult(cursor)[1]);
    }
    if (cursor.peek() === ',') {
      cursor.next();
    }
  }
  cursor.expect(']');
  return items;
}

/**
 * Parses one line of GDB/MI output. Returns null for the `(gdb)` prompt and
 * blank lines; lines that are not valid MI become `other` records carrying
 * the raw text.
 */
export function parseMiLine(rawLine: string): BackendRecord | null {
  const line = rawLine.replace(/\r?\n$/, '').replace(/\r$/, '');
  if (line.trim() === '' || PROMPT.test(line)) {
    return null;
  }

  const cursor = new LineCursor(line);
  const digits = cursor.readWhile(isDigit);
  const token = digits ? parseInt(digits, 10) : null;
  const kind = PREFIX_KINDS[cursor.peek()];
  if (!kind) {
    return { kind: 'other', message: null, payload: line, token: null };
  }
  cursor.next();

  try {
    if (kind === 'console' || kind === 'target' || kind === 'log') {
      const text = parseCString(cursor);
      return { kind, message: null, payload: text, token };
    }
    const message = cursor.readWhile((char) => char !== ',');
    if (!message) {
      throw new MiSyntaxError('missing record class', cursor.position);
    }
    if (cursor.peek() === ',') {
      cursor.next();
    }
    const payload = parseResults(cursor, null);
    return { kind, message, payload, token };
  } catch (error) {
    if (error instanceof MiSyntaxError) {
      return { kind: 'other', message: null, payload: line, token: null };
    }
    throw error;
  }
}
