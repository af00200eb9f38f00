/**
 * Small grammars that decide how a fragment is framed for compilation.
 */

/** Fragments starting with one of these are never framed as expressions */
export const STATEMENT_KEYWORDS: ReadonlySet<string> = new Set([
  'for', 'while', 'if', 'switch', 'do', 'using', 'let', 'const', 'var', 'class',
  'try', 'throw', 'return', 'interface', 'type', 'enum', 'import', 'export',
  'declare', 'namespace', 'break', 'continue'
]);

const TYPE_CONTINUATION_WORDS = new Set([
  'is', 'keyof', 'typeof', 'infer', 'asserts', 'readonly', 'unique', 'extends'
]);

export interface FunctionDefinition {
  name: string;
  isAsync: boolean;
  isGenerator: boolean;
  /** Everything after the name: type parameters, parameters, return type and body */
  rest: string;
}

export function firstWord(text: string): string {
  const match = /^\s*([A-Za-z_$][\w$]*)/.exec(text);
  return match ? match[1] : '';
}

/**
 * Whether an expression fragment is first tried as a value-producing
 * expression.
 */
export function isValueCandidate(body: string): boolean {
  const trimmed = body.trimStart();
  return trimmed !== '' && !trimmed.startsWith('{') && !STATEMENT_KEYWORDS.has(firstWord(trimmed));
}

class Cursor {
  position = 0;

  constructor(readonly text: string) {}

  get done(): boolean {
    return this.position >= this.text.length;
  }

  peek(offset = 0): string {
    return this.text[this.position + offset] ?? '';
  }

  skipSpace(): boolean {
    const start = this.position;
    while (!this.done && /\s/.test(this.peek())) {
      this.position++;
    }
    return this.position > start;
  }

  word(): string {
    const match = /^[A-Za-z_$][\w$]*/.exec(this.text.slice(this.position));
    if (!match) {
      return '';
    }
    this.position += match[0].length;
    return match[0];
  }

  /**
   * Consumes a bracketed group starting at the current opener. Angle brackets
   * only count inside a group that opens with one.
   */
  group(): boolean {
    const pairs: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
    if (this.peek() === '<') {
      pairs['<'] = '>';
    }
    const stack: string[] = [];
    let quote = '';

    while (!this.done) {
      const ch = this.peek();
      this.position++;
      if (quote) {
        if (ch === '\\') this.position++;
        else if (ch === quote) quote = '';
        continue;
      }
      if (ch === '"' || ch === "'" || ch === '`') {
        quote = ch;
      } else if (ch === '=' && this.peek() === '>') {
        this.position++;
      } else if (ch in pairs) {
        stack.push(pairs[ch]);
      } else if (ch === stack[stack.length - 1]) {
        stack.pop();
        if (stack.length === 0) return true;
      }
    }
    return false;
  }
}

/**
 * Recognises `[export] [async] function [*] name [<T>] (params) [: Type] {`.
 * Returns undefined for anything else.
 */
export function parseFunctionDefinition(text: string): FunctionDefinition | undefined {
  const cursor = new Cursor(text);
  cursor.skipSpace();

  let keyword = cursor.word();
  if (keyword === 'export') {
    if (!cursor.skipSpace()) return undefined;
    keyword = cursor.word();
  }

  let isAsync = false;
  if (keyword === 'async') {
    if (!cursor.skipSpace()) return undefined;
    isAsync = true;
    keyword = cursor.word();
  }

  if (keyword !== 'function') {
    return undefined;
  }

  cursor.skipSpace();
  let isGenerator = false;
  if (cursor.peek() === '*') {
    isGenerator = true;
    cursor.position++;
    cursor.skipSpace();
  }

  const name = cursor.word();
  if (!name) {
    return undefined;
  }
  const restStart = cursor.position;

  cursor.skipSpace();
  if (cursor.peek() === '<' && !cursor.group()) {
    return undefined;
  }
  cursor.skipSpace();
  if (cursor.peek() !== '(' || !cursor.group()) {
    return undefined;
  }
  cursor.skipSpace();

  if (cursor.peek() === ':') {
    cursor.position++;
    if (!skipReturnType(cursor)) {
      return undefined;
    }
  }

  if (cursor.peek() !== '{') {
    return undefined;
  }

  return { name, isAsync, isGenerator, rest: text.slice(restStart) };
}

/**
 * Moves the cursor to the `{` that opens the body. A `{` met while a type is
 * still expected is an object type literal.
 */
function skipReturnType(cursor: Cursor): boolean {
  let expectingType = true;

  while (!cursor.done) {
    if (cursor.skipSpace()) continue;
    const ch = cursor.peek();

    if (ch === '{') {
      if (!expectingType) return true;
      if (!cursor.group()) return false;
      expectingType = false;
    } else if (ch === '(' || ch === '[' || ch === '<') {
      if (!cursor.group()) return false;
      expectingType = false;
    } else if (ch === '=' && cursor.peek(1) === '>') {
      cursor.position += 2;
      expectingType = true;
    } else if (ch === '|' || ch === '&' || ch === '?' || ch === ':' || ch === ',') {
      cursor.position++;
      expectingType = true;
    } else if (ch === '"' || ch === "'" || ch === '`') {
      const close = cursor.text.indexOf(ch, cursor.position + 1);
      if (close === -1) return false;
      cursor.position = close + 1;
      expectingType = false;
    } else if (ch === '.') {
      cursor.position++;
      expectingType = true;
    } else {
      const word = cursor.word();
      if (!word) {
        // numeric literal types and anything else: consume one character
        cursor.position++;
        expectingType = false;
        continue;
      }
      expectingType = TYPE_CONTINUATION_WORDS.has(word);
    }
  }

  return false;
}

/**
 * Rewrites a function definition as a class method named `_name`.
 */
export function toUnitMethod(definition: FunctionDefinition): string {
  const prefix = `${definition.isAsync ? 'async ' : ''}${definition.isGenerator ? '*' : ''}`;
  return `${prefix}_${definition.name}${definition.rest}`;
}
