import { MalformedMacroCallError, MacroExpansionLimitError } from '@core/errors';
import { macroLogger as logger } from '@core/utils/logger';
import { MacroTable, type MacroEntry } from './MacroTable';

export type PreprocessResult =
  | { kind: 'defined'; entry: MacroEntry }
  | { kind: 'code'; text: string };

const IDENTIFIER = /[A-Za-z_]\w*/g;
const WORD_CHAR = /\w/;
const DEFINE_HEAD = /^\s*#def\s+([A-Za-z_]\w*)/;

const OPENERS = new Set(['(', '{', '[']);
const CLOSERS = new Set([')', '}', ']']);

export const MAX_EXPANSIONS_PER_LINE = 1000;

interface IdentifierMatch {
  name: string;
  index: number;
  end: number;
}

/**
 * Finds the next identifier at or after `from` that does not start in the
 * middle of a word.
 */
function nextIdentifier(text: string, from: number): IdentifierMatch | undefined {
  IDENTIFIER.lastIndex = from;
  let match: RegExpExecArray | null;
  while ((match = IDENTIFIER.exec(text)) !== null) {
    const index = match.index;
    if (index > 0 && WORD_CHAR.test(text[index - 1])) {
      continue;
    }
    return { name: match[0], index, end: index + match[0].length };
  }
  return undefined;
}

/**
 * Handles `#def` lines and expands macros in everything else.
 */
export class MacroPreprocessor {
  constructor(private readonly table: MacroTable = new MacroTable()) {}

  get macros(): MacroTable {
    return this.table;
  }

  processLine(text: string): PreprocessResult {
    const definition = parseDefinition(text);
    if (definition) {
      const entry = this.table.define(definition.name, definition.template, definition.params);
      logger.debug('Macro defined', { name: entry.name, params: entry.params });
      return { kind: 'defined', entry };
    }
    return { kind: 'code', text: this.expand(text) };
  }

  expand(line: string): string {
    let text = line;
    let position = 0;
    let expansions = 0;
    let ident: IdentifierMatch | undefined;

    while ((ident = nextIdentifier(text, position)) !== undefined) {
      const entry = this.table.lookup(ident.name);
      if (!entry) {
        position = ident.end;
        continue;
      }

      let replaced: string;
      let end: number;

      if (entry.params === null) {
        replaced = entry.template;
        end = ident.end;
      } else {
        const open = skipSpaces(text, ident.end);
        if (text[open] !== '(') {
          // Without an argument list the name is left alone
          position = ident.end;
          continue;
        }
        const call = splitArguments(text, open);
        if (!call) {
          throw new MalformedMacroCallError(entry.name, line);
        }
        replaced = this.replaceParams(entry, call.actuals);
        end = call.end;
      }

      if (++expansions > MAX_EXPANSIONS_PER_LINE) {
        throw new MacroExpansionLimitError(entry.name, MAX_EXPANSIONS_PER_LINE);
      }

      text = text.slice(0, ident.index) + replaced + text.slice(end);
      // Rescan the inserted text so macros may produce macros
      position = ident.index;
    }

    return text;
  }

  /**
   * Substitutes actual arguments into a parameterized template.
   *
   * `#p` inserts the actual wrapped in double quotes, `##p` inserts it as is,
   * and every `#` is removed from the result.
   */
  replaceParams(entry: MacroEntry, actuals: readonly string[]): string {
    const params = entry.params ?? [];
    let text = entry.template;
    let position = 0;
    let ident: IdentifierMatch | undefined;

    while ((ident = nextIdentifier(text, position)) !== undefined) {
      const slot = params.indexOf(ident.name);
      if (slot === -1) {
        position = ident.end;
        continue;
      }

      let actual = actuals[slot] ?? '';
      const stringize = ident.index > 0 && text[ident.index - 1] === '#';
      const paste = ident.index > 1 && text[ident.index - 2] === '#';
      if (stringize && !paste) {
        actual = `"${actual}"`;
      }

      text = text.slice(0, ident.index) + actual + text.slice(ident.end);
      position = ident.index + actual.length;
    }

    return text.replace(/#/g, '');
  }
}

function skipSpaces(text: string, from: number): number {
  let i = from;
  while (i < text.length && (text[i] === ' ' || text[i] === '\t')) {
    i++;
  }
  return i;
}

/**
 * Splits `( ... )` starting at `open` on top-level commas. Parentheses, braces
 * and brackets share one depth counter. Returns undefined when the group never
 * closes.
 */
export function splitArguments(
  text: string,
  open: number
): { actuals: string[]; end: number } | undefined {
  const actuals: string[] = [];
  let depth = 1;
  let start = open + 1;
  let i = open + 1;

  while (depth > 0 && i < text.length) {
    const ch = text[i];
    if (depth === 1 && (ch === ',' || ch === ')')) {
      actuals.push(text.slice(start, i));
      start = i + 1;
    }
    if (OPENERS.has(ch)) {
      depth++;
    } else if (CLOSERS.has(ch)) {
      depth--;
    }
    i++;
  }

  if (depth !== 0) {
    return undefined;
  }
  return { actuals, end: i };
}

interface Definition {
  name: string;
  template: string;
  params: string[] | null;
}

/**
 * `#def NAME template` or `#def NAME(a, b) template`. Anything else is not a
 * definition and is expanded like ordinary code.
 */
export function parseDefinition(text: string): Definition | undefined {
  const head = DEFINE_HEAD.exec(text);
  if (!head) {
    return undefined;
  }

  const name = head[1];
  let rest = text.slice(head[0].length);
  let params: string[] | null = null;

  if (rest.startsWith('(')) {
    const close = rest.indexOf(')');
    if (close === -1) {
      return undefined;
    }
    const inside = rest.slice(1, close);
    params = inside.trim() === '' ? [] : inside.split(',').map(param => param.trim());
    rest = rest.slice(close + 1);
  }

  if (!/^\s/.test(rest)) {
    return undefined;
  }
  const template = rest.trim();
  if (template === '') {
    return undefined;
  }

  return { name, template, params };
}
