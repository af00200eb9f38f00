import { rewriteLogger as logger } from '@core/utils/logger';
import type { AddressingMode } from '@core/types/session';
import type { IVariableEnvironment } from '@interpreter/env/VariableEnvironment';
import type { TypeNamer } from '@interpreter/types/TypeNamer';
import { isInsideQuotes, templateTextMask } from './quotes';

export interface RewriteResult {
  text: string;
  /** The leftmost rewritten symbol is the target of an assignment */
  wasAssignment: boolean;
}

export const DECLARATION_KEYWORD = 'var';

const SIGIL_SYMBOL = /\$(?:\w+|\{[^{}\r\n\t\f\v"]+\})/;
const BARE_IDENTIFIER = /[A-Za-z_$][\w$]*/g;
const IDENTIFIER_CHAR = /[\w$]/;

interface SymbolMatch {
  name: string;
  start: number;
  end: number;
}

interface Edit {
  start: number;
  end: number;
  text: string;
}

/**
 * Turns session-variable references into slot lookups on `V`.
 *
 * In sigil mode every `$name` (or `${any name}`) is a session variable. In
 * declared mode a bare identifier is one when the environment knows it or when
 * it directly follows `var`; the `var` of such a declaration is dropped.
 */
export class SymbolRewriter {
  constructor(
    private readonly env: IVariableEnvironment,
    private readonly namer: TypeNamer
  ) {}

  rewrite(text: string, mode: AddressingMode): RewriteResult {
    const templateText = templateTextMask(text);
    const matches = mode === 'sigil' ? sigilMatches(text, templateText) : identifierMatches(text);
    const edits: Edit[] = [];
    let wasAssignment = false;

    // Rightmost first, so the last one processed decides wasAssignment
    for (let i = matches.length - 1; i >= 0; i--) {
      const match = matches[i];
      if (isInsideQuotes(text, match.start, match.end, templateText)) {
        continue;
      }

      if (mode === 'declared') {
        if (match.name === DECLARATION_KEYWORD) {
          continue;
        }
        const keyword = declarationKeywordBefore(text, match.start);
        if (keyword) {
          edits.push({ start: keyword.start, end: match.start, text: '' });
        } else if (!this.env.isKnown(match.name)) {
          continue;
        }
      }

      const assignment = isAssignmentTarget(text, match.end);
      edits.push({ start: match.start, end: match.end, text: this.slotLookup(match.name, assignment) });
      wasAssignment = assignment;
    }

    const rewritten = applyEdits(text, edits);
    if (edits.length > 0) {
      logger.debug('Rewrote session symbols', { mode, before: text, after: rewritten });
    }
    return { text: rewritten, wasAssignment };
  }

  private slotLookup(name: string, assignment: boolean): string {
    const slot = `V[${JSON.stringify(name)}]`;
    if (assignment) {
      return slot;
    }
    const cast = this.namer.castName(this.env.get(name));
    return cast ? `(${slot} as ${cast})` : slot;
  }
}

function sigilMatches(text: string, templateText: boolean[]): SymbolMatch[] {
  const matches: SymbolMatch[] = [];
  const pattern = new RegExp(SIGIL_SYMBOL.source, 'g');
  for (let match = pattern.exec(text); match !== null; match = pattern.exec(text)) {
    const start = match.index;
    const raw = match[0];
    if (raw.startsWith('${') && templateText[start]) {
      // An interpolation opener; what it encloses is code
      pattern.lastIndex = start + 2;
      continue;
    }
    if (start > 0 && IDENTIFIER_CHAR.test(text[start - 1])) {
      continue;
    }
    const name = raw.startsWith('${') ? raw.slice(2, -1) : raw.slice(1);
    matches.push({ name, start, end: start + raw.length });
  }
  return matches;
}

function identifierMatches(text: string): SymbolMatch[] {
  const matches: SymbolMatch[] = [];
  for (const match of text.matchAll(BARE_IDENTIFIER)) {
    const start = match.index ?? 0;
    if (start > 0 && (IDENTIFIER_CHAR.test(text[start - 1]) || text[start - 1] === '.')) {
      continue;
    }
    matches.push({ name: match[0], start, end: start + match[0].length });
  }
  return matches;
}

/**
 * Span of a `var` keyword (plus the whitespace after it) directly before
 * `position`, if there is one.
 */
function declarationKeywordBefore(text: string, position: number): { start: number } | undefined {
  let i = position;
  while (i > 0 && /\s/.test(text[i - 1])) {
    i--;
  }
  if (i === position) {
    return undefined;
  }
  const start = i - DECLARATION_KEYWORD.length;
  if (start < 0 || text.slice(start, i) !== DECLARATION_KEYWORD) {
    return undefined;
  }
  if (start > 0 && IDENTIFIER_CHAR.test(text[start - 1])) {
    return undefined;
  }
  return { start };
}

/** `=` follows, and it is not `==`, `===` or `=>` */
function isAssignmentTarget(text: string, end: number): boolean {
  let i = end;
  while (i < text.length && /\s/.test(text[i])) {
    i++;
  }
  return text[i] === '=' && text[i + 1] !== '=' && text[i + 1] !== '>';
}

function applyEdits(text: string, edits: Edit[]): string {
  let result = text;
  for (const edit of [...edits].sort((a, b) => b.start - a.start)) {
    result = result.slice(0, edit.start) + edit.text + result.slice(edit.end);
  }
  return result;
}
