const QUOTE_KINDS = ['"', "'"] as const;

const IN_TEXT = -1;

function countUnescaped(text: string, quote: string, from: number, to: number, templateText: boolean[]): number {
  let count = 0;
  for (let i = from; i < to; i++) {
    if (templateText[i]) {
      continue;
    }
    if (text[i] === '\\') {
      i++;
    } else if (text[i] === quote) {
      count++;
    }
  }
  return count;
}

/**
 * Marks the literal text of template literals: everything between backticks
 * except the inside of `${ }` interpolations, which is code. The backticks
 * and the interpolation delimiters count as text.
 */
export function templateTextMask(text: string): boolean[] {
  const mask = new Array<boolean>(text.length).fill(false);
  // One entry per open template: IN_TEXT, or the brace depth inside its interpolation
  const templates: number[] = [];
  let quote: '"' | "'" | undefined;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    const top = templates.length - 1;
    const state = top >= 0 ? templates[top] : undefined;

    if (state === IN_TEXT) {
      mask[i] = true;
      if (ch === '\\') {
        if (i + 1 < text.length) mask[i + 1] = true;
        i++;
      } else if (ch === '`') {
        templates.pop();
      } else if (ch === '$' && text[i + 1] === '{') {
        mask[i + 1] = true;
        templates[top] = 0;
        i++;
      }
      continue;
    }

    if (quote) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote || ch === '\n') {
        quote = undefined;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '`') {
      mask[i] = true;
      templates.push(IN_TEXT);
    } else if (state !== undefined) {
      if (ch === '{') {
        templates[top] = state + 1;
      } else if (ch === '}') {
        if (state === 0) {
          mask[i] = true;
          templates[top] = IN_TEXT;
        } else {
          templates[top] = state - 1;
        }
      }
    }
  }
  return mask;
}

/**
 * True when the span [start, end) is string text: literal text of a template
 * literal, or between an odd number of quotes of one kind on both sides.
 * Quotes inside template text do not count.
 */
export function isInsideQuotes(
  text: string,
  start: number,
  end: number,
  templateText: boolean[] = templateTextMask(text)
): boolean {
  if (templateText[start]) {
    return true;
  }
  return QUOTE_KINDS.some(quote =>
    countUnescaped(text, quote, 0, start, templateText) % 2 === 1 &&
    countUnescaped(text, quote, end, text.length, templateText) % 2 === 1
  );
}
