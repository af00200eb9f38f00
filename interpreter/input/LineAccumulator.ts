import { accumulatorLogger as logger } from '@core/utils/logger';

export type FeedResult =
  | { kind: 'blank' }
  | { kind: 'comment' }
  | { kind: 'command'; text: string }
  | { kind: 'namespace'; name: string }
  | { kind: 'pending'; depth: number }
  | { kind: 'fragment'; text: string };

const NAMESPACE_LINE = /^\s*using\s+([A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*)\s*;?\s*$/;

const QUOTES = new Set(['"', "'", '`']);

/**
 * Collects physical lines until braces balance, then releases them as one
 * fragment. Directive lines and `using` lines are answered immediately, even
 * in the middle of a block.
 */
export class LineAccumulator {
  private lines: string[] = [];
  private counter = 0;

  feed(line: string): FeedResult {
    if (line.trim() === '') {
      return { kind: 'blank' };
    }

    if (line.startsWith('/') && !line.startsWith('/*')) {
      if (line.startsWith('//')) {
        return { kind: 'comment' };
      }
      return { kind: 'command', text: line.slice(1) };
    }

    const namespace = NAMESPACE_LINE.exec(line);
    if (namespace) {
      return { kind: 'namespace', name: namespace[1] };
    }

    this.lines.push(line);
    this.counter += countBraces(line);

    if (this.counter !== 0) {
      logger.debug('Fragment pending', { depth: this.counter });
      return { kind: 'pending', depth: this.counter };
    }

    const text = this.lines.join('\n');
    this.lines = [];
    logger.debug('Fragment ready', { text });
    return { kind: 'fragment', text };
  }

  /** Current nesting counter; may be negative after unbalanced input */
  get depth(): number {
    return this.counter;
  }

  get isContinuation(): boolean {
    return this.lines.length > 0;
  }

  reset(): void {
    this.lines = [];
    this.counter = 0;
  }
}

/**
 * Net `{` minus `}` outside string and template literals. Quote state does not
 * carry over from one line to the next.
 */
export function countBraces(line: string): number {
  let delta = 0;
  let quote: string | undefined;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = undefined;
      }
      continue;
    }
    if (QUOTES.has(ch)) {
      quote = ch;
    } else if (ch === '{') {
      delta++;
    } else if (ch === '}') {
      delta--;
    }
  }

  return delta;
}
