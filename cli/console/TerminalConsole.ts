import { createInterface, type Interface } from 'readline';
import type { ConsoleHost, LineCallback } from '@core/types/console';
import { LineRequestSlot } from '@interpreter/input/LineRequestSlot';
import type { Completion } from '@interpreter/meta/completion';

export interface TerminalConsoleOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  lineWidth: number;
  maxLineCount: number;
  complete?: (line: string) => Completion;
  /** Called on Ctrl+C, after the typed line is cleared */
  onInterrupt?: () => void;
}

/**
 * Console host over readline. Lines that arrive while nobody is waiting are
 * queued and handed over on the next request.
 */
export class TerminalConsole implements ConsoleHost {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly slot = new LineRequestSlot();
  private readonly queued: string[] = [];
  private rl?: Interface;
  private closed = false;
  private readonly closeWaiters: Array<() => void> = [];

  constructor(private readonly options: TerminalConsoleOptions) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  writeText(text: string): void {
    this.output.write(text);
  }

  requestLine(callback: LineCallback, prompt?: string): void {
    this.slot.register(callback);
    const rl = this.open();
    if (prompt !== undefined) {
      rl.setPrompt(prompt);
    }

    if (this.queued.length > 0 || this.closed) {
      setImmediate(() => this.flush());
      return;
    }
    rl.prompt();
  }

  getLineWidth(): number {
    return this.options.lineWidth;
  }

  getMaxLineCount(): number {
    return this.options.maxLineCount;
  }

  /** Ctrl+C: clears the typed line and hands over to the session */
  interrupt(): void {
    const rl = this.open();
    if (rl.terminal) {
      rl.write(null, { ctrl: true, name: 'e' });
      rl.write(null, { ctrl: true, name: 'u' });
    }
    this.output.write('^C\n');
    this.options.onInterrupt?.();
  }

  /** Resolves once the input stream has ended */
  waitForClose(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.closeWaiters.push(resolve));
  }

  close(): void {
    this.rl?.close();
  }

  private open(): Interface {
    if (this.rl) {
      return this.rl;
    }

    const complete = this.options.complete;
    const rl = createInterface({
      input: this.input,
      output: this.output,
      terminal: 'isTTY' in this.output && this.output.isTTY === true,
      completer: complete
        ? (line: string): [string[], string] => {
            const completion = complete(line);
            return [completion.matches, completion.prefix];
          }
        : undefined
    });

    rl.on('line', line => {
      if (!this.slot.deliver(line)) {
        this.queued.push(line);
      }
    });
    rl.on('SIGINT', () => this.interrupt());
    rl.on('close', () => {
      this.closed = true;
      if (this.queued.length === 0) {
        this.slot.cancel();
      }
      for (const resolve of this.closeWaiters.splice(0)) {
        resolve();
      }
    });

    this.rl = rl;
    return rl;
  }

  private flush(): void {
    const next = this.queued.shift();
    if (next !== undefined) {
      this.slot.deliver(next);
    } else if (this.closed) {
      this.slot.cancel();
    }
  }
}
