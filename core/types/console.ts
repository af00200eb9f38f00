/**
 * Receives one line of input, or `null` when the request was cancelled or the
 * input stream ended.
 */
export type LineCallback = (line: string | null) => void;

/**
 * The console surface the session talks to.
 */
export interface ConsoleHost {
  writeText(text: string): void;
  /** Registers the single pending line callback */
  requestLine(callback: LineCallback, prompt?: string): void;
  getLineWidth(): number;
  getMaxLineCount(): number;
}
