import { ReplError, ErrorSeverity } from '@core/errors/ReplError';
import type { Diagnostic } from '@core/types/compiler';

/**
 * Compiler diagnostics for a fragment that could not be compiled in any framing.
 */
export class CompilationError extends ReplError {
  public readonly source: string;
  public readonly diagnostics: readonly Diagnostic[];

  constructor(source: string, diagnostics: readonly Diagnostic[]) {
    super(formatCompilationFailure(source, diagnostics), {
      code: 'COMPILATION_FAILED',
      severity: ErrorSeverity.Recoverable,
      details: { source, diagnosticCount: diagnostics.length }
    });
    this.source = source;
    this.diagnostics = diagnostics;
  }
}

/**
 * Header line followed by one `message [code]` line per diagnostic.
 */
export function formatCompilationFailure(source: string, diagnostics: readonly Diagnostic[]): string {
  const lines = [`Compiling string: '${source.trim()}'`, ''];
  for (const diagnostic of diagnostics) {
    lines.push(`${diagnostic.message} [${diagnostic.code}]`);
  }
  return lines.join('\n');
}
