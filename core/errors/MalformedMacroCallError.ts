import { ReplError, ErrorSeverity } from '@core/errors/ReplError';

/** Fixed message the session prints for an unbalanced macro argument list. */
export const BADLY_FORMED_MACRO_CALL = '**Badly formed macro call**';

export interface MalformedMacroCallDetails {
  macro: string;
  line: string;
  [key: string]: unknown;
}

/**
 * Raised when a parameterized macro is called with an argument list that never closes.
 */
export class MalformedMacroCallError extends ReplError {
  constructor(macro: string, line: string) {
    const details: MalformedMacroCallDetails = { macro, line };
    super(BADLY_FORMED_MACRO_CALL, {
      code: 'MACRO_CALL_MALFORMED',
      severity: ErrorSeverity.Recoverable,
      details
    });
  }
}

/**
 * Raised when expansion of a single line keeps producing macro names, as a
 * self-referential macro does.
 */
export class MacroExpansionLimitError extends ReplError {
  constructor(macro: string, limit: number) {
    super(`macro '${macro}' still expanding after ${limit} substitutions`, {
      code: 'MACRO_EXPANSION_LIMIT',
      severity: ErrorSeverity.Recoverable,
      details: { macro, limit }
    });
  }
}
