/**
 * Central export point for session error types.
 */
export { ReplError, ErrorSeverity } from './ReplError';
export type { BaseErrorDetails, ReplErrorOptions } from './ReplError';
export {
  MalformedMacroCallError,
  MacroExpansionLimitError,
  BADLY_FORMED_MACRO_CALL
} from './MalformedMacroCallError';
export { CompilationError, formatCompilationFailure } from './CompilationError';
export { ExecutionError } from './ExecutionError';
export { TypeResolutionError } from './TypeResolutionError';
export { CommandError, UNRECOGNIZED_COMMAND } from './CommandError';
export type { CommandErrorCode } from './CommandError';
export { ConfigurationError } from './ConfigurationError';
