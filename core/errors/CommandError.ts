import { ReplError, ErrorSeverity } from '@core/errors/ReplError';

export type CommandErrorCode = 'COMMAND_UNRECOGNIZED' | 'REFERENCE_FAILED';

export const UNRECOGNIZED_COMMAND = 'unrecognized command, or bad macro';

/**
 * Raised by the directive surface (`/n`, `/r`, `/v`, `/dcl`, `/code`, `/<macro>`).
 */
export class CommandError extends ReplError {
  public readonly command: string;

  constructor(
    message: string,
    command: string,
    code: CommandErrorCode = 'COMMAND_UNRECOGNIZED',
    cause?: unknown
  ) {
    super(message, {
      code,
      severity: ErrorSeverity.Recoverable,
      details: { command },
      cause
    });
    this.command = command;
  }

  static unrecognized(command: string): CommandError {
    return new CommandError(UNRECOGNIZED_COMMAND, command);
  }
}
