import chalk from 'chalk';
import { ReplError, ErrorSeverity } from '@core/errors';
import { cliLogger as logger } from '@core/utils/logger';

export interface ErrorHandlerOptions {
  verbose?: boolean;
}

type Exit = (code: number) => void;
type Print = (text: string) => void;

/**
 * Reports errors raised outside the session loop: configuration, startup
 * references and include files. Only fatal errors end the process.
 */
export class ErrorHandler {
  constructor(
    private readonly exit: Exit = code => process.exit(code),
    private readonly print: Print = text => console.error(text)
  ) {}

  handleError(error: unknown, options: ErrorHandlerOptions = {}): void {
    const severity = error instanceof ReplError ? error.severity : ErrorSeverity.Fatal;

    if (error instanceof ReplError) {
      this.handleReplError(error);
    } else if (error instanceof Error) {
      this.handleGenericError(error);
    } else {
      logger.error('An unknown error occurred', { error: String(error) });
      this.print(chalk.red(`Unknown Error: ${String(error)}`));
    }

    if (options.verbose && error instanceof Error && error.stack) {
      this.print(chalk.gray(error.stack));
    }

    if (severity === ErrorSeverity.Fatal) {
      this.exit(1);
    }
  }

  private handleReplError(error: ReplError): void {
    const label = error.canBeWarning() ? chalk.yellow('Warning: ') : chalk.red('Error: ');
    this.print(label + error.message);
    this.printCause(error.cause);
  }

  private handleGenericError(error: Error): void {
    logger.error('An unexpected error occurred', { message: error.message });
    this.print(chalk.red('Error: ') + error.message);
    this.printCause(error.cause);
  }

  private printCause(cause: unknown): void {
    if (cause instanceof Error) {
      this.print(chalk.red(`  Cause: ${cause.message}`));
    }
  }
}
