import { ReplError, ErrorSeverity } from '@core/errors/ReplError';

export class ConfigurationError extends ReplError {
  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, {
      code: 'CONFIG_INVALID',
      severity: ErrorSeverity.Fatal,
      details: { filePath },
      cause
    });
  }
}
