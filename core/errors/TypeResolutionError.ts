import { ReplError, ErrorSeverity } from '@core/errors/ReplError';

export class TypeResolutionError extends ReplError {
  public readonly typeName: string;

  constructor(typeName: string) {
    super(`'${typeName}' is not a type`, {
      code: 'TYPE_NOT_FOUND',
      severity: ErrorSeverity.Recoverable,
      details: { typeName }
    });
    this.typeName = typeName;
  }
}
