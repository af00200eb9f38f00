import { ReplError, ErrorSeverity } from '@core/errors/ReplError';

/**
 * Wraps anything thrown by session code while it runs.
 *
 * The message reads `<kind> was thrown: <message>` where `kind` is the
 * constructor name of the thrown value.
 */
export class ExecutionError extends ReplError {
  public readonly kind: string;
  public readonly thrown: unknown;

  constructor(thrown: unknown) {
    const kind = thrownKind(thrown);
    super(`${kind} was thrown: ${thrownMessage(thrown)}`, {
      code: 'EXECUTION_FAILED',
      severity: ErrorSeverity.Recoverable,
      details: { kind },
      cause: thrown
    });
    this.kind = kind;
    this.thrown = thrown;
  }
}

// Values thrown inside the vm context come from another realm, so no instanceof here
function thrownKind(thrown: unknown): string {
  if (thrown === null) return 'null';
  if (typeof thrown === 'object' || typeof thrown === 'function') {
    const ctor: unknown = Reflect.get(thrown, 'constructor');
    if (typeof ctor === 'function' && ctor.name) {
      return ctor.name;
    }
    return 'Object';
  }
  return typeof thrown;
}

function thrownMessage(thrown: unknown): string {
  if (typeof thrown === 'object' && thrown !== null) {
    const message: unknown = Reflect.get(thrown, 'message');
    if (typeof message === 'string') {
      return message;
    }
  }
  return String(thrown);
}
