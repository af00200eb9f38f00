import { ExecutionError } from '@core/errors';
import { executionLogger as logger } from '@core/utils/logger';
import { isConstructor } from '@core/types/reflection';
import type { LoadableUnit } from '@core/types/compiler';
import type { SessionContext } from '@interpreter/env/SessionContext';
import type { IVariableEnvironment } from '@interpreter/env/VariableEnvironment';
import { RESULT_SLOT } from '@core/types/session';
import type { ValueFormatter } from './ValueFormatter';

export interface ReporterOptions {
  /** Whether results are displayed at all; off while including files */
  dumping(): boolean;
  write(text: string): void;
}

/**
 * Runs compiled units in the session context and reports what they produce.
 * Anything thrown while running, or while rendering the result, surfaces as
 * an ExecutionError.
 */
export class ResultReporter {
  constructor(
    private readonly context: SessionContext,
    private readonly env: IVariableEnvironment,
    private readonly formatter: ValueFormatter,
    private readonly options: ReporterOptions
  ) {}

  runFragment(unit: LoadableUnit, returnsValue: boolean): void {
    try {
      const run = this.context.runScript(unit.code, `${unit.name}.js`);
      if (typeof run !== 'function') {
        throw new TypeError(`${unit.name} did not evaluate to a function`);
      }
      Reflect.apply(run, undefined, []);

      if (returnsValue && this.options.dumping()) {
        this.options.write(this.formatter.display(this.env.get(RESULT_SLOT)));
      }
    } catch (thrown) {
      logger.debug('Fragment threw', { unit: unit.name });
      throw new ExecutionError(thrown);
    }
  }

  /**
   * Loads a persisted unit, instantiates its class and stores the instance
   * under the class name. Returns the class.
   */
  instantiateUnit(unit: LoadableUnit, className: string): object {
    try {
      this.context.runScript(unit.code, `${unit.name}.js`);
      const ctor = this.context.evaluate(className);
      if (!isConstructor(ctor)) {
        throw new TypeError(`${className} is not a class`);
      }
      this.env.set(className, Reflect.construct(ctor, []));
      logger.debug('Unit instantiated', { className });
      return ctor;
    } catch (thrown) {
      throw new ExecutionError(thrown);
    }
  }
}
