import { CompilationError } from '@core/errors';
import { compilerLogger as logger } from '@core/utils/logger';
import type { CompileResult, CompilerBackend, Diagnostic, LoadableUnit } from '@core/types/compiler';
import {
  frameAsResult,
  renderFragmentSource,
  renderUnitSource,
  type UsesSection
} from './templates';
import { isValueCandidate } from './classify';

export interface CompiledFragment {
  unit: LoadableUnit;
  /** The unit stores its value in the result slot */
  returnsValue: boolean;
}

export type PipelineResult =
  | { ok: true; fragment: CompiledFragment }
  | { ok: false; error: CompilationError };

export interface PipelineContext {
  compiler: CompilerBackend;
  /** Persisted units every compile may refer to */
  references(): readonly LoadableUnit[];
  uses(): UsesSection;
  /** When true each attempt writes the body it compiles */
  showCode(): boolean;
  write(text: string): void;
}

/**
 * Frames fragments for the compiler and decides which framing wins.
 */
export class CompilationPipeline {
  constructor(private readonly context: PipelineContext) {}

  /**
   * Expression fragments are first compiled as `V["_"] = body`; if that fails
   * the body is compiled again as a plain statement. Assignment fragments go
   * straight to the statement form.
   */
  compile(body: string, kind: 'expression' | 'assignment'): PipelineResult {
    const code = body.trimStart();

    if (kind === 'expression' && isValueCandidate(code)) {
      const first = this.attempt(frameAsResult(code));
      if (first.success) {
        return { ok: true, fragment: { unit: first.unit, returnsValue: true } };
      }

      const second = this.attempt(code);
      if (second.success) {
        return { ok: true, fragment: { unit: second.unit, returnsValue: false } };
      }

      const shown = chooseDiagnostics(first.diagnostics, second.diagnostics);
      logger.debug('Both framings failed', { code, shown: shown === first.diagnostics ? 'expression' : 'statement' });
      return { ok: false, error: new CompilationError(code, shown) };
    }

    const result = this.attempt(code);
    if (result.success) {
      return { ok: true, fragment: { unit: result.unit, returnsValue: false } };
    }
    return { ok: false, error: new CompilationError(code, result.diagnostics) };
  }

  /**
   * Compiles a function fragment, already rewritten as a method, into a named
   * unit that later compiles can refer to.
   */
  compileUnit(method: string, className: string): PipelineResult {
    this.showCode(method);
    const source = renderUnitSource(this.context.uses(), className, method);
    const result = this.context.compiler.compileFromSource(
      source,
      { kind: 'persisted', name: className },
      this.context.references()
    );
    if (result.success) {
      return { ok: true, fragment: { unit: result.unit, returnsValue: false } };
    }
    return { ok: false, error: new CompilationError(method, result.diagnostics) };
  }

  private attempt(body: string): CompileResult {
    this.showCode(body);
    const source = renderFragmentSource(this.context.uses(), body);
    const result = this.context.compiler.compileFromSource(
      source,
      { kind: 'transient' },
      this.context.references()
    );
    logger.debug('Compile attempt', { body, success: result.success, diagnostics: result.diagnostics.length });
    return result;
  }

  private showCode(body: string): void {
    if (this.context.showCode()) {
      this.context.write(`code: ${body}\n`);
    }
  }
}

/**
 * Shows the statement attempt's diagnostics unless they include a
 * discarded-result complaint while the expression attempt had no void-result
 * complaint.
 */
export function chooseDiagnostics(first: Diagnostic[], second: Diagnostic[]): Diagnostic[] {
  const firstIsVoidResult = first.some(diagnostic => diagnostic.kind === 'void-result');
  const secondIsDiscardedResult = second.some(diagnostic => diagnostic.kind === 'discarded-result');
  return !secondIsDiscardedResult || firstIsVoidResult ? second : first;
}
