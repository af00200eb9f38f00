import ts from 'typescript';
import type {
  CompileResult,
  CompilerBackend,
  Diagnostic,
  LoadableUnit,
  OutputTarget
} from '@core/types/compiler';

interface FailureRule {
  matches: (source: string) => boolean;
  diagnostics: Diagnostic[];
}

export interface CompileCall {
  source: string;
  output: OutputTarget;
  references: readonly LoadableUnit[];
}

/**
 * Compiler stand-in: no type checking, canned diagnostics for sources that
 * match a rule, plain transpilation for everything else.
 */
export class FakeCompiler implements CompilerBackend {
  readonly calls: CompileCall[] = [];
  private readonly rules: FailureRule[] = [];
  private transient = 0;

  failWhen(match: string | ((source: string) => boolean), diagnostics: Diagnostic[]): this {
    const matches = typeof match === 'string' ? (source: string) => source.includes(match) : match;
    this.rules.push({ matches, diagnostics });
    return this;
  }

  get sources(): string[] {
    return this.calls.map(call => call.source);
  }

  compileFromSource(
    source: string,
    output: OutputTarget,
    references: readonly LoadableUnit[]
  ): CompileResult {
    this.calls.push({ source, output, references: [...references] });

    const rule = this.rules.find(candidate => candidate.matches(source));
    if (rule) {
      return { success: false, diagnostics: rule.diagnostics };
    }

    const code = ts.transpileModule(source, {
      compilerOptions: { target: ts.ScriptTarget.ES2022 }
    }).outputText;
    const name = output.kind === 'persisted' ? output.name : `fragment${++this.transient}`;
    return {
      success: true,
      diagnostics: [],
      unit: { name, source, code, persisted: output.kind === 'persisted' }
    };
  }
}
