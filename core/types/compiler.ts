/**
 * Contract between the compilation pipeline and a compiler backend.
 */

/**
 * Classification the backend attaches to a diagnostic so the pipeline can
 * choose between framings without reading message text.
 *
 * - `void-result`: a value-less call was used where a value is required
 * - `discarded-result`: an expression statement whose value is discarded
 */
export type DiagnosticKind = 'void-result' | 'discarded-result';

export interface Diagnostic {
  code: string;
  message: string;
  kind?: DiagnosticKind;
}

export type OutputTarget =
  | { kind: 'transient' }
  | { kind: 'persisted'; name: string };

/**
 * A compiled unit: the generated source plus the JavaScript it emitted.
 * Persisted units are passed back as references to later compiles.
 */
export interface LoadableUnit {
  name: string;
  source: string;
  code: string;
  persisted: boolean;
}

export type CompileResult =
  | { success: true; diagnostics: Diagnostic[]; unit: LoadableUnit }
  | { success: false; diagnostics: Diagnostic[] };

export interface CompilerBackend {
  compileFromSource(
    source: string,
    output: OutputTarget,
    references: readonly LoadableUnit[]
  ): CompileResult;
}
