import ts from 'typescript';
import * as path from 'path';
import { compilerLogger as logger } from '@core/utils/logger';
import type {
  CompileResult,
  CompilerBackend,
  Diagnostic,
  DiagnosticKind,
  LoadableUnit,
  OutputTarget
} from '@core/types/compiler';
import { PRELUDE, PRELUDE_FILE } from './prelude';

const FRAGMENT_FILE = 'fragment.ts';
const FRAGMENT_OUTPUT = 'fragment.js';

export const DEFAULT_COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  lib: ['lib.esnext.d.ts'],
  strict: true,
  // fragments are typed gradually
  noImplicitAny: false,
  skipLibCheck: true,
  types: [],
  newLine: ts.NewLineKind.LineFeed
};

// Lib files parse once per process
const libSourceFiles = new Map<string, ts.SourceFile>();

/**
 * Compiles fragments with the TypeScript compiler API against an in-memory
 * host. Every file is a script, so persisted units declare globals that later
 * fragments see through their references.
 */
export class TypeScriptCompiler implements CompilerBackend {
  private readonly options: ts.CompilerOptions;
  private readonly libDirectory: string;
  private previous?: ts.Program;
  private transient = 0;

  constructor(options: ts.CompilerOptions = {}) {
    this.options = { ...DEFAULT_COMPILER_OPTIONS, ...options };
    this.libDirectory = path.dirname(ts.getDefaultLibFilePath(this.options));
  }

  compileFromSource(
    source: string,
    output: OutputTarget,
    references: readonly LoadableUnit[]
  ): CompileResult {
    const files = new Map<string, string>([[PRELUDE_FILE, PRELUDE]]);
    for (const unit of references) {
      files.set(`${unit.name}.ts`, unit.source);
    }
    files.set(FRAGMENT_FILE, source);

    const outputs = new Map<string, string>();
    const host = this.createHost(files, outputs);
    const program = ts.createProgram({
      rootNames: Array.from(files.keys()),
      options: this.options,
      host,
      oldProgram: this.previous
    });
    this.previous = program;

    const fragment = program.getSourceFile(FRAGMENT_FILE);
    if (!fragment) {
      throw new Error(`Compiler host lost ${FRAGMENT_FILE}`);
    }

    const diagnostics = [
      ...program.getSyntacticDiagnostics(fragment),
      ...program.getSemanticDiagnostics(fragment)
    ]
      .filter(diagnostic => diagnostic.category === ts.DiagnosticCategory.Error)
      .map(toDiagnostic);

    if (diagnostics.length > 0) {
      logger.debug('Compilation failed', { codes: diagnostics.map(d => d.code) });
      return { success: false, diagnostics };
    }

    const emitted = program.emit(fragment);
    const code = outputs.get(FRAGMENT_OUTPUT);
    if (emitted.emitSkipped || code === undefined) {
      return {
        success: false,
        diagnostics: emitted.diagnostics.map(toDiagnostic)
      };
    }

    const persisted = output.kind === 'persisted';
    const name = persisted ? output.name : `fragment${++this.transient}`;
    logger.debug('Compiled unit', { name, persisted });
    return { success: true, diagnostics: [], unit: { name, source, code, persisted } };
  }

  private createHost(files: Map<string, string>, outputs: Map<string, string>): ts.CompilerHost {
    const target = this.options.target ?? ts.ScriptTarget.ES2022;

    const readFile = (fileName: string): string | undefined =>
      files.get(fileName) ?? ts.sys.readFile(fileName);

    return {
      getSourceFile: (fileName: string) => {
        const text = files.get(fileName);
        if (text !== undefined) {
          return ts.createSourceFile(fileName, text, target, true, ts.ScriptKind.TS);
        }
        return this.libSourceFile(fileName, target);
      },
      getDefaultLibFileName: options => ts.getDefaultLibFilePath(options),
      getDefaultLibLocation: () => this.libDirectory,
      writeFile: (fileName: string, text: string) => {
        outputs.set(path.basename(fileName), text);
      },
      getCurrentDirectory: () => '',
      getCanonicalFileName: (fileName: string) => fileName,
      useCaseSensitiveFileNames: () => true,
      getNewLine: () => '\n',
      fileExists: (fileName: string) => files.has(fileName) || ts.sys.fileExists(fileName),
      readFile,
      directoryExists: () => true,
      getDirectories: () => []
    };
  }

  private libSourceFile(fileName: string, target: ts.ScriptTarget): ts.SourceFile | undefined {
    const cached = libSourceFiles.get(fileName);
    if (cached) {
      return cached;
    }
    const text = ts.sys.readFile(fileName);
    if (text === undefined) {
      return undefined;
    }
    const sourceFile = ts.createSourceFile(fileName, text, target, false);
    libSourceFiles.set(fileName, sourceFile);
    return sourceFile;
  }
}

function toDiagnostic(diagnostic: ts.Diagnostic): Diagnostic {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
  const code = `TS${diagnostic.code}`;
  const kind = classify(diagnostic.code, message);
  return kind ? { code, message, kind } : { code, message };
}

/**
 * TS2322/TS2345 about `void`: a call with no value was used as one.
 * TS2695: an expression statement whose value goes nowhere.
 */
function classify(code: number, message: string): DiagnosticKind | undefined {
  if ((code === 2322 || code === 2345) && message.includes("'void'")) {
    return 'void-result';
  }
  if (code === 2695) {
    return 'discarded-result';
  }
  return undefined;
}
