import * as fs from 'fs';
import * as path from 'path';
import { CommandError, ReplError } from '@core/errors';
import { sessionLogger as logger } from '@core/utils/logger';
import { readPath } from '@core/utils/objectPath';
import type { CompilerBackend, LoadableUnit } from '@core/types/compiler';
import type { ConsoleHost } from '@core/types/console';
import { PROMPT_CONTINUATION, PROMPT_START, type AddressingMode } from '@core/types/session';
import { TypeScriptCompiler } from '@services/compiler/TypeScriptCompiler';
import { SessionReflection } from '@services/reflection/SessionReflection';
import { LineAccumulator } from './input/LineAccumulator';
import { MacroPreprocessor } from './preprocess/MacroPreprocessor';
import { SymbolRewriter } from './rewrite/SymbolRewriter';
import { SessionContext } from './env/SessionContext';
import { VariableEnvironment, type MissingSlotResolver } from './env/VariableEnvironment';
import { TypeResolver } from './types/TypeResolver';
import { TypeNamer } from './types/TypeNamer';
import { CompilationPipeline } from './compile/CompilationPipeline';
import { parseFunctionDefinition, toUnitMethod } from './compile/classify';
import type { NamespaceBinding, ReferenceBinding, UsesSection } from './compile/templates';
import { ResultReporter } from './execution/ResultReporter';
import { ValueFormatter, isIterable } from './execution/ValueFormatter';
import { MetaService } from './meta/MetaService';
import type { Completion } from './meta/completion';
import { CommandProcessor, type CommandHost } from './commands/CommandProcessor';
import reservedWords from './compile/reserved-words.json';

const RESERVED = new Set<string>(reservedWords);
const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;
const MEMBER_ACCESS = /([A-Za-z_$][\w$]*)\.[\w$]*$/;
const FUNCTION_INTERNALS = new Set(['prototype', 'length', 'name', 'arguments', 'caller']);

export interface InterpreterOptions {
  console: ConsoleHost;
  /** Defaults to the TypeScript compiler backend */
  compiler?: CompilerBackend;
  declarationMode?: boolean;
  showCode?: boolean;
  /** Directory `require`, `/r` and include files resolve against */
  basePath?: string;
  missingSlot?: MissingSlotResolver;
}

/**
 * One interactive session: feeds lines through accumulation, macro expansion
 * and symbol rewriting, compiles what comes out and runs it in the session
 * context.
 */
export class Interpreter implements CommandHost {
  private readonly console: ConsoleHost;
  private readonly context: SessionContext;
  private readonly env: VariableEnvironment;
  private readonly reflection: SessionReflection;
  private readonly resolver: TypeResolver;
  private readonly namer: TypeNamer;
  private readonly accumulator = new LineAccumulator();
  private readonly macros = new MacroPreprocessor();
  private readonly rewriter: SymbolRewriter;
  private readonly pipeline: CompilationPipeline;
  private readonly formatter: ValueFormatter;
  private readonly reporter: ResultReporter;
  private readonly meta: MetaService;
  private readonly commands: CommandProcessor;

  private readonly units: LoadableUnit[] = [];
  private readonly namespaceBindings: NamespaceBinding[] = [];
  private readonly referenceBindings: ReferenceBinding[] = [];
  private addressing: AddressingMode;
  private showCode: boolean;
  private dumping = true;
  private unitCounter = 0;
  private producedValue = false;
  private releaseProcessHandlers?: () => void;

  constructor(options: InterpreterOptions) {
    this.console = options.console;
    this.addressing = options.declarationMode ? 'declared' : 'sigil';
    this.showCode = options.showCode ?? false;

    const basePath = options.basePath ?? process.cwd();
    this.context = new SessionContext(this.write, basePath);
    this.env = new VariableEnvironment(options.missingSlot);
    this.reflection = new SessionReflection(this.context);
    this.resolver = new TypeResolver(this.reflection, () => this.namespaces());
    this.namer = new TypeNamer(this.resolver, this.reflection.isCastable);
    this.rewriter = new SymbolRewriter(this.env, this.namer);
    this.pipeline = new CompilationPipeline({
      compiler: options.compiler ?? new TypeScriptCompiler(),
      references: () => this.units,
      uses: () => this.uses(),
      showCode: () => this.showCode,
      write: this.write
    });
    this.formatter = new ValueFormatter(this.namer, this.console);
    this.reporter = new ResultReporter(this.context, this.env, this.formatter, {
      dumping: () => this.dumping,
      write: this.write
    });
    this.meta = new MetaService(this.resolver, this.reflection, this.namer);
    this.commands = new CommandProcessor(this, this.macros, this.formatter);

    this.env.bindSession(this);
    this.bindUtilities();
  }

  /**
   * Registers for the first line of input. Until `dispose`, uncaught
   * exceptions and unhandled rejections are reported to the session instead
   * of ending the process.
   */
  start(): void {
    if (!this.releaseProcessHandlers) {
      const report = (thrown: unknown): void => this.context.reportFailure(thrown);
      process.on('uncaughtException', report);
      process.on('unhandledRejection', report);
      this.releaseProcessHandlers = () => {
        process.off('uncaughtException', report);
        process.off('unhandledRejection', report);
      };
    }
    this.prompt();
  }

  /**
   * Console callback. A null line ends the session's requests.
   */
  executeCode = (line: string | null): boolean => {
    if (line === null) {
      return false;
    }
    try {
      this.processLine(line);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Unexpected failure', { line, error: message });
      this.write(`ERROR: ${message}\n`);
      this.accumulator.reset();
    }
    this.prompt();
    return true;
  };

  /** Discards a half-typed block and asks for a fresh line */
  interrupt(): void {
    this.accumulator.reset();
    this.prompt();
  }

  /**
   * Feeds one physical line. Session errors are written to the console and
   * the session carries on; false only for a null line.
   */
  processLine(line: string | null): boolean {
    if (line === null) {
      return false;
    }

    try {
      const fed = this.accumulator.feed(line);
      switch (fed.kind) {
        case 'command':
          this.commands.process(fed.text);
          break;
        case 'namespace':
          this.addNamespace(fed.name);
          break;
        case 'fragment':
          this.executeFragment(fed.text);
          break;
        default:
          break;
      }
    } catch (error) {
      if (!(error instanceof ReplError)) {
        throw error;
      }
      logger.debug('Line failed', { code: error.code, line });
      this.write(`${error.message}\n`);
    }
    return true;
  }

  /**
   * Runs a complete fragment. Function definitions become a method on a new
   * unit class, reachable afterwards through a macro of the function's name.
   */
  executeFragment(text: string): void {
    this.producedValue = false;

    const definition = parseFunctionDefinition(text);
    let className: string | undefined;
    let source = text;
    if (definition) {
      this.macros.macros.remove(definition.name);
      className = `Unit${++this.unitCounter}`;
      source = toUnitMethod(definition);
    }

    const preprocessed = this.macros.processLine(source);
    if (preprocessed.kind === 'defined') {
      return;
    }

    const rewritten = this.rewriter.rewrite(preprocessed.text, this.addressing);

    if (definition && className) {
      this.defineFunction(definition.name, className, rewritten.text);
      return;
    }

    const compiled = this.pipeline.compile(
      rewritten.text,
      rewritten.wasAssignment ? 'assignment' : 'expression'
    );
    if (!compiled.ok) {
      throw compiled.error;
    }
    this.reporter.runFragment(compiled.fragment.unit, compiled.fragment.returnsValue);
    this.producedValue = compiled.fragment.returnsValue;
  }

  /** Processes every line of a file with result display off */
  readIncludeFile(file: string): boolean {
    const fullPath = path.resolve(this.context.basePath, file);
    if (!fs.existsSync(fullPath)) {
      logger.debug('Include file missing', { file: fullPath });
      return false;
    }
    return this.readIncludeCode(fs.readFileSync(fullPath, 'utf8'));
  }

  readIncludeCode(code: string): boolean {
    if (!code) {
      return false;
    }
    const previous = this.dumping;
    this.dumping = false;
    try {
      for (const line of code.split(/\r?\n/)) {
        this.processLine(line);
      }
    } finally {
      this.dumping = previous;
    }
    return true;
  }

  setValue(name: string, value: unknown): void {
    this.env.set(name, value);
  }

  hasValue(name: string): boolean {
    return this.env.has(name);
  }

  removeValue(name: string): boolean {
    return this.env.remove(name);
  }

  getValue(name: string): unknown {
    return this.env.get(name);
  }

  /** The result slot, when the last fragment produced a value */
  lastResult(): unknown {
    return this.producedValue ? this.env.result : undefined;
  }

  namespaces(): string[] {
    return this.namespaceBindings.map(binding => binding.namespace);
  }

  /**
   * Registers a namespace for type search and binds its members as globals.
   * Members that would shadow an existing global are left out.
   */
  addNamespace(name: string): boolean {
    if (this.namespaces().includes(name)) {
      return false;
    }

    const value = readPath(this.context.globalScope(), name);
    const members: string[] = [];
    if ((typeof value === 'object' && value !== null) || typeof value === 'function') {
      for (const member of Object.getOwnPropertyNames(value)) {
        if (!isBindable(member) || this.context.isGlobal(member)) {
          continue;
        }
        if (typeof value === 'function' && FUNCTION_INTERNALS.has(member)) {
          continue;
        }
        this.context.bind(member, Reflect.get(value, member));
        members.push(member);
      }
    }

    this.namespaceBindings.push({ namespace: name, members });
    logger.debug('Namespace added', { name, members: members.length });
    return true;
  }

  /**
   * Loads a module and binds it under `alias`, or a name derived from the
   * specifier.
   */
  addReference(specifier: string, alias?: string): void {
    const name = alias ?? defaultAlias(specifier);
    if (!isBindable(name)) {
      throw new CommandError(`'${name}' cannot be used as an alias`, `r ${specifier}`, 'REFERENCE_FAILED');
    }

    const existing = this.referenceBindings.find(binding => binding.alias === name);
    if (existing?.specifier === specifier) {
      return;
    }
    if (existing || this.context.isGlobal(name)) {
      throw new CommandError(`'${name}' is already defined`, `r ${specifier}`, 'REFERENCE_FAILED');
    }

    let exports: unknown;
    try {
      exports = this.context.requireModule(specifier);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CommandError(`cannot load '${specifier}': ${message}`, `r ${specifier}`, 'REFERENCE_FAILED', error);
    }

    this.context.bind(name, exports);
    this.reflection.addUnit({ name, kind: 'reference', exports });
    this.referenceBindings.push({ specifier, alias: name });
    logger.debug('Reference added', { specifier, alias: name });
  }

  variables(): Array<[string, unknown]> {
    return this.env.entries();
  }

  toggleDeclarationMode(): boolean {
    this.addressing = this.addressing === 'sigil' ? 'declared' : 'sigil';
    return this.addressing === 'declared';
  }

  toggleShowCode(): boolean {
    this.showCode = !this.showCode;
    return this.showCode;
  }

  get addressingMode(): AddressingMode {
    return this.addressing;
  }

  get isContinuation(): boolean {
    return this.accumulator.isContinuation;
  }

  write = (text: string): void => {
    this.console.writeText(text);
  };

  /**
   * Completes the member name at the end of `line`: members of the value
   * before the dot, or of the last result.
   */
  complete(line: string): Completion {
    const access = MEMBER_ACCESS.exec(line);
    const subject = access ? this.lookupSubject(access[1]) : this.env.result;
    return this.meta.complete(line, subject);
  }

  /** Stops pending timers; the session cannot run code afterwards */
  dispose(): void {
    this.releaseProcessHandlers?.();
    this.releaseProcessHandlers = undefined;
    logger.debug('Session disposed', { pendingTimers: this.context.pendingTimers });
    this.context.cleanup();
  }

  toString(): string {
    return 'Interpreter';
  }

  private defineFunction(name: string, className: string, method: string): void {
    const compiled = this.pipeline.compileUnit(method.trimStart(), className);
    if (!compiled.ok) {
      throw compiled.error;
    }
    const unit = compiled.fragment.unit;
    const ctor = this.reporter.instantiateUnit(unit, className);
    this.units.push(unit);
    this.reflection.addUnit({ name: className, kind: 'function', exports: { [className]: ctor } });

    const sigil = this.addressing === 'sigil' ? '$' : '';
    this.macros.macros.define(name, `${sigil}${className}._${name}`);
    logger.debug('Function defined', { name, className });
  }

  private uses(): UsesSection {
    return { namespaces: this.namespaceBindings, references: this.referenceBindings };
  }

  private prompt(): void {
    this.console.requestLine(
      this.executeCode,
      this.accumulator.isContinuation ? PROMPT_CONTINUATION : PROMPT_START
    );
  }

  private lookupSubject(name: string): unknown {
    const slot = name.startsWith('$') ? name.slice(1) : name;
    if (this.env.has(slot)) {
      return this.env.get(slot);
    }
    return readPath(this.context.globalScope(), slot);
  }

  private bindUtilities(): void {
    this.context.bind('V', this.env.asSlots());
    this.context.bind('print', (...values: unknown[]) => {
      this.write(this.formatter.printl(values));
    });
    this.context.bind('printl', (values: unknown) => {
      this.write(this.formatter.printl(requireIterable(values, 'printl')));
    });
    this.context.bind('dumpl', (values: unknown) => {
      this.write(this.formatter.dumpl(requireIterable(values, 'dumpl')));
    });
    this.context.bind('meta', (subject?: unknown, pattern?: unknown) => {
      const names = this.meta.listMembers(subject, typeof pattern === 'string' ? pattern : undefined);
      if (names) {
        this.write(this.formatter.printl(names));
      }
    });
    this.context.bind('minfo', (subject?: unknown, member?: unknown) => {
      const lines = typeof member === 'string'
        ? this.meta.describeMember(subject, member)
        : this.meta.listMethods(subject);
      for (const line of lines) {
        this.write(`${line}\n`);
      }
    });
    this.context.bind('include', (file: unknown) => {
      if (typeof file !== 'string') {
        throw new TypeError('include expects a file name');
      }
      return this.readIncludeFile(file);
    });
  }
}

function requireIterable(values: unknown, utility: string): Iterable<unknown> {
  if (!isIterable(values)) {
    throw new TypeError(`${utility} expects an iterable`);
  }
  return values;
}

function isBindable(name: string): boolean {
  return IDENTIFIER.test(name) && !RESERVED.has(name);
}

/**
 * `node:path` → `path`, `@scope/pkg` → `pkg`, `./lib/date-utils.js` →
 * `date_utils`.
 */
export function defaultAlias(specifier: string): string {
  const withoutScheme = specifier.replace(/^node:/, '');
  const last = withoutScheme.split('/').filter(Boolean).pop() ?? withoutScheme;
  const base = last.replace(/\.(?:c|m)?js$|\.json$/, '');
  const alias = base.replace(/[^\w$]/g, '_');
  return /^\d/.test(alias) ? `_${alias}` : alias;
}
