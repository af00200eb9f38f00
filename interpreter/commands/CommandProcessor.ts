import { CommandError } from '@core/errors';
import { sessionLogger as logger } from '@core/utils/logger';
import type { MacroPreprocessor } from '@interpreter/preprocess/MacroPreprocessor';
import type { ValueFormatter } from '@interpreter/execution/ValueFormatter';

const COMMAND_SPLIT = /(\w+)($|\s+.+)/;
const WHITESPACE = /\s+/;
const NAMESPACE_NAME = /^[A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*$/;
const REFERENCE_ARGS = /^(\S+)(?:\s+as\s+([A-Za-z_$][\w$]*))?\s*$/;

/**
 * What the directive surface needs from the session.
 */
export interface CommandHost {
  addNamespace(name: string): boolean;
  addReference(specifier: string, alias?: string): void;
  variables(): Array<[string, unknown]>;
  toggleDeclarationMode(): boolean;
  toggleShowCode(): boolean;
  /** Runs text as a complete fragment, bypassing line accumulation */
  executeFragment(text: string): void;
  write(text: string): void;
}

/**
 * Handles lines that start with `/`. Built-in commands come first; any other
 * word is tried as a parameterized macro.
 */
export class CommandProcessor {
  constructor(
    private readonly host: CommandHost,
    private readonly macros: MacroPreprocessor,
    private readonly formatter: ValueFormatter
  ) {}

  /**
   * @param text the line without its leading `/`
   */
  process(text: string): void {
    const match = COMMAND_SPLIT.exec(text);
    const command = match?.[1] ?? '';
    const arg = (match?.[2] ?? '').trimStart();
    logger.debug('Command', { command, arg });

    switch (command) {
      case 'n':
        this.addNamespace(arg, text);
        return;
      case 'r':
        this.addReference(arg, text);
        return;
      case 'v':
        this.listVariables();
        return;
      case 'dcl':
        this.host.toggleDeclarationMode();
        return;
      case 'code':
        this.host.toggleShowCode();
        return;
      default:
        this.invokeMacro(command, arg, text);
    }
  }

  private addNamespace(arg: string, text: string): void {
    const name = arg.trim().replace(/;$/, '');
    if (!NAMESPACE_NAME.test(name)) {
      throw new CommandError(`'${name}' is not a namespace name`, text);
    }
    this.host.addNamespace(name);
  }

  private addReference(arg: string, text: string): void {
    const match = REFERENCE_ARGS.exec(arg);
    if (!match) {
      throw new CommandError('usage: /r <module> [as <alias>]', text, 'REFERENCE_FAILED');
    }
    this.host.addReference(match[1], match[2]);
  }

  private listVariables(): void {
    for (const [name, value] of this.host.variables()) {
      const shown = value === null || value === undefined ? String(value) : this.formatter.inline(value);
      this.host.write(this.formatter.printl([`${name} = ${shown}`]));
    }
  }

  /**
   * Macros with several parameters take whitespace-separated arguments; a
   * single-parameter macro takes the whole remainder.
   */
  private invokeMacro(command: string, arg: string, text: string): void {
    const entry = command ? this.macros.macros.lookup(command) : undefined;
    if (!entry || entry.params === null) {
      throw CommandError.unrecognized(text);
    }
    const actuals = entry.params.length > 1 ? arg.split(WHITESPACE) : [arg];
    this.host.executeFragment(this.macros.replaceParams(entry, actuals));
  }
}
