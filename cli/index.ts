import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { version } from '@core/version';
import { ConfigLoader } from '@core/config/loader';
import type { ResolvedConfig } from '@core/config/types';
import { CommandError } from '@core/errors';
import { cliLogger as logger, enableFileLogging, setLogLevel } from '@core/utils/logger';
import type { CompilerBackend } from '@core/types/compiler';
import { Interpreter } from '@interpreter/Interpreter';
import { TerminalConsole } from './console/TerminalConsole';
import { ErrorHandler } from './error/ErrorHandler';

export type CLIOptions = {
  declare?: boolean;
  showCode?: boolean;
  include: string[];
  eval: string[];
  width?: number;
  maxLines?: number;
  interactive?: boolean;
  debug?: boolean;
  verbose?: boolean;
};

export interface SessionSettings {
  lineWidth: number;
  maxLineCount: number;
  declarationMode: boolean;
  showCode: boolean;
  namespaces: string[];
  references: string[];
  includeFiles: string[];
}

export interface CLIDependencies {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  compiler?: CompilerBackend;
  /** Directory the project configuration, references and includes resolve against */
  cwd?: string;
  errorHandler?: ErrorHandler;
}

const REFERENCE_ENTRY = /^(\S+)(?:\s+as\s+(\S+))?$/;

function positiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(): Command {
  return new Command()
    .name('chunkshell')
    .description('Interactive TypeScript console with macros, session variables and introspection')
    .version(version)
    .option('--declare', 'address session variables by declaration instead of $name')
    .option('--show-code', 'print the generated code of every compile attempt')
    .option('-i, --include <file>', 'process a file before the session starts', collect, [])
    .option('-e, --eval <line>', 'process a line and exit (repeatable)', collect, [])
    .option('--interactive', 'keep the session open after --eval')
    .option('--width <columns>', 'console line width', positiveInteger)
    .option('--max-lines <count>', 'lines shown before a listing is elided', positiveInteger)
    .option('--debug', 'log everything')
    .option('--verbose', 'log informational messages')
    .exitOverride();
}

export function parseOptions(argv: string[]): CLIOptions {
  const program = createProgram();
  program.parse(argv, { from: 'user' });
  const opts = program.opts<Partial<CLIOptions>>();
  return {
    ...opts,
    include: opts.include ?? [],
    eval: opts.eval ?? []
  };
}

/** Flags override configuration; include files from both run, configured ones first */
export function resolveSettings(options: CLIOptions, config: ResolvedConfig): SessionSettings {
  return {
    lineWidth: options.width ?? config.console.lineWidth,
    maxLineCount: options.maxLines ?? config.console.maxLineCount,
    declarationMode: options.declare ?? config.session.declarationMode,
    showCode: options.showCode ?? config.session.showGeneratedSource,
    namespaces: config.session.namespaces,
    references: config.session.references,
    includeFiles: [...config.session.includeFiles, ...options.include]
  };
}

function configureLogging(options: CLIOptions, config: ResolvedConfig): void {
  if (config.logging.file) {
    enableFileLogging(config.logging.file);
  }
  if (options.debug) {
    process.env.CHUNKSHELL_DEBUG = 'true';
    setLogLevel('debug');
  } else if (options.verbose) {
    setLogLevel('info');
  } else if (config.logging.level) {
    setLogLevel(config.logging.level);
  }
}

function prepareSession(
  interpreter: Interpreter,
  settings: SessionSettings,
  errors: ErrorHandler,
  options: CLIOptions
): void {
  for (const namespace of settings.namespaces) {
    interpreter.addNamespace(namespace);
  }

  for (const entry of settings.references) {
    const match = REFERENCE_ENTRY.exec(entry.trim());
    try {
      if (!match) {
        throw new CommandError(`'${entry}' is not a module reference`, `r ${entry}`, 'REFERENCE_FAILED');
      }
      interpreter.addReference(match[1], match[2]);
    } catch (error) {
      errors.handleError(error, options);
    }
  }

  for (const file of settings.includeFiles) {
    if (!interpreter.readIncludeFile(file)) {
      errors.handleError(
        new CommandError(`include file not found: ${file}`, `include ${file}`),
        options
      );
    }
  }
}

/**
 * Runs the console. With `--eval` the lines are processed and the session
 * ends, unless `--interactive` keeps it open.
 */
export async function main(argv: string[] = process.argv.slice(2), deps: CLIDependencies = {}): Promise<void> {
  const errors = deps.errorHandler ?? new ErrorHandler();
  const options = parseOptions(argv);

  const loader = new ConfigLoader(deps.cwd);
  const config = loader.resolve(loader.load());
  configureLogging(options, config);
  const settings = resolveSettings(options, config);
  logger.debug('Session settings', { ...settings });

  const terminal = new TerminalConsole({
    input: deps.input,
    output: deps.output,
    lineWidth: settings.lineWidth,
    maxLineCount: settings.maxLineCount,
    complete: line => interpreter.complete(line),
    onInterrupt: () => interpreter.interrupt()
  });

  const interpreter: Interpreter = new Interpreter({
    console: terminal,
    compiler: deps.compiler,
    declarationMode: settings.declarationMode,
    showCode: settings.showCode,
    basePath: deps.cwd
  });

  try {
    prepareSession(interpreter, settings, errors, options);

    for (const line of options.eval) {
      interpreter.processLine(line);
    }
    if (options.eval.length > 0 && !options.interactive) {
      return;
    }

    terminal.writeText(chalk.gray(`chunkshell ${version}, /v lists variables, Ctrl+D exits\n`));
    interpreter.start();
    await terminal.waitForClose();
  } finally {
    terminal.close();
    interpreter.dispose();
  }
}
