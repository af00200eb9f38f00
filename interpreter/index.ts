export { Interpreter, defaultAlias } from './Interpreter';
export type { InterpreterOptions } from './Interpreter';
export { LineAccumulator } from './input/LineAccumulator';
export type { FeedResult } from './input/LineAccumulator';
export { LineRequestSlot } from './input/LineRequestSlot';
export { MacroPreprocessor } from './preprocess/MacroPreprocessor';
export { MacroTable } from './preprocess/MacroTable';
export type { MacroEntry } from './preprocess/MacroTable';
export { SymbolRewriter } from './rewrite/SymbolRewriter';
export { VariableEnvironment } from './env/VariableEnvironment';
export { SessionContext } from './env/SessionContext';
export { TypeResolver } from './types/TypeResolver';
export { TypeNamer } from './types/TypeNamer';
export { CompilationPipeline, chooseDiagnostics } from './compile/CompilationPipeline';
export type { CompiledFragment, PipelineResult } from './compile/CompilationPipeline';
export { ValueFormatter } from './execution/ValueFormatter';
export { ResultReporter } from './execution/ResultReporter';
export { MetaService } from './meta/MetaService';
export type { Completion } from './meta/completion';
export { CommandProcessor } from './commands/CommandProcessor';
