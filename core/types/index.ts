export type {
  Diagnostic,
  DiagnosticKind,
  OutputTarget,
  LoadableUnit,
  CompileResult,
  CompilerBackend
} from './compiler';
export type {
  RuntimeConstructor,
  TypeDescriptor,
  LoadedUnit,
  ReflectionHost,
  MemberScope,
  MemberInfo,
  MemberReflector
} from './reflection';
export { isConstructor } from './reflection';
export type { LineCallback, ConsoleHost } from './console';
export type { AddressingMode } from './session';
export { PROMPT_START, PROMPT_CONTINUATION, RESULT_SLOT, SESSION_SLOT } from './session';
