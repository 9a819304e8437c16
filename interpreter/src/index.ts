/**
 * Public surface of the Lox interpreter package.
 */

export * from './ast';
export * from './tokens';
export * from './errors';
export * from './values';
export { scan, Scanner, ScanResult } from './lexer';
export { parse, parseOrThrow, Parser, ParseResult, MAX_ARGUMENTS } from './parser';
export { Environment } from './environment';
export { Callable, FunctionObject, NativeFunction, NativeImpl } from './callable';
export { CLOCK, NATIVES, registerBuiltins } from './builtins';
export {
  Interpreter,
  InterpreterOptions,
  OutputSink,
  BufferSink,
  stdoutSink,
} from './interpreter';
export {
  ExprJson,
  StmtJson,
  LocJson,
  exprSchema,
  stmtSchema,
  programSchema,
  programFromJson,
  programToJson,
  exprToJson,
  stmtToJson,
} from './json-ast';
