/**
 * Public surface of the Lox resolver package.
 */

export { resolve, Resolver, ResolveOptions, ResolveResult } from './resolver';
export { Scope } from './scope';
export { Diagnostic, formatDiagnostic, formatDiagnostics } from './diagnostics';
