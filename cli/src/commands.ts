/**
 * Command implementations behind the `lox` entry point.
 *
 * Each command returns a process exit code instead of exiting, so the
 * entry point decides how to end the process and tests can call the
 * commands directly.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  Interpreter,
  JsonAstError,
  LoxRuntimeError,
  OutputSink,
  Stmt,
  parse,
  programFromJson,
  programToJson,
  stdoutSink,
} from '../../interpreter/src';
import { formatDiagnostic, resolve } from '../../resolver/src';

export const EXIT_OK = 0;
export const EXIT_USAGE = 64;
export const EXIT_DATA_ERROR = 65;
export const EXIT_NO_INPUT = 66;
export const EXIT_SOFTWARE = 70;

export interface RunOptions {
  /** Where `print` writes; defaults to standard output */
  output?: OutputSink;
  /** Run the resolver before executing (default true) */
  resolve?: boolean;
}

/**
 * Read a source file, reporting a missing one. Returns null if the
 * file does not exist.
 */
export function readSource(filepath: string): string | null {
  const resolved = path.resolve(filepath);
  if (!fs.existsSync(resolved)) {
    console.error(`Error: File not found: ${resolved}`);
    return null;
  }
  return fs.readFileSync(resolved, 'utf-8');
}

/**
 * Parse and run Lox source text.
 */
export function runSource(source: string, filename: string, options: RunOptions = {}): number {
  const result = parse(source);
  if (result.hasErrors) {
    console.error(`Parse errors in ${filename}:`);
    for (const err of result.errors) {
      console.error(`  Line ${err.line}, Col ${err.column}: ${err.message}`);
    }
    return EXIT_DATA_ERROR;
  }
  return runProgram(result.statements, filename, options);
}

/**
 * Validate and run a JSON syntax tree.
 */
export function runJsonAst(text: string, filename: string, options: RunOptions = {}): number {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    if (e instanceof SyntaxError) {
      console.error(`Invalid JSON in ${filename}: ${e.message}`);
      return EXIT_DATA_ERROR;
    }
    throw e;
  }

  let statements: Stmt[];
  try {
    statements = programFromJson(json);
  } catch (e) {
    if (e instanceof JsonAstError) {
      console.error(`Invalid syntax tree in ${filename}:`);
      for (const issue of e.issues) {
        console.error(`  ${issue.path || '<root>'}: ${issue.message}`);
      }
      return EXIT_DATA_ERROR;
    }
    throw e;
  }

  return runProgram(statements, filename, options);
}

/**
 * Resolve (unless disabled) and interpret a parsed program.
 */
export function runProgram(statements: Stmt[], filename: string, options: RunOptions = {}): number {
  const interpreter = new Interpreter({ output: options.output ?? stdoutSink });

  if (options.resolve ?? true) {
    const resolved = resolve(statements, { globals: interpreter.globals.names() });
    if (resolved.hasErrors) {
      console.error(`Resolve errors in ${filename}:`);
      for (const d of resolved.diagnostics) {
        console.error(`  ${formatDiagnostic(d)}`);
      }
      return EXIT_DATA_ERROR;
    }
    interpreter.addResolutions(resolved.resolutions);
  }

  try {
    interpreter.interpret(statements);
  } catch (e) {
    if (e instanceof LoxRuntimeError) {
      console.error(e.message);
      return EXIT_SOFTWARE;
    }
    throw e;
  }
  return EXIT_OK;
}

/**
 * Run parse and resolver validation on one or more files.
 */
export function runCheck(files: string[]): number {
  let missing = false;
  let hasAnyErrors = false;

  for (const filepath of files) {
    const source = readSource(filepath);
    if (source === null) {
      missing = true;
      continue;
    }

    const result = parse(source);
    if (result.hasErrors) {
      hasAnyErrors = true;
      const count = result.errors.length;
      console.log(`✗ ${filepath}: ${count} parse error${count === 1 ? '' : 's'}`);
      for (const err of result.errors) {
        console.log(`  Line ${err.line}, Col ${err.column}: ${err.message}`);
      }
      // Resolving a partial tree would only add noise
      continue;
    }

    const { diagnostics } = resolve(result.statements);
    if (diagnostics.length === 0) {
      console.log(`✓ ${filepath}: no errors`);
      continue;
    }

    hasAnyErrors = true;
    const count = diagnostics.length;
    console.log(`✗ ${filepath}: ${count} error${count === 1 ? '' : 's'}`);
    for (const d of diagnostics) {
      console.log(`  ${formatDiagnostic(d)}`);
    }
  }

  if (missing) return EXIT_NO_INPUT;
  return hasAnyErrors ? EXIT_DATA_ERROR : EXIT_OK;
}

/**
 * Print the JSON syntax tree of a source file.
 */
export function runAst(source: string, filename: string): number {
  const result = parse(source);
  if (result.hasErrors) {
    console.error(`Parse errors in ${filename}:`);
    for (const err of result.errors) {
      console.error(`  Line ${err.line}, Col ${err.column}: ${err.message}`);
    }
    return EXIT_DATA_ERROR;
  }
  console.log(JSON.stringify(programToJson(result.statements), null, 2));
  return EXIT_OK;
}
