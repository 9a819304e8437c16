/**
 * Lox REPL: interactive read-eval-print loop.
 *
 * Features:
 *   - Persistent globals across inputs
 *   - Multi-line input (detects unclosed braces/parens)
 *   - Special commands: :help, :quit, :env, :reset
 *   - Errors are printed and the loop continues
 *   - A lone expression statement echoes its value (unless nil)
 */

import * as readline from 'readline';
import {
  Interpreter,
  LoxError,
  OutputSink,
  parse,
  stdoutSink,
  stringify,
} from '../../interpreter/src';
import { formatDiagnostic, resolve } from '../../resolver/src';

const VERSION = '0.1.0';

export interface ReplOptions {
  output?: OutputSink;
  /** Run the resolver on each input (default true) */
  resolve?: boolean;
}

/**
 * Interpreter state shared by every input of one REPL session.
 */
export class ReplSession {
  private interpreter: Interpreter;
  private readonly output: OutputSink;
  private readonly useResolver: boolean;

  constructor(options: ReplOptions = {}) {
    this.output = options.output ?? stdoutSink;
    this.useResolver = options.resolve ?? true;
    this.interpreter = new Interpreter({ output: this.output });
  }

  /**
   * Parse, resolve and run one complete input.
   * Returns false if it failed; the error has been printed.
   */
  run(input: string): boolean {
    const result = parse(input);
    if (result.hasErrors) {
      for (const err of result.errors) {
        console.error(`  Parse error at line ${err.line}, col ${err.column}: ${err.message}`);
      }
      return false;
    }

    if (this.useResolver) {
      const resolved = resolve(result.statements, {
        globals: this.interpreter.globals.names(),
        reportUndefined: false,
      });
      if (resolved.hasErrors) {
        for (const d of resolved.diagnostics) {
          console.error(`  ${formatDiagnostic(d)}`);
        }
        return false;
      }
      this.interpreter.addResolutions(resolved.resolutions);
    }

    try {
      const [only] = result.statements;
      if (result.statements.length === 1 && only.kind === 'expression') {
        const value = this.interpreter.evaluate(only.expression);
        if (value.kind !== 'nil') this.output.print(`=> ${stringify(value)}`);
      } else {
        this.interpreter.interpret(result.statements);
      }
      return true;
    } catch (e) {
      if (e instanceof LoxError) {
        console.error(`  ${e.message}`);
        return false;
      }
      throw e;
    }
  }

  /** Drop every user binding and start over with only the natives. */
  reset(): void {
    this.interpreter = new Interpreter({ output: this.output });
  }

  /**
   * One line per user-defined global, in definition order.
   */
  describeEnvironment(): string[] {
    const globals = this.interpreter.globals;
    const lines: string[] = [];
    for (const name of globals.names()) {
      const value = globals.get(name);
      // Skip natives for readability
      if (value.kind === 'native') continue;
      const preview = stringify(value);
      const truncated = preview.length > 60 ? preview.slice(0, 57) + '...' : preview;
      lines.push(`  ${name} = ${truncated}`);
    }
    return lines;
  }
}

/**
 * Start the Lox REPL on standard input.
 */
export function startRepl(options: ReplOptions = {}): void {
  const session = new ReplSession(options);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'lox> ',
    terminal: process.stdin.isTTY,
  });

  console.log(`Lox REPL v${VERSION}`);
  console.log('Type :help for commands, :quit to exit.\n');

  let buffer = '';
  let multiLine = false;

  rl.prompt();

  rl.on('line', (line: string) => {
    const trimmed = line.trim();

    // Special commands only when not in multi-line mode
    if (!multiLine && trimmed.startsWith(':')) {
      handleCommand(trimmed, session, rl);
      rl.prompt();
      return;
    }

    buffer += (buffer ? '\n' : '') + line;

    if (hasUnclosedDelimiters(buffer)) {
      multiLine = true;
      process.stdout.write('  ... ');
      return;
    }

    multiLine = false;
    const input = buffer.trim();
    buffer = '';

    if (input !== '') session.run(input);
    rl.prompt();
  });

  rl.on('close', () => {
    console.log('\nGoodbye!');
  });
}

/**
 * Check whether the input has unclosed braces or parentheses.
 * String contents and line comments are ignored.
 */
export function hasUnclosedDelimiters(input: string): boolean {
  let braces = 0;
  let parens = 0;
  let inString = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inString) {
      if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
      continue;
    }

    if (ch === '/' && input[i + 1] === '/') {
      while (i < input.length && input[i] !== '\n') i++;
      continue;
    }

    switch (ch) {
      case '{': braces++; break;
      case '}': braces--; break;
      case '(': parens++; break;
      case ')': parens--; break;
    }
  }

  // An open string also spans lines
  return inString || braces > 0 || parens > 0;
}

/**
 * Handle a REPL special command.
 */
export function handleCommand(cmd: string, session: ReplSession, rl: Pick<readline.Interface, 'close'>): void {
  const command = cmd.split(/\s+/)[0];

  switch (command) {
    case ':help':
    case ':h':
      console.log('');
      console.log('REPL Commands:');
      console.log('  :help, :h       Show this help message');
      console.log('  :quit, :q       Exit the REPL');
      console.log('  :env            Show user-defined globals');
      console.log('  :reset          Forget every definition');
      console.log('');
      console.log('Tips:');
      console.log('  - Multi-line input: leave braces/parens unclosed');
      console.log('  - A lone expression prints its value');
      console.log('  - Variables persist between inputs');
      console.log('');
      break;

    case ':quit':
    case ':q':
    case ':exit':
      rl.close();
      break;

    case ':env': {
      const lines = session.describeEnvironment();
      if (lines.length === 0) {
        console.log('  (no user-defined variables)');
      } else {
        for (const line of lines) console.log(line);
      }
      break;
    }

    case ':reset':
      session.reset();
      console.log('Interpreter state reset.');
      break;

    default:
      console.log(`Unknown command: ${command}. Type :help for available commands.`);
      break;
  }
}
