#!/usr/bin/env node
/**
 * Lox CLI entry point.
 *
 * Usage: lox
 *        lox <file.lox>
 *        lox run <file.lox>
 *        lox run --ast <file.json>
 *        lox check <file.lox> [...]
 *        lox ast <file.lox>
 *        lox --eval "<code>"
 *
 * `--no-resolve` may appear anywhere and turns off the resolver.
 */

import {
  EXIT_NO_INPUT,
  EXIT_OK,
  EXIT_USAGE,
  readSource,
  runAst,
  runCheck,
  runJsonAst,
  runSource,
} from './commands';
import { startRepl } from './repl';

const VERSION = '0.1.0';

/**
 * Run the CLI with the given arguments (without node and script path).
 * Returns the exit code, or null when the REPL has taken over.
 */
export function main(argv: string[]): number | null {
  const noResolve = argv.includes('--no-resolve');
  const args = argv.filter(arg => arg !== '--no-resolve');
  const options = { resolve: !noResolve };

  if (args.length === 0) {
    startRepl({ resolve: !noResolve });
    return null;
  }

  if (args[0] === '--help' || args[0] === '-h') {
    printUsage();
    return EXIT_OK;
  }

  if (args[0] === '--eval' || args[0] === '-e') {
    if (args.length !== 2) {
      console.error('Error: --eval requires a code argument');
      return EXIT_USAGE;
    }
    return runSource(args[1], '<eval>', options);
  }

  if (args[0] === 'check') {
    const files = args.slice(1);
    if (files.length === 0) {
      console.error('Error: check requires at least one file argument');
      return EXIT_USAGE;
    }
    return runCheck(files);
  }

  if (args[0] === 'ast') {
    if (args.length !== 2) {
      console.error('Error: ast requires exactly one file argument');
      return EXIT_USAGE;
    }
    const source = readSource(args[1]);
    return source === null ? EXIT_NO_INPUT : runAst(source, args[1]);
  }

  if (args[0] === 'run') {
    const rest = args.slice(1);
    const asJson = rest[0] === '--ast';
    const files = asJson ? rest.slice(1) : rest;
    if (files.length !== 1) {
      console.error('Error: run requires exactly one file argument');
      return EXIT_USAGE;
    }
    const source = readSource(files[0]);
    if (source === null) return EXIT_NO_INPUT;
    return asJson ? runJsonAst(source, files[0], options) : runSource(source, files[0], options);
  }

  if (args.length > 1 || args[0].startsWith('-')) {
    console.error(`Error: unexpected arguments: ${args.join(' ')}`);
    printUsage();
    return EXIT_USAGE;
  }

  // `lox <file.lox>` (shorthand)
  const source = readSource(args[0]);
  return source === null ? EXIT_NO_INPUT : runSource(source, args[0], options);
}

function printUsage(): void {
  console.log(`Lox v${VERSION}`);
  console.log('');
  console.log('Usage:');
  console.log('  lox                            Start interactive REPL');
  console.log('  lox <file.lox>                 Run a Lox file');
  console.log('  lox run <file.lox>             Run a Lox file');
  console.log('  lox run --ast <file.json>      Run a JSON syntax tree');
  console.log('  lox check <file.lox> [...]     Check files for syntax and scope errors');
  console.log('  lox ast <file.lox>             Print the JSON syntax tree');
  console.log('  lox --eval "<code>"            Evaluate inline code');
  console.log('  lox --help                     Show this help');
  console.log('');
  console.log('Options:');
  console.log('  --no-resolve                   Skip the resolver; look variables up dynamically');
}

if (require.main === module) {
  const code = main(process.argv.slice(2));
  if (code !== null) process.exitCode = code;
}
