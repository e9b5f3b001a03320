#!/usr/bin/env node
import * as fs from 'fs';
import * as readline from 'readline';
import { Config, loadConfig } from './config';
import { Repl } from './repl';
import { InterpretOptions, InterpretResult, interpret } from './runtime';

/**
 * Process exit codes.
 */
export const EXIT_OK = 0;
export const EXIT_USAGE = 64;
export const EXIT_COMPILE_ERROR = 65;
export const EXIT_RUNTIME_ERROR = 70;
export const EXIT_IO_ERROR = 74;

const USAGE = 'Usage: loxvm [--trace] [path]';

/**
 * Writes a runtime error and maps a result to an exit code.
 *
 * @internal
 */
function settle(result: InterpretResult): number {
  switch (result.status) {
    case 'ok':
      return EXIT_OK;
    case 'compile-error':
      return EXIT_COMPILE_ERROR;
    case 'runtime-error':
      process.stderr.write(
        `${result.error.message}\n[line ${result.error.line}] in script\n`,
      );
      return EXIT_RUNTIME_ERROR;
  }
}

function runFile(path: string, options: InterpretOptions): number {
  let source: string;
  try {
    source = fs.readFileSync(path, 'utf8');
  } catch (e) {
    if (!(e instanceof Error)) {
      throw e;
    }
    process.stderr.write(`Could not open file "${path}": ${e.message}\n`);
    return EXIT_IO_ERROR;
  }
  return settle(interpret(source, options));
}

async function runPrompt(options: InterpretOptions): Promise<number> {
  const repl = new Repl(options);
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '> ',
  });

  rl.prompt();
  for await (const line of rl) {
    settle(repl.exec(line));
    rl.prompt();
  }

  return EXIT_OK;
}

/**
 * Entry point: runs a script file, or starts the REPL when no path is
 * given.
 *
 * @param args - Command line arguments after the script name
 * @param config - Configuration read from the environment
 * @returns Exit code
 */
export async function main(
  args: string[],
  config: Config = loadConfig(),
): Promise<number> {
  const traceExecution = config.traceExecution || args.includes('--trace');
  const paths = args.filter((arg) => arg !== '--trace');
  const options: InterpretOptions = { traceExecution };

  if (paths.length === 0) {
    return runPrompt(options);
  }
  if (paths.length === 1) {
    return runFile(paths[0], options);
  }

  process.stderr.write(`${USAGE}\n`);
  return EXIT_USAGE;
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error(e);
      process.exitCode = 1;
    },
  );
}
