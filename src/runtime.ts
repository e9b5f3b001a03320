import { compile } from './compiler';
import { CompileError, RuntimeError } from './errors';
import { Heap } from './heap';
import { Value } from './value';
import { VM, VMOptions, Writer } from './vm';

export interface InterpretOptions extends VMOptions {
  /**
   * Receives compile diagnostics, one line each.
   */
  stderr?: Writer;
}

/**
 * Heap and global table carried from one run to the next. Only a REPL
 * session shares these; a plain `interpret` call gets fresh ones.
 */
export interface RuntimeState {
  heap: Heap;
  globals: Map<string, Value>;
}

export type InterpretResult =
  | { status: 'ok' }
  | { status: 'compile-error'; errors: CompileError[] }
  | { status: 'runtime-error'; error: RuntimeError };

const writeStderr: Writer = (text) => {
  process.stderr.write(text);
};

/**
 * Creates an empty runtime state.
 *
 * @returns Fresh heap and global table
 */
export function createRuntimeState(): RuntimeState {
  return { heap: new Heap(), globals: new Map() };
}

/**
 * Compiles and runs a program. Nothing executes unless the whole source
 * compiles; compile diagnostics are written to `stderr`, runtime errors
 * are returned without being printed.
 *
 * @param source - Code string
 * @param options - Output writers and tracing flag
 * @param state - Heap and globals to run against
 * @returns Outcome of the run
 */
export function interpret(
  source: string,
  options: InterpretOptions = {},
  state: RuntimeState = createRuntimeState(),
): InterpretResult {
  const result = compile(source, state.heap);

  if (!result.ok) {
    const stderr = options.stderr ?? writeStderr;
    result.errors.forEach((error) => stderr(`${error.toString()}\n`));
    return { status: 'compile-error', errors: result.errors };
  }

  const vm = new VM(result.chunk, result.heap, options, state.globals);
  try {
    vm.run();
  } catch (e) {
    if (e instanceof RuntimeError) {
      return { status: 'runtime-error', error: e };
    }
    throw e;
  }

  return { status: 'ok' };
}
