import {
  InterpretOptions,
  InterpretResult,
  RuntimeState,
  createRuntimeState,
  interpret,
} from './runtime';

const MAX_REPL_HISTORY = 100;

/**
 * Read-eval-print loop for executing code from the command line. Globals
 * defined on one line stay visible to the lines after it.
 */
export class Repl {
  private state: RuntimeState;
  private history: string[] = [];

  /**
   * Constructs a new REPL instance.
   *
   * @param options - Output writers and tracing flag for every run
   */
  constructor(private options: InterpretOptions = {}) {
    this.state = createRuntimeState();
  }

  /**
   * Execute a snippet of code passed through the REPL.
   *
   * @param input - Code snippet
   * @returns Outcome of the run
   */
  exec(input: string): InterpretResult {
    this.history.push(input);
    while (this.history.length > MAX_REPL_HISTORY) {
      this.history.shift();
    }

    return interpret(input, this.options, this.state);
  }

  /**
   * Get a previously run code snippet.
   *
   * @param offset - Position from end of history record
   * @returns Previously run snippet
   */
  getPreviousEntry(offset: number = 0): string | undefined {
    if (offset >= this.history.length) return;
    return this.history[this.history.length - offset - 1];
  }

  /**
   * Forgets every global and heap object defined so far.
   */
  reset(): void {
    this.state = createRuntimeState();
  }
}
