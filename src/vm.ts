import { AssertionError } from 'assert';
import { Opcode, decodeOpcode } from './bytecode';
import { Chunk } from './chunk';
import { disassembleInstruction, formatStack } from './debug';
import { EvaluationError, RuntimeError } from './errors';
import { Heap } from './heap';
import * as value from './value';

/**
 * Constants
 */
export const STACK_MAX = 256;

/**
 * Sink for one piece of text, including any trailing newline.
 */
export type Writer = (text: string) => void;

export interface VMOptions {
  /**
   * Write the stack and the next instruction before every step.
   */
  traceExecution?: boolean;

  /**
   * Receives `print` output.
   */
  stdout?: Writer;

  /**
   * Receives execution traces.
   */
  trace?: Writer;
}

const writeStdout: Writer = (text) => {
  process.stdout.write(text);
};

/**
 * Virtual stack machine for executing one chunk.
 */
export class VM {
  private stack: value.Value[] = [];
  private ip = 0;

  /**
   * Bytecode of the chunk, read once; the chunk is not written after
   * compilation.
   */
  private readonly code: Uint8Array;

  private traceExecution: boolean;
  private stdout: Writer;
  private trace: Writer;

  /**
   * Constructs a new VM instance.
   *
   * @param chunk - Fully compiled chunk; never modified
   * @param heap - Heap the chunk's constants live in
   * @param options - Output writers and tracing flag
   * @param variables - Global table; a fresh one unless lent by a session
   */
  constructor(
    private readonly chunk: Chunk,
    private readonly heap: Heap,
    options: VMOptions = {},
    private variables: Map<string, value.Value> = new Map(),
  ) {
    this.code = chunk.code;
    this.traceExecution = options.traceExecution ?? false;
    this.stdout = options.stdout ?? writeStdout;
    this.trace = options.trace ?? writeStdout;
  }

  /**
   * Global variables defined so far.
   */
  get globals(): ReadonlyMap<string, value.Value> {
    return this.variables;
  }

  /**
   * Pushes a new value onto the VM stack.
   *
   * @param v - New value
   *
   * @internal
   */
  private push(v: value.Value): void {
    if (this.stack.length >= STACK_MAX) {
      this.fail('Maximum stack size exceeded', 'stack-overflow');
    }
    this.stack.push(v);
  }

  /**
   * Pops a value off the VM stack.
   *
   * @internal
   */
  private pop(): value.Value {
    const v = this.stack.pop();
    if (v === undefined) {
      // eslint-disable-next-line @typescript-eslint/no-unsafe-call
      throw new AssertionError({
        message:
          'Attempting to pop an empty stack. This is an error in the compiler.',
      });
    }
    return v;
  }

  private peek(): value.Value {
    const v = this.stack[this.stack.length - 1];
    if (v === undefined) {
      // eslint-disable-next-line @typescript-eslint/no-unsafe-call
      throw new AssertionError({
        message:
          'Attempting to read an empty stack. This is an error in the compiler.',
      });
    }
    return v;
  }

  /**
   * Reads a one-byte operand and advances past it.
   *
   * @internal
   */
  private readOperand(): number {
    return this.code[this.ip++];
  }

  /**
   * Reads a global name from the constant pool.
   *
   * @internal
   */
  private readName(): string {
    const name = value.asString(
      this.chunk.readConstant(this.readOperand()),
      this.heap,
    );
    if (!name) {
      // eslint-disable-next-line @typescript-eslint/no-unsafe-call
      throw new AssertionError({
        message: 'Global name operand is not a string constant',
      });
    }
    return name.chars;
  }

  /**
   * Aborts the run with an error tagged with the current instruction's
   * source line.
   *
   * @internal
   */
  private fail(message: string, kind: RuntimeError['kind']): never {
    const line = this.chunk.lines[Math.max(this.ip - 1, 0)] ?? 0;
    throw new RuntimeError(message, line, kind);
  }

  /**
   * Executes the chunk until it returns.
   *
   * @returns Value left on top of the stack at the return, if any
   * @throws {@link RuntimeError} on the first runtime fault
   */
  run(): value.Value | undefined {
    const code = this.code;

    while (this.ip < code.length) {
      if (this.traceExecution) {
        this.trace(`          ${formatStack(this.stack, this.heap)}\n`);
        const [, text] = disassembleInstruction(this.chunk, this.heap, this.ip);
        this.trace(`${text}\n`);
      }

      const op = decodeOpcode(code[this.ip++]);

      if (op === Opcode.RETURN) {
        return this.stack[this.stack.length - 1];
      }

      try {
        this.execute(op);
      } catch (e) {
        if (e instanceof EvaluationError) {
          this.fail(e.message, e.kind);
        }
        throw e;
      }
    }

    // eslint-disable-next-line @typescript-eslint/no-unsafe-call
    throw new AssertionError({
      message: 'Chunk ended without a return instruction',
    });
  }

  /**
   * Executes a single decoded instruction.
   *
   * @param op - Opcode other than RETURN
   *
   * @internal
   */
  private execute(op: Opcode): void {
    switch (op) {
      case Opcode.CONSTANT:
        this.push(this.chunk.readConstant(this.readOperand()));
        break;
      case Opcode.NIL:
        this.push(value.NIL);
        break;
      case Opcode.TRUE:
        this.push(value.TRUE);
        break;
      case Opcode.FALSE:
        this.push(value.FALSE);
        break;
      case Opcode.NEGATE:
        this.push(value.negate(this.pop()));
        break;
      case Opcode.NOT:
        this.push(value.Bool.from(value.isFalsey(this.pop())));
        break;
      case Opcode.ADD:
      case Opcode.SUBTRACT:
      case Opcode.MULTIPLY:
      case Opcode.DIVIDE:
        this.execBinaryArithmetic(op);
        break;
      case Opcode.EQUAL:
      case Opcode.GREATER:
      case Opcode.LESS:
        this.execComparison(op);
        break;
      case Opcode.PRINT:
        this.stdout(`${value.inspect(this.pop(), this.heap)}\n`);
        break;
      case Opcode.POP:
        this.pop();
        break;
      case Opcode.DEFINE_GLOBAL: {
        const name = this.readName();
        this.variables.set(name, this.peek());
        this.pop();
        break;
      }
      case Opcode.GET_GLOBAL: {
        const name = this.readName();
        const v = this.variables.get(name);
        if (v === undefined) {
          this.fail(`Undefined variable '${name}'.`, 'undefined-variable');
        }
        this.push(v);
        break;
      }
      case Opcode.SET_GLOBAL: {
        const name = this.readName();
        if (!this.variables.has(name)) {
          this.fail(`Undefined variable '${name}'.`, 'undefined-variable');
        }
        this.variables.set(name, this.peek());
        break;
      }
      case Opcode.RETURN:
        // eslint-disable-next-line @typescript-eslint/no-unsafe-call
        throw new AssertionError({
          message: 'Return is handled by the run loop',
        });
    }
  }

  /**
   * Pops the last two items off of the stack, performs a binary
   * operation, and pushes its result onto the stack.
   *
   * @param op - Opcode byte
   *
   * @internal
   */
  private execBinaryArithmetic(op: Opcode): void {
    const right = this.pop();
    const left = this.pop();

    switch (op) {
      case Opcode.ADD:
        this.push(value.add(left, right, this.heap));
        break;
      case Opcode.SUBTRACT:
        this.push(value.subtract(left, right));
        break;
      case Opcode.MULTIPLY:
        this.push(value.multiply(left, right));
        break;
      case Opcode.DIVIDE:
        this.push(value.divide(left, right));
        break;
      default:
        throw new Error(`Unhandled binary operator: ${op}`);
    }
  }

  /**
   * Pops the last two items off of the stack, performs a comparison
   * operation, and pushes its result onto the stack.
   *
   * @param op - Opcode byte
   *
   * @internal
   */
  private execComparison(op: Opcode): void {
    const right = this.pop();
    const left = this.pop();

    switch (op) {
      case Opcode.EQUAL:
        this.push(value.Bool.from(value.valuesEqual(left, right, this.heap)));
        break;
      case Opcode.GREATER:
        this.push(value.greater(left, right));
        break;
      case Opcode.LESS:
        this.push(value.less(left, right));
        break;
      default:
        throw new Error(`Unhandled comparison operator: ${op}`);
    }
  }
}
