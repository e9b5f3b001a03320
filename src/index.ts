/**
 * lox-bytecode
 *
 * A single-pass bytecode compiler and stack virtual machine for the
 * globals-only subset of Lox.
 *
 * Released under the MIT License.
 */

/**
 * Error types.
 */
import * as errors from './errors';

/**
 * Runtime value types and operators.
 */
import * as value from './value';

export { Scanner } from './scanner';
export { Compiler, CompileResult, compile, compileExpression } from './compiler';
export { Chunk, MAX_CONSTANTS } from './chunk';
export { Opcode, OPCODES, createInstruction, decodeOpcode } from './bytecode';
export { Heap, Handle, LoxString } from './heap';
export { VM, VMOptions, Writer, STACK_MAX } from './vm';
export { Token, TokenType, tokenIs } from './token';
export { Repl } from './repl';
export {
  interpret,
  InterpretOptions,
  InterpretResult,
  RuntimeState,
  createRuntimeState,
} from './runtime';
export { Config, loadConfig } from './config';
export { disassembleChunk, disassembleInstruction } from './debug';

export { errors, value };
