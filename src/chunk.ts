import { AssertionError } from 'assert';
import { Instruction } from './bytecode';
import { Value } from './value';

/**
 * Constant indices are a single unsigned byte.
 */
export const MAX_CONSTANTS = 256;

/**
 * Compiled unit: bytecode, one source line per byte, and a constant pool.
 *
 * Only the compiler writes to a chunk. Once handed to the VM it is read
 * and never modified.
 */
export class Chunk {
  private buffer = new Uint8Array(16);
  private count = 0;

  /**
   * Source line of each byte in `code`.
   */
  public readonly lines: number[] = [];

  /**
   * Literal values and global names referenced by operands.
   */
  public readonly constants: Value[] = [];

  /**
   * Serial bytecode instructions written so far.
   */
  get code(): Uint8Array {
    return this.buffer.subarray(0, this.count);
  }

  get length(): number {
    return this.count;
  }

  /**
   * Appends one byte.
   *
   * @param byte - Opcode or operand byte
   * @param line - Source line of the token that produced it
   */
  write(byte: number, line: number): void {
    if (this.count === this.buffer.length) {
      const grown = new Uint8Array(this.buffer.length * 2);
      grown.set(this.buffer);
      this.buffer = grown;
    }
    this.buffer[this.count++] = byte;
    this.lines.push(line);
  }

  /**
   * Appends every byte of a packed instruction.
   *
   * @param instruction - Instruction bytes
   * @param line - Source line of the token that produced it
   * @returns Offset of the instruction's first byte
   */
  writeInstruction(instruction: Instruction, line: number): number {
    const position = this.count;
    instruction.forEach((byte) => this.write(byte, line));
    return position;
  }

  /**
   * Adds a value to the constant pool.
   *
   * @param value - Constant value
   * @returns Index of the constant
   */
  addConstant(value: Value): number {
    if (this.constants.length >= MAX_CONSTANTS) {
      throw new RangeError(
        `A chunk cannot hold more than ${MAX_CONSTANTS} constants`,
      );
    }
    this.constants.push(value);
    return this.constants.length - 1;
  }

  /**
   * Reads a constant referenced by an operand.
   *
   * @param index - Constant pool index
   * @returns Constant value
   */
  readConstant(index: number): Value {
    const value = this.constants[index];
    if (value === undefined) {
      // eslint-disable-next-line @typescript-eslint/no-unsafe-call
      throw new AssertionError({
        message: `Constant ${index} is out of range. This is an error in the compiler.`,
      });
    }
    return value;
  }
}
