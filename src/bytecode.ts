import { AssertionError } from 'assert';

/**
 * A small byte array representative of single instruction within a full
 * bytecode array.
 */
export type Instruction = Uint8Array;

/**
 * Byte value enumeration of an instruction's opcode (its first byte).
 * The numeric values are the wire encoding and must not be reordered.
 */
export enum Opcode {
  RETURN = 0,
  CONSTANT,
  NEGATE,
  ADD,
  SUBTRACT,
  MULTIPLY,
  DIVIDE,

  NIL,
  TRUE,
  FALSE,

  NOT,
  EQUAL,
  GREATER,
  LESS,

  PRINT,
  POP,

  DEFINE_GLOBAL,
  GET_GLOBAL,
  SET_GLOBAL,
}

/**
 * Instruction operation and its byte payload signature.
 */
export interface Operation {
  name: string;
  operands?: number[];
  size: number;
}

export const OPCODES: { [key: number]: Operation } = {};

const DECODE_TABLE = new Map<number, Opcode>();

// Precalculate all total opcode instruction sizes.
const operations: [op: Opcode, name: string, operands?: number[]][] = [
  [Opcode.RETURN, 'OP_RETURN'],
  [Opcode.CONSTANT, 'OP_CONSTANT', [1]],
  [Opcode.NEGATE, 'OP_NEGATE'],
  [Opcode.ADD, 'OP_ADD'],
  [Opcode.SUBTRACT, 'OP_SUBTRACT'],
  [Opcode.MULTIPLY, 'OP_MULTIPLY'],
  [Opcode.DIVIDE, 'OP_DIVIDE'],
  [Opcode.NIL, 'OP_NIL'],
  [Opcode.TRUE, 'OP_TRUE'],
  [Opcode.FALSE, 'OP_FALSE'],
  [Opcode.NOT, 'OP_NOT'],
  [Opcode.EQUAL, 'OP_EQUAL'],
  [Opcode.GREATER, 'OP_GREATER'],
  [Opcode.LESS, 'OP_LESS'],
  [Opcode.PRINT, 'OP_PRINT'],
  [Opcode.POP, 'OP_POP'],
  [Opcode.DEFINE_GLOBAL, 'OP_DEFINE_GLOBAL', [1]],
  [Opcode.GET_GLOBAL, 'OP_GET_GLOBAL', [1]],
  [Opcode.SET_GLOBAL, 'OP_SET_GLOBAL', [1]],
];

operations.forEach(([op, name, operands]) => {
  DECODE_TABLE.set(op, op);
  OPCODES[op] = {
    name,
    operands,
    size: operands ? operands.reduce((acc, cur) => acc + cur, 1) : 1,
  };
});

/**
 * Decodes an opcode byte.
 *
 * @param byte - First byte of an instruction
 * @returns Opcode if the byte is a known instruction, otherwise `undefined`
 */
export function lookupOpcode(byte: number): Opcode | undefined {
  return DECODE_TABLE.get(byte);
}

/**
 * Decodes an opcode byte, treating an unknown byte as a corrupt chunk.
 *
 * @param byte - First byte of an instruction
 * @returns Decoded opcode
 */
export function decodeOpcode(byte: number): Opcode {
  const op = lookupOpcode(byte);
  if (op === undefined) {
    // eslint-disable-next-line @typescript-eslint/no-unsafe-call
    throw new AssertionError({
      message: `Unknown opcode ${byte}. The chunk is corrupt.`,
    });
  }
  return op;
}

/**
 * Packs operand value of given bytes at an offset within an instruction array.
 *
 * @param arr - Instruction bytes
 * @param offset - Bytes into instruction
 * @param size - Byte width of operand
 * @param value - Value inserted into instruction at offset
 */
export function packBigEndian(
  arr: Instruction,
  offset: number,
  size: number,
  value: number,
): void {
  let n = value;
  while (size--) {
    arr[offset + size] = n & 255;
    n >>= 8;
  }
}

/**
 * Create new instruction, packing operands in big-endian byte order.
 *
 * @param op - Opcode value
 * @param args - Additional operands
 * @returns Packed instruction bytes
 */
export function createInstruction(
  op: Opcode,
  ...args: number[]
): Instruction {
  const operation = OPCODES[op];
  if (!operation) {
    return new Uint8Array(0);
  }

  const instruction = new Uint8Array(operation.size);
  instruction[0] = op;

  if (!operation.operands) {
    return instruction;
  }

  let offset = 1;
  for (let i = 0; i < operation.operands.length; i++) {
    packBigEndian(
      instruction,
      offset,
      operation.operands[i],
      args[i],
    );
    offset += operation.operands[i];
  }

  return instruction;
}
