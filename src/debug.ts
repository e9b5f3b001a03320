import { OPCODES, lookupOpcode } from './bytecode';
import { Chunk } from './chunk';
import { Heap } from './heap';
import { Value, inspect } from './value';

/**
 * Renders a possibly missing value for diagnostics.
 *
 * @internal
 */
function describeValue(v: Value | undefined, heap: Heap): string {
  return v === undefined ? '<undef>' : inspect(v, heap);
}

/**
 * Disassembles the instruction at an offset.
 *
 * @param chunk - Compiled chunk
 * @param heap - Heap the chunk's constants live in
 * @param offset - Offset of an instruction's first byte
 * @returns Offset of the next instruction and the formatted line
 */
export function disassembleInstruction(
  chunk: Chunk,
  heap: Heap,
  offset: number,
): [next: number, text: string] {
  const address = `0000${offset}`.slice(-4);
  const line =
    offset > 0 && chunk.lines[offset] === chunk.lines[offset - 1]
      ? '   |'
      : `${chunk.lines[offset]}`.padStart(4);
  const prefix = `${address} ${line} `;

  const byte = chunk.code[offset];
  const op = lookupOpcode(byte);
  if (op === undefined) {
    return [offset + 1, `${prefix}Unknown opcode ${byte}`];
  }

  const { name, operands, size } = OPCODES[op];
  if (!operands) {
    return [offset + size, `${prefix}${name}`];
  }

  const index = chunk.code[offset + 1];
  const constant = describeValue(chunk.constants[index], heap);
  return [
    offset + size,
    `${prefix}${name.padEnd(16)} ${`${index}`.padStart(4)} '${constant}'`,
  ];
}

/**
 * Disassemble a chunk into a more human-readable format.
 *
 * @param chunk - Compiled chunk
 * @param heap - Heap the chunk's constants live in
 * @param name - Header label
 * @returns Stringified bytecode, one instruction per line
 */
export function disassembleChunk(
  chunk: Chunk,
  heap: Heap,
  name: string,
): string {
  let output = `== ${name} ==\n`;
  let offset = 0;

  while (offset < chunk.length) {
    const [next, text] = disassembleInstruction(chunk, heap, offset);
    output += `${text}\n`;
    offset = next;
  }

  return output;
}

/**
 * Pretty-prints the operand stack, bottom first.
 *
 * @param stack - Operand stack
 * @param heap - Heap the values live in
 * @returns Stringified stack items
 */
export function formatStack(stack: readonly Value[], heap: Heap): string {
  return stack.map((v) => `[ ${describeValue(v, heap)} ]`).join('');
}
