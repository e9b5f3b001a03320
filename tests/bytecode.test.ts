import { AssertionError } from 'assert';
import {
  Opcode,
  OPCODES,
  createInstruction,
  decodeOpcode,
  lookupOpcode,
  packBigEndian,
} from '../src/bytecode';

describe('packBigEndian', () => {
  test('should pack one-byte constant indices after the opcode', () => {
    const inputs: [index: number, expected: number[]][] = [
      [0, [Opcode.GET_GLOBAL, 0]],
      [1, [Opcode.GET_GLOBAL, 1]],
      [128, [Opcode.GET_GLOBAL, 128]],
      [255, [Opcode.GET_GLOBAL, 255]],
    ];

    inputs.forEach(([index, expected]) => {
      const arr = new Uint8Array([Opcode.GET_GLOBAL, 0]);
      packBigEndian(arr, 1, 1, index);
      expect(Array.from(arr)).toEqual(expected);
    });
  });
});

describe('createInstruction', () => {
  test('should create a new instruction', () => {
    const inputs: [op: Opcode, args: number[], expected: number[]][] = [
      [Opcode.RETURN, [], [0]],
      [Opcode.CONSTANT, [254], [1, 254]],
      [Opcode.NEGATE, [], [2]],
      [Opcode.ADD, [], [3]],
      [Opcode.SUBTRACT, [], [4]],
      [Opcode.MULTIPLY, [], [5]],
      [Opcode.DIVIDE, [], [6]],
      [Opcode.NIL, [], [7]],
      [Opcode.TRUE, [], [8]],
      [Opcode.FALSE, [], [9]],
      [Opcode.NOT, [], [10]],
      [Opcode.EQUAL, [], [11]],
      [Opcode.GREATER, [], [12]],
      [Opcode.LESS, [], [13]],
      [Opcode.PRINT, [], [14]],
      [Opcode.POP, [], [15]],
      [Opcode.DEFINE_GLOBAL, [0], [16, 0]],
      [Opcode.GET_GLOBAL, [7], [17, 7]],
      [Opcode.SET_GLOBAL, [255], [18, 255]],
    ];

    inputs.forEach(([op, args, expected]) => {
      const instruction = createInstruction(op, ...args);
      expect(Array.from(instruction)).toEqual(expected);
      expect(OPCODES[op].size).toEqual(expected.length);
    });
  });
});

describe('decodeOpcode', () => {
  test('should decode every known byte', () => {
    for (let byte = 0; byte <= Opcode.SET_GLOBAL; byte++) {
      expect(decodeOpcode(byte)).toEqual(byte);
    }
  });

  test('should reject unknown bytes', () => {
    [19, 100, 255].forEach((byte) => {
      expect(lookupOpcode(byte)).toBeUndefined();
      expect(() => decodeOpcode(byte)).toThrow(AssertionError);
    });
  });
});
