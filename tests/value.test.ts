import { EvaluationError } from '../src/errors';
import { Heap } from '../src/heap';
import {
  FALSE,
  NIL,
  Num,
  TRUE,
  Value,
  add,
  asString,
  divide,
  greater,
  inspect,
  isFalsey,
  less,
  negate,
  newString,
  subtract,
  valuesEqual,
} from '../src/value';

/**
 * Returns the evaluation error raised by an operator.
 *
 * @internal
 */
function evaluationError(fn: () => Value): EvaluationError {
  try {
    fn();
  } catch (e) {
    if (e instanceof EvaluationError) {
      return e;
    }
    throw e;
  }
  throw new Error('Expected an evaluation error');
}

describe('Value', () => {
  test('should treat only nil and false as falsey', () => {
    const heap = new Heap();
    const inputs: [value: Value, expected: boolean][] = [
      [NIL, true],
      [FALSE, true],
      [TRUE, false],
      [new Num(0), false],
      [new Num(-1), false],
      [newString(heap, ''), false],
    ];

    inputs.forEach(([value, expected]) => {
      expect(isFalsey(value)).toEqual(expected);
    });
  });

  test('should compare strings by contents', () => {
    const heap = new Heap();
    const a = newString(heap, 'lox');
    const b = newString(heap, 'lox');
    const c = newString(heap, 'LOX');

    expect(a.handle).not.toEqual(b.handle);
    expect(valuesEqual(a, b, heap)).toEqual(true);
    expect(valuesEqual(a, c, heap)).toEqual(false);
    expect(valuesEqual(a, NIL, heap)).toEqual(false);
    expect(valuesEqual(NIL, a, heap)).toEqual(false);
  });

  test('should never equate values of different types', () => {
    const heap = new Heap();
    expect(valuesEqual(new Num(0), FALSE, heap)).toEqual(false);
    expect(valuesEqual(NIL, FALSE, heap)).toEqual(false);
    expect(valuesEqual(new Num(1), newString(heap, '1'), heap)).toEqual(false);
    expect(valuesEqual(new Num(NaN), new Num(NaN), heap)).toEqual(false);
    expect(valuesEqual(new Num(2), new Num(2), heap)).toEqual(true);
  });

  test('should allocate a new string when concatenating', () => {
    const heap = new Heap();
    const result = add(newString(heap, 'foo'), newString(heap, 'bar'), heap);

    expect(asString(result, heap)?.chars).toEqual('foobar');
    expect(heap.size).toEqual(3);
    expect(inspect(add(new Num(1), new Num(2), heap), heap)).toEqual('3');
  });

  test('should render values for printing', () => {
    const heap = new Heap();
    const inputs: [value: Value, expected: string][] = [
      [NIL, 'nil'],
      [TRUE, 'true'],
      [FALSE, 'false'],
      [new Num(3), '3'],
      [new Num(-0.5), '-0.5'],
      [new Num(1e21), '1e+21'],
      [newString(heap, 'text'), 'text'],
    ];

    inputs.forEach(([value, expected]) => {
      expect(inspect(value, heap)).toEqual(expected);
    });
  });

  test('should name operand types in operator errors', () => {
    const heap = new Heap();
    const s = newString(heap, 's');

    const inputs: [fn: () => Value, message: string][] = [
      [
        () => add(s, new Num(1), heap),
        'Cannot perform addition (+) between types string and number',
      ],
      [
        () => add(NIL, NIL, heap),
        'Cannot perform addition (+) between types nil and nil',
      ],
      [
        () => subtract(TRUE, new Num(1)),
        'Cannot perform subtraction (-) between types boolean and number',
      ],
      [
        () => divide(new Num(1), s),
        'Cannot perform division (/) between types number and string',
      ],
      [() => negate(s), 'Cannot perform unary negation (-) on type string'],
      [
        () => greater(NIL, new Num(1)),
        'Operands of comparison (>) must be numbers, got nil and number',
      ],
      [
        () => less(s, s),
        'Operands of comparison (<) must be numbers, got string and string',
      ],
    ];

    inputs.forEach(([fn, message]) => {
      expect(evaluationError(fn).message).toEqual(message);
    });
  });

  test('should order numbers', () => {
    expect(greater(new Num(2), new Num(1))).toBe(TRUE);
    expect(less(new Num(2), new Num(1))).toBe(FALSE);
    expect(less(new Num(1), new Num(1))).toBe(FALSE);
  });
});
