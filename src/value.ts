/**
 * Runtime value types and their operators.
 */

import { EvaluationError } from './errors';
import { Handle, Heap, HeapObjectType, LoxString } from './heap';

/**
 * Value type label.
 *
 * @public
 */
export type ValueType = 'nil' | 'boolean' | 'number' | 'object';

/**
 * Base value type interface.
 *
 * @public
 */
export interface BaseValue {
  type: ValueType;
}

/**
 * Nil type, contains no additional data.
 *
 * @public
 */
export class Nil implements BaseValue {
  readonly type = 'nil';
}

/**
 * Boolean type.
 *
 * @public
 */
export class Bool implements BaseValue {
  readonly type = 'boolean';

  constructor(public readonly value: boolean) {}

  static from(value: boolean): Bool {
    return value ? TRUE : FALSE;
  }
}

/**
 * Double-precision number type.
 *
 * @public
 */
export class Num implements BaseValue {
  readonly type = 'number';

  constructor(public readonly value: number) {}
}

/**
 * Reference to an object living in a {@link Heap}.
 *
 * @public
 */
export class Obj implements BaseValue {
  readonly type = 'object';

  constructor(
    public readonly objectType: HeapObjectType,
    public readonly handle: Handle,
  ) {}
}

/**
 * Closed union of every runtime value.
 *
 * @public
 */
export type Value = Nil | Bool | Num | Obj;

/**
 * Literals
 */
export const NIL = new Nil();
export const TRUE = new Bool(true);
export const FALSE = new Bool(false);

/**
 * Allocates a string on the heap and wraps it in a value.
 *
 * @param heap - Owning heap
 * @param chars - String contents
 * @returns String value
 */
export function newString(heap: Heap, chars: string): Obj {
  return new Obj('string', heap.allocate(new LoxString(chars)));
}

/**
 * Resolves a value to its string payload, if it is one.
 *
 * @param value - Any value
 * @param heap - Heap the value was allocated in
 * @returns String payload or `undefined`
 */
export function asString(value: Value, heap: Heap): LoxString | undefined {
  if (value instanceof Obj && value.objectType === 'string') {
    const object = heap.get(value.handle);
    if (object instanceof LoxString) {
      return object;
    }
  }
  return undefined;
}

/**
 * User-facing type name, naming heap objects by their payload type.
 *
 * @internal
 */
function typeName(value: Value): string {
  return value instanceof Obj ? value.objectType : value.type;
}

/**
 * Display form used by `print`.
 *
 * @param value - Any value
 * @param heap - Heap the value was allocated in
 * @returns Printable text
 */
export function inspect(value: Value, heap: Heap): string {
  if (value instanceof Num) {
    // `toString` drops the sign of negative zero.
    return Object.is(value.value, -0) ? '-0' : value.value.toString();
  }
  if (value instanceof Bool) {
    return value.value ? 'true' : 'false';
  }
  if (value instanceof Obj) {
    return heap.get(value.handle).inspectObject();
  }
  return 'nil';
}

/**
 * Determines if a value is falsey. Only `nil` and `false` are; zero and
 * the empty string are truthy.
 *
 * @param value - Any value
 * @returns True if falsey
 */
export function isFalsey(value: Value): boolean {
  return value instanceof Nil || (value instanceof Bool && !value.value);
}

/**
 * Structural equality across all value types. Values of different types
 * are never equal.
 *
 * @param a - Left operand
 * @param b - Right operand
 * @param heap - Heap both values were allocated in
 * @returns True if equal
 */
export function valuesEqual(a: Value, b: Value, heap: Heap): boolean {
  if (a instanceof Nil) {
    return b instanceof Nil;
  }
  if (a instanceof Bool) {
    return b instanceof Bool && a.value === b.value;
  }
  if (a instanceof Num) {
    return b instanceof Num && a.value === b.value;
  }
  if (!(b instanceof Obj)) {
    return false;
  }
  const left = asString(a, heap);
  const right = asString(b, heap);
  return !!left && !!right && left.chars === right.chars;
}

type ArithmeticOperator = '+' | '-' | '*' | '/';

const OPERATION_NAMES: Record<ArithmeticOperator, string> = {
  '+': 'addition',
  '-': 'subtraction',
  '*': 'multiplication',
  '/': 'division',
};

function arithmeticError(
  operator: ArithmeticOperator,
  a: Value,
  b: Value,
): EvaluationError {
  return new EvaluationError(
    `Cannot perform ${OPERATION_NAMES[operator]} (${operator}) between types ${typeName(a)} and ${typeName(b)}`,
    'arithmetic',
  );
}

/**
 * Adds two numbers or concatenates two strings into a new heap string.
 *
 * @throws {@link EvaluationError} for any other pairing
 */
export function add(a: Value, b: Value, heap: Heap): Value {
  if (a instanceof Num && b instanceof Num) {
    return new Num(a.value + b.value);
  }

  const left = asString(a, heap);
  const right = asString(b, heap);
  if (left && right) {
    return newString(heap, left.chars + right.chars);
  }

  throw arithmeticError('+', a, b);
}

export function subtract(a: Value, b: Value): Value {
  if (a instanceof Num && b instanceof Num) {
    return new Num(a.value - b.value);
  }
  throw arithmeticError('-', a, b);
}

export function multiply(a: Value, b: Value): Value {
  if (a instanceof Num && b instanceof Num) {
    return new Num(a.value * b.value);
  }
  throw arithmeticError('*', a, b);
}

/**
 * Divides two numbers. Division by zero yields `Infinity` or `NaN`.
 */
export function divide(a: Value, b: Value): Value {
  if (a instanceof Num && b instanceof Num) {
    return new Num(a.value / b.value);
  }
  throw arithmeticError('/', a, b);
}

export function negate(value: Value): Value {
  if (value instanceof Num) {
    return new Num(-value.value);
  }
  throw new EvaluationError(
    `Cannot perform unary negation (-) on type ${typeName(value)}`,
    'negation',
  );
}

/**
 * Orders two numbers. Ordering is not defined for any other type.
 *
 * @internal
 */
function compareNumbers(
  operator: '>' | '<',
  a: Value,
  b: Value,
): [number, number] {
  if (a instanceof Num && b instanceof Num) {
    return [a.value, b.value];
  }
  throw new EvaluationError(
    `Operands of comparison (${operator}) must be numbers, got ${typeName(a)} and ${typeName(b)}`,
    'comparison',
  );
}

export function greater(a: Value, b: Value): Bool {
  const [left, right] = compareNumbers('>', a, b);
  return Bool.from(left > right);
}

export function less(a: Value, b: Value): Bool {
  const [left, right] = compareNumbers('<', a, b);
  return Bool.from(left < right);
}
