import type { Compiler } from './compiler';
import { TokenType } from './token';

/**
 * Defines a precedence order for operations
 * when evaluating an expression.
 */
export enum Precedence {
  NONE = 0,
  ASSIGNMENT,
  OR,
  AND,
  EQUALITY,
  COMPARISON,
  TERM,
  FACTOR,
  UNARY,
  CALL,
  PRIMARY,
}

/**
 * Prefix or infix action. `canAssign` is true when the expression began
 * at assignment precedence or lower.
 */
export type ParseFn = (compiler: Compiler, canAssign: boolean) => void;

export interface ParseRule {
  prefix?: ParseFn;
  infix?: ParseFn;
  precedence: Precedence;
}

const grouping: ParseFn = (compiler) => compiler.grouping();
const unary: ParseFn = (compiler) => compiler.unary();
const binary: ParseFn = (compiler) => compiler.binary();
const number: ParseFn = (compiler) => compiler.number();
const string: ParseFn = (compiler) => compiler.string();
const literal: ParseFn = (compiler) => compiler.literal();
const variable: ParseFn = (compiler, canAssign) =>
  compiler.variable(canAssign);

const NO_RULE: ParseRule = { precedence: Precedence.NONE };

/**
 * Assigns parse actions and precedence values to every token type.
 */
export const RULES: Readonly<Record<TokenType, ParseRule>> = {
  lparen: { prefix: grouping, precedence: Precedence.NONE },
  rparen: NO_RULE,
  lbrace: NO_RULE,
  rbrace: NO_RULE,
  comma: NO_RULE,
  dot: NO_RULE,
  minus: { prefix: unary, infix: binary, precedence: Precedence.TERM },
  plus: { infix: binary, precedence: Precedence.TERM },
  semicolon: NO_RULE,
  slash: { infix: binary, precedence: Precedence.FACTOR },
  star: { infix: binary, precedence: Precedence.FACTOR },
  bang: { prefix: unary, precedence: Precedence.NONE },
  bangeq: { infix: binary, precedence: Precedence.EQUALITY },
  assign: NO_RULE,
  eq: { infix: binary, precedence: Precedence.EQUALITY },
  gt: { infix: binary, precedence: Precedence.COMPARISON },
  gte: { infix: binary, precedence: Precedence.COMPARISON },
  lt: { infix: binary, precedence: Precedence.COMPARISON },
  lte: { infix: binary, precedence: Precedence.COMPARISON },
  identifier: { prefix: variable, precedence: Precedence.NONE },
  string: { prefix: string, precedence: Precedence.NONE },
  number: { prefix: number, precedence: Precedence.NONE },
  and: NO_RULE,
  class: NO_RULE,
  else: NO_RULE,
  false: { prefix: literal, precedence: Precedence.NONE },
  for: NO_RULE,
  fun: NO_RULE,
  if: NO_RULE,
  nil: { prefix: literal, precedence: Precedence.NONE },
  or: NO_RULE,
  print: NO_RULE,
  return: NO_RULE,
  super: NO_RULE,
  this: NO_RULE,
  true: { prefix: literal, precedence: Precedence.NONE },
  var: NO_RULE,
  while: NO_RULE,
  eof: NO_RULE,
};
