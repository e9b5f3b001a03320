/**
 * Token record produced by the scanner.
 */
export interface Token {
  tokenType: TokenType;
  lexeme: string;
  line: number;
}

/**
 * List of allowed token types
 */
export type TokenType =
  // Single-character tokens
  | 'lparen'
  | 'rparen'
  | 'lbrace'
  | 'rbrace'
  | 'comma'
  | 'dot'
  | 'minus'
  | 'plus'
  | 'semicolon'
  | 'slash'
  | 'star'
  // One or two character tokens
  | 'bang'
  | 'bangeq'
  | 'assign'
  | 'eq'
  | 'gt'
  | 'gte'
  | 'lt'
  | 'lte'
  // Literals
  | 'identifier'
  | 'string'
  | 'number'
  // Keywords
  | 'and'
  | 'class'
  | 'else'
  | 'false'
  | 'for'
  | 'fun'
  | 'if'
  | 'nil'
  | 'or'
  | 'print'
  | 'return'
  | 'super'
  | 'this'
  | 'true'
  | 'var'
  | 'while'
  | 'eof';

/**
 * Reserved words, matched against the whole lexeme.
 *
 * @internal
 */
const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
  ['and', 'and'],
  ['class', 'class'],
  ['else', 'else'],
  ['false', 'false'],
  ['for', 'for'],
  ['fun', 'fun'],
  ['if', 'if'],
  ['nil', 'nil'],
  ['or', 'or'],
  ['print', 'print'],
  ['return', 'return'],
  ['super', 'super'],
  ['this', 'this'],
  ['true', 'true'],
  ['var', 'var'],
  ['while', 'while'],
]);

/**
 * Determines if an identifier lexeme is a reserved keyword.
 *
 * @param lexeme - Identifier text
 * @returns Keyword token type if reserved, otherwise `identifier`
 */
export function lookupIdentifier(lexeme: string): TokenType {
  return KEYWORDS.get(lexeme) ?? 'identifier';
}

/**
 * Confirms that a token is of a particular token type.
 *
 * @param token Token record
 * @param tokenType Token type string
 * @returns True if token type matches
 */
export function tokenIs(token: Token, tokenType: TokenType): boolean {
  return token.tokenType === tokenType;
}
