import { ScanError } from './errors';
import { Token, TokenType, lookupIdentifier } from './token';

/**
 * Returns if the provided character is alphabetic.
 *
 * @internal
 * @param char - Character
 * @returns True if alphabetic
 */
function isAlpha(char: string): boolean {
  return (
    ('a' <= char && char <= 'z') ||
    ('A' <= char && char <= 'Z') ||
    char === '_'
  );
}

/**
 * Returns if the provided character is numeric.
 *
 * @internal
 * @param char - Character
 * @returns True if numeric
 */
function isNumeric(char: string): boolean {
  return char.length === 1 && '0' <= char && char <= '9';
}

/**
 * Returns if the provided character is alphanumeric.
 *
 * @internal
 * @param char - Character
 * @returns True if alphanumeric
 */
function isAlphaNumeric(char: string): boolean {
  return isAlpha(char) || isNumeric(char);
}

/**
 * Pull-based scanner producing one token per call.
 */
export class Scanner {
  /**
   * Offset of the first character of the token being scanned.
   */
  private start = 0;

  /**
   * Offset of the next unread character.
   */
  private current = 0;

  private line = 1;

  /**
   * Constructs a new scanner.
   *
   * @param source - Code string
   */
  constructor(public readonly source: string) {}

  private isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  /**
   * Consumes and returns the next character.
   *
   * @internal
   */
  private advance(): string {
    const char = this.source.charAt(this.current);
    this.current++;
    return char;
  }

  /**
   * Returns the next character without consuming it, or an empty string
   * at the end of input.
   *
   * @internal
   */
  private peek(): string {
    return this.source.charAt(this.current);
  }

  private peekNext(): string {
    return this.source.charAt(this.current + 1);
  }

  /**
   * Consumes the next character only if it matches `expected`.
   *
   * @internal
   */
  private match(expected: string): boolean {
    if (this.isAtEnd() || this.peek() !== expected) {
      return false;
    }
    this.current++;
    return true;
  }

  /**
   * Skips whitespace, newlines and line comments until a significant
   * character is reached.
   *
   * @internal
   */
  private skipWhitespace(): void {
    for (;;) {
      switch (this.peek()) {
        case ' ':
        case '\r':
        case '\t':
          this.advance();
          break;
        case '\n':
          this.line++;
          this.advance();
          break;
        case '/':
          if (this.peekNext() !== '/') {
            return;
          }
          while (this.peek() !== '\n' && !this.isAtEnd()) {
            this.advance();
          }
          break;
        default:
          return;
      }
    }
  }

  /**
   * Creates a new token spanning `start` to `current`.
   *
   * @returns New token
   */
  private createToken(tokenType: TokenType): Token {
    return {
      tokenType,
      lexeme: this.source.slice(this.start, this.current),
      line: this.line,
    };
  }

  private readString(): Token {
    while (this.peek() !== '"' && !this.isAtEnd()) {
      if (this.peek() === '\n') {
        this.line++;
      }
      this.advance();
    }

    if (this.isAtEnd()) {
      throw new ScanError('Unterminated string.', this.line, this.start);
    }

    // Closing quote
    this.advance();
    return this.createToken('string');
  }

  /**
   * Reads a number literal. A trailing `.` without a digit after it is
   * left for the next token.
   *
   * @internal
   */
  private readNumber(): Token {
    while (isNumeric(this.peek())) {
      this.advance();
    }

    if (this.peek() === '.' && isNumeric(this.peekNext())) {
      this.advance();
      while (isNumeric(this.peek())) {
        this.advance();
      }
    }

    return this.createToken('number');
  }

  private readIdentifier(): Token {
    while (isAlphaNumeric(this.peek())) {
      this.advance();
    }
    const lexeme = this.source.slice(this.start, this.current);
    return this.createToken(lookupIdentifier(lexeme));
  }

  /**
   * Scans the next token. Once the input is exhausted every call returns
   * an `eof` token.
   *
   * @returns Next token
   * @throws {@link ScanError} on an unterminated string or an unexpected
   * character; the offending input is consumed so scanning can resume
   */
  scanToken(): Token {
    this.skipWhitespace();
    this.start = this.current;

    if (this.isAtEnd()) {
      return this.createToken('eof');
    }

    const char = this.advance();

    if (isAlpha(char)) {
      return this.readIdentifier();
    }
    if (isNumeric(char)) {
      return this.readNumber();
    }

    switch (char) {
      case '(':
        return this.createToken('lparen');
      case ')':
        return this.createToken('rparen');
      case '{':
        return this.createToken('lbrace');
      case '}':
        return this.createToken('rbrace');
      case ';':
        return this.createToken('semicolon');
      case ',':
        return this.createToken('comma');
      case '.':
        return this.createToken('dot');
      case '-':
        return this.createToken('minus');
      case '+':
        return this.createToken('plus');
      case '/':
        return this.createToken('slash');
      case '*':
        return this.createToken('star');
      case '!':
        return this.createToken(this.match('=') ? 'bangeq' : 'bang');
      case '=':
        return this.createToken(this.match('=') ? 'eq' : 'assign');
      case '<':
        return this.createToken(this.match('=') ? 'lte' : 'lt');
      case '>':
        return this.createToken(this.match('=') ? 'gte' : 'gt');
      case '"':
        return this.readString();
    }

    throw new ScanError('Unexpected character.', this.line, this.start);
  }
}
