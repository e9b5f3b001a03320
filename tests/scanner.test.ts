import { ScanError } from '../src/errors';
import { Scanner } from '../src/scanner';
import { Token, TokenType } from '../src/token';

type ScannerTestCase = [input: string, expected: [TokenType, string][]];

/**
 * Scans an input up to (not including) the end-of-input token.
 *
 * @internal
 */
function scanAll(input: string): Token[] {
  const scanner = new Scanner(input);
  const tokens: Token[] = [];

  let token = scanner.scanToken();
  while (token.tokenType !== 'eof') {
    tokens.push(token);
    token = scanner.scanToken();
  }
  return tokens;
}

function testTokens(inputs: ScannerTestCase[]): void {
  inputs.forEach(([input, expected]) => {
    const tokens = scanAll(input);
    expect(tokens.map((t) => [t.tokenType, t.lexeme])).toEqual(expected);
  });
}

/**
 * Returns the scan error raised by the next token.
 *
 * @internal
 */
function nextError(scanner: Scanner): ScanError {
  try {
    scanner.scanToken();
  } catch (e) {
    if (e instanceof ScanError) {
      return e;
    }
    throw e;
  }
  throw new Error('Expected the scanner to raise an error');
}

describe('Scanner', () => {
  test('should tokenize single and double character operators', () => {
    testTokens([
      [
        '+-.,({;*})>>===!!==<<=/',
        [
          ['plus', '+'],
          ['minus', '-'],
          ['dot', '.'],
          ['comma', ','],
          ['lparen', '('],
          ['lbrace', '{'],
          ['semicolon', ';'],
          ['star', '*'],
          ['rbrace', '}'],
          ['rparen', ')'],
          ['gt', '>'],
          ['gte', '>='],
          ['eq', '=='],
          ['bang', '!'],
          ['bangeq', '!='],
          ['assign', '='],
          ['lt', '<'],
          ['lte', '<='],
          ['slash', '/'],
        ],
      ],
    ]);
  });

  test('should only match keywords against the whole identifier', () => {
    testTokens([
      [
        'and andy class classy or orchid print printer',
        [
          ['and', 'and'],
          ['identifier', 'andy'],
          ['class', 'class'],
          ['identifier', 'classy'],
          ['or', 'or'],
          ['identifier', 'orchid'],
          ['print', 'print'],
          ['identifier', 'printer'],
        ],
      ],
      [
        'var variable nil nil_ true truth _x1',
        [
          ['var', 'var'],
          ['identifier', 'variable'],
          ['nil', 'nil'],
          ['identifier', 'nil_'],
          ['true', 'true'],
          ['identifier', 'truth'],
          ['identifier', '_x1'],
        ],
      ],
    ]);
  });

  test('should leave a trailing dot out of number literals', () => {
    testTokens([
      ['123', [['number', '123']]],
      ['45.67', [['number', '45.67']]],
      [
        '8.',
        [
          ['number', '8'],
          ['dot', '.'],
        ],
      ],
      [
        '.5',
        [
          ['dot', '.'],
          ['number', '5'],
        ],
      ],
      [
        '3a',
        [
          ['number', '3'],
          ['identifier', 'a'],
        ],
      ],
    ]);
  });

  test('should skip comments and count lines', () => {
    const tokens = scanAll('// comment\nvar a; // trailing\n\nprint a;');
    expect(tokens.map((t) => [t.tokenType, t.line])).toEqual([
      ['var', 2],
      ['identifier', 2],
      ['semicolon', 2],
      ['print', 4],
      ['identifier', 4],
      ['semicolon', 4],
    ]);
  });

  test('should scan strings that span lines', () => {
    const tokens = scanAll('"a\nb" x');
    expect(tokens).toEqual([
      { tokenType: 'string', lexeme: '"a\nb"', line: 2 },
      { tokenType: 'identifier', lexeme: 'x', line: 2 },
    ]);
  });

  test('should report unterminated strings with their line and offset', () => {
    const scanner = new Scanner('var s = "abc');
    expect(scanner.scanToken().tokenType).toEqual('var');
    expect(scanner.scanToken().tokenType).toEqual('identifier');
    expect(scanner.scanToken().tokenType).toEqual('assign');

    const error = nextError(scanner);
    expect(error.message).toEqual('Unterminated string.');
    expect(error.line).toEqual(1);
    expect(error.offset).toEqual(8);

    expect(scanner.scanToken().tokenType).toEqual('eof');

    const multiline = nextError(new Scanner('"ab\ncd'));
    expect(multiline.line).toEqual(2);
    expect(multiline.offset).toEqual(0);
  });

  test('should skip unexpected characters after reporting them', () => {
    const scanner = new Scanner('@ 1');

    const error = nextError(scanner);
    expect(error.message).toEqual('Unexpected character.');
    expect(error.offset).toEqual(0);

    expect(scanner.scanToken()).toEqual({
      tokenType: 'number',
      lexeme: '1',
      line: 1,
    });
  });

  test('should keep returning the end-of-input token', () => {
    const empty = new Scanner('');
    for (let i = 0; i < 3; i++) {
      expect(empty.scanToken()).toEqual({
        tokenType: 'eof',
        lexeme: '',
        line: 1,
      });
    }

    const scanner = new Scanner('x\n');
    expect(scanner.scanToken().tokenType).toEqual('identifier');
    expect(scanner.scanToken()).toEqual({
      tokenType: 'eof',
      lexeme: '',
      line: 2,
    });
    expect(scanner.scanToken().tokenType).toEqual('eof');
  });
});
