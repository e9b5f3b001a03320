import { Opcode, createInstruction } from './bytecode';
import { Chunk, MAX_CONSTANTS } from './chunk';
import { CompileError, ScanError } from './errors';
import { Heap } from './heap';
import { Precedence, RULES } from './precedence';
import { Scanner } from './scanner';
import { Token, TokenType, tokenIs } from './token';
import { Num, Value, newString } from './value';

/**
 * Deepest expression nesting accepted before compilation is abandoned.
 */
export const MAX_NESTING_DEPTH = 256;

/**
 * Two-token lookahead state of one compilation.
 */
interface ParserState {
  /**
   * Next token to be parsed.
   */
  current: Token;

  /**
   * Most recently consumed token.
   */
  previous: Token;

  hadError: boolean;

  /**
   * Set by the first unrecovered error; suppresses further diagnostics
   * until the next statement boundary.
   */
  panicMode: boolean;
}

/**
 * Outcome of a compilation. A chunk is only present when no error was
 * recorded.
 */
export type CompileResult =
  | { ok: true; chunk: Chunk; heap: Heap }
  | { ok: false; errors: CompileError[] };

/**
 * Single-pass compiler emitting bytecode directly from the token stream.
 * One instance translates exactly one source string.
 */
export class Compiler {
  private scanner: Scanner;
  private parser: ParserState;
  private chunk = new Chunk();
  private depth = 0;

  /**
   * Set when the constant pool overflows; no further declarations are
   * compiled.
   */
  private aborted = false;

  /**
   * Diagnostics recorded so far, in source order.
   */
  public readonly errors: CompileError[] = [];

  /**
   * Constructs a new compiler.
   *
   * @param source - Code string
   * @param heap - Heap that string constants are allocated in
   */
  constructor(
    source: string,
    private heap: Heap = new Heap(),
  ) {
    this.scanner = new Scanner(source);
    const start: Token = { tokenType: 'eof', lexeme: '', line: 1 };
    this.parser = {
      current: start,
      previous: start,
      hadError: false,
      panicMode: false,
    };
  }

  /**
   * Compiles a program: declarations until the end of input.
   *
   * @returns Chunk on success, otherwise the recorded diagnostics
   */
  compileProgram(): CompileResult {
    this.advance();
    while (!this.aborted && !this.match('eof')) {
      this.declaration();
    }
    return this.finish();
  }

  /**
   * Compiles a single expression whose value is left on the stack when
   * the chunk returns.
   *
   * @returns Chunk on success, otherwise the recorded diagnostics
   */
  compileExpression(): CompileResult {
    this.advance();
    this.expression();
    this.consume('eof', 'Expect end of expression.');
    return this.finish();
  }

  private finish(): CompileResult {
    this.emit(Opcode.RETURN);
    if (this.parser.hadError) {
      return { ok: false, errors: this.errors };
    }
    return { ok: true, chunk: this.chunk, heap: this.heap };
  }

  /** Errors **/

  private report(line: number, where: string, message: string): void {
    if (this.parser.panicMode) {
      return;
    }
    this.parser.panicMode = true;
    this.parser.hadError = true;
    this.errors.push(new CompileError(message, line, where));
  }

  private errorAt(token: Token, message: string): void {
    const where = tokenIs(token, 'eof') ? 'end' : `'${token.lexeme}'`;
    this.report(token.line, where, message);
  }

  private error(message: string): void {
    this.errorAt(this.parser.previous, message);
  }

  private errorAtCurrent(message: string): void {
    this.errorAt(this.parser.current, message);
  }

  /** Tokens **/

  /**
   * Steps through the scanner, reporting and skipping lexical errors,
   * and updates the current and previous tokens.
   *
   * @internal
   */
  private advance(): void {
    this.parser.previous = this.parser.current;

    for (;;) {
      try {
        this.parser.current = this.scanner.scanToken();
        return;
      } catch (e) {
        if (!(e instanceof ScanError)) {
          throw e;
        }
        this.report(e.line, '', e.message);
      }
    }
  }

  private check(tokenType: TokenType): boolean {
    return tokenIs(this.parser.current, tokenType);
  }

  private match(tokenType: TokenType): boolean {
    if (!this.check(tokenType)) {
      return false;
    }
    this.advance();
    return true;
  }

  private consume(tokenType: TokenType, message: string): void {
    if (this.check(tokenType)) {
      this.advance();
      return;
    }
    this.errorAtCurrent(message);
  }

  /**
   * Discards tokens until a statement boundary so that independent
   * errors later in the source are still reported.
   *
   * @internal
   */
  private synchronize(): void {
    while (!this.check('eof') && !this.atStatementBoundary()) {
      this.advance();
    }

    // Lexical errors in the skipped tokens stay suppressed until here.
    this.parser.panicMode = false;
  }

  private atStatementBoundary(): boolean {
    if (tokenIs(this.parser.previous, 'semicolon')) {
      return true;
    }
    switch (this.parser.current.tokenType) {
      case 'class':
      case 'fun':
      case 'var':
      case 'for':
      case 'if':
      case 'while':
      case 'print':
      case 'return':
        return true;
      default:
        return false;
    }
  }

  /** Emission **/

  /**
   * Emits one instruction tagged with the line of the previous token.
   *
   * @param op - Opcode
   * @param operands - Operand values
   */
  private emit(op: Opcode, ...operands: number[]): void {
    this.chunk.writeInstruction(
      createInstruction(op, ...operands),
      this.parser.previous.line,
    );
  }

  private makeConstant(value: Value): number {
    if (this.chunk.constants.length >= MAX_CONSTANTS) {
      this.error('Too many constants in one chunk.');
      this.aborted = true;
      return 0;
    }
    return this.chunk.addConstant(value);
  }

  private emitConstant(value: Value): void {
    this.emit(Opcode.CONSTANT, this.makeConstant(value));
  }

  private identifierConstant(name: Token): number {
    return this.makeConstant(newString(this.heap, name.lexeme));
  }

  /** Declarations and statements **/

  private declaration(): void {
    if (this.match('var')) {
      this.varDeclaration();
    } else {
      this.statement();
    }

    if (this.parser.panicMode) {
      this.synchronize();
    }
  }

  private varDeclaration(): void {
    this.consume('identifier', 'Expect variable name.');
    const global = this.identifierConstant(this.parser.previous);

    if (this.match('assign')) {
      this.expression();
    } else {
      this.emit(Opcode.NIL);
    }
    this.consume('semicolon', "Expect ';' after variable declaration.");

    this.emit(Opcode.DEFINE_GLOBAL, global);
  }

  private statement(): void {
    if (this.match('print')) {
      this.printStatement();
    } else {
      this.expressionStatement();
    }
  }

  private printStatement(): void {
    this.expression();
    this.consume('semicolon', "Expect ';' after value.");
    this.emit(Opcode.PRINT);
  }

  private expressionStatement(): void {
    this.expression();
    this.consume('semicolon', "Expect ';' after expression.");
    this.emit(Opcode.POP);
  }

  /** Expressions **/

  private expression(): void {
    this.parsePrecedence(Precedence.ASSIGNMENT);
  }

  /**
   * Parses any expression binding at least as tightly as `precedence`.
   *
   * @param precedence - Lowest precedence accepted
   */
  private parsePrecedence(precedence: number): void {
    if (this.depth >= MAX_NESTING_DEPTH) {
      this.errorAtCurrent('Expression too deeply nested.');
      return;
    }

    this.depth++;
    try {
      this.advance();
      const prefix = RULES[this.parser.previous.tokenType].prefix;
      if (!prefix) {
        this.error('Expect expression.');
        return;
      }

      const canAssign = precedence <= Precedence.ASSIGNMENT;
      prefix(this, canAssign);

      while (
        precedence <= RULES[this.parser.current.tokenType].precedence
      ) {
        this.advance();
        const infix = RULES[this.parser.previous.tokenType].infix;
        if (!infix) {
          this.error('Expect expression.');
          return;
        }
        infix(this, canAssign);
      }

      if (canAssign && this.match('assign')) {
        this.error('Invalid assignment target.');
      }
    } finally {
      this.depth--;
    }
  }

  grouping(): void {
    this.expression();
    this.consume('rparen', "Expect ')' after expression.");
  }

  unary(): void {
    const operator = this.parser.previous.tokenType;

    this.parsePrecedence(Precedence.UNARY);

    switch (operator) {
      case 'minus':
        this.emit(Opcode.NEGATE);
        break;
      case 'bang':
        this.emit(Opcode.NOT);
        break;
    }
  }

  /**
   * Compiles the right operand one level above the operator's own
   * precedence, which makes operators of equal precedence associate
   * to the left.
   */
  binary(): void {
    const operator = this.parser.previous.tokenType;

    this.parsePrecedence(RULES[operator].precedence + 1);

    switch (operator) {
      case 'plus':
        this.emit(Opcode.ADD);
        break;
      case 'minus':
        this.emit(Opcode.SUBTRACT);
        break;
      case 'star':
        this.emit(Opcode.MULTIPLY);
        break;
      case 'slash':
        this.emit(Opcode.DIVIDE);
        break;
      case 'eq':
        this.emit(Opcode.EQUAL);
        break;
      case 'bangeq':
        this.emit(Opcode.EQUAL);
        this.emit(Opcode.NOT);
        break;
      case 'gt':
        this.emit(Opcode.GREATER);
        break;
      case 'gte':
        this.emit(Opcode.LESS);
        this.emit(Opcode.NOT);
        break;
      case 'lt':
        this.emit(Opcode.LESS);
        break;
      case 'lte':
        this.emit(Opcode.GREATER);
        this.emit(Opcode.NOT);
        break;
    }
  }

  number(): void {
    this.emitConstant(new Num(Number(this.parser.previous.lexeme)));
  }

  string(): void {
    // Strip the surrounding quotes.
    const chars = this.parser.previous.lexeme.slice(1, -1);
    this.emitConstant(newString(this.heap, chars));
  }

  literal(): void {
    switch (this.parser.previous.tokenType) {
      case 'false':
        this.emit(Opcode.FALSE);
        break;
      case 'nil':
        this.emit(Opcode.NIL);
        break;
      case 'true':
        this.emit(Opcode.TRUE);
        break;
    }
  }

  /**
   * Compiles a global read, or an assignment when followed by `=` in a
   * context that allows one.
   */
  variable(canAssign: boolean): void {
    const arg = this.identifierConstant(this.parser.previous);

    if (canAssign && this.match('assign')) {
      this.expression();
      this.emit(Opcode.SET_GLOBAL, arg);
    } else {
      this.emit(Opcode.GET_GLOBAL, arg);
    }
  }
}

/**
 * Compiles a program into a chunk.
 *
 * @param source - Code string
 * @param heap - Heap that string constants are allocated in
 * @returns Compilation result
 */
export function compile(source: string, heap?: Heap): CompileResult {
  return new Compiler(source, heap).compileProgram();
}

/**
 * Compiles a lone expression into a chunk that returns its value.
 *
 * @param source - Expression string
 * @param heap - Heap that string constants are allocated in
 * @returns Compilation result
 */
export function compileExpression(source: string, heap?: Heap): CompileResult {
  return new Compiler(source, heap).compileExpression();
}
