import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  EXIT_COMPILE_ERROR,
  EXIT_IO_ERROR,
  EXIT_OK,
  EXIT_RUNTIME_ERROR,
  EXIT_USAGE,
  main,
} from '../src/cli';

const config = { traceExecution: false };

describe('main', () => {
  let dir: string;
  let stdout: jest.SpyInstance;
  let stderr: jest.SpyInstance;

  const written = (spy: jest.SpyInstance): string[] =>
    spy.mock.calls.map((call: unknown[]) => String(call[0]));

  const script = (name: string, source: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, source);
    return file;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'loxvm-'));
    stdout = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    stdout.mockRestore();
    stderr.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('should run a script file', async () => {
    const file = script('ok.lox', 'var a = 2;\nprint a * 21;\n');

    expect(await main([file], config)).toEqual(EXIT_OK);
    expect(written(stdout)).toEqual(['42\n']);
    expect(written(stderr)).toEqual([]);
  });

  test('should exit with 65 on compile errors', async () => {
    const file = script('bad.lox', 'print 1\n');

    expect(await main([file], config)).toEqual(EXIT_COMPILE_ERROR);
    expect(written(stderr)).toEqual([
      "[line 2] Error at end: Expect ';' after value.\n",
    ]);
  });

  test('should exit with 70 on runtime errors', async () => {
    const file = script('fail.lox', 'print 1;\n\nprint -"x";\n');

    expect(await main([file], config)).toEqual(EXIT_RUNTIME_ERROR);
    expect(written(stdout)).toEqual(['1\n']);
    expect(written(stderr)).toEqual([
      'Cannot perform unary negation (-) on type string\n[line 3] in script\n',
    ]);
  });

  test('should exit with 74 when the file cannot be read', async () => {
    const missing = path.join(dir, 'missing.lox');

    expect(await main([missing], config)).toEqual(EXIT_IO_ERROR);
    const [message] = written(stderr);
    expect(message.startsWith(`Could not open file "${missing}": `)).toBe(true);
  });

  test('should print usage for extra arguments', async () => {
    expect(await main(['a.lox', 'b.lox'], config)).toEqual(EXIT_USAGE);
    expect(written(stderr)).toEqual(['Usage: loxvm [--trace] [path]\n']);
  });

  test('should trace execution when asked to', async () => {
    const file = script('trace.lox', 'print 1;');

    expect(await main(['--trace', file], config)).toEqual(EXIT_OK);
    expect(written(stdout)).toEqual([
      '          \n',
      "0000    1 OP_CONSTANT         0 '1'\n",
      '          [ 1 ]\n',
      '0002    | OP_PRINT\n',
      '1\n',
      '          \n',
      '0003    | OP_RETURN\n',
    ]);
  });
});
