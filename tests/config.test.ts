import { TRACE_EXECUTION_VAR, loadConfig } from '../src/config';

describe('loadConfig', () => {
  test('should disable tracing by default', () => {
    expect(loadConfig({})).toEqual({ traceExecution: false });
  });

  test('should enable tracing whenever the variable is present', () => {
    ['1', 'true', ''].forEach((setting) => {
      expect(loadConfig({ [TRACE_EXECUTION_VAR]: setting })).toEqual({
        traceExecution: true,
      });
    });
  });
});
