/**
 * Environment variable enabling execution tracing when set to any value.
 */
export const TRACE_EXECUTION_VAR = 'LOX_TRACE_EXECUTION';

export interface Config {
  traceExecution: boolean;
}

/**
 * Reads configuration from the hosting environment. Called once at
 * startup; the result is passed explicitly to whatever needs it.
 *
 * @param env - Environment variables
 * @returns Resolved configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    traceExecution: env[TRACE_EXECUTION_VAR] !== undefined,
  };
}
