/**
 * Console and process.exit capture for command handler tests
 */

export class ProcessExitError extends Error {
  constructor(readonly code: number | undefined) {
    super(`process.exit(${code})`);
    this.name = 'ProcessExitError';
  }
}

/**
 * Replace console.log and console.error with collectors
 */
export function mockConsole() {
  const logs: string[] = [];
  const errors: string[] = [];

  const originalLog = console.log;
  const originalError = console.error;

  console.log = (...args: unknown[]) => {
    logs.push(args.map(String).join(' '));
  };

  console.error = (...args: unknown[]) => {
    errors.push(args.map(String).join(' '));
  };

  return {
    logs,
    errors,
    restore: () => {
      console.log = originalLog;
      console.error = originalError;
    },
  };
}

/**
 * Make process.exit throw ProcessExitError instead of ending the test run
 */
export function mockProcessExit() {
  const originalExit = process.exit;
  let exitCode: number | undefined;
  let exitCalled = false;

  process.exit = ((code?: number) => {
    exitCode = code;
    exitCalled = true;
    throw new ProcessExitError(code);
  }) as never;

  return {
    getExitCode: () => exitCode,
    wasCalled: () => exitCalled,
    restore: () => {
      process.exit = originalExit;
    },
  };
}

/**
 * Run a command handler, turning a mocked process.exit into its exit code.
 * Resolves undefined when the handler returned normally.
 */
export async function captureExit(run: () => Promise<void>): Promise<number | undefined> {
  try {
    await run();
    return undefined;
  } catch (error) {
    if (error instanceof ProcessExitError) return error.code;
    throw error;
  }
}
