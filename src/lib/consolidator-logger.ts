export interface ConsolidatorLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

/**
 * Logger that writes to the console with a scope prefix, e.g. "[consolidator] ...".
 * Errors are printed with their stack.
 */
export function createConsoleLogger(scope = 'consolidator'): ConsolidatorLogger {
  const prefix = `[${scope}]`;
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message, error) => {
      if (error === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}`, error instanceof Error ? error.stack ?? error.message : error);
      }
    },
  };
}

export function createSilentLogger(): ConsolidatorLogger {
  return {
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
  };
}

/**
 * Runs `fn` and logs how long it took. Failures are logged with the elapsed time and rethrown.
 */
export async function timed<T>(logger: ConsolidatorLogger, label: string, fn: () => Promise<T>): Promise<T> {
  const startedAt = Date.now();
  try {
    const result = await fn();
    logger.info(`${label} completed in ${((Date.now() - startedAt) / 1000).toFixed(2)} seconds`);
    return result;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error(`${label} failed after ${((Date.now() - startedAt) / 1000).toFixed(2)} seconds: ${reason}`);
    throw error;
  }
}
