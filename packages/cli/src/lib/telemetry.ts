/**
 * Command timing
 */

import type { Logger } from "@bookshelf/sdk";

/**
 * Run a command and log its duration and outcome at debug level
 */
export async function withTiming<T>(
  label: string,
  logger: Logger,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    logger.debug("cli.timing", {
      command: label,
      duration_ms: Date.now() - start,
      success,
    });
  }
}
