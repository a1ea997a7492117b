import { ZodError } from "zod";

import { formatIssues } from "../shared/config.js";
import type { Logger } from "../types.js";

export interface BatchOptions {
  /** Report a failing item and move on to the next one */
  continueOnError?: boolean;
  logger: Logger;
}

/**
 * `<ErrorKind>: <message>` for a diagnostic line
 */
export function formatFailure(error: unknown): string {
  if (error instanceof ZodError) {
    return `InvalidOptions: ${formatIssues(error)}`;
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Run a handler over each item. By default the first failure stops the batch;
 * with `continueOnError` every item is attempted. Returns whether all items
 * succeeded.
 */
export function runBatch<T>(
  items: readonly T[],
  handler: (item: T) => void,
  { continueOnError = false, logger }: BatchOptions,
): boolean {
  let failures = 0;

  for (const item of items) {
    try {
      handler(item);
    } catch (error) {
      failures++;
      logger.error(`ERROR: ${formatFailure(error)}`);
      if (!continueOnError) {
        return false;
      }
    }
  }

  if (items.length > 1) {
    logger.log(
      `Done: ${items.length - failures} succeeded, ${failures} failed`,
    );
  }

  return failures === 0;
}
