import { EXIT_FAILURE, EXIT_USAGE, USAGE } from "../configuration/constants";
import { describeError, UsageError } from "../utils/errors";
import type { Logger } from "../utils/logger";

/**
 * Reports a failed command and picks its exit status: usage errors print the
 * usage text, everything else is a run failure.
 */
export function reportFailure(log: Logger, error: Error): number {
  log.error(describeError(error));
  if (error instanceof UsageError) {
    console.error(USAGE);
    return EXIT_USAGE;
  }
  return EXIT_FAILURE;
}
