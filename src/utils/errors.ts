/**
 * Error types shared by the commands and modules.
 *
 * `details` carries one human-readable line per underlying problem (a schema
 * issue, a file path) so the command layer can print them under the message.
 */
export class DetailedError extends Error {
  constructor(
    message: string,
    public readonly details: readonly string[] = [],
  ) {
    super(message);
    this.name = "DetailedError";
  }
}

/** Bad flags or flag combinations. Reported with the usage text. */
export class UsageError extends DetailedError {
  constructor(message: string, details: readonly string[] = []) {
    super(message, details);
    this.name = "UsageError";
  }
}

/** Renders an error and its detail lines for stderr. */
export function describeError(error: Error): string {
  const lines = [`${error.name}: ${error.message}`];
  if (error instanceof DetailedError) {
    for (const detail of error.details) {
      lines.push(`  - ${detail}`);
    }
  }
  return lines.join("\n");
}
