/**
 * Fatal generation errors.
 */

export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "GenerationError";
  }
}

/**
 * Errors that remained after the automatic fix pass.
 */
export class QualityCheckError extends Error {
  public readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(
      "Quality check failed after automatic fixes:\n" + errors.map((e) => `  - ${e}`).join("\n")
    );
    this.name = "QualityCheckError";
    this.errors = errors;
  }
}
