/**
 * Raised when a caller passes arguments that break a function's contract
 * (wrong shapes or types). Never used for data-quality findings.
 */
export class InvalidInputError extends Error {
  readonly kind = "invalid-input" as const;

  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === "string" ? err : JSON.stringify(err);
}
