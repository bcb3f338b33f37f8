/**
 * Programmer error: the caller broke a documented precondition
 * (missing text, empty phrase list, non-string phrase, ...).
 */
export class PreconditionError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = "PreconditionError";
  }
}
