import type { ZodError } from "zod";

/**
 * Raised when a request body or parameter cannot be bound to the expected
 * shape. `detail` is the raw diagnostic and is safe to return to the client.
 */
export class BindingError extends Error {
  public readonly detail: string;

  constructor(detail: string, options?: { cause?: unknown }) {
    super(detail, options);
    this.name = "BindingError";
    this.detail = detail;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static fromZod(error: ZodError): BindingError {
    return new BindingError(formatZodIssues(error), { cause: error });
  }
}

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
}
