/**
 * Errors raised by the service and repository layers. Their text is for
 * logs only; the HTTP layer maps them to public messages by identity.
 */
export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DomainError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const NotFound = new DomainError("your requested item is not found");
export const Conflict = new DomainError("your item already exists");
export const InternalServerError = new DomainError("internal server error");
export const BadParamInput = new DomainError("given param is not valid");

const DOMAIN_STATUS: ReadonlyMap<unknown, number> = new Map<unknown, number>([
  [BadParamInput, 400],
  [NotFound, 404],
  [Conflict, 409],
  [InternalServerError, 500],
]);

export function isDomainSentinel(err: unknown): boolean {
  return DOMAIN_STATUS.has(err);
}

/**
 * Status code for an error surfaced by the service layer. Anything that is
 * not a known sentinel is a 500.
 */
export function domainStatus(err: unknown): number {
  return DOMAIN_STATUS.get(err) ?? 500;
}
