/**
 * Thrown synchronously by constructors, setters and per-call entry points
 * when a numeric precondition does not hold. Instances are never mutated
 * before this is thrown.
 */
export class InvalidParameterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidParameterError";
  }
}
