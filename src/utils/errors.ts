/**
 * Raised when an answer collected by the question flow fails a field's validation, such as an empty subject.
 * The prompt driver decides whether to ask again or abort.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Throws a `ValidationError` with the given message when the value is absent or empty.
 *
 * @param value - The value to check
 * @param message - Error message shown to the user
 * @returns The value, narrowed to a non-empty string
 */
export function requireValue(value: string | null | undefined, message = 'Field is required.'): string {
  if (value === undefined || value === null || value === '') {
    throw new ValidationError(message);
  }

  return value;
}
