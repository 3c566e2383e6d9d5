// Validation failure entry

/**
 * Plain shape of an ErrorMessage as it appears in logs and API responses.
 * `actualValue` is the string form of the offending value, or null when none was given.
 */
export interface ErrorMessageJSON {
  message: string;
  actualValue: string | null;
}

/**
 * Text form of an offending value. Objects that `String` cannot convert, such as
 * null-prototype objects, fall back to their `[object Tag]` form.
 */
export function renderActualValue(value: unknown): string {
  if (typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === null) {
    return Object.prototype.toString.call(value);
  }
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * One failed check: a human-readable message and, optionally, the value that failed it.
 */
export class ErrorMessage {
  constructor(
    public readonly message: string,
    public readonly actualValue?: unknown
  ) {
    Object.freeze(this);
  }

  hasActualValue(): boolean {
    return this.actualValue !== undefined;
  }

  toJSON(): ErrorMessageJSON {
    return {
      message: this.message,
      actualValue: this.hasActualValue() ? renderActualValue(this.actualValue) : null
    };
  }

  /**
   * Stable rendering, e.g. `{"message":"name is required","actualValue":null}`
   */
  toString(): string {
    return JSON.stringify(this.toJSON());
  }
}
