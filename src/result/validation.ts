// Labeled checks for Result#validateAll

import { ErrorMessage } from './error-message.js';
import { Specification } from './specification.js';

/**
 * A specification paired with the error recorded when it is not satisfied
 */
export interface Validation {
  readonly specification: Specification;
  readonly errorMessage: ErrorMessage;
}

export function validate(specification: Specification, message: string, actualValue?: unknown): Validation {
  return {
    specification,
    errorMessage: new ErrorMessage(message, actualValue)
  };
}
