// Result container for building domain objects from validated input

import { NoSuccessValueError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { ErrorMessage, ErrorMessageJSON } from './error-message.js';
import { Specification } from './specification.js';
import { Validation } from './validation.js';

/**
 * What a Result is building: the domain class itself or a descriptive name.
 * Only used for diagnostics.
 */
export type Target<T> = (abstract new (...args: never[]) => T) | string;

export interface ResultJSON {
  target: string | null;
  hasValue: boolean;
  errors: ErrorMessageJSON[];
  shortCircuited: boolean;
}

/**
 * Outcome of validating and constructing a value of type T.
 *
 * Failed checks are collected as {@link ErrorMessage} entries instead of being thrown,
 * so one pass reports every independent violation. A Result is a mutable accumulator:
 * each step changes this instance and returns it, so it must have a single owner.
 * Validate parts in their own Results and merge them with {@link Result.combine}.
 *
 * ```ts
 * const result = resultFor(Customer)
 *   .ensure(() => input !== null, 'customer input is required')
 *   .validateAll(
 *     validate(() => input.name.length > 0, 'name is required', input.name),
 *     validate(() => input.age >= 18, 'customer must be an adult', input.age)
 *   )
 *   .combine(emailResult)
 *   .onSuccess(() => new Customer(input.name, input.age, emailResult.get()));
 * ```
 */
export class Result<T> {
  private readonly errors: ErrorMessage[] = [];
  private success: { value: T } | null = null;
  private shortCircuited = false;

  private constructor(private readonly target: Target<T> | null) {}

  /**
   * Empty Result for a value that has not been constructed yet
   */
  static resultFor<T>(target?: Target<T>): Result<T> {
    return new Result<T>(target ?? null);
  }

  /**
   * Result already carrying a value, with no errors
   */
  static as<T>(value: T): Result<T> {
    const result = new Result<T>(null);
    result.success = { value };
    return result;
  }

  /** True once any error has been recorded or combined in */
  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  /**
   * @throws NoSuccessValueError when no value was set, either because none was
   * ever supplied or because validation failed and onSuccess was skipped
   */
  get(): T {
    if (this.success === null) {
      throw new NoSuccessValueError(this.targetName());
    }
    return this.success.value;
  }

  /** Recorded errors in order; a copy, empty when there are none */
  getErrors(): readonly ErrorMessage[] {
    return [...this.errors];
  }

  /** True after a failed ensure */
  isShortCircuited(): boolean {
    return this.shortCircuited;
  }

  /**
   * Checks a prerequisite. The first failing ensure records its error and stops
   * every later ensure and validateAll from evaluating its checks.
   */
  ensure(specification: Specification, message: string, actualValue?: unknown): this {
    if (this.shortCircuited) {
      logger.debug('ensure skipped after earlier failure', { target: this.targetName(), message });
      return this;
    }

    if (!specification()) {
      this.errors.push(new ErrorMessage(message, actualValue));
      this.shortCircuited = true;
      logger.debug('ensure failed', { target: this.targetName(), message });
    }

    return this;
  }

  /**
   * Evaluates every validation, in order, and records one error per failure.
   * Skipped entirely once an ensure has failed.
   */
  validateAll(...validations: Validation[]): this {
    if (this.shortCircuited) {
      logger.debug('validateAll skipped after earlier failure', {
        target: this.targetName(),
        skipped: validations.length
      });
      return this;
    }

    let failed = 0;
    for (const validation of validations) {
      if (!validation.specification()) {
        this.errors.push(validation.errorMessage);
        failed++;
      }
    }

    if (failed > 0) {
      logger.debug('validateAll recorded failures', { target: this.targetName(), failed, total: validations.length });
    }

    return this;
  }

  /**
   * Appends the errors of already computed Results, in the order given.
   * Applies whether or not an ensure has failed, and never short-circuits.
   */
  combine(...results: Result<unknown>[]): this {
    const before = this.errors.length;
    for (const result of results) {
      this.errors.push(...result.errors);
    }

    if (this.errors.length > before) {
      logger.debug('combine merged errors', { target: this.targetName(), merged: this.errors.length - before });
    }

    return this;
  }

  /**
   * Stores the supplier's value when no errors have been recorded.
   * The supplier is not called otherwise.
   */
  onSuccess(supplier: () => T): this {
    if (this.hasErrors()) {
      logger.debug('onSuccess skipped', { target: this.targetName(), errors: this.errors.length });
      return this;
    }

    this.success = { value: supplier() };
    return this;
  }

  /** Diagnostic snapshot; the value itself is not included */
  toJSON(): ResultJSON {
    return {
      target: this.targetName(),
      hasValue: this.success !== null,
      errors: this.errors.map(error => error.toJSON()),
      shortCircuited: this.shortCircuited
    };
  }

  /** {@link Result.toJSON} as a JSON string */
  toString(): string {
    return JSON.stringify(this.toJSON());
  }

  private targetName(): string | null {
    if (this.target === null) {
      return null;
    }
    if (typeof this.target === 'string') {
      return this.target;
    }
    // anonymous classes have an empty name
    return this.target.name || null;
  }
}

export function resultFor<T>(target?: Target<T>): Result<T> {
  return Result.resultFor(target);
}

export function as<T>(value: T): Result<T> {
  return Result.as(value);
}
