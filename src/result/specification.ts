// Specification predicates and their combinators

/**
 * A domain rule that is either satisfied or not.
 * Must be free of side effects: a Result may skip it or evaluate it more than once.
 */
export type Specification = () => boolean;

/**
 * Negates a specification
 */
export function not(spec: Specification): Specification {
  return () => !spec();
}

/**
 * Satisfied when every operand is; stops at the first unsatisfied one.
 * An empty list is satisfied.
 */
export function and(...specs: Specification[]): Specification {
  return () => specs.every(spec => spec());
}

/**
 * Satisfied when any operand is; stops at the first satisfied one.
 * An empty list is not satisfied.
 */
export function or(...specs: Specification[]): Specification {
  return () => specs.some(spec => spec());
}
