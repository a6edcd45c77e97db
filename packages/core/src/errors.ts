/**
 * Error types raised by Tessera collections.
 *
 * Every error is raised synchronously at the point of the failing call and
 * nothing inside the library catches them.
 *
 * @packageDocumentation
 */

/**
 * Base class for every error thrown by this package.
 */
export class CollectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CollectionError';
  }
}

/**
 * A constraint expression could not be parsed.
 */
export class ConstraintSyntaxError extends CollectionError {
  /** The full expression as given. */
  public readonly expression: string;
  /** The token that failed, or an empty string for an empty token. */
  public readonly token: string;

  constructor(expression: string, token: string, reason: string) {
    super(`Invalid type constraint '${expression}': ${reason}.`);
    this.name = 'ConstraintSyntaxError';
    this.expression = expression;
    this.token = token;
  }
}

/**
 * A value does not satisfy a collection's TypeSet.
 */
export class TypeMismatchError extends CollectionError {
  /** The constraint that rejected the value, as written by `TypeSet.toString()`. */
  public readonly expected: string;
  /** The observed type of the rejected value. */
  public readonly actual: string;

  constructor(expected: string, actual: string, label = 'value', message?: string) {
    super(message ?? `Disallowed ${label} type: expected ${expected}, got ${actual}.`);
    this.name = 'TypeMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * No default value can be derived for a constraint and none was supplied.
 */
export class UnrepresentableDefaultError extends CollectionError {
  public readonly constraint: string;

  constructor(constraint: string) {
    super(`Cannot derive a default value for '${constraint}'; supply one explicitly.`);
    this.name = 'UnrepresentableDefaultError';
    this.constraint = constraint;
  }
}

/**
 * Lookup or removal by a key that is not present.
 */
export class KeyNotFoundError extends CollectionError {
  public readonly key: unknown;

  constructor(key: unknown, description: string) {
    super(`Unknown key: ${description}.`);
    this.name = 'KeyNotFoundError';
    this.key = key;
  }
}

/**
 * Positional access outside the bounds of a Sequence.
 */
export class IndexOutOfRangeError extends CollectionError {
  public readonly index: number;

  constructor(index: number, message: string) {
    super(message);
    this.name = 'IndexOutOfRangeError';
    this.index = index;
  }
}

/**
 * An operation needs at least one element and the collection is empty.
 */
export class UnderflowError extends CollectionError {
  constructor(message: string) {
    super(message);
    this.name = 'UnderflowError';
  }
}

/**
 * A variadic entry point got a number of arguments it cannot interpret.
 */
export class ArgumentArityError extends CollectionError {
  public readonly received: number;

  constructor(method: string, expected: string, received: number) {
    super(`${method}() takes ${expected} arguments, got ${String(received)}.`);
    this.name = 'ArgumentArityError';
    this.received = received;
  }
}

/**
 * An argument is well-typed but its value is not usable.
 */
export class InvalidArgumentError extends CollectionError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * An array that contains itself cannot be compared structurally.
 */
export class CircularReferenceError extends CollectionError {
  constructor() {
    super('An array containing circular references cannot be used as a key or compared structurally.');
    this.name = 'CircularReferenceError';
  }
}
