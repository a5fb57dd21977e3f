/**
 * Error types
 *
 * Every structural rule of circuits and DAGs fails with its own subclass of
 * CircuitError, so callers can branch on `instanceof`.
 */

/**
 * Base class for all circuit and DAG errors
 */
export class CircuitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DuplicateRegisterNameError extends CircuitError {}

export class ExpectedRegisterError extends CircuitError {}

export class IncompatibleRegistersError extends CircuitError {}

export class UnknownRegisterError extends CircuitError {}

export class WrongRegisterKindError extends CircuitError {}

export class OutOfRangeBitError extends CircuitError {}

export class DuplicateQubitArgumentError extends CircuitError {}

/**
 * Register-broadcast over registers of unequal size
 */
export class SizeMismatchError extends CircuitError {}

/**
 * Bad register name or size
 */
export class InvalidRegisterError extends CircuitError {}

/**
 * Operand or parameter count differs from the operation's declared arity
 */
export class ArityMismatchError extends CircuitError {}

export class UnknownOperationError extends CircuitError {}

/**
 * A name is declared twice with different shapes
 */
export class BasisConflictError extends CircuitError {}

export class NonInvertibleOperationError extends CircuitError {}

export class InvalidConditionError extends CircuitError {}

export class InvalidCircuitDataError extends CircuitError {}
