/**
 * @qdag/core
 *
 * Quantum circuits as instruction lists and as dependency graphs, with
 * conversion between the two.
 *
 * @example
 * ```typescript
 * import { Circuit, dagToCircuit, quantumRegister, classicalRegister } from '@qdag/core';
 *
 * const q = quantumRegister(2, 'q');
 * const c = classicalRegister(2, 'c');
 * const circuit = new Circuit([q, c]);
 * circuit.h(q.bit(0));
 * circuit.cx(q.bit(0), q.bit(1));
 * circuit.measure(q, c);
 *
 * const dag = circuit.toDag();
 * dag.topologicalNodeOrder();
 * const rebuilt = dagToCircuit(dag);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Circuits
// ============================================================================

export { Circuit } from './circuit';
export type { CircuitOptions, CircuitStats, Operand } from './circuit';

export { Instruction, InstructionSet } from './instruction';
export type { Condition } from './instruction';

export {
  Register,
  quantumRegister,
  classicalRegister,
  isRegister,
  bitKey,
} from './register';
export type { BitRef, RegisterKind } from './register';

// ============================================================================
// DAG
// ============================================================================

export { DAGCircuit, wireKey } from './dag';
export type {
  Arity,
  BasisElement,
  DagCondition,
  DagEdge,
  DagNode,
  GateTemplate,
  InNode,
  NodeId,
  OpNode,
  OutNode,
  Wire,
} from './dag';

export { circuitToDag, dagToCircuit } from './converters';
export type { DagToCircuitOptions } from './converters';

// ============================================================================
// Gates and Parameters
// ============================================================================

export { GateRegistry, defaultRegistry } from './registry';
export type {
  GateDefinition,
  InverseRule,
  OperationKind,
  ResolvedOperation,
  TemplateOp,
} from './registry';
export { BUILTIN_GATES, STANDARD_GATES } from './gates';

export { paramRef, evaluateParam, composeParam, formatParam } from './params';
export type { Param, ParamExpr, ParamRef } from './params';

export { complex, isComplex, equals as complexEquals } from './complex';
export type { Complex } from './complex';

// ============================================================================
// Serialization
// ============================================================================

export { FORMAT_VERSION, circuitSchema } from './serialization';
export type { CircuitJSON, InstructionJSON, RegisterJSON } from './serialization';

// ============================================================================
// Errors
// ============================================================================

export {
  CircuitError,
  DuplicateRegisterNameError,
  ExpectedRegisterError,
  IncompatibleRegistersError,
  UnknownRegisterError,
  WrongRegisterKindError,
  OutOfRangeBitError,
  DuplicateQubitArgumentError,
  SizeMismatchError,
  InvalidRegisterError,
  ArityMismatchError,
  UnknownOperationError,
  BasisConflictError,
  NonInvertibleOperationError,
  InvalidConditionError,
  InvalidCircuitDataError,
} from './errors';

// ============================================================================
// Version Info
// ============================================================================

export const VERSION = '0.1.0';
