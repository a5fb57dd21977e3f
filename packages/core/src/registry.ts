/**
 * Gate registry
 *
 * Name-indexed table of every operation a circuit can contain. Each gate
 * with a body gets its decomposition template built when it is defined;
 * templates are frozen and shared by every circuit on the registry.
 */

import { type Arity, DAGCircuit, type GateTemplate } from './dag';
import {
  ArityMismatchError,
  BasisConflictError,
  CircuitError,
  DuplicateQubitArgumentError,
  NonInvertibleOperationError,
  UnknownOperationError,
} from './errors';
import { BUILTIN_GATES, STANDARD_GATES } from './gates';
import { composeParam, evaluateParam, paramRef, type Param, type ParamExpr } from './params';

// ============================================================================
// Definition Types
// ============================================================================

export type OperationKind = 'gate' | 'measure' | 'reset' | 'barrier';

/**
 * One step of a gate body, on qubit positions of the enclosing gate
 */
export interface TemplateOp {
  name: string;
  qubits: readonly number[];
  params?: readonly ParamExpr[];
}

/**
 * Operation (and its parameters) that undoes a gate
 */
export interface InverseRule {
  name: string;
  params?: readonly ParamExpr[];
}

export interface GateDefinition {
  name: string;
  kind: OperationKind;
  numQubits: Arity;
  numClbits: number;
  numParams: number;
  /** Primitive of every DAG basis, declared on demand */
  builtin?: boolean;
  body?: readonly TemplateOp[];
  /** When omitted, a composite gate derives one from its reversed body */
  inverse?: 'self' | InverseRule;
}

export interface ResolvedOperation {
  name: string;
  params: Param[];
}

// ============================================================================
// GateRegistry
// ============================================================================

/**
 * Registry of gate definitions
 *
 * @example
 * ```typescript
 * const registry = new GateRegistry();
 * registry.define({
 *   name: 'bell',
 *   kind: 'gate',
 *   numQubits: 2,
 *   numClbits: 0,
 *   numParams: 0,
 *   body: [{ name: 'h', qubits: [0] }, { name: 'cx', qubits: [0, 1] }],
 * });
 * const circuit = new Circuit([quantumRegister(2, 'q')], { registry });
 * ```
 */
export class GateRegistry {
  private readonly _definitions = new Map<string, GateDefinition>();
  private readonly _templates = new Map<string, GateTemplate>();

  constructor(definitions: readonly GateDefinition[] = STANDARD_GATES) {
    for (const definition of BUILTIN_GATES) {
      this.define(definition);
    }
    for (const definition of definitions) {
      this.define(definition);
    }
  }

  /**
   * Add a gate. Defining an identical gate again is a no-op.
   */
  define(definition: GateDefinition): void {
    const existing = this._definitions.get(definition.name);
    if (existing) {
      if (!sameDefinition(existing, definition)) {
        throw new BasisConflictError(`gate "${definition.name}" is already defined`);
      }
      return;
    }
    this.validate(definition);
    const template = this.buildTemplate(definition);
    this._definitions.set(definition.name, definition);
    if (template) {
      this._templates.set(definition.name, template);
    }
  }

  has(name: string): boolean {
    return this._definitions.has(name);
  }

  get(name: string): GateDefinition | undefined {
    return this._definitions.get(name);
  }

  lookup(name: string): GateDefinition {
    const definition = this._definitions.get(name);
    if (!definition) {
      throw new UnknownOperationError(`unknown operation "${name}"`);
    }
    return definition;
  }

  /**
   * All definitions in the order they were added
   */
  definitions(): GateDefinition[] {
    return [...this._definitions.values()];
  }

  /**
   * Decomposition of a gate over placeholder qubits, or undefined for
   * primitives and opaque gates. The template is frozen.
   */
  decomposition(name: string): GateTemplate | undefined {
    this.lookup(name);
    return this._templates.get(name);
  }

  /**
   * Name and parameters of the operation undoing `name(params)`
   */
  inverseOf(name: string, params: readonly Param[]): ResolvedOperation {
    const rule = this.inverseRule(name);
    if (rule === 'self') {
      return { name, params: [...params] };
    }
    return {
      name: rule.name,
      params: (rule.params ?? []).map((expr) => evaluateParam(expr, params)),
    };
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private inverseRule(name: string): 'self' | InverseRule {
    const definition = this.lookup(name);
    if (definition.inverse) {
      return definition.inverse;
    }
    if (definition.body) {
      const inverse = this.deriveInverse(definition);
      return { name: inverse.name, params: identityParams(inverse.numParams) };
    }
    throw new NonInvertibleOperationError(`"${name}" has no inverse`);
  }

  /**
   * `<name>_dg`: the body reversed, each step inverted
   */
  private deriveInverse(definition: GateDefinition): GateDefinition {
    const name = `${definition.name}_dg`;
    const body = [...(definition.body ?? [])].reverse().map((op): TemplateOp => {
      const rule = this.inverseRule(op.name);
      if (rule === 'self') return op;
      return {
        name: rule.name,
        qubits: op.qubits,
        params: (rule.params ?? []).map((expr) => composeParam(expr, op.params ?? [])),
      };
    });

    const inverse: GateDefinition = {
      name,
      kind: definition.kind,
      numQubits: definition.numQubits,
      numClbits: definition.numClbits,
      numParams: definition.numParams,
      body,
      inverse: { name: definition.name, params: identityParams(definition.numParams) },
    };

    const existing = this._definitions.get(name);
    if (existing) {
      if (!sameShape(existing, inverse)) {
        throw new BasisConflictError(
          `gate "${name}" is already defined and is not the inverse of "${definition.name}"`
        );
      }
      return existing;
    }
    this.define(inverse);
    return inverse;
  }

  private buildTemplate(definition: GateDefinition): GateTemplate | undefined {
    if (!definition.body || definition.numQubits === 'variadic') {
      return undefined;
    }

    const template = new DAGCircuit<ParamExpr>();
    template.name = definition.name;
    template.declareQuantumRegister('q', definition.numQubits);
    for (const op of definition.body) {
      const step = this.lookup(op.name);
      template.declareBasisElement(step.name, step.numQubits, step.numClbits, step.numParams);
      template.appendOperation(
        op.name,
        op.qubits.map((index) => ({ register: 'q', index })),
        [],
        op.params ?? []
      );
    }
    return template.freeze();
  }

  private validate(definition: GateDefinition): void {
    const { name, numQubits, numClbits, numParams } = definition;
    if (
      (numQubits !== 'variadic' && (!Number.isInteger(numQubits) || numQubits < 0)) ||
      !Number.isInteger(numClbits) ||
      numClbits < 0 ||
      !Number.isInteger(numParams) ||
      numParams < 0
    ) {
      throw new ArityMismatchError(`invalid arity for "${name}"`);
    }
    if (!definition.body) return;

    if (definition.kind !== 'gate' || numQubits === 'variadic') {
      throw new CircuitError(`only fixed-arity gates may have a body, "${name}" can't`);
    }
    if (numQubits === 0) {
      throw new ArityMismatchError(`gate "${name}" has a body but no qubits`);
    }
    for (const op of definition.body) {
      const step = this.lookup(op.name);
      if (step.kind !== 'gate' && step.kind !== 'barrier') {
        throw new CircuitError(`gate body of "${name}" may not contain "${op.name}"`);
      }
      if (step.numQubits === 'variadic' && op.qubits.length === 0) {
        throw new ArityMismatchError(`"${op.name}" in "${name}" needs at least one qubit`);
      }
      if (step.numQubits !== 'variadic' && op.qubits.length !== step.numQubits) {
        throw new ArityMismatchError(
          `"${op.name}" in "${name}" takes ${step.numQubits} qubits, got ${op.qubits.length}`
        );
      }
      if ((op.params ?? []).length !== step.numParams) {
        throw new ArityMismatchError(
          `"${op.name}" in "${name}" takes ${step.numParams} parameters`
        );
      }
      for (const qubit of op.qubits) {
        if (!Number.isInteger(qubit) || qubit < 0 || qubit >= numQubits) {
          throw new ArityMismatchError(`qubit ${qubit} out of range in body of "${name}"`);
        }
      }
      if (new Set(op.qubits).size !== op.qubits.length) {
        throw new DuplicateQubitArgumentError(
          `duplicate qubit arguments to "${op.name}" in body of "${name}"`
        );
      }
      for (const expr of op.params ?? []) {
        if (typeof expr !== 'number' && expr.param >= numParams) {
          throw new ArityMismatchError(`parameter #${expr.param} out of range in body of "${name}"`);
        }
      }
    }
  }
}

function identityParams(count: number): ParamExpr[] {
  return Array.from({ length: count }, (_, i) => paramRef(i));
}

function sameShape(a: GateDefinition, b: GateDefinition): boolean {
  return (
    a.kind === b.kind &&
    a.numQubits === b.numQubits &&
    a.numClbits === b.numClbits &&
    a.numParams === b.numParams &&
    JSON.stringify(a.body ?? null) === JSON.stringify(b.body ?? null)
  );
}

function sameDefinition(a: GateDefinition, b: GateDefinition): boolean {
  return sameShape(a, b) && JSON.stringify(a.inverse ?? null) === JSON.stringify(b.inverse ?? null);
}

/**
 * Registry shared by circuits that are not given one
 */
export const defaultRegistry = new GateRegistry();
