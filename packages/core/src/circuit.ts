/**
 * Circuit Builder
 *
 * A circuit is an ordered list of instructions over a set of named quantum
 * and classical registers. Gates accept single bits or whole registers;
 * registers fan out index-wise into one instruction per bit.
 */

import { circuitToDag } from './converters/circuit-to-dag';
import type { DAGCircuit } from './dag';
import {
  ArityMismatchError,
  DuplicateQubitArgumentError,
  DuplicateRegisterNameError,
  ExpectedRegisterError,
  IncompatibleRegistersError,
  InvalidCircuitDataError,
  SizeMismatchError,
  UnknownRegisterError,
  WrongRegisterKindError,
} from './errors';
import { Instruction, InstructionSet } from './instruction';
import type { Param } from './params';
import { bitKey, isRegister, Register, type BitRef, type RegisterKind } from './register';
import { defaultRegistry, type GateDefinition, type GateRegistry } from './registry';
import { circuitSchema, formatIssues, FORMAT_VERSION, type CircuitJSON } from './serialization';

/**
 * A single bit, or a whole register to broadcast over
 */
export type Operand = BitRef | Register;

export interface CircuitOptions {
  name?: string;
  /**
   * Gate definitions available to the circuit
   * Default: the shared standard registry
   */
  registry?: GateRegistry;
}

/**
 * Statistics about a circuit
 */
export interface CircuitStats {
  numQubits: number;
  numClbits: number;
  depth: number;
  totalInstructions: number;
  singleQubitGates: number;
  twoQubitGates: number;
  multiQubitGates: number;
  measurements: number;
  gateBreakdown: Record<string, number>;
}

const QASM_HEADER = ['OPENQASM 2.0;', 'include "qelib1.inc";'];

// ============================================================================
// Circuit Class
// ============================================================================

/**
 * Quantum Circuit
 *
 * @example
 * ```typescript
 * const q = quantumRegister(2, 'q');
 * const c = classicalRegister(2, 'c');
 * const bell = new Circuit([q, c], { name: 'bell' });
 * bell.h(q.bit(0));
 * bell.cx(q.bit(0), q.bit(1));
 * bell.measure(q, c);
 *
 * const dag = bell.toDag();
 * ```
 */
export class Circuit implements Iterable<Instruction> {
  readonly registry: GateRegistry;
  private readonly _registers = new Map<string, Register>();
  private readonly _data: Instruction[] = [];
  private readonly _name?: string;

  /**
   * Create a new circuit
   * @param registers Registers the circuit is defined over
   */
  constructor(registers: readonly Register[] = [], options: CircuitOptions = {}) {
    this.registry = options.registry ?? defaultRegistry;
    this._name = options.name;
    this.add(...registers);
  }

  // =========================================================================
  // Properties
  // =========================================================================

  get name(): string | undefined {
    return this._name;
  }

  /**
   * Registers in the order they were added
   */
  get registers(): Register[] {
    return [...this._registers.values()];
  }

  get quantumRegisters(): Register[] {
    return this.registers.filter((r) => r.isQuantum);
  }

  get classicalRegisters(): Register[] {
    return this.registers.filter((r) => r.isClassical);
  }

  get data(): readonly Instruction[] {
    return this._data;
  }

  /**
   * Number of instructions in the circuit
   */
  get length(): number {
    return this._data.length;
  }

  get numQubits(): number {
    return this.quantumRegisters.reduce((total, r) => total + r.size, 0);
  }

  get numClbits(): number {
    return this.classicalRegisters.reduce((total, r) => total + r.size, 0);
  }

  at(index: number): Instruction | undefined {
    return this._data.at(index);
  }

  [Symbol.iterator](): Iterator<Instruction> {
    return this._data[Symbol.iterator]();
  }

  // =========================================================================
  // Registers
  // =========================================================================

  /**
   * Add registers. Nothing is added unless all of them can be.
   */
  add(...registers: readonly Register[]): this {
    const names = new Set<string>();
    for (const register of registers) {
      if (!isRegister(register)) {
        throw new ExpectedRegisterError('expected a register');
      }
      if (this._registers.has(register.name) || names.has(register.name)) {
        throw new DuplicateRegisterNameError(`register name "${register.name}" already exists`);
      }
      names.add(register.name);
    }
    for (const register of registers) {
      this._registers.set(register.name, register);
    }
    return this;
  }

  /**
   * True if the circuit has a register with the same name, size and kind
   */
  hasRegister(register: Register): boolean {
    const own = this._registers.get(register.name);
    return own !== undefined && own.equals(register);
  }

  getRegister(name: string): Register | undefined {
    return this._registers.get(name);
  }

  // =========================================================================
  // Generic Application
  // =========================================================================

  /**
   * Apply a registry operation. Operands are its qubits followed by its
   * classical bits; passing registers broadcasts index-wise.
   */
  append(name: string, operands: readonly BitRef[], params?: readonly Param[]): Instruction;
  append(
    name: string,
    operands: readonly Operand[],
    params?: readonly Param[]
  ): Instruction | InstructionSet;
  append(
    name: string,
    operands: readonly Operand[],
    params: readonly Param[] = []
  ): Instruction | InstructionSet {
    const definition = this.registry.lookup(name);
    if (definition.kind === 'barrier') {
      return this.barrier(...operands);
    }

    const registers = operands.filter(isRegister);
    if (registers.length === 0) {
      return this.attach(this.prepare(definition, scalarOperands(operands, 0), params));
    }

    const size = registers[0].size;
    for (const register of registers) {
      if (register.size !== size) {
        throw new SizeMismatchError(
          `cannot broadcast "${name}" over registers of sizes ${registers.map((r) => r.size).join(', ')}`
        );
      }
    }

    // Validate every index before attaching any of them
    const prepared: Instruction[] = [];
    for (let i = 0; i < size; i++) {
      prepared.push(this.prepare(definition, scalarOperands(operands, i), params));
    }
    const instructions = new InstructionSet();
    for (const instruction of prepared) {
      instructions.add(this.attach(instruction));
    }
    return instructions;
  }

  // =========================================================================
  // Built-in Primitives
  // =========================================================================

  /**
   * Built-in single-qubit unitary U(theta, phi, lambda)
   */
  uBase(qubit: BitRef, theta: number, phi: number, lambda: number): Instruction;
  uBase(qubit: Register, theta: number, phi: number, lambda: number): InstructionSet;
  uBase(qubit: Operand, theta: number, phi: number, lambda: number): Instruction | InstructionSet;
  uBase(qubit: Operand, theta: number, phi: number, lambda: number): Instruction | InstructionSet {
    return this.append('U', [qubit], [theta, phi, lambda]);
  }

  /**
   * Built-in controlled-NOT
   */
  cxBase(control: BitRef, target: BitRef): Instruction;
  cxBase(control: Operand, target: Operand): Instruction | InstructionSet;
  cxBase(control: Operand, target: Operand): Instruction | InstructionSet {
    return this.append('CX', [control, target]);
  }

  /**
   * Measure a qubit into a classical bit, or a register into a register of
   * the same size
   */
  measure(qubit: BitRef, clbit: BitRef): Instruction;
  measure(qubit: Register, clbit: Register): InstructionSet;
  measure(qubit: Operand, clbit: Operand): Instruction | InstructionSet;
  measure(qubit: Operand, clbit: Operand): Instruction | InstructionSet {
    return this.append('measure', [qubit, clbit]);
  }

  /**
   * Reset a qubit, or every qubit of a register, to |0>
   */
  reset(qubit: BitRef): Instruction;
  reset(qubit: Register): InstructionSet;
  reset(qubit: Operand): Instruction | InstructionSet;
  reset(qubit: Operand): Instruction | InstructionSet {
    return this.append('reset', [qubit]);
  }

  /**
   * One barrier across the given bits and registers, or across every qubit
   * of the circuit when called without operands
   */
  barrier(...operands: readonly Operand[]): Instruction {
    const qubits: BitRef[] = [];
    if (operands.length === 0) {
      for (const register of this.quantumRegisters) qubits.push(...register.bits());
    }
    for (const operand of operands) {
      if (isRegister(operand)) qubits.push(...operand.bits());
      else qubits.push(operand);
    }
    return this.attach(this.prepare(this.registry.lookup('barrier'), qubits, []));
  }

  // =========================================================================
  // Single-Qubit Gates
  // =========================================================================

  /**
   * Identity
   */
  id(qubit: BitRef): Instruction;
  id(qubit: Register): InstructionSet;
  id(qubit: Operand): Instruction | InstructionSet;
  id(qubit: Operand): Instruction | InstructionSet {
    return this.append('id', [qubit]);
  }

  /**
   * Hadamard gate
   */
  h(qubit: BitRef): Instruction;
  h(qubit: Register): InstructionSet;
  h(qubit: Operand): Instruction | InstructionSet;
  h(qubit: Operand): Instruction | InstructionSet {
    return this.append('h', [qubit]);
  }

  /**
   * Pauli-X gate (NOT)
   */
  x(qubit: BitRef): Instruction;
  x(qubit: Register): InstructionSet;
  x(qubit: Operand): Instruction | InstructionSet;
  x(qubit: Operand): Instruction | InstructionSet {
    return this.append('x', [qubit]);
  }

  /**
   * Pauli-Y gate
   */
  y(qubit: BitRef): Instruction;
  y(qubit: Register): InstructionSet;
  y(qubit: Operand): Instruction | InstructionSet;
  y(qubit: Operand): Instruction | InstructionSet {
    return this.append('y', [qubit]);
  }

  /**
   * Pauli-Z gate
   */
  z(qubit: BitRef): Instruction;
  z(qubit: Register): InstructionSet;
  z(qubit: Operand): Instruction | InstructionSet;
  z(qubit: Operand): Instruction | InstructionSet {
    return this.append('z', [qubit]);
  }

  /**
   * S gate (sqrt Z)
   */
  s(qubit: BitRef): Instruction;
  s(qubit: Register): InstructionSet;
  s(qubit: Operand): Instruction | InstructionSet;
  s(qubit: Operand): Instruction | InstructionSet {
    return this.append('s', [qubit]);
  }

  sdg(qubit: BitRef): Instruction;
  sdg(qubit: Register): InstructionSet;
  sdg(qubit: Operand): Instruction | InstructionSet;
  sdg(qubit: Operand): Instruction | InstructionSet {
    return this.append('sdg', [qubit]);
  }

  /**
   * T gate (sqrt S)
   */
  t(qubit: BitRef): Instruction;
  t(qubit: Register): InstructionSet;
  t(qubit: Operand): Instruction | InstructionSet;
  t(qubit: Operand): Instruction | InstructionSet {
    return this.append('t', [qubit]);
  }

  tdg(qubit: BitRef): Instruction;
  tdg(qubit: Register): InstructionSet;
  tdg(qubit: Operand): Instruction | InstructionSet;
  tdg(qubit: Operand): Instruction | InstructionSet {
    return this.append('tdg', [qubit]);
  }

  // =========================================================================
  // Parameterized Single-Qubit Gates
  // =========================================================================

  /**
   * Rotation around X-axis
   */
  rx(qubit: BitRef, angle: number): Instruction;
  rx(qubit: Register, angle: number): InstructionSet;
  rx(qubit: Operand, angle: number): Instruction | InstructionSet;
  rx(qubit: Operand, angle: number): Instruction | InstructionSet {
    return this.append('rx', [qubit], [angle]);
  }

  /**
   * Rotation around Y-axis
   */
  ry(qubit: BitRef, angle: number): Instruction;
  ry(qubit: Register, angle: number): InstructionSet;
  ry(qubit: Operand, angle: number): Instruction | InstructionSet;
  ry(qubit: Operand, angle: number): Instruction | InstructionSet {
    return this.append('ry', [qubit], [angle]);
  }

  /**
   * Rotation around Z-axis
   */
  rz(qubit: BitRef, angle: number): Instruction;
  rz(qubit: Register, angle: number): InstructionSet;
  rz(qubit: Operand, angle: number): Instruction | InstructionSet;
  rz(qubit: Operand, angle: number): Instruction | InstructionSet {
    return this.append('rz', [qubit], [angle]);
  }

  /**
   * Phase gate u1(lambda)
   */
  u1(qubit: BitRef, lambda: number): Instruction;
  u1(qubit: Register, lambda: number): InstructionSet;
  u1(qubit: Operand, lambda: number): Instruction | InstructionSet;
  u1(qubit: Operand, lambda: number): Instruction | InstructionSet {
    return this.append('u1', [qubit], [lambda]);
  }

  u2(qubit: BitRef, phi: number, lambda: number): Instruction;
  u2(qubit: Register, phi: number, lambda: number): InstructionSet;
  u2(qubit: Operand, phi: number, lambda: number): Instruction | InstructionSet;
  u2(qubit: Operand, phi: number, lambda: number): Instruction | InstructionSet {
    return this.append('u2', [qubit], [phi, lambda]);
  }

  /**
   * General single-qubit unitary U3(theta, phi, lambda)
   */
  u3(qubit: BitRef, theta: number, phi: number, lambda: number): Instruction;
  u3(qubit: Register, theta: number, phi: number, lambda: number): InstructionSet;
  u3(qubit: Operand, theta: number, phi: number, lambda: number): Instruction | InstructionSet;
  u3(qubit: Operand, theta: number, phi: number, lambda: number): Instruction | InstructionSet {
    return this.append('u3', [qubit], [theta, phi, lambda]);
  }

  // =========================================================================
  // Two-Qubit Gates
  // =========================================================================

  /**
   * Controlled-NOT gate
   */
  cx(control: BitRef, target: BitRef): Instruction;
  cx(control: Operand, target: Operand): Instruction | InstructionSet;
  cx(control: Operand, target: Operand): Instruction | InstructionSet {
    return this.append('cx', [control, target]);
  }

  /**
   * Controlled-Y gate
   */
  cy(control: BitRef, target: BitRef): Instruction;
  cy(control: Operand, target: Operand): Instruction | InstructionSet;
  cy(control: Operand, target: Operand): Instruction | InstructionSet {
    return this.append('cy', [control, target]);
  }

  /**
   * Controlled-Z gate
   */
  cz(control: BitRef, target: BitRef): Instruction;
  cz(control: Operand, target: Operand): Instruction | InstructionSet;
  cz(control: Operand, target: Operand): Instruction | InstructionSet {
    return this.append('cz', [control, target]);
  }

  /**
   * SWAP gate
   */
  swap(qubit1: BitRef, qubit2: BitRef): Instruction;
  swap(qubit1: Operand, qubit2: Operand): Instruction | InstructionSet;
  swap(qubit1: Operand, qubit2: Operand): Instruction | InstructionSet {
    return this.append('swap', [qubit1, qubit2]);
  }

  /**
   * Controlled phase gate
   */
  cu1(control: BitRef, target: BitRef, lambda: number): Instruction;
  cu1(control: Operand, target: Operand, lambda: number): Instruction | InstructionSet;
  cu1(control: Operand, target: Operand, lambda: number): Instruction | InstructionSet {
    return this.append('cu1', [control, target], [lambda]);
  }

  /**
   * Controlled Rz gate
   */
  crz(control: BitRef, target: BitRef, lambda: number): Instruction;
  crz(control: Operand, target: Operand, lambda: number): Instruction | InstructionSet;
  crz(control: Operand, target: Operand, lambda: number): Instruction | InstructionSet {
    return this.append('crz', [control, target], [lambda]);
  }

  // =========================================================================
  // Three-Qubit Gates
  // =========================================================================

  /**
   * Toffoli gate (CCNOT)
   */
  ccx(control1: BitRef, control2: BitRef, target: BitRef): Instruction;
  ccx(control1: Operand, control2: Operand, target: Operand): Instruction | InstructionSet;
  ccx(control1: Operand, control2: Operand, target: Operand): Instruction | InstructionSet {
    return this.append('ccx', [control1, control2, target]);
  }

  // =========================================================================
  // Circuit Composition
  // =========================================================================

  /**
   * New circuit over this circuit's registers holding this circuit's
   * instructions followed by `other`'s
   */
  combine(other: Circuit): Circuit {
    this.checkCompatible(other);
    const circuit = new Circuit(this.registers, { name: this._name, registry: this.registry });
    for (const instruction of [...this._data, ...other._data]) {
      instruction.reapply(circuit);
    }
    return circuit;
  }

  /**
   * Append `other`'s instructions to this circuit in place
   *
   * All or nothing: if replaying fails, the instructions attached so far are
   * removed again before the error propagates.
   */
  extend(other: Circuit): this {
    this.checkCompatible(other);
    const mark = this._data.length;
    const replay = [...other._data];
    try {
      for (const instruction of replay) {
        instruction.reapply(this);
      }
    } catch (error) {
      this._data.length = mark;
      throw error;
    }
    return this;
  }

  /**
   * Create inverse (dagger) of the circuit
   */
  inverse(): Circuit {
    const inverse = new Circuit(this.registers, {
      name: `${this._name ?? 'circuit'}_dg`,
      registry: this.registry,
    });
    for (let i = this._data.length - 1; i >= 0; i--) {
      const gate = this._data[i].inverse();
      const attached = inverse.append(gate.name, [...gate.qargs, ...gate.cargs], gate.params);
      if (gate.condition) {
        attached.cIf(gate.condition.register, gate.condition.value);
      }
    }
    return inverse;
  }

  // =========================================================================
  // Conversion
  // =========================================================================

  toDag(): DAGCircuit {
    return circuitToDag(this);
  }

  /**
   * Convert to OpenQASM 2.0 string
   */
  qasm(): string {
    const lines = [
      ...QASM_HEADER,
      ...this.registers.map((r) => r.qasm()),
      ...this._data.map((i) => i.qasm()),
    ];
    return lines.join('\n') + '\n';
  }

  /**
   * Convert circuit to JSON
   */
  toJSON(): CircuitJSON {
    return {
      version: FORMAT_VERSION,
      name: this._name,
      registers: this.registers.map((r) => ({ name: r.name, size: r.size, kind: r.kind })),
      instructions: this._data.map((instruction) => ({
        name: instruction.name,
        qubits: instruction.qargs.map((b): [string, number] => [b.register.name, b.index]),
        clbits: instruction.cargs.map((b): [string, number] => [b.register.name, b.index]),
        params: [...instruction.params],
        condition: instruction.condition && {
          register: instruction.condition.register.name,
          value: instruction.condition.value,
        },
      })),
    };
  }

  /**
   * Create circuit from JSON
   *
   * Instructions are re-applied one by one, so the data goes through the
   * same validation as hand-built circuits.
   */
  static fromJSON(json: unknown, options: Omit<CircuitOptions, 'name'> = {}): Circuit {
    const parsed = circuitSchema.safeParse(json);
    if (!parsed.success) {
      throw new InvalidCircuitDataError(`invalid circuit data: ${formatIssues(parsed.error)}`);
    }
    const data = parsed.data;
    if (data.version !== FORMAT_VERSION) {
      console.warn(
        `Circuit data has format version ${data.version}, expected ${FORMAT_VERSION}; loading anyway`
      );
    }

    const circuit = new Circuit(
      data.registers.map((r) => new Register(r.kind, r.size, r.name)),
      { ...options, name: data.name }
    );
    const resolve = ([name, index]: [string, number]): BitRef => {
      const register = circuit.getRegister(name);
      if (!register) {
        throw new UnknownRegisterError(`register '${name}' not in this circuit`);
      }
      return register.bit(index);
    };

    for (const entry of data.instructions) {
      const operands = [...entry.qubits.map(resolve), ...entry.clbits.map(resolve)];
      const condition = entry.condition;
      const register = condition ? circuit.getRegister(condition.register) : undefined;
      if (condition && !register) {
        throw new UnknownRegisterError(`register '${condition.register}' not in this circuit`);
      }
      const instruction = circuit.append(entry.name, operands, entry.params);
      if (condition && register) {
        instruction.cIf(register, condition.value);
      }
    }
    return circuit;
  }

  // =========================================================================
  // Statistics
  // =========================================================================

  /**
   * Get circuit statistics
   */
  getStats(): CircuitStats {
    const gateBreakdown: Record<string, number> = {};
    let singleQubitGates = 0;
    let twoQubitGates = 0;
    let multiQubitGates = 0;
    let measurements = 0;

    for (const instruction of this._data) {
      gateBreakdown[instruction.name] = (gateBreakdown[instruction.name] || 0) + 1;

      if (instruction.kind === 'measure') {
        measurements++;
      } else if (instruction.kind !== 'gate') {
        // Barriers and resets aren't gates
      } else if (instruction.qargs.length === 1) {
        singleQubitGates++;
      } else if (instruction.qargs.length === 2) {
        twoQubitGates++;
      } else {
        multiQubitGates++;
      }
    }

    return {
      numQubits: this.numQubits,
      numClbits: this.numClbits,
      depth: this.calculateDepth(),
      totalInstructions: this._data.length,
      singleQubitGates,
      twoQubitGates,
      multiQubitGates,
      measurements,
      gateBreakdown,
    };
  }

  /**
   * Calculate circuit depth
   *
   * A barrier adds no layer but lines its qubits up, as it does in the DAG.
   */
  private calculateDepth(): number {
    const bitDepths = new Map<string, number>();
    let depth = 0;

    for (const instruction of this._data) {
      const bits = [...instruction.qargs, ...instruction.cargs];
      if (instruction.condition) bits.push(...instruction.condition.register.bits());
      const keys = bits.map(bitKey);
      const layer = instruction.kind === 'barrier' ? 0 : 1;
      const next = Math.max(...keys.map((k) => bitDepths.get(k) ?? 0)) + layer;

      for (const key of keys) {
        bitDepths.set(key, next);
      }
      depth = Math.max(depth, next);
    }

    return depth;
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private attach(instruction: Instruction): Instruction {
    this._data.push(instruction);
    return instruction;
  }

  /**
   * Validate operands against the definition and build an unattached
   * instruction
   */
  private prepare(
    definition: GateDefinition,
    operands: readonly BitRef[],
    params: readonly Param[]
  ): Instruction {
    const numQubits =
      definition.numQubits === 'variadic' ? operands.length : definition.numQubits;
    const expected = numQubits + definition.numClbits;
    if (operands.length !== expected || numQubits === 0) {
      throw new ArityMismatchError(
        `"${definition.name}" takes ${expected} operands, got ${operands.length}`
      );
    }
    if (params.length !== definition.numParams) {
      throw new ArityMismatchError(
        `"${definition.name}" takes ${definition.numParams} parameters, got ${params.length}`
      );
    }

    const qargs = operands.slice(0, numQubits);
    const cargs = operands.slice(numQubits);
    for (const qubit of qargs) this.validateBit(qubit, 'quantum');
    for (const clbit of cargs) this.validateBit(clbit, 'classical');
    this.validateAllDifferent(qargs);

    return new Instruction(definition, qargs, cargs, params, this);
  }

  private validateBit(bit: BitRef, kind: RegisterKind): void {
    if (!isRegister(bit.register)) {
      throw new ExpectedRegisterError('expected a (register, index) bit reference');
    }
    if (bit.register.kind !== kind) {
      throw new WrongRegisterKindError(
        `expected ${kind} register, got ${bit.register.kind} register "${bit.register.name}"`
      );
    }
    if (!this.hasRegister(bit.register)) {
      throw new UnknownRegisterError(`register '${bit.register.name}' not in this circuit`);
    }
    bit.register.checkRange(bit.index);
  }

  private validateAllDifferent(qubits: readonly BitRef[]): void {
    const unique = new Set(qubits.map(bitKey));
    if (unique.size !== qubits.length) {
      throw new DuplicateQubitArgumentError('duplicate qubit arguments');
    }
  }

  private checkCompatible(other: Circuit): void {
    for (const register of other._registers.values()) {
      if (!this.hasRegister(register)) {
        throw new IncompatibleRegistersError(
          `circuits are not compatible: no register ${register.toString()}`
        );
      }
    }
  }
}

/**
 * Operands for broadcast index `index`: registers become their bit
 */
function scalarOperands(operands: readonly Operand[], index: number): BitRef[] {
  return operands.map((operand) => (isRegister(operand) ? operand.bit(index) : operand));
}
