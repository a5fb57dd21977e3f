/**
 * Instructions
 *
 * An instruction is one operation bound to concrete bits of a circuit. The
 * operation's capabilities (arity, decomposition, inverse) come from its
 * GateDefinition in the circuit's registry.
 */

import type { Circuit } from './circuit';
import { checkConditionValue, type GateTemplate } from './dag';
import { UnknownRegisterError, WrongRegisterKindError } from './errors';
import { formatParam, type Param } from './params';
import { bitKey, type BitRef, type Register } from './register';
import { defaultRegistry, type GateDefinition, type GateRegistry, type OperationKind } from './registry';

/**
 * Classical control on a whole register
 */
export interface Condition {
  register: Register;
  value: number;
}

export class Instruction {
  readonly definition: GateDefinition;
  readonly qargs: readonly BitRef[];
  readonly cargs: readonly BitRef[];
  readonly params: readonly Param[];
  private _condition?: Condition;
  private readonly _circuit?: Circuit;

  /**
   * Instructions are normally created by Circuit, which validates operands
   * before calling this.
   */
  constructor(
    definition: GateDefinition,
    qargs: readonly BitRef[],
    cargs: readonly BitRef[],
    params: readonly Param[],
    circuit?: Circuit
  ) {
    this.definition = definition;
    this.qargs = [...qargs];
    this.cargs = [...cargs];
    this.params = [...params];
    this._circuit = circuit;
  }

  // =========================================================================
  // Properties
  // =========================================================================

  get name(): string {
    return this.definition.name;
  }

  get kind(): OperationKind {
    return this.definition.kind;
  }

  get condition(): Condition | undefined {
    return this._condition;
  }

  /**
   * Circuit the instruction was created for
   */
  get circuit(): Circuit | undefined {
    return this._circuit;
  }

  private get registry(): GateRegistry {
    return this._circuit?.registry ?? defaultRegistry;
  }

  // =========================================================================
  // Modifiers
  // =========================================================================

  /**
   * Execute only if classical register `register` holds `value`
   */
  cIf(register: Register, value: number): this {
    if (!register.isClassical) {
      throw new WrongRegisterKindError(`expected classical register, got "${register.name}"`);
    }
    if (this._circuit && !this._circuit.hasRegister(register)) {
      throw new UnknownRegisterError(`register '${register.name}' not in this circuit`);
    }
    checkConditionValue(register, value);
    this._condition = { register, value };
    return this;
  }

  /**
   * New instruction undoing this one, on the same operands and condition
   */
  inverse(): Instruction {
    const inverse = this.registry.inverseOf(this.name, this.params);
    const result = new Instruction(
      this.registry.lookup(inverse.name),
      this.qargs,
      this.cargs,
      inverse.params,
      this._circuit
    );
    result._condition = this._condition;
    return result;
  }

  /**
   * Attach a copy of this instruction to `target`, on the registers of
   * `target` that carry the same names
   */
  reapply(target: Circuit): Instruction {
    const operands = [...this.qargs, ...this.cargs].map((bit) =>
      rebind(target, bit.register).bit(bit.index)
    );
    const condition = this._condition;
    const conditionRegister = condition ? rebind(target, condition.register) : undefined;

    const instruction = target.append(this.name, operands, this.params);
    if (condition && conditionRegister) {
      instruction.cIf(conditionRegister, condition.value);
    }
    return instruction;
  }

  /**
   * Decomposition template of this operation, if it has one
   */
  decompose(): GateTemplate | undefined {
    return this.registry.decomposition(this.name);
  }

  // =========================================================================
  // Serialization
  // =========================================================================

  qasm(): string {
    const prefix = this._condition
      ? `if(${this._condition.register.name}==${this._condition.value}) `
      : '';

    if (this.kind === 'measure') {
      return `${prefix}measure ${bitKey(this.qargs[0])} -> ${bitKey(this.cargs[0])};`;
    }

    const params =
      this.params.length > 0 ? `(${this.params.map(formatParam).join(',')})` : '';
    return `${prefix}${this.name}${params} ${this.qargs.map(bitKey).join(',')};`;
  }
}

function rebind(target: Circuit, register: Register): Register {
  const match = target.getRegister(register.name);
  if (!match || !match.equals(register)) {
    throw new UnknownRegisterError(`register '${register.name}' not in target circuit`);
  }
  return match;
}

/**
 * Instructions produced together by one register-broadcast call
 */
export class InstructionSet implements Iterable<Instruction> {
  private readonly _instructions: Instruction[] = [];

  constructor(instructions: Iterable<Instruction> = []) {
    for (const instruction of instructions) {
      this._instructions.push(instruction);
    }
  }

  get instructions(): readonly Instruction[] {
    return this._instructions;
  }

  get length(): number {
    return this._instructions.length;
  }

  add(instruction: Instruction): this {
    this._instructions.push(instruction);
    return this;
  }

  at(index: number): Instruction | undefined {
    return this._instructions[index];
  }

  /**
   * Put every instruction of the set under the same classical control
   */
  cIf(register: Register, value: number): this {
    for (const instruction of this._instructions) {
      instruction.cIf(register, value);
    }
    return this;
  }

  inverse(): InstructionSet {
    return new InstructionSet(this._instructions.map((i) => i.inverse()));
  }

  [Symbol.iterator](): Iterator<Instruction> {
    return this._instructions[Symbol.iterator]();
  }
}
