/**
 * Registers and bit references
 *
 * A register is a named, sized collection of bits of one kind. Bits are
 * addressed by (register, index) pairs that are checked against the
 * register bounds when they are created.
 */

import { InvalidRegisterError, OutOfRangeBitError } from './errors';

export type RegisterKind = 'quantum' | 'classical';

/**
 * One bit of a register
 */
export interface BitRef {
  readonly register: Register;
  readonly index: number;
}

const NAME_PATTERN = /^[a-z][a-zA-Z0-9_]*$/;

export class Register {
  readonly kind: RegisterKind;
  readonly size: number;
  readonly name: string;

  /**
   * @param kind Quantum or classical
   * @param size Number of bits, at least 1
   * @param name Identifier starting with a lower-case letter
   */
  constructor(kind: RegisterKind, size: number, name: string) {
    if (!Number.isInteger(size) || size < 1) {
      throw new InvalidRegisterError(`register size must be a positive integer, got ${size}`);
    }
    if (!NAME_PATTERN.test(name)) {
      throw new InvalidRegisterError(`invalid register name "${name}"`);
    }
    this.kind = kind;
    this.size = size;
    this.name = name;
  }

  get isQuantum(): boolean {
    return this.kind === 'quantum';
  }

  get isClassical(): boolean {
    return this.kind === 'classical';
  }

  /**
   * Throws OutOfRangeBitError unless index is in [0, size)
   */
  checkRange(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new OutOfRangeBitError(
        `Bit ${this.name}[${index}] out of range [0, ${this.size - 1}]`
      );
    }
  }

  bit(index: number): BitRef {
    this.checkRange(index);
    return { register: this, index };
  }

  bits(): BitRef[] {
    return Array.from({ length: this.size }, (_, i) => ({ register: this, index: i }));
  }

  /**
   * Same name, size and kind. Identity is not required.
   */
  equals(other: Register): boolean {
    return (
      this.name === other.name &&
      this.size === other.size &&
      this.kind === other.kind
    );
  }

  qasm(): string {
    const keyword = this.kind === 'quantum' ? 'qreg' : 'creg';
    return `${keyword} ${this.name}[${this.size}];`;
  }

  toString(): string {
    return `${this.kind === 'quantum' ? 'QuantumRegister' : 'ClassicalRegister'}(${this.size}, '${this.name}')`;
  }
}

export function quantumRegister(size: number, name: string): Register {
  return new Register('quantum', size, name);
}

export function classicalRegister(size: number, name: string): Register {
  return new Register('classical', size, name);
}

export function isRegister(value: unknown): value is Register {
  return value instanceof Register;
}

/**
 * Key used to compare bits by register name and index
 */
export function bitKey(bit: BitRef): string {
  return `${bit.register.name}[${bit.index}]`;
}
