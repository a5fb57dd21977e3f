/**
 * Gate library
 *
 * The built-in primitives every DAG understands, followed by the standard
 * gates with their decompositions in terms of those primitives.
 */

import { paramRef as p } from './params';
import type { GateDefinition } from './registry';

const PI = Math.PI;

// ============================================================================
// Built-in Primitives
// ============================================================================

export const BUILTIN_GATES: readonly GateDefinition[] = [
  {
    name: 'U',
    kind: 'gate',
    numQubits: 1,
    numClbits: 0,
    numParams: 3,
    builtin: true,
    inverse: { name: 'U', params: [p(0, -1), p(2, -1), p(1, -1)] },
  },
  {
    name: 'CX',
    kind: 'gate',
    numQubits: 2,
    numClbits: 0,
    numParams: 0,
    builtin: true,
    inverse: 'self',
  },
  { name: 'measure', kind: 'measure', numQubits: 1, numClbits: 1, numParams: 0, builtin: true },
  { name: 'reset', kind: 'reset', numQubits: 1, numClbits: 0, numParams: 0, builtin: true },
  {
    name: 'barrier',
    kind: 'barrier',
    numQubits: 'variadic',
    numClbits: 0,
    numParams: 0,
    builtin: true,
    inverse: 'self',
  },
];

// ============================================================================
// Standard Gates
// ============================================================================

function singleQubit(
  name: string,
  body: GateDefinition['body'],
  inverse: GateDefinition['inverse'],
  numParams = 0
): GateDefinition {
  return { name, kind: 'gate', numQubits: 1, numClbits: 0, numParams, body, inverse };
}

function twoQubit(
  name: string,
  body: GateDefinition['body'],
  inverse: GateDefinition['inverse'],
  numParams = 0
): GateDefinition {
  return { name, kind: 'gate', numQubits: 2, numClbits: 0, numParams, body, inverse };
}

export const STANDARD_GATES: readonly GateDefinition[] = [
  // General single-qubit unitaries
  singleQubit(
    'u3',
    [{ name: 'U', qubits: [0], params: [p(0), p(1), p(2)] }],
    { name: 'u3', params: [p(0, -1), p(2, -1), p(1, -1)] },
    3
  ),
  singleQubit(
    'u2',
    [{ name: 'U', qubits: [0], params: [PI / 2, p(0), p(1)] }],
    { name: 'u2', params: [p(1, -1, -PI), p(0, -1, PI)] },
    2
  ),
  singleQubit(
    'u1',
    [{ name: 'U', qubits: [0], params: [0, 0, p(0)] }],
    { name: 'u1', params: [p(0, -1)] },
    1
  ),
  singleQubit('id', [{ name: 'U', qubits: [0], params: [0, 0, 0] }], 'self'),

  // Paulis, Clifford and T
  singleQubit('x', [{ name: 'u3', qubits: [0], params: [PI, 0, PI] }], 'self'),
  singleQubit('y', [{ name: 'u3', qubits: [0], params: [PI, PI / 2, PI / 2] }], 'self'),
  singleQubit('z', [{ name: 'u1', qubits: [0], params: [PI] }], 'self'),
  singleQubit('h', [{ name: 'u2', qubits: [0], params: [0, PI] }], 'self'),
  singleQubit('s', [{ name: 'u1', qubits: [0], params: [PI / 2] }], { name: 'sdg' }),
  singleQubit('sdg', [{ name: 'u1', qubits: [0], params: [-PI / 2] }], { name: 's' }),
  singleQubit('t', [{ name: 'u1', qubits: [0], params: [PI / 4] }], { name: 'tdg' }),
  singleQubit('tdg', [{ name: 'u1', qubits: [0], params: [-PI / 4] }], { name: 't' }),

  // Rotations
  singleQubit(
    'rx',
    [{ name: 'u3', qubits: [0], params: [p(0), -PI / 2, PI / 2] }],
    { name: 'rx', params: [p(0, -1)] },
    1
  ),
  singleQubit(
    'ry',
    [{ name: 'u3', qubits: [0], params: [p(0), 0, 0] }],
    { name: 'ry', params: [p(0, -1)] },
    1
  ),
  singleQubit(
    'rz',
    [{ name: 'u1', qubits: [0], params: [p(0)] }],
    { name: 'rz', params: [p(0, -1)] },
    1
  ),

  // Two-qubit gates
  twoQubit('cx', [{ name: 'CX', qubits: [0, 1] }], 'self'),
  twoQubit(
    'cy',
    [
      { name: 'sdg', qubits: [1] },
      { name: 'cx', qubits: [0, 1] },
      { name: 's', qubits: [1] },
    ],
    'self'
  ),
  twoQubit(
    'cz',
    [
      { name: 'h', qubits: [1] },
      { name: 'cx', qubits: [0, 1] },
      { name: 'h', qubits: [1] },
    ],
    'self'
  ),
  twoQubit(
    'swap',
    [
      { name: 'cx', qubits: [0, 1] },
      { name: 'cx', qubits: [1, 0] },
      { name: 'cx', qubits: [0, 1] },
    ],
    'self'
  ),
  twoQubit(
    'cu1',
    [
      { name: 'u1', qubits: [0], params: [p(0, 0.5)] },
      { name: 'cx', qubits: [0, 1] },
      { name: 'u1', qubits: [1], params: [p(0, -0.5)] },
      { name: 'cx', qubits: [0, 1] },
      { name: 'u1', qubits: [1], params: [p(0, 0.5)] },
    ],
    { name: 'cu1', params: [p(0, -1)] },
    1
  ),
  twoQubit(
    'crz',
    [
      { name: 'u1', qubits: [1], params: [p(0, 0.5)] },
      { name: 'cx', qubits: [0, 1] },
      { name: 'u1', qubits: [1], params: [p(0, -0.5)] },
      { name: 'cx', qubits: [0, 1] },
    ],
    { name: 'crz', params: [p(0, -1)] },
    1
  ),

  // Toffoli
  {
    name: 'ccx',
    kind: 'gate',
    numQubits: 3,
    numClbits: 0,
    numParams: 0,
    body: [
      { name: 'h', qubits: [2] },
      { name: 'cx', qubits: [1, 2] },
      { name: 'tdg', qubits: [2] },
      { name: 'cx', qubits: [0, 2] },
      { name: 't', qubits: [2] },
      { name: 'cx', qubits: [1, 2] },
      { name: 'tdg', qubits: [2] },
      { name: 'cx', qubits: [0, 2] },
      { name: 't', qubits: [1] },
      { name: 't', qubits: [2] },
      { name: 'h', qubits: [2] },
      { name: 'cx', qubits: [0, 1] },
      { name: 't', qubits: [0] },
      { name: 'tdg', qubits: [1] },
      { name: 'cx', qubits: [0, 1] },
    ],
    inverse: 'self',
  },
];
