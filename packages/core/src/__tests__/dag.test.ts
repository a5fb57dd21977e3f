/**
 * Tests for DAGCircuit
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DAGCircuit, type Wire } from '../dag';
import {
  ArityMismatchError,
  BasisConflictError,
  CircuitError,
  DuplicateQubitArgumentError,
  DuplicateRegisterNameError,
  InvalidConditionError,
  OutOfRangeBitError,
  UnknownOperationError,
  UnknownRegisterError,
  WrongRegisterKindError,
} from '../errors';
import type { ParamExpr } from '../params';

const q0: Wire = { register: 'q', index: 0 };
const q1: Wire = { register: 'q', index: 1 };
const c0: Wire = { register: 'c', index: 0 };
const c1: Wire = { register: 'c', index: 1 };

/**
 * q[2], c[2] with CX, measure and U in the basis. Terminal ids:
 * q[0] 0/1, q[1] 2/3, c[0] 4/5, c[1] 6/7.
 */
function makeDag(): DAGCircuit {
  const dag = new DAGCircuit();
  dag.declareQuantumRegister('q', 2);
  dag.declareClassicalRegister('c', 2);
  dag.declareBasisElement('CX', 2, 0, 0);
  dag.declareBasisElement('measure', 1, 1, 0);
  dag.declareBasisElement('U', 1, 0, 3);
  return dag;
}

describe('Register Declaration', () => {
  it('creates terminal pairs per bit', () => {
    const dag = makeDag();
    expect(dag.nodeCount).toBe(8);
    expect(dag.numQubits()).toBe(2);
    expect(dag.numClbits()).toBe(2);
    expect(dag.inputNode(q0)).toBe(0);
    expect(dag.outputNode(q0)).toBe(1);
    expect(dag.node(6)).toEqual({ id: 6, type: 'in', wire: c1 });
    expect(dag.successors(0)).toEqual([1]);
  });

  it('lists wires in declaration order', () => {
    expect(makeDag().wires()).toEqual([q0, q1, c0, c1]);
  });

  it('rejects duplicate register names across kinds', () => {
    const dag = makeDag();
    expect(() => dag.declareClassicalRegister('q', 1)).toThrow(DuplicateRegisterNameError);
    expect(() => dag.declareQuantumRegister('c', 1)).toThrow(DuplicateRegisterNameError);
  });

  it('creates its own register objects', () => {
    const dag = makeDag();
    const q = dag.qregs.get('q');
    expect(q?.kind).toBe('quantum');
    expect(q?.size).toBe(2);
    expect(dag.cregs.get('c')?.kind).toBe('classical');
  });

  it('throws for unknown wires', () => {
    expect(() => makeDag().inputNode({ register: 'z', index: 0 })).toThrow(UnknownRegisterError);
  });
});

describe('Basis Table', () => {
  it('accepts identical re-declaration', () => {
    const dag = makeDag();
    dag.declareBasisElement('CX', 2, 0, 0);
    expect(dag.basis.get('CX')).toEqual({ name: 'CX', numQubits: 2, numClbits: 0, numParams: 0 });
  });

  it('rejects re-declaration with different arity', () => {
    const dag = makeDag();
    expect(() => dag.declareBasisElement('CX', 1, 0, 0)).toThrow(BasisConflictError);
    expect(() => dag.declareBasisElement('U', 1, 0, 2)).toThrow(BasisConflictError);
    expect(dag.basis.get('U')?.numParams).toBe(3);
  });

  it('registers gate definitions for declared elements', () => {
    const dag = makeDag();
    const template = new DAGCircuit<ParamExpr>();
    template.declareQuantumRegister('q', 2);

    expect(() => dag.registerGateDefinition('foo', template)).toThrow(UnknownOperationError);

    dag.declareBasisElement('one', 1, 0, 0);
    expect(() => dag.registerGateDefinition('one', template)).toThrow(ArityMismatchError);

    dag.declareBasisElement('two', 2, 0, 0);
    dag.registerGateDefinition('two', template);
    dag.registerGateDefinition('two', template);
    expect(dag.gateDefinitions.get('two')).toBe(template);

    const other = new DAGCircuit<ParamExpr>();
    other.declareQuantumRegister('q', 2);
    expect(() => dag.registerGateDefinition('two', other)).toThrow(BasisConflictError);
  });
});

describe('Appending Operations', () => {
  let dag: DAGCircuit;

  beforeEach(() => {
    dag = makeDag();
  });

  it('assigns sequential node ids', () => {
    expect(dag.appendOperation('CX', [q0, q1])).toBe(8);
    expect(dag.appendOperation('measure', [q0], [c0])).toBe(9);
    expect(dag.node(8)).toEqual({
      id: 8,
      type: 'op',
      name: 'CX',
      params: [],
      qargs: [q0, q1],
      cargs: [],
      condition: undefined,
    });
  });

  it('chains operations on each wire', () => {
    const cx = dag.appendOperation('CX', [q0, q1]);
    const m0 = dag.appendOperation('measure', [q0], [c0]);
    const m1 = dag.appendOperation('measure', [q1], [c1]);

    expect(dag.predecessors(cx)).toEqual([0, 2]);
    expect(dag.successors(cx)).toEqual([m0, m1]);
    expect(dag.predecessors(m0)).toEqual([cx, 4]);
    expect(dag.successors(m0)).toEqual([1, 5]);
    expect(dag.predecessors(dag.outputNode(q1))).toEqual([m1]);
    expect(dag.wireOperations(q0).map((n) => n.id)).toEqual([cx, m0]);
    expect(dag.wireOperations(c1).map((n) => n.id)).toEqual([m1]);
  });

  it('keeps one edge per wire hop', () => {
    dag.appendOperation('CX', [q0, q1]);
    // 4 terminal-to-terminal edges became 2 + 2 through the CX, plus 2 untouched
    expect(dag.edges()).toHaveLength(6);
  });

  it('orders conditioned operations after writes to the condition register', () => {
    dag.appendOperation('measure', [q0], [c0]);
    const u = dag.appendOperation('U', [q1], [], [0, 0, 1], { register: 'c', value: 1 });
    expect(dag.predecessors(u)).toEqual([2, 8, 6]);
    expect(dag.node(u)).toMatchObject({ condition: { register: 'c', value: 1 } });
    expect(dag.wireOperations(c1).map((n) => n.id)).toEqual([u]);
  });

  it('rejects operations outside the basis', () => {
    expect(() => dag.appendOperation('h', [q0])).toThrow(UnknownOperationError);
  });

  it('checks arity', () => {
    expect(() => dag.appendOperation('CX', [q0])).toThrow(ArityMismatchError);
    expect(() => dag.appendOperation('measure', [q0])).toThrow(ArityMismatchError);
    expect(() => dag.appendOperation('U', [q0], [], [1, 2])).toThrow(ArityMismatchError);
  });

  it('checks wires', () => {
    expect(() => dag.appendOperation('CX', [q0, c0])).toThrow(WrongRegisterKindError);
    expect(() => dag.appendOperation('measure', [q0], [q1])).toThrow(WrongRegisterKindError);
    expect(() => dag.appendOperation('CX', [q0, { register: 'r', index: 0 }])).toThrow(
      UnknownRegisterError
    );
    expect(() => dag.appendOperation('CX', [q0, { register: 'q', index: 2 }])).toThrow(
      OutOfRangeBitError
    );
  });

  it('rejects duplicate qubits', () => {
    expect(() => dag.appendOperation('CX', [q0, { register: 'q', index: 0 }])).toThrow(
      DuplicateQubitArgumentError
    );
    expect(dag.size()).toBe(0);
  });

  it('checks conditions', () => {
    expect(() =>
      dag.appendOperation('U', [q0], [], [0, 0, 0], { register: 'q', value: 1 })
    ).toThrow(WrongRegisterKindError);
    expect(() =>
      dag.appendOperation('U', [q0], [], [0, 0, 0], { register: 'z', value: 1 })
    ).toThrow(UnknownRegisterError);
    expect(() =>
      dag.appendOperation('U', [q0], [], [0, 0, 0], { register: 'c', value: 4 })
    ).toThrow(InvalidConditionError);
  });

  it('limits condition values to safe integers', () => {
    dag.declareClassicalRegister('wide', 60);
    expect(() =>
      dag.appendOperation('U', [q0], [], [0, 0, 0], { register: 'wide', value: 2 ** 53 })
    ).toThrow(InvalidConditionError);
    const id = dag.appendOperation('U', [q0], [], [0, 0, 0], {
      register: 'wide',
      value: Number.MAX_SAFE_INTEGER,
    });
    expect(dag.node(id)).toMatchObject({ condition: { value: Number.MAX_SAFE_INTEGER } });
  });

  it('accepts any non-zero number of qubits for variadic operations', () => {
    dag.declareBasisElement('barrier', 'variadic', 0, 0);
    expect(() => dag.appendOperation('barrier', [])).toThrow(ArityMismatchError);
    const id = dag.appendOperation('barrier', [q0, q1]);
    expect(dag.predecessors(id)).toEqual([0, 2]);
  });
});

describe('Topological Order', () => {
  it('orders every node consistently with the edges', () => {
    const dag = makeDag();
    dag.appendOperation('CX', [q0, q1]);
    dag.appendOperation('measure', [q0], [c0]);
    dag.appendOperation('measure', [q1], [c1]);

    const order = dag.topologicalNodeOrder();
    expect(order).toEqual([0, 2, 4, 6, 8, 9, 1, 5, 10, 3, 7]);

    const position = new Map(order.map((id, i) => [id, i]));
    for (const edge of dag.edges()) {
      expect(position.get(edge.source)).toBeLessThan(position.get(edge.target) ?? -1);
    }
  });

  it('returns operations in append order', () => {
    const dag = makeDag();
    dag.appendOperation('U', [q1], [], [0, 0, 0]);
    dag.appendOperation('U', [q0], [], [0, 0, 0]);
    dag.appendOperation('U', [q1], [], [0, 0, 0]);
    const ops = dag.topologicalNodeOrder().filter((id) => dag.node(id).type === 'op');
    expect(ops).toEqual([8, 9, 10]);
  });
});

describe('DAG Statistics', () => {
  it('counts operations', () => {
    const dag = makeDag();
    dag.appendOperation('U', [q0], [], [0, 0, 0]);
    dag.appendOperation('U', [q1], [], [0, 0, 0]);
    dag.appendOperation('CX', [q0, q1]);
    expect(dag.size()).toBe(3);
    expect(dag.countOps()).toEqual({ U: 2, CX: 1 });
    expect(dag.opNodes().map((n) => n.name)).toEqual(['U', 'U', 'CX']);
  });

  it('calculates depth', () => {
    const dag = makeDag();
    dag.declareBasisElement('barrier', 'variadic', 0, 0);
    expect(dag.depth()).toBe(0);

    dag.appendOperation('U', [q0], [], [0, 0, 0]);
    dag.appendOperation('U', [q1], [], [0, 0, 0]);
    expect(dag.depth()).toBe(1);

    dag.appendOperation('barrier', [q0, q1]);
    dag.appendOperation('CX', [q0, q1]);
    expect(dag.depth()).toBe(2);
  });
});

describe('Frozen DAGs', () => {
  it('rejects every mutation once frozen', () => {
    const dag = makeDag();
    dag.appendOperation('CX', [q0, q1]);
    expect(dag.freeze()).toBe(dag);
    expect(dag.frozen).toBe(true);

    expect(() => dag.appendOperation('CX', [q0, q1])).toThrow(CircuitError);
    expect(() => dag.declareQuantumRegister('r', 1)).toThrow(CircuitError);
    expect(() => dag.declareBasisElement('U', 1, 0, 3)).toThrow(CircuitError);
    expect(() => {
      dag.name = 'renamed';
    }).toThrow('DAG is frozen');
    expect(dag.size()).toBe(1);
    expect(dag.topologicalNodeOrder()).toHaveLength(9);
  });
});

describe('Node Lookup', () => {
  it('throws for unknown node ids', () => {
    expect(() => makeDag().node(99)).toThrow(CircuitError);
    expect(() => makeDag().successors(-1)).toThrow('no node with id -1');
  });
});
