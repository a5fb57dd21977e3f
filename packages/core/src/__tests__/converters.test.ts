/**
 * Tests for circuit <-> DAG conversion
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Circuit } from '../circuit';
import { circuitToDag, dagToCircuit } from '../converters';
import { UnknownOperationError } from '../errors';
import { classicalRegister, quantumRegister } from '../register';
import { defaultRegistry, GateRegistry } from '../registry';

function bellMeasure(): Circuit {
  const q = quantumRegister(2, 'q');
  const c = classicalRegister(2, 'c');
  const circuit = new Circuit([q, c], { name: 'bell' });
  circuit.cx(q.bit(0), q.bit(1));
  circuit.measure(q, c);
  return circuit;
}

describe('Circuit to DAG', () => {
  it('builds the dependency graph', () => {
    const dag = circuitToDag(bellMeasure());

    expect(dag.name).toBe('bell');
    expect(dag.size()).toBe(3);
    expect(dag.countOps()).toEqual({ cx: 1, measure: 2 });
    // terminals 0-7, then cx 8, measure 9 and 10
    expect(dag.predecessors(8)).toEqual([0, 2]);
    expect(dag.successors(8)).toEqual([9, 10]);
    expect(dag.predecessors(9)).toEqual([8, 4]);
    expect(dag.predecessors(10)).toEqual([8, 6]);
    expect(dag.depth()).toBe(2);
  });

  it('declares fresh registers', () => {
    const circuit = bellMeasure();
    const dag = circuitToDag(circuit);
    const [q, c] = circuit.registers;

    expect(dag.qregs.get('q')).not.toBe(q);
    expect(dag.qregs.get('q')?.equals(q)).toBe(true);
    expect(dag.cregs.get('c')?.equals(c)).toBe(true);
  });

  it('declares registry gates with their templates', () => {
    const dag = circuitToDag(bellMeasure());

    expect(dag.basis.get('h')).toEqual({ name: 'h', numQubits: 1, numClbits: 0, numParams: 0 });
    expect(dag.gateDefinitions.get('cz')).toBe(defaultRegistry.decomposition('cz'));
    expect(dag.basis.has('measure')).toBe(true);
    expect(dag.basis.has('U')).toBe(false);
    expect(dag.basis.has('reset')).toBe(false);
    expect(dag.basis.has('barrier')).toBe(false);
  });

  it('declares built-ins on first use', () => {
    const q = quantumRegister(1, 'q');
    const circuit = new Circuit([q]);
    circuit.uBase(q.bit(0), 0, 0, 0);
    circuit.reset(q.bit(0));
    const dag = circuitToDag(circuit);

    expect(dag.basis.get('U')).toEqual({ name: 'U', numQubits: 1, numClbits: 0, numParams: 3 });
    expect(dag.basis.has('reset')).toBe(true);
    expect(dag.basis.has('measure')).toBe(false);
  });

  it('makes conditioned operations depend on the condition register', () => {
    const q = quantumRegister(2, 'q');
    const c = classicalRegister(2, 'c');
    const circuit = new Circuit([q, c]);
    circuit.measure(q.bit(0), c.bit(0));
    circuit.x(q.bit(1)).cIf(c, 1);
    const dag = circuitToDag(circuit);

    expect(dag.node(9)).toMatchObject({ name: 'x', condition: { register: 'c', value: 1 } });
    expect(dag.predecessors(9)).toEqual([2, 8, 6]);
    expect(dag.wireOperations({ register: 'c', index: 0 }).map((n) => n.id)).toEqual([8, 9]);
  });

  it('keeps one chain per wire from input to output', () => {
    const dag = circuitToDag(bellMeasure());

    for (const wire of dag.wires()) {
      const chain = [dag.inputNode(wire), ...dag.wireOperations(wire).map((n) => n.id)];
      chain.push(dag.outputNode(wire));
      for (let i = 0; i < chain.length - 1; i++) {
        expect(dag.successors(chain[i])).toContain(chain[i + 1]);
      }
      expect(dag.predecessors(dag.inputNode(wire))).toEqual([]);
      expect(dag.successors(dag.outputNode(wire))).toEqual([]);
    }
  });
});

describe('DAG to Circuit', () => {
  it('rebuilds the circuit on new registers', () => {
    const circuit = bellMeasure();
    const rebuilt = dagToCircuit(circuitToDag(circuit));

    expect(rebuilt.name).toBe('bell');
    expect(rebuilt.registers).toEqual(circuit.registers);
    expect(rebuilt.registers[0]).not.toBe(circuit.registers[0]);
    expect(rebuilt.data.map((i) => i.name)).toEqual(['cx', 'measure', 'measure']);
    expect(rebuilt.qasm()).toBe(circuit.qasm());
  });

  it('takes a name override', () => {
    expect(dagToCircuit(circuitToDag(bellMeasure()), { name: 'copy' }).name).toBe('copy');
  });

  it('keeps barriers whole', () => {
    const q = quantumRegister(3, 'q');
    const circuit = new Circuit([q]);
    circuit.h(q.bit(0));
    circuit.barrier();
    circuit.h(q.bit(2));
    const rebuilt = dagToCircuit(circuitToDag(circuit));

    expect(rebuilt.length).toBe(3);
    expect(rebuilt.at(1)?.qargs).toHaveLength(3);
  });

  it('keeps conditions', () => {
    const q = quantumRegister(1, 'q');
    const c = classicalRegister(1, 'c');
    const circuit = new Circuit([q, c]);
    circuit.measure(q.bit(0), c.bit(0));
    circuit.x(q.bit(0)).cIf(c, 1);
    const rebuilt = dagToCircuit(circuitToDag(circuit));

    expect(rebuilt.at(1)?.condition?.register).toBe(rebuilt.registers[1]);
    expect(rebuilt.at(1)?.condition?.value).toBe(1);
  });

  it('requires every operation in the target registry', () => {
    const registry = new GateRegistry();
    registry.define({ name: 'opaque', kind: 'gate', numQubits: 1, numClbits: 0, numParams: 0 });
    const q = quantumRegister(1, 'q');
    const circuit = new Circuit([q], { registry });
    circuit.append('opaque', [q.bit(0)]);
    const dag = circuitToDag(circuit);

    expect(dag.basis.has('opaque')).toBe(true);
    expect(() => dagToCircuit(dag)).toThrow(UnknownOperationError);
    expect(dagToCircuit(dag, { registry }).qasm()).toBe(circuit.qasm());
  });
});

// ============================================================================
// Property Tests
// ============================================================================

type Op =
  | { kind: 'h'; qubit: number }
  | { kind: 'cx'; control: number; target: number }
  | { kind: 'rz'; qubit: number; angle: number }
  | { kind: 'measure'; qubit: number; clbit: number }
  | { kind: 'cx_if'; qubit: number; value: number }
  | { kind: 'barrier' };

const qubitArb = fc.integer({ min: 0, max: 2 });

const opArb: fc.Arbitrary<Op> = fc.oneof(
  qubitArb.map((qubit): Op => ({ kind: 'h', qubit })),
  fc
    .tuple(qubitArb, fc.integer({ min: 1, max: 2 }))
    .map(([control, shift]): Op => ({ kind: 'cx', control, target: (control + shift) % 3 })),
  fc
    .tuple(qubitArb, fc.double({ min: -4, max: 4, noNaN: true }))
    .map(([qubit, angle]): Op => ({ kind: 'rz', qubit, angle })),
  fc
    .tuple(qubitArb, fc.integer({ min: 0, max: 1 }))
    .map(([qubit, clbit]): Op => ({ kind: 'measure', qubit, clbit })),
  fc
    .tuple(qubitArb, fc.integer({ min: 0, max: 3 }))
    .map(([qubit, value]): Op => ({ kind: 'cx_if', qubit, value })),
  fc.constant<Op>({ kind: 'barrier' })
);

const programArb = fc.array(opArb, { maxLength: 25 });

function build(program: readonly Op[]): Circuit {
  const q = quantumRegister(3, 'q');
  const c = classicalRegister(2, 'c');
  const circuit = new Circuit([q, c]);
  for (const op of program) {
    switch (op.kind) {
      case 'h':
        circuit.h(q.bit(op.qubit));
        break;
      case 'cx':
        circuit.cx(q.bit(op.control), q.bit(op.target));
        break;
      case 'rz':
        circuit.rz(q.bit(op.qubit), op.angle);
        break;
      case 'measure':
        circuit.measure(q.bit(op.qubit), c.bit(op.clbit));
        break;
      case 'cx_if':
        circuit.x(q.bit(op.qubit)).cIf(c, op.value);
        break;
      case 'barrier':
        circuit.barrier();
        break;
    }
  }
  return circuit;
}

describe('Conversion Properties', () => {
  it('round-trips through the DAG', () => {
    fc.assert(
      fc.property(programArb, (program) => {
        const circuit = build(program);
        const dag = circuitToDag(circuit);
        const rebuilt = dagToCircuit(dag);

        expect(dag.size()).toBe(program.length);
        expect(rebuilt.registers).toEqual(circuit.registers);
        expect(rebuilt.qasm()).toBe(circuit.qasm());
      })
    );
  });

  it('orders every edge forwards', () => {
    fc.assert(
      fc.property(programArb, (program) => {
        const dag = circuitToDag(build(program));
        const position = new Map(dag.topologicalNodeOrder().map((id, i) => [id, i]));

        expect(position.size).toBe(dag.nodeCount);
        for (const edge of dag.edges()) {
          expect(position.get(edge.source)).toBeLessThan(position.get(edge.target) ?? -1);
        }
      })
    );
  });

  it('reports the same depth in both forms', () => {
    fc.assert(
      fc.property(programArb, (program) => {
        const circuit = build(program);
        expect(circuit.getStats().depth).toBe(circuitToDag(circuit).depth());
      })
    );
  });

  it('combines without touching either operand', () => {
    fc.assert(
      fc.property(programArb, programArb, (first, second) => {
        const a = build(first);
        const b = build(second);
        const before = [a.qasm(), b.qasm()];
        const combined = a.combine(b);

        expect(combined.length).toBe(a.length + b.length);
        expect([a.qasm(), b.qasm()]).toEqual(before);
        expect(combined.data.slice(0, a.length).map((i) => i.qasm())).toEqual(
          a.data.map((i) => i.qasm())
        );
      })
    );
  });
});
