/**
 * DAG -> Circuit
 */

import { Circuit } from '../circuit';
import type { DAGCircuit, Wire } from '../dag';
import { UnknownOperationError, UnknownRegisterError } from '../errors';
import type { Param } from '../params';
import { Register, type BitRef } from '../register';
import { defaultRegistry, type GateRegistry } from '../registry';

export interface DagToCircuitOptions {
  /** Default: the DAG's name */
  name?: string;
  /**
   * Registry used to rebuild operations; must define every operation name
   * in the DAG
   * Default: the shared standard registry
   */
  registry?: GateRegistry;
}

/**
 * Build a circuit from a DAG
 *
 * Operations are visited in topological order and re-created as new
 * instructions on new registers matched by name. For bit-disjoint
 * operations the resulting interleaving is one valid order, not necessarily
 * the one the DAG was built from.
 */
export function dagToCircuit(dag: DAGCircuit<Param>, options: DagToCircuitOptions = {}): Circuit {
  const registry = options.registry ?? defaultRegistry;

  const registers = new Map<string, Register>();
  for (const qreg of dag.qregs.values()) {
    registers.set(qreg.name, new Register('quantum', qreg.size, qreg.name));
  }
  for (const creg of dag.cregs.values()) {
    registers.set(creg.name, new Register('classical', creg.size, creg.name));
  }

  const circuit = new Circuit([...registers.values()], {
    name: options.name ?? dag.name,
    registry,
  });

  const resolve = (wire: Wire): BitRef => {
    const register = registers.get(wire.register);
    if (!register) {
      throw new UnknownRegisterError(`register "${wire.register}" not in this DAG`);
    }
    return register.bit(wire.index);
  };

  for (const id of dag.topologicalNodeOrder()) {
    const node = dag.node(id);
    if (node.type !== 'op') continue;

    if (!registry.has(node.name)) {
      throw new UnknownOperationError(
        `operation "${node.name}" is not defined in the target registry`
      );
    }

    const operands = [...node.qargs.map(resolve), ...node.cargs.map(resolve)];
    const condition = node.condition;
    const conditionRegister = condition ? registers.get(condition.register) : undefined;
    if (condition && !conditionRegister) {
      throw new UnknownRegisterError(`register "${condition.register}" not in this DAG`);
    }

    const instruction = circuit.append(node.name, operands, node.params);
    if (condition && conditionRegister) {
      instruction.cIf(conditionRegister, condition.value);
    }
  }

  return circuit;
}
