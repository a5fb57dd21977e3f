/**
 * Circuit -> DAG
 */

import type { Circuit } from '../circuit';
import { DAGCircuit, type DagCondition, type Wire } from '../dag';
import type { Param } from '../params';
import type { BitRef } from '../register';

function toWire(bit: BitRef): Wire {
  return { register: bit.register.name, index: bit.index };
}

/**
 * Build the dependency graph of a circuit
 *
 * Every registry gate that is not a built-in primitive enters the basis up
 * front, with its decomposition when it has one. Built-ins are declared the
 * first time an instruction uses them. Instructions are appended in program
 * order, so each bit's chain follows the circuit.
 *
 * The DAG gets fresh registers; nothing is shared with the circuit.
 */
export function circuitToDag(circuit: Circuit): DAGCircuit<Param> {
  const dag = new DAGCircuit<Param>();
  dag.name = circuit.name;

  for (const register of circuit.registers) {
    if (register.isQuantum) {
      dag.declareQuantumRegister(register.name, register.size);
    } else {
      dag.declareClassicalRegister(register.name, register.size);
    }
  }

  const registry = circuit.registry;
  for (const definition of registry.definitions()) {
    if (definition.builtin) continue;
    dag.declareBasisElement(
      definition.name,
      definition.numQubits,
      definition.numClbits,
      definition.numParams
    );
    const template = registry.decomposition(definition.name);
    if (template) {
      dag.registerGateDefinition(definition.name, template);
    }
  }

  for (const instruction of circuit.data) {
    const definition = instruction.definition;
    if (definition.builtin) {
      dag.declareBasisElement(
        definition.name,
        definition.numQubits,
        definition.numClbits,
        definition.numParams
      );
    }

    let condition: DagCondition | undefined;
    if (instruction.condition) {
      condition = {
        register: instruction.condition.register.name,
        value: instruction.condition.value,
      };
    }

    dag.appendOperation(
      instruction.name,
      instruction.qargs.map(toWire),
      instruction.cargs.map(toWire),
      instruction.params,
      condition
    );
  }

  return dag;
}
