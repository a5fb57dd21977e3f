/**
 * Dependency graph form of a circuit
 *
 * Nodes live in an arena indexed by integer id. Every declared bit owns an
 * input and an output terminal; operations are spliced in front of the
 * output terminal of each bit they touch, so the edges along one bit form a
 * chain in program order.
 */

import {
  ArityMismatchError,
  BasisConflictError,
  CircuitError,
  DuplicateQubitArgumentError,
  DuplicateRegisterNameError,
  InvalidConditionError,
  UnknownOperationError,
  UnknownRegisterError,
  WrongRegisterKindError,
} from './errors';
import type { Param, ParamExpr } from './params';
import { Register, type RegisterKind } from './register';

// ============================================================================
// Node and Edge Types
// ============================================================================

export type NodeId = number;

/**
 * One bit of the DAG, addressed by register name
 */
export interface Wire {
  register: string;
  index: number;
}

/**
 * Classical control: run only if the register currently holds `value`
 */
export interface DagCondition {
  register: string;
  value: number;
}

export interface InNode {
  id: NodeId;
  type: 'in';
  wire: Wire;
}

export interface OutNode {
  id: NodeId;
  type: 'out';
  wire: Wire;
}

export interface OpNode<P = Param> {
  id: NodeId;
  type: 'op';
  name: string;
  params: readonly P[];
  qargs: readonly Wire[];
  cargs: readonly Wire[];
  condition: DagCondition | undefined;
}

export type DagNode<P = Param> = InNode | OutNode | OpNode<P>;

export interface DagEdge {
  source: NodeId;
  target: NodeId;
  wire: Wire;
}

// ============================================================================
// Basis Table
// ============================================================================

/**
 * Qubit arity; `'variadic'` accepts any non-zero number of qubits
 */
export type Arity = number | 'variadic';

export interface BasisElement {
  name: string;
  numQubits: Arity;
  numClbits: number;
  numParams: number;
}

/**
 * Decomposition of a gate over placeholder qubits `q[0..n)`
 */
export type GateTemplate = DAGCircuit<ParamExpr>;

export function wireKey(wire: Wire): string {
  return `${wire.register}[${wire.index}]`;
}

// ============================================================================
// DAGCircuit
// ============================================================================

/**
 * Circuit as a dependency graph
 *
 * @example
 * ```typescript
 * const dag = new DAGCircuit();
 * dag.declareQuantumRegister('q', 2);
 * dag.declareBasisElement('CX', 2, 0, 0);
 * dag.appendOperation('CX', [{ register: 'q', index: 0 }, { register: 'q', index: 1 }]);
 * dag.topologicalNodeOrder();
 * ```
 */
export class DAGCircuit<P = Param> {
  private _name?: string;
  private _frozen = false;
  private readonly _qregs = new Map<string, Register>();
  private readonly _cregs = new Map<string, Register>();
  private readonly _basis = new Map<string, BasisElement>();
  private readonly _gateDefinitions = new Map<string, GateTemplate>();
  private readonly _nodes: DagNode<P>[] = [];
  private readonly _outEdges: DagEdge[][] = [];
  private readonly _inEdges: DagEdge[][] = [];
  private readonly _inputs = new Map<string, NodeId>();
  private readonly _outputs = new Map<string, NodeId>();

  // =========================================================================
  // Properties
  // =========================================================================

  get name(): string | undefined {
    return this._name;
  }

  set name(name: string | undefined) {
    this.assertMutable();
    this._name = name;
  }

  /**
   * True once `freeze()` has been called; every mutator then throws
   */
  get frozen(): boolean {
    return this._frozen;
  }

  /**
   * Make the DAG read-only. Decomposition templates are frozen by the
   * registry that owns them, since every circuit on that registry shares
   * them.
   */
  freeze(): this {
    this._frozen = true;
    return this;
  }

  get qregs(): ReadonlyMap<string, Register> {
    return this._qregs;
  }

  get cregs(): ReadonlyMap<string, Register> {
    return this._cregs;
  }

  get basis(): ReadonlyMap<string, BasisElement> {
    return this._basis;
  }

  get gateDefinitions(): ReadonlyMap<string, GateTemplate> {
    return this._gateDefinitions;
  }

  /**
   * Total number of nodes, terminals included
   */
  get nodeCount(): number {
    return this._nodes.length;
  }

  numQubits(): number {
    let total = 0;
    for (const reg of this._qregs.values()) total += reg.size;
    return total;
  }

  numClbits(): number {
    let total = 0;
    for (const reg of this._cregs.values()) total += reg.size;
    return total;
  }

  // =========================================================================
  // Declarations
  // =========================================================================

  declareQuantumRegister(name: string, size: number): Register {
    return this.declareRegister('quantum', name, size);
  }

  declareClassicalRegister(name: string, size: number): Register {
    return this.declareRegister('classical', name, size);
  }

  /**
   * Add an operation name to the basis. Declaring the same shape again is a
   * no-op; a different shape under an existing name is rejected.
   */
  declareBasisElement(
    name: string,
    numQubits: Arity,
    numClbits: number,
    numParams: number
  ): void {
    this.assertMutable();
    const existing = this._basis.get(name);
    if (existing) {
      if (
        existing.numQubits !== numQubits ||
        existing.numClbits !== numClbits ||
        existing.numParams !== numParams
      ) {
        throw new BasisConflictError(
          `basis element "${name}" already declared as (${existing.numQubits}, ${existing.numClbits}, ${existing.numParams})`
        );
      }
      return;
    }
    this._basis.set(name, { name, numQubits, numClbits, numParams });
  }

  /**
   * Attach a decomposition template to a declared basis element
   */
  registerGateDefinition(name: string, template: GateTemplate): void {
    this.assertMutable();
    const element = this._basis.get(name);
    if (!element) {
      throw new UnknownOperationError(`"${name}" is not in the list of basis operations`);
    }
    if (element.numQubits !== template.numQubits()) {
      throw new ArityMismatchError(
        `definition of "${name}" acts on ${template.numQubits()} qubits, basis declares ${element.numQubits}`
      );
    }
    const existing = this._gateDefinitions.get(name);
    if (existing && existing !== template) {
      throw new BasisConflictError(`gate "${name}" already has a definition`);
    }
    this._gateDefinitions.set(name, template);
  }

  // =========================================================================
  // Operations
  // =========================================================================

  /**
   * Append an operation after everything already on its bits
   *
   * The bits of a condition's register are read by the operation, so they
   * take part in ordering even though they are not operands.
   */
  appendOperation(
    name: string,
    qargs: readonly Wire[],
    cargs: readonly Wire[] = [],
    params: readonly P[] = [],
    condition?: DagCondition
  ): NodeId {
    this.assertMutable();
    const element = this._basis.get(name);
    if (!element) {
      throw new UnknownOperationError(`"${name}" is not in the list of basis operations`);
    }
    this.checkArity(element, qargs.length, cargs.length, params.length);

    for (const wire of qargs) this.checkWire(wire, 'quantum');
    for (const wire of cargs) this.checkWire(wire, 'classical');

    const seen = new Set<string>();
    for (const wire of qargs) {
      const key = wireKey(wire);
      if (seen.has(key)) {
        throw new DuplicateQubitArgumentError(`duplicate qubit argument ${key} to "${name}"`);
      }
      seen.add(key);
    }

    const touched: Wire[] = [...qargs, ...cargs];
    if (condition) {
      const creg = this.checkCondition(condition);
      const operandKeys = new Set(touched.map(wireKey));
      for (let i = 0; i < creg.size; i++) {
        const wire = { register: creg.name, index: i };
        if (!operandKeys.has(wireKey(wire))) touched.push(wire);
      }
    }

    const id = this._nodes.length;
    this.addNode({
      id,
      type: 'op',
      name,
      params: [...params],
      qargs: qargs.map(copyWire),
      cargs: cargs.map(copyWire),
      condition: condition ? { ...condition } : undefined,
    });

    for (const wire of touched) {
      const outId = this.outputNode(wire);
      const key = wireKey(wire);
      const last = this._inEdges[outId].find((e) => wireKey(e.wire) === key);
      if (!last) {
        throw new CircuitError(`output terminal of ${key} has no predecessor`);
      }
      this.removeEdge(last);
      this.addEdge(last.source, id, wire);
      this.addEdge(id, outId, wire);
    }

    return id;
  }

  // =========================================================================
  // Traversal
  // =========================================================================

  node(id: NodeId): DagNode<P> {
    const node = this._nodes[id];
    if (!node) {
      throw new CircuitError(`no node with id ${id}`);
    }
    return node;
  }

  nodes(): readonly DagNode<P>[] {
    return this._nodes;
  }

  /**
   * Operation nodes in creation order
   */
  opNodes(): OpNode<P>[] {
    const ops: OpNode<P>[] = [];
    for (const node of this._nodes) {
      if (node.type === 'op') ops.push(node);
    }
    return ops;
  }

  edges(): DagEdge[] {
    return this._outEdges.flat();
  }

  successors(id: NodeId): NodeId[] {
    this.node(id);
    return unique(this._outEdges[id].map((e) => e.target));
  }

  predecessors(id: NodeId): NodeId[] {
    this.node(id);
    return unique(this._inEdges[id].map((e) => e.source));
  }

  inputNode(wire: Wire): NodeId {
    const id = this._inputs.get(wireKey(wire));
    if (id === undefined) {
      throw new UnknownRegisterError(`no wire ${wireKey(wire)} in this DAG`);
    }
    return id;
  }

  outputNode(wire: Wire): NodeId {
    const id = this._outputs.get(wireKey(wire));
    if (id === undefined) {
      throw new UnknownRegisterError(`no wire ${wireKey(wire)} in this DAG`);
    }
    return id;
  }

  /**
   * All wires, quantum registers first, in declaration order
   */
  wires(): Wire[] {
    const wires: Wire[] = [];
    for (const reg of [...this._qregs.values(), ...this._cregs.values()]) {
      for (let i = 0; i < reg.size; i++) {
        wires.push({ register: reg.name, index: i });
      }
    }
    return wires;
  }

  /**
   * Operation nodes on one wire, in chain order
   */
  wireOperations(wire: Wire): OpNode<P>[] {
    const key = wireKey(wire);
    const end = this.outputNode(wire);
    const ops: OpNode<P>[] = [];
    let current = this.inputNode(wire);
    while (current !== end) {
      const next = this._outEdges[current].find((e) => wireKey(e.wire) === key);
      if (!next) break;
      current = next.target;
      const node = this._nodes[current];
      if (node.type === 'op') ops.push(node);
    }
    return ops;
  }

  /**
   * Node ids in a topological order (Kahn's algorithm)
   *
   * Among ready nodes the smallest id goes first, so a graph built by
   * appending in program order yields that order back.
   */
  topologicalNodeOrder(): NodeId[] {
    const inDegree = this._inEdges.map((edges) => edges.length);
    const ready: NodeId[] = [];
    for (let id = 0; id < inDegree.length; id++) {
      if (inDegree[id] === 0) ready.push(id);
    }

    const order: NodeId[] = [];
    while (ready.length > 0) {
      const current = ready.shift();
      if (current === undefined) break;
      order.push(current);

      for (const edge of this._outEdges[current]) {
        inDegree[edge.target] -= 1;
        if (inDegree[edge.target] === 0) {
          insertSorted(ready, edge.target);
        }
      }
    }

    if (order.length !== this._nodes.length) {
      throw new CircuitError('DAG contains a cycle');
    }
    return order;
  }

  // =========================================================================
  // Statistics
  // =========================================================================

  /**
   * Number of operation nodes
   */
  size(): number {
    return this.opNodes().length;
  }

  /**
   * Length of the longest path, counted in operations. Barriers don't add
   * depth.
   */
  depth(): number {
    const level = new Array<number>(this._nodes.length).fill(0);
    let max = 0;
    for (const id of this.topologicalNodeOrder()) {
      const node = this._nodes[id];
      let base = 0;
      for (const edge of this._inEdges[id]) {
        base = Math.max(base, level[edge.source]);
      }
      level[id] = node.type === 'op' && node.name !== 'barrier' ? base + 1 : base;
      max = Math.max(max, level[id]);
    }
    return max;
  }

  countOps(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const node of this.opNodes()) {
      counts[node.name] = (counts[node.name] || 0) + 1;
    }
    return counts;
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private assertMutable(): void {
    if (this._frozen) {
      throw new CircuitError(`DAG${this._name ? ` "${this._name}"` : ''} is frozen`);
    }
  }

  private declareRegister(kind: RegisterKind, name: string, size: number): Register {
    this.assertMutable();
    if (this._qregs.has(name) || this._cregs.has(name)) {
      throw new DuplicateRegisterNameError(`register name "${name}" already exists`);
    }
    const register = new Register(kind, size, name);
    (kind === 'quantum' ? this._qregs : this._cregs).set(name, register);

    for (let i = 0; i < size; i++) {
      const wire = { register: name, index: i };
      const inId = this._nodes.length;
      this.addNode({ id: inId, type: 'in', wire });
      const outId = this._nodes.length;
      this.addNode({ id: outId, type: 'out', wire: { ...wire } });
      this._inputs.set(wireKey(wire), inId);
      this._outputs.set(wireKey(wire), outId);
      this.addEdge(inId, outId, wire);
    }
    return register;
  }

  private addNode(node: DagNode<P>): void {
    this._nodes.push(node);
    this._outEdges.push([]);
    this._inEdges.push([]);
  }

  private addEdge(source: NodeId, target: NodeId, wire: Wire): void {
    const edge = { source, target, wire: copyWire(wire) };
    this._outEdges[source].push(edge);
    this._inEdges[target].push(edge);
  }

  private removeEdge(edge: DagEdge): void {
    this._outEdges[edge.source] = this._outEdges[edge.source].filter((e) => e !== edge);
    this._inEdges[edge.target] = this._inEdges[edge.target].filter((e) => e !== edge);
  }

  private checkArity(
    element: BasisElement,
    numQubits: number,
    numClbits: number,
    numParams: number
  ): void {
    const qubitsOk =
      element.numQubits === 'variadic' ? numQubits > 0 : numQubits === element.numQubits;
    if (!qubitsOk || numClbits !== element.numClbits || numParams !== element.numParams) {
      throw new ArityMismatchError(
        `"${element.name}" expects (${element.numQubits}, ${element.numClbits}, ${element.numParams}), got (${numQubits}, ${numClbits}, ${numParams})`
      );
    }
  }

  private checkWire(wire: Wire, kind: RegisterKind): void {
    const register = this._qregs.get(wire.register) ?? this._cregs.get(wire.register);
    if (!register) {
      throw new UnknownRegisterError(`register "${wire.register}" not in this DAG`);
    }
    if (register.kind !== kind) {
      throw new WrongRegisterKindError(`expected ${kind} register, got "${register.name}"`);
    }
    register.checkRange(wire.index);
  }

  private checkCondition(condition: DagCondition): Register {
    const creg = this._cregs.get(condition.register);
    if (!creg) {
      if (this._qregs.has(condition.register)) {
        throw new WrongRegisterKindError(
          `condition register "${condition.register}" is not classical`
        );
      }
      throw new UnknownRegisterError(`register "${condition.register}" not in this DAG`);
    }
    checkConditionValue(creg, condition.value);
    return creg;
  }
}

/**
 * A condition value must fit in the register and be a safe integer, so
 * registers wider than 53 bits can only be compared against values up to
 * `Number.MAX_SAFE_INTEGER`
 */
export function checkConditionValue(register: Register, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0 || value >= 2 ** register.size) {
    throw new InvalidConditionError(
      `condition value ${value} does not fit register "${register.name}" of size ${register.size}`
    );
  }
}

function copyWire(wire: Wire): Wire {
  return { register: wire.register, index: wire.index };
}

function unique(ids: NodeId[]): NodeId[] {
  return [...new Set(ids)];
}

function insertSorted(queue: NodeId[], id: NodeId): void {
  let lo = 0;
  let hi = queue.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (queue[mid] < id) lo = mid + 1;
    else hi = mid;
  }
  queue.splice(lo, 0, id);
}
