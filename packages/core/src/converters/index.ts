export { circuitToDag } from './circuit-to-dag';
export { dagToCircuit } from './dag-to-circuit';
export type { DagToCircuitOptions } from './dag-to-circuit';
