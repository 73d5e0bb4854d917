/**
 * @circuitdag/operations - quantum program building blocks
 *
 * The Operation model (a closed tagged union with resource involvement and a
 * commutation oracle) and the linear Circuit container with its JSON form.
 */

export { Circuit } from './circuit'
export { commutesWith, type PauliBasis, pauliBasis } from './commutation'
export { CircuitParseError, InvalidOperationError } from './errors'
export {
  ALL_QUBITS,
  type ClassicalEntry,
  classicalKey,
  classicalOverlap,
  classicalSet,
  type InvolvedClassical,
  type InvolvedQubits,
  involvedRegisters,
  mergeQubits,
  NO_CLASSICAL,
  NO_QUBITS,
  qubitSet,
  qubitsOverlap,
  wholeRegister,
} from './involved'
export * from './operations'
export { CIRCUIT_FORMAT_VERSION, type CircuitJSON, circuitSchema, operationSchema } from './schema'
