import { isEqual } from 'lodash'

import { classicalOverlap, type InvolvedQubits, qubitsOverlap } from './involved'
import {
  type GateOperation,
  involvedClassical,
  involvedQubits,
  isDefinition,
  isGateOperation,
  type Operation,
} from './operations'

export type PauliBasis = 'x' | 'y' | 'z'

// Basis in which a gate acts diagonally on one of its qubits.
// undefined when the gate does not act on the qubit or mixes bases there.
export function pauliBasis(gate: GateOperation, qubit: number): PauliBasis | undefined {
  switch (gate.type) {
    case 'PauliZ':
    case 'SGate':
    case 'TGate':
    case 'RotateZ':
    case 'PhaseShiftState1':
      return gate.qubit === qubit ? 'z' : undefined
    case 'PauliX':
    case 'SqrtPauliX':
    case 'RotateX':
      return gate.qubit === qubit ? 'x' : undefined
    case 'PauliY':
    case 'RotateY':
      return gate.qubit === qubit ? 'y' : undefined
    case 'Hadamard':
    case 'SWAP':
      return undefined
    case 'ControlledPauliZ':
    case 'ControlledPhaseShift':
      return gate.control === qubit || gate.target === qubit ? 'z' : undefined
    case 'CNOT':
      if (gate.control === qubit) return 'z'
      if (gate.target === qubit) return 'x'
      return undefined
  }
}

function sharedQubits(a: InvolvedQubits, b: InvolvedQubits): number[] {
  if (a.kind !== 'set' || b.kind !== 'set') return []
  return [...a.qubits].filter(qubit => b.qubits.has(qubit))
}

/**
 * Pairwise commutation oracle: true when executing `a` and `b` in either order
 * gives the same result.
 *
 * The relation is symmetric but not transitive; callers must ask about every
 * pair they intend to reorder instead of chaining answers.
 */
export function commutesWith(a: Operation, b: Operation): boolean {
  // Global phase is invisible to every other instruction
  if (a.type === 'PragmaGlobalPhase' || b.type === 'PragmaGlobalPhase') return true

  const qubitsA = involvedQubits(a)
  const qubitsB = involvedQubits(b)
  const sharesQubits = qubitsOverlap(qubitsA, qubitsB)
  const sharesClassical = classicalOverlap(involvedClassical(a), involvedClassical(b))
  if (!sharesQubits && !sharesClassical) return true

  // A register has to be declared before anything reads or writes it
  if (isDefinition(a) || isDefinition(b)) return false

  if (isEqual(a, b)) return true

  if (isGateOperation(a) && isGateOperation(b)) {
    const shared = sharedQubits(qubitsA, qubitsB)
    return shared.every(qubit => {
      const basis = pauliBasis(a, qubit)
      return basis !== undefined && basis === pauliBasis(b, qubit)
    })
  }

  return false
}
