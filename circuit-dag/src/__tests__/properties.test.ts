// Structural checks on pseudo-random circuits
import {
  classicalOverlap,
  cnot,
  commutesWith,
  controlledPauliZ,
  definitionBit,
  hadamard,
  involvedClassical,
  involvedQubits,
  measureQubit,
  type Operation,
  pauliX,
  pauliZ,
  pragmaConditional,
  pragmaGlobalPhase,
  pragmaRepeatedMeasurement,
  qubitsOverlap,
  rotateX,
  rotateZ,
} from '@circuitdag/operations'
import { describe, expect, it } from 'vitest'

import { DependencyGraph } from '../dependency-graph'

const QUBITS = 4
const SEEDS = [1, 7, 42, 1234, 99991]

// Small LCG so every run sees the same circuits
function random(seed: number) {
  let state = seed
  return (bound: number) => {
    state = (state * 48271) % 2147483647
    return state % bound
  }
}

function randomOperations(seed: number, length: number): Operation[] {
  const next = random(seed)
  const defined = new Set<string>()
  const ops: Operation[] = []
  const qubit = () => next(QUBITS)
  const pair = (): [number, number] => {
    const a = qubit()
    return [a, (a + 1 + next(QUBITS - 1)) % QUBITS]
  }
  while (ops.length < length) {
    switch (next(11)) {
      case 0:
        ops.push(hadamard(qubit()))
        break
      case 1:
        ops.push(pauliX(qubit()))
        break
      case 2:
        ops.push(pauliZ(qubit()))
        break
      case 3:
        ops.push(rotateZ(qubit(), 0.25))
        break
      case 4:
        ops.push(rotateX(qubit(), 0.5))
        break
      case 5:
        ops.push(cnot(...pair()))
        break
      case 6:
        ops.push(controlledPauliZ(...pair()))
        break
      case 7:
        ops.push(measureQubit(qubit(), 'ro', next(2)))
        break
      case 8: {
        const register = next(2) === 0 ? 'ro' : 'c'
        if (!defined.has(register)) {
          defined.add(register)
          ops.push(definitionBit(register, 2))
        }
        break
      }
      case 9:
        ops.push(next(2) === 0 ? pragmaGlobalPhase(0.1) : pragmaRepeatedMeasurement('ro', 10))
        break
      default:
        ops.push(pragmaConditional('c', next(2), [pauliX(qubit())]))
    }
  }
  return ops
}

function sharesResource(a: Operation, b: Operation): boolean {
  return (
    qubitsOverlap(involvedQubits(a), involvedQubits(b)) ||
    classicalOverlap(involvedClassical(a), involvedClassical(b))
  )
}

function checkBlocks(dag: DependencyGraph) {
  const blocks = [...dag.parallelBlocks()]
  // Every node is released exactly once only when the graph has no cycle
  expect(blocks.flat().sort((a, b) => a - b)).toEqual(dag.nodeIndices())
  for (const block of blocks) {
    for (const a of block) {
      for (const b of block) {
        if (a !== b) expect(dag.hasPath(a, b)).toBe(false)
      }
    }
  }
  const reversed = [...dag.reversedParallelBlocks()]
  expect(reversed.flat().sort((a, b) => a - b)).toEqual(dag.nodeIndices())
}

describe('dependency graph properties', () => {
  it.each(SEEDS)('should order every non-commuting pair (seed %i)', seed => {
    const ops = randomOperations(seed, 40)
    const dag = DependencyGraph.fromCircuit(ops)
    for (let j = 0; j < ops.length; j++) {
      for (let i = 0; i < j; i++) {
        if (!commutesWith(ops[i], ops[j])) {
          expect(dag.hasPath(i, j)).toBe(true)
        }
      }
    }
    checkBlocks(dag)
  })

  it.each(SEEDS)('should order every shared resource without commutation (seed %i)', seed => {
    const ops = randomOperations(seed, 30)
    const dag = DependencyGraph.fromCircuit(ops, { commutationAware: false })
    for (let j = 0; j < ops.length; j++) {
      for (let i = 0; i < j; i++) {
        if (sharesResource(ops[i], ops[j])) {
          expect(dag.hasPath(i, j)).toBe(true)
        }
      }
    }
    checkBlocks(dag)
  })

  it.each(SEEDS)('should link consecutive operations only when they conflict (seed %i)', seed => {
    const ops = randomOperations(seed, 40)
    const dag = DependencyGraph.fromCircuit(ops)
    for (let j = 1; j < ops.length; j++) {
      const i = j - 1
      if (!sharesResource(ops[i], ops[j])) {
        expect(dag.successors(i)).not.toContain(j)
      } else if (!commutesWith(ops[i], ops[j])) {
        expect(dag.successors(i)).toContain(j)
      }
    }
  })

  it.each(SEEDS)('should only link operations that do not commute (seed %i)', seed => {
    const ops = randomOperations(seed, 40)
    const dag = DependencyGraph.fromCircuit(ops)
    for (const { source, target } of dag.edges()) {
      expect(commutesWith(ops[source], ops[target])).toBe(false)
    }
  })

  it.each(SEEDS)('should make each node the last on the qubits it touches (seed %i)', seed => {
    const dag = new DependencyGraph()
    for (const op of randomOperations(seed, 40)) {
      const node = dag.addToBack(op)
      const qubits = involvedQubits(op)
      if (qubits.kind === 'set') {
        for (const qubit of qubits.qubits) {
          expect(dag.lastOperationOnQubit(qubit)).toBe(node)
        }
      } else if (qubits.kind === 'all') {
        for (const last of dag.lastOperationInvolvingQubit().values()) {
          expect(last).toBe(node)
        }
      }
    }
  })

  it.each(SEEDS)('should stay acyclic under mixed insertion (seed %i)', seed => {
    const ops = randomOperations(seed, 40)
    const side = random(seed + 1)
    const dag = new DependencyGraph()
    for (const op of ops) {
      if (side(2) === 0) dag.addToBack(op)
      else dag.addToFront(op)
    }
    expect(dag.nodeCount).toBe(ops.length)
    checkBlocks(dag)
  })

  it.each(SEEDS)('should advance the front layer through every node (seed %i)', seed => {
    const dag = DependencyGraph.fromCircuit(randomOperations(seed, 40))
    const executed: number[] = []
    let front = dag.initialFrontLayer()
    while (front.length > 0) {
      const node = front[front.length - 1]
      expect(dag.blockingPredecessors(executed, node)).toEqual([])
      expect(dag.executionBlocked(executed, node)).toEqual([])
      front = dag.newFrontLayer(executed, front, node)
      executed.push(node)
    }
    expect(executed.length).toBe(dag.nodeCount)
  })
})
