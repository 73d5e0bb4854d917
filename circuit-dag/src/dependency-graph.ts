// DependencyGraph - DAG of true data dependencies between circuit operations
// Built once from a circuit or grown incrementally, then queried by a caller
// that tracks which nodes it has already executed.

import {
  Circuit,
  classicalKey,
  commutesWith,
  involvedClassical,
  involvedQubits,
  involvedRegisters,
  isDefinition,
  type Operation,
  operationToString,
} from '@circuitdag/operations'

import { DependencyGraphError } from './errors'
import { type DependencyGraphOptions, LOG_PREFIX, resolveGraphOptions } from './options'
import { type DagAdjacency, firstBlock, layeredBlocks } from './parallel-blocks'
import {
  type CommutesWith,
  type Link,
  QUBIT_SCOPE,
  ResourceIndex,
  registerOfKey,
  splitClassicalKey,
} from './resource-index'

// predecessor must execute no later than successor
export type Edge = {
  source: number
  target: number
}

type Side = 'back' | 'front'

const ascending = (a: number, b: number) => a - b

function sorted(nodes: Iterable<number>): number[] {
  return [...nodes].sort(ascending)
}

function nestByRegister(flat: Map<string, number>): Map<string, Map<number, number>> {
  const out = new Map<string, Map<number, number>>()
  for (const [key, node] of flat) {
    const [register, index] = splitClassicalKey(key)
    let cells = out.get(register)
    if (!cells) {
      cells = new Map()
      out.set(register, cells)
    }
    cells.set(index, node)
  }
  return out
}

/**
 * Directed acyclic graph whose nodes are operations and whose edges are
 * "must execute before" constraints.
 *
 * Node indices are assigned in insertion order and never reused. Edges only
 * ever run from existing nodes to a node inserted at the back, or from a node
 * inserted at the front to existing nodes, so the graph stays acyclic.
 *
 * The graph owns copies of the operations it is given and hands out copies;
 * it is meant to be built by a single writer and queried afterwards.
 *
 * @example
 * ```ts
 * const dag = DependencyGraph.fromCircuit(circuit)
 * for (const block of dag.parallelBlocks()) {
 *   await backend.run(block.map(node => dag.get(node)))
 * }
 * ```
 */
export class DependencyGraph {
  private readonly operations: Operation[] = []
  private readonly predecessorList: Set<number>[] = []
  private readonly successorList: Set<number>[] = []
  private readonly qubits = new ResourceIndex<number>(() => QUBIT_SCOPE)
  private readonly classical = new ResourceIndex<string>(registerOfKey)
  private readonly definitions = new Map<string, number>()
  private edgeTotal = 0
  private firstAllNode: number | undefined
  private lastAllNode: number | undefined
  private readonly options: Required<DependencyGraphOptions>

  constructor(options: DependencyGraphOptions = {}) {
    this.options = resolveGraphOptions(options)
  }

  // Node i of the result is the i-th operation of the circuit
  static fromCircuit(circuit: Iterable<Operation>, options?: DependencyGraphOptions): DependencyGraph {
    const graph = new DependencyGraph(options)
    for (const op of circuit) {
      graph.addToBack(op)
    }
    return graph
  }

  get nodeCount(): number {
    return this.operations.length
  }

  get edgeCount(): number {
    return this.edgeTotal
  }

  // First node involving all qubits, in execution order
  get firstAll(): number | undefined {
    return this.firstAllNode
  }

  // Last node involving all qubits, in execution order
  get lastAll(): number | undefined {
    return this.lastAllNode
  }

  // ---------------------------------------------------------------------------
  // Construction
  // ---------------------------------------------------------------------------

  /**
   * Insert an operation after everything already in the graph and return its
   * node index.
   *
   * For each resource the operation touches it is linked from the latest
   * nodes it does not commute with; nodes it commutes with get no edge.
   * A definition of a register is always a direct predecessor of operations
   * using that register.
   *
   * @throws DependencyGraphError `DuplicateDefinition` if the operation
   * defines a register that is already defined. The graph is unchanged.
   */
  addToBack(op: Operation): number {
    this.checkDefinition(op)
    const node = this.createNode(op)
    const commutes = this.commutesWithNode(node)
    const link: Link = (from, to) => this.addEdge(from, to)

    const qubits = involvedQubits(op)
    if (qubits.kind === 'all') {
      this.qubits.appendToScope(QUBIT_SCOPE, node, commutes, link)
      this.firstAllNode ??= node
      this.lastAllNode = node
    } else if (qubits.kind === 'set') {
      for (const qubit of qubits.qubits) {
        this.qubits.append(qubit, node, commutes, link)
      }
    }

    const classical = involvedClassical(op)
    if (classical.kind === 'all') {
      this.classical.appendToScope(classical.register, node, commutes, link)
    } else if (classical.kind === 'set') {
      for (const entry of classical.entries) {
        this.classical.append(classicalKey(entry), node, commutes, link)
      }
    }

    for (const register of involvedRegisters(classical)) {
      const declaring = this.definitions.get(register)
      if (declaring !== undefined) this.addEdge(declaring, node)
    }

    this.registerDefinition(op, node)
    this.logInsertion('back', node)
    return node
  }

  /**
   * Insert an operation before everything already in the graph and return
   * its node index. Mirror image of addToBack, using the first-operation
   * side of the resource index.
   *
   * An operation inserted here that uses an already defined register ends up
   * ordered before that definition; callers prepending register users are
   * expected to prepend the definition last.
   *
   * @throws DependencyGraphError `DuplicateDefinition`, leaving the graph unchanged.
   */
  addToFront(op: Operation): number {
    this.checkDefinition(op)
    const node = this.createNode(op)
    const commutes = this.commutesWithNode(node)
    const link: Link = (from, to) => this.addEdge(from, to)

    const qubits = involvedQubits(op)
    if (qubits.kind === 'all') {
      this.qubits.prependToScope(QUBIT_SCOPE, node, commutes, link)
      this.lastAllNode ??= node
      this.firstAllNode = node
    } else if (qubits.kind === 'set') {
      for (const qubit of qubits.qubits) {
        this.qubits.prepend(qubit, node, commutes, link)
      }
    }

    const classical = involvedClassical(op)
    if (classical.kind === 'all') {
      this.classical.prependToScope(classical.register, node, commutes, link)
    } else if (classical.kind === 'set') {
      for (const entry of classical.entries) {
        this.classical.prepend(classicalKey(entry), node, commutes, link)
      }
    }

    if (isDefinition(op)) {
      for (let user = 0; user < node; user++) {
        if (involvedRegisters(involvedClassical(this.operations[user])).has(op.name)) {
          this.addEdge(node, user)
        }
      }
    }

    this.registerDefinition(op, node)
    this.logInsertion('front', node)
    return node
  }

  private checkDefinition(op: Operation): void {
    if (!isDefinition(op)) return
    const existing = this.definitions.get(op.name)
    if (existing !== undefined) {
      throw DependencyGraphError.duplicateDefinition(op.name, existing)
    }
  }

  private registerDefinition(op: Operation, node: number): void {
    if (!isDefinition(op)) return
    this.definitions.set(op.name, node)
    // Declared cells exist from the definition on, even before anything uses them
    for (let index = 0; index < op.length; index++) {
      this.classical.touch(classicalKey([op.name, index]))
    }
  }

  private createNode(op: Operation): number {
    const node = this.operations.length
    this.operations.push(structuredClone(op))
    this.predecessorList.push(new Set())
    this.successorList.push(new Set())
    return node
  }

  private commutesWithNode(node: number): CommutesWith {
    const op = this.operations[node]
    return member => this.options.commutationAware && commutesWith(this.operations[member], op)
  }

  private addEdge(source: number, target: number): void {
    if (source === target || this.successorList[source].has(target)) return
    this.successorList[source].add(target)
    this.predecessorList[target].add(source)
    this.edgeTotal++
  }

  private logInsertion(side: Side, node: number): void {
    if (!this.options.verbose) return
    this.options.logger.debug(
      `${LOG_PREFIX} ${side === 'back' ? 'appended' : 'prepended'} node ${node} ` +
        `${operationToString(this.operations[node])} ` +
        `predecessors=[${sorted(this.predecessorList[node]).join(',')}] ` +
        `successors=[${sorted(this.successorList[node]).join(',')}]`
    )
  }

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  // Copy of the operation stored at a node
  get(node: number): Operation {
    this.checkIndex(node)
    return structuredClone(this.operations[node])
  }

  nodeIndices(): number[] {
    return this.operations.map((_op, node) => node)
  }

  edges(): Edge[] {
    const out: Edge[] = []
    this.successorList.forEach((targets, source) => {
      for (const target of sorted(targets)) out.push({ source, target })
    })
    return out
  }

  successors(node: number): number[] {
    this.checkIndex(node)
    return sorted(this.successorList[node])
  }

  predecessors(node: number): number[] {
    this.checkIndex(node)
    return sorted(this.predecessorList[node])
  }

  // True if `to` is reachable from `from` along one or more edges
  hasPath(from: number, to: number): boolean {
    this.checkIndex(from)
    this.checkIndex(to)
    const visited = new Set<number>()
    const stack = [...this.successorList[from]]
    for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
      if (node === to) return true
      if (visited.has(node)) continue
      visited.add(node)
      stack.push(...this.successorList[node])
    }
    return false
  }

  definitionOf(register: string): number | undefined {
    return this.definitions.get(register)
  }

  firstOperationInvolvingQubit(): Map<number, number> {
    return this.qubits.firstMap()
  }

  lastOperationInvolvingQubit(): Map<number, number> {
    return this.qubits.lastMap()
  }

  // register -> index -> node
  firstOperationInvolvingClassical(): Map<string, Map<number, number>> {
    return nestByRegister(this.classical.firstMap())
  }

  // register -> index -> node
  lastOperationInvolvingClassical(): Map<string, Map<number, number>> {
    return nestByRegister(this.classical.lastMap())
  }

  firstOperationOnQubit(qubit: number): number | undefined {
    return this.qubits.first(qubit)
  }

  lastOperationOnQubit(qubit: number): number | undefined {
    return this.qubits.last(qubit)
  }

  firstOperationOnClassical(register: string, index: number): number | undefined {
    return this.classical.first(classicalKey([register, index]))
  }

  lastOperationOnClassical(register: string, index: number): number | undefined {
    return this.classical.last(classicalKey([register, index]))
  }

  private checkIndex(node: number): void {
    if (!Number.isInteger(node) || node < 0 || node >= this.operations.length) {
      throw DependencyGraphError.indexOutOfRange(node, this.operations.length)
    }
  }

  // ---------------------------------------------------------------------------
  // Blocking analysis
  // ---------------------------------------------------------------------------

  /**
   * Every transitive predecessor of `toBeExecuted` that is not in
   * `alreadyExecuted`, ascending. Sound for any `alreadyExecuted` set.
   */
  executionBlocked(alreadyExecuted: Iterable<number>, toBeExecuted: number): number[] {
    this.checkIndex(toBeExecuted)
    const executed = new Set(alreadyExecuted)
    const blocked = new Set<number>()
    const visited = new Set<number>()
    const stack = [...this.predecessorList[toBeExecuted]]
    for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
      if (visited.has(node)) continue
      visited.add(node)
      if (!executed.has(node)) blocked.add(node)
      stack.push(...this.predecessorList[node])
    }
    return sorted(blocked)
  }

  /**
   * Direct predecessors of `toBeExecuted` that are not in `alreadyExecuted`,
   * ascending.
   *
   * Only looks one edge back, so it assumes `alreadyExecuted` is consistent:
   * no node in it is missing one of its own predecessors. Given an
   * inconsistent set, an empty result does not mean the node can run; use
   * executionBlocked for an answer that holds for any input. The graph does
   * not check consistency.
   */
  blockingPredecessors(alreadyExecuted: Iterable<number>, toBeExecuted: number): number[] {
    this.checkIndex(toBeExecuted)
    const executed = new Set(alreadyExecuted)
    return sorted([...this.predecessorList[toBeExecuted]].filter(node => !executed.has(node)))
  }

  // ---------------------------------------------------------------------------
  // Front layer
  // ---------------------------------------------------------------------------

  // Nodes without predecessors: the front layer before anything has run
  initialFrontLayer(): number[] {
    return this.nodeIndices().filter(node => this.predecessorList[node].size === 0)
  }

  /**
   * Front layer after executing `toBeExecuted`: it is removed, and each of
   * its successors whose other predecessors are all in `alreadyExecuted`
   * joins. Result is ascending.
   *
   * Like blockingPredecessors this trusts `alreadyExecuted` and
   * `currentFrontLayer` to be consistent with each other.
   *
   * @throws DependencyGraphError `NotInFrontLayer` if `toBeExecuted` is not
   * in `currentFrontLayer`, `IndexOutOfRange` for an unknown node.
   */
  newFrontLayer(
    alreadyExecuted: Iterable<number>,
    currentFrontLayer: Iterable<number>,
    toBeExecuted: number
  ): number[] {
    this.checkIndex(toBeExecuted)
    const front = new Set(currentFrontLayer)
    if (!front.has(toBeExecuted)) {
      throw DependencyGraphError.notInFrontLayer(toBeExecuted)
    }
    const executed = new Set(alreadyExecuted)
    executed.add(toBeExecuted)
    front.delete(toBeExecuted)

    for (const successor of this.successorList[toBeExecuted]) {
      if (executed.has(successor)) continue
      if ([...this.predecessorList[successor]].every(node => executed.has(node))) {
        front.add(successor)
      }
    }
    return sorted(front)
  }

  // ---------------------------------------------------------------------------
  // Parallel blocks
  // ---------------------------------------------------------------------------

  // Lazy sequence of concurrently executable blocks, first to last
  parallelBlocks(): Generator<number[], void, undefined> {
    return layeredBlocks(this.adjacency(), 'forward')
  }

  // Same layering computed from the end of the graph, last block first
  reversedParallelBlocks(): Generator<number[], void, undefined> {
    return layeredBlocks(this.adjacency(), 'reverse')
  }

  firstParallelBlock(): number[] {
    return firstBlock(this.adjacency(), 'forward')
  }

  lastParallelBlock(): number[] {
    return firstBlock(this.adjacency(), 'reverse')
  }

  /**
   * Definitions, plus every node whose operation commutes with all of its
   * neighbours. These are the nodes a later pass may move freely.
   */
  commutingOperations(): number[] {
    return this.nodeIndices().filter(node => {
      const op = this.operations[node]
      if (isDefinition(op)) return true
      const neighbours = [...this.predecessorList[node], ...this.successorList[node]]
      return neighbours.every(other => commutesWith(op, this.operations[other]))
    })
  }

  // Circuit holding the operations in parallel-block order
  toCircuit(): Circuit {
    const circuit = new Circuit()
    for (const block of this.parallelBlocks()) {
      for (const node of block) circuit.add(this.get(node))
    }
    return circuit
  }

  private adjacency(): DagAdjacency {
    return {
      nodeCount: this.operations.length,
      predecessorSets: this.predecessorList,
      successorSets: this.successorList,
      isDefinitionNode: node => isDefinition(this.operations[node]),
    }
  }
}
