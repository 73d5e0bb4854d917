// Layered topological decomposition of the dependency graph
// Kahn's algorithm, except that each step releases the whole ready set at once

export type LayerDirection = 'forward' | 'reverse'

// Read-only adjacency the layering needs; DependencyGraph provides it
export interface DagAdjacency {
  readonly nodeCount: number
  readonly predecessorSets: ReadonlyArray<ReadonlySet<number>>
  readonly successorSets: ReadonlyArray<ReadonlySet<number>>
  isDefinitionNode(node: number): boolean
}

const ascending = (a: number, b: number) => a - b

// Definitions are not reordered against the rest of a layer: going forward
// they run as a block of their own ahead of it, in reverse they come out last.
function splitLayer(
  dag: DagAdjacency,
  layer: number[],
  direction: LayerDirection
): { block: number[]; deferred: number[] } {
  const definitions = layer.filter(node => dag.isDefinitionNode(node))
  if (definitions.length === 0 || definitions.length === layer.length) {
    return { block: layer, deferred: [] }
  }
  const others = layer.filter(node => !dag.isDefinitionNode(node))
  return direction === 'forward'
    ? { block: definitions, deferred: others }
    : { block: others, deferred: definitions }
}

/**
 * Yield the graph as a sequence of blocks. Each block is the set of nodes
 * whose dependencies (successors when reversed) all sit in earlier blocks,
 * so every block is an antichain and, split-off definitions aside, the
 * number of blocks equals the number of nodes on the longest dependency path.
 *
 * The pass works on a private count of unreleased dependencies and never
 * touches the graph; call again for a fresh pass. The graph must not be
 * mutated while a pass is being consumed.
 */
export function* layeredBlocks(
  dag: DagAdjacency,
  direction: LayerDirection = 'forward'
): Generator<number[], void, undefined> {
  const incoming = direction === 'forward' ? dag.predecessorSets : dag.successorSets
  const outgoing = direction === 'forward' ? dag.successorSets : dag.predecessorSets

  const unreleased: number[] = []
  let ready: number[] = []
  for (let node = 0; node < dag.nodeCount; node++) {
    const count = incoming[node]?.size ?? 0
    unreleased.push(count)
    if (count === 0) ready.push(node)
  }

  while (ready.length > 0) {
    const { block, deferred } = splitLayer(dag, ready, direction)
    const next = deferred
    for (const node of block) {
      for (const dependent of outgoing[node] ?? []) {
        const remaining = (unreleased[dependent] ?? 0) - 1
        unreleased[dependent] = remaining
        if (remaining === 0) next.push(dependent)
      }
    }
    yield [...block].sort(ascending)
    ready = next
  }
}

export function firstBlock(dag: DagAdjacency, direction: LayerDirection): number[] {
  const result = layeredBlocks(dag, direction).next()
  return result.done ? [] : result.value
}
