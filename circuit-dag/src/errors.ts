export type DependencyGraphErrorCode = 'DuplicateDefinition' | 'NotInFrontLayer' | 'IndexOutOfRange'

/**
 * Raised by DependencyGraph mutations and queries. Mutations throw before
 * touching any state, so a failed insertion leaves the graph as it was.
 *
 * There is no code for an inconsistent `alreadyExecuted` set:
 * the graph never validates caller execution state (see blockingPredecessors).
 */
export class DependencyGraphError extends Error {
  readonly code: DependencyGraphErrorCode

  constructor(code: DependencyGraphErrorCode, message: string) {
    super(message)
    this.name = 'DependencyGraphError'
    this.code = code
  }

  static duplicateDefinition(register: string, existing: number): DependencyGraphError {
    return new DependencyGraphError(
      'DuplicateDefinition',
      `Register '${register}' is already defined by node ${existing}`
    )
  }

  static notInFrontLayer(node: number): DependencyGraphError {
    return new DependencyGraphError('NotInFrontLayer', `Node ${node} is not in the current front layer`)
  }

  static indexOutOfRange(node: number, nodeCount: number): DependencyGraphError {
    return new DependencyGraphError(
      'IndexOutOfRange',
      `Node index ${node} out of range for graph with ${nodeCount} nodes`
    )
  }
}
