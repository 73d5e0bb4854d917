// ExecutionTracker - caller-side execution state for a dependency graph
// Keeps a consistent executed set and the matching front layer, built only
// on the graph's public queries, and publishes changes as observables.

import { BehaviorSubject, type Observable, Subject } from 'rxjs'

import type { DependencyGraph } from './dependency-graph'
import { DependencyGraphError } from './errors'
import { type ExecutionTrackerOptions, LOG_PREFIX, resolveTrackerOptions } from './options'

export class ExecutionTracker {
  private readonly executed = new Set<number>()
  private readonly front: BehaviorSubject<number[]>
  private readonly completed = new Subject<number>()
  private readonly options: Required<ExecutionTrackerOptions>

  // Current front layer, replayed to new subscribers
  readonly frontLayer$: Observable<number[]>
  // Each node as it is marked executed
  readonly completed$: Observable<number>

  constructor(
    private readonly graph: DependencyGraph,
    options: ExecutionTrackerOptions = {}
  ) {
    this.options = resolveTrackerOptions(options)
    this.front = new BehaviorSubject(graph.initialFrontLayer())
    this.frontLayer$ = this.front.asObservable()
    this.completed$ = this.completed.asObservable()
  }

  get frontLayer(): number[] {
    return [...this.front.value]
  }

  get executedNodes(): number[] {
    return [...this.executed].sort((a, b) => a - b)
  }

  get isComplete(): boolean {
    return this.executed.size === this.graph.nodeCount
  }

  isReady(node: number): boolean {
    return this.front.value.includes(node)
  }

  /**
   * Mark a front-layer node executed and advance the front layer.
   * Returns false if the node was not ready and the tracker is not strict.
   */
  execute(node: number): boolean {
    let next: number[]
    try {
      next = this.graph.newFrontLayer(this.executed, this.front.value, node)
    } catch (error) {
      if (
        !this.options.strict &&
        error instanceof DependencyGraphError &&
        error.code === 'NotInFrontLayer'
      ) {
        if (this.executed.has(node)) {
          this.options.logger.warn(`${LOG_PREFIX} ignoring node ${node}, already executed`)
        } else {
          const blocking = this.graph.executionBlocked(this.executed, node)
          this.options.logger.warn(
            `${LOG_PREFIX} ignoring node ${node}, still blocked by [${blocking.join(',')}]`
          )
        }
        return false
      }
      throw error
    }
    this.executed.add(node)
    this.front.next(next)
    this.completed.next(node)
    return true
  }

  // Execute the whole current front layer and return it
  executeBlock(): number[] {
    const block = this.frontLayer
    for (const node of block) {
      this.execute(node)
    }
    return block
  }

  dispose(): void {
    this.front.complete()
    this.completed.complete()
  }
}
