/**
 * @circuitdag/core - circuit dependency graph and parallel-execution scheduler
 *
 * Turns a linear sequence of operations into a DAG of true dependencies and
 * answers scheduling queries on it:
 *
 * - blocking analysis (direct and transitive)
 * - front-layer advancement
 * - parallel block decomposition
 * - commuting-operation detection
 */

export { DependencyGraph, type Edge } from './dependency-graph'
export { DependencyGraphError, type DependencyGraphErrorCode } from './errors'
export { ExecutionTracker } from './execution-tracker'
export type { DependencyGraphOptions, ExecutionTrackerOptions, Logger } from './options'
export type { LayerDirection } from './parallel-blocks'
