// Configuration for the dependency graph and the execution tracker

export type Logger = Pick<Console, 'debug' | 'warn'>

export type DependencyGraphOptions = {
  // Skip edges between operations that commute (default true).
  // When false every shared resource orders its operations.
  commutationAware?: boolean
  verbose?: boolean // Log every insertion (default false)
  logger?: Logger // Defaults to console
}

export type ExecutionTrackerOptions = {
  // Throw when asked to execute a node outside the front layer (default true).
  // When false the request is logged and ignored.
  strict?: boolean
  logger?: Logger
}

export const LOG_PREFIX = '[circuitdag]'

export function resolveGraphOptions(options: DependencyGraphOptions = {}): Required<DependencyGraphOptions> {
  return {
    commutationAware: options.commutationAware ?? true,
    verbose: options.verbose ?? false,
    logger: options.logger ?? console,
  }
}

export function resolveTrackerOptions(
  options: ExecutionTrackerOptions = {}
): Required<ExecutionTrackerOptions> {
  return {
    strict: options.strict ?? true,
    logger: options.logger ?? console,
  }
}
