// Thrown by operation constructors when an argument cannot describe a valid instruction
export class InvalidOperationError extends Error {
  readonly operationType: string

  constructor(operationType: string, message: string) {
    super(`Invalid ${operationType}: ${message}`)
    this.name = 'InvalidOperationError'
    this.operationType = operationType
  }
}

// Thrown by Circuit.fromJSON when the input does not match the circuit schema
export class CircuitParseError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid circuit: ${issues.join(', ')}`)
    this.name = 'CircuitParseError'
    this.issues = issues
  }
}
