import { isEqual } from 'lodash'

import { CircuitParseError } from './errors'
import { type InvolvedQubits, mergeQubits, NO_QUBITS } from './involved'
import {
  type Definition,
  involvedQubits,
  isDefinition,
  type Operation,
  type OperationType,
  operationToString,
} from './operations'
import { CIRCUIT_FORMAT_VERSION, type CircuitJSON, circuitSchema, formatIssue } from './schema'

/**
 * Ordered, mutable sequence of operations - the form a program is written in.
 *
 * @example
 * ```ts
 * const circuit = new Circuit()
 *   .add(definitionBit('ro', 2, true))
 *   .add(hadamard(0))
 *   .add(cnot(0, 1))
 * ```
 */
export class Circuit implements Iterable<Operation> {
  private ops: Operation[]

  constructor(operations: Iterable<Operation> = []) {
    this.ops = [...operations]
  }

  // Parse and validate the output of toJSON (or JSON.parse of it)
  static fromJSON(input: unknown): Circuit {
    const result = circuitSchema.safeParse(input)
    if (!result.success) {
      throw new CircuitParseError(result.error.issues.map(formatIssue))
    }
    return new Circuit(result.data.operations)
  }

  get length(): number {
    return this.ops.length
  }

  add(op: Operation): this {
    this.ops.push(op)
    return this
  }

  get(index: number): Operation {
    const op = this.ops[index]
    if (op === undefined) {
      throw new RangeError(`Index ${index} out of range for circuit of length ${this.ops.length}`)
    }
    return op
  }

  [Symbol.iterator](): Iterator<Operation> {
    return this.ops[Symbol.iterator]()
  }

  // Definitions in circuit order
  definitions(): Definition[] {
    return this.ops.filter(isDefinition)
  }

  // Everything except definitions, in circuit order
  operations(): Operation[] {
    return this.ops.filter(op => !isDefinition(op))
  }

  concat(other: Iterable<Operation>): Circuit {
    return new Circuit([...this.ops, ...other])
  }

  countOccurrences(types: readonly OperationType[]): number {
    const wanted = new Set<OperationType>(types)
    return this.ops.filter(op => wanted.has(op.type)).length
  }

  involvedQubits(): InvolvedQubits {
    return this.ops.reduce<InvolvedQubits>((acc, op) => mergeQubits(acc, involvedQubits(op)), NO_QUBITS)
  }

  equals(other: Circuit): boolean {
    return isEqual(this.ops, other.ops)
  }

  toJSON(): CircuitJSON {
    return { version: CIRCUIT_FORMAT_VERSION, operations: [...this.ops] }
  }

  toString(): string {
    return this.ops.map(operationToString).join('\n')
  }
}
