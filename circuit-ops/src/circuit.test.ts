import { beforeEach, describe, expect, it } from 'vitest'

import { Circuit } from './circuit'
import { CircuitParseError } from './errors'
import {
  cnot,
  definitionBit,
  hadamard,
  measureQubit,
  pauliX,
  pragmaConditional,
  pragmaRepeatedMeasurement,
  rotateZ,
} from './operations'

describe('Circuit', () => {
  let circuit: Circuit

  beforeEach(() => {
    circuit = new Circuit()
      .add(definitionBit('ro', 2, true))
      .add(hadamard(0))
      .add(cnot(0, 2))
  })

  it('keeps operations in insertion order', () => {
    expect(circuit.length).toBe(3)
    expect(circuit.get(1)).toEqual(hadamard(0))
    expect([...circuit]).toEqual([definitionBit('ro', 2, true), hadamard(0), cnot(0, 2)])
  })

  it('throws a RangeError past the end', () => {
    expect(() => circuit.get(5)).toThrow(new RangeError('Index 5 out of range for circuit of length 3'))
  })

  it('separates definitions from other operations', () => {
    expect(circuit.definitions()).toEqual([definitionBit('ro', 2, true)])
    expect(circuit.operations()).toEqual([hadamard(0), cnot(0, 2)])
  })

  it('counts operations by type', () => {
    circuit.add(hadamard(1))
    expect(circuit.countOccurrences(['Hadamard'])).toBe(2)
    expect(circuit.countOccurrences(['Hadamard', 'CNOT'])).toBe(3)
    expect(circuit.countOccurrences(['SWAP'])).toBe(0)
  })

  it('collects the qubits of all operations', () => {
    expect(circuit.involvedQubits()).toEqual({ kind: 'set', qubits: new Set([0, 2]) })
    circuit.add(pragmaRepeatedMeasurement('ro', 100))
    expect(circuit.involvedQubits()).toEqual({ kind: 'all' })
  })

  it('concatenates without changing either circuit', () => {
    const joined = circuit.concat([measureQubit(0, 'ro', 0)])
    expect(joined.length).toBe(4)
    expect(circuit.length).toBe(3)
  })

  it('prints one operation per line', () => {
    expect(circuit.toString()).toBe('DefinitionBit(ro,2)\nHadamard(0)\nCNOT(0,2)')
  })

  describe('JSON', () => {
    it('restores an equal circuit from its JSON text', () => {
      circuit
        .add(rotateZ(1, 'theta'))
        .add(pragmaConditional('ro', 0, [pauliX(1)]))
        .add(measureQubit(0, 'ro', 1))
      const text = JSON.stringify(circuit)
      const restored = Circuit.fromJSON(JSON.parse(text))
      expect(restored.equals(circuit)).toBe(true)
      expect(restored.toJSON().version).toBe(1)
    })

    it('rejects operations that fail validation', () => {
      const input = { version: 1, operations: [{ type: 'Hadamard', qubit: -1 }] }
      expect(() => Circuit.fromJSON(input)).toThrow(CircuitParseError)
      try {
        Circuit.fromJSON(input)
      } catch (error) {
        expect(error instanceof CircuitParseError && error.issues[0]?.startsWith('operations.0')).toBe(true)
      }
    })

    it('rejects an unknown format version', () => {
      let caught: unknown
      try {
        Circuit.fromJSON({ version: 2, operations: [] })
      } catch (error) {
        caught = error
      }
      expect(caught).toBeInstanceOf(CircuitParseError)
      expect(caught instanceof CircuitParseError && caught.issues).toHaveLength(1)
      expect(caught instanceof CircuitParseError && caught.issues[0]?.startsWith('version: ')).toBe(true)
    })

    it('rejects a two-qubit gate with equal control and target', () => {
      const input = { version: 1, operations: [{ type: 'CNOT', control: 1, target: 1 }] }
      expect(() => Circuit.fromJSON(input)).toThrow(CircuitParseError)
    })
  })
})
