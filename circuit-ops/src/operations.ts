// Operation model - closed tagged union over every instruction a Circuit can hold
// Variants are plain immutable values; behaviour lives in free functions that
// switch exhaustively on `type`.

import { InvalidOperationError } from './errors'
import {
  ALL_QUBITS,
  type ClassicalEntry,
  classicalSet,
  type InvolvedClassical,
  type InvolvedQubits,
  mergeQubits,
  NO_CLASSICAL,
  NO_QUBITS,
  qubitSet,
  wholeRegister,
} from './involved'

// A float parameter that is either a value or a symbolic expression
export type CalculatorFloat = number | string

export const DEFINITION_TYPES = [
  'DefinitionBit',
  'DefinitionFloat',
  'DefinitionComplex',
  'DefinitionUsize',
] as const
export type DefinitionType = (typeof DEFINITION_TYPES)[number]

export const SINGLE_QUBIT_GATE_TYPES = [
  'Hadamard',
  'PauliX',
  'PauliY',
  'PauliZ',
  'SGate',
  'TGate',
  'SqrtPauliX',
] as const
export type SingleQubitGateType = (typeof SINGLE_QUBIT_GATE_TYPES)[number]

export const ROTATION_TYPES = ['RotateX', 'RotateY', 'RotateZ', 'PhaseShiftState1'] as const
export type RotationType = (typeof ROTATION_TYPES)[number]

export const TWO_QUBIT_GATE_TYPES = ['CNOT', 'ControlledPauliZ', 'SWAP'] as const
export type TwoQubitGateType = (typeof TWO_QUBIT_GATE_TYPES)[number]

// Declares a classical register; unique per name within a circuit
export interface Definition {
  readonly type: DefinitionType
  readonly name: string
  readonly length: number
  readonly isOutput: boolean
}

export interface SingleQubitGate {
  readonly type: SingleQubitGateType
  readonly qubit: number
}

export interface RotationGate {
  readonly type: RotationType
  readonly qubit: number
  readonly theta: CalculatorFloat
}

export interface TwoQubitGate {
  readonly type: TwoQubitGateType
  readonly control: number
  readonly target: number
}

export interface ControlledPhaseShift {
  readonly type: 'ControlledPhaseShift'
  readonly control: number
  readonly target: number
  readonly theta: CalculatorFloat
}

export interface MeasureQubit {
  readonly type: 'MeasureQubit'
  readonly qubit: number
  readonly readout: string
  readonly readoutIndex: number
}

export interface PragmaRepeatedMeasurement {
  readonly type: 'PragmaRepeatedMeasurement'
  readonly readout: string
  readonly numberMeasurements: number
}

export interface PragmaGetStateVector {
  readonly type: 'PragmaGetStateVector'
  readonly readout: string
}

export interface PragmaSetNumberOfMeasurements {
  readonly type: 'PragmaSetNumberOfMeasurements'
  readonly readout: string
  readonly numberMeasurements: number
}

export interface PragmaGlobalPhase {
  readonly type: 'PragmaGlobalPhase'
  readonly phase: CalculatorFloat
}

export interface PragmaStopParallelBlock {
  readonly type: 'PragmaStopParallelBlock'
  readonly qubits: readonly number[]
  readonly executionTime: CalculatorFloat
}

export interface PragmaActiveReset {
  readonly type: 'PragmaActiveReset'
  readonly qubit: number
}

export interface PragmaSleep {
  readonly type: 'PragmaSleep'
  readonly qubits: readonly number[]
  readonly sleepTime: CalculatorFloat
}

// Runs the nested operations only if conditionRegister[conditionIndex] is set
export interface PragmaConditional {
  readonly type: 'PragmaConditional'
  readonly conditionRegister: string
  readonly conditionIndex: number
  readonly operations: readonly Operation[]
}

export type GateOperation = SingleQubitGate | RotationGate | TwoQubitGate | ControlledPhaseShift
export type Measurement = MeasureQubit | PragmaRepeatedMeasurement | PragmaGetStateVector
export type Pragma =
  | PragmaSetNumberOfMeasurements
  | PragmaGlobalPhase
  | PragmaStopParallelBlock
  | PragmaActiveReset
  | PragmaSleep
  | PragmaConditional

export type Operation = Definition | GateOperation | Measurement | Pragma
export type OperationType = Operation['type']
export type OperationKind = 'definition' | 'gate' | 'measurement' | 'pragma'

// ---------------------------------------------------------------------------
// Argument validation
// ---------------------------------------------------------------------------

function checkIndex(type: string, label: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidOperationError(type, `${label} must be a non-negative integer, got ${value}`)
  }
  return value
}

function checkCount(type: string, label: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidOperationError(type, `${label} must be a positive integer, got ${value}`)
  }
  return value
}

function checkName(type: string, label: string, value: string): string {
  if (value.length === 0) {
    throw new InvalidOperationError(type, `${label} must not be empty`)
  }
  return value
}

function checkPair(type: string, control: number, target: number): void {
  checkIndex(type, 'control', control)
  checkIndex(type, 'target', target)
  if (control === target) {
    throw new InvalidOperationError(type, `control and target must differ, both are ${control}`)
  }
}

function checkQubitList(type: string, qubits: readonly number[]): number[] {
  const seen = new Set<number>()
  for (const qubit of qubits) {
    checkIndex(type, 'qubit', qubit)
    if (seen.has(qubit)) {
      throw new InvalidOperationError(type, `qubit ${qubit} listed twice`)
    }
    seen.add(qubit)
  }
  return [...qubits]
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function definition(
  type: DefinitionType,
  name: string,
  length: number,
  isOutput = false
): Definition {
  return {
    type,
    name: checkName(type, 'name', name),
    length: checkCount(type, 'length', length),
    isOutput,
  }
}

export const definitionBit = (name: string, length: number, isOutput = false) =>
  definition('DefinitionBit', name, length, isOutput)
export const definitionFloat = (name: string, length: number, isOutput = false) =>
  definition('DefinitionFloat', name, length, isOutput)
export const definitionComplex = (name: string, length: number, isOutput = false) =>
  definition('DefinitionComplex', name, length, isOutput)
export const definitionUsize = (name: string, length: number, isOutput = false) =>
  definition('DefinitionUsize', name, length, isOutput)

export function singleQubitGate(type: SingleQubitGateType, qubit: number): SingleQubitGate {
  return { type, qubit: checkIndex(type, 'qubit', qubit) }
}

export const hadamard = (qubit: number) => singleQubitGate('Hadamard', qubit)
export const pauliX = (qubit: number) => singleQubitGate('PauliX', qubit)
export const pauliY = (qubit: number) => singleQubitGate('PauliY', qubit)
export const pauliZ = (qubit: number) => singleQubitGate('PauliZ', qubit)
export const sGate = (qubit: number) => singleQubitGate('SGate', qubit)
export const tGate = (qubit: number) => singleQubitGate('TGate', qubit)
export const sqrtPauliX = (qubit: number) => singleQubitGate('SqrtPauliX', qubit)

export function rotation(type: RotationType, qubit: number, theta: CalculatorFloat): RotationGate {
  return { type, qubit: checkIndex(type, 'qubit', qubit), theta }
}

export const rotateX = (qubit: number, theta: CalculatorFloat) => rotation('RotateX', qubit, theta)
export const rotateY = (qubit: number, theta: CalculatorFloat) => rotation('RotateY', qubit, theta)
export const rotateZ = (qubit: number, theta: CalculatorFloat) => rotation('RotateZ', qubit, theta)
export const phaseShiftState1 = (qubit: number, theta: CalculatorFloat) =>
  rotation('PhaseShiftState1', qubit, theta)

export function twoQubitGate(type: TwoQubitGateType, control: number, target: number): TwoQubitGate {
  checkPair(type, control, target)
  return { type, control, target }
}

export const cnot = (control: number, target: number) => twoQubitGate('CNOT', control, target)
export const controlledPauliZ = (control: number, target: number) =>
  twoQubitGate('ControlledPauliZ', control, target)
export const swap = (control: number, target: number) => twoQubitGate('SWAP', control, target)

export function controlledPhaseShift(
  control: number,
  target: number,
  theta: CalculatorFloat
): ControlledPhaseShift {
  checkPair('ControlledPhaseShift', control, target)
  return { type: 'ControlledPhaseShift', control, target, theta }
}

export function measureQubit(qubit: number, readout: string, readoutIndex: number): MeasureQubit {
  const type = 'MeasureQubit'
  return {
    type,
    qubit: checkIndex(type, 'qubit', qubit),
    readout: checkName(type, 'readout', readout),
    readoutIndex: checkIndex(type, 'readoutIndex', readoutIndex),
  }
}

export function pragmaRepeatedMeasurement(
  readout: string,
  numberMeasurements: number
): PragmaRepeatedMeasurement {
  const type = 'PragmaRepeatedMeasurement'
  return {
    type,
    readout: checkName(type, 'readout', readout),
    numberMeasurements: checkCount(type, 'numberMeasurements', numberMeasurements),
  }
}

export function pragmaGetStateVector(readout: string): PragmaGetStateVector {
  return {
    type: 'PragmaGetStateVector',
    readout: checkName('PragmaGetStateVector', 'readout', readout),
  }
}

export function pragmaSetNumberOfMeasurements(
  readout: string,
  numberMeasurements: number
): PragmaSetNumberOfMeasurements {
  const type = 'PragmaSetNumberOfMeasurements'
  return {
    type,
    readout: checkName(type, 'readout', readout),
    numberMeasurements: checkCount(type, 'numberMeasurements', numberMeasurements),
  }
}

export function pragmaGlobalPhase(phase: CalculatorFloat): PragmaGlobalPhase {
  return { type: 'PragmaGlobalPhase', phase }
}

export function pragmaStopParallelBlock(
  qubits: readonly number[],
  executionTime: CalculatorFloat
): PragmaStopParallelBlock {
  const type = 'PragmaStopParallelBlock'
  return { type, qubits: checkQubitList(type, qubits), executionTime }
}

export function pragmaActiveReset(qubit: number): PragmaActiveReset {
  return { type: 'PragmaActiveReset', qubit: checkIndex('PragmaActiveReset', 'qubit', qubit) }
}

export function pragmaSleep(qubits: readonly number[], sleepTime: CalculatorFloat): PragmaSleep {
  const type = 'PragmaSleep'
  return { type, qubits: checkQubitList(type, qubits), sleepTime }
}

export function pragmaConditional(
  conditionRegister: string,
  conditionIndex: number,
  operations: readonly Operation[]
): PragmaConditional {
  const type = 'PragmaConditional'
  for (const op of operations) {
    // Nested operations may only touch single cells, so the conditional's
    // own involvement stays a finite set of entries
    if (involvedClassical(op).kind === 'all') {
      throw new InvalidOperationError(
        type,
        `nested ${op.type} accesses a whole register and cannot be conditioned`
      )
    }
  }
  return {
    type,
    conditionRegister: checkName(type, 'conditionRegister', conditionRegister),
    conditionIndex: checkIndex(type, 'conditionIndex', conditionIndex),
    operations: [...operations],
  }
}

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------

export function operationKind(op: Operation): OperationKind {
  switch (op.type) {
    case 'DefinitionBit':
    case 'DefinitionFloat':
    case 'DefinitionComplex':
    case 'DefinitionUsize':
      return 'definition'
    case 'Hadamard':
    case 'PauliX':
    case 'PauliY':
    case 'PauliZ':
    case 'SGate':
    case 'TGate':
    case 'SqrtPauliX':
    case 'RotateX':
    case 'RotateY':
    case 'RotateZ':
    case 'PhaseShiftState1':
    case 'CNOT':
    case 'ControlledPauliZ':
    case 'SWAP':
    case 'ControlledPhaseShift':
      return 'gate'
    case 'MeasureQubit':
    case 'PragmaRepeatedMeasurement':
    case 'PragmaGetStateVector':
      return 'measurement'
    case 'PragmaSetNumberOfMeasurements':
    case 'PragmaGlobalPhase':
    case 'PragmaStopParallelBlock':
    case 'PragmaActiveReset':
    case 'PragmaSleep':
    case 'PragmaConditional':
      return 'pragma'
  }
}

export function isDefinition(op: Operation): op is Definition {
  return operationKind(op) === 'definition'
}

export function isGateOperation(op: Operation): op is GateOperation {
  return operationKind(op) === 'gate'
}

export function involvedQubits(op: Operation): InvolvedQubits {
  switch (op.type) {
    case 'DefinitionBit':
    case 'DefinitionFloat':
    case 'DefinitionComplex':
    case 'DefinitionUsize':
    case 'PragmaSetNumberOfMeasurements':
      return NO_QUBITS
    case 'Hadamard':
    case 'PauliX':
    case 'PauliY':
    case 'PauliZ':
    case 'SGate':
    case 'TGate':
    case 'SqrtPauliX':
    case 'RotateX':
    case 'RotateY':
    case 'RotateZ':
    case 'PhaseShiftState1':
    case 'MeasureQubit':
    case 'PragmaActiveReset':
      return qubitSet(op.qubit)
    case 'CNOT':
    case 'ControlledPauliZ':
    case 'SWAP':
    case 'ControlledPhaseShift':
      return qubitSet(op.control, op.target)
    case 'PragmaRepeatedMeasurement':
    case 'PragmaGetStateVector':
    case 'PragmaGlobalPhase':
      return ALL_QUBITS
    case 'PragmaStopParallelBlock':
    case 'PragmaSleep':
      return qubitSet(...op.qubits)
    case 'PragmaConditional':
      return op.operations.reduce<InvolvedQubits>(
        (acc, nested) => mergeQubits(acc, involvedQubits(nested)),
        NO_QUBITS
      )
  }
}

export function involvedClassical(op: Operation): InvolvedClassical {
  switch (op.type) {
    case 'DefinitionBit':
    case 'DefinitionFloat':
    case 'DefinitionComplex':
    case 'DefinitionUsize':
      return wholeRegister(op.name)
    case 'MeasureQubit':
      return classicalSet([op.readout, op.readoutIndex])
    case 'PragmaRepeatedMeasurement':
    case 'PragmaGetStateVector':
    case 'PragmaSetNumberOfMeasurements':
      return wholeRegister(op.readout)
    case 'PragmaConditional': {
      const entries: ClassicalEntry[] = [[op.conditionRegister, op.conditionIndex]]
      for (const nested of op.operations) {
        const inner = involvedClassical(nested)
        if (inner.kind === 'set') entries.push(...inner.entries)
      }
      return classicalSet(...entries)
    }
    case 'Hadamard':
    case 'PauliX':
    case 'PauliY':
    case 'PauliZ':
    case 'SGate':
    case 'TGate':
    case 'SqrtPauliX':
    case 'RotateX':
    case 'RotateY':
    case 'RotateZ':
    case 'PhaseShiftState1':
    case 'CNOT':
    case 'ControlledPauliZ':
    case 'SWAP':
    case 'ControlledPhaseShift':
    case 'PragmaGlobalPhase':
    case 'PragmaStopParallelBlock':
    case 'PragmaActiveReset':
    case 'PragmaSleep':
      return NO_CLASSICAL
  }
}

function formatParameter(value: CalculatorFloat): string {
  return typeof value === 'number' ? String(value) : value
}

// Short human readable label, e.g. `CNOT(0,1)` or `MeasureQubit(0,ro[1])`
export function operationToString(op: Operation): string {
  switch (op.type) {
    case 'DefinitionBit':
    case 'DefinitionFloat':
    case 'DefinitionComplex':
    case 'DefinitionUsize':
      return `${op.type}(${op.name},${op.length})`
    case 'Hadamard':
    case 'PauliX':
    case 'PauliY':
    case 'PauliZ':
    case 'SGate':
    case 'TGate':
    case 'SqrtPauliX':
    case 'PragmaActiveReset':
      return `${op.type}(${op.qubit})`
    case 'RotateX':
    case 'RotateY':
    case 'RotateZ':
    case 'PhaseShiftState1':
      return `${op.type}(${op.qubit},${formatParameter(op.theta)})`
    case 'CNOT':
    case 'ControlledPauliZ':
    case 'SWAP':
      return `${op.type}(${op.control},${op.target})`
    case 'ControlledPhaseShift':
      return `${op.type}(${op.control},${op.target},${formatParameter(op.theta)})`
    case 'MeasureQubit':
      return `${op.type}(${op.qubit},${op.readout}[${op.readoutIndex}])`
    case 'PragmaRepeatedMeasurement':
    case 'PragmaSetNumberOfMeasurements':
      return `${op.type}(${op.readout},${op.numberMeasurements})`
    case 'PragmaGetStateVector':
      return `${op.type}(${op.readout})`
    case 'PragmaGlobalPhase':
      return `${op.type}(${formatParameter(op.phase)})`
    case 'PragmaStopParallelBlock':
      return `${op.type}([${op.qubits.join(',')}],${formatParameter(op.executionTime)})`
    case 'PragmaSleep':
      return `${op.type}([${op.qubits.join(',')}],${formatParameter(op.sleepTime)})`
    case 'PragmaConditional':
      return `${op.type}(${op.conditionRegister}[${op.conditionIndex}],[${op.operations
        .map(operationToString)
        .join(',')}])`
  }
}
