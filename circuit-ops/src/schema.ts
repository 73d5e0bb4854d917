// JSON schemas for operations and circuits, used by Circuit.fromJSON

import z from 'zod/v4'

import {
  DEFINITION_TYPES,
  involvedClassical,
  type Operation,
  ROTATION_TYPES,
  SINGLE_QUBIT_GATE_TYPES,
  TWO_QUBIT_GATE_TYPES,
} from './operations'

export const CIRCUIT_FORMAT_VERSION = 1

const index = z.number().int().nonnegative()
const count = z.number().int().positive()
const name = z.string().min(1)
const calculatorFloat = z.union([z.number(), z.string()])

const qubitList = z
  .array(index)
  .refine(qubits => new Set(qubits).size === qubits.length, { message: 'qubits must be unique' })

const distinctPair = <T extends { control: number; target: number }>(gate: T) =>
  gate.control !== gate.target

const definitionSchema = z.object({
  type: z.enum(DEFINITION_TYPES),
  name,
  length: count,
  isOutput: z.boolean(),
})

const singleQubitGateSchema = z.object({
  type: z.enum(SINGLE_QUBIT_GATE_TYPES),
  qubit: index,
})

const rotationSchema = z.object({
  type: z.enum(ROTATION_TYPES),
  qubit: index,
  theta: calculatorFloat,
})

const twoQubitGateSchema = z
  .object({
    type: z.enum(TWO_QUBIT_GATE_TYPES),
    control: index,
    target: index,
  })
  .refine(distinctPair, { message: 'control and target must differ' })

const controlledPhaseShiftSchema = z
  .object({
    type: z.literal('ControlledPhaseShift'),
    control: index,
    target: index,
    theta: calculatorFloat,
  })
  .refine(distinctPair, { message: 'control and target must differ' })

const measureQubitSchema = z.object({
  type: z.literal('MeasureQubit'),
  qubit: index,
  readout: name,
  readoutIndex: index,
})

const repeatedMeasurementSchema = z.object({
  type: z.literal('PragmaRepeatedMeasurement'),
  readout: name,
  numberMeasurements: count,
})

const getStateVectorSchema = z.object({
  type: z.literal('PragmaGetStateVector'),
  readout: name,
})

const setNumberOfMeasurementsSchema = z.object({
  type: z.literal('PragmaSetNumberOfMeasurements'),
  readout: name,
  numberMeasurements: count,
})

const globalPhaseSchema = z.object({
  type: z.literal('PragmaGlobalPhase'),
  phase: calculatorFloat,
})

const stopParallelBlockSchema = z.object({
  type: z.literal('PragmaStopParallelBlock'),
  qubits: qubitList,
  executionTime: calculatorFloat,
})

const activeResetSchema = z.object({
  type: z.literal('PragmaActiveReset'),
  qubit: index,
})

const sleepSchema = z.object({
  type: z.literal('PragmaSleep'),
  qubits: qubitList,
  sleepTime: calculatorFloat,
})

// Conditionals nest operations, so the union refers to itself
export const operationSchema: z.ZodType<Operation> = z.lazy(() =>
  z.union([
    definitionSchema,
    singleQubitGateSchema,
    rotationSchema,
    twoQubitGateSchema,
    controlledPhaseShiftSchema,
    measureQubitSchema,
    repeatedMeasurementSchema,
    getStateVectorSchema,
    setNumberOfMeasurementsSchema,
    globalPhaseSchema,
    stopParallelBlockSchema,
    activeResetSchema,
    sleepSchema,
    z
      .object({
        type: z.literal('PragmaConditional'),
        conditionRegister: name,
        conditionIndex: index,
        operations: z.array(operationSchema),
      })
      .refine(op => op.operations.every(nested => involvedClassical(nested).kind !== 'all'), {
        message: 'conditional operations must not access a whole register',
      }),
  ])
)

export const circuitSchema = z.object({
  version: z.literal(CIRCUIT_FORMAT_VERSION),
  operations: z.array(operationSchema),
})

export type CircuitJSON = z.infer<typeof circuitSchema>

// Format a zod issue as `path: message`, e.g. `operations.2.qubit: Too small`
export function formatIssue(issue: z.core.$ZodIssue): string {
  const path = issue.path.map(String).join('.')
  return path ? `${path}: ${issue.message}` : issue.message
}
