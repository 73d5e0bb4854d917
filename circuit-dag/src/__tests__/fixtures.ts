// Shared circuits for the dependency graph tests

import { Circuit, cnot, definitionBit, hadamard, measureQubit } from '@circuitdag/operations'

// Bell pair read out into a two-bit register
//   0 DefinitionBit(m,2)  1 Hadamard(0)  2 CNOT(0,1)
//   3 MeasureQubit(0,m[0])  4 MeasureQubit(1,m[1])
export function bellCircuit(): Circuit {
  return new Circuit()
    .add(definitionBit('m', 2, true))
    .add(hadamard(0))
    .add(cnot(0, 1))
    .add(measureQubit(0, 'm', 0))
    .add(measureQubit(1, 'm', 1))
}

// Captures logger calls instead of printing them
export function recordingLogger() {
  const debug: string[] = []
  const warn: string[] = []
  return {
    debug,
    warn,
    logger: {
      debug: (message: string) => {
        debug.push(message)
      },
      warn: (message: string) => {
        warn.push(message)
      },
    },
  }
}
