// Resources an Operation touches: qubits and classical register cells

export type InvolvedQubits =
  | { kind: 'none' }
  | { kind: 'all' }
  | { kind: 'set'; qubits: ReadonlySet<number> }

// A single classical register cell, e.g. ['ro', 3]
export type ClassicalEntry = readonly [register: string, index: number]

export type InvolvedClassical =
  | { kind: 'none' }
  | { kind: 'all'; register: string }
  | { kind: 'set'; entries: readonly ClassicalEntry[] }

export const NO_QUBITS: InvolvedQubits = { kind: 'none' }
export const ALL_QUBITS: InvolvedQubits = { kind: 'all' }
export const NO_CLASSICAL: InvolvedClassical = { kind: 'none' }

export function qubitSet(...qubits: number[]): InvolvedQubits {
  return { kind: 'set', qubits: new Set(qubits) }
}

export function classicalSet(...entries: ClassicalEntry[]): InvolvedClassical {
  return { kind: 'set', entries: dedupeEntries(entries) }
}

export function wholeRegister(register: string): InvolvedClassical {
  return { kind: 'all', register }
}

function dedupeEntries(entries: readonly ClassicalEntry[]): ClassicalEntry[] {
  const seen = new Set<string>()
  const out: ClassicalEntry[] = []
  for (const entry of entries) {
    const key = classicalKey(entry)
    if (!seen.has(key)) {
      seen.add(key)
      out.push(entry)
    }
  }
  return out
}

// Stable string key for a classical cell, used for map lookups
export function classicalKey([register, index]: ClassicalEntry): string {
  return `${register}[${index}]`
}

// Registers named by an involvement, whole or partial
export function involvedRegisters(involved: InvolvedClassical): Set<string> {
  switch (involved.kind) {
    case 'none':
      return new Set()
    case 'all':
      return new Set([involved.register])
    case 'set':
      return new Set(involved.entries.map(([register]) => register))
  }
}

export function mergeQubits(a: InvolvedQubits, b: InvolvedQubits): InvolvedQubits {
  if (a.kind === 'all' || b.kind === 'all') return ALL_QUBITS
  if (a.kind === 'none') return b
  if (b.kind === 'none') return a
  return { kind: 'set', qubits: new Set([...a.qubits, ...b.qubits]) }
}

export function qubitsOverlap(a: InvolvedQubits, b: InvolvedQubits): boolean {
  if (a.kind === 'none' || b.kind === 'none') return false
  if (a.kind === 'all' || b.kind === 'all') return true
  for (const qubit of a.qubits) {
    if (b.qubits.has(qubit)) return true
  }
  return false
}

export function classicalOverlap(a: InvolvedClassical, b: InvolvedClassical): boolean {
  if (a.kind === 'none' || b.kind === 'none') return false
  if (a.kind === 'all') return involvedRegisters(b).has(a.register)
  if (b.kind === 'all') return involvedRegisters(a).has(b.register)
  const keys = new Set(a.entries.map(classicalKey))
  return b.entries.some(entry => keys.has(classicalKey(entry)))
}
