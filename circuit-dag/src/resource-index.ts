// ResourceIndex - per-resource history for the dependency graph
//
// Each resource (a qubit, or a classical register cell) keeps every node that
// touched it, in execution order. A new node is linked only from earlier
// members it does not commute with. The walk back over the history stops at
// the first linked member that is already ordered after everything before it
// (a barrier), so a commuting node can skip its neighbours without losing
// the ordering against older nodes it does conflict with.
//
// Operations that touch a whole scope (all qubits, a whole register) are
// applied to every known key of the scope and recorded in a scope chain that
// seeds keys touched for the first time later on.

import type { ClassicalEntry } from '@circuitdag/operations'

type Chain = {
  nodes: number[]
  // Members ordered after every earlier member of the chain
  afterAll: Set<number>
  // Members ordered before every later member of the chain
  beforeAll: Set<number>
}

export type Link = (from: number, to: number) => void
export type CommutesWith = (member: number) => boolean

export const QUBIT_SCOPE = '*'

// Link `node` from the members in `walk` order it does not commute with,
// stopping at a linked barrier. True when every walked member was linked,
// i.e. `node` is itself a barrier.
function linkConflicts(
  walk: Iterable<number>,
  barriers: ReadonlySet<number>,
  commutes: CommutesWith,
  link: (member: number) => void
): boolean {
  let linkedAll = true
  for (const member of walk) {
    if (commutes(member)) {
      linkedAll = false
      continue
    }
    link(member)
    if (barriers.has(member)) break
  }
  return linkedAll
}

function* newestFirst(nodes: readonly number[]): Generator<number, void, undefined> {
  for (let i = nodes.length - 1; i >= 0; i--) yield nodes[i]
}

function appendToChain(chain: Chain, node: number, commutes: CommutesWith, link?: Link): void {
  const isBarrier = linkConflicts(newestFirst(chain.nodes), chain.afterAll, commutes, member =>
    link?.(member, node)
  )
  chain.nodes.push(node)
  if (isBarrier) {
    chain.afterAll.add(node)
  } else {
    // Earlier members are no longer known to precede every later one
    chain.beforeAll.clear()
  }
  chain.beforeAll.add(node)
}

function prependToChain(chain: Chain, node: number, commutes: CommutesWith, link?: Link): void {
  const isBarrier = linkConflicts(chain.nodes, chain.beforeAll, commutes, member =>
    link?.(node, member)
  )
  chain.nodes.unshift(node)
  if (isBarrier) {
    chain.beforeAll.add(node)
  } else {
    chain.afterAll.clear()
  }
  chain.afterAll.add(node)
}

function emptyChain(): Chain {
  return { nodes: [], afterAll: new Set(), beforeAll: new Set() }
}

function cloneChain(chain: Chain): Chain {
  return {
    nodes: [...chain.nodes],
    afterAll: new Set(chain.afterAll),
    beforeAll: new Set(chain.beforeAll),
  }
}

export class ResourceIndex<K> {
  private readonly chains = new Map<K, Chain>()
  private readonly scopes = new Map<string, Chain>()

  constructor(private readonly scopeOf: (key: K) => string) {}

  has(key: K): boolean {
    return this.chains.has(key)
  }

  keys(): K[] {
    return [...this.chains.keys()]
  }

  // Earliest node touching the resource, in execution order
  first(key: K): number | undefined {
    return this.chains.get(key)?.nodes.at(0)
  }

  // Latest node touching the resource, in execution order
  last(key: K): number | undefined {
    return this.chains.get(key)?.nodes.at(-1)
  }

  firstMap(): Map<K, number> {
    return this.boundaryMap(key => this.first(key))
  }

  lastMap(): Map<K, number> {
    return this.boundaryMap(key => this.last(key))
  }

  // Start tracking a key without adding a node to it
  touch(key: K): void {
    this.chainFor(key)
  }

  append(key: K, node: number, commutes: CommutesWith, link: Link): void {
    appendToChain(this.chainFor(key), node, commutes, link)
  }

  prepend(key: K, node: number, commutes: CommutesWith, link: Link): void {
    prependToChain(this.chainFor(key), node, commutes, link)
  }

  appendToScope(scope: string, node: number, commutes: CommutesWith, link: Link): void {
    const keys = this.keysInScope(scope)
    for (const chain of keys) appendToChain(chain, node, commutes, link)
    // Known keys already carry every ordering the scope chain would add
    appendToChain(this.scopeChain(scope), node, commutes, keys.length === 0 ? link : undefined)
  }

  prependToScope(scope: string, node: number, commutes: CommutesWith, link: Link): void {
    const keys = this.keysInScope(scope)
    for (const chain of keys) prependToChain(chain, node, commutes, link)
    prependToChain(this.scopeChain(scope), node, commutes, keys.length === 0 ? link : undefined)
  }

  private boundaryMap(pick: (key: K) => number | undefined): Map<K, number> {
    const out = new Map<K, number>()
    for (const key of this.chains.keys()) {
      const node = pick(key)
      if (node !== undefined) out.set(key, node)
    }
    return out
  }

  private keysInScope(scope: string): Chain[] {
    const out: Chain[] = []
    for (const [key, chain] of this.chains) {
      if (this.scopeOf(key) === scope) out.push(chain)
    }
    return out
  }

  private scopeChain(scope: string): Chain {
    let chain = this.scopes.get(scope)
    if (!chain) {
      chain = emptyChain()
      this.scopes.set(scope, chain)
    }
    return chain
  }

  private chainFor(key: K): Chain {
    let chain = this.chains.get(key)
    if (!chain) {
      const scoped = this.scopes.get(this.scopeOf(key))
      chain = scoped ? cloneChain(scoped) : emptyChain()
      this.chains.set(key, chain)
    }
    return chain
  }
}

// Classical cells are keyed as `register[index]`; register names may contain brackets
export function splitClassicalKey(key: string): ClassicalEntry {
  const open = key.lastIndexOf('[')
  return [key.slice(0, open), Number(key.slice(open + 1, -1))]
}

export function registerOfKey(key: string): string {
  return key.slice(0, key.lastIndexOf('['))
}
