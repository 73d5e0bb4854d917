import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { DependencyGraph } from '../dependency-graph'
import { ExecutionTracker } from '../execution-tracker'
import { bellCircuit, recordingLogger } from './fixtures'

describe('ExecutionTracker', () => {
  let dag: DependencyGraph
  let tracker: ExecutionTracker

  beforeEach(() => {
    dag = DependencyGraph.fromCircuit(bellCircuit())
    tracker = new ExecutionTracker(dag)
  })

  afterEach(() => {
    tracker.dispose()
  })

  it('should start at the initial front layer', () => {
    expect(tracker.frontLayer).toEqual([0, 1])
    expect(tracker.executedNodes).toEqual([])
    expect(tracker.isReady(1)).toBe(true)
    expect(tracker.isReady(2)).toBe(false)
    expect(tracker.isComplete).toBe(false)
  })

  it('should publish every front layer and completed node', () => {
    const layers: number[][] = []
    const completed: number[] = []
    tracker.frontLayer$.subscribe(layer => layers.push(layer))
    tracker.completed$.subscribe(node => completed.push(node))

    tracker.execute(1)
    tracker.execute(0)
    tracker.execute(2)
    expect(tracker.executeBlock()).toEqual([3, 4])

    expect(layers).toEqual([[0, 1], [0, 2], [2], [3, 4], [4], []])
    expect(completed).toEqual([1, 0, 2, 3, 4])
    expect(tracker.executedNodes).toEqual([0, 1, 2, 3, 4])
    expect(tracker.isComplete).toBe(true)
  })

  it('should throw for a blocked node by default', () => {
    expect(() => tracker.execute(3)).toThrow('Node 3 is not in the current front layer')
    expect(tracker.frontLayer).toEqual([0, 1])
  })

  it('should warn and skip a blocked node when not strict', () => {
    const { warn, logger } = recordingLogger()
    const lenient = new ExecutionTracker(dag, { strict: false, logger })

    expect(lenient.execute(3)).toBe(false)
    expect(warn).toEqual(['[circuitdag] ignoring node 3, still blocked by [0,1,2]'])
    expect(lenient.executedNodes).toEqual([])
    expect(lenient.execute(1)).toBe(true)
    lenient.dispose()
  })

  it('should warn and skip a node executed twice when not strict', () => {
    const { warn, logger } = recordingLogger()
    const lenient = new ExecutionTracker(dag, { strict: false, logger })

    expect(lenient.execute(1)).toBe(true)
    expect(lenient.execute(1)).toBe(false)
    expect(warn).toEqual(['[circuitdag] ignoring node 1, already executed'])
    expect(lenient.executedNodes).toEqual([1])
    lenient.dispose()
  })

  it('should still throw for unknown nodes when not strict', () => {
    const lenient = new ExecutionTracker(dag, { strict: false, logger: recordingLogger().logger })
    expect(() => lenient.execute(9)).toThrow('Node index 9 out of range for graph with 5 nodes')
    lenient.dispose()
  })

  it('should complete its observables on dispose', () => {
    let done = false
    tracker.frontLayer$.subscribe({ complete: () => (done = true) })
    tracker.dispose()
    expect(done).toBe(true)
  })
})
