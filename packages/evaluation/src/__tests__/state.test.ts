import { describe, it, expect } from 'vitest'
import type { RunState } from '@fairness-check/types'
import { EvaluationRun } from '../state'

describe('EvaluationRun', () => {
  it('starts idle', () => {
    const run = new EvaluationRun()
    expect(run.state).toBe('idle')
    expect(run.history).toEqual(['idle'])
  })

  it('follows the happy path', () => {
    const run = new EvaluationRun()
    run.transition('loading')
    run.transition('inferring')
    run.transition('aggregating')
    run.transition('done')
    expect(run.isTerminal).toBe(true)
    expect(run.history).toEqual(['idle', 'loading', 'inferring', 'aggregating', 'done'])
  })

  it.each<RunState>(['idle', 'loading', 'inferring', 'aggregating'])('can fail from %s', (from) => {
    const path: RunState[] = ['loading', 'inferring', 'aggregating']
    const run = new EvaluationRun()
    for (const step of path.slice(0, path.indexOf(from) + 1)) run.transition(step)

    run.fail()

    expect(run.state).toBe('failed')
  })

  it('rejects skipped states', () => {
    const run = new EvaluationRun()
    expect(() => run.transition('inferring')).toThrow('Invalid run transition: idle → inferring')
  })

  it('does not leave a terminal state', () => {
    const run = new EvaluationRun()
    run.transition('failed')
    run.fail()
    expect(() => run.transition('loading')).toThrow()
    expect(run.history).toEqual(['idle', 'failed'])
  })

  it('notifies the listener with the previous state', () => {
    const seen: string[] = []
    const run = new EvaluationRun((state, previous) => seen.push(`${previous}>${state}`))
    run.transition('loading')
    run.fail()
    expect(seen).toEqual(['idle>loading', 'loading>failed'])
  })
})
