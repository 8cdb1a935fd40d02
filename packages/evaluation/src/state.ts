import type { RunState } from '@fairness-check/types'

/** Allowed transitions. `failed` is reachable from every non-terminal state. */
export const RUN_TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  idle: ['loading', 'failed'],
  loading: ['inferring', 'failed'],
  inferring: ['aggregating', 'failed'],
  aggregating: ['done', 'failed'],
  done: [],
  failed: [],
}

export type StateListener = (state: RunState, previous: RunState) => void

/** Tracks where an evaluation run is: idle → loading → inferring → aggregating → done. */
export class EvaluationRun {
  private current: RunState = 'idle'
  private readonly trail: RunState[] = ['idle']

  constructor(private readonly listener?: StateListener) {}

  get state(): RunState {
    return this.current
  }

  /** Every state entered so far, starting with `idle`. */
  get history(): readonly RunState[] {
    return this.trail
  }

  get isTerminal(): boolean {
    return RUN_TRANSITIONS[this.current].length === 0
  }

  transition(next: RunState): void {
    if (!RUN_TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid run transition: ${this.current} → ${next}`)
    }
    const previous = this.current
    this.current = next
    this.trail.push(next)
    this.listener?.(next, previous)
  }

  /** Move to `failed` unless the run already ended. */
  fail(): void {
    if (!this.isTerminal) this.transition('failed')
  }
}
