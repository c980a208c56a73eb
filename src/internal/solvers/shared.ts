import { Clock, Effect } from "effect"
import {
  DivergedError,
  NonFiniteStateError,
  type SolveError,
  StepCountExceededError,
  WallClockExceededError,
} from "../../Errors.js"
import type { ResolvedSolverOptions } from "../../Solver.js"
import { type TimeSpan, Trajectory } from "../../Types.js"

/** Attempts between wall-clock checks and scheduler yields. */
export const CHECK_INTERVAL = 128

/**
 * Uniform sampling grid over `[t0, tf]` with `samples` points, both ends
 * included. A zero-length span produces the single point `t0`.
 */
export const makeGrid = (t0: number, tf: number, samples: number): ReadonlyArray<number> => {
  if (tf <= t0) {
    return [t0]
  }
  const count = Math.max(2, Math.floor(samples))
  const width = (tf - t0) / (count - 1)
  const grid: Array<number> = [t0]
  let previous = t0
  for (let i = 1; i < count - 1; i++) {
    const point = t0 + i * width
    if (point > previous && point < tf) {
      grid.push(point)
      previous = point
    }
  }
  grid.push(tf)
  return grid
}

export const samplingGrid = (span: TimeSpan, options: ResolvedSolverOptions): ReadonlyArray<number> =>
  options.times ?? makeGrid(span[0], span[1], options.samples)

/**
 * Accumulates reported samples. Stored vectors are copies, so callers may keep
 * mutating their working state.
 */
export class SampleRecorder {
  readonly #times: Array<number> = []
  readonly #states: Array<ReadonlyArray<number>> = []

  record(time: number, state: ReadonlyArray<number>): void {
    this.#times.push(time)
    this.#states.push(state.slice())
  }

  get size(): number {
    return this.#times.length
  }

  toTrajectory(): Trajectory {
    return new Trajectory({ times: this.#times.slice(), states: this.#states.slice() })
  }
}

export const firstNonFinite = (values: ReadonlyArray<number>): number => values.findIndex((value) => !Number.isFinite(value))

export const maxAbs = (values: ReadonlyArray<number>): number => {
  let max = 0
  for (const value of values) {
    const magnitude = Math.abs(value)
    if (magnitude > max) {
      max = magnitude
    }
  }
  return max
}

/**
 * Validate an accepted state and the derivative evaluated there. Returns the
 * failure to raise, if any.
 */
export const checkAccepted = (
  time: number,
  state: ReadonlyArray<number>,
  slope: ReadonlyArray<number>,
  options: ResolvedSolverOptions,
  recorder: SampleRecorder,
): SolveError | undefined => {
  const badState = firstNonFinite(state)
  if (badState >= 0) {
    return new NonFiniteStateError({ time, partial: recorder.toTrajectory(), component: badState })
  }
  const magnitude = maxAbs(state)
  if (magnitude > options.divergenceBound) {
    return new DivergedError({
      time,
      partial: recorder.toTrajectory(),
      bound: options.divergenceBound,
      magnitude,
    })
  }
  const badSlope = firstNonFinite(slope)
  if (badSlope >= 0) {
    return new NonFiniteStateError({ time, partial: recorder.toTrajectory(), component: badSlope })
  }
  return undefined
}

/**
 * Step and wall-clock accounting shared by the integrators. Every attempted
 * step, accepted or rejected, counts against `maxSteps`.
 */
export class StepBudget {
  #attempts = 0

  constructor(
    readonly startedAt: number,
    readonly options: ResolvedSolverOptions,
  ) {}

  get attempts(): number {
    return this.#attempts
  }

  /**
   * Register one attempt at `time`. Periodically yields to the scheduler and
   * checks the wall-clock limit.
   */
  attempt(time: number, recorder: SampleRecorder): Effect.Effect<void, SolveError> {
    this.#attempts += 1
    const attempts = this.#attempts
    const { maxSteps, maxWallClockMs } = this.options
    if (attempts > maxSteps) {
      return Effect.fail(
        new StepCountExceededError({ time, partial: recorder.toTrajectory(), maxSteps, steps: attempts - 1 }),
      )
    }
    if ((attempts - 1) % CHECK_INTERVAL !== 0) {
      return Effect.void
    }
    const startedAt = this.startedAt
    return Effect.gen(function* () {
      if (attempts > 1) {
        yield* Effect.yieldNow()
      }
      const now = yield* Clock.currentTimeMillis
      const elapsedMs = now - startedAt
      if (elapsedMs >= maxWallClockMs) {
        return yield* Effect.fail(
          new WallClockExceededError({ time, partial: recorder.toTrajectory(), maxWallClockMs, elapsedMs }),
        )
      }
    })
  }

  underflow(time: number, recorder: SampleRecorder): StepCountExceededError {
    return new StepCountExceededError({
      time,
      partial: recorder.toTrajectory(),
      maxSteps: this.options.maxSteps,
      steps: this.#attempts,
    })
  }
}

/** Smallest step that still moves `time` forward. */
export const minimumStep = (time: number): number => 16 * Number.EPSILON * Math.max(1, Math.abs(time))
