/**
 * Type Foundations & Branded IDs
 *
 * Shared schemas for identifiers, state vectors and the job lifecycle. Job
 * identifiers are branded UUIDs so a plain string can never be passed where a
 * job reference is expected.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * Branded UUID for jobs.
 *
 * @since 0.1.0
 * @category IDs
 */
export const JobId = Schema.UUID.pipe(Schema.brand("JobId"))

/**
 * Type extracted from JobId schema
 *
 * @since 0.1.0
 * @category IDs
 */
export type JobId = typeof JobId.Type

/**
 * Finite scalar used for every time and state value crossing a public
 * boundary.
 *
 * @since 0.1.0
 * @category Numbers
 */
export const FiniteNumber = Schema.Number.pipe(Schema.finite())

/**
 * Ordered tuple of values for all declared state variables.
 *
 * @since 0.1.0
 * @category Numbers
 */
export const StateVector = Schema.Array(FiniteNumber)

/**
 * @since 0.1.0
 * @category Numbers
 */
export type StateVector = typeof StateVector.Type

/**
 * Integration interval `[t0, tf]`. A zero-length span is allowed and yields a
 * single-sample trajectory.
 *
 * @since 0.1.0
 * @category Numbers
 */
export const TimeSpan = Schema.Tuple(FiniteNumber, FiniteNumber).pipe(
  Schema.filter(([t0, tf]) => t0 <= tf || `time span must satisfy t0 <= tf (got [${t0}, ${tf}])`),
)

/**
 * @since 0.1.0
 * @category Numbers
 */
export type TimeSpan = typeof TimeSpan.Type

/**
 * Lifecycle states of a job.
 *
 * @since 0.1.0
 * @category Jobs
 */
export const JobState = Schema.Literal("queued", "running", "finished", "failed", "cancelled")

/**
 * @since 0.1.0
 * @category Jobs
 */
export type JobState = typeof JobState.Type

/**
 * States from which no further transition occurs.
 *
 * @since 0.1.0
 * @category Jobs
 */
export type TerminalJobState = Extract<JobState, "finished" | "failed" | "cancelled">

/**
 * @since 0.1.0
 * @category Jobs
 */
export const isTerminal = (state: JobState): state is TerminalJobState =>
  state === "finished" || state === "failed" || state === "cancelled"

const transitions: Readonly<Record<JobState, ReadonlyArray<JobState>>> = {
  queued: ["running", "cancelled"],
  running: ["finished", "failed", "cancelled"],
  finished: [],
  failed: [],
  cancelled: [],
}

/**
 * Whether the job state machine permits moving from `from` to `to`.
 *
 * @since 0.1.0
 * @category Jobs
 */
export const canTransition = (from: JobState, to: JobState): boolean => transitions[from].includes(to)

/**
 * Sampled solution for one initial condition: strictly increasing `times`
 * and one state vector per time.
 *
 * @since 0.1.0
 * @category Trajectories
 */
export class Trajectory extends Schema.Class<Trajectory>("Trajectory")({
  times: Schema.Array(FiniteNumber),
  states: Schema.Array(StateVector),
}) {
  /**
   * @since 0.1.0
   */
  static readonly empty = new Trajectory({ times: [], states: [] })

  /**
   * @since 0.1.0
   */
  get length(): number {
    return this.times.length
  }
}
