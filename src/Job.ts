/**
 * Job models: the submission payload, the persisted record and the result of
 * a finished job.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import { ResolvedSolverOptions, SolverKind, SolverOptions } from "./Solver.js"
import { FiniteNumber, JobId, JobState, StateVector, TimeSpan, Trajectory } from "./Types.js"

/**
 * Parameter bindings substituted as constants into the equations.
 *
 * @category Jobs
 * @since 0.1.0
 */
export const Parameters = Schema.Record({ key: Schema.String, value: FiniteNumber })

/**
 * @category Jobs
 * @since 0.1.0
 */
export type Parameters = typeof Parameters.Type

/**
 * What a caller submits.
 *
 * @category Jobs
 * @since 0.1.0
 * @example
 * ```ts
 * const submission = {
 *   equationText: "{D(x), D(y)} == {x - y, x*y}",
 *   initialConditions: [[1, 0], [0.5, 0.5]],
 *   timeSpan: [0, 10],
 * }
 * ```
 */
export class JobSubmission extends Schema.Class<JobSubmission>("JobSubmission")({
  equationText: Schema.String,
  initialConditions: Schema.Array(StateVector),
  timeSpan: TimeSpan,
  parameters: Schema.optionalWith(Parameters, { default: () => ({}) }),
  solverOptions: Schema.optional(SolverOptions),
}) {}

/**
 * Machine-readable reason attached to every terminal record.
 *
 * @category Jobs
 * @since 0.1.0
 */
export const TerminalReason = Schema.Union(
  Schema.TaggedStruct("Completed", {}),
  Schema.TaggedStruct("Cancelled", {}),
  Schema.TaggedStruct("SolveFailed", {
    error: Schema.Literal(
      "NonFiniteStateError",
      "StepCountExceededError",
      "WallClockExceededError",
      "DivergedError",
    ),
    trajectoryIndex: Schema.Int,
    time: Schema.Number,
    message: Schema.String,
  }),
  Schema.TaggedStruct("Internal", { message: Schema.String }),
)

/**
 * @category Jobs
 * @since 0.1.0
 */
export type TerminalReason = typeof TerminalReason.Type

/**
 * @category Jobs
 * @since 0.1.0
 */
export const describeReason = (reason: TerminalReason): string => {
  switch (reason._tag) {
    case "Completed":
      return "completed"
    case "Cancelled":
      return "cancelled by request"
    case "SolveFailed":
      return `trajectory ${reason.trajectoryIndex} failed with ${reason.error}: ${reason.message}`
    case "Internal":
      return `internal error: ${reason.message}`
  }
}

/**
 * Output of a finished job: one trajectory per initial condition, in
 * submission order, all sampled at `times`.
 *
 * @category Jobs
 * @since 0.1.0
 */
export class JobResult extends Schema.Class<JobResult>("JobResult")({
  stateVariables: Schema.Array(Schema.String),
  times: Schema.Array(FiniteNumber),
  trajectories: Schema.Array(Trajectory),
  warnings: Schema.Array(Schema.String),
}) {}

/**
 * @category Jobs
 * @since 0.1.0
 */
export class JobProgress extends Schema.Class<JobProgress>("JobProgress")({
  completed: Schema.NonNegativeInt,
  total: Schema.NonNegativeInt,
}) {
  get fraction(): number {
    return this.total === 0 ? 1 : this.completed / this.total
  }
}

/**
 * Persisted view of a job.
 *
 * @category Jobs
 * @since 0.1.0
 */
export class JobRecord extends Schema.Class<JobRecord>("JobRecord")({
  id: JobId,
  equationText: Schema.String,
  parameters: Parameters,
  initialConditions: Schema.Array(StateVector),
  timeSpan: TimeSpan,
  solverOptions: ResolvedSolverOptions,
  state: JobState,
  createdAt: Schema.DateTimeUtcFromNumber,
  updatedAt: Schema.DateTimeUtcFromNumber,
  progress: JobProgress,
  warnings: Schema.Array(Schema.String),
  result: Schema.optional(JobResult),
  reason: Schema.optional(TerminalReason),
}) {}

/**
 * Returned by a successful submission.
 *
 * @category Jobs
 * @since 0.1.0
 */
export interface JobHandle {
  readonly jobId: JobId
  readonly state: JobState
  readonly solver: SolverKind
  readonly stateVariables: ReadonlyArray<string>
}
