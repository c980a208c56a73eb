/**
 * Error hierarchy for the ODE job engine.
 *
 * Captures well-typed failure modes so callers can pattern match on tagged
 * errors using `Effect.catchTag`. Messages stay human-readable for
 * observability while still providing structured data for programmatic
 * handling.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import type { TerminalReason } from "./Job.js"
import type { JobId, JobState, Trajectory } from "./Types.js"

/**
 * Fields shared by every numerical failure: where integration stopped and the
 * samples recorded before it did.
 *
 * @category Errors
 * @since 0.1.0
 */
export interface SolveFailureFields {
  readonly time: number
  readonly partial: Trajectory
}

/**
 * A derivative or state component became NaN or infinite.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * yield* Effect.fail(new NonFiniteStateError({ time: 1.5, partial, component: 0 }))
 * ```
 */
export class NonFiniteStateError extends Data.TaggedError("NonFiniteStateError")<
  SolveFailureFields & { readonly component: number }
> {
  override get message(): string {
    return `State component ${this.component} became non-finite at t=${this.time}`
  }
}

/**
 * The integrator used up its step budget, or the adaptive step could not
 * shrink any further.
 *
 * @category Errors
 * @since 0.1.0
 */
export class StepCountExceededError extends Data.TaggedError("StepCountExceededError")<
  SolveFailureFields & { readonly maxSteps: number; readonly steps: number }
> {
  override get message(): string {
    return `Integration stopped after ${this.steps} steps (limit ${this.maxSteps}) at t=${this.time}`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class WallClockExceededError extends Data.TaggedError("WallClockExceededError")<
  SolveFailureFields & { readonly maxWallClockMs: number; readonly elapsedMs: number }
> {
  override get message(): string {
    return `Integration exceeded its ${this.maxWallClockMs}ms budget at t=${this.time}`
  }
}

/**
 * The state grew beyond the divergence bound while staying finite.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DivergedError extends Data.TaggedError("DivergedError")<
  SolveFailureFields & { readonly bound: number; readonly magnitude: number }
> {
  override get message(): string {
    return `Solution diverged at t=${this.time}: |y| = ${this.magnitude} exceeds ${this.bound}`
  }
}

/**
 * Union of numerical failures of a single integration.
 *
 * @category Errors
 * @since 0.1.0
 */
export type SolveError = NonFiniteStateError | StepCountExceededError | WallClockExceededError | DivergedError

/**
 * @category Errors
 * @since 0.1.0
 */
export type SolveErrorTag = SolveError["_tag"]

/**
 * Submission payload failed schema decoding.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidSubmissionError extends Data.TaggedError("InvalidSubmissionError")<{
  readonly issues: string
}> {
  override get message(): string {
    return `Invalid submission: ${this.issues}`
  }
}

/**
 * An initial-condition vector does not match the system dimension.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DimensionMismatchError extends Data.TaggedError("DimensionMismatchError")<{
  readonly index: number
  readonly expected: number
  readonly actual: number
}> {
  override get message(): string {
    return `Initial condition ${this.index} has ${this.actual} value(s); the system has dimension ${this.expected}`
  }
}

/**
 * Too many jobs are waiting or running. Retryable.
 *
 * @category Errors
 * @since 0.1.0
 */
export class CapacityExceededError extends Data.TaggedError("CapacityExceededError")<{
  readonly limit: number
}> {
  override get message(): string {
    return `Job capacity of ${this.limit} active jobs reached; retry later`
  }
}

/**
 * The job store could not read or write a record. Retryable.
 *
 * @category Errors
 * @since 0.1.0
 */
export class PersistenceError extends Data.TaggedError("PersistenceError")<{
  readonly operation: "save" | "load"
  readonly jobId: string
  readonly cause: unknown
}> {
  override get message(): string {
    const detail = this.cause instanceof Error ? this.cause.message : String(this.cause)
    return `Failed to ${this.operation} job ${this.jobId}: ${detail}`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export class JobNotFoundError extends Data.TaggedError("JobNotFoundError")<{
  readonly jobId: string
}> {
  override get message(): string {
    return `Job ${this.jobId} does not exist`
  }
}

/**
 * The job has not reached a terminal state yet.
 *
 * @category Errors
 * @since 0.1.0
 */
export class JobNotReadyError extends Data.TaggedError("JobNotReadyError")<{
  readonly jobId: JobId
  readonly state: JobState
}> {
  override get message(): string {
    return `Job ${this.jobId} is ${this.state}; no result yet`
  }
}

/**
 * The job ended without a result.
 *
 * @category Errors
 * @since 0.1.0
 */
export class JobNotSucceededError extends Data.TaggedError("JobNotSucceededError")<{
  readonly jobId: JobId
  readonly state: "failed" | "cancelled"
  readonly reason: TerminalReason
}> {
  override get message(): string {
    const detail = "message" in this.reason ? `: ${this.reason.message}` : ""
    return `Job ${this.jobId} ${this.state} (${this.reason._tag})${detail}`
  }
}

/**
 * Errors a caller can retry without changing the request.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ResourceError = CapacityExceededError | PersistenceError
