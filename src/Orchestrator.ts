/**
 * Job orchestrator: admits submissions, runs one Solve Request per initial
 * condition on a bounded worker pool, drives the job state machine and
 * publishes progress.
 *
 * @since 0.1.0
 */

import { randomUUID } from "node:crypto"
import {
  Cause,
  Context,
  DateTime,
  Deferred,
  Effect,
  Either,
  FiberMap,
  FiberSet,
  HashMap,
  Layer,
  Option,
  ParseResult,
  Ref,
  Schedule,
  Schema,
  type Scope,
  Stream,
} from "effect"
import { OrchestratorConfig } from "./Config.js"
import { SystemCompiler } from "./Equations.js"
import {
  CapacityExceededError,
  DimensionMismatchError,
  InvalidSubmissionError,
  JobNotFoundError,
  JobNotReadyError,
  JobNotSucceededError,
  PersistenceError,
  type SolveError,
} from "./Errors.js"
import type { CompiledSystem } from "./internal/equations/Compiler.js"
import type { EquationError } from "./internal/equations/errors.js"
import { type JobHandle, JobProgress, JobRecord, JobResult, JobSubmission, type TerminalReason } from "./Job.js"
import { JobStore } from "./JobStore.js"
import { JobEvent, Notifications } from "./Notifications.js"
import {
  checkSampleTimes,
  type Integration,
  type ResolvedSolverOptions,
  resolveSolverOptions,
  sampleTimes,
  SolverRegistry,
} from "./Solver.js"
import { canTransition, isTerminal, JobId, type JobState, type TerminalJobState, type Trajectory } from "./Types.js"

/**
 * @category Errors
 * @since 0.1.0
 */
export type SubmitError =
  | InvalidSubmissionError
  | EquationError
  | DimensionMismatchError
  | CapacityExceededError
  | PersistenceError

/**
 * @category Errors
 * @since 0.1.0
 */
export type LookupError = JobNotFoundError | PersistenceError

/**
 * @category Services
 * @since 0.1.0
 */
export interface OrchestratorService {
  readonly submit: (request: typeof JobSubmission.Encoded) => Effect.Effect<JobHandle, SubmitError>
  readonly cancel: (jobId: JobId) => Effect.Effect<JobState, LookupError>
  readonly getStatus: (jobId: JobId) => Effect.Effect<JobState, LookupError>
  readonly getRecord: (jobId: JobId) => Effect.Effect<JobRecord, LookupError>
  readonly getResult: (
    jobId: JobId,
  ) => Effect.Effect<JobResult, LookupError | JobNotReadyError | JobNotSucceededError>
  readonly awaitTerminal: (jobId: JobId) => Effect.Effect<JobState, LookupError>
  readonly subscribe: (jobId: JobId) => Effect.Effect<Stream.Stream<JobEvent>, LookupError, Scope.Scope>
}

interface JobControl {
  readonly record: JobRecord
  /** No further Solve Requests may start. */
  readonly halted: boolean
  readonly cancelRequested: boolean
}

interface Committed {
  readonly record: JobRecord
  /** The store accepted the write. */
  readonly durable: boolean
}

interface JobRuntime {
  readonly jobId: JobId
  readonly lock: Effect.Semaphore
  readonly control: Ref.Ref<JobControl>
  readonly done: Deferred.Deferred<TerminalJobState>
  readonly trajectories: Array<Trajectory | undefined>
}

interface JobPlan {
  readonly system: CompiledSystem
  readonly submission: JobSubmission
  readonly options: ResolvedSolverOptions
}

const make = (config: OrchestratorConfig) =>
  Effect.gen(function* () {
    const store = yield* JobStore
    const registry = yield* SolverRegistry
    const notifications = yield* Notifications
    const compiler = yield* SystemCompiler.make({
      capacity: config.compileCacheCapacity,
      independentVariable: config.independentVariable,
    })
    const pool = yield* Effect.makeSemaphore(config.workerPoolSize)
    const fibers = yield* FiberMap.make<JobId>()
    const runtimes = yield* Ref.make(HashMap.empty<JobId, JobRuntime>())
    // Terminal records the store has not accepted yet.
    const unsaved = yield* Ref.make(HashMap.empty<JobId, JobRecord>())
    const flushers = yield* FiberSet.make<void, PersistenceError>()

    const retryPolicy = Schedule.exponential("10 millis").pipe(
      Schedule.intersect(Schedule.recurs(config.persistenceRetries)),
    )
    const flushPolicy = Schedule.exponential("10 millis").pipe(Schedule.union(Schedule.spaced("5 seconds")))

    /** Save with retries. A write that still fails is logged and kept as a warning on the in-memory record. */
    const persist = (record: JobRecord): Effect.Effect<Committed> =>
      store.save(record.id, record).pipe(
        Effect.retry(retryPolicy),
        Effect.as({ record, durable: true }),
        Effect.catchAll((error) =>
          Effect.logError("failed to persist job record", error.message).pipe(
            Effect.as({
              record: new JobRecord({ ...record, warnings: [...record.warnings, error.message] }),
              durable: false,
            }),
          ),
        ),
      )

    /** Keep saving a terminal record until the store accepts it. */
    const flush = (record: JobRecord) =>
      store.save(record.id, record).pipe(
        Effect.retry(flushPolicy),
        Effect.zipRight(Ref.update(unsaved, HashMap.remove(record.id))),
        Effect.zipRight(Effect.logInfo("terminal job record persisted")),
        Effect.annotateLogs("jobId", record.id),
      )

    /** Apply `update` to the job record and persist it. Caller holds `runtime.lock`. */
    const commit = (runtime: JobRuntime, update: (record: JobRecord) => JobRecord) =>
      Effect.gen(function* () {
        const control = yield* Ref.get(runtime.control)
        const now = yield* DateTime.now
        const next = update(control.record)
        if (next.state !== control.record.state && !canTransition(control.record.state, next.state)) {
          return yield* Effect.dieMessage(`illegal job transition ${control.record.state} -> ${next.state}`)
        }
        const committed = yield* persist(new JobRecord({ ...next, updatedAt: now }))
        yield* Ref.update(runtime.control, (current) => ({ ...current, record: committed.record }))
        return committed
      })

    const markRunning = (runtime: JobRuntime) =>
      Effect.gen(function* () {
        yield* commit(runtime, (record) => new JobRecord({ ...record, state: "running" }))
        yield* notifications.publish(runtime.jobId, JobEvent.StatusChanged({ jobId: runtime.jobId, state: "running" }))
        yield* Effect.logInfo("job running")
      })

    /** Single terminal transition. Caller holds `runtime.lock`. */
    const terminate = (
      runtime: JobRuntime,
      state: TerminalJobState,
      reason: TerminalReason,
      result?: JobResult,
    ) =>
      Effect.gen(function* () {
        const { jobId } = runtime
        yield* Ref.update(runtime.control, (control) => ({ ...control, halted: true }))
        const { record, durable } = yield* commit(
          runtime,
          (current) => new JobRecord({ ...current, state, reason, result }),
        )
        if (!durable) {
          // Reads are answered from `unsaved` until the flush lands.
          yield* Ref.update(unsaved, HashMap.set(jobId, record))
          yield* FiberSet.run(flushers, flush(record))
        }
        yield* notifications.publish(jobId, JobEvent.StatusChanged({ jobId, state }))
        if (reason._tag === "SolveFailed" || reason._tag === "Internal") {
          yield* notifications.publish(jobId, JobEvent.JobFailed({ jobId, reason }))
        }
        if (result !== undefined) {
          yield* notifications.publish(jobId, JobEvent.JobFinished({ jobId, result }))
        }
        yield* Ref.update(runtimes, HashMap.remove(jobId))
        yield* Deferred.succeed(runtime.done, state)
        yield* Effect.logInfo(`job ${state}`).pipe(Effect.annotateLogs("reason", reason._tag))
      })

    const locked = <A, E, R>(runtime: JobRuntime, effect: Effect.Effect<A, E, R>) => runtime.lock.withPermits(1)(effect)

    /** Gate for a Solve Request that just obtained a pool permit. */
    const admit = (runtime: JobRuntime) =>
      locked(
        runtime,
        Effect.gen(function* () {
          const control = yield* Ref.get(runtime.control)
          if (control.halted || isTerminal(control.record.state)) {
            return false
          }
          if (control.record.state === "queued") {
            yield* markRunning(runtime)
          }
          return true
        }),
      )

    const recordOutcome = (
      runtime: JobRuntime,
      plan: JobPlan,
      index: number,
      outcome: Either.Either<Integration, SolveError>,
    ) =>
      locked(
        runtime,
        Effect.gen(function* () {
          const control = yield* Ref.get(runtime.control)
          if (control.record.state !== "running" || control.cancelRequested) {
            return yield* Effect.logDebug(`discarding trajectory ${index} of a ${control.record.state} job`)
          }
          if (Either.isLeft(outcome)) {
            const error = outcome.left
            yield* Effect.logWarning(`trajectory ${index} failed`, error.message)
            return yield* terminate(runtime, "failed", {
              _tag: "SolveFailed",
              error: error._tag,
              trajectoryIndex: index,
              time: error.time,
              message: error.message,
            })
          }
          const { trajectory, warnings } = outcome.right
          runtime.trajectories[index] = trajectory
          const total = plan.submission.initialConditions.length
          const { record: saved } = yield* commit(
            runtime,
            (record) =>
              new JobRecord({
                ...record,
                progress: new JobProgress({ completed: record.progress.completed + 1, total }),
                warnings: [...record.warnings, ...warnings.map((warning) => `trajectory ${index}: ${warning}`)],
              }),
          )
          yield* notifications.publish(
            runtime.jobId,
            JobEvent.TrajectoryCompleted({
              jobId: runtime.jobId,
              index,
              trajectory,
              fraction: saved.progress.fraction,
            }),
          )
          yield* Effect.logDebug(`trajectory ${index} completed`)
        }),
      )

    const solveOne = (runtime: JobRuntime, plan: JobPlan, initial: ReadonlyArray<number>, index: number) =>
      pool.withPermits(1)(
        Effect.gen(function* () {
          if (!(yield* admit(runtime))) {
            return
          }
          const backend = registry.get(plan.options.solver)
          const outcome = yield* backend
            .integrate(plan.system, initial, plan.submission.timeSpan, plan.options)
            .pipe(Effect.either, Effect.annotateLogs("trajectory", index))
          yield* recordOutcome(runtime, plan, index, outcome)
        }),
      )

    const finalize = (runtime: JobRuntime, plan: JobPlan) =>
      locked(
        runtime,
        Effect.gen(function* () {
          const control = yield* Ref.get(runtime.control)
          if (isTerminal(control.record.state)) {
            return
          }
          if (control.record.state === "queued") {
            // Zero initial conditions: no Solve Request ever ran.
            yield* markRunning(runtime)
          }
          if (control.cancelRequested) {
            return yield* terminate(runtime, "cancelled", { _tag: "Cancelled" })
          }
          const trajectories = runtime.trajectories.filter((trajectory): trajectory is Trajectory => trajectory !== undefined)
          if (trajectories.length !== plan.submission.initialConditions.length) {
            return yield* Effect.dieMessage("job drained without a trajectory for every initial condition")
          }
          const latest = yield* Ref.get(runtime.control)
          const result = new JobResult({
            stateVariables: plan.system.stateVariables,
            times: sampleTimes(plan.submission.timeSpan, plan.options),
            trajectories,
            warnings: latest.record.warnings,
          })
          yield* terminate(runtime, "finished", { _tag: "Completed" }, result)
        }),
      )

    const failInternal = (runtime: JobRuntime, cause: Cause.Cause<unknown>) =>
      locked(
        runtime,
        Effect.gen(function* () {
          const control = yield* Ref.get(runtime.control)
          if (isTerminal(control.record.state)) {
            return
          }
          yield* Effect.logError("job fiber crashed", cause)
          if (control.record.state === "queued") {
            yield* markRunning(runtime)
          }
          yield* terminate(runtime, "failed", { _tag: "Internal", message: Cause.pretty(cause) })
        }),
      )

    const runJob = (runtime: JobRuntime, plan: JobPlan) =>
      Effect.forEach(
        plan.submission.initialConditions,
        (initial, index) => solveOne(runtime, plan, initial, index),
        { concurrency: "unbounded", discard: true },
      ).pipe(
        Effect.zipRight(finalize(runtime, plan)),
        Effect.catchAllCause((cause) => (Cause.isInterruptedOnly(cause) ? Effect.void : failInternal(runtime, cause))),
        Effect.withLogSpan("job"),
        Effect.annotateLogs("jobId", runtime.jobId),
      )

    const decodeSubmission = (request: typeof JobSubmission.Encoded) =>
      Schema.decodeUnknown(JobSubmission)(request).pipe(
        Effect.mapError(
          (error) => new InvalidSubmissionError({ issues: ParseResult.TreeFormatter.formatErrorSync(error) }),
        ),
      )

    const submit = (request: typeof JobSubmission.Encoded) =>
      Effect.gen(function* () {
        const submission = yield* decodeSubmission(request)
        const times = submission.solverOptions?.times
        const timesProblem = times === undefined ? undefined : checkSampleTimes(times, submission.timeSpan)
        if (timesProblem !== undefined) {
          return yield* Effect.fail(new InvalidSubmissionError({ issues: timesProblem }))
        }
        const system = yield* compiler.compile(submission.equationText, submission.parameters)
        for (const [index, initial] of submission.initialConditions.entries()) {
          if (initial.length !== system.dimension) {
            return yield* Effect.fail(
              new DimensionMismatchError({ index, expected: system.dimension, actual: initial.length }),
            )
          }
        }
        const options = resolveSolverOptions(submission.solverOptions, config.defaultSolver)
        const jobId = JobId.make(randomUUID())
        const now = yield* DateTime.now
        const record = new JobRecord({
          id: jobId,
          equationText: submission.equationText,
          parameters: submission.parameters,
          initialConditions: submission.initialConditions,
          timeSpan: submission.timeSpan,
          solverOptions: options,
          state: "queued",
          createdAt: now,
          updatedAt: now,
          progress: new JobProgress({ completed: 0, total: submission.initialConditions.length }),
          warnings: [],
        })
        const runtime: JobRuntime = {
          jobId,
          lock: yield* Effect.makeSemaphore(1),
          control: yield* Ref.make<JobControl>({ record, halted: false, cancelRequested: false }),
          done: yield* Deferred.make<TerminalJobState>(),
          trajectories: new Array<Trajectory | undefined>(submission.initialConditions.length),
        }

        const admitted = yield* Ref.modify(runtimes, (active) =>
          HashMap.size(active) >= config.maxPendingJobs
            ? [false, active]
            : [true, HashMap.set(active, jobId, runtime)],
        )
        if (!admitted) {
          return yield* Effect.fail(new CapacityExceededError({ limit: config.maxPendingJobs }))
        }

        yield* store.save(jobId, record).pipe(Effect.tapError(() => Ref.update(runtimes, HashMap.remove(jobId))))
        yield* FiberMap.run(fibers, jobId, runJob(runtime, { system, submission, options }))
        yield* Effect.logInfo("job submitted").pipe(
          Effect.annotateLogs({ jobId, solver: options.solver, trajectories: submission.initialConditions.length }),
        )
        return {
          jobId,
          state: record.state,
          solver: options.solver,
          stateVariables: system.stateVariables,
        } satisfies JobHandle
      })

    const lookupRuntime = (jobId: JobId) => Effect.map(Ref.get(runtimes), HashMap.get(jobId))

    /** Live and unsaved records first; the store can lag behind them while writes fail. */
    const getRecord = (jobId: JobId) =>
      Effect.gen(function* () {
        const runtime = yield* lookupRuntime(jobId)
        if (Option.isSome(runtime)) {
          return (yield* Ref.get(runtime.value.control)).record
        }
        const pending = HashMap.get(yield* Ref.get(unsaved), jobId)
        return Option.isSome(pending) ? pending.value : yield* store.load(jobId)
      })

    const getStatus = (jobId: JobId) => Effect.map(getRecord(jobId), (record) => record.state)

    const cancel = (jobId: JobId) =>
      Effect.gen(function* () {
        const runtime = yield* lookupRuntime(jobId)
        if (Option.isNone(runtime)) {
          return yield* getStatus(jobId)
        }
        const active = runtime.value
        const { state, interrupt } = yield* locked(
          active,
          Effect.gen(function* () {
            const control = yield* Ref.get(active.control)
            const current = control.record.state
            if (isTerminal(current)) {
              return { state: current, interrupt: false }
            }
            yield* Ref.update(active.control, (c) => ({ ...c, halted: true, cancelRequested: true }))
            if (current === "queued") {
              yield* terminate(active, "cancelled", { _tag: "Cancelled" })
              return { state: "cancelled" as const, interrupt: true }
            }
            yield* Effect.logInfo("cancellation requested; draining in-flight requests")
            return { state: current, interrupt: false }
          }),
        )
        if (interrupt) {
          yield* FiberMap.remove(fibers, jobId)
        }
        return state
      }).pipe(Effect.annotateLogs("jobId", jobId))

    const getResult = (jobId: JobId) =>
      Effect.gen(function* () {
        const record = yield* getRecord(jobId)
        switch (record.state) {
          case "queued":
          case "running":
            return yield* Effect.fail(new JobNotReadyError({ jobId, state: record.state }))
          case "failed":
          case "cancelled":
            return yield* Effect.fail(
              new JobNotSucceededError({
                jobId,
                state: record.state,
                reason: record.reason ?? { _tag: "Internal", message: "terminal record has no reason" },
              }),
            )
          case "finished": {
            if (record.result === undefined) {
              return yield* Effect.fail(
                new PersistenceError({ operation: "load", jobId, cause: "finished record has no result" }),
              )
            }
            return record.result
          }
        }
      })

    const awaitTerminal = (jobId: JobId) =>
      Effect.gen(function* () {
        const runtime = yield* lookupRuntime(jobId)
        if (Option.isSome(runtime)) {
          return yield* Deferred.await(runtime.value.done)
        }
        return yield* getStatus(jobId)
      })

    // Subscribing under the job lock orders it against `terminate`, so a
    // channel is only opened for a job that will still publish its terminal event.
    const subscribe = (jobId: JobId) =>
      Effect.gen(function* () {
        const runtime = yield* lookupRuntime(jobId)
        if (Option.isNone(runtime)) {
          yield* getRecord(jobId)
          return Stream.empty
        }
        const active = runtime.value
        return yield* locked(
          active,
          Effect.gen(function* () {
            const control = yield* Ref.get(active.control)
            return isTerminal(control.record.state) ? Stream.empty : yield* notifications.subscribe(jobId)
          }),
        )
      })

    return {
      submit,
      cancel,
      getStatus,
      getRecord,
      getResult,
      awaitTerminal,
      subscribe,
    } satisfies OrchestratorService
  })

/**
 * Context tag for the job orchestrator.
 *
 * @category Services
 * @since 0.1.0
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const orchestrator = yield* Orchestrator
 *   const { jobId } = yield* orchestrator.submit({
 *     equationText: "D(x) == -x",
 *     initialConditions: [[1]],
 *     timeSpan: [0, 5],
 *   })
 *   yield* orchestrator.awaitTerminal(jobId)
 *   return yield* orchestrator.getResult(jobId)
 * }).pipe(Effect.provide(Orchestrator.layerDefault))
 * ```
 */
export class Orchestrator extends Context.Tag("effect-ode-jobs/Orchestrator")<Orchestrator, OrchestratorService>() {
  /**
   * @category Layers
   * @since 0.1.0
   */
  static readonly layerWithConfig = (config: OrchestratorConfig) => Layer.scoped(this, make(config))

  /**
   * Reads {@link OrchestratorConfig} from the environment.
   *
   * @category Layers
   * @since 0.1.0
   */
  static readonly layer = Layer.scoped(this, Effect.flatMap(OrchestratorConfig.fromEnv, make))

  /**
   * Environment config plus the in-memory store, built-in solvers and
   * notification channel.
   *
   * @category Layers
   * @since 0.1.0
   */
  static readonly layerDefault = this.layer.pipe(
    Layer.provide(Layer.mergeAll(JobStore.layerMemory, SolverRegistry.layer, Notifications.layer)),
  )
}
