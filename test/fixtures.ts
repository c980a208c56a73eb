import { DateTime, Deferred, Effect, Layer, Queue, Ref } from "effect"
import { OrchestratorConfig } from "../src/Config.js"
import { PersistenceError } from "../src/Errors.js"
import { JobProgress, JobRecord } from "../src/Job.js"
import { JobStore } from "../src/JobStore.js"
import { Notifications } from "../src/Notifications.js"
import { Orchestrator } from "../src/Orchestrator.js"
import { resolveSolverOptions, type SolverBackend, SolverRegistry } from "../src/Solver.js"
import { DormandPrince } from "../src/internal/solvers/DormandPrince.js"
import { RungeKutta4 } from "../src/internal/solvers/RungeKutta4.js"
import { JobId, type JobState } from "../src/Types.js"

export const jobIdA = JobId.make("550e8400-e29b-41d4-a716-446655440000")
export const jobIdB = JobId.make("660e8400-e29b-41d4-a716-446655440001")

/**
 * Queued record for a one-dimensional decay system.
 */
export const makeRecord = (id: JobId = jobIdA): JobRecord =>
  new JobRecord({
    id,
    equationText: "D(x) == -k*x",
    parameters: { k: 0.5 },
    initialConditions: [[1], [2]],
    timeSpan: [0, 4],
    solverOptions: resolveSolverOptions(undefined, "dopri5"),
    state: "queued",
    createdAt: DateTime.unsafeMake(1_000),
    updatedAt: DateTime.unsafeMake(1_000),
    progress: new JobProgress({ completed: 0, total: 2 }),
    warnings: [],
  })

/**
 * Solver registry stand-in whose backends block until `release` runs.
 * `started` resolves once per integration that reached the gate.
 */
export const makeGatedRegistry = Effect.gen(function* () {
  const gate = yield* Deferred.make<void>()
  const entries = yield* Queue.unbounded<number>()
  const calls = yield* Ref.make(0)

  const gated = (backend: SolverBackend): SolverBackend => ({
    kind: backend.kind,
    integrate: (system, initial, span, options) =>
      Effect.gen(function* () {
        const call = yield* Ref.updateAndGet(calls, (count) => count + 1)
        yield* Queue.offer(entries, call)
        yield* Deferred.await(gate)
        return yield* backend.integrate(system, initial, span, options)
      }),
  })

  return {
    layer: Layer.succeed(
      SolverRegistry,
      SolverRegistry.fromBackends({ dopri5: gated(DormandPrince), rk4: gated(RungeKutta4) }),
    ),
    started: Effect.asVoid(Queue.take(entries)),
    release: Deferred.succeed(gate, undefined),
    calls: Ref.get(calls),
  }
})

/**
 * Memory store that rejects the first `failures` writes of non-queued
 * records.
 */
export const flakyStore = (failures: number) =>
  Layer.effect(
    JobStore,
    Effect.gen(function* () {
      const inner = yield* JobStore
      const remaining = yield* Ref.make(failures)
      return {
        load: inner.load,
        save: (jobId: JobId, record: JobRecord) =>
          record.state === "queued"
            ? inner.save(jobId, record)
            : Ref.getAndUpdate(remaining, (count) => Math.max(0, count - 1)).pipe(
                Effect.flatMap((count) =>
                  count > 0
                    ? Effect.fail(new PersistenceError({ operation: "save", jobId, cause: new Error("disk full") }))
                    : inner.save(jobId, record),
                ),
              ),
      }
    }),
  ).pipe(Layer.provide(JobStore.layerMemory))

/**
 * Memory store that logs the state of every write it accepts. The first
 * `rejectFinished` writes of a finished record fail with "disk full".
 */
export const makeRecordingStore = (rejectFinished = 0) =>
  Effect.gen(function* () {
    const writes = yield* Ref.make<ReadonlyArray<JobState>>([])
    const rejections = yield* Ref.make(rejectFinished)

    const refuses = (record: JobRecord) =>
      record.state === "finished"
        ? Ref.modify(rejections, (left) => [left > 0, Math.max(0, left - 1)])
        : Effect.succeed(false)

    const layer = Layer.effect(
      JobStore,
      Effect.gen(function* () {
        const inner = yield* JobStore
        return {
          load: inner.load,
          save: (jobId: JobId, record: JobRecord) =>
            Effect.flatMap(refuses(record), (refused) =>
              refused
                ? Effect.fail(new PersistenceError({ operation: "save", jobId, cause: new Error("disk full") }))
                : inner.save(jobId, record).pipe(Effect.zipRight(Ref.update(writes, (all) => [...all, record.state]))),
            ),
        }
      }),
    ).pipe(Layer.provide(JobStore.layerMemory))

    return { layer, writes: Ref.get(writes) }
  })

/**
 * Store whose writes always fail.
 */
export const brokenStore = Layer.succeed(JobStore, {
  save: (jobId: JobId) =>
    Effect.fail(new PersistenceError({ operation: "save", jobId, cause: new Error("read-only volume") })),
  load: (jobId: JobId) => Effect.fail(new PersistenceError({ operation: "load", jobId, cause: "unavailable" })),
})

/**
 * Orchestrator plus the services it was built on, so tests can inspect them.
 */
export const orchestratorLayer = (
  config: OrchestratorConfig = OrchestratorConfig.defaults,
  services: {
    readonly registry?: Layer.Layer<SolverRegistry>
    readonly store?: Layer.Layer<JobStore>
  } = {},
) =>
  Orchestrator.layerWithConfig(config).pipe(
    Layer.provideMerge(
      Layer.mergeAll(
        services.store ?? JobStore.layerMemory,
        services.registry ?? SolverRegistry.layer,
        Notifications.layer,
      ),
    ),
  )
