import { describe, expect, it } from "@effect/vitest"
import { DateTime, Effect } from "effect"
import { JobRecord, JobResult } from "../src/Job.js"
import { JobStore } from "../src/JobStore.js"
import { Trajectory } from "../src/Types.js"
import { jobIdA, jobIdB, makeRecord } from "./fixtures.js"

describe("JobStore.layerMemory", () => {
  it.effect("round-trips a record through its encoded form", () =>
    Effect.gen(function* () {
      const store = yield* JobStore
      const record = makeRecord()
      yield* store.save(jobIdA, record)
      const loaded = yield* store.load(jobIdA)

      expect(loaded).toBeInstanceOf(JobRecord)
      expect(loaded).not.toBe(record)
      expect(loaded.id).toBe(jobIdA)
      expect(loaded.state).toBe("queued")
      expect(loaded.parameters).toEqual({ k: 0.5 })
      expect(loaded.initialConditions).toEqual([[1], [2]])
      expect(loaded.timeSpan).toEqual([0, 4])
      expect(loaded.solverOptions.solver).toBe("dopri5")
      expect(DateTime.toEpochMillis(loaded.createdAt)).toBe(1_000)
      expect(loaded.progress.fraction).toBe(0)
      expect(loaded.result).toBeUndefined()
      expect(loaded.reason).toBeUndefined()
    }).pipe(Effect.provide(JobStore.layerMemory)),
  )

  it.effect("replaces the previous version on save", () =>
    Effect.gen(function* () {
      const store = yield* JobStore
      const record = makeRecord()
      yield* store.save(jobIdA, record)
      yield* store.save(
        jobIdA,
        new JobRecord({
          ...record,
          state: "cancelled",
          reason: { _tag: "Cancelled" },
        }),
      )
      const loaded = yield* store.load(jobIdA)
      expect(loaded.state).toBe("cancelled")
      expect(loaded.reason).toEqual({ _tag: "Cancelled" })
    }).pipe(Effect.provide(JobStore.layerMemory)),
  )

  it.effect("keeps trajectories on finished records", () =>
    Effect.gen(function* () {
      const store = yield* JobStore
      const trajectory = new Trajectory({ times: [0, 4], states: [[1], [0.25]] })
      const record = makeRecord()
      yield* store.save(
        jobIdA,
        new JobRecord({
          ...record,
          state: "finished",
          reason: { _tag: "Completed" },
          result: new JobResult({
            stateVariables: ["x"],
            times: [0, 4],
            trajectories: [trajectory, trajectory],
            warnings: ["note"],
          }),
        }),
      )
      const loaded = yield* store.load(jobIdA)
      expect(loaded.result?.times).toEqual([0, 4])
      expect(loaded.result?.trajectories.map((t) => t.times)).toEqual([
        [0, 4],
        [0, 4],
      ])
      expect(loaded.result?.trajectories[1]?.states).toEqual([[1], [0.25]])
      expect(loaded.result?.warnings).toEqual(["note"])
    }).pipe(Effect.provide(JobStore.layerMemory)),
  )

  it.effect("fails with JobNotFoundError for an unknown id", () =>
    Effect.gen(function* () {
      const store = yield* JobStore
      const error = yield* Effect.flip(store.load(jobIdB))
      expect(error._tag).toBe("JobNotFoundError")
      if (error._tag === "JobNotFoundError") {
        expect(error.jobId).toBe(jobIdB)
      }
    }).pipe(Effect.provide(JobStore.layerMemory)),
  )
})
