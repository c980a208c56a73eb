import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import {
  CapacityExceededError,
  DimensionMismatchError,
  DivergedError,
  JobNotReadyError,
  JobNotSucceededError,
  NonFiniteStateError,
  PersistenceError,
  type SolveError,
  StepCountExceededError,
  WallClockExceededError,
} from "../src/Errors.js"
import { Trajectory } from "../src/Types.js"
import { jobIdA } from "./fixtures.js"

const partial = new Trajectory({ times: [0], states: [[1]] })

describe("solve errors", () => {
  it("format their messages", () => {
    expect(new NonFiniteStateError({ time: 1.5, partial, component: 0 }).message).toBe(
      "State component 0 became non-finite at t=1.5",
    )
    expect(new StepCountExceededError({ time: 2, partial, maxSteps: 10, steps: 10 }).message).toBe(
      "Integration stopped after 10 steps (limit 10) at t=2",
    )
    expect(new WallClockExceededError({ time: 3, partial, maxWallClockMs: 50, elapsedMs: 51 }).message).toBe(
      "Integration exceeded its 50ms budget at t=3",
    )
    expect(new DivergedError({ time: 4, partial, bound: 100, magnitude: 120 }).message).toBe(
      "Solution diverged at t=4: |y| = 120 exceeds 100",
    )
  })

  it.effect("carry the partial trajectory through catchTag", () =>
    Effect.gen(function* () {
      const failing: Effect.Effect<number, SolveError> = Effect.fail(
        new DivergedError({ time: 4, partial, bound: 100, magnitude: 120 }),
      )
      const recovered = yield* failing.pipe(
        Effect.catchTag("DivergedError", (error) => Effect.succeed(error.partial.length)),
      )
      expect(recovered).toBe(1)
    }),
  )
})

describe("job errors", () => {
  it("format their messages", () => {
    expect(new DimensionMismatchError({ index: 1, expected: 2, actual: 1 }).message).toBe(
      "Initial condition 1 has 1 value(s); the system has dimension 2",
    )
    expect(new CapacityExceededError({ limit: 8 }).message).toBe("Job capacity of 8 active jobs reached; retry later")
    expect(new PersistenceError({ operation: "load", jobId: jobIdA, cause: "timeout" }).message).toBe(
      `Failed to load job ${jobIdA}: timeout`,
    )
    expect(new JobNotReadyError({ jobId: jobIdA, state: "queued" }).message).toBe(
      `Job ${jobIdA} is queued; no result yet`,
    )
  })

  it("describe why a job did not succeed", () => {
    const cancelled = new JobNotSucceededError({ jobId: jobIdA, state: "cancelled", reason: { _tag: "Cancelled" } })
    expect(cancelled.message).toBe(`Job ${jobIdA} cancelled (Cancelled)`)

    const failed = new JobNotSucceededError({
      jobId: jobIdA,
      state: "failed",
      reason: { _tag: "Internal", message: "worker lost" },
    })
    expect(failed.message).toBe(`Job ${jobIdA} failed (Internal): worker lost`)
  })
})
