import { describe, expect, it } from "@effect/vitest"
import { ConfigProvider, Effect } from "effect"
import { OrchestratorConfig } from "../src/Config.js"

const fromMap = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)))

describe("OrchestratorConfig", () => {
  it.effect("falls back to defaults", () =>
    Effect.gen(function* () {
      const config = yield* OrchestratorConfig.fromEnv.pipe(fromMap([]))
      expect(config).toEqual(OrchestratorConfig.defaults)
      expect(config.workerPoolSize).toBe(4)
      expect(config.maxPendingJobs).toBe(64)
      expect(config.defaultSolver).toBe("dopri5")
    }),
  )

  it.effect("reads ODE_* variables", () =>
    Effect.gen(function* () {
      const config = yield* OrchestratorConfig.fromEnv.pipe(
        fromMap([
          ["ODE_WORKER_POOL_SIZE", "2"],
          ["ODE_MAX_PENDING_JOBS", "8"],
          ["ODE_DEFAULT_SOLVER", "rk4"],
          ["ODE_INDEPENDENT_VARIABLE", "tau"],
          ["ODE_PERSISTENCE_RETRIES", "0"],
        ]),
      )
      expect(config.workerPoolSize).toBe(2)
      expect(config.maxPendingJobs).toBe(8)
      expect(config.compileCacheCapacity).toBe(256)
      expect(config.defaultSolver).toBe("rk4")
      expect(config.independentVariable).toBe("tau")
      expect(config.persistenceRetries).toBe(0)
    }),
  )

  it.effect("rejects an unknown solver", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(OrchestratorConfig.fromEnv.pipe(fromMap([["ODE_DEFAULT_SOLVER", "euler"]])))
      expect(error._op).toBe("InvalidData")
    }),
  )

  it.effect("rejects a pool with no workers", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(OrchestratorConfig.fromEnv.pipe(fromMap([["ODE_WORKER_POOL_SIZE", "0"]])))
      expect(error._op).toBe("InvalidData")
    }),
  )

  it("overrides selected fields", () => {
    const config = OrchestratorConfig.with({ workerPoolSize: 1, persistenceRetries: 0 })
    expect(config.workerPoolSize).toBe(1)
    expect(config.persistenceRetries).toBe(0)
    expect(config.maxPendingJobs).toBe(64)
  })
})
