/**
 * Orchestrator configuration, loadable from the environment.
 *
 * @since 0.1.0
 */

import { Config, ConfigError, Effect, ParseResult, Schema } from "effect"
import { SolverKind } from "./Solver.js"

/**
 * @category Config
 * @since 0.1.0
 */
export class OrchestratorConfig extends Schema.Class<OrchestratorConfig>("OrchestratorConfig")({
  workerPoolSize: Schema.Int.pipe(Schema.positive()),
  maxPendingJobs: Schema.Int.pipe(Schema.positive()),
  compileCacheCapacity: Schema.Int.pipe(Schema.positive()),
  defaultSolver: SolverKind,
  independentVariable: Schema.String.pipe(Schema.pattern(/^[A-Za-z]+[0-9]*$/)),
  persistenceRetries: Schema.Int.pipe(Schema.nonNegative()),
}) {
  /**
   * @since 0.1.0
   */
  static readonly defaults = new OrchestratorConfig({
    workerPoolSize: 4,
    maxPendingJobs: 64,
    compileCacheCapacity: 256,
    defaultSolver: "dopri5",
    independentVariable: "t",
    persistenceRetries: 3,
  })

  /**
   * Defaults with selected fields replaced.
   *
   * @since 0.1.0
   * @example
   * ```ts
   * const config = OrchestratorConfig.with({ workerPoolSize: 1 })
   * ```
   */
  static readonly with = (overrides: Partial<typeof OrchestratorConfig.Encoded>): OrchestratorConfig =>
    new OrchestratorConfig({ ...OrchestratorConfig.defaults, ...overrides })

  /**
   * Read `ODE_*` environment variables, falling back to {@link defaults}.
   *
   * @since 0.1.0
   */
  static readonly fromEnv: Effect.Effect<OrchestratorConfig, ConfigError.ConfigError> = Effect.gen(function* () {
    const defaults = OrchestratorConfig.defaults
    const raw = yield* Config.all({
      workerPoolSize: Config.integer("ODE_WORKER_POOL_SIZE").pipe(Config.withDefault(defaults.workerPoolSize)),
      maxPendingJobs: Config.integer("ODE_MAX_PENDING_JOBS").pipe(Config.withDefault(defaults.maxPendingJobs)),
      compileCacheCapacity: Config.integer("ODE_COMPILE_CACHE_CAPACITY").pipe(
        Config.withDefault(defaults.compileCacheCapacity),
      ),
      defaultSolver: Config.literal("dopri5", "rk4")("ODE_DEFAULT_SOLVER").pipe(
        Config.withDefault(defaults.defaultSolver),
      ),
      independentVariable: Config.string("ODE_INDEPENDENT_VARIABLE").pipe(
        Config.withDefault(defaults.independentVariable),
      ),
      persistenceRetries: Config.integer("ODE_PERSISTENCE_RETRIES").pipe(
        Config.withDefault(defaults.persistenceRetries),
      ),
    })
    return yield* Schema.decodeUnknown(OrchestratorConfig)(raw).pipe(
      Effect.mapError((error) => ConfigError.InvalidData([], ParseResult.TreeFormatter.formatErrorSync(error))),
    )
  })
}
