/**
 * Solver service interface for the ODE job engine.
 *
 * Provides a Context.Tag that maps every {@link SolverKind} to a backend. Each
 * backend integrates a compiled system from one initial condition over a time
 * span and reports samples on a uniform grid (or at caller-chosen times), or a
 * typed numerical failure carrying the samples recorded before it.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, Schema } from "effect"
import type { SolveError } from "./Errors.js"
import type { CompiledSystem } from "./internal/equations/Compiler.js"
import { DormandPrince } from "./internal/solvers/DormandPrince.js"
import { RungeKutta4 } from "./internal/solvers/RungeKutta4.js"
import { samplingGrid } from "./internal/solvers/shared.js"
import { FiniteNumber, type TimeSpan, type Trajectory } from "./Types.js"

/**
 * Closed set of integration methods.
 *
 * @category Options
 * @since 0.1.0
 */
export const SolverKind = Schema.Literal("dopri5", "rk4")

/**
 * @category Options
 * @since 0.1.0
 */
export type SolverKind = typeof SolverKind.Type

const PositiveNumber = Schema.Number.pipe(Schema.finite(), Schema.positive())

const isStrictlyIncreasing = (values: ReadonlyArray<number>): boolean =>
  values.every((value, i) => i === 0 || value > (values[i - 1] ?? Number.NEGATIVE_INFINITY))

/**
 * Explicit reporting times. Replaces the uniform grid built from `samples`.
 *
 * @category Options
 * @since 0.1.0
 */
export const SampleTimes = Schema.Array(FiniteNumber).pipe(
  Schema.minItems(1),
  Schema.filter((times) => isStrictlyIncreasing(times) || "sample times must be strictly increasing"),
)

/**
 * Caller-supplied options. Every field is optional; see
 * {@link resolveSolverOptions} for defaults.
 *
 * @category Options
 * @since 0.1.0
 */
export class SolverOptions extends Schema.Class<SolverOptions>("SolverOptions")({
  solver: Schema.optional(SolverKind),
  relativeTolerance: Schema.optional(PositiveNumber),
  absoluteTolerance: Schema.optional(PositiveNumber),
  maxSteps: Schema.optional(Schema.Int.pipe(Schema.positive())),
  maxWallClockMs: Schema.optional(Schema.Number.pipe(Schema.finite(), Schema.nonNegative())),
  samples: Schema.optional(Schema.Int.pipe(Schema.greaterThanOrEqualTo(2))),
  times: Schema.optional(SampleTimes),
  maxStep: Schema.optional(PositiveNumber),
  initialStep: Schema.optional(PositiveNumber),
  divergenceBound: Schema.optional(PositiveNumber),
}) {}

/**
 * Options with every default applied, as persisted on the job record.
 *
 * @category Options
 * @since 0.1.0
 */
export class ResolvedSolverOptions extends Schema.Class<ResolvedSolverOptions>("ResolvedSolverOptions")({
  solver: SolverKind,
  relativeTolerance: PositiveNumber,
  absoluteTolerance: PositiveNumber,
  tolerancesSupplied: Schema.Boolean,
  maxSteps: Schema.Int.pipe(Schema.positive()),
  maxWallClockMs: Schema.Number.pipe(Schema.finite(), Schema.nonNegative()),
  samples: Schema.Int.pipe(Schema.greaterThanOrEqualTo(2)),
  times: Schema.optional(SampleTimes),
  maxStep: Schema.optional(PositiveNumber),
  initialStep: Schema.optional(PositiveNumber),
  divergenceBound: PositiveNumber,
}) {}

/**
 * @category Options
 * @since 0.1.0
 */
export const SolverDefaults = {
  relativeTolerance: 1e-6,
  absoluteTolerance: 1e-9,
  maxSteps: 100_000,
  maxWallClockMs: 30_000,
  samples: 201,
  divergenceBound: 1e12,
} as const

/**
 * Fill in defaults. The solver falls back to `defaultSolver` when the caller
 * did not pick one.
 *
 * @category Options
 * @since 0.1.0
 * @example
 * ```ts
 * const resolved = resolveSolverOptions(new SolverOptions({ samples: 11 }), "dopri5")
 * resolved.relativeTolerance // 1e-6
 * ```
 */
export const resolveSolverOptions = (
  options: SolverOptions | undefined,
  defaultSolver: SolverKind,
): ResolvedSolverOptions =>
  new ResolvedSolverOptions({
    solver: options?.solver ?? defaultSolver,
    relativeTolerance: options?.relativeTolerance ?? SolverDefaults.relativeTolerance,
    absoluteTolerance: options?.absoluteTolerance ?? SolverDefaults.absoluteTolerance,
    tolerancesSupplied: options?.relativeTolerance !== undefined || options?.absoluteTolerance !== undefined,
    maxSteps: options?.maxSteps ?? SolverDefaults.maxSteps,
    maxWallClockMs: options?.maxWallClockMs ?? SolverDefaults.maxWallClockMs,
    samples: options?.samples ?? SolverDefaults.samples,
    times: options?.times,
    maxStep: options?.maxStep,
    initialStep: options?.initialStep,
    divergenceBound: options?.divergenceBound ?? SolverDefaults.divergenceBound,
  })

/**
 * Times every trajectory is reported at: `options.times` when given,
 * otherwise `samples` evenly spaced points over the span.
 *
 * @category Options
 * @since 0.1.0
 */
export const sampleTimes: (span: TimeSpan, options: ResolvedSolverOptions) => ReadonlyArray<number> = samplingGrid

/**
 * Why `times` cannot be used over `span`, if it cannot.
 *
 * @category Options
 * @since 0.1.0
 */
export const checkSampleTimes = (times: ReadonlyArray<number>, span: TimeSpan): string | undefined => {
  const first = times[0]
  const last = times[times.length - 1]
  if (first === undefined || last === undefined) {
    return "sample times must not be empty"
  }
  if (first < span[0] || last > span[1]) {
    return `sample times must lie within [${span[0]}, ${span[1]}]`
  }
  return undefined
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface IntegrationStats {
  readonly acceptedSteps: number
  readonly rejectedSteps: number
  readonly evaluations: number
}

/**
 * Successful integration of one initial condition.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Integration {
  readonly trajectory: Trajectory
  readonly warnings: ReadonlyArray<string>
  readonly stats: IntegrationStats
}

/**
 * @category Services
 * @since 0.1.0
 */
export interface SolverBackend {
  readonly kind: SolverKind
  readonly integrate: (
    system: CompiledSystem,
    initial: ReadonlyArray<number>,
    span: TimeSpan,
    options: ResolvedSolverOptions,
  ) => Effect.Effect<Integration, SolveError>
}

/**
 * @category Services
 * @since 0.1.0
 */
export interface SolverRegistryService {
  readonly get: (kind: SolverKind) => SolverBackend
}

/**
 * Context tag resolving a solver kind to its backend.
 *
 * @category Services
 * @since 0.1.0
 */
export class SolverRegistry extends Context.Tag("effect-ode-jobs/SolverRegistry")<
  SolverRegistry,
  SolverRegistryService
>() {
  /**
   * Registry over an explicit backend per kind.
   *
   * @since 0.1.0
   */
  static readonly fromBackends = (backends: Readonly<Record<SolverKind, SolverBackend>>): SolverRegistryService => ({
    get: (kind) => backends[kind],
  })

  /**
   * Built-in backends: adaptive Dormand–Prince and fixed-step RK4.
   *
   * @example
   * ```ts
   * const integration = yield* Effect.flatMap(SolverRegistry, (registry) =>
   *   registry.get("dopri5").integrate(system, [1], [0, 1], options),
   * ).pipe(Effect.provide(SolverRegistry.layer))
   * ```
   *
   * @category Layers
   * @since 0.1.0
   */
  static readonly layer = Layer.succeed(this, this.fromBackends({ dopri5: DormandPrince, rk4: RungeKutta4 }))
}

/**
 * Integrate with the backend named in `options.solver`.
 *
 * @category Operations
 * @since 0.1.0
 */
export const integrate = (
  system: CompiledSystem,
  initial: ReadonlyArray<number>,
  span: TimeSpan,
  options: ResolvedSolverOptions,
): Effect.Effect<Integration, SolveError, SolverRegistry> =>
  Effect.flatMap(SolverRegistry, (registry) => registry.get(options.solver).integrate(system, initial, span, options))
