import { Clock, Effect } from "effect"
import type { Integration, ResolvedSolverOptions, SolverBackend } from "../../Solver.js"
import type { TimeSpan } from "../../Types.js"
import type { CompiledSystem } from "../equations/Compiler.js"
import { checkAccepted, SampleRecorder, samplingGrid, StepBudget } from "./shared.js"

/** Substeps per sampling interval when neither `maxStep` nor `initialStep` is set. */
const DEFAULT_SUBSTEPS = 10

const axpy = (y: ReadonlyArray<number>, h: number, k: ReadonlyArray<number>): Array<number> =>
  y.map((value, i) => value + h * (k[i] ?? 0))

const rk4Step = (system: CompiledSystem, t: number, y: ReadonlyArray<number>, h: number, k1: ReadonlyArray<number>) => {
  const k2 = system.derivative(t + h / 2, axpy(y, h / 2, k1))
  const k3 = system.derivative(t + h / 2, axpy(y, h / 2, k2))
  const k4 = system.derivative(t + h, axpy(y, h, k3))
  return y.map((value, i) => value + (h / 6) * ((k1[i] ?? 0) + 2 * (k2[i] ?? 0) + 2 * (k3[i] ?? 0) + (k4[i] ?? 0)))
}

const toleranceWarning = (options: ResolvedSolverOptions): ReadonlyArray<string> =>
  options.tolerancesSupplied
    ? ["rk4 uses a fixed step size; relativeTolerance and absoluteTolerance are ignored"]
    : []

const integrate = (
  system: CompiledSystem,
  initial: ReadonlyArray<number>,
  span: TimeSpan,
  options: ResolvedSolverOptions,
) =>
  Effect.gen(function* () {
    const warnings = toleranceWarning(options)
    for (const warning of warnings) {
      yield* Effect.logWarning(warning)
    }

    const grid = samplingGrid(span, options)
    const recorder = new SampleRecorder()
    const budget = new StepBudget(yield* Clock.currentTimeMillis, options)

    let t = span[0]
    let y = initial.slice()
    let slope: ReadonlyArray<number> = system.derivative(t, y)
    let evaluations = 1
    const initialFailure = checkAccepted(t, y, slope, options, recorder)
    if (initialFailure) {
      return yield* Effect.fail(initialFailure)
    }

    const stepCeiling = options.maxStep ?? options.initialStep
    let accepted = 0

    for (const target of grid) {
      const width = target - t
      const substeps =
        width <= 0 ? 0 : stepCeiling === undefined ? DEFAULT_SUBSTEPS : Math.max(1, Math.ceil(width / stepCeiling))
      const h = width / Math.max(1, substeps)
      for (let s = 0; s < substeps; s++) {
        yield* budget.attempt(t, recorder)
        const nextTime = s === substeps - 1 ? target : t + h
        const next = rk4Step(system, t, y, h, slope)
        const nextSlope = system.derivative(nextTime, next)
        evaluations += 4
        const failure = checkAccepted(nextTime, next, nextSlope, options, recorder)
        if (failure) {
          return yield* Effect.fail(failure)
        }
        t = nextTime
        y = next
        slope = nextSlope
        accepted += 1
      }
      recorder.record(target, y)
    }

    return {
      trajectory: recorder.toTrajectory(),
      warnings,
      stats: { acceptedSteps: accepted, rejectedSteps: 0, evaluations },
    } satisfies Integration
  }).pipe(Effect.withLogSpan("rk4"))

/**
 * Classic fixed-step fourth-order Runge–Kutta.
 *
 * @since 0.1.0
 */
export const RungeKutta4: SolverBackend = {
  kind: "rk4",
  integrate,
}
