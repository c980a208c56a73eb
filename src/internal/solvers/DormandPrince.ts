import { Clock, Effect } from "effect"
import { NonFiniteStateError } from "../../Errors.js"
import type { Integration, ResolvedSolverOptions, SolverBackend } from "../../Solver.js"
import type { TimeSpan } from "../../Types.js"
import type { CompiledSystem } from "../equations/Compiler.js"
import { checkAccepted, firstNonFinite, minimumStep, SampleRecorder, samplingGrid, StepBudget } from "./shared.js"

const DORMAND_PRINCE_C = [0, 1 / 5, 3 / 10, 4 / 5, 8 / 9, 1, 1] as const

const DORMAND_PRINCE_A: ReadonlyArray<ReadonlyArray<number>> = [
  [],
  [1 / 5],
  [3 / 40, 9 / 40],
  [44 / 45, -56 / 15, 32 / 9],
  [19372 / 6561, -25360 / 2187, 64448 / 6561, -212 / 729],
  [9017 / 3168, -355 / 33, 46732 / 5247, 49 / 176, -5103 / 18656],
  [35 / 384, 0, 500 / 1113, 125 / 192, -2187 / 6784, 11 / 84],
]

const DORMAND_PRINCE_B5 = [35 / 384, 0, 500 / 1113, 125 / 192, -2187 / 6784, 11 / 84, 0] as const
const DORMAND_PRINCE_B4 = [5179 / 57600, 0, 7571 / 16695, 393 / 640, -92097 / 339200, 187 / 2100, 1 / 40] as const

const ADAPTIVE_ERROR_EXPONENT = -0.2 // -1/5 power used for Dormand–Prince controller
const SAFETY_FACTOR = 0.9
const GROWTH_LIMIT = 5
const SHRINK_LIMIT = 0.2

const clampNumber = (value: number, min: number, max: number): number => Math.min(Math.max(value, min), max)

/** `base + h * Σ coefficients[j] * slopes[j]` */
const combine = (
  base: ReadonlyArray<number>,
  slopes: ReadonlyArray<ReadonlyArray<number>>,
  coefficients: ReadonlyArray<number>,
  h: number,
): Array<number> => {
  const out = base.slice()
  for (let j = 0; j < coefficients.length; j++) {
    const weight = coefficients[j] ?? 0
    const slope = slopes[j]
    if (weight === 0 || slope === undefined) {
      continue
    }
    for (let i = 0; i < out.length; i++) {
      out[i] = (out[i] ?? 0) + h * weight * (slope[i] ?? 0)
    }
  }
  return out
}

/**
 * RMS of the embedded error scaled by `atol + rtol * max(|y|, |y5|)`.
 */
const computeAdaptiveError = (
  base: ReadonlyArray<number>,
  highOrder: ReadonlyArray<number>,
  lowOrder: ReadonlyArray<number>,
  options: ResolvedSolverOptions,
): number => {
  if (base.length === 0) {
    return 0
  }
  let sum = 0
  for (let i = 0; i < base.length; i++) {
    const highValue = highOrder[i] ?? 0
    const lowValue = lowOrder[i] ?? highValue
    const baseValue = base[i] ?? highValue
    const scale =
      options.absoluteTolerance + options.relativeTolerance * Math.max(Math.abs(baseValue), Math.abs(highValue))
    const ratio = scale === 0 ? 0 : Math.abs(highValue - lowValue) / scale
    sum += ratio * ratio
  }
  return Math.sqrt(sum / base.length)
}

const rms = (values: ReadonlyArray<number>, reference: ReadonlyArray<number>, options: ResolvedSolverOptions) => {
  if (values.length === 0) {
    return 0
  }
  let sum = 0
  for (let i = 0; i < values.length; i++) {
    const scale = options.absoluteTolerance + options.relativeTolerance * Math.abs(reference[i] ?? 0)
    const ratio = (values[i] ?? 0) / scale
    sum += ratio * ratio
  }
  return Math.sqrt(sum / values.length)
}

/**
 * Starting step from the magnitudes of the state and its slope.
 */
const initialStepSize = (
  state: ReadonlyArray<number>,
  slope: ReadonlyArray<number>,
  width: number,
  options: ResolvedSolverOptions,
): number => {
  const ceiling = Math.min(width, options.maxStep ?? width)
  if (options.initialStep !== undefined) {
    return Math.min(options.initialStep, ceiling)
  }
  const d0 = rms(state, state, options)
  const d1 = rms(slope, state, options)
  const guess = d0 < 1e-5 || d1 < 1e-5 ? 1e-6 : (0.01 * d0) / d1
  return clampNumber(guess, Math.min(1e-6, ceiling), ceiling)
}

const integrate = (
  system: CompiledSystem,
  initial: ReadonlyArray<number>,
  span: TimeSpan,
  options: ResolvedSolverOptions,
) =>
  Effect.gen(function* () {
    const t0 = span[0]
    const grid = samplingGrid(span, options)
    const end = grid[grid.length - 1] ?? t0
    const recorder = new SampleRecorder()
    const budget = new StepBudget(yield* Clock.currentTimeMillis, options)

    let t = t0
    let y = initial.slice()
    let slope: ReadonlyArray<number> = system.derivative(t, y)
    const initialFailure = checkAccepted(t, y, slope, options, recorder)
    if (initialFailure) {
      return yield* Effect.fail(initialFailure)
    }

    let accepted = 0
    let rejected = 0
    let evaluations = 1
    let h = initialStepSize(y, slope, end - t0, options)
    const maxStep = options.maxStep ?? Number.POSITIVE_INFINITY

    for (const target of grid) {
      while (t < target) {
        const remaining = target - t
        if (remaining < minimumStep(t)) {
          t = target
          break
        }
        yield* budget.attempt(t, recorder)

        const step = Math.min(h, remaining, maxStep)
        const landsOnTarget = step === remaining
        const stages: Array<ReadonlyArray<number>> = [slope]
        for (let s = 1; s < 7; s++) {
          const stageState = combine(y, stages, DORMAND_PRINCE_A[s] ?? [], step)
          stages.push(system.derivative(t + (DORMAND_PRINCE_C[s] ?? 1) * step, stageState))
        }
        evaluations += 6

        const highOrder = combine(y, stages, DORMAND_PRINCE_B5, step)
        const lowOrder = combine(y, stages, DORMAND_PRINCE_B4, step)
        const error = computeAdaptiveError(y, highOrder, lowOrder, options)
        const errorRatio = Number.isFinite(error) ? error : Number.POSITIVE_INFINITY

        if (errorRatio <= 1) {
          const nextTime = landsOnTarget ? target : t + step
          // FSAL: the last stage is the slope at the accepted point.
          const nextSlope = stages[6] ?? system.derivative(nextTime, highOrder)
          const failure = checkAccepted(nextTime, highOrder, nextSlope, options, recorder)
          if (failure) {
            return yield* Effect.fail(failure)
          }
          t = nextTime
          y = highOrder
          slope = nextSlope
          accepted += 1

          const scaleBase =
            errorRatio === 0
              ? GROWTH_LIMIT
              : SAFETY_FACTOR * Math.pow(Math.max(errorRatio, 1e-12), ADAPTIVE_ERROR_EXPONENT)
          const proposed = step * clampNumber(scaleBase, SHRINK_LIMIT, GROWTH_LIMIT)
          h = landsOnTarget ? Math.max(h, proposed) : proposed
        } else {
          rejected += 1
          const scaleBase = SAFETY_FACTOR * Math.pow(Math.max(errorRatio, 1e-12), ADAPTIVE_ERROR_EXPONENT)
          h = step * clampNumber(scaleBase, SHRINK_LIMIT, 1)
          if (h < minimumStep(t)) {
            const badComponent = firstNonFinite(highOrder)
            return yield* Effect.fail(
              badComponent >= 0
                ? new NonFiniteStateError({ time: t, partial: recorder.toTrajectory(), component: badComponent })
                : budget.underflow(t, recorder),
            )
          }
        }
      }
      recorder.record(target, y)
    }

    return {
      trajectory: recorder.toTrajectory(),
      warnings: [],
      stats: { acceptedSteps: accepted, rejectedSteps: rejected, evaluations },
    } satisfies Integration
  }).pipe(Effect.withLogSpan("dopri5"))

/**
 * Adaptive Dormand–Prince 5(4) with an embedded error estimate and FSAL
 * reuse of the final stage.
 *
 * @since 0.1.0
 */
export const DormandPrince: SolverBackend = {
  kind: "dopri5",
  integrate,
}
