import { mkdirSync, writeFileSync } from "node:fs"
import { resolve } from "node:path"
import { fileURLToPath } from "node:url"
import { Effect, Stream } from "effect"
import { Orchestrator } from "../src/Orchestrator.js"

// Lotka–Volterra predator/prey, one trajectory per starting population.
const submission = {
  equationText: "{D(prey), D(predator)} == {a*prey - b*prey*predator, d*prey*predator - c*predator}",
  parameters: { a: 1.1, b: 0.4, c: 0.4, d: 0.1 },
  initialConditions: [
    [10, 5],
    [15, 5],
    [20, 5],
    [30, 5],
  ],
  timeSpan: [0, 50],
  solverOptions: { samples: 501 },
} as const

const outDir = fileURLToPath(new URL("./out/", import.meta.url))

const program = Effect.gen(function* () {
  const orchestrator = yield* Orchestrator
  const { jobId, stateVariables } = yield* orchestrator.submit(submission)
  const events = yield* orchestrator.subscribe(jobId)

  yield* Stream.runForEach(events, (event) =>
    event._tag === "TrajectoryCompleted"
      ? Effect.logInfo(`trajectory ${event.index} done (${Math.round(event.fraction * 100)}%)`)
      : Effect.logInfo(event._tag),
  )

  const result = yield* orchestrator.getResult(jobId)
  const portrait = result.trajectories.map((trajectory, index) => ({
    initial: submission.initialConditions[index],
    points: trajectory.states.map((state) =>
      Object.fromEntries(stateVariables.map((name, i) => [name, state[i]])),
    ),
  }))

  yield* Effect.sync(() => mkdirSync(outDir, { recursive: true }))
  yield* Effect.sync(() =>
    writeFileSync(resolve(outDir, "phase-portrait.json"), JSON.stringify(portrait, null, 2), "utf-8"),
  )
}).pipe(Effect.scoped, Effect.provide(Orchestrator.layerDefault))

Effect.runPromise(program).catch((error) => {
  console.error("Failed to generate phase portrait", error)
  process.exitCode = 1
})
