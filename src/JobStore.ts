/**
 * Persistence boundary for job records.
 *
 * @since 0.1.0
 */

import { Context, Effect, HashMap, Layer, Option, Ref, Schema } from "effect"
import { JobNotFoundError, PersistenceError } from "./Errors.js"
import { JobRecord } from "./Job.js"
import type { JobId } from "./Types.js"

/**
 * @category Services
 * @since 0.1.0
 */
export interface JobStoreService {
  readonly save: (jobId: JobId, record: JobRecord) => Effect.Effect<void, PersistenceError>
  readonly load: (jobId: JobId) => Effect.Effect<JobRecord, JobNotFoundError | PersistenceError>
}

const JobRecordJson = Schema.parseJson(JobRecord)
const encodeRecord = Schema.encode(JobRecordJson)
const decodeRecord = Schema.decode(JobRecordJson)

/**
 * Context tag for the job store. Only the orchestrator writes records.
 *
 * @category Services
 * @since 0.1.0
 */
export class JobStore extends Context.Tag("effect-ode-jobs/JobStore")<JobStore, JobStoreService>() {
  /**
   * In-process store. Records are kept as encoded JSON so reads and writes go
   * through the same codec a durable engine would use.
   *
   * @category Layers
   * @since 0.1.0
   */
  static readonly layerMemory = Layer.effect(
    this,
    Effect.gen(function* () {
      const rows = yield* Ref.make(HashMap.empty<JobId, string>())

      const save = (jobId: JobId, record: JobRecord) =>
        encodeRecord(record).pipe(
          Effect.mapError((cause) => new PersistenceError({ operation: "save", jobId, cause })),
          Effect.flatMap((json) => Ref.update(rows, HashMap.set(jobId, json))),
        )

      const load = (jobId: JobId) =>
        Effect.gen(function* () {
          const row = HashMap.get(yield* Ref.get(rows), jobId)
          if (Option.isNone(row)) {
            return yield* Effect.fail(new JobNotFoundError({ jobId }))
          }
          return yield* decodeRecord(row.value).pipe(
            Effect.mapError((cause) => new PersistenceError({ operation: "load", jobId, cause })),
          )
        })

      return { save, load } satisfies JobStoreService
    }),
  )
}
