/**
 * Per-job event channel.
 *
 * Each job gets its own `PubSub`, created by the first subscriber. Delivery is
 * FIFO per job and at most once per subscriber, with no replay. Events for a
 * job nobody listens to are dropped. Publishing the terminal event removes the
 * channel; subscribers already attached still drain what they were sent.
 *
 * @since 0.1.0
 */

import { Context, Data, Effect, HashMap, Layer, Option, PubSub, type Scope, Stream, SynchronizedRef } from "effect"
import type { JobResult, TerminalReason } from "./Job.js"
import type { JobId, JobState, Trajectory } from "./Types.js"

/**
 * @category Events
 * @since 0.1.0
 */
export type JobEvent = Data.TaggedEnum<{
  StatusChanged: { readonly jobId: JobId; readonly state: JobState }
  TrajectoryCompleted: {
    readonly jobId: JobId
    readonly index: number
    readonly trajectory: Trajectory
    readonly fraction: number
  }
  JobFailed: { readonly jobId: JobId; readonly reason: TerminalReason }
  JobFinished: { readonly jobId: JobId; readonly result: JobResult }
}>

/**
 * Constructors and matchers for {@link JobEvent}.
 *
 * @category Events
 * @since 0.1.0
 * @example
 * ```ts
 * const event = JobEvent.StatusChanged({ jobId, state: "running" })
 * ```
 */
export const JobEvent = Data.taggedEnum<JobEvent>()

/**
 * Whether `event` is the last one a job publishes.
 *
 * @category Events
 * @since 0.1.0
 */
export const isTerminalEvent = (event: JobEvent): boolean =>
  event._tag === "JobFinished" ||
  event._tag === "JobFailed" ||
  (event._tag === "StatusChanged" && event.state === "cancelled")

/**
 * @category Services
 * @since 0.1.0
 */
export interface NotificationsService {
  readonly publish: (jobId: JobId, event: JobEvent) => Effect.Effect<void>
  /**
   * Register a subscriber in the current scope. Events published after this
   * effect completes are delivered; the stream ends after the terminal event.
   */
  readonly subscribe: (jobId: JobId) => Effect.Effect<Stream.Stream<JobEvent>, never, Scope.Scope>
  /** Jobs that currently have a channel. */
  readonly channelCount: Effect.Effect<number>
}

type Channels = HashMap.HashMap<JobId, PubSub.PubSub<JobEvent>>

/**
 * @category Services
 * @since 0.1.0
 */
export class Notifications extends Context.Tag("effect-ode-jobs/Notifications")<
  Notifications,
  NotificationsService
>() {
  static readonly make: Effect.Effect<NotificationsService> = Effect.gen(function* () {
    const channels = yield* SynchronizedRef.make<Channels>(HashMap.empty())

    // Publishing and subscribing both go through `channels`, so a subscriber
    // is never attached to a channel whose terminal event already went out.
    const publish = (jobId: JobId, event: JobEvent) =>
      SynchronizedRef.updateEffect(channels, (open) => {
        const channel = HashMap.get(open, jobId)
        if (Option.isNone(channel)) {
          return Effect.as(Effect.logDebug(`no subscribers for ${event._tag}`), open)
        }
        return Effect.as(
          PubSub.publish(channel.value, event),
          isTerminalEvent(event) ? HashMap.remove(open, jobId) : open,
        )
      }).pipe(Effect.annotateLogs("jobId", jobId))

    const subscribe = (jobId: JobId) =>
      SynchronizedRef.modifyEffect(channels, (open) =>
        Effect.gen(function* () {
          const existing = HashMap.get(open, jobId)
          const channel = Option.isSome(existing) ? existing.value : yield* PubSub.unbounded<JobEvent>()
          const dequeue = yield* PubSub.subscribe(channel)
          const stream = Stream.fromQueue(dequeue).pipe(Stream.takeUntil(isTerminalEvent))
          return [stream, HashMap.set(open, jobId, channel)] as const
        }),
      )

    const channelCount = Effect.map(SynchronizedRef.get(channels), HashMap.size)

    return { publish, subscribe, channelCount } satisfies NotificationsService
  })

  static readonly layer = Layer.effect(this, this.make)
}
