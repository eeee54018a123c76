/**
 * Execution poller
 *
 * `Submitted → Polling → Completed | TimedOut`
 *
 * Sleeps on the calling fiber and reads time from `Clock`; nothing is
 * forked on the caller's behalf.
 */

import { Clock, Data, Duration, Effect } from "effect"
import { MalformedResponse } from "../lib/errors"
import { isExecutionStatus, isTerminalStatus } from "../transform/types"
import type { Execution } from "../transform/types"
import type { PollOptions } from "../types"

export type PollResult = Data.TaggedEnum<{
  Completed: { readonly execution: Execution; readonly polls: number }
  TimedOut: { readonly execution: Execution; readonly polls: number }
}>

export const PollResult = Data.taggedEnum<PollResult>()

export type SubmittedExecution = Execution & { readonly id: string }

export type FetchExecution<E, R> = (
  id: string,
) => Effect.Effect<Execution | null, E, R>

const hasId = (execution: Execution): execution is SubmittedExecution =>
  execution.id !== null && execution.id !== ""

/**
 * Poll `fetch` until the execution reaches a terminal status or the timeout
 * elapses.
 *
 * The very first fetch may come back without a status while the server is
 * still materializing the record; that fetch is repeated once, immediately.
 */
export const waitForExecution = <E, R>(
  submitted: SubmittedExecution,
  fetch: FetchExecution<E, R>,
  options: PollOptions,
): Effect.Effect<PollResult, E, R> =>
  Effect.gen(function* () {
    const timeout = Duration.toMillis(Duration.decode(options.timeout))
    const interval = Duration.decode(options.interval)
    const start = yield* Clock.currentTimeMillis

    let current: Execution = submitted
    let polls = 0
    let graceUsed = false

    while ((yield* Clock.currentTimeMillis) - start < timeout) {
      const fetched = yield* fetch(submitted.id)
      polls++

      const status = fetched?.status
      if (!isExecutionStatus(status)) {
        if (polls === 1 && !graceUsed) {
          graceUsed = true
          yield* Effect.logDebug(
            `Execution ${submitted.id} has no status yet, retrying`,
          )
          continue
        }
      } else if (isTerminalStatus(status) && fetched) {
        yield* Effect.logInfo(`Execution ${submitted.id} ${status}`)
        return PollResult.Completed({ execution: fetched, polls })
      }

      if (fetched) current = fetched
      yield* Effect.logDebug(
        `Execution ${submitted.id} is ${status ?? "unknown"}, polling again in ${Duration.format(interval)}`,
      )
      yield* Effect.sleep(interval)
    }

    yield* Effect.logWarning(
      `Timed out after ${Duration.format(Duration.millis(timeout))} waiting for execution ${submitted.id}`,
    )
    return PollResult.TimedOut({ execution: current, polls })
  })

/**
 * Submit, then wait. Submission failures propagate without polling.
 */
export const runAndWait = <E1, R1, E2, R2>(
  submit: Effect.Effect<Execution | null, E1, R1>,
  fetch: FetchExecution<E2, R2>,
  options: PollOptions,
): Effect.Effect<PollResult, E1 | E2 | MalformedResponse, R1 | R2> =>
  Effect.gen(function* () {
    const execution = yield* submit
    if (!execution || !hasId(execution)) {
      return yield* new MalformedResponse({
        message: "Run response did not include an execution id",
      })
    }

    yield* Effect.logInfo(`Submitted execution ${execution.id}`)
    return yield* waitForExecution(execution, fetch, options)
  })
