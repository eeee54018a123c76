/**
 * Transform module type definitions
 */

import { Schema } from "effect"

/** Attribute and child-text pairs of one element. */
export type Fields = Readonly<Record<string, string | null>>

export const ExecutionStatus = Schema.Literal(
  "running",
  "succeeded",
  "failed",
  "aborted",
  "skipped",
  "pending",
)
export type ExecutionStatus = typeof ExecutionStatus.Type

export const TerminalStatus = Schema.Literal("succeeded", "failed", "aborted")
export type TerminalStatus = typeof TerminalStatus.Type

export const isExecutionStatus = Schema.is(ExecutionStatus)
export const isTerminalStatus = Schema.is(TerminalStatus)

export interface Timestamp {
  readonly unixtime: string | null
  readonly date: string | null
}

export interface Execution {
  readonly id: string | null
  /** Raw status attribute; `null` when the server did not report one */
  readonly status: string | null
  readonly project: string | null
  readonly user: string | null
  readonly description: string | null
  readonly argstring: string | null
  readonly dateStarted: Timestamp | null
  readonly dateEnded: Timestamp | null
  readonly job: Fields | null
  readonly successfulNodes: ReadonlyArray<string>
  readonly failedNodes: ReadonlyArray<string>
  /** Everything the server sent on the element, passed through as-is */
  readonly fields: Fields
}

export interface ExecutionOutput {
  readonly id: string | null
  readonly offset: number | null
  readonly completed: boolean
  readonly execCompleted: boolean
  readonly hasFailedNodes: boolean
  readonly execState: string | null
  readonly fields: Fields
  readonly entries: ReadonlyArray<Fields>
}

export interface ExecutionAbort {
  readonly status: string | null
  readonly reason: string | null
  readonly execution: Fields | null
}

export interface JobImportStatus {
  readonly succeeded: ReadonlyArray<Fields>
  readonly failed: ReadonlyArray<Fields>
  readonly skipped: ReadonlyArray<Fields>
}

export interface SystemInfo {
  readonly sections: Readonly<Record<string, Fields>>
  readonly stats: Readonly<Record<string, Fields>>
}

export interface SuccessMessage {
  readonly success: boolean
  readonly message: string
}

export interface HistoryEvent {
  readonly fields: Fields
  readonly job: Fields | null
  readonly execution: Fields | null
  readonly nodeSummary: Fields | null
}
