/**
 * Transform module
 *
 * Pure functions shaping an envelope into endpoint specific results.
 * The registry is built once and frozen.
 */

import { Option } from "effect"
import type { ResponseEnvelope, Transform } from "../lib/response"
import {
  execution,
  executionAbort,
  executionOutput,
  executions,
  runExecution,
} from "./executions"
import { jobImportStatus, jobs } from "./jobs"
import { project, projectResources, projects } from "./projects"
import { events, successMessage, systemInfo } from "./system"

// Types
export type * from "./types"
export { isExecutionStatus, isTerminalStatus } from "./types"

export const Transforms = Object.freeze({
  system_info: systemInfo,
  jobs,
  execution,
  executions,
  execution_output: executionOutput,
  execution_abort: executionAbort,
  run_execution: runExecution,
  project,
  projects,
  project_resources: projectResources,
  success_message: successMessage,
  events,
  job_import_status: jobImportStatus,
} satisfies Record<string, Transform<unknown>>)

export type TransformName = keyof typeof Transforms

export type TransformResult<N extends TransformName> = ReturnType<
  (typeof Transforms)[N]
>

export const isTransformName = (name: string): name is TransformName =>
  Object.hasOwn(Transforms, name)

export const lookupTransform = (
  name: string,
): Option.Option<Transform<unknown>> =>
  isTransformName(name) ? Option.some(Transforms[name]) : Option.none()

/** Attach a registered transform by name; unknown names leave `asStructured` null. */
export const applyNamedTransform = (
  envelope: ResponseEnvelope<unknown>,
  name: string,
): ResponseEnvelope<unknown> =>
  Option.match(lookupTransform(name), {
    onNone: () => envelope.withTransform(() => null),
    onSome: (transform) => envelope.withTransform(transform),
  })
