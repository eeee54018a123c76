import type { Duration } from "effect"
import type { ArgString } from "./lib/util"

/**
 * Anything the facade does not recognise for an operation.
 *
 * Handed to the transport untouched.
 */
export interface RequestExtras {
  readonly headers?: Readonly<Record<string, string>>
  readonly urlParams?: Readonly<Record<string, string>>
  /** Overrides the connection's `strict` flag for this call */
  readonly strict?: boolean
}

export interface WithExtras {
  readonly extras?: RequestExtras
}

export type JobDefinitionFormat = "xml" | "yaml"
export type DupeOption = "skip" | "create" | "update"
export type UuidOption = "preserve" | "remove"
export type RunLogLevel = "DEBUG" | "VERBOSE" | "INFO" | "WARN" | "ERROR"

/** Node inclusion and exclusion filters accepted by run endpoints. */
export interface NodeFilter {
  readonly hostname?: string
  readonly tags?: string
  readonly osName?: string
  readonly osFamily?: string
  readonly osArch?: string
  readonly osVersion?: string
  readonly name?: string
  readonly excludeHostname?: string
  readonly excludeTags?: string
  readonly excludeOsName?: string
  readonly excludeOsFamily?: string
  readonly excludeOsArch?: string
  readonly excludeOsVersion?: string
  readonly excludeName?: string
  readonly excludePrecedence?: boolean
}

// --- Jobs ---

export interface JobsOptions extends WithExtras {
  readonly idList?: string | ReadonlyArray<string>
  /** Group path, `*` for all groups or `-` for top level only */
  readonly groupPath?: string
  /** Substring match on the job name */
  readonly jobFilter?: string
  readonly jobExactFilter?: string
  readonly groupPathExact?: string
}

export interface JobRunOptions extends WithExtras {
  readonly argString?: ArgString
  readonly logLevel?: RunLogLevel
  readonly asUser?: string
  readonly filter?: NodeFilter
}

export interface JobsExportOptions extends WithExtras {
  readonly format?: JobDefinitionFormat
  readonly idList?: string | ReadonlyArray<string>
  readonly groupPath?: string
  readonly jobFilter?: string
}

export interface JobsImportOptions extends WithExtras {
  readonly format?: JobDefinitionFormat
  readonly dupeOption?: DupeOption
  readonly uuidOption?: UuidOption
  /** Target project, when the definition does not name one */
  readonly project?: string
}

export interface JobDefinitionOptions extends WithExtras {
  readonly format?: JobDefinitionFormat
}

export interface JobExecutionsOptions extends WithExtras {
  readonly status?: string
  readonly max?: number
  readonly offset?: number
}

// --- Executions ---

export interface ExecutionQuery extends WithExtras {
  readonly statusFilter?: string
  readonly abortedbyFilter?: string
  readonly userFilter?: string
  /** e.g. `1h`, `2d` */
  readonly recentFilter?: string
  readonly begin?: string
  readonly end?: string
  readonly adhoc?: boolean
  readonly jobIdListFilter?: string | ReadonlyArray<string>
  readonly excludeJobIdListFilter?: string | ReadonlyArray<string>
  readonly jobListFilter?: string | ReadonlyArray<string>
  readonly excludeJobListFilter?: string | ReadonlyArray<string>
  readonly groupPath?: string
  readonly groupPathExact?: string
  readonly excludeGroupPath?: string
  readonly excludeGroupPathExact?: string
  readonly jobExactFilter?: string
  readonly excludeJobExactFilter?: string
  readonly max?: number
  readonly offset?: number
}

export interface ExecutionOutputOptions extends WithExtras {
  readonly offset?: number
  readonly lastLines?: number
  readonly lastMod?: number
  readonly maxLines?: number
}

export interface ExecutionAbortOptions extends WithExtras {
  readonly asUser?: string
}

// --- Ad-hoc runs ---

export interface AdHocRunOptions extends WithExtras {
  readonly nodeThreadcount?: number
  readonly nodeKeepgoing?: boolean
  readonly asUser?: string
  readonly filter?: NodeFilter
}

export interface ScriptRunOptions extends AdHocRunOptions {
  readonly argString?: ArgString
}

// --- History ---

export interface HistoryOptions extends WithExtras {
  readonly jobIdList?: string | ReadonlyArray<string>
  readonly reportIdList?: string | ReadonlyArray<string>
  readonly excludeJobIdList?: string | ReadonlyArray<string>
  readonly userFilter?: string
  readonly statFilter?: "succeed" | "fail" | "cancel"
  readonly recentFilter?: string
  readonly begin?: string
  readonly end?: string
  readonly max?: number
  readonly offset?: number
}

// --- Projects ---

export interface CreateProjectOptions extends WithExtras {
  readonly description?: string
  readonly config?: Readonly<Record<string, string>>
}

export interface ProjectResourcesOptions extends WithExtras {
  readonly filter?: NodeFilter
}

export interface ResourcesRefreshOptions extends WithExtras {
  readonly providerUrl?: string
}

// --- Polling ---

export interface PollOptions {
  readonly timeout: Duration.DurationInput
  readonly interval: Duration.DurationInput
}

export interface RunAndWaitOptions extends JobRunOptions {
  readonly timeout?: Duration.DurationInput
  readonly interval?: Duration.DurationInput
}

export type ProjectPolicy = "lookup" | "create"
