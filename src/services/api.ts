/**
 * Endpoint facade
 *
 * One method per server operation. Each checks its minimum API version,
 * maps its options onto query/body parameters, sends exactly one request
 * and attaches the transform for its endpoint family.
 */

import { Effect } from "effect"
import { InvalidArgument, MalformedResponse } from "../lib/errors"
import {
  escapeAttribute,
  serializeProjectNodes,
  type ResourceNode,
} from "../lib/node"
import { ResponseEnvelope } from "../lib/response"
import { joinList, toArgString } from "../lib/util"
import { Transforms } from "../transform"
import type { SuccessMessage } from "../transform/types"
import type {
  AdHocRunOptions,
  CreateProjectOptions,
  DupeOption,
  ExecutionAbortOptions,
  ExecutionOutputOptions,
  ExecutionQuery,
  HistoryOptions,
  JobDefinitionFormat,
  JobDefinitionOptions,
  JobExecutionsOptions,
  JobRunOptions,
  JobsExportOptions,
  JobsImportOptions,
  JobsOptions,
  NodeFilter,
  ProjectResourcesOptions,
  ResourcesRefreshOptions,
  ScriptRunOptions,
  UuidOption,
  WithExtras,
} from "../types"
import { RundeckConnection, type Params } from "./connection"

const JOB_DEFINITION_FORMATS: ReadonlyArray<JobDefinitionFormat> = [
  "xml",
  "yaml",
]
const DUPE_OPTIONS: ReadonlyArray<DupeOption> = ["skip", "create", "update"]
const UUID_OPTIONS: ReadonlyArray<UuidOption> = ["preserve", "remove"]

const FORMAT_CONTENT_TYPES: Readonly<Record<JobDefinitionFormat, string>> = {
  xml: "application/xml",
  yaml: "text/yaml",
}

const oneOf = <A extends string>(
  argument: string,
  allowed: ReadonlyArray<A>,
  value: A | undefined,
): Effect.Effect<A | undefined, InvalidArgument> =>
  value === undefined || allowed.includes(value) ?
    Effect.succeed(value)
  : Effect.fail(
      new InvalidArgument({
        message: `Unsupported ${argument} '${String(value)}'. Expected one of: ${allowed.join(", ")}`,
        argument,
      }),
    )

/** NodeFilter → the dashed query parameters the run endpoints take. */
export const nodeFilterParams = (filter: NodeFilter = {}): Params => ({
  hostname: filter.hostname,
  tags: filter.tags,
  "os-name": filter.osName,
  "os-family": filter.osFamily,
  "os-arch": filter.osArch,
  "os-version": filter.osVersion,
  name: filter.name,
  "exclude-hostname": filter.excludeHostname,
  "exclude-tags": filter.excludeTags,
  "exclude-os-name": filter.excludeOsName,
  "exclude-os-family": filter.excludeOsFamily,
  "exclude-os-arch": filter.excludeOsArch,
  "exclude-os-version": filter.excludeOsVersion,
  "exclude-name": filter.excludeName,
  "exclude-precedence": filter.excludePrecedence,
})

const projectDocument = (name: string, options: CreateProjectOptions) => {
  const description =
    options.description === undefined ?
      ""
    : `<description>${escapeAttribute(options.description)}</description>`
  const properties = Object.entries(options.config ?? {})
    .map(
      ([key, value]) =>
        `<property key="${escapeAttribute(key)}" value="${escapeAttribute(value)}"/>`,
    )
    .join("")
  const config = properties ? `<config>${properties}</config>` : ""

  return `<project><name>${escapeAttribute(name)}</name>${description}${config}</project>`
}

export class RundeckApi extends Effect.Service<RundeckApi>()("RundeckApi", {
  dependencies: [RundeckConnection.Default],
  effect: Effect.gen(function* () {
    const connection = yield* RundeckConnection

    /** Parsed call that fails with ServerError when the reply says so. */
    const checked = (...args: Parameters<typeof connection.call>) =>
      connection.call(...args).pipe(
        Effect.flatMap((envelope) => envelope.raiseForError()),
      )

    // --- System ---

    const systemInfo = Effect.fn("RundeckApi.systemInfo")(function* (
      options: WithExtras = {},
    ) {
      const envelope = yield* checked("GET", "system/info", {
        extras: options.extras,
      })
      return envelope.withTransform(Transforms.system_info)
    })

    // --- Jobs ---

    const jobs = Effect.fn("RundeckApi.jobs")(function* (
      project: string,
      options: JobsOptions = {},
    ) {
      if (
        options.jobExactFilter !== undefined
        || options.groupPathExact !== undefined
      ) {
        yield* connection.requireVersion("jobs (exact filters)", 2)
      }

      const envelope = yield* checked("GET", "jobs", {
        params: {
          project,
          idlist: joinList(options.idList),
          groupPath: options.groupPath,
          jobFilter: options.jobFilter,
          jobExactFilter: options.jobExactFilter,
          groupPathExact: options.groupPathExact,
        },
        extras: options.extras,
      })
      return envelope.withTransform(Transforms.jobs)
    })

    const jobRun = Effect.fn("RundeckApi.jobRun")(function* (
      jobId: string,
      options: JobRunOptions = {},
    ) {
      const envelope = yield* checked("GET", `job/${jobId}/run`, {
        params: {
          argString:
            options.argString === undefined ? undefined : (
              toArgString(options.argString)
            ),
          loglevel: options.logLevel,
          asUser: options.asUser,
          ...nodeFilterParams(options.filter),
        },
        extras: options.extras,
      })
      return envelope.withTransform(Transforms.run_execution)
    })

    const jobsExport = Effect.fn("RundeckApi.jobsExport")(function* (
      project: string,
      options: JobsExportOptions = {},
    ) {
      const format = (yield* oneOf(
        "format",
        JOB_DEFINITION_FORMATS,
        options.format,
      )) ?? "xml"

      const raw = yield* connection.request("GET", "jobs/export", {
        params: {
          project,
          format,
          idlist: joinList(options.idList),
          groupPath: options.groupPath,
          jobFilter: options.jobFilter,
        },
        accept: FORMAT_CONTENT_TYPES[format],
        extras: options.extras,
      })
      return raw.body
    })

    const jobsImport = Effect.fn("RundeckApi.jobsImport")(function* (
      definition: string,
      options: JobsImportOptions = {},
    ) {
      const format = yield* oneOf(
        "format",
        JOB_DEFINITION_FORMATS,
        options.format,
      )
      const dupeOption = yield* oneOf(
        "dupeOption",
        DUPE_OPTIONS,
        options.dupeOption,
      )
      const uuidOption = yield* oneOf(
        "uuidOption",
        UUID_OPTIONS,
        options.uuidOption,
      )

      if (options.project !== undefined) {
        yield* connection.requireVersion("jobs import (project)", 8)
      }
      if (uuidOption !== undefined) {
        yield* connection.requireVersion("jobs import (uuidOption)", 9)
      }

      const envelope = yield* checked("POST", "jobs/import", {
        body: {
          _tag: "Form",
          fields: {
            xmlBatch: definition,
            format,
            dupeOption,
            uuidOption,
            project: options.project,
          },
        },
        extras: options.extras,
      })
      return envelope.withTransform(Transforms.job_import_status)
    })

    const jobDefinition = Effect.fn("RundeckApi.jobDefinition")(function* (
      jobId: string,
      options: JobDefinitionOptions = {},
    ) {
      const format = (yield* oneOf(
        "format",
        JOB_DEFINITION_FORMATS,
        options.format,
      )) ?? "xml"

      const raw = yield* connection.request("GET", `job/${jobId}`, {
        params: { format },
        accept: FORMAT_CONTENT_TYPES[format],
        extras: options.extras,
      })
      return raw.body
    })

    const deleteJob = Effect.fn("RundeckApi.deleteJob")(function* (
      jobId: string,
      options: WithExtras = {},
    ) {
      const raw = yield* connection.request("DELETE", `job/${jobId}`, {
        extras: options.extras,
      })

      if (raw.body.trim() === "") {
        // API 11 answers with 204 and no body
        if (raw.status >= 200 && raw.status < 300) {
          return {
            success: true,
            message: "success",
          } satisfies SuccessMessage
        }
        return yield* new MalformedResponse({
          message: `Job deletion answered ${raw.status} with an empty body`,
          body: raw.body,
        })
      }

      const reply = yield* ResponseEnvelope.parse({
        body: raw.body,
        status: raw.status,
        clientApiVersion: connection.apiVersion,
      })
      const envelope = yield* reply.raiseForError()
      return envelope.withTransform(Transforms.success_message).asStructured
    })

    const jobsDelete = Effect.fn("RundeckApi.jobsDelete")(function* (
      ids: ReadonlyArray<string>,
      options: WithExtras = {},
    ) {
      yield* connection.requireVersion("jobs bulk delete", 5)

      const envelope = yield* checked("POST", "jobs/delete", {
        params: { idlist: ids.join(",") },
        extras: options.extras,
      })
      return envelope.withTransform(Transforms.success_message)
    })

    const jobExecutions = Effect.fn("RundeckApi.jobExecutions")(function* (
      jobId: string,
      options: JobExecutionsOptions = {},
    ) {
      const envelope = yield* checked("GET", `job/${jobId}/executions`, {
        params: {
          status: options.status,
          max: options.max,
          offset: options.offset,
        },
        extras: options.extras,
      })
      return envelope.withTransform(Transforms.executions)
    })

    // --- Executions ---

    const executionsRunning = Effect.fn("RundeckApi.executionsRunning")(
      function* (project: string, options: WithExtras = {}) {
        const envelope = yield* checked("GET", "executions/running", {
          params: { project },
          extras: options.extras,
        })
        return envelope.withTransform(Transforms.executions)
      },
    )

    const execution = Effect.fn("RundeckApi.execution")(function* (
      executionId: string,
      options: WithExtras = {},
    ) {
      const envelope = yield* checked("GET", `execution/${executionId}`, {
        extras: options.extras,
      })
      return envelope.withTransform(Transforms.execution)
    })

    const executions = Effect.fn("RundeckApi.executions")(function* (
      project: string,
      query: ExecutionQuery = {},
    ) {
      yield* connection.requireVersion("executions query", 5)

      const envelope = yield* checked("GET", "executions", {
        params: {
          project,
          statusFilter: query.statusFilter,
          abortedbyFilter: query.abortedbyFilter,
          userFilter: query.userFilter,
          recentFilter: query.recentFilter,
          begin: query.begin,
          end: query.end,
          adhoc: query.adhoc,
          jobIdListFilter: joinList(query.jobIdListFilter),
          excludeJobIdListFilter: joinList(query.excludeJobIdListFilter),
          jobListFilter: joinList(query.jobListFilter),
          excludeJobListFilter: joinList(query.excludeJobListFilter),
          groupPath: query.groupPath,
          groupPathExact: query.groupPathExact,
          excludeGroupPath: query.excludeGroupPath,
          excludeGroupPathExact: query.excludeGroupPathExact,
          jobExactFilter: query.jobExactFilter,
          excludeJobExactFilter: query.excludeJobExactFilter,
          max: query.max,
          offset: query.offset,
        },
        extras: query.extras,
      })
      return envelope.withTransform(Transforms.executions)
    })

    const executionOutput = Effect.fn("RundeckApi.executionOutput")(
      function* (executionId: string, options: ExecutionOutputOptions = {}) {
        yield* connection.requireVersion("execution output", 5)

        const envelope = yield* checked(
          "GET",
          `execution/${executionId}/output`,
          {
            params: {
              offset: options.offset,
              lastlines: options.lastLines,
              lastmod: options.lastMod,
              maxlines: options.maxLines,
            },
            extras: options.extras,
          },
        )
        return envelope.withTransform(Transforms.execution_output)
      },
    )

    const executionAbort = Effect.fn("RundeckApi.executionAbort")(function* (
      executionId: string,
      options: ExecutionAbortOptions = {},
    ) {
      const envelope = yield* checked(
        "GET",
        `execution/${executionId}/abort`,
        {
          params: { asUser: options.asUser },
          extras: options.extras,
        },
      )
      return envelope.withTransform(Transforms.execution_abort)
    })

    // --- Ad-hoc runs ---

    const adHocParams = (project: string, options: AdHocRunOptions): Params => ({
      project,
      nodeThreadcount: options.nodeThreadcount,
      nodeKeepgoing: options.nodeKeepgoing,
      asUser: options.asUser,
      ...nodeFilterParams(options.filter),
    })

    const runCommand = Effect.fn("RundeckApi.runCommand")(function* (
      project: string,
      command: string,
      options: AdHocRunOptions = {},
    ) {
      const envelope = yield* checked("GET", "run/command", {
        params: { ...adHocParams(project, options), exec: command },
        extras: options.extras,
      })
      return envelope.withTransform(Transforms.run_execution)
    })

    const runScript = Effect.fn("RundeckApi.runScript")(function* (
      project: string,
      script: string,
      options: ScriptRunOptions = {},
    ) {
      const envelope = yield* checked("POST", "run/script", {
        params: {
          ...adHocParams(project, options),
          argString:
            options.argString === undefined ? undefined : (
              toArgString(options.argString)
            ),
        },
        body: { _tag: "Multipart", fields: {}, files: { scriptFile: script } },
        extras: options.extras,
      })
      return envelope.withTransform(Transforms.run_execution)
    })

    const runUrl = Effect.fn("RundeckApi.runUrl")(function* (
      project: string,
      scriptUrl: string,
      options: ScriptRunOptions = {},
    ) {
      yield* connection.requireVersion("run url", 4)

      const envelope = yield* checked("POST", "run/url", {
        params: {
          ...adHocParams(project, options),
          scriptURL: scriptUrl,
          argString:
            options.argString === undefined ? undefined : (
              toArgString(options.argString)
            ),
        },
        extras: options.extras,
      })
      return envelope.withTransform(Transforms.run_execution)
    })

    // --- History ---

    const history = Effect.fn("RundeckApi.history")(function* (
      project: string,
      options: HistoryOptions = {},
    ) {
      yield* connection.requireVersion("history", 4)

      const envelope = yield* checked("GET", "history", {
        params: {
          project,
          jobIdFilter: joinList(options.jobIdList),
          reportIdFilter: joinList(options.reportIdList),
          excludeJobIdFilter: joinList(options.excludeJobIdList),
          userFilter: options.userFilter,
          statFilter: options.statFilter,
          recentFilter: options.recentFilter,
          begin: options.begin,
          end: options.end,
          max: options.max,
          offset: options.offset,
        },
        extras: options.extras,
      })
      return envelope.withTransform(Transforms.events)
    })

    // --- Projects ---

    const projects = Effect.fn("RundeckApi.projects")(function* (
      options: WithExtras = {},
    ) {
      const envelope = yield* checked("GET", "projects", {
        extras: options.extras,
      })
      return envelope.withTransform(Transforms.projects)
    })

    const project = Effect.fn("RundeckApi.project")(function* (
      name: string,
      options: WithExtras = {},
    ) {
      const envelope = yield* checked(
        "GET",
        `project/${encodeURIComponent(name)}`,
        { extras: options.extras },
      )
      return envelope.withTransform(Transforms.project)
    })

    const createProject = Effect.fn("RundeckApi.createProject")(function* (
      name: string,
      options: CreateProjectOptions = {},
    ) {
      yield* connection.requireVersion("create project", 11)

      const envelope = yield* checked("POST", "projects", {
        body: {
          _tag: "Text",
          text: projectDocument(name, options),
          contentType: "application/xml",
        },
        extras: options.extras,
      })
      return envelope.withTransform(Transforms.project)
    })

    const deleteProject = Effect.fn("RundeckApi.deleteProject")(function* (
      name: string,
      options: WithExtras = {},
    ) {
      yield* connection.requireVersion("delete project", 11)

      const raw = yield* connection.request(
        "DELETE",
        `project/${encodeURIComponent(name)}`,
        { extras: options.extras },
      )
      return raw.status
    })

    const projectResources = Effect.fn("RundeckApi.projectResources")(
      function* (project: string, options: ProjectResourcesOptions = {}) {
        const filterParams = nodeFilterParams(options.filter)
        const reply: ResponseEnvelope =
          connection.apiVersion < 2 ?
            yield* connection.call("GET", "resources", {
              params: { project, format: "xml", ...filterParams },
              extras: options.extras,
            })
          : yield* connection.call(
              "GET",
              `project/${encodeURIComponent(project)}/resources`,
              {
                params: { format: "xml", ...filterParams },
                extras: options.extras,
              },
            )

        // resource documents are not wrapped; only a <result> can carry an error
        const envelope =
          reply.root.tag === "result" ? yield* reply.raiseForError() : reply
        return envelope.withTransform(Transforms.project_resources)
      },
    )

    const projectResourcesUpdate = Effect.fn(
      "RundeckApi.projectResourcesUpdate",
    )(function* (
      project: string,
      nodes: ReadonlyArray<ResourceNode>,
      options: WithExtras = {},
    ) {
      yield* connection.requireVersion("project resources update", 2)

      const document = yield* serializeProjectNodes(nodes)
      const envelope = yield* checked(
        "POST",
        `project/${encodeURIComponent(project)}/resources`,
        {
          body: {
            _tag: "Text",
            text: document,
            contentType: "text/xml",
          },
          extras: options.extras,
        },
      )
      return envelope.withTransform(Transforms.success_message)
    })

    const projectResourcesRefresh = Effect.fn(
      "RundeckApi.projectResourcesRefresh",
    )(function* (project: string, options: ResourcesRefreshOptions = {}) {
      yield* connection.requireVersion("project resources refresh", 2)

      const envelope = yield* checked(
        "POST",
        `project/${encodeURIComponent(project)}/resources/refresh`,
        {
          params: { providerURL: options.providerUrl },
          extras: options.extras,
        },
      )
      return envelope.withTransform(Transforms.success_message)
    })

    return {
      apiVersion: connection.apiVersion,
      systemInfo,
      jobs,
      projectJobs: jobs,
      jobRun,
      jobsExport,
      jobsImport,
      jobDefinition,
      deleteJob,
      jobsDelete,
      jobExecutions,
      executionsRunning,
      execution,
      executions,
      executionOutput,
      executionAbort,
      runCommand,
      runScript,
      runUrl,
      history,
      projects,
      project,
      createProject,
      deleteProject,
      projectResources,
      projectResourcesUpdate,
      projectResourcesRefresh,
    }
  }),
}) {}
