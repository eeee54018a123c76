import { Data, Effect } from "effect"
import { MalformedResponse, NotFound, type ServerError } from "../lib/errors"
import { isJobId } from "../lib/util"
import { Transforms } from "../transform"
import { isExecutionStatus, type Fields } from "../transform/types"
import type {
  JobRunOptions,
  JobsImportOptions,
  ProjectPolicy,
  RunAndWaitOptions,
} from "../types"
import { RundeckApi } from "./api"
import { RundeckConfig } from "./config"
import { runAndWait } from "./poller"

export type ProjectLookup = Data.TaggedEnum<{
  Found: { readonly project: Fields }
  NotFound: { readonly name: string }
}>

export const ProjectLookup = Data.taggedEnum<ProjectLookup>()

export interface FailedDeletion {
  readonly id: string
  readonly message: string
}

export interface DeletionReport {
  readonly deleted: ReadonlyArray<string>
  readonly failed: ReadonlyArray<FailedDeletion>
}

export class Rundeck extends Effect.Service<Rundeck>()("Rundeck", {
  dependencies: [RundeckApi.Default],
  effect: Effect.gen(function* () {
    const api = yield* RundeckApi
    const config = yield* RundeckConfig

    // --- Jobs ---

    /** Id of the job named exactly `name`. */
    const getJobId = Effect.fn("Rundeck.getJobId")(function* (
      project: string,
      name: string,
      groupPath?: string,
    ) {
      const envelope = yield* api.jobs(
        project,
        api.apiVersion >= 2 ?
          { jobExactFilter: name, groupPath }
        : { jobFilter: name, groupPath },
      )
      // jobFilter is a substring match
      const match = envelope.asStructured.find((job) => job.name === name)

      if (!match?.id) {
        return yield* new NotFound({
          message: `No job named '${name}' in project '${project}'`,
          resource: "job",
          name,
        })
      }
      return match.id
    })

    const resolveJobId = Effect.fn("Rundeck.resolveJobId")(function* (
      project: string,
      nameOrId: string,
    ) {
      if (isJobId(nameOrId)) return nameOrId
      return yield* getJobId(project, nameOrId)
    })

    const getJob = Effect.fn("Rundeck.getJob")(function* (
      project: string,
      nameOrId: string,
    ) {
      const id = yield* resolveJobId(project, nameOrId)
      const envelope = yield* api.jobs(project, { idList: id })
      const [job] = envelope.asStructured

      if (!job) {
        return yield* new NotFound({
          message: `No job '${nameOrId}' in project '${project}'`,
          resource: "job",
          name: nameOrId,
        })
      }
      return job
    })

    /** Submit a run; the id of the new execution. */
    const runJob = Effect.fn("Rundeck.runJob")(function* (
      project: string,
      nameOrId: string,
      options: JobRunOptions = {},
    ) {
      const id = yield* resolveJobId(project, nameOrId)
      const envelope = yield* api.jobRun(id, options)

      if (envelope.asStructured === null) {
        return yield* new MalformedResponse({
          message: "Run response did not include an execution id",
          body: envelope.body,
        })
      }
      return envelope.asStructured
    })

    const runJobAndWait = Effect.fn("Rundeck.runJobAndWait")(function* (
      project: string,
      nameOrId: string,
      options: RunAndWaitOptions = {},
    ) {
      const { timeout, interval, ...runOptions } = options
      const id = yield* resolveJobId(project, nameOrId)

      return yield* runAndWait(
        api.jobRun(id, runOptions).pipe(
          Effect.map(
            (envelope) =>
              envelope.withTransform(Transforms.execution).asStructured,
          ),
        ),
        (executionId) =>
          api.execution(executionId).pipe(
            Effect.map((envelope) => envelope.asStructured),
          ),
        {
          timeout: timeout ?? config.POLL_TIMEOUT,
          interval: interval ?? config.POLL_INTERVAL,
        },
      )
    })

    const getExecutionStatus = Effect.fn("Rundeck.getExecutionStatus")(
      function* (executionId: string) {
        const envelope = yield* api.execution(executionId)
        const status = envelope.asStructured?.status
        return isExecutionStatus(status) ? status : undefined
      },
    )

    const importJob = Effect.fn("Rundeck.importJob")(function* (
      project: string,
      definition: string,
      options: Omit<JobsImportOptions, "project"> = {},
    ) {
      const envelope = yield* api.jobsImport(definition, {
        ...options,
        project: api.apiVersion >= 8 ? project : undefined,
      })
      return envelope.asStructured
    })

    /**
     * Delete every job of the project, one request per job.
     *
     * Each delete runs tolerant, so a refusal with any HTTP status lands in
     * the report. Transport errors still fail the whole operation.
     */
    const deleteAllProjectJobs = Effect.fn("Rundeck.deleteAllProjectJobs")(
      function* (project: string) {
        const envelope = yield* api.jobs(project)
        const ids = envelope.asStructured.flatMap((job) =>
          job.id ? [job.id] : [],
        )

        const deleted: string[] = []
        const failed: FailedDeletion[] = []

        for (const id of ids) {
          const refused = (error: ServerError | MalformedResponse) =>
            Effect.logWarning(`Could not delete job ${id}: ${error.message}`).pipe(
              Effect.map(() => {
                failed.push({ id, message: error.message })
              }),
            )

          yield* api.deleteJob(id, { extras: { strict: false } }).pipe(
            Effect.map(() => {
              deleted.push(id)
            }),
            Effect.catchTags({
              ServerError: refused,
              MalformedResponse: refused,
            }),
          )
        }

        return { deleted, failed } satisfies DeletionReport
      },
    )

    // --- Projects ---

    const findProject = Effect.fn("Rundeck.findProject")(function* (
      name: string,
    ) {
      const envelope = yield* api.projects()
      const project = envelope.asStructured.find(
        (candidate) => candidate.name === name,
      )

      return project ?
          ProjectLookup.Found({ project })
        : ProjectLookup.NotFound({ name })
    })

    /**
     * Look a project up; create it only when `policy` is `"create"`.
     */
    const ensureProject = Effect.fn("Rundeck.ensureProject")(function* (
      name: string,
      policy: ProjectPolicy = "lookup",
    ) {
      const lookup = yield* findProject(name)
      if (lookup._tag === "Found") return lookup.project

      if (policy !== "create") {
        return yield* new NotFound({
          message: `Project '${name}' does not exist`,
          resource: "project",
          name,
        })
      }

      yield* Effect.logInfo(`Creating project ${name}`)
      const created = yield* api.createProject(name)

      if (created.asStructured === null) {
        return yield* new MalformedResponse({
          message: `Create response did not include project '${name}'`,
          body: created.body,
        })
      }
      return created.asStructured
    })

    return {
      api,
      getJobId,
      resolveJobId,
      getJob,
      runJob,
      runJobAndWait,
      getExecutionStatus,
      importJob,
      deleteAllProjectJobs,
      findProject,
      ensureProject,
    }
  }),
}) {}
