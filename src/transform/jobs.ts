import type { Transform } from "../lib/response"
import { find, findAll, findChildren, type XmlElement } from "../lib/xml"
import { elementToFields } from "./fields"
import type { Fields, JobImportStatus } from "./types"

const jobElements = (root: XmlElement): ReadonlyArray<XmlElement> =>
  root.tag === "jobs" ? findChildren(root, "job") : findAll(root, "jobs/job")

export const jobs: Transform<ReadonlyArray<Fields>> = (envelope) =>
  jobElements(envelope.root).map(elementToFields)

const importedJobs = (
  root: XmlElement,
  outcome: keyof JobImportStatus,
): ReadonlyArray<Fields> => {
  const group = find(root, outcome)
  return group ? findChildren(group, "job").map(elementToFields) : []
}

export const jobImportStatus: Transform<JobImportStatus> = (envelope) => ({
  succeeded: importedJobs(envelope.root, "succeeded"),
  failed: importedJobs(envelope.root, "failed"),
  skipped: importedJobs(envelope.root, "skipped"),
})
