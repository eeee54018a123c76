import type { Transform } from "../lib/response"
import { find, findAll, findChild, type XmlElement } from "../lib/xml"
import { elementToFields } from "./fields"
import type { Fields, HistoryEvent, SuccessMessage, SystemInfo } from "./types"

const sectionsOf = (
  element: XmlElement | undefined,
  skip: ReadonlyArray<string> = [],
): Record<string, Fields> =>
  element ?
    Object.fromEntries(
      element.children
        .filter((child) => !skip.includes(child.tag))
        .map((child) => [child.tag, elementToFields(child)]),
    )
  : {}

export const systemInfo: Transform<SystemInfo> = (envelope) => {
  const system =
    envelope.root.tag === "system" ?
      envelope.root
    : find(envelope.root, "system")

  return {
    sections: sectionsOf(system, ["stats"]),
    stats: sectionsOf(system ? findChild(system, "stats") : undefined),
  }
}

export const successMessage: Transform<SuccessMessage> = (envelope) => ({
  success: envelope.success,
  message: envelope.message,
})

const fieldsOf = (element: XmlElement | undefined): Fields | null =>
  element ? elementToFields(element) : null

export const events: Transform<ReadonlyArray<HistoryEvent>> = (envelope) => {
  const elements =
    envelope.root.tag === "events" ?
      findAll(envelope.root, "event")
    : findAll(envelope.root, "events/event")

  return elements.map((event) => ({
    fields: elementToFields(event),
    job: fieldsOf(findChild(event, "job")),
    execution: fieldsOf(findChild(event, "execution")),
    nodeSummary: fieldsOf(findChild(event, "node-summary")),
  }))
}
