import type { Transform } from "../lib/response"
import { find, findAll, findChild, findChildren, type XmlElement } from "../lib/xml"
import {
  elementToFields,
  parseBoolean,
  parseInteger,
} from "./fields"
import type {
  Execution,
  ExecutionAbort,
  ExecutionOutput,
  Fields,
  Timestamp,
} from "./types"

const toTimestamp = (element: XmlElement | undefined): Timestamp | null => {
  if (!element) return null
  return {
    unixtime: element.attributes.unixtime ?? null,
    date: element.text,
  }
}

const nodeNames = (element: XmlElement | undefined): string[] =>
  element ?
    findChildren(element, "node").flatMap((node) =>
      node.attributes.name === undefined ? [] : [node.attributes.name],
    )
  : []

export const toExecution = (element: XmlElement): Execution => {
  const fields = elementToFields(element)
  const job = findChild(element, "job")

  return {
    id: fields.id ?? null,
    status: fields.status ?? null,
    project: fields.project ?? null,
    user: fields.user ?? null,
    description: fields.description ?? null,
    argstring: fields.argstring ?? null,
    dateStarted: toTimestamp(findChild(element, "date-started")),
    dateEnded: toTimestamp(findChild(element, "date-ended")),
    job: job ? elementToFields(job) : null,
    successfulNodes: nodeNames(findChild(element, "successfulNodes")),
    failedNodes: nodeNames(findChild(element, "failedNodes")),
    fields,
  }
}

const executionElements = (root: XmlElement): ReadonlyArray<XmlElement> =>
  root.tag === "executions" ?
    findChildren(root, "execution")
  : findAll(root, "executions/execution")

export const executions: Transform<ReadonlyArray<Execution>> = (envelope) =>
  executionElements(envelope.root).map(toExecution)

/** The first execution of the reply; `null` when there is none. */
export const execution: Transform<Execution | null> = (envelope) => {
  const [first] = executionElements(envelope.root)
  return first ? toExecution(first) : null
}

/** Id of the execution a run request started. */
export const runExecution: Transform<string | null> = (envelope) =>
  executionElements(envelope.root)[0]?.attributes.id ?? null

export const executionOutput: Transform<ExecutionOutput> = (envelope) => {
  const output =
    envelope.root.tag === "output" ?
      envelope.root
    : find(envelope.root, "output")

  if (!output) {
    return {
      id: null,
      offset: null,
      completed: false,
      execCompleted: false,
      hasFailedNodes: false,
      execState: null,
      fields: {},
      entries: [],
    }
  }

  const fields: Fields = Object.fromEntries(
    output.children
      .filter((child) => child.tag !== "entries")
      .map((child) => [child.tag, child.text]),
  )

  const entries = findAll(output, "entries/entry").map((entry): Fields => {
    const entryFields = elementToFields(entry)
    // older servers put the log line in the element text
    if (entryFields.log === undefined && entry.text !== null) {
      return { ...entryFields, log: entry.text }
    }
    return entryFields
  })

  return {
    id: fields.id ?? null,
    offset: parseInteger(fields.offset),
    completed: parseBoolean(fields.completed),
    execCompleted: parseBoolean(fields.execCompleted),
    hasFailedNodes: parseBoolean(fields.hasFailedNodes),
    execState: fields.execState ?? null,
    fields,
    entries,
  }
}

export const executionAbort: Transform<ExecutionAbort> = (envelope) => {
  const abort =
    envelope.root.tag === "abort" ? envelope.root : find(envelope.root, "abort")
  const abortedExecution = abort ? findChild(abort, "execution") : undefined

  return {
    status: abort?.attributes.status ?? null,
    reason: abort?.attributes.reason ?? null,
    execution: abortedExecution ? elementToFields(abortedExecution) : null,
  }
}
