import type { Transform } from "../lib/response"
import { find, findAll, findChildren, type XmlElement } from "../lib/xml"
import { elementToFields } from "./fields"
import type { Fields } from "./types"

const projectElements = (root: XmlElement): ReadonlyArray<XmlElement> => {
  if (root.tag === "project") return [root]
  if (root.tag === "projects") return findChildren(root, "project")

  const listed = findAll(root, "projects/project")
  return listed.length > 0 ? listed : findChildren(root, "project")
}

export const projects: Transform<ReadonlyArray<Fields>> = (envelope) =>
  projectElements(envelope.root).map(elementToFields)

/** The first project of the reply; `null` when there is none. */
export const project: Transform<Fields | null> = (envelope) => {
  const [first] = projectElements(envelope.root)
  return first ? elementToFields(first) : null
}

/**
 * Nodes of a resource model document.
 *
 * Resource documents come back as `<project><node .../></project>`, with or
 * without the `<result>` wrapper around them.
 */
export const projectResources: Transform<ReadonlyArray<Fields>> = (
  envelope,
) => {
  const { root } = envelope
  const model = root.tag === "project" ? root : (find(root, "project") ?? root)
  return findChildren(model, "node").map(elementToFields)
}
