/**
 * XML document model
 *
 * Thin element tree over fast-xml-parser's ordered output:
 * - tag, attributes, immediate children in document order, text
 * - path lookups in the `a/b/c` form
 */

import { Effect } from "effect"
import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser"
import { MalformedResponse } from "./errors"

export interface XmlElement {
  readonly tag: string
  readonly attributes: Readonly<Record<string, string>>
  readonly children: ReadonlyArray<XmlElement>
  /** Concatenated text content, `null` for elements without text. */
  readonly text: string | null
}

export interface XmlDocument {
  readonly root: XmlElement
  readonly pretty: string
}

const ATTRIBUTE_PREFIX = "@_"
const ATTRIBUTES_KEY = ":@"
const TEXT_KEY = "#text"

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
})

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  format: true,
  indentBy: "  ",
  suppressEmptyNode: true,
})

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

const toAttributes = (raw: unknown): Record<string, string> => {
  const attributes: Record<string, string> = {}
  if (!isRecord(raw)) return attributes

  for (const [key, value] of Object.entries(raw)) {
    attributes[key.slice(ATTRIBUTE_PREFIX.length)] = String(value)
  }
  return attributes
}

const toElements = (nodes: unknown): XmlElement[] => {
  if (!Array.isArray(nodes)) return []

  const elements: XmlElement[] = []
  for (const node of nodes) {
    if (!isRecord(node)) continue

    const tag = Object.keys(node).find(
      (key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY,
    )
    // processing instructions come through as "?xml" etc.
    if (tag === undefined || tag.startsWith("?")) continue

    elements.push(toElement(tag, node[tag], node[ATTRIBUTES_KEY]))
  }
  return elements
}

const toElement = (
  tag: string,
  content: unknown,
  rawAttributes: unknown,
): XmlElement => {
  const nodes: unknown[] = Array.isArray(content) ? content : []
  const texts = nodes.flatMap((node) =>
    isRecord(node) && TEXT_KEY in node ? [String(node[TEXT_KEY])] : [],
  )

  return {
    tag,
    attributes: toAttributes(rawAttributes),
    children: toElements(nodes),
    text: texts.length > 0 ? texts.join("") : null,
  }
}

/**
 * Parse a response body into an element tree.
 *
 * Fails with `MalformedResponse` when the body is not well-formed or holds
 * no element at all.
 */
export const parseXml = (
  body: string,
): Effect.Effect<XmlDocument, MalformedResponse> =>
  Effect.gen(function* () {
    const validation = XMLValidator.validate(body)
    if (validation !== true) {
      const { err } = validation
      return yield* new MalformedResponse({
        message: `Invalid XML at line ${err.line}, column ${err.col}: ${err.msg}`,
        body,
      })
    }

    const ordered = yield* Effect.try({
      try: (): unknown => parser.parse(body),
      catch: (cause) =>
        new MalformedResponse({
          message: "Failed to parse XML response",
          body,
          cause,
        }),
    })

    const [root] = toElements(ordered)
    if (!root) {
      return yield* new MalformedResponse({
        message: "XML response has no root element",
        body,
      })
    }

    return {
      root,
      pretty: String(builder.build(ordered)).trim(),
    }
  })

// --- Lookups ---

export const findChildren = (
  element: XmlElement,
  tag: string,
): ReadonlyArray<XmlElement> =>
  element.children.filter((child) => child.tag === tag)

export const findChild = (
  element: XmlElement,
  tag: string,
): XmlElement | undefined =>
  element.children.find((child) => child.tag === tag)

/** All elements matching a slash separated path of tags, in document order. */
export const findAll = (
  element: XmlElement,
  path: string,
): ReadonlyArray<XmlElement> =>
  path
    .split("/")
    .filter((segment) => segment.length > 0)
    .reduce<ReadonlyArray<XmlElement>>(
      (current, tag) => current.flatMap((el) => findChildren(el, tag)),
      [element],
    )

export const find = (
  element: XmlElement,
  path: string,
): XmlElement | undefined => findAll(element, path)[0]

export const findText = (
  element: XmlElement,
  path: string,
): string | null => find(element, path)?.text ?? null
