import type { XmlElement } from "../lib/xml"
import type { Fields } from "./types"

export const attributesToFields = (element: XmlElement): Fields => ({
  ...element.attributes,
})

/** Child tag → child text. Repeated tags keep the last value. */
export const childrenToFields = (element: XmlElement): Fields =>
  Object.fromEntries(element.children.map((child) => [child.tag, child.text]))

/**
 * Attributes merged with child tag/text pairs.
 *
 * Attributes are applied last, so they win when a child shares their name.
 */
export const elementToFields = (element: XmlElement): Fields => ({
  ...childrenToFields(element),
  ...attributesToFields(element),
})

export const parseBoolean = (value: string | null | undefined): boolean =>
  value?.trim().toLowerCase() === "true"

export const parseInteger = (
  value: string | null | undefined,
): number | null => {
  if (value === null || value === undefined) return null
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? null : parsed
}
