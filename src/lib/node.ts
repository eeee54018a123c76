/**
 * Resource model nodes
 *
 * Serialized into the `<project><node/></project>` document the resources
 * endpoint accepts.
 */

import { Effect } from "effect"
import { InvalidArgument } from "./errors"

export interface ResourceNode {
  readonly name: string
  readonly hostname: string
  readonly username: string
  readonly description?: string
  readonly osArch?: string
  readonly osFamily?: string
  readonly osName?: string
  readonly editUrl?: string
  readonly remoteUrl?: string
  readonly tags?: string | ReadonlyArray<string>
  readonly attributes?: Readonly<Record<string, string>>
}

const NODE_KEYS = [
  "name",
  "hostname",
  "username",
  "description",
  "osArch",
  "osFamily",
  "osName",
  "editUrl",
  "remoteUrl",
] as const

const REQUIRED_KEYS = ["name", "hostname", "username"] as const

export const escapeAttribute = (value: string): string =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")

const attribute = (key: string, value: string) =>
  `${key}="${escapeAttribute(value)}"`

export const serializeNode = (
  node: ResourceNode,
): Effect.Effect<string, InvalidArgument> =>
  Effect.gen(function* () {
    for (const key of REQUIRED_KEYS) {
      if (!node[key]) {
        return yield* new InvalidArgument({
          message: `Resource node is missing required field '${key}'`,
          argument: key,
        })
      }
    }

    const pairs = NODE_KEYS.flatMap((key) => {
      const value = node[key]
      return value === undefined ? [] : [attribute(key, value)]
    })

    if (node.tags !== undefined) {
      const tags = typeof node.tags === "string" ? node.tags : node.tags.join(",")
      pairs.push(attribute("tags", tags))
    }

    const custom = Object.entries(node.attributes ?? {})
      .map(
        ([name, value]) =>
          `<attribute ${attribute("name", name)} ${attribute("value", value)}/>`,
      )
      .join("")

    return `<node ${pairs.join(" ")}>${custom}</node>`
  })

export const serializeProjectNodes = (
  nodes: ReadonlyArray<ResourceNode>,
): Effect.Effect<string, InvalidArgument> =>
  Effect.forEach(nodes, serializeNode).pipe(
    Effect.map((serialized) => `<project>${serialized.join("")}</project>`),
  )
