const JOB_ID_SHAPE = "########-####-####-####-############"
const ALPHANUMERIC = /[A-Za-z0-9]/g

/**
 * Whether a string is shaped like a server assigned job id (8-4-4-4-12).
 *
 * Only the shape is checked, not that the groups are hex.
 */
export const isJobId = (value: string | null | undefined): boolean =>
  typeof value === "string" && value.replace(ALPHANUMERIC, "#") === JOB_ID_SHAPE

export type ArgString = string | Readonly<Record<string, string | number>>

/** `{ env: "prod", retries: 3 }` → `-env prod -retries 3`. Strings pass through. */
export const toArgString = (args: ArgString): string =>
  typeof args === "string" ?
    args
  : Object.entries(args)
      .map(([key, value]) => `-${key} ${value}`)
      .join(" ")

export const joinList = (
  value: string | ReadonlyArray<string> | undefined,
): string | undefined =>
  value === undefined || typeof value === "string" ? value : value.join(",")
