import { Effect, Option } from "effect"
import { describe, expect, it } from "vitest"
import { ResponseEnvelope } from "../lib/response"
import {
  applyNamedTransform,
  isTransformName,
  lookupTransform,
  Transforms,
} from "./index"

const envelope = (body: string) =>
  Effect.runSync(ResponseEnvelope.parse({ body, clientApiVersion: 11 }))

const RUN = `<result success="true" apiversion="11"><executions count="1"><execution id="117" status="running"/></executions></result>`

describe("Transforms registry", () => {
  it("cannot be changed at run time", () => {
    expect(Object.isFrozen(Transforms)).toBe(true)
  })

  it("registers every endpoint family", () => {
    expect(Object.keys(Transforms).sort()).toEqual([
      "events",
      "execution",
      "execution_abort",
      "execution_output",
      "executions",
      "job_import_status",
      "jobs",
      "project",
      "project_resources",
      "projects",
      "run_execution",
      "success_message",
      "system_info",
    ])
  })

  it("only knows its own names", () => {
    expect(isTransformName("jobs")).toBe(true)
    expect(isTransformName("toString")).toBe(false)
    expect(Option.isNone(lookupTransform("job_list"))).toBe(true)
    expect(Option.isSome(lookupTransform("run_execution"))).toBe(true)
  })
})

describe("applyNamedTransform", () => {
  it("applies a registered transform", () => {
    expect(applyNamedTransform(envelope(RUN), "run_execution").asStructured).toBe(
      "117",
    )
  })

  it("leaves asStructured null for unknown names", () => {
    expect(applyNamedTransform(envelope(RUN), "job_list").asStructured).toBeNull()
  })
})

describe("element mapping", () => {
  it("lets attributes win over child elements of the same name", () => {
    const [job] = Transforms.jobs(
      envelope(
        `<result success="true"><jobs><job id="from-attribute"><id>from-child</id><name>backup</name></job></jobs></result>`,
      ),
    )

    expect(job).toEqual({ id: "from-attribute", name: "backup" })
  })

  it("keeps document order and duplicates", () => {
    const result = Transforms.jobs(
      envelope(
        `<result success="true"><jobs><job id="c"/><job id="a"/><job id="b"/><job id="a"/></jobs></result>`,
      ),
    )

    expect(result.map((job) => job.id)).toEqual(["c", "a", "b", "a"])
  })
})
