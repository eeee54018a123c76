import { Effect } from "effect"
import { describe, expect, it } from "vitest"
import { ResponseEnvelope } from "../lib/response"
import { jobImportStatus, jobs } from "./jobs"

const envelope = (body: string) =>
  Effect.runSync(ResponseEnvelope.parse({ body, clientApiVersion: 11 }))

describe("jobs", () => {
  it("maps each job to its fields", () => {
    const result = jobs(
      envelope(`
<result success="true" apiversion="11">
  <jobs count="2">
    <job id="a1">
      <name>backup</name>
      <group>ops</group>
      <project>ops</project>
      <description/>
    </job>
    <job id="b2">
      <name>deploy</name>
      <group/>
      <project>ops</project>
      <description>ship it</description>
    </job>
  </jobs>
</result>`),
    )

    expect(result).toEqual([
      {
        id: "a1",
        name: "backup",
        group: "ops",
        project: "ops",
        description: null,
      },
      {
        id: "b2",
        name: "deploy",
        group: null,
        project: "ops",
        description: "ship it",
      },
    ])
  })

  it("is empty for an empty listing", () => {
    expect(jobs(envelope(`<result success="true"><jobs count="0"/></result>`))).toEqual([])
  })
})

describe("jobImportStatus", () => {
  it("groups the imported jobs by outcome", () => {
    const status = jobImportStatus(
      envelope(`
<result success="true" apiversion="11">
  <succeeded count="1">
    <job index="1">
      <id>a1</id>
      <name>backup</name>
      <group>ops</group>
      <project>ops</project>
    </job>
  </succeeded>
  <failed count="1">
    <job index="2">
      <name>broken</name>
      <error>Invalid schedule</error>
    </job>
  </failed>
  <skipped count="0"/>
</result>`),
    )

    expect(status).toEqual({
      succeeded: [
        { index: "1", id: "a1", name: "backup", group: "ops", project: "ops" },
      ],
      failed: [{ index: "2", name: "broken", error: "Invalid schedule" }],
      skipped: [],
    })
  })

  it("treats missing groups as empty", () => {
    expect(jobImportStatus(envelope(`<result success="true"/>`))).toEqual({
      succeeded: [],
      failed: [],
      skipped: [],
    })
  })
})
