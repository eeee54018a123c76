import { HttpClient, HttpClientResponse } from "@effect/platform"
import { Effect, Layer } from "effect"
import { RundeckApi } from "../services/api"
import { makeRundeckConfigLayer, type RundeckOptions } from "../services/config"
import { RundeckConnection } from "../services/connection"
import { Rundeck } from "../services/rundeck"

export interface RecordedRequest {
  readonly method: string
  readonly url: URL
  readonly headers: Readonly<Record<string, string>>
  readonly body: string | null
  readonly contentType: string | null
  readonly formData: FormData | null
}

export interface MockReply {
  readonly status?: number
  readonly body: string
}

export type MockHandler = (request: RecordedRequest) => MockReply

const decoder = new TextDecoder()

/** An HttpClient answering from `handler`, recording every request. */
export const makeMockServer = (handler: MockHandler) => {
  const requests: RecordedRequest[] = []

  const client = HttpClient.make((request, url) => {
    const { body } = request
    const recorded: RecordedRequest = {
      method: request.method,
      url,
      headers: request.headers,
      body: body._tag === "Uint8Array" ? decoder.decode(body.body) : null,
      contentType: body._tag === "Uint8Array" ? body.contentType : null,
      formData: body._tag === "FormData" ? body.formData : null,
    }
    requests.push(recorded)

    const reply = handler(recorded)
    return Effect.succeed(
      HttpClientResponse.fromWeb(
        request,
        // null body statuses such as 204 reject any body
        new Response(reply.body === "" ? null : reply.body, {
          status: reply.status ?? 200,
        }),
      ),
    )
  })

  return {
    requests,
    layer: Layer.succeed(HttpClient.HttpClient, client),
  }
}

export const TEST_OPTIONS = {
  server: "rundeck.test",
  apiToken: "test-secret",
} satisfies RundeckOptions

/** Every client service over a mock server. */
export const makeTestLayer = (
  handler: MockHandler,
  options: RundeckOptions = {},
) => {
  const server = makeMockServer(handler)
  const layer = Layer.mergeAll(
    Rundeck.Default,
    RundeckApi.Default,
    RundeckConnection.Default,
  ).pipe(
    Layer.provide(
      Layer.merge(
        makeRundeckConfigLayer({ ...TEST_OPTIONS, ...options }),
        server.layer,
      ),
    ),
  )

  return { requests: server.requests, layer }
}

export const ok = (inner = ""): MockReply => ({
  body: `<result success="true" apiversion="11">${inner}</result>`,
})

export const failure = (message: string): MockReply => ({
  body: `<result error="true" apiversion="11"><error><message>${message}</message></error></result>`,
})
