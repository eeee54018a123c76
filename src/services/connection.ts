/**
 * Connection service
 *
 * Owns the one request path to the server:
 * - builds API URLs and the auth/wrapper headers
 * - applies `strict` (non-2xx fails) or tolerant behaviour
 * - hands parsed replies back as response envelopes
 */

import { HttpClient, HttpClientRequest } from "@effect/platform"
import { Effect } from "effect"
import { UnsupportedOperation } from "../lib/errors"
import { ResponseEnvelope } from "../lib/response"
import type { RequestExtras } from "../types"
import { RundeckConfig } from "./config"

export type HttpMethod = "GET" | "POST" | "DELETE"

export type Params = Readonly<
  Record<string, string | number | boolean | null | undefined>
>

export type RequestBody =
  | { readonly _tag: "Text"; readonly text: string; readonly contentType: string }
  | { readonly _tag: "Form"; readonly fields: Params }
  | {
      readonly _tag: "Multipart"
      readonly fields: Params
      readonly files: Readonly<Record<string, string>>
    }

export interface CallOptions {
  readonly params?: Params
  readonly body?: RequestBody
  readonly accept?: string
  readonly extras?: RequestExtras
}

export interface RawResponse {
  readonly status: number
  readonly body: string
}

/** Drops unset values and stringifies the rest. */
export const compactParams = (params: Params = {}): Record<string, string> => {
  const compacted: Record<string, string> = {}
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) continue
    compacted[key] = String(value)
  }
  return compacted
}

const toFormData = (fields: Params, files: Readonly<Record<string, string>>) => {
  const form = new FormData()
  for (const [key, value] of Object.entries(compactParams(fields))) {
    form.append(key, value)
  }
  for (const [key, content] of Object.entries(files)) {
    form.append(key, new Blob([content]), key)
  }
  return form
}

const withBody = (body: RequestBody | undefined) =>
  (request: HttpClientRequest.HttpClientRequest) => {
    if (!body) return request

    switch (body._tag) {
      case "Text":
        return HttpClientRequest.bodyText(request, body.text, body.contentType)
      case "Form":
        return HttpClientRequest.bodyUrlParams(
          request,
          compactParams(body.fields),
        )
      case "Multipart":
        return HttpClientRequest.bodyFormData(
          request,
          toFormData(body.fields, body.files),
        )
    }
  }

export class RundeckConnection extends Effect.Service<RundeckConnection>()(
  "RundeckConnection",
  {
    effect: Effect.gen(function* () {
      const config = yield* RundeckConfig
      const httpClient = yield* HttpClient.HttpClient
      const strictClient = HttpClient.filterStatusOk(httpClient)

      const makeApiUrl = (path: string) =>
        `${config.API_URL}/${path.replace(/^\/+/, "")}`

      const requireVersion = (operation: string, requiredVersion: number) =>
        config.API_VERSION < requiredVersion ?
          Effect.fail(
            new UnsupportedOperation({
              message: `${operation} requires API version '${requiredVersion}' or higher`,
              operation,
              requiredVersion,
              apiVersion: config.API_VERSION,
            }),
          )
        : Effect.void

      const request = Effect.fn("RundeckConnection.request")(function* (
        method: HttpMethod,
        path: string,
        options: CallOptions = {},
      ) {
        const url = makeApiUrl(path)
        const extras = options.extras ?? {}
        const strict = extras.strict ?? config.STRICT

        const httpRequest = HttpClientRequest.make(method)(url).pipe(
          HttpClientRequest.setHeaders({
            ...config.HEADERS,
            Accept: options.accept ?? "application/xml",
          }),
          HttpClientRequest.setHeaders(extras.headers ?? {}),
          HttpClientRequest.setUrlParams(compactParams(options.params)),
          HttpClientRequest.appendUrlParams(extras.urlParams ?? {}),
          withBody(options.body),
        )

        yield* Effect.logDebug(`${method} ${url}`)

        const client = strict ? strictClient : httpClient
        const response = yield* client.execute(httpRequest)
        const body = yield* response.text

        yield* Effect.logDebug(`${method} ${url} -> ${response.status}`)

        return { status: response.status, body } satisfies RawResponse
      }, Effect.scoped)

      /** Request and parse the reply into an envelope. */
      const call = (method: HttpMethod, path: string, options?: CallOptions) =>
        request(method, path, options).pipe(
          Effect.flatMap((raw) =>
            ResponseEnvelope.parse({
              body: raw.body,
              status: raw.status,
              clientApiVersion: config.API_VERSION,
            }),
          ),
        )

      return {
        apiVersion: config.API_VERSION,
        makeApiUrl,
        requireVersion,
        request,
        call,
      }
    }),
  },
) {}
