/**
 * Response envelope
 *
 * Wraps one server reply. Everything derived from the parsed tree is
 * computed once, at construction, and never changes afterwards.
 */

import { Effect } from "effect"
import { ServerError, type MalformedResponse } from "./errors"
import { findText, parseXml, type XmlDocument, type XmlElement } from "./xml"

export type Transform<A> = (envelope: ResponseEnvelope<unknown>) => A

export interface EnvelopeSource {
  readonly body: string
  /** API version the client was configured with */
  readonly clientApiVersion: number
  /** HTTP status of the reply, `200` when unknown */
  readonly status?: number
}

const readApiVersion = (root: XmlElement): number => {
  const raw = root.attributes.apiversion
  if (raw === undefined) return -1

  const version = Number.parseInt(raw, 10)
  return Number.isNaN(version) ? -1 : version
}

const readMessage = (root: XmlElement, success: boolean): string => {
  const term = success ? "success" : "error"
  return findText(root, `${term}/message`) ?? term
}

export class ResponseEnvelope<A = null> {
  readonly body: string
  readonly status: number
  readonly clientApiVersion: number
  readonly root: XmlElement
  readonly pretty: string

  readonly apiVersion: number
  readonly success: boolean
  readonly message: string
  readonly asStructured: A

  private constructor(
    source: EnvelopeSource,
    document: XmlDocument,
    transform: (envelope: ResponseEnvelope<unknown>) => A,
  ) {
    this.body = source.body
    this.status = source.status ?? 200
    this.clientApiVersion = source.clientApiVersion
    this.root = document.root
    this.pretty = document.pretty

    this.apiVersion = readApiVersion(document.root)
    this.success = "success" in document.root.attributes
    this.message = readMessage(document.root, this.success)
    this.asStructured = transform(this)
  }

  static parse(
    source: EnvelopeSource,
  ): Effect.Effect<ResponseEnvelope<null>, MalformedResponse> {
    return parseXml(source.body).pipe(
      Effect.map(
        (document) => new ResponseEnvelope(source, document, () => null),
      ),
    )
  }

  /** A copy of this envelope whose `asStructured` is `transform(envelope)`. */
  withTransform<B>(transform: Transform<B>): ResponseEnvelope<B> {
    return new ResponseEnvelope(
      {
        body: this.body,
        status: this.status,
        clientApiVersion: this.clientApiVersion,
      },
      { root: this.root, pretty: this.pretty },
      transform,
    )
  }

  raiseForError(message?: string): Effect.Effect<this, ServerError> {
    if (this.success) return Effect.succeed(this)

    return Effect.fail(
      new ServerError({ message: message ?? this.message, envelope: this }),
    )
  }
}
