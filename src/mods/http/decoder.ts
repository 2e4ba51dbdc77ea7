import { Bytes } from "@hazae41/bytes"
import { Nullable } from "@hazae41/option"
import { Strings } from "../../libs/strings/strings.js"
import { HeaderMap, HeaderMaps } from "./headers.js"
import { HttpStatus } from "./status.js"

export interface HttpResponse {
  readonly version: string
  readonly status: number
  readonly statusText: string
  readonly headers: HeaderMap
  readonly body: string
}

export interface DecodeResult {
  readonly responses: HttpResponse[]

  /**
   * Whether a malformed message stopped the decoding
   */
  readonly failed: boolean
}

type DecodeStep =
  | DecodeCompleteStep
  | DecodePartialStep
  | DecodeFailedStep

interface DecodeCompleteStep {
  readonly type: "complete"
  readonly response: HttpResponse
  readonly end: number
}

interface DecodePartialStep {
  readonly type: "partial"
}

interface DecodeFailedStep {
  readonly type: "failed"
}

interface Head {
  readonly version: string
  readonly status: number
  readonly statusText: string
  readonly headers: HeaderMap
}

const partial: DecodePartialStep = { type: "partial" }
const failed: DecodeFailedStep = { type: "failed" }

const STATUS_LINE = /^HTTP\/(\d\.\d) (\d{3})(?: (.*))?$/
const DECIMAL = /^\d+$/
const HEXADECIMAL = /^[0-9a-fA-F]+$/

/**
 * Decoder of complete HTTP/1.1 response buffers, the end of the buffer being the end of the stream
 */
export namespace ResponseDecoder {

  /**
   * Decode as many responses as the buffer holds, an incomplete trailing message is ignored
   */
  export function decode(bytes: Uint8Array): DecodeResult {
    const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    const responses = new Array<HttpResponse>()

    let offset = 0

    while (offset < buffer.length) {
      const step = decodeAt(buffer, offset)

      if (step.type === "failed")
        return { responses, failed: true }
      if (step.type === "partial")
        break

      responses.push(step.response)
      offset = step.end
    }

    return { responses, failed: false }
  }

  function decodeAt(buffer: Buffer, offset: number): DecodeStep {
    const split = buffer.indexOf("\r\n\r\n", offset)

    if (split === -1)
      return partial

    const head = decodeHead(Bytes.toUtf8(buffer.subarray(offset, split)))

    if (head == null)
      return failed

    const start = split + 4

    const transfer = HeaderMaps.get(head.headers, "Transfer-Encoding")

    if (transfer != null && transfer.toLowerCase().includes("chunked"))
      return decodeChunked(buffer, start, head)

    const length = HeaderMaps.get(head.headers, "Content-Length")

    if (length != null)
      return decodeLengthed(buffer, start, length.trim(), head)

    if (isBodiless(head.status))
      return complete(head, new Uint8Array(), start)

    return complete(head, buffer.subarray(start), buffer.length)
  }

  function decodeHead(text: string): Nullable<Head> {
    const [statusLine, ...lines] = text.split("\r\n")

    const match = STATUS_LINE.exec(statusLine)

    if (match == null)
      return undefined

    const [, version, statusString, reason] = match

    const status = Number(statusString)
    const statusText = reason?.length ? reason : HttpStatus.reasonOf(status) ?? ""

    const entries = new Map<string, string>()

    for (const line of lines) {
      const split = Strings.splitOnFirst(line, ":")

      if (split == null)
        return undefined

      const key = split[0]
      const value = split[1].trim()

      if (!key.length || key !== key.trim())
        return undefined

      const previous = entries.get(key)
      entries.set(key, previous == null ? value : `${previous}, ${value}`)
    }

    const headers: HeaderMap = Object.fromEntries(entries)

    return { version, status, statusText, headers }
  }

  function decodeLengthed(buffer: Buffer, start: number, length: string, head: Head): DecodeStep {
    if (!DECIMAL.test(length))
      return failed

    const end = start + Number(length)

    if (end > buffer.length)
      return partial

    return complete(head, buffer.subarray(start, end), end)
  }

  function decodeChunked(buffer: Buffer, start: number, head: Head): DecodeStep {
    const chunks = new Array<Uint8Array>()

    let offset = start

    while (true) {
      const index = buffer.indexOf("\r\n", offset)

      /**
       * [length]
       *  => partial chunk header
       */
      if (index === -1)
        return partial

      /**
       * [length][;extension]\r\n
       *  => full chunk header, extensions are ignored
       */
      const line = buffer.subarray(offset, index).toString("latin1")
      const [size] = line.split(";")

      if (!HEXADECIMAL.test(size.trim()))
        return failed

      const length = parseInt(size, 16)
      const data = index + 2

      /**
       * 0\r\n[trailers]\r\n
       *  => last chunk, trailers are ignored
       */
      if (length === 0) {
        if (buffer.length < data + 2)
          return partial

        if (buffer.subarray(data, data + 2).toString("latin1") === "\r\n")
          return complete(head, Buffer.concat(chunks), data + 2)

        const trailers = buffer.indexOf("\r\n\r\n", data)

        if (trailers === -1)
          return partial

        return complete(head, Buffer.concat(chunks), trailers + 4)
      }

      /**
       * [chunk]\r\n
       *  => full chunk body
       */
      if (buffer.length < data + length + 2)
        return partial

      if (buffer.subarray(data + length, data + length + 2).toString("latin1") !== "\r\n")
        return failed

      chunks.push(buffer.subarray(data, data + length))
      offset = data + length + 2
    }
  }

  function complete(head: Head, body: Uint8Array, end: number): DecodeCompleteStep {
    return { type: "complete", response: { ...head, body: Bytes.toUtf8(body) }, end }
  }

  /**
   * Informational, "204 No Content" and "304 Not Modified" responses have no body
   */
  function isBodiless(status: number) {
    return (status >= 100 && status < 200) || status === 204 || status === 304
  }

}
