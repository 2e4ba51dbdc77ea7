import { Bytes } from "@hazae41/bytes"
import { Console } from "../console/index.js"
import { HttpResponse, ResponseDecoder } from "./decoder.js"
import { DecodeError } from "./errors.js"

export namespace Responses {

  /**
   * Decode the single response of a buffer
   * @throws DecodeError if the buffer is malformed or holds no complete response
   */
  export function decodeOrThrow(bytes: Uint8Array): HttpResponse {
    const { responses, failed } = ResponseDecoder.decode(bytes)

    if (failed || !responses.length)
      throw new DecodeError(Bytes.toUtf8(bytes))

    /**
     * TODO: surface the extra responses instead of dropping them, they may hide a truncated or pipelined reply upstream
     */
    if (responses.length > 1)
      Console.warn(`Received more than 1 HTTP response, dropping ${responses.length - 1}`)

    return responses[0]
  }

}
