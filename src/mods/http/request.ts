import { Bytes } from "@hazae41/bytes"
import { Nullable } from "@hazae41/option"
import { Strings } from "../../libs/strings/strings.js"
import { Address, Addresses } from "./address.js"
import { HeaderMap } from "./headers.js"
import { HttpUrl } from "./url.js"

export interface HttpRequest {
  readonly method: string
  readonly url: HttpUrl

  /**
   * Resolved address of the URL, sent as the "Host" header
   */
  readonly address: Address

  readonly headers?: Nullable<HeaderMap>
  readonly body?: Nullable<string>
  readonly contentType?: Nullable<string>
}

export namespace Requests {

  /**
   * Request target, "/<path>[?<query>][#<fragment>]"
   *
   * Query keys and values are written as given, without escaping
   */
  export function targetOf(url: HttpUrl) {
    let target = `/${Strings.removePrefix(url.path, "/")}`

    if (url.query.size) {
      const pairs = new Array<string>()

      for (const [key, value] of url.query)
        pairs.push(`${key}=${value}`)

      target += `?${pairs.join("&")}`
    }

    if (url.fragment != null)
      target += `#${url.fragment}`

    return target
  }

  /**
   * Caller headers with "Host" and "Connection: close" forced, then "Content-Type" and "Content-Length" when given a content type or a body
   */
  export function headersOf(request: HttpRequest): HeaderMap {
    const { address, body, contentType } = request

    const headers: HeaderMap = { ...request.headers }

    headers["Host"] = Addresses.toString(address)
    headers["Connection"] = "close"

    if (contentType != null)
      headers["Content-Type"] = contentType

    if (body != null)
      headers["Content-Length"] = String(Bytes.fromUtf8(body).length)

    return headers
  }

  export function encode(request: HttpRequest) {
    const { method, url, body } = request

    let head = `${method} ${targetOf(url)} HTTP/1.1\r\n`

    for (const [key, value] of Object.entries(headersOf(request)))
      head += `${key}: ${value}\r\n`

    head += `\r\n`

    if (body != null)
      head += body

    return Bytes.fromUtf8(head)
  }

}
