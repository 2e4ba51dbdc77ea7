import { Nullable } from "@hazae41/option"
import { isIP } from "node:net"
import { Strings } from "../../libs/strings/strings.js"
import { ProcessId } from "./address.js"
import { Query } from "./query.js"

export interface HttpUrl {
  readonly scheme: string

  /**
   * Literal address, takes precedence over the domain
   */
  readonly ip?: Nullable<string>
  readonly domain?: Nullable<string>

  readonly port: number
  readonly path: string
  readonly query: ReadonlyMap<string, string>
  readonly fragment?: Nullable<string>
}

const defaultPorts: Record<string, number> = {
  http: 80,
  https: 443
}

export namespace HttpUrls {

  /**
   * Parse an absolute URL such as "http://example.com:8080/path?key=value#fragment"
   * @throws TypeError on invalid URLs
   * @throws InvalidQueryError on malformed query escapes
   */
  export function parseOrThrow(text: string | URL): HttpUrl {
    const { protocol, hostname, port, pathname, search, hash } = new URL(text)

    const scheme = protocol.slice(0, -1)
    const host = hostname.startsWith("[") ? hostname.slice(1, -1) : hostname

    const ip = isIP(host) ? host : undefined
    const domain = ip == null && host.length ? host : undefined

    return {
      scheme,
      ip,
      domain,
      port: port.length ? Number(port) : defaultPorts[scheme] ?? 80,
      path: pathname,
      query: Query.decodeOrThrow(Strings.removePrefix(search, "?")),
      fragment: hash.length ? hash.slice(1) : undefined
    }
  }

  /**
   * Build the URL of a process, "http://<ip>:<port>/<id>[/<path>][?<query>]"
   * @throws InvalidQueryError on malformed query escapes
   */
  export function fromProcessOrThrow(pid: ProcessId, path?: Nullable<string>, query?: Nullable<string>): HttpUrl {
    const { id, address } = pid

    return {
      scheme: "http",
      ip: address.ip,
      port: address.port,
      path: path == null ? id : `${id}/${path}`,
      query: query == null ? new Map() : Query.decodeOrThrow(Strings.removePrefix(query, "?"))
    }
  }

}
