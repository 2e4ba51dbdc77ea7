import { Nullable } from "@hazae41/option"
import { Console } from "../console/index.js"
import { Address, ProcessId } from "./address.js"
import { HttpResponse } from "./decoder.js"
import { MissingAddressError, MissingBodyError, ResolutionError, TransportError, UnsupportedSchemeError } from "./errors.js"
import { HeaderMap } from "./headers.js"
import { Requests } from "./request.js"
import { DnsResolver, Resolver } from "./resolver.js"
import { Responses } from "./response.js"
import { Socket, SocketFactory, TcpSocket } from "./socket.js"
import { HttpUrl, HttpUrls } from "./url.js"

export interface HttpClientParams {
  readonly sockets?: SocketFactory
  readonly resolver?: Resolver
}

/**
 * HTTP/1.1 client, one connection per request, closed by the server after the response
 *
 * Each request goes through resolution, connection, sending, receiving and decoding,
 * the first failing step rejecting the request
 */
export class HttpClient {
  readonly #class = HttpClient

  readonly #sockets: SocketFactory
  readonly #resolver: Resolver

  constructor(
    readonly params: HttpClientParams = {}
  ) {
    this.#sockets = params.sockets ?? (() => new TcpSocket())
    this.#resolver = params.resolver ?? new DnsResolver()
  }

  /**
   * Send a request and decode the response
   * @throws ValidationError if the URL is not "http" or has no address
   * @throws ResolutionError if the domain can't be resolved
   * @throws TransportError if the socket fails
   * @throws DecodeError if the response can't be decoded
   */
  async request(url: HttpUrl, method: string, headers?: Nullable<HeaderMap>, body?: Nullable<string>, contentType?: Nullable<string>): Promise<HttpResponse> {
    if (url.scheme !== "http")
      throw new UnsupportedSchemeError(url.scheme)

    const address: Address = { ip: await this.#resolveOrThrow(url), port: url.port }
    const socket = this.#createOrThrow()

    try {
      Console.debug(`${this.#class.name}.request`, method, address)

      await socket.connect(address).catch(e => { throw new TransportError("connect", e) })

      const bytes = Requests.encode({ method, url, address, headers, body, contentType })

      await socket.send(bytes).catch(e => { throw new TransportError("send", e) })

      const received = await socket.recv().catch(e => { throw new TransportError("recv", e) })

      return Responses.decodeOrThrow(received)
    } finally {
      socket.close()
    }
  }

  async #resolveOrThrow(url: HttpUrl) {
    const { ip: literal, domain } = url

    if (literal != null)
      return literal

    if (domain == null)
      throw new MissingAddressError()

    const ip = await this.#resolver.resolve(domain).catch(e => {
      throw e instanceof ResolutionError ? e : new ResolutionError(domain, e)
    })

    if (!ip.length)
      throw new ResolutionError(domain)

    return ip
  }

  #createOrThrow(): Socket {
    try {
      return this.#sockets()
    } catch (e: unknown) {
      throw new TransportError("create", e)
    }
  }

  get(url: HttpUrl, headers?: Nullable<HeaderMap>): Promise<HttpResponse>

  /**
   * GET a path of a process
   * @param path appended to the process id with "/"
   * @param query query string, with or without a leading "?"
   */
  get(pid: ProcessId, path?: Nullable<string>, query?: Nullable<string>, headers?: Nullable<HeaderMap>): Promise<HttpResponse>

  async get(target: HttpUrl | ProcessId, first?: Nullable<string | HeaderMap>, query?: Nullable<string>, headers?: Nullable<HeaderMap>): Promise<HttpResponse> {
    if (isProcessId(target))
      return await this.get(HttpUrls.fromProcessOrThrow(target, stringOf(first), query), headers)

    return await this.request(target, "GET", headerMapOf(first))
  }

  /**
   * PUT a body
   * @throws MissingBodyError if given a content type but no body, before any network operation
   */
  async put(url: HttpUrl, headers?: Nullable<HeaderMap>, body?: Nullable<string>, contentType?: Nullable<string>) {
    if (body == null && contentType != null)
      throw new MissingBodyError("PUT")

    return await this.request(url, "PUT", headers, body, contentType)
  }

  /**
   * POST a body
   * @throws MissingBodyError if given a content type but no body, before any network operation
   */
  post(url: HttpUrl, headers?: Nullable<HeaderMap>, body?: Nullable<string>, contentType?: Nullable<string>): Promise<HttpResponse>

  /**
   * POST to a path of a process
   * @param path appended to the process id with "/"
   */
  post(pid: ProcessId, path?: Nullable<string>, headers?: Nullable<HeaderMap>, body?: Nullable<string>, contentType?: Nullable<string>): Promise<HttpResponse>

  async post(target: HttpUrl | ProcessId, first?: Nullable<string | HeaderMap>, second?: Nullable<string | HeaderMap>, third?: Nullable<string>, fourth?: Nullable<string>): Promise<HttpResponse> {
    if (isProcessId(target))
      return await this.post(HttpUrls.fromProcessOrThrow(target, stringOf(first)), headerMapOf(second), third, fourth)

    const headers = headerMapOf(first)
    const body = stringOf(second)
    const contentType = third

    if (body == null && contentType != null)
      throw new MissingBodyError("POST")

    return await this.request(target, "POST", headers, body, contentType)
  }

}

function isProcessId(target: HttpUrl | ProcessId): target is ProcessId {
  return "id" in target && "address" in target
}

function stringOf(value: Nullable<string | HeaderMap>) {
  return typeof value === "string" ? value : undefined
}

function headerMapOf(value: Nullable<string | HeaderMap>) {
  return typeof value === "string" ? undefined : value
}
