import { Future } from "@hazae41/future"
import { Nullable } from "@hazae41/option"
import { Socket as NetSocket } from "node:net"
import { Console } from "../console/index.js"
import { Address, Addresses } from "./address.js"

/**
 * Byte stream socket, owned by a single request
 */
export interface Socket {

  connect(address: Address): Promise<void>

  send(bytes: Uint8Array): Promise<void>

  /**
   * Receive bytes
   * @param size maximum number of bytes, or nothing to receive everything until the peer ends the stream
   * @returns the bytes, empty once the stream ended
   */
  recv(size?: Nullable<number>): Promise<Uint8Array>

  close(): void

}

export type SocketFactory = () => Socket

/**
 * Socket over a TCP connection
 */
export class TcpSocket implements Socket {
  readonly #class = TcpSocket

  readonly #socket = new NetSocket()

  readonly #chunks = new Array<Uint8Array>()

  #ended = false
  #error?: Error

  /**
   * Resolved on every change of #chunks, #ended or #error
   */
  #update = new Future<void>()

  constructor() {
    this.#socket.on("data", (chunk: Buffer) => this.#onData(chunk))
    this.#socket.on("end", () => this.#onEnd())
    this.#socket.on("error", (e: Error) => this.#onError(e))
  }

  #notify() {
    this.#update.resolve()
    this.#update = new Future<void>()
  }

  #onData(chunk: Buffer) {
    this.#chunks.push(chunk)
    this.#notify()
  }

  #onEnd() {
    Console.debug(`${this.#class.name}.onEnd`)

    this.#ended = true
    this.#notify()
  }

  #onError(error: Error) {
    Console.debug(`${this.#class.name}.onError`, { error })

    this.#error = error
    this.#notify()
  }

  async connect(address: Address) {
    Console.debug(`${this.#class.name}.connect`, Addresses.toString(address))

    const connected = new Future<void>()

    const onError = (e: Error) => connected.reject(e)

    this.#socket.once("error", onError)
    this.#socket.connect(address.port, address.ip, () => connected.resolve())

    try {
      await connected.promise
    } finally {
      this.#socket.off("error", onError)
    }
  }

  async send(bytes: Uint8Array) {
    const sent = new Future<void>()

    this.#socket.write(bytes, e => {
      if (e == null)
        sent.resolve()
      else
        sent.reject(e)
    })

    await sent.promise
  }

  async recv(size?: Nullable<number>) {
    while (true) {
      if (this.#error != null)
        throw this.#error

      if (size == null && this.#ended)
        return this.#take(Infinity)
      if (size != null && (this.#chunks.length || this.#ended))
        return this.#take(size)

      await this.#update.promise
    }
  }

  #take(size: number) {
    const chunks = new Array<Uint8Array>()

    let length = 0

    while (this.#chunks.length && length < size) {
      const chunk = this.#chunks[0]
      const remaining = size - length

      if (chunk.length <= remaining) {
        chunks.push(chunk)
        length += chunk.length
        this.#chunks.shift()
        continue
      }

      chunks.push(chunk.subarray(0, remaining))
      length += remaining
      this.#chunks[0] = chunk.subarray(remaining)
    }

    return new Uint8Array(Buffer.concat(chunks))
  }

  close() {
    Console.debug(`${this.#class.name}.close`)

    this.#socket.destroy()
  }

}
