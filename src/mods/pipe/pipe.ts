import { Future } from "@hazae41/future"
import { Console } from "../console/index.js"
import { ClosedError } from "./errors.js"

export type EndState =
  | "open"
  | "closed"

/**
 * State shared by a pipe and every reader and writer derived from it
 */
export class PipeData {

  readEnd: EndState = "open"
  writeEnd: EndState = "open"

  /**
   * Payloads not yet claimed by a reader
   */
  readonly writes = new Array<string>()

  /**
   * Readers waiting for a payload, oldest first
   */
  readonly reads = new Array<Future<string>>()

  /**
   * Resolved once if the read end closes while the write end is open
   */
  readonly readerClosure = new Future<void>()

}

/**
 * Unidirectional string pipe with independently closable ends
 * @example
 * const pipe = new Pipe()
 * const reader = pipe.reader()
 * const writer = pipe.writer()
 *
 * writer.write("hello")
 * writer.close()
 *
 * await reader.read() // "hello"
 * await reader.read() // "" (end of stream)
 */
export class Pipe {

  constructor(
    readonly data = new PipeData()
  ) { }

  reader() {
    return new PipeReader(this.data)
  }

  writer() {
    return new PipeWriter(this.data)
  }

}

/**
 * Each operation mutates the shared state in one synchronous section,
 * then settles the futures it took out of the queues.
 * A waiter is removed from the queue before it is settled, so it is settled once.
 */
export class PipeReader {
  readonly #class = PipeReader

  constructor(
    readonly data: PipeData
  ) { }

  get closed() {
    return this.data.readEnd === "closed"
  }

  /**
   * Read the next payload
   * @returns the next payload, or "" once the write end is closed and the pipe is drained
   * @throws ClosedError if the read end is closed
   */
  read(): Promise<string> {
    const { data } = this

    if (data.readEnd === "closed")
      return Promise.reject(new ClosedError())

    const write = data.writes.shift()

    if (write != null)
      return Promise.resolve(write)

    if (data.writeEnd === "closed")
      return Promise.resolve("")

    const future = new Future<string>()
    data.reads.push(future)
    return future.promise
  }

  /**
   * Close the read end, dropping queued payloads and failing waiting reads
   * @returns false if the read end was already closed
   */
  close() {
    const { data } = this

    if (data.readEnd === "closed")
      return false

    data.writes.length = 0

    const reads = data.reads.splice(0, data.reads.length)
    const notify = data.writeEnd === "open"

    data.readEnd = "closed"

    Console.debug(`${this.#class.name}.close`, { reads: reads.length, notify })

    for (const read of reads)
      read.reject(new ClosedError())

    if (notify)
      data.readerClosure.resolve()

    return true
  }

}

export class PipeWriter {
  readonly #class = PipeWriter

  constructor(
    readonly data: PipeData
  ) { }

  get closed() {
    return this.data.writeEnd === "closed"
  }

  /**
   * Write a payload, handing it to the oldest waiting reader if any
   * @returns false if either end is closed, in which case the payload is dropped
   */
  write(payload: string) {
    const { data } = this

    if (data.writeEnd === "closed" || data.readEnd === "closed")
      return false

    /**
     * Empty payloads would look like end of stream
     */
    if (!payload.length)
      return true

    const read = data.reads.shift()

    if (read == null) {
      data.writes.push(payload)
      return true
    }

    read.resolve(payload)
    return true
  }

  /**
   * Close the write end, resolving waiting reads with end of stream
   * @returns false if the write end was already closed
   */
  close() {
    const { data } = this

    if (data.writeEnd === "closed")
      return false

    const reads = data.reads.splice(0, data.reads.length)

    data.writeEnd = "closed"

    Console.debug(`${this.#class.name}.close`, { reads: reads.length })

    for (const read of reads)
      read.resolve("")

    return true
  }

  /**
   * Resolves once the read end closes while this end is still open
   */
  readerClosed() {
    return this.data.readerClosure.promise
  }

}
