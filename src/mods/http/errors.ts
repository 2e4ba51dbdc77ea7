export type HttpError =
  | ValidationError
  | ResolutionError
  | TransportError
  | DecodeError

export class ValidationError extends Error {
  readonly #class = ValidationError
  readonly name = this.#class.name

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
  }

}

export class UnsupportedSchemeError extends ValidationError {
  readonly #class = UnsupportedSchemeError
  readonly name = this.#class.name

  constructor(
    readonly scheme: string
  ) {
    super(`Unsupported URL scheme "${scheme}"`)
  }

}

export class MissingAddressError extends ValidationError {
  readonly #class = MissingAddressError
  readonly name = this.#class.name

  constructor() {
    super(`Missing URL domain or IP`)
  }

}

export class MissingBodyError extends ValidationError {
  readonly #class = MissingBodyError
  readonly name = this.#class.name

  constructor(
    readonly method: string
  ) {
    super(`Attempted to do a ${method} with a Content-Type but no body`)
  }

}

export class InvalidQueryError extends ValidationError {
  readonly #class = InvalidQueryError
  readonly name = this.#class.name

  constructor(
    readonly query: string,
    readonly cause?: unknown
  ) {
    super(`Failed to decode HTTP query string "${query}"`, { cause })
  }

}

export class ResolutionError extends Error {
  readonly #class = ResolutionError
  readonly name = this.#class.name

  constructor(
    readonly domain: string,
    readonly cause?: unknown
  ) {
    super(`Failed to determine IP of domain "${domain}"`, { cause })
  }

}

export type SocketOperation =
  | "create"
  | "connect"
  | "send"
  | "recv"

export class TransportError extends Error {
  readonly #class = TransportError
  readonly name = this.#class.name

  constructor(
    readonly operation: SocketOperation,
    readonly cause?: unknown
  ) {
    super(`Failed to ${operation} socket`, { cause })
  }

}

export class DecodeError extends Error {
  readonly #class = DecodeError
  readonly name = this.#class.name

  constructor(
    readonly buffer: string
  ) {
    super(`Failed to decode HTTP response:\n${buffer}\n`)
  }

}
