export type PipeError =
  | ClosedError

export class ClosedError extends Error {
  readonly #class = ClosedError
  readonly name = this.#class.name

  constructor() {
    super(`Pipe read end is closed`)
  }

}
