import { Strings } from "../../libs/strings/strings.js"
import { InvalidQueryError } from "./errors.js"

export namespace Percent {

  /**
   * Percent-encode everything but unreserved characters
   */
  export function encode(text: string) {
    return encodeURIComponent(text)
  }

  /**
   * Decode percent escapes, "+" being a space
   * @throws InvalidQueryError on malformed escapes
   */
  export function decodeOrThrow(text: string) {
    try {
      return decodeURIComponent(text.replaceAll("+", " "))
    } catch (e: unknown) {
      throw new InvalidQueryError(text, e)
    }
  }

}

export namespace Query {

  /**
   * Decode "a=1&b=2;c" into an ordered map, "c" mapping to ""
   * @throws InvalidQueryError on malformed escapes
   */
  export function decodeOrThrow(query: string) {
    const result = new Map<string, string>()

    for (const token of query.split(/[;&]/)) {
      if (!token.length)
        continue

      const split = Strings.splitOnFirst(token, "=")

      if (split == null) {
        result.set(Percent.decodeOrThrow(token), "")
        continue
      }

      const [key, value] = split
      result.set(Percent.decodeOrThrow(key), Percent.decodeOrThrow(value))
    }

    return result
  }

  export function encode(query: ReadonlyMap<string, string>) {
    const tokens = new Array<string>()

    for (const [key, value] of query) {
      if (value.length)
        tokens.push(`${Percent.encode(key)}=${Percent.encode(value)}`)
      else
        tokens.push(Percent.encode(key))
    }

    return tokens.join("&")
  }

}
