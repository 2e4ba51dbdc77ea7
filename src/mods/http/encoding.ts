import { HeaderMap, HeaderMaps } from "./headers.js"

export namespace Encodings {

  /**
   * Whether the "Accept-Encoding" header accepts the given content coding (RFC 2616 section 14.3)
   *
   * Only explicit listing, "*" and zero q-values are considered, preference between codings is not
   */
  export function accepts(headers: HeaderMap, encoding: string) {
    const header = HeaderMaps.get(headers, "Accept-Encoding")

    if (header == null)
      return false

    const accepted = header.replace(/[ \t\n]/g, "")

    for (const candidate of [encoding, "*"]) {
      for (const token of accepted.split(",")) {
        if (!token.length)
          continue
        if (!token.startsWith(candidate))
          continue

        const q = qualitiesOf(token)

        /**
         * No q-value, or several of them
         */
        if (q.length !== 1)
          return true

        const value = Number(q[0])
        return !Number.isNaN(value) && value > 0
      }
    }

    return false
  }

  function qualitiesOf(token: string) {
    const values = new Array<string>()

    for (const parameter of token.split(";")) {
      const pair = parameter.split("=").filter(it => it.length)

      if (pair.length === 2 && pair[0] === "q")
        values.push(pair[1])
    }

    return values
  }

}
