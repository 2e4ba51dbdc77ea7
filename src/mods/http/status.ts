import { Nullable } from "@hazae41/option"
import { readFileSync } from "node:fs"

export namespace HttpStatus {

  let statuses: Nullable<ReadonlyMap<number, string>>

  function load(): ReadonlyMap<number, string> {
    const text = readFileSync(new URL("./statuses.json", import.meta.url), "utf8")
    const json: Record<string, string> = JSON.parse(text)

    const map = new Map<number, string>()

    for (const [code, line] of Object.entries(json))
      map.set(Number(code), line)

    return map
  }

  /**
   * Get the status line of a code, such as "404 Not Found"
   */
  export function get(code: number): Nullable<string> {
    statuses ??= load()
    return statuses.get(code)
  }

  /**
   * Get the reason phrase of a code, such as "Not Found"
   */
  export function reasonOf(code: number): Nullable<string> {
    const line = get(code)

    if (line == null)
      return undefined
    return line.slice(line.indexOf(" ") + 1)
  }

}
