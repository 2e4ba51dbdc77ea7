import { Nullable } from "@hazae41/option"

export namespace Strings {

  export function equalsIgnoreCase(a?: Nullable<string>, b?: Nullable<string>) {
    return a?.toLowerCase() === b?.toLowerCase()
  }

  /**
   * Split on the first occurrence of the splitter
   * @returns undefined if the splitter is absent
   */
  export function splitOnFirst(text: string, splitter: string): Nullable<[string, string]> {
    const index = text.indexOf(splitter)

    if (index === -1)
      return undefined

    const first = text.slice(0, index)
    const last = text.slice(index + splitter.length)

    return [first, last]
  }

  export function removePrefix(text: string, prefix: string) {
    if (!text.startsWith(prefix))
      return text
    return text.slice(prefix.length)
  }

}
