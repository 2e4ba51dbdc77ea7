import { Nullable } from "@hazae41/option"
import { Strings } from "../../libs/strings/strings.js"

/**
 * Header mapping, keys are case-sensitive
 */
export type HeaderMap = Record<string, string>

export namespace HeaderMaps {

  /**
   * Get the first header whose key matches the name, ignoring case
   */
  export function get(headers: HeaderMap, name: string): Nullable<string> {
    for (const key in headers)
      if (Strings.equalsIgnoreCase(key, name))
        return headers[key]
    return undefined
  }

}
