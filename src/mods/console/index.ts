export namespace Console {

  export let debugging = false

  export function debug(...params: unknown[]) {
    if (!debugging)
      return
    console.debug(...params)
  }

  export function warn(...params: unknown[]) {
    console.warn(...params)
  }

}
