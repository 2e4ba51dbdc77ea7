import { isIPv6 } from "node:net"

export interface Address {
  readonly ip: string
  readonly port: number
}

/**
 * Identity of a process reachable over HTTP, its id being the first path segment
 */
export interface ProcessId {
  readonly id: string
  readonly address: Address
}

export namespace Addresses {

  /**
   * Textual form used as the "Host" header, "127.0.0.1:8080" or "[::1]:8080"
   */
  export function toString(address: Address) {
    const { ip, port } = address

    if (isIPv6(ip))
      return `[${ip}]:${port}`
    return `${ip}:${port}`
  }

}
