import { lookup } from "node:dns/promises"
import { Console } from "../console/index.js"
import { ResolutionError } from "./errors.js"

export interface Resolver {

  /**
   * Resolve a domain to its textual IP address
   * @throws ResolutionError
   */
  resolve(domain: string): Promise<string>

}

export interface LookupAddress {
  readonly address: string
}

export interface DnsResolverParams {
  readonly lookup?: (hostname: string) => Promise<LookupAddress>
}

/**
 * Resolver backed by the system resolver, IPv4 only
 */
export class DnsResolver implements Resolver {
  readonly #class = DnsResolver

  readonly #lookup: (hostname: string) => Promise<LookupAddress>

  constructor(
    readonly params: DnsResolverParams = {}
  ) {
    this.#lookup = params.lookup ?? (hostname => lookup(hostname, { family: 4 }))
  }

  async resolve(domain: string) {
    try {
      const { address } = await this.#lookup(domain)

      Console.debug(`${this.#class.name}.resolve`, { domain, address })

      return address
    } catch (e: unknown) {
      throw new ResolutionError(domain, e)
    }
  }

}
