import type { DialectStrategy } from './dialect'
import type { Transport } from './http'

// What every handle needs from the chain above it. Only the repository root
// stores these; everything else forwards to its parent.
export interface UrlScoped {
  readonly baseUrl: string
  readonly credential: string
  readonly dialect: DialectStrategy
  readonly transport: Transport
  readonly authenticateCommunityLookup: boolean
}

export abstract class Handle implements UrlScoped {
  constructor(protected readonly parent: UrlScoped) {}

  get baseUrl(): string {
    return this.parent.baseUrl
  }

  get credential(): string {
    return this.parent.credential
  }

  get dialect(): DialectStrategy {
    return this.parent.dialect
  }

  get transport(): Transport {
    return this.parent.transport
  }

  get authenticateCommunityLookup(): boolean {
    return this.parent.authenticateCommunityLookup
  }

  // Derived from the chain only, never fetched.
  abstract get apiUrl(): string
}
