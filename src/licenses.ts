import { Handle } from './handle'
import { call } from './http'
import type { JsonValue, QueryParams } from './types'

// Read-only license vocabulary of the repository.
export class Licenses extends Handle {
  get apiUrl(): string {
    return `${this.baseUrl}/licenses`
  }

  async get(licenseId: string, params: QueryParams = {}): Promise<JsonValue> {
    return call(
      this,
      {
        method: 'GET',
        url: `${this.apiUrl}/${encodeURIComponent(licenseId)}`,
        params,
      },
      `getting license ${licenseId}`,
    )
  }

  async list(params: QueryParams = {}): Promise<JsonValue> {
    return call(
      this,
      { method: 'GET', url: this.apiUrl, params },
      'listing licenses',
    )
  }
}
