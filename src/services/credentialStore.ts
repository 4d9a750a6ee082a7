import type { Credential } from '../types'
import { ConfigError } from '../config'

/**
 * Read-only username → secret lookup, built once from configuration.
 */
export class CredentialStore {
  private readonly byUsername: ReadonlyMap<string, Credential>

  constructor(credentials: readonly Credential[]) {
    const entries = new Map<string, Credential>()

    for (const credential of credentials) {
      if (!credential.username) {
        throw new ConfigError('Credential with empty username')
      }
      if (!credential.secret) {
        throw new ConfigError(`Credential "${credential.username}" has an empty secret`)
      }
      if (entries.has(credential.username)) {
        throw new ConfigError(`Duplicate username "${credential.username}"`)
      }
      entries.set(credential.username, Object.freeze({ ...credential }))
    }

    this.byUsername = entries
  }

  lookup(username: string): Credential | undefined {
    return this.byUsername.get(username)
  }

  usernames(): string[] {
    return [...this.byUsername.keys()]
  }
}
