/* The KeyValueStore holds all per-entity policy and binding state.

   Each component claims exactly one namespace and is the only writer to it:
   plugins own their own config and counters, the engine owns the registry and bindings.
   Claiming a namespace twice is a wiring error and throws.
   This in-memory version backs tests and single-process deployments; a persistent
   store only has to implement the same two interfaces. */

import { ConfigurationError } from '@leasehold/reasons'

export interface Namespace<T> {
  readonly name: string
  get(key: string): T | undefined
  has(key: string): boolean
  set(key: string, value: T): void
  delete(key: string): boolean
  keys(): string[]
}

export interface KeyValueStore {
  claim<T>(namespace: string): Namespace<T>
  namespaces(): string[]
}

class MemoryNamespace<T> implements Namespace<T> {
  private rows: Map<string, T> = new Map()

  constructor(public readonly name: string) {}

  get(key: string) {
    return this.rows.get(key)
  }

  has(key: string) {
    return this.rows.has(key)
  }

  set(key: string, value: T) {
    this.rows.set(key, value)
  }

  delete(key: string) {
    return this.rows.delete(key)
  }

  keys() {
    return [...this.rows.keys()]
  }
}

export class InMemoryKeyValueStore implements KeyValueStore {
  private claimed: Set<string> = new Set()

  claim<T>(namespace: string): Namespace<T> {
    if (this.claimed.has(namespace)) {
      throw new ConfigurationError('CONFIG_NAMESPACE_TAKEN', { context: { namespace } })
    }
    this.claimed.add(namespace)
    return new MemoryNamespace<T>(namespace)
  }

  namespaces() {
    return [...this.claimed]
  }
}

/** Entity ids are bigints; store keys are their decimal form. */
export function entityKey(id: bigint): string {
  return id.toString()
}
