import type { Attributes, GlobalAttributesProvider } from './types'

/**
 * The process-wide attribute store.
 * Scopes only ever see it as a read-only `GlobalAttributesProvider`.
 */
export class GlobalAttributes implements GlobalAttributesProvider {
  private readonly attributes = new Map<string, unknown>()

  constructor(initialAttributes: Attributes = {}) {
    for (const [key, value] of Object.entries(initialAttributes)) {
      this.attributes.set(key, value)
    }
  }

  addAttribute(key: string, value: unknown): void {
    this.attributes.set(key, value)
  }

  removeAttribute(key: string): void {
    this.attributes.delete(key)
  }

  getGlobalAttributes(): Readonly<Attributes> {
    return Object.fromEntries(this.attributes)
  }
}
