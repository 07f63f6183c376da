import type { RumRawEvent } from './rawEventTypes'
import type { RumEvent } from './rumEventTypes'
import type { RumContext } from './types'

/**
 * Where scopes hand their records to. Fire-and-forget: never blocks, never throws.
 */
export interface RumEventWriter {
  write: (rumEvent: RumEvent) => void
}

/**
 * The only thing a child may reach on its parent.
 * Used for context lookup, never for mutation.
 */
export interface RumContextProvider {
  getRumContext: () => RumContext
}

/**
 * A node of the aggregation tree (application, session, view, action or resource).
 */
export interface RumScope extends RumContextProvider {
  /**
   * @returns the scope itself while it's alive, undefined once it's finished
   * and must be detached from its parent
   */
  handleEvent: (
    event: RumRawEvent,
    writer: RumEventWriter,
  ) => RumScope | undefined
  isFinished: () => boolean
}

/**
 * Hands the event to every child exactly once, and prunes the ones that report being finished.
 */
export function delegateToScopes<KeyT, ScopeT extends RumScope>(
  scopes: Map<KeyT, ScopeT>,
  event: RumRawEvent,
  writer: RumEventWriter,
): void {
  // snapshot, so that children added or removed during the dispatch don't alter this pass
  for (const [key, scope] of [...scopes]) {
    if (!scope.handleEvent(event, writer) && scopes.get(key) === scope) {
      scopes.delete(key)
    }
  }
}
