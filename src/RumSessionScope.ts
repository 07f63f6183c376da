import { NULL_UUID } from './constants'
import type { RumRawEvent } from './rawEventTypes'
import {
  delegateToScopes,
  type RumContextProvider,
  type RumEventWriter,
  type RumScope,
} from './RumScope'
import { RumViewScope } from './RumViewScope'
import type { RumContext, RumScopeUtilities, Timestamp } from './types'

const isUserInteraction = (event: RumRawEvent) =>
  event.type === 'start-view' || event.type === 'start-action'

/**
 * Owns the views displayed over time and the session identifier they report under.
 *
 * A session expires after a period without user interaction, or once it reaches its max duration,
 * or when explicitly reset. The new id isn't pushed down the tree:
 * views notice it the next time they compute their context.
 */
export class RumSessionScope implements RumScope {
  sessionId: string = NULL_UUID
  sessionStartTime: Timestamp | undefined
  lastUserInteractionTime: Timestamp | undefined

  private nextViewIndex = 0
  readonly activeViewScopes = new Map<number, RumViewScope>()

  constructor(
    private readonly parentScope: RumContextProvider,
    private readonly utilities: RumScopeUtilities,
  ) {}

  /** the most recently started view that hasn't been stopped yet */
  get activeViewScope(): RumViewScope | undefined {
    let activeView: RumViewScope | undefined
    for (const viewScope of this.activeViewScopes.values()) {
      if (!viewScope.stopped) activeView = viewScope
    }
    return activeView
  }

  getRumContext(): RumContext {
    return { ...this.parentScope.getRumContext(), sessionId: this.sessionId }
  }

  isFinished(): boolean {
    return false
  }

  handleEvent(event: RumRawEvent, writer: RumEventWriter): RumScope {
    if (event.type === 'reset-session') {
      this.sessionId = NULL_UUID
    }
    this.updateSessionIdIfNeeded(event)

    delegateToScopes(this.activeViewScopes, event, writer)

    if (event.type === 'start-view') {
      this.activeViewScopes.set(
        this.nextViewIndex++,
        RumViewScope.fromEvent(this, event, this.utilities),
      )
    }

    return this
  }

  private updateSessionIdIfNeeded(event: RumRawEvent) {
    const now = event.time
    const isNewSession = this.sessionId === NULL_UUID
    const isInactive =
      this.lastUserInteractionTime !== undefined &&
      now.now - this.lastUserInteractionTime.now >=
        this.utilities.sessionInactivityThreshold
    const isTooLong =
      this.sessionStartTime !== undefined &&
      now.now - this.sessionStartTime.now >= this.utilities.sessionMaxDuration

    if (isNewSession || isInactive || isTooLong) {
      const previousSessionId = this.sessionId
      this.sessionId = this.utilities.generateId()
      this.sessionStartTime = now
      this.lastUserInteractionTime = now
      this.utilities.onSessionRenewed?.(previousSessionId, this.sessionId)
    }

    if (isUserInteraction(event)) {
      this.lastUserInteractionTime = now
    }
  }
}
