import { NULL_UUID } from './constants'
import type { ApplicationStartedEvent, RumRawEvent } from './rawEventTypes'
import type { RumEventWriter, RumScope } from './RumScope'
import { RumSessionScope } from './RumSessionScope'
import type { RumContext, RumScopeUtilities, Timestamp } from './types'

/**
 * Root of the scope tree.
 */
export class RumApplicationScope implements RumScope {
  readonly sessionScope: RumSessionScope
  applicationDisplayed = false

  constructor(
    readonly applicationId: string,
    private readonly processStartTime: Timestamp,
    utilities: RumScopeUtilities,
  ) {
    this.sessionScope = new RumSessionScope(this, utilities)
  }

  getRumContext(): RumContext {
    return { applicationId: this.applicationId, sessionId: NULL_UUID }
  }

  isFinished(): boolean {
    return false
  }

  handleEvent(event: RumRawEvent, writer: RumEventWriter): RumScope {
    this.sessionScope.handleEvent(event, writer)

    // the first displayed view measures how long the application took to start
    if (event.type === 'start-view' && !this.applicationDisplayed) {
      this.applicationDisplayed = true
      const applicationStarted: ApplicationStartedEvent = {
        type: 'application-started',
        time: event.time,
        applicationStartTime: this.processStartTime,
      }
      this.sessionScope.handleEvent(applicationStarted, writer)
    }

    return this
  }
}
