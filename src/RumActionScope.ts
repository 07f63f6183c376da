import { getClampedDurationNs } from './ensureTimestamp'
import type {
  AddErrorEvent,
  RumActionType,
  RumRawEvent,
  StartActionEvent,
  StartResourceEvent,
  StopActionEvent,
  StopResourceEvent,
  StopResourceWithErrorEvent,
} from './rawEventTypes'
import type { ActionEvent } from './rumEventTypes'
import { toRumUserInfo } from './rumEventUtils'
import type { RumContextProvider, RumEventWriter, RumScope } from './RumScope'
import type {
  Attributes,
  RumContext,
  RumScopeUtilities,
  Timestamp,
} from './types'

export interface RumActionScopeInput {
  actionType: RumActionType
  name: string
  startTime: Timestamp
  waitForStop: boolean
  attributes: Attributes
}

/**
 * A single user action. Lives until it is explicitly stopped, becomes inactive,
 * or outlives its max duration, then emits exactly one action record.
 *
 * Inactivity and max duration are evaluated whenever an event reaches the scope;
 * there is no timer, a keep-alive event is enough to close a stale action.
 */
export class RumActionScope implements RumScope {
  readonly actionId: string
  actionType: RumActionType
  name: string
  readonly startTime: Timestamp
  readonly waitForStop: boolean
  readonly attributes: Attributes

  lastInteractionTime: Timestamp
  /** keys of the resources started while this action was active */
  readonly ongoingResourceKeys = new Set<string>()

  resourceCount = 0
  errorCount = 0
  crashCount = 0
  longTaskCount = 0

  stopped = false
  sent = false

  constructor(
    private readonly parentScope: RumContextProvider,
    input: RumActionScopeInput,
    private readonly utilities: RumScopeUtilities,
  ) {
    this.actionId = utilities.generateId()
    this.actionType = input.actionType
    this.name = input.name
    this.startTime = input.startTime
    this.lastInteractionTime = input.startTime
    this.waitForStop = input.waitForStop
    this.attributes = { ...input.attributes }
  }

  static fromEvent(
    parentScope: RumContextProvider,
    event: StartActionEvent,
    utilities: RumScopeUtilities,
  ): RumActionScope {
    return new RumActionScope(
      parentScope,
      {
        actionType: event.actionType,
        name: event.name,
        startTime: event.time,
        waitForStop: event.waitForStop,
        attributes: event.attributes,
      },
      utilities,
    )
  }

  getRumContext(): RumContext {
    return { ...this.parentScope.getRumContext(), actionId: this.actionId }
  }

  isFinished(): boolean {
    return this.sent
  }

  handleEvent(event: RumRawEvent, writer: RumEventWriter): RumScope | undefined {
    const now = event.time
    const isInactive =
      now.now - this.lastInteractionTime.now >
      this.utilities.actionInactivityThreshold
    const isLongDuration =
      now.now - this.startTime.now > this.utilities.actionMaxDuration
    const isOngoing = this.waitForStop && !this.stopped
    const shouldStop =
      isInactive && this.ongoingResourceKeys.size === 0 && !isOngoing

    if (shouldStop) {
      this.sendAction(this.lastInteractionTime, writer)
    } else if (isLongDuration) {
      this.sendAction(now, writer)
    } else {
      switch (event.type) {
        case 'start-view':
        case 'stop-view':
          this.ongoingResourceKeys.clear()
          this.sendAction(now, writer)
          break
        case 'stop-action':
          this.onStopAction(event)
          break
        case 'start-resource':
          this.onStartResource(event)
          break
        case 'stop-resource':
          this.onStopResource(event)
          break
        case 'stop-resource-with-error':
          this.onStopResourceWithError(event)
          break
        case 'add-error':
          this.onAddError(event, writer)
          break
        case 'add-long-task':
          this.lastInteractionTime = now
          this.longTaskCount++
          break
        default:
          break
      }
    }

    return this.isFinished() ? undefined : this
  }

  private onStopAction(event: StopActionEvent) {
    if (event.actionType) this.actionType = event.actionType
    if (event.name !== undefined) this.name = event.name
    Object.assign(this.attributes, event.attributes)
    this.stopped = true
    this.lastInteractionTime = event.time
  }

  private onStartResource(event: StartResourceEvent) {
    // a key still in flight is rejected by the view
    if (this.ongoingResourceKeys.has(event.key)) return
    this.lastInteractionTime = event.time
    this.resourceCount++
    this.ongoingResourceKeys.add(event.key)
  }

  private onStopResource(event: StopResourceEvent) {
    if (this.ongoingResourceKeys.delete(event.key)) {
      this.lastInteractionTime = event.time
    }
  }

  private onStopResourceWithError(event: StopResourceWithErrorEvent) {
    if (this.ongoingResourceKeys.delete(event.key)) {
      this.lastInteractionTime = event.time
      // the resource turned into an error
      this.resourceCount--
      this.errorCount++
    }
  }

  private onAddError(event: AddErrorEvent, writer: RumEventWriter) {
    this.lastInteractionTime = event.time
    this.errorCount++
    if (event.isFatal) {
      this.crashCount++
      this.sendAction(event.time, writer)
    }
  }

  private sendAction(endTime: Timestamp, writer: RumEventWriter) {
    if (this.sent) return

    Object.assign(
      this.attributes,
      this.utilities.globalAttributes.getGlobalAttributes(),
    )
    const context = this.getRumContext()
    const user = this.utilities.userInfoProvider.getUserInfo()

    const actionEvent: ActionEvent = {
      type: 'action',
      date: this.startTime.epoch,
      action: {
        id: this.actionId,
        type: this.actionType,
        target: { name: this.name },
        loadingTime: getClampedDurationNs(this.startTime, endTime),
        resource: { count: this.resourceCount },
        error: { count: this.errorCount },
        crash: { count: this.crashCount },
        longTask: { count: this.longTaskCount },
      },
      view: {
        id: context.viewId ?? '',
        name: context.viewName,
        url: context.viewUrl ?? '',
      },
      application: { id: context.applicationId },
      session: { id: context.sessionId, type: 'user' },
      usr: toRumUserInfo(user),
    }

    writer.write({
      event: actionEvent,
      globalAttributes: { ...this.attributes },
      userExtraAttributes: user.additionalProperties,
    })
    this.sent = true
  }
}
