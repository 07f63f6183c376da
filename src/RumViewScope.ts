import { LONG_TASK_TARGET_ATTRIBUTE } from './constants'
import {
  getClampedDurationNs,
  toMilliseconds,
  toNanoseconds,
} from './ensureTimestamp'
import { createKeyRef, type KeyRef, resolveViewUrl } from './keyRef'
import type {
  AddCustomTimingEvent,
  AddErrorEvent,
  AddLongTaskEvent,
  ApplicationStartedEvent,
  ErrorSentEvent,
  RumActionType,
  RumDroppedEvent,
  RumRawEvent,
  RumSentEvent,
  StartActionEvent,
  StartResourceEvent,
  StartViewEvent,
  StopViewEvent,
  UpdateViewLoadingTimeEvent,
  ViewLoadingType,
} from './rawEventTypes'
import { RumActionScope } from './RumActionScope'
import type {
  ActionEvent,
  ErrorEvent,
  LongTaskEvent,
  ViewEvent,
} from './rumEventTypes'
import {
  getErrorStack,
  getErrorType,
  mergeWithGlobalAttributes,
  notifyDropped,
  resolveErrorMessage,
  toConnectivityInfo,
  toRumUserInfo,
} from './rumEventUtils'
import { RumResourceScope } from './RumResourceScope'
import {
  delegateToScopes,
  type RumContextProvider,
  type RumEventWriter,
  type RumScope,
} from './RumScope'
import type {
  Attributes,
  RumContext,
  RumScopeUtilities,
  Timestamp,
} from './types'

export const getActionDroppedWarning = (
  actionType: RumActionType,
  name: string,
) =>
  `RUM Action (${actionType} on ${name}) was dropped, because another action is still active for the same view`

export const getResourceDroppedWarning = (key: string) =>
  `RUM Resource (${key}) was dropped, because another resource with the same key is still active for the same view`

export interface RumViewScopeInput {
  keyRef: KeyRef
  name: string
  url: string
  startTime: Timestamp
  attributes: Attributes
}

/**
 * A view stays "current" until another view starts or it is explicitly stopped.
 * Once stopped, it lingers until every resource it started has ended
 * and every record it's waiting on has been acknowledged as sent or dropped.
 *
 * Each record emitted for the view carries a strictly increasing document version;
 * the latest version describes the cumulative state of the view.
 */
export class RumViewScope implements RumScope {
  readonly keyRef: KeyRef
  readonly name: string
  readonly url: string
  readonly startTime: Timestamp
  readonly attributes: Attributes

  /** the session the current view id was issued for */
  private sessionId: string
  private currentViewId: string
  get viewId(): string {
    return this.currentViewId
  }

  activeActionScope: RumActionScope | undefined
  readonly activeResourceScopes = new Map<string, RumResourceScope>()

  resourceCount = 0
  actionCount = 0
  errorCount = 0
  crashCount = 0
  longTaskCount = 0

  pendingResourceCount = 0
  pendingActionCount = 0
  pendingErrorCount = 0
  pendingLongTaskCount = 0

  version = 1
  loadingTime: number | undefined
  loadingType: ViewLoadingType | undefined
  readonly customTimings = new Map<string, number>()

  stopped = false

  constructor(
    private readonly parentScope: RumContextProvider,
    input: RumViewScopeInput,
    private readonly utilities: RumScopeUtilities,
  ) {
    this.keyRef = input.keyRef
    this.name = input.name
    this.url = input.url
    this.startTime = input.startTime
    this.attributes = mergeWithGlobalAttributes(
      input.attributes,
      utilities.globalAttributes.getGlobalAttributes(),
    )
    this.sessionId = parentScope.getRumContext().sessionId
    this.currentViewId = utilities.generateId()
  }

  static fromEvent(
    parentScope: RumContextProvider,
    event: StartViewEvent,
    utilities: RumScopeUtilities,
  ): RumViewScope {
    return new RumViewScope(
      parentScope,
      {
        keyRef: createKeyRef(event.key),
        name: event.name,
        url: resolveViewUrl(event.key, event.name),
        startTime: event.time,
        attributes: event.attributes,
      },
      utilities,
    )
  }

  /**
   * A session change invalidates the identifiers issued under the previous session,
   * so the view picks a new id the first time it notices the rotation.
   */
  getRumContext(): RumContext {
    const parentContext = this.parentScope.getRumContext()
    if (parentContext.sessionId !== this.sessionId) {
      this.sessionId = parentContext.sessionId
      this.currentViewId = this.utilities.generateId()
    }

    return {
      ...parentContext,
      viewId: this.currentViewId,
      viewName: this.name,
      viewUrl: this.url,
      actionId: this.activeActionScope?.actionId,
    }
  }

  isFinished(): boolean {
    const pending =
      this.pendingActionCount +
      this.pendingResourceCount +
      this.pendingErrorCount +
      this.pendingLongTaskCount
    // <= 0 so that a miscounted view still gets closed
    return this.stopped && this.activeResourceScopes.size === 0 && pending <= 0
  }

  handleEvent(event: RumRawEvent, writer: RumEventWriter): RumScope | undefined {
    if (event.type === 'start-view') {
      this.onStartView(event, writer)
      return this.isFinished() ? undefined : this
    }

    const erroredResourceKey =
      event.type === 'stop-resource-with-error' &&
      this.activeResourceScopes.has(event.key)
        ? event.key
        : undefined

    // completion signals are only meaningful to the descendant owning the matching key,
    // so children see every event before this view acts on it
    this.delegateEventToChildren(event, writer)

    switch (event.type) {
      case 'stop-view':
        this.onStopView(event, writer)
        break
      case 'start-action':
        this.onStartAction(event)
        break
      case 'start-resource':
        this.onStartResource(event)
        break
      case 'stop-resource-with-error':
        if (
          erroredResourceKey !== undefined &&
          !this.activeResourceScopes.has(erroredResourceKey)
        ) {
          // the resource ended as an error record: its pending unit now awaits an error acknowledgement
          this.pendingResourceCount--
          this.pendingErrorCount++
        }
        break
      case 'add-error':
        this.onAddError(event, writer)
        break
      case 'add-long-task':
        this.onAddLongTask(event, writer)
        break
      case 'application-started':
        this.onApplicationStarted(event, writer)
        break
      case 'update-view-loading-time':
        this.onUpdateViewLoadingTime(event, writer)
        break
      case 'add-custom-timing':
        this.onAddCustomTiming(event, writer)
        break
      case 'keep-alive':
        if (!this.stopped) this.sendViewUpdate(event, writer)
        break
      case 'resource-sent':
      case 'action-sent':
      case 'error-sent':
      case 'long-task-sent':
        this.onEventSent(event, writer)
        break
      case 'resource-dropped':
      case 'action-dropped':
      case 'error-dropped':
      case 'long-task-dropped':
        this.onEventDropped(event)
        break
      default:
        break
    }

    return this.isFinished() ? undefined : this
  }

  private delegateEventToChildren(event: RumRawEvent, writer: RumEventWriter) {
    delegateToScopes(this.activeResourceScopes, event, writer)

    const currentAction = this.activeActionScope
    if (currentAction && !currentAction.handleEvent(event, writer)) {
      this.activeActionScope = undefined
    }
  }

  private onStartView(event: StartViewEvent, writer: RumEventWriter) {
    if (this.stopped) return

    this.stopped = true
    this.sendViewUpdate(event, writer)
    this.delegateEventToChildren(event, writer)
  }

  private onStopView(event: StopViewEvent, writer: RumEventWriter) {
    const startedKey = this.keyRef.deref()
    // a reclaimed key can't be compared anymore, it counts as a match
    const shouldStop =
      event.key === undefined ||
      startedKey === undefined ||
      event.key === startedKey
    if (shouldStop && !this.stopped) {
      Object.assign(this.attributes, event.attributes)
      this.stopped = true
      this.sendViewUpdate(event, writer)
    }
  }

  private onStartAction(event: StartActionEvent) {
    if (this.stopped) return

    if (this.activeActionScope) {
      this.utilities.reportWarningFn(
        new Error(getActionDroppedWarning(event.actionType, event.name)),
      )
      notifyDropped(this.utilities, this.viewId, 'action')
      return
    }

    this.activeActionScope = RumActionScope.fromEvent(
      this,
      event,
      this.utilities,
    )
    this.pendingActionCount++
  }

  private onStartResource(event: StartResourceEvent) {
    if (this.stopped) return

    if (this.activeResourceScopes.has(event.key)) {
      this.utilities.reportWarningFn(
        new Error(getResourceDroppedWarning(event.key)),
      )
      notifyDropped(this.utilities, this.viewId, 'resource')
      return
    }

    this.activeResourceScopes.set(
      event.key,
      RumResourceScope.fromEvent(this, event, this.utilities),
    )
    this.pendingResourceCount++
  }

  private onAddError(event: AddErrorEvent, writer: RumEventWriter) {
    if (this.stopped) return

    const context = this.getRumContext()
    const user = this.utilities.userInfoProvider.getUserInfo()
    const networkInfo = this.utilities.networkInfoProvider.getLatestNetworkInfo()

    const errorEvent: ErrorEvent = {
      type: 'error',
      date: event.time.epoch,
      error: {
        message: resolveErrorMessage(event.message, event.error, event.isFatal),
        source: event.source,
        stack: event.stacktrace ?? getErrorStack(event.error),
        isCrash: event.isFatal,
        type: event.errorType ?? getErrorType(event.error),
      },
      action: context.actionId ? { id: context.actionId } : undefined,
      view: {
        id: context.viewId ?? '',
        name: context.viewName,
        url: context.viewUrl ?? '',
      },
      application: { id: context.applicationId },
      session: { id: context.sessionId, type: 'user' },
      usr: toRumUserInfo(user),
      connectivity: toConnectivityInfo(networkInfo),
    }

    writer.write({
      event: errorEvent,
      globalAttributes: mergeWithGlobalAttributes(
        event.attributes,
        this.utilities.globalAttributes.getGlobalAttributes(),
      ),
      userExtraAttributes: user.additionalProperties,
    })
    this.pendingErrorCount++
  }

  private onAddLongTask(event: AddLongTaskEvent, writer: RumEventWriter) {
    if (this.stopped) return

    const context = this.getRumContext()
    const user = this.utilities.userInfoProvider.getUserInfo()
    const networkInfo = this.utilities.networkInfoProvider.getLatestNetworkInfo()

    const longTaskEvent: LongTaskEvent = {
      type: 'long_task',
      date: event.time.epoch - toMilliseconds(event.durationNs),
      longTask: { duration: event.durationNs },
      action: context.actionId ? { id: context.actionId } : undefined,
      view: {
        id: context.viewId ?? '',
        name: context.viewName,
        url: context.viewUrl ?? '',
      },
      application: { id: context.applicationId },
      session: { id: context.sessionId, type: 'user' },
      usr: toRumUserInfo(user),
      connectivity: toConnectivityInfo(networkInfo),
    }

    writer.write({
      event: longTaskEvent,
      globalAttributes: mergeWithGlobalAttributes(
        { [LONG_TASK_TARGET_ATTRIBUTE]: event.target },
        this.utilities.globalAttributes.getGlobalAttributes(),
      ),
      userExtraAttributes: user.additionalProperties,
    })
    this.pendingLongTaskCount++
  }

  /**
   * The application start is reported as an action of its own,
   * outside of the regular action lifecycle.
   */
  private onApplicationStarted(
    event: ApplicationStartedEvent,
    writer: RumEventWriter,
  ) {
    this.pendingActionCount++
    const context = this.getRumContext()
    const user = this.utilities.userInfoProvider.getUserInfo()

    const actionEvent: ActionEvent = {
      type: 'action',
      date: this.startTime.epoch,
      action: {
        id: this.utilities.generateId(),
        type: 'application_start',
        loadingTime: getClampedDurationNs(
          event.applicationStartTime,
          event.time,
        ),
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
      globalAttributes: {
        ...this.utilities.globalAttributes.getGlobalAttributes(),
      },
      userExtraAttributes: user.additionalProperties,
    })
  }

  /**
   * Only an exact key match updates the loading time,
   * unlike stop-view a reclaimed key is not a match here.
   */
  private onUpdateViewLoadingTime(
    event: UpdateViewLoadingTimeEvent,
    writer: RumEventWriter,
  ) {
    if (event.key !== this.keyRef.deref()) return

    this.loadingTime = event.loadingTimeNs
    this.loadingType = event.loadingType
    this.sendViewUpdate(event, writer)
  }

  private onAddCustomTiming(
    event: AddCustomTimingEvent,
    writer: RumEventWriter,
  ) {
    this.customTimings.set(
      event.name,
      getClampedDurationNs(this.startTime, event.time),
    )
    this.sendViewUpdate(event, writer)
  }

  private onEventSent(event: RumSentEvent, writer: RumEventWriter) {
    if (event.viewId !== this.viewId) return

    switch (event.type) {
      case 'resource-sent':
        this.pendingResourceCount--
        this.resourceCount++
        break
      case 'action-sent':
        this.pendingActionCount--
        this.actionCount++
        break
      case 'error-sent':
        this.onErrorSent(event)
        break
      case 'long-task-sent':
        this.pendingLongTaskCount--
        this.longTaskCount++
        break
      default:
        break
    }
    this.sendViewUpdate(event, writer)
  }

  private onErrorSent(event: ErrorSentEvent) {
    this.pendingErrorCount--
    this.errorCount++
    if (event.isCrash) this.crashCount++
  }

  private onEventDropped(event: RumDroppedEvent) {
    if (event.viewId !== this.viewId) return

    switch (event.type) {
      case 'resource-dropped':
        this.pendingResourceCount--
        break
      case 'action-dropped':
        this.pendingActionCount--
        break
      case 'error-dropped':
        this.pendingErrorCount--
        break
      case 'long-task-dropped':
        this.pendingLongTaskCount--
        break
      default:
        break
    }
  }

  private sendViewUpdate(event: RumRawEvent, writer: RumEventWriter) {
    // global attributes added since the last update show up from now on
    Object.assign(
      this.attributes,
      this.utilities.globalAttributes.getGlobalAttributes(),
    )
    this.version++
    const context = this.getRumContext()
    const user = this.utilities.userInfoProvider.getUserInfo()

    const viewEvent: ViewEvent = {
      type: 'view',
      date: this.startTime.epoch,
      view: {
        id: context.viewId ?? '',
        name: context.viewName ?? '',
        url: context.viewUrl ?? '',
        loadingTime: this.loadingTime,
        loadingType: this.loadingType,
        timeSpent: toNanoseconds(event.time.now - this.startTime.now),
        action: { count: this.actionCount },
        resource: { count: this.resourceCount },
        error: { count: this.errorCount },
        crash: { count: this.crashCount },
        longTask: { count: this.longTaskCount },
        customTimings:
          this.customTimings.size > 0
            ? Object.fromEntries(this.customTimings)
            : undefined,
        isActive: !this.stopped,
      },
      application: { id: context.applicationId },
      session: { id: context.sessionId, type: 'user' },
      usr: toRumUserInfo(user),
      dd: { documentVersion: this.version },
    }

    writer.write({
      event: viewEvent,
      globalAttributes: { ...this.attributes },
      userExtraAttributes: user.additionalProperties,
    })
  }
}
