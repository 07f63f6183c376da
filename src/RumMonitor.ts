import { randomUUID } from 'node:crypto'
import type { Observable, Subscription } from 'rxjs'
import { observeOn, queueScheduler, Subject } from 'rxjs'
import {
  DEFAULT_ACTION_INACTIVITY_THRESHOLD,
  DEFAULT_ACTION_MAX_DURATION,
  DEFAULT_SESSION_INACTIVITY_THRESHOLD,
  DEFAULT_SESSION_MAX_DURATION,
} from './constants'
import { ensureTimestamp } from './ensureTimestamp'
import { GlobalAttributes } from './GlobalAttributes'
import type {
  ResourceTiming,
  RumActionType,
  RumErrorSource,
  RumEventCategory,
  RumRawEvent,
  RumResourceKind,
  ViewLoadingType,
} from './rawEventTypes'
import { createAcknowledgementEvent } from './rawEventTypes'
import { RumApplicationScope } from './RumApplicationScope'
import { RumDataWriter, type RumRecordDropReason } from './RumDataWriter'
import { RumEventMapper } from './RumEventMapper'
import type { RumEvent } from './rumEventTypes'
import { getCrashMessage } from './rumEventUtils'
import type {
  Attributes,
  ReportErrorFn,
  RumContext,
  RumMonitorConfig,
  RumScopeUtilities,
  Timestamp,
} from './types'

export interface RumEventProcessedEvent {
  event: RumRawEvent
  /** context of the active view once the event went through the scope tree */
  rumContext: RumContext
}

export interface RumRecordDroppedEvent {
  rumEvent: RumEvent
  reason: RumRecordDropReason
}

export interface RumSessionRenewedEvent {
  previousSessionId: string
  sessionId: string
}

export interface StopResourceInput {
  statusCode?: number
  size?: number
  kind?: RumResourceKind
  attributes?: Attributes
}

export interface StopResourceWithErrorInput {
  message: string
  source: RumErrorSource
  statusCode?: number
  error?: unknown
  attributes?: Attributes
}

export interface AddErrorInput {
  message?: string
  source: RumErrorSource
  error?: unknown
  stacktrace?: string
  errorType?: string
  attributes?: Attributes
}

const toError = (error: unknown) =>
  error instanceof Error
    ? error
    : new Error(`RUM event processing failed: ${String(error)}`)

/**
 * Entry point of the library. Usually you'll have a single instance of this class in your app.
 *
 * Every call is turned into a raw event and handed off to a single lane,
 * which feeds the scope tree one event at a time, in submission order.
 * Events submitted while another one is being processed
 * (e.g. the acknowledgement of a record that was just written) wait for their turn.
 */
export class RumMonitor {
  readonly applicationScope: RumApplicationScope
  private readonly utilities: RumScopeUtilities
  private readonly writer: RumDataWriter
  private readonly getTimestamp: () => Timestamp

  private readonly rawEvents = new Subject<RumRawEvent>()
  private readonly subscription: Subscription

  private eventSubjects = {
    'event-processed': new Subject<RumEventProcessedEvent>(),
    'record-written': new Subject<RumEvent>(),
    'record-dropped': new Subject<RumRecordDroppedEvent>(),
    'session-renewed': new Subject<RumSessionRenewedEvent>(),
  }

  constructor(config: RumMonitorConfig) {
    this.getTimestamp = config.getTimestamp ?? (() => ensureTimestamp())
    const reportWarningFn: ReportErrorFn =
      // by default noop for warnings
      config.reportWarningFn ?? (() => {})

    this.utilities = {
      generateId: config.generateId ?? (() => randomUUID()),
      globalAttributes: config.globalAttributes ?? new GlobalAttributes(),
      userInfoProvider: config.userInfoProvider ?? {
        getUserInfo: () => ({ additionalProperties: {} }),
      },
      networkInfoProvider: config.networkInfoProvider ?? {
        getLatestNetworkInfo: () => ({ connectivity: 'unknown' }),
      },
      firstPartyHostDetector: config.firstPartyHostDetector ?? {
        isFirstPartyUrl: () => false,
      },
      droppedEventListener: config.droppedEventListener,
      reportErrorFn: config.reportErrorFn,
      reportWarningFn,
      sessionInactivityThreshold:
        config.sessionInactivityThreshold ??
        DEFAULT_SESSION_INACTIVITY_THRESHOLD,
      sessionMaxDuration:
        config.sessionMaxDuration ?? DEFAULT_SESSION_MAX_DURATION,
      actionInactivityThreshold:
        config.actionInactivityThreshold ?? DEFAULT_ACTION_INACTIVITY_THRESHOLD,
      actionMaxDuration: config.actionMaxDuration ?? DEFAULT_ACTION_MAX_DURATION,
      onSessionRenewed: (previousSessionId, sessionId) => {
        this.eventSubjects['session-renewed'].next({
          previousSessionId,
          sessionId,
        })
      },
    }

    this.writer = new RumDataWriter({
      sink: config.sink,
      eventMapper: new RumEventMapper(
        config.eventMappers ?? {},
        reportWarningFn,
      ),
      onAcknowledge: (event) => {
        this.handleEvent(event)
      },
      getTimestamp: this.getTimestamp,
      reportErrorFn: config.reportErrorFn,
      droppedEventListener: config.droppedEventListener,
      onRecordWritten: (rumEvent) => {
        this.eventSubjects['record-written'].next(rumEvent)
      },
      onRecordDropped: (rumEvent, reason) => {
        this.eventSubjects['record-dropped'].next({ rumEvent, reason })
      },
    })

    this.applicationScope = new RumApplicationScope(
      config.applicationId,
      config.processStartTime ?? this.getTimestamp(),
      this.utilities,
    )

    this.subscription = this.rawEvents
      .pipe(observeOn(queueScheduler))
      .subscribe((event) => {
        this.processEvent(event)
      })
  }

  private processEvent(event: RumRawEvent) {
    try {
      this.applicationScope.handleEvent(event, this.writer)
    } catch (error) {
      // the lane must survive a failing event
      this.utilities.reportErrorFn(toError(error))
      return
    }
    this.eventSubjects['event-processed'].next({
      event,
      rumContext: this.getRumContext(),
    })
  }

  /**
   * Observable for the lifecycle of the monitor
   * @param event The event type to observe
   * @returns An Observable that emits events of the specified type
   */
  when(event: 'event-processed'): Observable<RumEventProcessedEvent>
  when(event: 'record-written'): Observable<RumEvent>
  when(event: 'record-dropped'): Observable<RumRecordDroppedEvent>
  when(event: 'session-renewed'): Observable<RumSessionRenewedEvent>
  when(
    event:
      | 'event-processed'
      | 'record-written'
      | 'record-dropped'
      | 'session-renewed',
  ):
    | Observable<RumEventProcessedEvent>
    | Observable<RumEvent>
    | Observable<RumRecordDroppedEvent>
    | Observable<RumSessionRenewedEvent> {
    return this.eventSubjects[event].asObservable()
  }

  /** submits a raw event to the lane; it's processed once every event submitted before it is */
  handleEvent(event: RumRawEvent): void {
    if (this.subscription.closed) return
    this.rawEvents.next(event)
  }

  /** context of the current view, or of the session when no view is active */
  getRumContext(): RumContext {
    const { sessionScope } = this.applicationScope
    return (sessionScope.activeViewScope ?? sessionScope).getRumContext()
  }

  startView(key: unknown, name: string, attributes: Attributes = {}): void {
    this.handleEvent({
      type: 'start-view',
      key,
      name,
      attributes,
      time: this.getTimestamp(),
    })
  }

  /** stops the view started with the given key; an undefined key stops the current one */
  stopView(key: unknown, attributes: Attributes = {}): void {
    this.handleEvent({
      type: 'stop-view',
      key,
      attributes,
      time: this.getTimestamp(),
    })
  }

  /** a discrete action, which ends once the activity it caused settles */
  addUserAction(
    actionType: RumActionType,
    name: string,
    attributes: Attributes = {},
  ): void {
    this.handleEvent({
      type: 'start-action',
      actionType,
      name,
      waitForStop: false,
      attributes,
      time: this.getTimestamp(),
    })
  }

  /** a continuous action (e.g. a scroll), which stays open until `stopUserAction` */
  startUserAction(
    actionType: RumActionType,
    name: string,
    attributes: Attributes = {},
  ): void {
    this.handleEvent({
      type: 'start-action',
      actionType,
      name,
      waitForStop: true,
      attributes,
      time: this.getTimestamp(),
    })
  }

  stopUserAction(
    actionType?: RumActionType,
    name?: string,
    attributes: Attributes = {},
  ): void {
    this.handleEvent({
      type: 'stop-action',
      actionType,
      name,
      attributes,
      time: this.getTimestamp(),
    })
  }

  startResource(
    key: string,
    method: string,
    url: string,
    attributes: Attributes = {},
  ): void {
    this.handleEvent({
      type: 'start-resource',
      key,
      method,
      url,
      attributes,
      time: this.getTimestamp(),
    })
  }

  /** the resource record will be held back until `addResourceTiming` is called for the same key */
  waitForResourceTiming(key: string): void {
    this.handleEvent({
      type: 'wait-for-resource-timing',
      key,
      time: this.getTimestamp(),
    })
  }

  addResourceTiming(key: string, timing: ResourceTiming): void {
    this.handleEvent({
      type: 'add-resource-timing',
      key,
      timing,
      time: this.getTimestamp(),
    })
  }

  stopResource(
    key: string,
    { statusCode, size, kind = 'unknown', attributes = {} }: StopResourceInput = {},
  ): void {
    this.handleEvent({
      type: 'stop-resource',
      key,
      statusCode,
      size,
      kind,
      attributes,
      time: this.getTimestamp(),
    })
  }

  stopResourceWithError(
    key: string,
    {
      message,
      source,
      statusCode,
      error,
      attributes = {},
    }: StopResourceWithErrorInput,
  ): void {
    this.handleEvent({
      type: 'stop-resource-with-error',
      key,
      message,
      source,
      statusCode,
      error,
      attributes,
      time: this.getTimestamp(),
    })
  }

  addError({
    message,
    source,
    error,
    stacktrace,
    errorType,
    attributes = {},
  }: AddErrorInput): void {
    this.handleEvent({
      type: 'add-error',
      message,
      source,
      error,
      stacktrace,
      errorType,
      isFatal: false,
      attributes,
      time: this.getTimestamp(),
    })
  }

  addErrorWithStacktrace(
    message: string,
    source: RumErrorSource,
    stacktrace: string | undefined,
    attributes: Attributes = {},
  ): void {
    this.addError({ message, source, stacktrace, attributes })
  }

  /** reports an uncaught error; fatal errors also count as crashes on the view */
  addCrash(error: unknown, attributes: Attributes = {}): void {
    this.handleEvent({
      type: 'add-error',
      message: getCrashMessage(error),
      source: 'source',
      error,
      isFatal: true,
      attributes,
      time: this.getTimestamp(),
    })
  }

  addLongTask(durationNs: number, target: string): void {
    this.handleEvent({
      type: 'add-long-task',
      durationNs,
      target,
      time: this.getTimestamp(),
    })
  }

  /** records the time elapsed since the start of the current view under the given name */
  addTiming(name: string): void {
    this.handleEvent({
      type: 'add-custom-timing',
      name,
      time: this.getTimestamp(),
    })
  }

  updateViewLoadingTime(
    key: unknown,
    loadingTimeNs: number,
    loadingType: ViewLoadingType,
  ): void {
    this.handleEvent({
      type: 'update-view-loading-time',
      key,
      loadingTimeNs,
      loadingType,
      time: this.getTimestamp(),
    })
  }

  /** refreshes the view records, e.g. to extend their time spent */
  keepAlive(): void {
    this.handleEvent({ type: 'keep-alive', time: this.getTimestamp() })
  }

  /** the next event will start a new session */
  resetSession(): void {
    this.handleEvent({ type: 'reset-session', time: this.getTimestamp() })
  }

  /** for instrumentation writing records outside of the scope tree */
  eventSent(viewId: string, category: RumEventCategory, isCrash = false): void {
    this.handleEvent(
      createAcknowledgementEvent(
        'sent',
        category,
        viewId,
        this.getTimestamp(),
        isCrash,
      ),
    )
  }

  eventDropped(viewId: string, category: RumEventCategory): void {
    this.handleEvent(
      createAcknowledgementEvent(
        'dropped',
        category,
        viewId,
        this.getTimestamp(),
      ),
    )
  }

  /** stops the lane; later calls are ignored */
  dispose(): void {
    this.subscription.unsubscribe()
    this.rawEvents.complete()
    for (const subject of Object.values(this.eventSubjects)) {
      subject.complete()
    }
  }
}
