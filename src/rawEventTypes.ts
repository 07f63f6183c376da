import type { Attributes, Timestamp } from './types'

export type RumActionType =
  | 'tap'
  | 'click'
  | 'scroll'
  | 'swipe'
  | 'back'
  | 'custom'
  | 'application_start'

export type RumResourceKind =
  | 'xhr'
  | 'fetch'
  | 'document'
  | 'image'
  | 'js'
  | 'font'
  | 'css'
  | 'media'
  | 'native'
  | 'other'
  | 'unknown'

export type RumErrorSource =
  | 'network'
  | 'source'
  | 'console'
  | 'logger'
  | 'agent'
  | 'webview'

export type ViewLoadingType =
  | 'initial_load'
  | 'route_change'
  | 'activity_display'
  | 'activity_redisplay'
  | 'fragment_display'
  | 'fragment_redisplay'
  | 'view_controller_display'
  | 'view_controller_redisplay'

/** categories of in-flight units a view keeps pending counters for */
export type RumEventCategory = 'action' | 'resource' | 'error' | 'long-task'

/**
 * phases of a network call, all values in nanoseconds.
 * a phase whose start is 0 is considered missing.
 */
export interface ResourceTiming {
  dnsStart: number
  dnsDuration: number
  connectStart: number
  connectDuration: number
  sslStart: number
  sslDuration: number
  firstByteStart: number
  firstByteDuration: number
  downloadStart: number
  downloadDuration: number
}

interface RawEventBase {
  time: Timestamp
}

export interface StartViewEvent extends RawEventBase {
  type: 'start-view'
  key: unknown
  name: string
  attributes: Attributes
}

export interface StopViewEvent extends RawEventBase {
  type: 'stop-view'
  /** undefined stops whichever view is current */
  key: unknown
  attributes: Attributes
}

export interface StartActionEvent extends RawEventBase {
  type: 'start-action'
  actionType: RumActionType
  name: string
  /** continuous actions stay open until an explicit stop-action */
  waitForStop: boolean
  attributes: Attributes
}

export interface StopActionEvent extends RawEventBase {
  type: 'stop-action'
  actionType?: RumActionType
  name?: string
  attributes: Attributes
}

export interface StartResourceEvent extends RawEventBase {
  type: 'start-resource'
  key: string
  url: string
  method: string
  attributes: Attributes
}

export interface WaitForResourceTimingEvent extends RawEventBase {
  type: 'wait-for-resource-timing'
  key: string
}

export interface AddResourceTimingEvent extends RawEventBase {
  type: 'add-resource-timing'
  key: string
  timing: ResourceTiming
}

export interface StopResourceEvent extends RawEventBase {
  type: 'stop-resource'
  key: string
  statusCode?: number
  size?: number
  kind: RumResourceKind
  attributes: Attributes
}

export interface StopResourceWithErrorEvent extends RawEventBase {
  type: 'stop-resource-with-error'
  key: string
  statusCode?: number
  message: string
  source: RumErrorSource
  error?: unknown
  attributes: Attributes
}

export interface AddErrorEvent extends RawEventBase {
  type: 'add-error'
  message?: string
  source: RumErrorSource
  /** the thrown value, if any */
  error?: unknown
  stacktrace?: string
  isFatal: boolean
  errorType?: string
  attributes: Attributes
}

export interface AddLongTaskEvent extends RawEventBase {
  type: 'add-long-task'
  durationNs: number
  target: string
}

export interface UpdateViewLoadingTimeEvent extends RawEventBase {
  type: 'update-view-loading-time'
  key: unknown
  loadingTimeNs: number
  loadingType: ViewLoadingType
}

export interface AddCustomTimingEvent extends RawEventBase {
  type: 'add-custom-timing'
  name: string
}

export interface KeepAliveEvent extends RawEventBase {
  type: 'keep-alive'
}

export interface ApplicationStartedEvent extends RawEventBase {
  type: 'application-started'
  applicationStartTime: Timestamp
}

export interface ResetSessionEvent extends RawEventBase {
  type: 'reset-session'
}

export interface ResourceSentEvent extends RawEventBase {
  type: 'resource-sent'
  viewId: string
}

export interface ActionSentEvent extends RawEventBase {
  type: 'action-sent'
  viewId: string
}

export interface ErrorSentEvent extends RawEventBase {
  type: 'error-sent'
  viewId: string
  isCrash: boolean
}

export interface LongTaskSentEvent extends RawEventBase {
  type: 'long-task-sent'
  viewId: string
}

export interface ResourceDroppedEvent extends RawEventBase {
  type: 'resource-dropped'
  viewId: string
}

export interface ActionDroppedEvent extends RawEventBase {
  type: 'action-dropped'
  viewId: string
}

export interface ErrorDroppedEvent extends RawEventBase {
  type: 'error-dropped'
  viewId: string
}

export interface LongTaskDroppedEvent extends RawEventBase {
  type: 'long-task-dropped'
  viewId: string
}

export type RumSentEvent =
  | ResourceSentEvent
  | ActionSentEvent
  | ErrorSentEvent
  | LongTaskSentEvent

export type RumDroppedEvent =
  | ResourceDroppedEvent
  | ActionDroppedEvent
  | ErrorDroppedEvent
  | LongTaskDroppedEvent

export type RumRawEvent =
  | StartViewEvent
  | StopViewEvent
  | StartActionEvent
  | StopActionEvent
  | StartResourceEvent
  | WaitForResourceTimingEvent
  | AddResourceTimingEvent
  | StopResourceEvent
  | StopResourceWithErrorEvent
  | AddErrorEvent
  | AddLongTaskEvent
  | UpdateViewLoadingTimeEvent
  | AddCustomTimingEvent
  | KeepAliveEvent
  | ApplicationStartedEvent
  | ResetSessionEvent
  | RumSentEvent
  | RumDroppedEvent

export type RumRawEventType = RumRawEvent['type']

const SENT_EVENT_TYPES = {
  action: 'action-sent',
  resource: 'resource-sent',
  error: 'error-sent',
  'long-task': 'long-task-sent',
} as const satisfies Record<RumEventCategory, RumSentEvent['type']>

const DROPPED_EVENT_TYPES = {
  action: 'action-dropped',
  resource: 'resource-dropped',
  error: 'error-dropped',
  'long-task': 'long-task-dropped',
} as const satisfies Record<RumEventCategory, RumDroppedEvent['type']>

/**
 * Builds the acknowledgement that resolves one pending unit of a view.
 */
export function createAcknowledgementEvent(
  outcome: 'sent' | 'dropped',
  category: RumEventCategory,
  viewId: string,
  time: Timestamp,
  isCrash = false,
): RumSentEvent | RumDroppedEvent {
  if (outcome === 'dropped') {
    return { type: DROPPED_EVENT_TYPES[category], viewId, time }
  }
  if (category === 'error') {
    return { type: 'error-sent', viewId, isCrash, time }
  }
  return { type: SENT_EVENT_TYPES[category], viewId, time }
}
