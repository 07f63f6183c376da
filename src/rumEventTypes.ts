import type {
  RumActionType,
  RumErrorSource,
  RumEventCategory,
  RumResourceKind,
  ViewLoadingType,
} from './rawEventTypes'
import type { Attributes, Connectivity } from './types'

export interface RumApplicationInfo {
  id: string
}

export interface RumSessionInfo {
  id: string
  type: 'user'
}

export interface RumViewInfo {
  id: string
  name?: string
  url: string
}

export interface RumUserInfo {
  id?: string
  name?: string
  email?: string
}

export interface RumConnectivityInfo {
  status: 'connected' | 'not_connected' | 'maybe'
  interfaces: Connectivity[]
  carrierName?: string
}

interface RumEventBase {
  /** epoch ms */
  date: number
  application: RumApplicationInfo
  session: RumSessionInfo
  usr: RumUserInfo
}

export interface ViewEvent extends RumEventBase {
  type: 'view'
  view: RumViewInfo & {
    name: string
    loadingTime?: number
    loadingType?: ViewLoadingType
    /** ns */
    timeSpent: number
    action: { count: number }
    resource: { count: number }
    error: { count: number }
    crash: { count: number }
    longTask: { count: number }
    customTimings?: Record<string, number>
    isActive: boolean
  }
  dd: { documentVersion: number }
}

export interface ActionEvent extends RumEventBase {
  type: 'action'
  action: {
    id: string
    type: RumActionType
    target?: { name: string }
    /** ns */
    loadingTime?: number
    resource?: { count: number }
    error?: { count: number }
    crash?: { count: number }
    longTask?: { count: number }
  }
  view: RumViewInfo
}

export interface RumResourceProvider {
  domain?: string
  type: 'first_party'
}

interface RumTimingPhase {
  /** ns, relative to the resource start */
  start: number
  /** ns */
  duration: number
}

export interface ResourceEvent extends RumEventBase {
  type: 'resource'
  resource: {
    id: string
    type: RumResourceKind
    url: string
    method: string
    statusCode?: number
    size?: number
    /** ns */
    duration: number
    dns?: RumTimingPhase
    connect?: RumTimingPhase
    ssl?: RumTimingPhase
    firstByte?: RumTimingPhase
    download?: RumTimingPhase
    provider?: RumResourceProvider
  }
  action?: { id: string }
  view: RumViewInfo
  connectivity: RumConnectivityInfo
}

export interface ErrorEvent extends RumEventBase {
  type: 'error'
  error: {
    message: string
    source: RumErrorSource
    stack?: string
    isCrash: boolean
    type?: string
    resource?: {
      method: string
      statusCode?: number
      url: string
      provider?: RumResourceProvider
    }
  }
  action?: { id: string }
  view: RumViewInfo
  connectivity: RumConnectivityInfo
}

export interface LongTaskEvent extends RumEventBase {
  type: 'long_task'
  longTask: {
    /** ns */
    duration: number
  }
  action?: { id: string }
  view: RumViewInfo
  connectivity: RumConnectivityInfo
}

export type RumEventPayload =
  | ViewEvent
  | ActionEvent
  | ResourceEvent
  | ErrorEvent
  | LongTaskEvent

export type RumEventPayloadType = RumEventPayload['type']

/**
 * A record as handed to the sink: the bundled event plus the attribute bags
 * that get flattened into it at serialization time.
 */
export interface RumEvent<EventT extends RumEventPayload = RumEventPayload> {
  event: EventT
  globalAttributes: Attributes
  userExtraAttributes: Attributes
}

/**
 * @returns the pending-counter category a record resolves, undefined for view records
 */
export function getEventCategory(
  event: RumEventPayload,
): RumEventCategory | undefined {
  switch (event.type) {
    case 'action':
      return 'action'
    case 'resource':
      return 'resource'
    case 'error':
      return 'error'
    case 'long_task':
      return 'long-task'
    default:
      return undefined
  }
}
