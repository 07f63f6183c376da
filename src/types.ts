import type { RumEventCategory } from './rawEventTypes'
import type { RumEventMappers } from './RumEventMapper'
import type { RumEvent } from './rumEventTypes'

export interface Timestamp {
  // absolute count of ms from epoch
  epoch: number
  // performance.now() time
  now: number
}

// eslint-disable-next-line @typescript-eslint/consistent-indexed-object-style
export interface Attributes {
  [key: string]: unknown
}

/**
 * Immutable snapshot of the identifiers that are active at a given level of the scope tree.
 * Computed top-down on every request, never stored by the scopes.
 */
export interface RumContext {
  readonly applicationId: string
  readonly sessionId: string
  readonly viewId?: string
  readonly viewName?: string
  readonly viewUrl?: string
  readonly actionId?: string
}

export interface UserInfo {
  id?: string
  name?: string
  email?: string
  additionalProperties: Attributes
}

export type Connectivity =
  | 'wifi'
  | 'cellular'
  | 'ethernet'
  | 'other'
  | 'none'
  | 'unknown'

export interface NetworkInfo {
  connectivity: Connectivity
  carrierName?: string
}

export interface UserInfoProvider {
  getUserInfo: () => UserInfo
}

export interface NetworkInfoProvider {
  getLatestNetworkInfo: () => NetworkInfo
}

/**
 * Process-wide attributes, read (never written) by the scopes when they emit a record.
 */
export interface GlobalAttributesProvider {
  getGlobalAttributes: () => Readonly<Attributes>
}

export interface FirstPartyHostDetector {
  isFirstPartyUrl: (url: string) => boolean
}

/**
 * Final destination of the records, typically a persistence layer.
 * Must not block; failures are its own concern.
 */
export interface RumEventSink {
  write: (rumEvent: RumEvent) => void
}

/**
 * Best-effort signal used by external instrumentation to count records
 * that never made it to the sink.
 */
export interface DroppedEventListener {
  notifyDropped: (viewId: string, category: RumEventCategory) => void
}

export type ReportErrorFn = (error: Error) => void

/**
 * Read-only capabilities threaded into every scope at construction.
 * Scopes only ever read through these, at the moment they emit a record.
 */
export interface RumScopeUtilities {
  readonly generateId: () => string
  readonly globalAttributes: GlobalAttributesProvider
  readonly userInfoProvider: UserInfoProvider
  readonly networkInfoProvider: NetworkInfoProvider
  readonly firstPartyHostDetector: FirstPartyHostDetector
  readonly droppedEventListener?: DroppedEventListener
  readonly reportErrorFn: ReportErrorFn
  readonly reportWarningFn: ReportErrorFn
  readonly sessionInactivityThreshold: number
  readonly sessionMaxDuration: number
  readonly actionInactivityThreshold: number
  readonly actionMaxDuration: number
  readonly onSessionRenewed?: (previousSessionId: string, sessionId: string) => void
}

export interface RumMonitorConfig {
  applicationId: string

  sink: RumEventSink

  reportErrorFn: ReportErrorFn
  /** developer-facing warnings, e.g. an action dropped because another one is active. no-op by default */
  reportWarningFn?: ReportErrorFn

  /** defaults to random UUIDs */
  generateId?: () => string
  /** defaults to the current time */
  getTimestamp?: () => Timestamp
  /** when the process started, used for the application start action. defaults to the monitor's creation time */
  processStartTime?: Timestamp

  globalAttributes?: GlobalAttributesProvider
  userInfoProvider?: UserInfoProvider
  networkInfoProvider?: NetworkInfoProvider
  firstPartyHostDetector?: FirstPartyHostDetector
  droppedEventListener?: DroppedEventListener
  eventMappers?: RumEventMappers

  /** all durations in ms */
  sessionInactivityThreshold?: number
  sessionMaxDuration?: number
  actionInactivityThreshold?: number
  actionMaxDuration?: number
}
