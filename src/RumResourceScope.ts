import { getClampedDurationNs } from './ensureTimestamp'
import type {
  AddResourceTimingEvent,
  ResourceTiming,
  RumRawEvent,
  RumResourceKind,
  StartResourceEvent,
  StopResourceEvent,
  StopResourceWithErrorEvent,
} from './rawEventTypes'
import type { ErrorEvent, ResourceEvent } from './rumEventTypes'
import {
  getErrorStack,
  getErrorType,
  mergeWithGlobalAttributes,
  resolveResourceProvider,
  toConnectivityInfo,
  toRumUserInfo,
} from './rumEventUtils'
import type { RumContextProvider, RumEventWriter, RumScope } from './RumScope'
import type {
  Attributes,
  RumContext,
  RumScopeUtilities,
  Timestamp,
} from './types'

export interface RumResourceScopeInput {
  key: string
  url: string
  method: string
  startTime: Timestamp
  attributes: Attributes
}

const toTimingPhase = (start: number, duration: number) =>
  start > 0 ? { start, duration } : undefined

/**
 * A single network call, keyed by the caller's request key.
 * Ends with exactly one record: a resource, or an error when the call failed.
 */
export class RumResourceScope implements RumScope {
  readonly resourceId: string
  readonly key: string
  readonly url: string
  readonly method: string
  readonly startTime: Timestamp
  readonly attributes: Attributes

  timing: ResourceTiming | undefined
  waitForTiming = false
  stopped = false
  sent = false

  kind: RumResourceKind = 'unknown'
  statusCode: number | undefined
  size: number | undefined
  stopTime: Timestamp | undefined

  constructor(
    private readonly parentScope: RumContextProvider,
    input: RumResourceScopeInput,
    private readonly utilities: RumScopeUtilities,
  ) {
    this.resourceId = utilities.generateId()
    this.key = input.key
    this.url = input.url
    this.method = input.method
    this.startTime = input.startTime
    this.attributes = mergeWithGlobalAttributes(
      input.attributes,
      utilities.globalAttributes.getGlobalAttributes(),
    )
  }

  static fromEvent(
    parentScope: RumContextProvider,
    event: StartResourceEvent,
    utilities: RumScopeUtilities,
  ): RumResourceScope {
    return new RumResourceScope(
      parentScope,
      {
        key: event.key,
        url: event.url,
        method: event.method,
        startTime: event.time,
        attributes: event.attributes,
      },
      utilities,
    )
  }

  getRumContext(): RumContext {
    return this.parentScope.getRumContext()
  }

  isFinished(): boolean {
    return this.sent
  }

  handleEvent(event: RumRawEvent, writer: RumEventWriter): RumScope | undefined {
    switch (event.type) {
      case 'wait-for-resource-timing':
        if (event.key === this.key) this.waitForTiming = true
        break
      case 'add-resource-timing':
        this.onAddResourceTiming(event, writer)
        break
      case 'stop-resource':
        this.onStopResource(event, writer)
        break
      case 'stop-resource-with-error':
        this.onStopResourceWithError(event, writer)
        break
      default:
        break
    }

    return this.isFinished() ? undefined : this
  }

  private onAddResourceTiming(
    event: AddResourceTimingEvent,
    writer: RumEventWriter,
  ) {
    if (event.key !== this.key) return
    this.timing = event.timing
    if (this.stopped && this.stopTime) {
      this.sendResource(this.stopTime, writer)
    }
  }

  private onStopResource(event: StopResourceEvent, writer: RumEventWriter) {
    if (event.key !== this.key || this.stopped) return

    this.stopped = true
    this.stopTime = event.time
    Object.assign(this.attributes, event.attributes)
    this.kind = event.kind
    this.statusCode = event.statusCode
    this.size = event.size

    if (!this.waitForTiming || this.timing) {
      this.sendResource(event.time, writer)
    }
  }

  private onStopResourceWithError(
    event: StopResourceWithErrorEvent,
    writer: RumEventWriter,
  ) {
    if (event.key !== this.key || this.sent) return

    this.stopped = true
    Object.assign(this.attributes, event.attributes)

    const context = this.getRumContext()
    const user = this.utilities.userInfoProvider.getUserInfo()
    const networkInfo = this.utilities.networkInfoProvider.getLatestNetworkInfo()

    const errorEvent: ErrorEvent = {
      type: 'error',
      date: this.startTime.epoch,
      error: {
        message: event.message,
        source: event.source,
        stack: getErrorStack(event.error),
        isCrash: false,
        type: getErrorType(event.error),
        resource: {
          method: this.method,
          statusCode: event.statusCode,
          url: this.url,
          provider: resolveResourceProvider(
            this.url,
            this.utilities.firstPartyHostDetector,
          ),
        },
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
      globalAttributes: { ...this.attributes },
      userExtraAttributes: user.additionalProperties,
    })
    this.sent = true
  }

  private sendResource(stopTime: Timestamp, writer: RumEventWriter) {
    if (this.sent) return

    Object.assign(
      this.attributes,
      this.utilities.globalAttributes.getGlobalAttributes(),
    )
    const context = this.getRumContext()
    const user = this.utilities.userInfoProvider.getUserInfo()
    const networkInfo = this.utilities.networkInfoProvider.getLatestNetworkInfo()
    const { timing } = this

    const resourceEvent: ResourceEvent = {
      type: 'resource',
      date: this.startTime.epoch,
      resource: {
        id: this.resourceId,
        type: this.kind,
        url: this.url,
        method: this.method,
        statusCode: this.statusCode,
        size: this.size,
        duration: getClampedDurationNs(this.startTime, stopTime),
        dns: timing && toTimingPhase(timing.dnsStart, timing.dnsDuration),
        connect:
          timing && toTimingPhase(timing.connectStart, timing.connectDuration),
        ssl: timing && toTimingPhase(timing.sslStart, timing.sslDuration),
        firstByte:
          timing &&
          toTimingPhase(timing.firstByteStart, timing.firstByteDuration),
        download:
          timing &&
          toTimingPhase(timing.downloadStart, timing.downloadDuration),
        provider: resolveResourceProvider(
          this.url,
          this.utilities.firstPartyHostDetector,
        ),
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
      event: resourceEvent,
      globalAttributes: { ...this.attributes },
      userExtraAttributes: user.additionalProperties,
    })
    this.sent = true
  }
}
