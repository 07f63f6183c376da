import type {
  RumEventProcessedEvent,
  RumMonitor,
  RumRecordDroppedEvent,
  RumSessionRenewedEvent,
} from './RumMonitor'
import type { RumEvent } from './rumEventTypes'
import type { RumContext } from './types'

type LoggerFn = (message: string) => void

/**
 * Options for configuring the ConsoleRumLogger
 */
export interface ConsoleRumLoggerOptions {
  /** Custom log function to use instead of console.log */
  logFn?: LoggerFn
  /** Whether to log every processed event and the content of the records */
  verbose?: boolean
  /** Prefix added to all log messages */
  prefix?: string
  /** Maximum string length for serialized records */
  maxObjectStringLength?: number
}

const MAX_SERIALIZED_OBJECT_LENGTH = 500

const describeView = (context: RumContext) =>
  `${context.viewName ?? 'unnamed'} (${context.viewUrl ?? 'no url'}) [${
    context.viewId ?? 'no id'
  }]`

/**
 * A utility for logging what a RumMonitor does to the console
 */
export function createConsoleRumLogger(
  monitor: RumMonitor,
  options: ConsoleRumLoggerOptions = {},
) {
  const currentOptions = {
    // eslint-disable-next-line no-console
    logFn: options.logFn ?? console.log,
    verbose: options.verbose ?? false,
    prefix: options.prefix ?? '[RUM]',
    maxObjectStringLength:
      options.maxObjectStringLength ?? MAX_SERIALIZED_OBJECT_LENGTH,
  }

  let currentViewId: string | undefined

  const subscriptions: { unsubscribe: () => void }[] = []

  /**
   * Truncate objects to prevent huge logs
   */
  const truncateObject = (obj: unknown): string => {
    const str = JSON.stringify(obj)
    const { maxObjectStringLength } = currentOptions
    if (str.length <= maxObjectStringLength) return str
    return `${str.slice(0, Math.max(0, maxObjectStringLength - 3))}...`
  }

  const log = (message: string) => {
    currentOptions.logFn(`${currentOptions.prefix} ${message}`)
  }

  const handleEventProcessed = ({
    event,
    rumContext,
  }: RumEventProcessedEvent) => {
    if (currentOptions.verbose) {
      log(`Event processed: ${event.type}`)
    }
    if (rumContext.viewId !== currentViewId) {
      currentViewId = rumContext.viewId
      log(
        currentViewId
          ? `Active view: ${describeView(rumContext)}`
          : 'No active view',
      )
    }
  }

  const handleRecordWritten = (rumEvent: RumEvent) => {
    const { event } = rumEvent
    log(`Record written: ${event.type} on view ${event.view.id}`)
    if (currentOptions.verbose) {
      log(`   Record: ${truncateObject(event)}`)
    }
  }

  const handleRecordDropped = ({ rumEvent, reason }: RumRecordDroppedEvent) => {
    const { event } = rumEvent
    log(`Record dropped (${reason}): ${event.type} on view ${event.view.id}`)
  }

  const handleSessionRenewed = ({
    previousSessionId,
    sessionId,
  }: RumSessionRenewedEvent) => {
    log(`Session renewed: ${previousSessionId} -> ${sessionId}`)
  }

  subscriptions.push(
    monitor.when('event-processed').subscribe(handleEventProcessed),
    monitor.when('record-written').subscribe(handleRecordWritten),
    monitor.when('record-dropped').subscribe(handleRecordDropped),
    monitor.when('session-renewed').subscribe(handleSessionRenewed),
  )

  return {
    getCurrentViewId: () => currentViewId,

    setOptions: (newOptions: Partial<ConsoleRumLoggerOptions>) => {
      if (newOptions.logFn !== undefined) currentOptions.logFn = newOptions.logFn
      if (newOptions.verbose !== undefined) {
        currentOptions.verbose = newOptions.verbose
      }
      if (newOptions.prefix !== undefined) currentOptions.prefix = newOptions.prefix
      if (newOptions.maxObjectStringLength !== undefined) {
        currentOptions.maxObjectStringLength = newOptions.maxObjectStringLength
      }
    },

    // Cleanup method to unsubscribe from all monitor events
    cleanup: () => {
      subscriptions.forEach((subscription) => void subscription.unsubscribe())
      log('ConsoleRumLogger unsubscribed from all events')
    },
  }
}
