import {
  createAcknowledgementEvent,
  type RumDroppedEvent,
  type RumEventCategory,
  type RumSentEvent,
} from './rawEventTypes'
import type { RumEventMapper } from './RumEventMapper'
import type { RumEventWriter } from './RumScope'
import { getEventCategory, type RumEvent } from './rumEventTypes'
import { notifyDropped } from './rumEventUtils'
import type {
  DroppedEventListener,
  ReportErrorFn,
  RumEventSink,
  Timestamp,
} from './types'

export type RumRecordDropReason =
  | 'mapper-rejected'
  | 'mapper-failed'
  | 'sink-failed'

export interface RumDataWriterConfig {
  sink: RumEventSink
  eventMapper: RumEventMapper
  /**
   * receives the sent/dropped acknowledgement resolving the pending unit of the view that emitted the record.
   * must enqueue it, never handle it synchronously
   */
  onAcknowledge: (event: RumSentEvent | RumDroppedEvent) => void
  getTimestamp: () => Timestamp
  reportErrorFn: ReportErrorFn
  droppedEventListener?: DroppedEventListener
  onRecordWritten?: (rumEvent: RumEvent) => void
  onRecordDropped?: (rumEvent: RumEvent, reason: RumRecordDropReason) => void
}

/**
 * Sits between the scopes and the sink.
 * Every record other than a view update resolves one pending unit of its view,
 * either as sent (it reached the sink) or as dropped.
 */
export class RumDataWriter implements RumEventWriter {
  constructor(private readonly config: RumDataWriterConfig) {}

  write(rumEvent: RumEvent): void {
    let mapped: RumEvent | undefined
    try {
      mapped = this.config.eventMapper.map(rumEvent)
    } catch (error) {
      this.reportError(error, 'RUM event mapper failed on a record')
      if (rumEvent.event.type !== 'view') {
        this.onDropped(rumEvent, 'mapper-failed')
        return
      }
      // view records are never dropped
      mapped = rumEvent
    }

    if (!mapped) {
      this.onDropped(rumEvent, 'mapper-rejected')
      return
    }

    try {
      this.config.sink.write(mapped)
    } catch (error) {
      this.reportError(error, 'RUM sink failed to write a record')
      this.onDropped(mapped, 'sink-failed')
      return
    }

    this.config.onRecordWritten?.(mapped)
    const category = getEventCategory(mapped.event)
    if (category) {
      const isCrash = mapped.event.type === 'error' && mapped.event.error.isCrash
      this.acknowledge('sent', category, mapped, isCrash)
    }
  }

  private reportError(error: unknown, message: string) {
    this.config.reportErrorFn(
      error instanceof Error ? error : new Error(`${message}: ${String(error)}`),
    )
  }

  private onDropped(rumEvent: RumEvent, reason: RumRecordDropReason) {
    this.config.onRecordDropped?.(rumEvent, reason)
    const category = getEventCategory(rumEvent.event)
    if (!category) return

    notifyDropped(this.config, rumEvent.event.view.id, category)
    this.acknowledge('dropped', category, rumEvent)
  }

  private acknowledge(
    outcome: 'sent' | 'dropped',
    category: RumEventCategory,
    rumEvent: RumEvent,
    isCrash = false,
  ) {
    this.config.onAcknowledge(
      createAcknowledgementEvent(
        outcome,
        category,
        rumEvent.event.view.id,
        this.config.getTimestamp(),
        isCrash,
      ),
    )
  }
}
