import type {
  ActionEvent,
  ErrorEvent,
  LongTaskEvent,
  ResourceEvent,
  RumEvent,
  RumEventPayload,
  ViewEvent,
} from './rumEventTypes'
import type { ReportErrorFn } from './types'

/**
 * Lets the application edit a record before it's written.
 * Must return the very same instance it was given (modified in place),
 * or null/undefined to drop the record.
 */
export type EventMapper<EventT extends RumEventPayload> = (
  event: EventT,
) => EventT | null | undefined

export interface RumEventMappers {
  viewEventMapper?: EventMapper<ViewEvent>
  actionEventMapper?: EventMapper<ActionEvent>
  resourceEventMapper?: EventMapper<ResourceEvent>
  errorEventMapper?: EventMapper<ErrorEvent>
  longTaskEventMapper?: EventMapper<LongTaskEvent>
}

const describeEvent = ({ event }: RumEvent) =>
  `${event.type} event on view ${event.view.id}`

export const getDroppedEventWarning = (rumEvent: RumEvent) =>
  `RumEventMapper: the mapper returned no event, the ${describeEvent(
    rumEvent,
  )} will be dropped`

export const getNotSameInstanceWarning = (rumEvent: RumEvent) =>
  `RumEventMapper: the mapper returned a different instance than the one it was given, the ${describeEvent(
    rumEvent,
  )} will be dropped`

export const getViewEventKeptWarning = (rumEvent: RumEvent) =>
  `RumEventMapper: view events can't be dropped or replaced, the original ${describeEvent(
    rumEvent,
  )} will be used instead`

function applyMapper<EventT extends RumEventPayload>(
  mapper: EventMapper<EventT> | undefined,
  event: EventT,
): 'kept' | 'dropped' | 'replaced' {
  if (!mapper) return 'kept'
  const mapped = mapper(event)
  if (mapped === null || mapped === undefined) return 'dropped'
  return mapped === event ? 'kept' : 'replaced'
}

export class RumEventMapper {
  constructor(
    private readonly mappers: RumEventMappers,
    private readonly reportWarningFn: ReportErrorFn,
  ) {}

  /**
   * @returns the record to write, or undefined when the mapper rejected it
   */
  map(rumEvent: RumEvent): RumEvent | undefined {
    const outcome = this.mapBundledEvent(rumEvent.event)
    if (outcome === 'kept') return rumEvent

    if (rumEvent.event.type === 'view') {
      this.reportWarningFn(new Error(getViewEventKeptWarning(rumEvent)))
      return rumEvent
    }

    this.reportWarningFn(
      new Error(
        outcome === 'dropped'
          ? getDroppedEventWarning(rumEvent)
          : getNotSameInstanceWarning(rumEvent),
      ),
    )
    return undefined
  }

  private mapBundledEvent(event: RumEventPayload) {
    switch (event.type) {
      case 'view':
        return applyMapper(this.mappers.viewEventMapper, event)
      case 'action':
        return applyMapper(this.mappers.actionEventMapper, event)
      case 'resource':
        return applyMapper(this.mappers.resourceEventMapper, event)
      case 'error':
        return applyMapper(this.mappers.errorEventMapper, event)
      case 'long_task':
        return applyMapper(this.mappers.longTaskEventMapper, event)
      default:
        return 'kept'
    }
  }
}
