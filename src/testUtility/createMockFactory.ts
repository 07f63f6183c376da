import { vitest as jest } from 'vitest'
import type {
  AddErrorEvent,
  RumActionType,
  StartActionEvent,
  StartResourceEvent,
  StartViewEvent,
  StopResourceEvent,
  StopViewEvent,
} from '../rawEventTypes'
import type { RumEventWriter } from '../RumScope'
import type {
  ErrorEvent,
  RumEvent,
  RumEventPayload,
  ViewEvent,
} from '../rumEventTypes'
import type {
  Attributes,
  RumContext,
  RumScopeUtilities,
  Timestamp,
} from '../types'

const EPOCH_START = 1_000

export const createTimestamp = (now: number): Timestamp => ({
  epoch: EPOCH_START + now,
  now,
})

/** deterministic ids: `${prefix}-1`, `${prefix}-2`... */
export const createIdGenerator = (prefix = 'id') => {
  let count = 0
  return () => `${prefix}-${++count}`
}

export const createMockUtilities = (
  partial: Partial<RumScopeUtilities> = {},
): RumScopeUtilities => ({
  generateId: createIdGenerator(),
  globalAttributes: { getGlobalAttributes: () => ({}) },
  userInfoProvider: {
    getUserInfo: () => ({ id: 'user-1', additionalProperties: {} }),
  },
  networkInfoProvider: {
    getLatestNetworkInfo: () => ({ connectivity: 'wifi' }),
  },
  firstPartyHostDetector: { isFirstPartyUrl: () => false },
  reportErrorFn: jest.fn(),
  reportWarningFn: jest.fn(),
  sessionInactivityThreshold: 15 * 60 * 1_000,
  sessionMaxDuration: 4 * 60 * 60 * 1_000,
  actionInactivityThreshold: 100,
  actionMaxDuration: 10_000,
  ...partial,
})

/** a parent scope whose session can be rotated by the test */
export const createMockParentScope = (
  context: RumContext = { applicationId: 'app-1', sessionId: 'session-1' },
) => {
  let currentContext = context
  return {
    getRumContext: () => currentContext,
    setRumContext: (newContext: RumContext) => {
      currentContext = newContext
    },
  }
}

/** keeps every record it's given, in order */
export const createRecordingWriter = () => {
  const records: RumEvent[] = []
  const writer: RumEventWriter = {
    write: (rumEvent) => {
      records.push(rumEvent)
    },
  }
  const ofType = <TypeT extends RumEventPayload['type']>(type: TypeT) =>
    records
      .map(({ event }) => event)
      .filter(
        (event): event is Extract<RumEventPayload, { type: TypeT }> =>
          event.type === type,
      )
  return { records, writer, ofType }
}

export const startView = (
  now: number,
  key: unknown,
  name = 'home',
  attributes: Attributes = {},
): StartViewEvent => ({
  type: 'start-view',
  key,
  name,
  attributes,
  time: createTimestamp(now),
})

export const stopView = (
  now: number,
  key: unknown,
  attributes: Attributes = {},
): StopViewEvent => ({
  type: 'stop-view',
  key,
  attributes,
  time: createTimestamp(now),
})

export const startAction = (
  now: number,
  name = 'button',
  {
    actionType = 'tap',
    waitForStop = false,
  }: { actionType?: RumActionType; waitForStop?: boolean } = {},
): StartActionEvent => ({
  type: 'start-action',
  actionType,
  name,
  waitForStop,
  attributes: {},
  time: createTimestamp(now),
})

export const startResource = (
  now: number,
  key: string,
  url = 'https://api.example.com/items',
): StartResourceEvent => ({
  type: 'start-resource',
  key,
  url,
  method: 'GET',
  attributes: {},
  time: createTimestamp(now),
})

export const stopResource = (
  now: number,
  key: string,
  partial: Partial<Omit<StopResourceEvent, 'type' | 'time' | 'key'>> = {},
): StopResourceEvent => ({
  type: 'stop-resource',
  key,
  kind: 'fetch',
  statusCode: 200,
  attributes: {},
  ...partial,
  time: createTimestamp(now),
})

export const addError = (
  now: number,
  partial: Partial<Omit<AddErrorEvent, 'type' | 'time'>> = {},
): AddErrorEvent => ({
  type: 'add-error',
  source: 'source',
  isFatal: false,
  attributes: {},
  ...partial,
  time: createTimestamp(now),
})

const recordBase = {
  date: 1_000,
  application: { id: 'app-1' },
  session: { id: 'session-1', type: 'user' as const },
  usr: {},
}

export const createMockViewEvent = (viewId = 'view-1'): ViewEvent => ({
  ...recordBase,
  type: 'view',
  view: {
    id: viewId,
    name: 'home',
    url: 'home',
    timeSpent: 1,
    action: { count: 0 },
    resource: { count: 0 },
    error: { count: 0 },
    crash: { count: 0 },
    longTask: { count: 0 },
    isActive: true,
  },
  dd: { documentVersion: 2 },
})

export const createMockErrorEvent = (
  viewId = 'view-1',
  isCrash = false,
): ErrorEvent => ({
  ...recordBase,
  type: 'error',
  error: { message: 'boom', source: 'source', isCrash },
  view: { id: viewId, url: 'home' },
  connectivity: { status: 'maybe', interfaces: [] },
})

export const wrapRumEvent = <EventT extends RumEventPayload>(event: EventT) => ({
  event,
  globalAttributes: {},
  userExtraAttributes: {},
})
