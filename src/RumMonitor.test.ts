import {
  beforeEach,
  describe,
  expect,
  it,
  type Mock,
  vitest as jest,
} from 'vitest'
import { NULL_UUID } from './constants'
import { GlobalAttributes } from './GlobalAttributes'
import type { RumRawEventType } from './rawEventTypes'
import {
  RumMonitor,
  type RumRecordDroppedEvent,
  type RumSessionRenewedEvent,
} from './RumMonitor'
import type { RumEvent } from './rumEventTypes'
import {
  createIdGenerator,
  createTimestamp,
} from './testUtility/createMockFactory'
import type { RumMonitorConfig } from './types'

describe('RumMonitor', () => {
  let now: number
  let records: RumEvent[]
  let reportErrorFn: Mock
  let reportWarningFn: Mock

  beforeEach(() => {
    now = 0
    records = []
    reportErrorFn = jest.fn()
    reportWarningFn = jest.fn()
  })

  const createMonitor = (config: Partial<RumMonitorConfig> = {}) =>
    new RumMonitor({
      applicationId: 'app-1',
      sink: {
        write: (rumEvent) => {
          records.push(rumEvent)
        },
      },
      reportErrorFn,
      reportWarningFn,
      generateId: createIdGenerator(),
      getTimestamp: () => createTimestamp(now),
      processStartTime: createTimestamp(0),
      networkInfoProvider: {
        getLatestNetworkInfo: () => ({ connectivity: 'wifi' }),
      },
      ...config,
    })

  const recordTypes = () => records.map(({ event }) => event.type)
  const lastViewRecord = () =>
    records
      .map(({ event }) => event)
      .filter((event) => event.type === 'view')
      .at(-1)

  it('starts a session, a view and reports the application start', () => {
    const monitor = createMonitor()

    now = 100
    monitor.startView('home', 'home')

    // session id-1, view id-2, application start action id-3
    expect(monitor.getRumContext()).toEqual({
      applicationId: 'app-1',
      sessionId: 'id-1',
      viewId: 'id-2',
      viewName: 'home',
      viewUrl: 'home',
      actionId: undefined,
    })
    expect(recordTypes()).toEqual(['action', 'view'])
    expect(records[0]?.event).toMatchObject({
      type: 'action',
      action: {
        id: 'id-3',
        type: 'application_start',
        loadingTime: 100_000_000,
      },
    })
    // the acknowledgement of the action was processed after the start-view
    expect(records[1]?.event).toMatchObject({
      type: 'view',
      view: { id: 'id-2', action: { count: 1 }, isActive: true },
      dd: { documentVersion: 2 },
    })
  })

  it('processes acknowledgements after the event that caused them', () => {
    const monitor = createMonitor()
    const processed: RumRawEventType[] = []
    monitor.when('event-processed').subscribe(({ event }) => {
      processed.push(event.type)
    })

    monitor.startView('home', 'home')
    monitor.addError({ message: 'boom', source: 'source' })

    expect(processed).toEqual([
      'start-view',
      'action-sent',
      'add-error',
      'error-sent',
    ])
  })

  it('counts errors on the current view', () => {
    const monitor = createMonitor({
      globalAttributes: new GlobalAttributes({ env: 'test' }),
    })

    monitor.startView('home', 'home')
    now = 200
    monitor.addError({ message: 'boom', source: 'source' })

    const errorRecord = records.find(({ event }) => event.type === 'error')
    expect(errorRecord?.event).toMatchObject({
      date: 1_200,
      error: { message: 'boom', source: 'source', isCrash: false },
      view: { id: 'id-2', url: 'home' },
      connectivity: { status: 'connected', interfaces: ['wifi'] },
    })
    expect(errorRecord?.globalAttributes).toEqual({ env: 'test' })
    expect(lastViewRecord()).toMatchObject({
      view: { error: { count: 1 }, crash: { count: 0 } },
      dd: { documentVersion: 3 },
    })
  })

  it('reports crashes', () => {
    const monitor = createMonitor()

    monitor.startView('home', 'home')
    monitor.addCrash(new Error('kaboom'))

    const errorRecord = records.find(({ event }) => event.type === 'error')
    expect(errorRecord?.event).toMatchObject({
      error: {
        message: 'Application crash detected: kaboom',
        source: 'source',
        isCrash: true,
        type: 'Error',
      },
    })
    expect(lastViewRecord()).toMatchObject({
      view: { error: { count: 1 }, crash: { count: 1 } },
    })
  })

  it('releases the pending unit of a record rejected by a mapper', () => {
    const notifyDropped = jest.fn()
    const monitor = createMonitor({
      eventMappers: { errorEventMapper: () => null },
      droppedEventListener: { notifyDropped },
    })
    const dropped: RumRecordDroppedEvent[] = []
    monitor.when('record-dropped').subscribe((event) => {
      dropped.push(event)
    })

    monitor.startView('home', 'home')
    monitor.addError({ message: 'boom', source: 'source' })

    expect(recordTypes()).toEqual(['action', 'view'])
    expect(dropped.map(({ reason }) => reason)).toEqual(['mapper-rejected'])
    expect(notifyDropped).toHaveBeenCalledWith('id-2', 'error')
    const view = monitor.applicationScope.sessionScope.activeViewScope
    expect(view?.pendingErrorCount).toBe(0)
    expect(view?.errorCount).toBe(0)
  })

  it('keeps the views moving when an event mapper throws', () => {
    const mapperError = new Error('mapper bug')
    const monitor = createMonitor({
      eventMappers: {
        actionEventMapper: (event) => {
          if (event.action.type === 'application_start') return event
          throw mapperError
        },
      },
    })
    const dropped: RumRecordDroppedEvent[] = []
    monitor.when('record-dropped').subscribe((event) => {
      dropped.push(event)
    })

    monitor.startView('home', 'home')
    monitor.addUserAction('tap', 'button')
    now = 490
    monitor.keepAlive()
    now = 500
    monitor.startView('settings', 'settings')

    expect(reportErrorFn).toHaveBeenCalledTimes(1)
    expect(reportErrorFn).toHaveBeenCalledWith(mapperError)
    expect(dropped.map(({ reason }) => reason)).toEqual(['mapper-failed'])
    expect(monitor.applicationScope.sessionScope.activeViewScopes.size).toBe(1)
    expect(monitor.getRumContext()).toMatchObject({ viewName: 'settings' })
  })

  it('closes a stopped view once nothing is pending', () => {
    const monitor = createMonitor()

    monitor.startView('home', 'home')
    now = 300
    monitor.stopView('home')

    expect(monitor.applicationScope.sessionScope.activeViewScopes.size).toBe(0)
    expect(monitor.getRumContext()).toEqual({
      applicationId: 'app-1',
      sessionId: 'id-1',
    })
    expect(lastViewRecord()).toMatchObject({
      view: { isActive: false, timeSpent: 300_000_000 },
    })
  })

  it('tracks a resource through to its acknowledgement', () => {
    const monitor = createMonitor()

    monitor.startView('home', 'home')
    now = 10
    monitor.startResource('req1', 'GET', 'https://api.example.com/items')
    now = 60
    monitor.stopResource('req1', { statusCode: 200, kind: 'fetch' })

    const resourceRecord = records.find(
      ({ event }) => event.type === 'resource',
    )
    expect(resourceRecord?.event).toMatchObject({
      resource: {
        id: 'id-4',
        url: 'https://api.example.com/items',
        statusCode: 200,
        duration: 50_000_000,
      },
    })
    expect(lastViewRecord()).toMatchObject({
      view: { resource: { count: 1 } },
    })
  })

  it('renews the session on reset and gives the view a new id', () => {
    const monitor = createMonitor()
    const renewals: RumSessionRenewedEvent[] = []
    monitor.when('session-renewed').subscribe((event) => {
      renewals.push(event)
    })

    monitor.startView('home', 'home')
    monitor.resetSession()

    expect(renewals).toEqual([
      { previousSessionId: NULL_UUID, sessionId: 'id-1' },
      { previousSessionId: NULL_UUID, sessionId: 'id-4' },
    ])
    expect(monitor.getRumContext()).toMatchObject({
      sessionId: 'id-4',
      viewId: 'id-5',
    })
  })

  it('warns when an action is started while another one is active', () => {
    const monitor = createMonitor()

    monitor.startView('home', 'home')
    monitor.startUserAction('scroll', 'list')
    monitor.addUserAction('tap', 'button')

    expect(reportWarningFn).toHaveBeenCalledWith(
      new Error(
        'RUM Action (tap on button) was dropped, because another action is still active for the same view',
      ),
    )
  })

  it('keeps processing events after one failed', () => {
    let shouldFail = true
    const monitor = createMonitor({
      userInfoProvider: {
        getUserInfo: () => {
          if (shouldFail) throw new Error('user store unavailable')
          return { additionalProperties: {} }
        },
      },
    })

    monitor.startView('home', 'home')
    expect(reportErrorFn).toHaveBeenCalledWith(
      new Error('user store unavailable'),
    )

    shouldFail = false
    monitor.addError({ message: 'boom', source: 'source' })

    expect(records.some(({ event }) => event.type === 'error')).toBe(true)
  })

  it('ignores events once disposed', () => {
    const monitor = createMonitor()

    monitor.dispose()
    monitor.startView('home', 'home')

    expect(records).toEqual([])
  })
})
