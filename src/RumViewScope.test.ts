import {
  beforeEach,
  describe,
  expect,
  it,
  type Mock,
  vitest as jest,
} from 'vitest'
import { LONG_TASK_TARGET_ATTRIBUTE } from './constants'
import { createAcknowledgementEvent, type RumEventCategory } from './rawEventTypes'
import { getActionDroppedWarning, RumViewScope } from './RumViewScope'
import {
  addError,
  createMockParentScope,
  createMockUtilities,
  createRecordingWriter,
  createTimestamp,
  startAction,
  startResource,
  startView,
  stopResource,
  stopView,
} from './testUtility/createMockFactory'
import type { RumScopeUtilities } from './types'

describe('RumViewScope', () => {
  let parentScope: ReturnType<typeof createMockParentScope>
  let utilities: RumScopeUtilities
  let reportWarningFn: Mock
  let notifyDroppedFn: Mock
  let recording: ReturnType<typeof createRecordingWriter>
  let view: RumViewScope

  beforeEach(() => {
    parentScope = createMockParentScope()
    reportWarningFn = jest.fn()
    notifyDroppedFn = jest.fn()
    utilities = createMockUtilities({
      reportWarningFn,
      droppedEventListener: { notifyDropped: notifyDroppedFn },
    })
    recording = createRecordingWriter()
    // view id: id-1
    view = RumViewScope.fromEvent(parentScope, startView(0, 'home'), utilities)
  })

  const handle = (event: Parameters<RumViewScope['handleEvent']>[0]) =>
    view.handleEvent(event, recording.writer)

  const sent = (
    category: RumEventCategory,
    now: number,
    viewId = 'id-1',
  ) => createAcknowledgementEvent('sent', category, viewId, createTimestamp(now))

  const dropped = (
    category: RumEventCategory,
    now: number,
    viewId = 'id-1',
  ) =>
    createAcknowledgementEvent('dropped', category, viewId, createTimestamp(now))

  describe('context', () => {
    it('exposes the view on top of the parent context', () => {
      expect(view.getRumContext()).toEqual({
        applicationId: 'app-1',
        sessionId: 'session-1',
        viewId: 'id-1',
        viewName: 'home',
        viewUrl: 'home',
        actionId: undefined,
      })
    })

    it('picks a new view id once the session rotated', () => {
      parentScope.setRumContext({
        applicationId: 'app-1',
        sessionId: 'session-2',
      })

      expect(view.getRumContext().viewId).toBe('id-2')
      // stable until the next rotation
      expect(view.getRumContext().viewId).toBe('id-2')
    })

    it('derives the url from the class of an object key', () => {
      class CheckoutPage {}
      const classView = RumViewScope.fromEvent(
        parentScope,
        startView(0, new CheckoutPage(), 'Checkout'),
        utilities,
      )

      expect(classView.url).toBe('CheckoutPage')
    })
  })

  describe('stop-view', () => {
    it('finishes once stopped with the key it was started with and nothing pending', () => {
      const result = handle(stopView(100, 'home'))

      expect(result).toBeUndefined()
      const [viewEvent] = recording.ofType('view')
      expect(recording.records).toHaveLength(1)
      expect(viewEvent?.view).toMatchObject({
        id: 'id-1',
        name: 'home',
        url: 'home',
        timeSpent: 100_000_000,
        isActive: false,
      })
      expect(viewEvent?.dd.documentVersion).toBe(2)
      expect(viewEvent?.date).toBe(1_000)
    })

    it('does not stop on a different key while the original key is still reachable', () => {
      const result = handle(stopView(100, 'settings'))

      expect(result).toBe(view)
      expect(view.stopped).toBe(false)
      expect(recording.records).toHaveLength(0)
    })

    it('stops the current view when no key is given', () => {
      expect(handle(stopView(100, undefined))).toBeUndefined()
      expect(view.stopped).toBe(true)
    })

    it('stops on any key once the original key was reclaimed', () => {
      const reclaimedView = new RumViewScope(
        parentScope,
        {
          keyRef: { deref: () => undefined },
          name: 'home',
          url: 'home',
          startTime: createTimestamp(0),
          attributes: {},
        },
        utilities,
      )

      const result = reclaimedView.handleEvent(
        stopView(100, 'settings'),
        recording.writer,
      )

      expect(result).toBeUndefined()
      expect(reclaimedView.stopped).toBe(true)
    })

    it('adds the stop attributes to the view', () => {
      handle(stopView(100, 'home', { cart: 'full' }))

      expect(recording.records[0]?.globalAttributes).toEqual({ cart: 'full' })
    })

    it('is stopped by the next view starting', () => {
      const result = handle(startView(50, 'settings', 'settings'))

      expect(result).toBeUndefined()
      const [viewEvent] = recording.ofType('view')
      expect(viewEvent?.view.isActive).toBe(false)
      expect(viewEvent?.view.timeSpent).toBe(50_000_000)
    })
  })

  it('only closes a stopped view once its pending resource was acknowledged', () => {
    handle(startResource(10, 'req1'))
    handle(stopResource(20, 'req1'))

    expect(handle(stopView(30, 'home'))).toBe(view)
    expect(view.pendingResourceCount).toBe(1)

    expect(handle(sent('resource', 40))).toBeUndefined()

    const viewEvents = recording.ofType('view')
    expect(viewEvents.map(({ view: { resource } }) => resource.count)).toEqual(
      [0, 1],
    )
    expect(viewEvents.map(({ dd }) => dd.documentVersion)).toEqual([2, 3])
  })

  it('keeps a stopped view open while one of its resources is still running', () => {
    handle(startResource(10, 'req1'))

    expect(handle(stopView(20, 'home'))).toBe(view)
    expect(handle(stopResource(30, 'req1'))).toBe(view)
    expect(view.activeResourceScopes.size).toBe(0)
    expect(handle(sent('resource', 40))).toBeUndefined()
  })

  describe('pending counters', () => {
    it('returns to zero once each started unit is acknowledged', () => {
      handle(startAction(10))
      handle(startResource(10, 'req1'))
      handle(stopResource(20, 'req1'))
      handle(addError(30, { message: 'boom' }))
      handle({
        type: 'add-long-task',
        durationNs: 50_000_000,
        target: 'main',
        time: createTimestamp(40),
      })

      expect(view.pendingActionCount).toBe(1)
      expect(view.pendingResourceCount).toBe(1)
      expect(view.pendingErrorCount).toBe(1)
      expect(view.pendingLongTaskCount).toBe(1)

      handle(sent('resource', 50))
      handle(dropped('error', 50))
      handle(sent('long-task', 50))
      handle(dropped('action', 50))

      expect(view.pendingActionCount).toBe(0)
      expect(view.pendingResourceCount).toBe(0)
      expect(view.pendingErrorCount).toBe(0)
      expect(view.pendingLongTaskCount).toBe(0)
      expect(view.resourceCount).toBe(1)
      expect(view.errorCount).toBe(0)
      expect(view.longTaskCount).toBe(1)
      expect(view.actionCount).toBe(0)
    })

    it('ignores acknowledgements for another view', () => {
      handle(addError(10))

      handle(sent('error', 20, 'some-other-view'))

      expect(view.pendingErrorCount).toBe(1)
      expect(view.errorCount).toBe(0)
      expect(recording.ofType('view')).toHaveLength(0)
    })

    it('counts a crash when a fatal error was sent', () => {
      handle(addError(10, { isFatal: true }))

      handle(
        createAcknowledgementEvent(
          'sent',
          'error',
          'id-1',
          createTimestamp(20),
          true,
        ),
      )

      expect(view.errorCount).toBe(1)
      expect(view.crashCount).toBe(1)
      expect(recording.ofType('view')[0]?.view.crash.count).toBe(1)
    })

    it('turns the pending resource into a pending error when the resource fails', () => {
      handle(startResource(10, 'req1'))
      handle({
        type: 'stop-resource-with-error',
        key: 'req1',
        message: 'connection reset',
        source: 'network',
        statusCode: 503,
        attributes: {},
        time: createTimestamp(20),
      })

      expect(view.activeResourceScopes.size).toBe(0)
      expect(view.pendingResourceCount).toBe(0)
      expect(view.pendingErrorCount).toBe(1)

      handle(sent('error', 30))

      expect(view.pendingErrorCount).toBe(0)
      expect(view.errorCount).toBe(1)
      expect(view.resourceCount).toBe(0)
    })
  })

  describe('start-action', () => {
    it('rejects a second action while one is active', () => {
      handle(startAction(10, 'button'))
      handle(startAction(20, 'link'))

      expect(view.activeActionScope?.name).toBe('button')
      expect(view.pendingActionCount).toBe(1)
      expect(reportWarningFn).toHaveBeenCalledTimes(1)
      expect(reportWarningFn).toHaveBeenCalledWith(
        new Error(getActionDroppedWarning('tap', 'link')),
      )
      expect(notifyDroppedFn).toHaveBeenCalledWith('id-1', 'action')
    })

    it('exposes the active action in the context', () => {
      handle(startAction(10))

      // id-2 is the action
      expect(view.getRumContext().actionId).toBe('id-2')
    })

    it('releases the action once it was sent for inactivity', () => {
      handle(startAction(10))
      handle({ type: 'keep-alive', time: createTimestamp(200) })

      expect(view.activeActionScope).toBeUndefined()
      const [actionEvent] = recording.ofType('action')
      expect(actionEvent?.action).toMatchObject({
        id: 'id-2',
        type: 'tap',
        target: { name: 'button' },
        loadingTime: 1,
      })
      expect(actionEvent?.view.id).toBe('id-1')

      handle(sent('action', 210))
      expect(view.actionCount).toBe(1)
      expect(view.pendingActionCount).toBe(0)
    })

    it('is ignored once the view was stopped', () => {
      handle(startResource(5, 'req1'))
      handle(stopView(10, 'home'))
      handle(startAction(20))

      expect(view.activeActionScope).toBeUndefined()
      expect(view.pendingActionCount).toBe(0)
    })
  })

  it('rejects a resource whose key is already in flight', () => {
    handle(startResource(10, 'req1'))
    handle(startResource(20, 'req1'))

    expect(view.activeResourceScopes.size).toBe(1)
    expect(view.pendingResourceCount).toBe(1)
    expect(reportWarningFn).toHaveBeenCalledTimes(1)
    expect(notifyDroppedFn).toHaveBeenCalledWith('id-1', 'resource')
  })

  it('does not count a rejected resource on the active action', () => {
    handle(startAction(10))
    handle(startResource(20, 'req1'))
    handle(startResource(30, 'req1'))

    expect(view.activeActionScope?.resourceCount).toBe(1)
    expect(view.pendingResourceCount).toBe(1)
  })

  describe('add-error', () => {
    it('uses a generic message when there is neither a message nor a thrown error', () => {
      handle(addError(10))

      const [errorEvent] = recording.ofType('error')
      expect(errorEvent?.error.message).toBe('Application error detected')
      expect(errorEvent?.error.isCrash).toBe(false)
    })

    it('uses the crash message for a fatal error without details', () => {
      handle(addError(10, { isFatal: true }))

      expect(recording.ofType('error')[0]?.error.message).toBe(
        'Application crash detected',
      )
    })

    it('falls back on the message of the thrown error', () => {
      const error = new TypeError('undefined is not a function')
      handle(addError(10, { error }))

      const [errorEvent] = recording.ofType('error')
      expect(errorEvent?.error.message).toBe('undefined is not a function')
      expect(errorEvent?.error.type).toBe('TypeError')
      expect(errorEvent?.error.stack).toBe(error.stack)
    })

    it('is ignored once the view was stopped', () => {
      handle(startResource(5, 'req1'))
      handle(stopView(10, 'home'))
      handle(addError(20))

      expect(recording.ofType('error')).toHaveLength(0)
      expect(view.pendingErrorCount).toBe(0)
    })
  })

  it('dates a long task from its start and tags its target', () => {
    handle({
      type: 'add-long-task',
      durationNs: 50_000_000,
      target: 'main',
      time: createTimestamp(100),
    })

    const [longTask] = recording.records
    expect(longTask?.event).toMatchObject({
      type: 'long_task',
      date: 1_050,
      longTask: { duration: 50_000_000 },
    })
    expect(longTask?.globalAttributes).toEqual({
      [LONG_TASK_TARGET_ATTRIBUTE]: 'main',
    })
  })

  it('reports the application start as an action', () => {
    handle({
      type: 'application-started',
      applicationStartTime: createTimestamp(0),
      time: createTimestamp(120),
    })

    expect(view.pendingActionCount).toBe(1)
    const [actionEvent] = recording.ofType('action')
    expect(actionEvent?.action).toEqual({
      id: 'id-2',
      type: 'application_start',
      loadingTime: 120_000_000,
    })
    expect(actionEvent?.date).toBe(1_000)
  })

  describe('update-view-loading-time', () => {
    it('updates the loading time on an exact key match', () => {
      handle({
        type: 'update-view-loading-time',
        key: 'home',
        loadingTimeNs: 42_000_000,
        loadingType: 'initial_load',
        time: createTimestamp(50),
      })

      const [viewEvent] = recording.ofType('view')
      expect(viewEvent?.view.loadingTime).toBe(42_000_000)
      expect(viewEvent?.view.loadingType).toBe('initial_load')
    })

    it('ignores another key', () => {
      handle({
        type: 'update-view-loading-time',
        key: 'settings',
        loadingTimeNs: 42_000_000,
        loadingType: 'initial_load',
        time: createTimestamp(50),
      })

      expect(recording.records).toHaveLength(0)
    })

    it('does not treat a reclaimed key as a match', () => {
      const reclaimedView = new RumViewScope(
        parentScope,
        {
          keyRef: { deref: () => undefined },
          name: 'home',
          url: 'home',
          startTime: createTimestamp(0),
          attributes: {},
        },
        utilities,
      )

      reclaimedView.handleEvent(
        {
          type: 'update-view-loading-time',
          key: 'home',
          loadingTimeNs: 42_000_000,
          loadingType: 'initial_load',
          time: createTimestamp(50),
        },
        recording.writer,
      )

      expect(reclaimedView.loadingTime).toBeUndefined()
      expect(recording.records).toHaveLength(0)
    })
  })

  it('records custom timings relative to the view start', () => {
    handle({
      type: 'add-custom-timing',
      name: 'hero',
      time: createTimestamp(250),
    })

    expect(recording.ofType('view')[0]?.view.customTimings).toEqual({
      hero: 250_000_000,
    })
  })

  it('never records a custom timing of zero', () => {
    handle({
      type: 'add-custom-timing',
      name: 'hero',
      time: createTimestamp(0),
    })

    expect(recording.ofType('view')[0]?.view.customTimings).toEqual({
      hero: 1,
    })
  })

  it('still records custom timings while a stopped view waits on a resource', () => {
    handle(startResource(10, 'req1'))
    handle(stopView(20, 'home'))

    const result = handle({
      type: 'add-custom-timing',
      name: 'hero',
      time: createTimestamp(50),
    })

    expect(result).toBe(view)
    const viewEvents = recording.ofType('view')
    expect(viewEvents).toHaveLength(2)
    expect(viewEvents[1]?.view).toMatchObject({
      customTimings: { hero: 50_000_000 },
      isActive: false,
    })
    expect(viewEvents[1]?.dd.documentVersion).toBe(3)
  })

  describe('terminal record', () => {
    it('is emitted once when the view is stopped twice', () => {
      handle(stopView(100, 'home'))
      handle(stopView(200, 'home'))

      expect(recording.ofType('view')).toHaveLength(1)
      expect(view.version).toBe(2)
    })

    it('is not emitted again when another view starts after the stop', () => {
      handle(stopView(100, 'home'))
      handle(startView(200, 'settings', 'settings'))

      expect(recording.ofType('view')).toHaveLength(1)
      expect(view.version).toBe(2)
    })
  })

  it('refreshes the time spent on keep-alive', () => {
    handle({ type: 'keep-alive', time: createTimestamp(300) })
    handle({ type: 'keep-alive', time: createTimestamp(600) })

    const viewEvents = recording.ofType('view')
    expect(viewEvents.map(({ view: { timeSpent } }) => timeSpent)).toEqual([
      300_000_000, 600_000_000,
    ])
    expect(viewEvents.map(({ dd }) => dd.documentVersion)).toEqual([2, 3])
    expect(viewEvents.every(({ view: { isActive } }) => isActive)).toBe(true)
  })

  it('carries global attributes added after the view started', () => {
    const globalAttributes: Record<string, unknown> = {}
    const viewWithGlobals = RumViewScope.fromEvent(
      parentScope,
      startView(0, 'home', 'home', { origin: 'deeplink' }),
      {
        ...utilities,
        globalAttributes: { getGlobalAttributes: () => globalAttributes },
      },
    )

    globalAttributes.tenant = 'acme'
    viewWithGlobals.handleEvent(
      { type: 'keep-alive', time: createTimestamp(10) },
      recording.writer,
    )

    expect(recording.records[0]?.globalAttributes).toEqual({
      origin: 'deeplink',
      tenant: 'acme',
    })
  })
})
