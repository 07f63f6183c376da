/**
 * Copyright Zendesk, Inc.
 *
 * Use of this source code is governed under the Apache License, Version 2.0
 * found at http://www.apache.org/licenses/LICENSE-2.0.
 */

export * from './constants'
export * from './ConsoleRumLogger'
export * from './ensureTimestamp'
export * from './GlobalAttributes'
export * from './keyRef'
export * from './rawEventTypes'
export * from './RumActionScope'
export * from './RumApplicationScope'
export * from './RumDataWriter'
export * from './RumEventMapper'
export type * from './rumEventTypes'
export { getEventCategory } from './rumEventTypes'
export * from './RumMonitor'
export * from './RumResourceScope'
export type * from './RumScope'
export { delegateToScopes } from './RumScope'
export * from './RumSessionScope'
export * from './RumViewScope'
export type * from './types'
