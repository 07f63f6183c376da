import { CRASH_DETECTED_MESSAGE, ERROR_DETECTED_MESSAGE } from './constants'
import type {
  RumConnectivityInfo,
  RumResourceProvider,
  RumUserInfo,
} from './rumEventTypes'
import type { RumEventCategory } from './rawEventTypes'
import type {
  Attributes,
  FirstPartyHostDetector,
  NetworkInfo,
  RumScopeUtilities,
  UserInfo,
} from './types'

export const toRumUserInfo = ({ id, name, email }: UserInfo): RumUserInfo => ({
  id,
  name,
  email,
})

export function toConnectivityInfo(
  networkInfo: NetworkInfo,
): RumConnectivityInfo {
  const { connectivity, carrierName } = networkInfo
  if (connectivity === 'none') {
    return { status: 'not_connected', interfaces: [], carrierName }
  }
  if (connectivity === 'unknown') {
    return { status: 'maybe', interfaces: [], carrierName }
  }
  return { status: 'connected', interfaces: [connectivity], carrierName }
}

/**
 * copies the given attributes and lays the current global attributes over them
 */
export const mergeWithGlobalAttributes = (
  attributes: Attributes,
  globalAttributes: Readonly<Attributes>,
): Attributes => ({ ...attributes, ...globalAttributes })

const getThrownMessage = (error: unknown): string | undefined => {
  if (error instanceof Error && error.message.trim() !== '') {
    return error.message
  }
  return undefined
}

/**
 * The explicit message wins, then the message of whatever was thrown.
 * Without either, the record still needs a human readable message.
 */
export function resolveErrorMessage(
  message: string | undefined,
  error: unknown,
  isFatal: boolean,
): string {
  if (message !== undefined && message.trim() !== '') return message
  return (
    getThrownMessage(error) ??
    (isFatal ? CRASH_DETECTED_MESSAGE : ERROR_DETECTED_MESSAGE)
  )
}

export const getCrashMessage = (error: unknown): string => {
  const thrownMessage = getThrownMessage(error)
  return thrownMessage
    ? `${CRASH_DETECTED_MESSAGE}: ${thrownMessage}`
    : CRASH_DETECTED_MESSAGE
}

export const getErrorStack = (error: unknown): string | undefined =>
  error instanceof Error ? error.stack : undefined

export const getErrorType = (error: unknown): string | undefined =>
  error instanceof Error ? error.name : undefined

export function getUrlHost(url: string): string | undefined {
  try {
    return new URL(url).hostname
  } catch {
    return undefined
  }
}

export function resolveResourceProvider(
  url: string,
  firstPartyHostDetector: FirstPartyHostDetector,
): RumResourceProvider | undefined {
  if (!firstPartyHostDetector.isFirstPartyUrl(url)) return undefined
  return { domain: getUrlHost(url), type: 'first_party' }
}

/**
 * Best effort: a failing listener is reported but never interrupts the scope that noticed the drop.
 */
export function notifyDropped(
  utilities: Pick<RumScopeUtilities, 'droppedEventListener' | 'reportErrorFn'>,
  viewId: string,
  category: RumEventCategory,
): void {
  try {
    utilities.droppedEventListener?.notifyDropped(viewId, category)
  } catch (error) {
    utilities.reportErrorFn(
      error instanceof Error
        ? error
        : new Error(`Dropped event listener failed: ${String(error)}`),
    )
  }
}
