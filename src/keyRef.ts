/**
 * A reference to a caller-owned key.
 * The caller owns the key's lifetime; once an object key is reclaimed `deref()` returns undefined.
 */
export interface KeyRef {
  deref: () => unknown
}

const isReclaimable = (key: unknown): key is object =>
  (typeof key === 'object' && key !== null) || typeof key === 'function'

/**
 * Objects are held weakly, so that a view never keeps its owner alive.
 * Primitive keys (strings, numbers...) can't be reclaimed and are held as-is.
 */
export function createKeyRef(key: unknown): KeyRef {
  if (isReclaimable(key)) {
    const weakRef = new WeakRef(key)
    return { deref: () => weakRef.deref() }
  }
  return { deref: () => key }
}

/**
 * Derives the view url from the key that started it:
 * a string key is its own url, classes/functions use their name and instances their constructor's name.
 */
export function resolveViewUrl(key: unknown, fallbackName: string): string {
  let url: string
  if (typeof key === 'string') {
    url = key
  } else if (typeof key === 'function' && key.name) {
    url = key.name
  } else if (
    typeof key === 'object' &&
    key !== null &&
    key.constructor !== Object &&
    key.constructor?.name
  ) {
    url = key.constructor.name
  } else {
    url = fallbackName
  }
  return url.replaceAll('.', '/')
}
