/* eslint-disable prefer-destructuring */
import { NANOSECONDS_PER_MILLISECOND } from './constants'
import type { Timestamp } from './types'

const JUST_CREATED = 10

/**
 * Ensures that the input timestamp object has both epoch and performance.now() time.
 * If no input is provided, it generates a new timestamp with the current time.
 *
 * why store both timestamps?:
 * - epoch time: dates on the emitted records, correlating with backends
 * - durations: time spent on a view, action loading time etc. are measured on the monotonic clock
 *
 * @param input - Partial timestamp object that may contain either epoch or now or both.
 * @returns Full timestamp object with both epoch and performance.now() time.
 */
export const ensureTimestamp = (input?: Partial<Timestamp>): Timestamp => {
  const inputEpoch = input?.epoch
  const inputNow = input?.now
  if (typeof inputEpoch === 'number' && typeof inputNow === 'number') {
    return { epoch: inputEpoch, now: inputNow }
  }
  if (typeof inputEpoch === 'number') {
    const differenceFromNow = Date.now() - inputEpoch
    return {
      epoch: inputEpoch,
      now:
        Math.abs(differenceFromNow) < JUST_CREATED
          ? performance.now()
          : performance.now() - differenceFromNow,
    }
  }
  if (typeof inputNow === 'number') {
    const differenceFromNow = performance.now() - inputNow
    return {
      epoch: Date.now() - differenceFromNow,
      now: inputNow,
    }
  }
  // no data provided, use current time
  return {
    now: performance.now(),
    epoch: Date.now(),
  }
}

export const toNanoseconds = (milliseconds: number): number =>
  Math.round(milliseconds * NANOSECONDS_PER_MILLISECOND)

export const toMilliseconds = (nanoseconds: number): number =>
  nanoseconds / NANOSECONDS_PER_MILLISECOND

/**
 * Duration between two timestamps on the monotonic clock, in nanoseconds.
 * Clamped to at least 1ns, a zero or negative duration is never reported.
 */
export const getClampedDurationNs = (start: Timestamp, end: Timestamp) =>
  Math.max(toNanoseconds(end.now - start.now), 1)
