export const NULL_UUID = '00000000-0000-0000-0000-000000000000'

export const DEFAULT_SESSION_INACTIVITY_THRESHOLD = 15 * 60 * 1_000 // 15 minutes
export const DEFAULT_SESSION_MAX_DURATION = 4 * 60 * 60 * 1_000 // 4 hours

export const DEFAULT_ACTION_INACTIVITY_THRESHOLD = 100
export const DEFAULT_ACTION_MAX_DURATION = 10_000

export const LONG_TASK_TARGET_ATTRIBUTE = 'long_task.target'

export const CRASH_DETECTED_MESSAGE = 'Application crash detected'
export const ERROR_DETECTED_MESSAGE = 'Application error detected'

export const NANOSECONDS_PER_MILLISECOND = 1_000_000
