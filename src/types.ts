/**
 * Core types for the activity directory
 */

export type ActivityName = string

/**
 * Activity record as it travels over the wire.
 *
 * max_participants is advisory: nothing rejects a signup once it is reached.
 */
export interface Activity {
  description: string
  schedule: string
  max_participants: number
  participants: string[]
}

/** All activities keyed by name, in seed order */
export type Directory = Record<ActivityName, Activity>

export interface OperationResult {
  message: string
}
