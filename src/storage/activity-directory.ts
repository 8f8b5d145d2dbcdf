import type { Activity, ActivityName, Directory } from '../types'

/**
 * ActivityDirectory - Owns the activity records and their participant lists
 *
 * Implementations hand out copies; callers never hold a reference into
 * directory state.
 */
export interface ActivityDirectory {
  /**
   * All activities, in seed order
   */
  list(): Promise<Directory>

  /**
   * One activity by exact name (null when unknown)
   */
  get(name: ActivityName): Promise<Activity | null>

  /**
   * Append an email to the participant list.
   * Returns false when the activity does not exist.
   */
  addParticipant(name: ActivityName, email: string): Promise<boolean>

  /**
   * Remove an email from the participant list.
   * Returns false when the activity or the email is not present.
   */
  removeParticipant(name: ActivityName, email: string): Promise<boolean>
}
