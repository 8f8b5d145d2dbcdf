/**
 * Activity Service - Signup rules over an ActivityDirectory
 */

import type { ActivityDirectory } from '../storage/activity-directory'
import { KeyedMutex } from '../storage/keyed-mutex'
import { InvalidOperationError, NotFoundError } from '../errors'
import type { Activity, ActivityName, Directory, OperationResult } from '../types'
import { logger } from '../utils/logger'

export const ACTIVITY_NOT_FOUND = 'Activity not found'

export class ActivityService {
  // Signup and unregister check then mutate; one activity at a time
  private locks = new KeyedMutex()

  constructor(private directory: ActivityDirectory) {}

  async list(): Promise<Directory> {
    return this.directory.list()
  }

  async get(name: ActivityName): Promise<Activity> {
    const activity = await this.directory.get(name)

    if (!activity) {
      throw new NotFoundError(ACTIVITY_NOT_FOUND)
    }

    return activity
  }

  /**
   * Append an email to an activity. Capacity is not checked.
   */
  async signup(name: ActivityName, email: string): Promise<OperationResult> {
    return this.locks.runExclusive(name, async () => {
      const activity = await this.get(name)

      if (activity.participants.includes(email)) {
        throw new InvalidOperationError(`${email} is already signed up for this activity`)
      }

      if (!(await this.directory.addParticipant(name, email))) {
        throw new NotFoundError(ACTIVITY_NOT_FOUND)
      }

      logger.info('Participant signed up', {
        activity: name,
        email,
        participants: activity.participants.length + 1,
        maxParticipants: activity.max_participants
      })

      return { message: `Signed up ${email} for ${name}` }
    })
  }

  async unregister(name: ActivityName, email: string): Promise<OperationResult> {
    return this.locks.runExclusive(name, async () => {
      const activity = await this.get(name)

      if (!activity.participants.includes(email)) {
        throw new InvalidOperationError(`${email} is not registered for this activity`)
      }

      if (!(await this.directory.removeParticipant(name, email))) {
        throw new NotFoundError(ACTIVITY_NOT_FOUND)
      }

      logger.info('Participant unregistered', { activity: name, email })

      return { message: `Unregistered ${email} from ${name}` }
    })
  }
}
