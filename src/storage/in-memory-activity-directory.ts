import type { Activity, ActivityName, Directory } from '../types'
import type { ActivityDirectory } from './activity-directory'
import { loadDefaultSeed } from './seed'

function cloneActivity(activity: Activity): Activity {
  return { ...activity, participants: [...activity.participants] }
}

/**
 * InMemoryActivityDirectory - Process-lifetime directory backed by a Map
 */
export class InMemoryActivityDirectory implements ActivityDirectory {
  private activities = new Map<ActivityName, Activity>()

  constructor(seed: Directory = loadDefaultSeed()) {
    this.reset(seed)
  }

  async list(): Promise<Directory> {
    return Object.fromEntries(
      Array.from(this.activities, ([name, activity]): [ActivityName, Activity] => [
        name,
        cloneActivity(activity)
      ])
    )
  }

  async get(name: ActivityName): Promise<Activity | null> {
    const activity = this.activities.get(name)
    return activity ? cloneActivity(activity) : null
  }

  async addParticipant(name: ActivityName, email: string): Promise<boolean> {
    const activity = this.activities.get(name)
    if (!activity) {
      return false
    }

    activity.participants.push(email)
    return true
  }

  async removeParticipant(name: ActivityName, email: string): Promise<boolean> {
    const activity = this.activities.get(name)
    const index = activity ? activity.participants.indexOf(email) : -1

    if (!activity || index === -1) {
      return false
    }

    activity.participants.splice(index, 1)
    return true
  }

  // Helper for testing
  reset(seed: Directory): void {
    this.activities.clear()
    for (const [name, activity] of Object.entries(seed)) {
      this.activities.set(name, cloneActivity(activity))
    }
  }
}
