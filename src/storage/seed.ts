/**
 * Seed data for the activity directory
 */

import { z } from 'zod'
import type { Directory } from '../types'
import seedActivities from '../data/seed-activities.json'

export const ActivitySchema = z.object({
  description: z.string(),
  schedule: z.string(),
  max_participants: z.number().int().positive(),
  participants: z.array(z.string().min(1)).refine(
    participants => new Set(participants).size === participants.length,
    { message: 'participants must be unique' }
  )
})

export const DirectorySchema = z.record(z.string().min(1), ActivitySchema)

/**
 * Validate raw seed data. Throws a ZodError naming the offending path.
 */
export function parseSeed(data: unknown): Directory {
  return DirectorySchema.parse(data)
}

/**
 * The bundled set of school activities, freshly parsed on every call
 */
export function loadDefaultSeed(): Directory {
  return parseSeed(seedActivities)
}
