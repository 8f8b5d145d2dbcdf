/**
 * Activities API
 *
 * Listing, signup and unregister. Express percent-decodes both the
 * :activityName segment and the email query value before they get here.
 */

import { Router } from 'express'
import { z } from 'zod'
import type { ActivityService } from '../services/activity-service'
import { validateRequest } from '../middleware/validate'
import { methodNotAllowedHandler } from '../middleware/error-handler'

const EmailQuerySchema = z.object({
  // A repeated parameter keeps its last value; an empty value is accepted
  email: z.preprocess(
    value => (Array.isArray(value) ? value[value.length - 1] : value),
    z.string()
  )
})

export function createActivityRouter(activityService: ActivityService) {
  const router = Router()

  // GET /activities - All activities keyed by name
  router.get('/', async (req, res) => {
    res.json(await activityService.list())
  })

  // GET /activities/:activityName - One activity
  router.get('/:activityName', async (req, res) => {
    res.json(await activityService.get(req.params.activityName))
  })

  // POST /activities/:activityName/signup?email=
  router.post('/:activityName/signup', async (req, res) => {
    const { email } = validateRequest(EmailQuerySchema, 'query', req.query)

    res.json(await activityService.signup(req.params.activityName, email))
  })

  // DELETE /activities/:activityName/unregister?email=
  router.delete('/:activityName/unregister', async (req, res) => {
    const { email } = validateRequest(EmailQuerySchema, 'query', req.query)

    res.json(await activityService.unregister(req.params.activityName, email))
  })

  // Known paths answer other methods with 405
  router.all(
    ['/', '/:activityName', '/:activityName/signup', '/:activityName/unregister'],
    methodNotAllowedHandler
  )

  return router
}
