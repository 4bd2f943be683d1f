/**
 * Profile routes
 */

import type { FastifyInstance } from 'fastify';
import { serialize, success } from '@kendb/api-fields';
import { Profile } from '@kendb/database';
import { send } from './respond.js';

export async function profilesRoutes(app: FastifyInstance): Promise<void> {
  /**
   * GET /profiles/
   * Every profile, default field group
   */
  app.get('/profiles/', async (_request, reply) => {
    const profiles = await Profile.objects.all();
    return send(reply, success({ profiles: profiles.map((profile) => serialize(profile)) }));
  });
}
