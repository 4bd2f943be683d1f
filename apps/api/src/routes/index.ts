/**
 * API Routes
 */

import type { FastifyInstance } from 'fastify';
import { datamanRoutes } from './dataman.js';
import { healthRoutes } from './health.js';
import { profilesRoutes } from './profiles.js';
import { submissionsRoutes } from './submissions.js';

export async function registerRoutes(app: FastifyInstance, apiPrefix: string): Promise<void> {
  // API version prefix
  await app.register(
    async (api) => {
      // Health check routes
      await api.register(healthRoutes);

      // Frontend data manager endpoint
      await api.register(datamanRoutes);

      // Profiles
      await api.register(profilesRoutes);

      // Submissions, revisions and the submissions page
      await api.register(submissionsRoutes);
    },
    { prefix: apiPrefix }
  );
}
