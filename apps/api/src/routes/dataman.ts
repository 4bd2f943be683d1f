/**
 * Data manager routes
 * Feed the frontend model managers: GET /dataman/<api name>?ids=&fields=
 */

import type { FastifyInstance } from 'fastify';
import { serveDataManager } from '@kendb/api-fields';
import { send } from './respond.js';

interface DataManagerRequest {
  Params: { modelName: string };
  Querystring: Record<string, unknown>;
}

export async function datamanRoutes(app: FastifyInstance): Promise<void> {
  app.get<DataManagerRequest>('/dataman/:modelName', async (request, reply) => {
    const response = await serveDataManager(app.models, request.params.modelName, request.query);
    return send(reply, response);
  });
}
