/**
 * Envelope helpers shared by the route modules
 */

import type { FastifyReply } from 'fastify';
import { z } from 'zod';
import { failure, type ApiResponse } from '@kendb/api-fields';

export function send<T>(reply: FastifyReply, response: ApiResponse<T>): FastifyReply {
  return reply.status(response.statusCode).send(response.body);
}

/**
 * Path identifiers are plain non-negative integers
 */
export const idParam = z
  .string()
  .regex(/^\d+$/, 'Identifier must be an integer')
  .transform((value) => Number(value));

export function invalidRequest(error: z.ZodError): ApiResponse<never> {
  const details = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
  return failure(`Invalid request: ${details}`);
}
