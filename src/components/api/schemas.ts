import { createRoute, z } from '@hono/zod-openapi';
import { EndpointsResponseSchema } from '~/utils/schemas';

/**
 * GET / - List available endpoints
 */
export const endpointsRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['API'],
  responses: {
    200: {
      content: {
        'application/json': {
          schema: EndpointsResponseSchema
        }
      },
      description: 'Available endpoints'
    }
  }
});

/**
 * GET /health - Liveness probe
 */
export const healthRoute = createRoute({
  method: 'get',
  path: '/health',
  tags: ['API'],
  responses: {
    200: {
      content: {
        'application/json': {
          schema: z.object({ ok: z.boolean() }).openapi('Health')
        }
      },
      description: 'Service is up'
    }
  }
});
