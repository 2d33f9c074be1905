import type { OpenAPIHono } from '@hono/zod-openapi';
import { endpointsRoute, healthRoute } from './schemas';

const ENDPOINTS = [
  { path: '/optimize', method: 'POST', description: 'Submit a ZIP archive of images for optimization' },
  { path: '/optimize/{jobId}', method: 'GET', description: 'Current job state and per-file results' },
  { path: '/optimize/{jobId}/events', method: 'GET', description: 'Live progress as Server-Sent Events' },
  { path: '/optimize/{jobId}/download', method: 'GET', description: 'Download the optimized archive' },
  { path: '/artifacts/{artifactId}', method: 'GET', description: 'Download an optimized archive by artifact id' },
  { path: '/stats', method: 'GET', description: 'Lifetime optimization counter' },
  { path: '/health', method: 'GET', description: 'Liveness probe' },
  { path: '/doc', method: 'GET', description: 'OpenAPI document' },
  { path: '/reference', method: 'GET', description: 'Interactive API reference' }
];

export function registerApiRoutes(app: OpenAPIHono) {
  app.openapi(endpointsRoute, (c) => {
    return c.json({ endpoints: ENDPOINTS }, 200);
  });

  app.openapi(healthRoute, (c) => {
    return c.json({ ok: true }, 200);
  });
}
