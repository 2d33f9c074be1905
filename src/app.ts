import { OpenAPIHono } from '@hono/zod-openapi';
import { Scalar } from '@scalar/hono-api-reference';
import { logger } from '~/config/logger';
import { registerApiRoutes } from '~/components/api/controller';
import { registerOptimizeRoutes } from '~/components/optimize/controller';
import type { OptimizeRouteOptions } from '~/components/optimize/controller';
import { createOptimizationService } from '~/components/optimize/service';
import type { OptimizationService } from '~/components/optimize/service';

export function createApp(
  service: OptimizationService = createOptimizationService(),
  options: OptimizeRouteOptions = {}
) {
  const app = new OpenAPIHono({
    defaultHook: (result, c) => {
      if (!result.success) {
        const message = result.error.issues
          .map((issue) => `${issue.path.map(String).join('.') || 'request'}: ${issue.message}`)
          .join('; ');
        return c.json({ error: 'Validation failed', message }, 400);
      }
    }
  });

  registerApiRoutes(app);
  registerOptimizeRoutes(app, service, options);

  app.onError((err, c) => {
    logger.error({ error: err.message, path: c.req.path }, 'Unhandled request error');
    return c.json({ error: 'Internal server error', message: err.message }, 500);
  });

  app.doc('/doc', {
    openapi: '3.0.0',
    info: {
      version: '1.0.0',
      title: 'ZIP Image Optimizer API',
      description: 'Recompresses the images inside a ZIP archive and streams progress over Server-Sent Events'
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server'
      }
    ]
  });

  app.get(
    '/reference',
    Scalar({
      url: '/doc',
      theme: 'purple',
      pageTitle: 'ZIP Image Optimizer API Reference'
    })
  );

  return app;
}
