import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { buildSwaggerSpec } from '../swagger.js';

/**
 * Swagger UI at /docs. The document is generated once, when the routes are
 * mounted.
 */
export function createSwaggerRoutes(): Router {
  const router = Router();
  const spec = buildSwaggerSpec();

  router.get('/docs.json', (_req, res) => {
    res.json(spec);
  });
  router.use('/docs', swaggerUi.serve);
  router.get(
    '/docs',
    swaggerUi.setup(spec, {
      customSiteTitle: 'Task Tracker API',
      customCss: '.swagger-ui .topbar { display: none }',
    })
  );

  return router;
}
