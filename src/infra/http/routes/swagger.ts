import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { swaggerSpec } from '../swagger.js';

/**
 * OpenAPI document as JSON at /docs.json, browsable UI at /docs.
 */
export function createSwaggerRoutes() {
  const router = Router();

  router.get('/docs.json', (_req, res) => {
    res.status(200).json(swaggerSpec);
  });
  router.use('/docs', swaggerUi.serve);
  router.get(
    '/docs',
    swaggerUi.setup(swaggerSpec, {
      customSiteTitle: 'Vacation Auth API',
      customCss: '.swagger-ui .topbar { display: none }',
    })
  );

  return router;
}
