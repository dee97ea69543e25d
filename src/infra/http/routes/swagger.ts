import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { buildSwaggerSpec } from '../swagger.js';

export function createSwaggerRoutes() {
  const router = Router();
  const swaggerSpec = buildSwaggerSpec();

  router.get('/docs.json', (_req, res) => {
    res.json(swaggerSpec);
  });
  router.use('/docs', swaggerUi.serve);
  router.get('/docs', swaggerUi.setup(swaggerSpec, {
    customCss: '.swagger-ui .topbar { display: none }',
  }));

  return router;
}
