import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';

/**
 * Interactive docs at /docs and the raw OpenAPI document at /docs.json.
 */
export function createSwaggerRoutes(spec: object, title: string) {
  const router = Router();

  router.get('/docs.json', (_req, res) => {
    res.json(spec);
  });
  router.use('/docs', swaggerUi.serve, swaggerUi.setup(spec, { customSiteTitle: title }));

  return router;
}
