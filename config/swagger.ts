import swaggerUi from 'swagger-ui-express';
import { swaggerDocs } from '../documentation';
import { Express } from 'express';
import { logger } from '../utils/logger';

export const setupSwagger = (app: Express) => {
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerDocs));
  logger.info('Swagger docs available at /api-docs');
};
