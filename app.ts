import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { requestContext } from './middlewares/request-context';
import { requestLogger } from './middlewares/logger-middleware';
import { errorHandler, notFoundHandler } from './middlewares/error-handler';
import { setupSwagger } from './config/swagger';
import { RouteDeps, createAppRoutes } from './routes';
import { MetricsService } from './services/metrics.service';
import { bigintReplacer } from './utils/bps';

export interface AppDeps extends RouteDeps {
  metrics: MetricsService;
}

export const createApp = (deps: AppDeps) => {
  const app = express();
  app.use(helmet());
  app.use(cors());
  app.set('trust proxy', 1);
  // Amounts, rates and marks are bigints; send them as decimal strings
  app.set('json replacer', bigintReplacer);

  app.use(express.json({ limit: '1mb' }));
  app.use(requestContext);

  if (process.env.NODE_ENV !== 'production') {
    app.use(requestLogger);
  }

  setupSwagger(app);

  app.get('/', (_req, res) => {
    res.send({ message: 'Yield strategy engine is running' });
  });

  app.get('/metrics', async (_req, res, next) => {
    try {
      res.set('Content-Type', deps.metrics.contentType());
      res.send(await deps.metrics.metrics());
    } catch (error) {
      next(error);
    }
  });

  app.use('/v1', createAppRoutes(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
